import { createRegulatoryDocument } from '../../../shared/domain/models/Document.js';
import { createScrConcept } from '../../../shared/domain/models/ScrConcept.js';
import { IKnowledgeRepository } from '../../../shared/domain/repositories/KnowledgeRepository.js';

const UPDATED = new Date('2024-05-01T10:00:00.000Z');

/**
 * Three documents over spread and equity, one concept
 */
export function seedKnowledge(repository: IKnowledgeRepository): void {
  repository.saveDocument(
    createRegulatoryDocument({
      id: 'd1',
      title: 'Spread risk guidelines',
      docType: 'eiopa_guidelines',
      scrModules: ['spread'],
      regulatoryArticles: ['176'],
      reliabilityScore: 0.9,
      lastUpdated: UPDATED
    })
  );
  repository.saveDocument(
    createRegulatoryDocument({
      id: 'd2',
      title: 'Annual report',
      docType: 'industry_paper',
      scrModules: ['spread', 'equity'],
      reliabilityScore: 0.7,
      lastUpdated: UPDATED
    })
  );
  repository.saveDocument(
    createRegulatoryDocument({
      id: 'd3',
      title: 'Equity shocks',
      docType: 'regulation_eu',
      scrModules: ['equity'],
      regulatoryArticles: ['169'],
      reliabilityScore: 0.9,
      publicationDate: '2015-01-17',
      lastUpdated: UPDATED
    })
  );
  repository.saveConcept(
    createScrConcept({
      conceptName: 'Choc actions',
      scrModule: 'equity',
      definition: '39% type 1',
      regulatoryArticle: '169',
      sourceDocumentId: 'd3',
      examples: ['type 1', 'type 2'],
      createdAt: UPDATED
    })
  );
}
