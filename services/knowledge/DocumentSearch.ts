/**
 * Document search over the knowledge store
 */

import { RegulatoryDocument } from '../../shared/domain/models/Document.js';
import { DocumentType, SCR_MODULES, ScrModule } from '../../shared/domain/models/Vocabulary.js';
import { IKnowledgeRepository } from '../../shared/domain/repositories/KnowledgeRepository.js';
import { Logger } from '../../shared/infrastructure/logging.js';

export interface DocumentSearchQuery {
  /** Case-insensitive substring of the title or an article identifier */
  query?: string;
  /** Modules to scan; all modules when empty or absent */
  modules?: readonly ScrModule[];
  docTypes?: readonly DocumentType[];
  minReliability?: number;
}

/**
 * Documents of the given modules, each once, in module scan order
 */
export function collectDocuments(
  repository: IKnowledgeRepository,
  modules: readonly ScrModule[] = SCR_MODULES
): RegulatoryDocument[] {
  const byId = new Map<string, RegulatoryDocument>();
  for (const module of modules) {
    for (const document of repository.findDocumentsByModule(module)) {
      if (!byId.has(document.id)) {
        byId.set(document.id, document);
      }
    }
  }
  return Array.from(byId.values());
}

function compareTitles(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Filter stored documents, most reliable first, then by title
 */
export function searchDocuments(
  repository: IKnowledgeRepository,
  search: DocumentSearchQuery,
  logger?: Logger
): RegulatoryDocument[] {
  const modules = search.modules && search.modules.length > 0 ? search.modules : SCR_MODULES;
  const docTypes = search.docTypes ?? [];
  const minReliability = search.minReliability ?? 0;
  const needle = search.query?.toLowerCase();

  const matches = collectDocuments(repository, modules).filter(document => {
    if (docTypes.length > 0 && !docTypes.includes(document.docType)) {
      return false;
    }
    if (document.reliabilityScore < minReliability) {
      return false;
    }
    if (needle) {
      const haystack = `${document.title} ${document.regulatoryArticles.join(' ')}`.toLowerCase();
      if (!haystack.includes(needle)) {
        return false;
      }
    }
    return true;
  });

  matches.sort(
    (a, b) => b.reliabilityScore - a.reliabilityScore || compareTitles(a.title, b.title)
  );

  logger?.info(`Search: ${matches.length} documents found`, 'DocumentSearch');
  return matches;
}
