/**
 * Repository interface for the knowledge base
 * Provides an abstraction layer over the storage mechanism
 */
import { RegulatoryDocument } from '../models/Document.js';
import { ScrConcept } from '../models/ScrConcept.js';
import { DocumentType, ScrModule } from '../models/Vocabulary.js';

/**
 * Aggregate counts over the stored documents and concepts
 */
export interface KnowledgeStatistics {
  totalDocuments: number;

  totalConcepts: number;

  documentsByType: Partial<Record<DocumentType, number>>;

  /** A document counts once per module it is tagged with */
  documentsByModule: Partial<Record<ScrModule, number>>;

  conceptsByModule: Partial<Record<ScrModule, number>>;

  /** 0 when the store holds no document */
  averageReliability: number;

  /** Distinct languages, sorted */
  languages: string[];

  dateRange: {
    earliest: string | null;
    latest: string | null;
  };
}

/**
 * Knowledge store interface.
 * Writes report failure through their return value and leave prior state
 * untouched; they never throw for operational errors.
 */
export interface IKnowledgeRepository {
  /**
   * Insert or replace a document keyed by its id
   * @returns true when the write was committed
   */
  saveDocument(document: RegulatoryDocument): boolean;

  /**
   * Insert a concept; the store allocates its id
   * @returns the new id, or null when the write was rejected
   */
  saveConcept(concept: ScrConcept): number | null;

  findDocumentById(id: string): RegulatoryDocument | null;

  /**
   * Documents tagged with a module, by reliability descending then
   * publication date descending (undated last)
   */
  findDocumentsByModule(module: ScrModule, limit?: number): RegulatoryDocument[];

  /**
   * Concepts of a module, by name ascending
   */
  findConceptsByModule(module: ScrModule): ScrConcept[];

  getStatistics(): KnowledgeStatistics;

  /**
   * Release the underlying connection
   */
  close(): void;
}
