/**
 * Ingestion orchestrator
 *
 * Runs one document through extraction, signal extraction and storage,
 * then mines concepts from it. Operational failures (missing file, failed
 * fetch, empty text, rejected write) end as a failed result; entity
 * validation errors propagate to the caller.
 */

import fs from 'fs';
import { RegulatoryDocument, createRegulatoryDocument } from '../../shared/domain/models/Document.js';
import { DocumentType, JsonObject, JsonValue, ScrModule } from '../../shared/domain/models/Vocabulary.js';
import { ScrConcept } from '../../shared/domain/models/ScrConcept.js';
import { IKnowledgeRepository } from '../../shared/domain/repositories/KnowledgeRepository.js';
import {
  ExtractionEmptyError,
  SourceNotFoundError,
  StoreWriteError,
  ValidationError,
  describeError
} from '../../shared/domain/errors.js';
import {
  ContentExtractors,
  ExtractedContent,
  ExtractionStatistics,
  extractorFor,
  resolveSource
} from '../../shared/infrastructure/ContentExtractor.js';
import { Logger } from '../../shared/infrastructure/logging.js';
import { mineConcepts } from './ConceptMiner.js';
import { DocumentOverrides } from './IngestionRequestSchema.js';
import {
  calculateReliabilityScore,
  computeContentHash,
  deriveDocumentId,
  detectLanguage,
  estimateReadingTime,
  extractRegulatoryArticles,
  extractScrKeywords,
  extractTitle
} from './SignalExtractor.js';

export interface IngestionRequest {
  /** Local path (.pdf, .html, .htm) or http(s) URL */
  locator: string;
  docType: DocumentType;
  modules: readonly ScrModule[];
  /** Caller-supplied values; each one wins over its heuristic */
  overrides?: DocumentOverrides;
}

export interface IngestionResult {
  success: boolean;
  documentId?: string;
  conceptsStored: number;
  warnings: string[];
  /** Short reason when `success` is false */
  errorMessage?: string;
  processingTimeMs: number;
}

export interface BatchItemResult {
  locator: string;
  success: boolean;
  errorMessage?: string;
}

export interface BatchResult {
  results: BatchItemResult[];
  total: number;
  succeeded: number;
  failed: number;
}

export interface IngestionServiceOptions {
  repository: IKnowledgeRepository;
  extractors: ContentExtractors;
  logger: Logger;
  /** Files above this size are ingested with a warning */
  maxFileSizeMb?: number;
  /** Clock used for `lastUpdated` and `processed_at` */
  now?: () => Date;
}

const BYTES_PER_MB = 1024 * 1024;

function statisticsMetadata(statistics: ExtractionStatistics): JsonObject {
  const entries: Array<[string, number | undefined]> = [
    ['word_count', statistics.wordCount],
    ['char_count', statistics.charCount],
    ['page_count', statistics.pageCount],
    ['pages_processed', statistics.pagesProcessed],
    ['link_count', statistics.linkCount],
    ['table_count', statistics.tableCount],
    ['heading_count', statistics.headingCount]
  ];
  const metadata: JsonObject = {};
  for (const [key, value] of entries) {
    if (value !== undefined) {
      metadata[key] = value;
    }
  }
  return metadata;
}

/**
 * Metadata map stored with a document
 */
export function buildDocumentMetadata(
  extracted: ExtractedContent,
  warnings: readonly string[],
  processedAt: Date
): JsonObject {
  const metadata: JsonObject = statisticsMetadata(extracted.statistics);
  metadata.reading_time_minutes = estimateReadingTime(extracted.statistics.wordCount);
  metadata.scr_keywords = extractScrKeywords(extracted.textContent);

  const source: Record<string, JsonValue | undefined> = {
    description: extracted.metadata.description,
    author: extracted.metadata.author,
    subject: extracted.metadata.subject,
    creator: extracted.metadata.creator,
    creation_date: extracted.metadata.creationDate,
    keywords: extracted.metadata.keywords,
    declared_language: extracted.metadata.language
  };
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      metadata[key] = value;
    }
  }

  if (extracted.fileInfo) {
    metadata.file_info = {
      name: extracted.fileInfo.name,
      size_mb: Math.round(extracted.fileInfo.sizeMb * 100) / 100,
      extension: extracted.fileInfo.extension
    };
  }

  metadata.processed_at = processedAt.toISOString();
  if (warnings.length > 0) {
    metadata.warnings = [...warnings];
  }

  return metadata;
}

export class IngestionService {
  private readonly repository: IKnowledgeRepository;
  private readonly extractors: ContentExtractors;
  private readonly logger: Logger;
  private readonly maxFileSizeMb: number;
  private readonly now: () => Date;
  private readonly context = 'IngestionService';

  constructor(options: IngestionServiceOptions) {
    this.repository = options.repository;
    this.extractors = options.extractors;
    this.logger = options.logger;
    this.maxFileSizeMb = options.maxFileSizeMb ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Ingest one document
   * @returns true when the document was stored
   */
  async addDocument(
    locator: string,
    docType: DocumentType,
    modules: readonly ScrModule[],
    overrides: DocumentOverrides = {}
  ): Promise<boolean> {
    const result = await this.ingest({ locator, docType, modules, overrides });
    return result.success;
  }

  /**
   * Ingest one document and report what happened.
   * Throws ValidationError when the document cannot be built.
   */
  async ingest(request: IngestionRequest): Promise<IngestionResult> {
    const startTime = Date.now();
    const warnings: string[] = [];
    const { locator } = request;

    this.logger.info(`Processing document: ${locator}`, this.context);

    try {
      const source = resolveSource(locator);

      if (source.origin === 'file') {
        if (!fs.existsSync(source.path)) {
          throw new SourceNotFoundError(source.path);
        }
        const sizeMb = fs.statSync(source.path).size / BYTES_PER_MB;
        if (sizeMb > this.maxFileSizeMb) {
          const warning = `Large file (${sizeMb.toFixed(1)}MB), extraction may be partial`;
          warnings.push(warning);
          this.logger.warn(warning, this.context, { locator });
        }
      }

      const extractor = extractorFor(source, this.extractors);
      this.logger.debug(`Extractor selected: ${extractor.name}`, this.context);

      const extracted = await extractor.extract(source);
      warnings.push(...extracted.warnings);

      const text = extracted.textContent;
      if (!text.trim()) {
        throw new ExtractionEmptyError(locator);
      }

      const document = this.buildDocument(request, extracted, warnings);

      if (!this.repository.saveDocument(document)) {
        throw new StoreWriteError(`document ${document.id} was not stored`);
      }

      const conceptsStored = this.storeConcepts(document, text);
      this.logger.info(`Document stored: ${document.id} (${conceptsStored} concepts)`, this.context);

      return {
        success: true,
        documentId: document.id,
        conceptsStored,
        warnings,
        processingTimeMs: Date.now() - startTime
      };
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      const errorMessage = describeError(error);
      this.logger.error(`Failed to process ${locator}: ${errorMessage}`, this.context);
      return {
        success: false,
        conceptsStored: 0,
        warnings,
        errorMessage,
        processingTimeMs: Date.now() - startTime
      };
    }
  }

  /**
   * Ingest documents one at a time, in order, continuing past failures
   */
  async ingestBatch(requests: readonly IngestionRequest[]): Promise<BatchResult> {
    const results: BatchItemResult[] = [];

    for (const request of requests) {
      try {
        const result = await this.ingest(request);
        results.push({ locator: request.locator, success: result.success, errorMessage: result.errorMessage });
      } catch (error) {
        const errorMessage = describeError(error);
        this.logger.error(`Rejected ${request.locator}: ${errorMessage}`, this.context);
        results.push({ locator: request.locator, success: false, errorMessage });
      }
    }

    const succeeded = results.filter(result => result.success).length;
    this.logger.info(`Batch finished: ${succeeded}/${results.length} documents stored`, this.context);

    return { results, total: results.length, succeeded, failed: results.length - succeeded };
  }

  private buildDocument(
    request: IngestionRequest,
    extracted: ExtractedContent,
    warnings: readonly string[]
  ): RegulatoryDocument {
    const { locator, docType, modules } = request;
    const overrides = request.overrides ?? {};
    const text = extracted.textContent;
    const isWeb = resolveSource(locator).origin === 'url';
    const contentHash = computeContentHash(text);
    const now = this.now();

    return createRegulatoryDocument({
      id: deriveDocumentId(docType, locator, contentHash),
      title: overrides.title ?? extractTitle(text, extracted.metadata.title, locator),
      docType,
      url: isWeb ? locator : (overrides.url ?? null),
      filePath: isWeb ? null : locator,
      publicationDate: overrides.publicationDate ?? null,
      regulatoryArticles: extractRegulatoryArticles(text),
      scrModules: modules,
      language: overrides.language ?? detectLanguage(text),
      reliabilityScore:
        overrides.reliabilityScore ?? calculateReliabilityScore(text, docType, extracted.statistics.wordCount),
      contentHash,
      lastUpdated: now,
      metadata: buildDocumentMetadata(extracted, warnings, now)
    });
  }

  /**
   * Mine and store concepts; failures are logged and never fail the
   * document
   */
  private storeConcepts(document: RegulatoryDocument, text: string): number {
    let concepts: ScrConcept[];
    try {
      concepts = mineConcepts(text, document.scrModules, document.id, this.now);
    } catch (error) {
      this.logger.warn(`Concept mining failed for ${document.id}: ${describeError(error)}`, this.context);
      return 0;
    }

    let stored = 0;
    for (const concept of concepts) {
      if (this.repository.saveConcept(concept) !== null) {
        stored++;
      } else {
        this.logger.warn(`Concept not stored: ${concept.conceptName} (${concept.scrModule})`, this.context);
      }
    }
    return stored;
  }
}
