/**
 * SQLite knowledge store
 *
 * Documents are upserted by id, concepts are insert-only with ids
 * allocated by SQLite. List columns hold JSON arrays; module membership is
 * a containment test over that JSON text.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { StoreWriteError, describeError } from '../../domain/errors.js';
import { RegulatoryDocument, createRegulatoryDocument } from '../../domain/models/Document.js';
import { ScrConcept, createScrConcept } from '../../domain/models/ScrConcept.js';
import { DOCUMENT_TYPES, JsonObject, JsonValue, SCR_MODULES, ScrModule } from '../../domain/models/Vocabulary.js';
import { IKnowledgeRepository, KnowledgeStatistics } from '../../domain/repositories/KnowledgeRepository.js';
import { Logger } from '../logging.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    doc_type TEXT NOT NULL,
    url TEXT,
    file_path TEXT,
    publication_date TEXT,
    regulatory_articles TEXT NOT NULL DEFAULT '[]',
    scr_modules TEXT NOT NULL DEFAULT '[]',
    language TEXT NOT NULL DEFAULT 'fr',
    reliability_score REAL NOT NULL DEFAULT 0.8 CHECK (reliability_score BETWEEN 0 AND 1),
    content_hash TEXT,
    metadata TEXT NOT NULL DEFAULT '{}',
    last_updated TEXT NOT NULL,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS scr_concepts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    concept_name TEXT NOT NULL,
    scr_module TEXT NOT NULL,
    definition TEXT,
    formula TEXT,
    regulatory_article TEXT,
    source_document_id TEXT,
    examples TEXT NOT NULL DEFAULT '[]',
    confidence_score REAL NOT NULL DEFAULT 0.8 CHECK (confidence_score BETWEEN 0 AND 1),
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_documents_module ON documents(scr_modules);
  CREATE INDEX IF NOT EXISTS idx_concepts_module ON scr_concepts(scr_module);
`;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const DocumentRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  doc_type: z.enum(DOCUMENT_TYPES),
  url: z.string().nullable(),
  file_path: z.string().nullable(),
  publication_date: z.string().nullable(),
  regulatory_articles: z.string(),
  scr_modules: z.string(),
  language: z.string(),
  reliability_score: z.number(),
  content_hash: z.string().nullable(),
  metadata: z.string(),
  last_updated: z.string()
});

const ConceptRowSchema = z.object({
  id: z.number(),
  concept_name: z.string(),
  scr_module: z.enum(SCR_MODULES),
  definition: z.string().nullable(),
  formula: z.string().nullable(),
  regulatory_article: z.string().nullable(),
  source_document_id: z.string().nullable(),
  examples: z.string(),
  confidence_score: z.number(),
  created_at: z.string()
});

const StringListSchema = z.array(z.string());
const ModuleListSchema = z.array(z.enum(SCR_MODULES));
const MetadataSchema = z.record(JsonValueSchema);

const CountRowSchema = z.object({ count: z.number() });
const GroupCountRowSchema = z.object({ key: z.string(), count: z.number() });
const LanguageRowSchema = z.object({ language: z.string() });
const AggregateRowSchema = z.object({
  average: z.number().nullable(),
  earliest: z.string().nullable(),
  latest: z.string().nullable()
});

type DocumentRow = z.infer<typeof DocumentRowSchema>;
type ConceptRow = z.infer<typeof ConceptRowSchema>;

function parseJsonColumn<T>(schema: z.ZodType<T>, raw: string, fallback: T): T {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : fallback;
  } catch {
    return fallback; // malformed column
  }
}

/**
 * LIKE pattern matching a module as a quoted JSON token; `_` is escaped
 * so that it is not a wildcard
 */
export function moduleContainmentPattern(module: ScrModule): string {
  const escaped = module.replace(/[\\%_]/g, match => `\\${match}`);
  return `%"${escaped}"%`;
}

function toDocument(row: DocumentRow): RegulatoryDocument {
  return createRegulatoryDocument({
    id: row.id,
    title: row.title,
    docType: row.doc_type,
    url: row.url,
    filePath: row.file_path,
    publicationDate: row.publication_date,
    regulatoryArticles: parseJsonColumn(StringListSchema, row.regulatory_articles, []),
    scrModules: parseJsonColumn(ModuleListSchema, row.scr_modules, []),
    language: row.language,
    reliabilityScore: row.reliability_score,
    contentHash: row.content_hash ?? '',
    lastUpdated: new Date(row.last_updated),
    metadata: parseJsonColumn<JsonObject>(MetadataSchema, row.metadata, {})
  });
}

function toConcept(row: ConceptRow): ScrConcept {
  return createScrConcept({
    id: row.id,
    conceptName: row.concept_name,
    scrModule: row.scr_module,
    definition: row.definition ?? '',
    formula: row.formula,
    regulatoryArticle: row.regulatory_article,
    sourceDocumentId: row.source_document_id,
    examples: parseJsonColumn(StringListSchema, row.examples, []),
    confidenceScore: row.confidence_score,
    createdAt: new Date(row.created_at)
  });
}

export class SqliteKnowledgeRepository implements IKnowledgeRepository {
  private readonly db: Database.Database;
  private readonly context = 'KnowledgeStore';

  /**
   * Open (or create) a store
   * @param databasePath File path, or ':memory:'
   */
  constructor(databasePath: string, private readonly logger: Logger) {
    if (databasePath !== ':memory:') {
      fs.mkdirSync(path.dirname(databasePath), { recursive: true });
    }
    this.db = new Database(databasePath);
    this.db.exec(SCHEMA);
    this.logger.debug(`Knowledge store opened: ${databasePath}`, this.context);
  }

  saveDocument(document: RegulatoryDocument): boolean {
    try {
      const insert = this.db.prepare(`
        INSERT OR REPLACE INTO documents
          (id, title, doc_type, url, file_path, publication_date,
           regulatory_articles, scr_modules, language, reliability_score,
           content_hash, metadata, last_updated)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      this.db.transaction(() => {
        insert.run(
          document.id,
          document.title,
          document.docType,
          document.url,
          document.filePath,
          document.publicationDate,
          JSON.stringify(document.regulatoryArticles),
          JSON.stringify(document.scrModules),
          document.language,
          document.reliabilityScore,
          document.contentHash,
          JSON.stringify(document.metadata),
          document.lastUpdated.toISOString()
        );
      })();
      this.logger.info(`Document saved: ${document.id}`, this.context);
      return true;
    } catch (error) {
      const failure = new StoreWriteError(`document ${document.id}`, error instanceof Error ? error : undefined);
      this.logger.error(failure.message, this.context, failure.details);
      return false;
    }
  }

  saveConcept(concept: ScrConcept): number | null {
    try {
      const insert = this.db.prepare(`
        INSERT INTO scr_concepts
          (concept_name, scr_module, definition, formula, regulatory_article,
           source_document_id, examples, confidence_score, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      const result = this.db.transaction(() =>
        insert.run(
          concept.conceptName,
          concept.scrModule,
          concept.definition,
          concept.formula,
          concept.regulatoryArticle,
          concept.sourceDocumentId,
          JSON.stringify(concept.examples),
          concept.confidenceScore,
          concept.createdAt.toISOString()
        )
      )();
      this.logger.debug(`Concept saved: ${concept.conceptName} (${concept.scrModule})`, this.context);
      return Number(result.lastInsertRowid);
    } catch (error) {
      const failure = new StoreWriteError(`concept ${concept.conceptName}`, error instanceof Error ? error : undefined);
      this.logger.error(failure.message, this.context, failure.details);
      return null;
    }
  }

  findDocumentById(id: string): RegulatoryDocument | null {
    const row = this.db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
    return row === undefined ? null : toDocument(DocumentRowSchema.parse(row));
  }

  findDocumentsByModule(module: ScrModule, limit?: number): RegulatoryDocument[] {
    let query = `
      SELECT * FROM documents
      WHERE scr_modules LIKE ? ESCAPE '\\'
      ORDER BY reliability_score DESC, publication_date DESC
    `;
    const params: Array<string | number> = [moduleContainmentPattern(module)];

    if (limit !== undefined) {
      query += ' LIMIT ?';
      params.push(limit);
    }

    return this.db
      .prepare(query)
      .all(...params)
      .map(row => toDocument(DocumentRowSchema.parse(row)));
  }

  findConceptsByModule(module: ScrModule): ScrConcept[] {
    return this.db
      .prepare('SELECT * FROM scr_concepts WHERE scr_module = ? ORDER BY concept_name ASC')
      .all(module)
      .map(row => toConcept(ConceptRowSchema.parse(row)));
  }

  getStatistics(): KnowledgeStatistics {
    const totalDocuments = CountRowSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM documents').get()).count;
    const totalConcepts = CountRowSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM scr_concepts').get()).count;

    const documentsByType: KnowledgeStatistics['documentsByType'] = {};
    for (const raw of this.db.prepare('SELECT doc_type AS key, COUNT(*) AS count FROM documents GROUP BY doc_type').all()) {
      const row = GroupCountRowSchema.parse(raw);
      const docType = DOCUMENT_TYPES.find(type => type === row.key);
      if (docType) {
        documentsByType[docType] = row.count;
      }
    }

    const documentsByModule: KnowledgeStatistics['documentsByModule'] = {};
    const moduleCount = this.db.prepare("SELECT COUNT(*) AS count FROM documents WHERE scr_modules LIKE ? ESCAPE '\\'");
    for (const module of SCR_MODULES) {
      const count = CountRowSchema.parse(moduleCount.get(moduleContainmentPattern(module))).count;
      if (count > 0) {
        documentsByModule[module] = count;
      }
    }

    const conceptsByModule: KnowledgeStatistics['conceptsByModule'] = {};
    for (const raw of this.db.prepare('SELECT scr_module AS key, COUNT(*) AS count FROM scr_concepts GROUP BY scr_module').all()) {
      const row = GroupCountRowSchema.parse(raw);
      const module = SCR_MODULES.find(candidate => candidate === row.key);
      if (module) {
        conceptsByModule[module] = row.count;
      }
    }

    const aggregate = AggregateRowSchema.parse(
      this.db
        .prepare(
          'SELECT AVG(reliability_score) AS average, MIN(publication_date) AS earliest, MAX(publication_date) AS latest FROM documents'
        )
        .get()
    );

    const languages = this.db
      .prepare('SELECT DISTINCT language FROM documents ORDER BY language')
      .all()
      .map(raw => LanguageRowSchema.parse(raw).language);

    return {
      totalDocuments,
      totalConcepts,
      documentsByType,
      documentsByModule,
      conceptsByModule,
      averageReliability: aggregate.average ?? 0,
      languages,
      dateRange: { earliest: aggregate.earliest, latest: aggregate.latest }
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.debug('Knowledge store closed', this.context);
    }
  }
}

/**
 * Open a store for the duration of `work` and close it on every exit path
 */
export async function withKnowledgeRepository<T>(
  databasePath: string,
  logger: Logger,
  work: (repository: IKnowledgeRepository) => Promise<T> | T
): Promise<T> {
  const repository = new SqliteKnowledgeRepository(databasePath, logger);
  try {
    return await work(repository);
  } finally {
    try {
      repository.close();
    } catch (error) {
      logger.error(`Failed to close knowledge store: ${describeError(error)}`, 'KnowledgeStore');
    }
  }
}
