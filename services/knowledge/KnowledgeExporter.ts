/**
 * Knowledge base export
 *
 * Flattens every stored document and concept into JSON, YAML or a pair of
 * CSV files. Read-only with respect to the store.
 */

import fs from 'fs';
import path from 'path';
import { stringify as stringifyCsv } from 'csv-stringify/sync';
import { stringify as stringifyYaml } from 'yaml';
import { ExportError } from '../../shared/domain/errors.js';
import { RegulatoryDocument } from '../../shared/domain/models/Document.js';
import { ScrConcept } from '../../shared/domain/models/ScrConcept.js';
import { SCR_MODULES } from '../../shared/domain/models/Vocabulary.js';
import { IKnowledgeRepository } from '../../shared/domain/repositories/KnowledgeRepository.js';
import { Logger } from '../../shared/infrastructure/logging.js';
import { collectDocuments } from './DocumentSearch.js';

export const EXPORT_FORMATS = ['json', 'csv', 'yaml'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

export const EXPORT_VERSION = '1.0.0';

export type ExportedDocument = {
  id: string;
  title: string;
  doc_type: string;
  scr_modules: string[];
  regulatory_articles: string[];
  language: string;
  reliability_score: number;
  url: string | null;
  file_path: string | null;
  publication_date: string | null;
};

export type ExportedConcept = {
  id: number | null;
  concept_name: string;
  scr_module: string;
  definition: string;
  formula: string | null;
  regulatory_article: string | null;
  source_document_id: string | null;
  examples: string[];
  confidence_score: number;
};

export interface KnowledgeExport {
  metadata: {
    export_date: string;
    total_documents: number;
    total_concepts: number;
    version: string;
  };
  documents: ExportedDocument[];
  concepts: ExportedConcept[];
}

export interface ExportSummary {
  format: ExportFormat;
  /** Files written, in write order */
  files: string[];
  totalDocuments: number;
  totalConcepts: number;
}

export interface ExportOptions {
  logger?: Logger;
  now?: () => Date;
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

function exportDocument(document: RegulatoryDocument): ExportedDocument {
  return {
    id: document.id,
    title: document.title,
    doc_type: document.docType,
    scr_modules: [...document.scrModules],
    regulatory_articles: [...document.regulatoryArticles],
    language: document.language,
    reliability_score: document.reliabilityScore,
    url: document.url,
    file_path: document.filePath,
    publication_date: document.publicationDate
  };
}

function exportConcept(concept: ScrConcept): ExportedConcept {
  return {
    id: concept.id,
    concept_name: concept.conceptName,
    scr_module: concept.scrModule,
    definition: concept.definition,
    formula: concept.formula,
    regulatory_article: concept.regulatoryArticle,
    source_document_id: concept.sourceDocumentId,
    examples: [...concept.examples],
    confidence_score: concept.confidenceScore
  };
}

/**
 * Snapshot of the whole store
 */
export function buildKnowledgeExport(repository: IKnowledgeRepository, exportDate: Date): KnowledgeExport {
  const documents = collectDocuments(repository).map(exportDocument);
  const concepts = SCR_MODULES.flatMap(module => repository.findConceptsByModule(module)).map(exportConcept);

  return {
    metadata: {
      export_date: exportDate.toISOString(),
      total_documents: documents.length,
      total_concepts: concepts.length,
      version: EXPORT_VERSION
    },
    documents,
    concepts
  };
}

/**
 * `<dir>/<name>.<kind>.csv` beside the requested path, without its extension
 */
export function csvExportPath(exportPath: string, kind: 'documents' | 'concepts'): string {
  const parsed = path.parse(exportPath);
  return path.join(parsed.dir, `${parsed.name}.${kind}.csv`);
}

const DOCUMENT_COLUMNS: Array<keyof ExportedDocument> = [
  'id',
  'title',
  'doc_type',
  'scr_modules',
  'regulatory_articles',
  'language',
  'reliability_score',
  'url',
  'file_path',
  'publication_date'
];

const CONCEPT_COLUMNS: Array<keyof ExportedConcept> = [
  'id',
  'concept_name',
  'scr_module',
  'definition',
  'formula',
  'regulatory_article',
  'source_document_id',
  'examples',
  'confidence_score'
];

type CsvCell = string | number | null;

function csvRecord(record: Record<string, CsvCell | string[]>): Record<string, CsvCell> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, Array.isArray(value) ? value.join('; ') : value])
  );
}

function toCsv(records: ReadonlyArray<Record<string, CsvCell | string[]>>, columns: readonly string[]): string {
  return stringifyCsv(records.map(csvRecord), { header: true, columns: [...columns] });
}

/**
 * Write the knowledge base to `exportPath`.
 * CSV produces two files next to `exportPath`. Throws ExportError for an
 * unknown format or a failed write.
 */
export function exportKnowledgeBase(
  repository: IKnowledgeRepository,
  exportPath: string,
  format: string,
  options: ExportOptions = {}
): ExportSummary {
  const normalized = format.toLowerCase();
  if (!isExportFormat(normalized)) {
    throw new ExportError(`unsupported format '${format}'`, undefined, { supported: [...EXPORT_FORMATS] });
  }

  const data = buildKnowledgeExport(repository, (options.now ?? (() => new Date()))());
  const outputs: Array<[string, string]> = [];

  switch (normalized) {
    case 'json':
      outputs.push([exportPath, JSON.stringify(data, null, 2)]);
      break;
    case 'yaml':
      outputs.push([exportPath, stringifyYaml(data)]);
      break;
    case 'csv':
      outputs.push([csvExportPath(exportPath, 'documents'), toCsv(data.documents, DOCUMENT_COLUMNS)]);
      outputs.push([csvExportPath(exportPath, 'concepts'), toCsv(data.concepts, CONCEPT_COLUMNS)]);
      break;
  }

  try {
    for (const [file, content] of outputs) {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, content, 'utf-8');
    }
  } catch (error) {
    throw new ExportError(`cannot write ${exportPath}`, error instanceof Error ? error : undefined);
  }

  const files = outputs.map(([file]) => file);
  options.logger?.info(`Export finished (${normalized}): ${files.join(', ')}`, 'KnowledgeExporter');

  return {
    format: normalized,
    files,
    totalDocuments: data.metadata.total_documents,
    totalConcepts: data.metadata.total_concepts
  };
}
