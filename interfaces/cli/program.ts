/**
 * Command-line program for the SCR knowledge base
 *
 * Every command validates its arguments before doing any work, opens the
 * knowledge store once and releases it on every exit path.
 */

import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { describeError } from '../../shared/domain/errors.js';
import { IKnowledgeRepository, KnowledgeStatistics } from '../../shared/domain/repositories/KnowledgeRepository.js';
import { RegulatoryDocument } from '../../shared/domain/models/Document.js';
import { ContentExtractors } from '../../shared/infrastructure/ContentExtractor.js';
import { ScrKbConfig, ensureDirectories } from '../../shared/infrastructure/config.js';
import { Logger } from '../../shared/infrastructure/logging.js';
import { IngestionService } from '../../services/ingestion/IngestionService.js';
import {
  DocumentTypeSchema,
  IngestionRequestSchema,
  ScrModuleSchema,
  parseInput,
  readBatchFile,
  unsupportedValue
} from '../../services/ingestion/IngestionRequestSchema.js';
import { searchDocuments } from '../../services/knowledge/DocumentSearch.js';
import { EXPORT_FORMATS, exportKnowledgeBase } from '../../services/knowledge/KnowledgeExporter.js';
import { HealthReport, checkSystemHealth } from '../../services/knowledge/SystemHealth.js';

export const CLI_VERSION = '1.0.0';

/**
 * What the commands need from the composition root
 */
export interface CliContext {
  config: ScrKbConfig;
  logger: Logger;
  extractors: ContentExtractors;
  /** Run `work` with an open store, closing it afterwards */
  withRepository<T>(work: (repository: IKnowledgeRepository) => Promise<T> | T): Promise<T>;
  /** Standard output, one line per call */
  print(line: string): void;
  setExitCode(code: number): void;
  now?: () => Date;
  /** Free bytes on the filesystem of a directory; statfs when absent */
  freeDiskBytes?: (directory: string) => Promise<number>;
}

export const SAMPLE_BATCH_FILE = 'sample_batch.json';

const SAMPLE_BATCH = [
  {
    locator: './documents/reglement_delegue_2015_35.pdf',
    docType: 'regulation_eu',
    modules: ['spread', 'interest_rate', 'equity'],
    metadata: {
      title: 'Règlement délégué (UE) 2015/35',
      url: 'https://eur-lex.europa.eu/legal-content/FR/TXT/?uri=CELEX%3A32015R0035',
      language: 'fr',
      reliabilityScore: 1.0
    }
  },
  {
    locator: 'https://www.eiopa.europa.eu/rulebook/solvency-ii-single-rulebook/article-5796_en',
    docType: 'eiopa_guidelines',
    modules: ['spread'],
    metadata: { title: 'EIOPA Guidelines on Spread Risk', language: 'en', reliabilityScore: 0.9 }
  }
];

function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

const AddFlagsSchema = z.object({
  type: z.string(),
  modules: z.string(),
  title: z.string().optional(),
  url: z.string().optional(),
  reliability: z.string().optional(),
  language: z.string().optional(),
  date: z.string().optional()
});

/**
 * Turn the raw flags of `add` into a validated ingestion request
 */
export function parseAddArguments(locator: string, flags: unknown) {
  const raw = parseInput(AddFlagsSchema, flags);
  const metadata = Object.fromEntries(
    Object.entries({
      title: raw.title,
      url: raw.url,
      reliabilityScore: optionalNumber(raw.reliability),
      language: raw.language,
      publicationDate: raw.date
    }).filter(([, value]) => value !== undefined)
  );

  return parseInput(IngestionRequestSchema, {
    locator,
    docType: raw.type,
    modules: splitList(raw.modules),
    metadata
  });
}

const SearchFlagsSchema = z.object({
  modules: z.string().optional(),
  types: z.string().optional(),
  minReliability: z.string().optional()
});

const SearchRequestSchema = z.object({
  query: z.string().optional(),
  modules: z.array(ScrModuleSchema),
  docTypes: z.array(DocumentTypeSchema),
  minReliability: z.number().min(0).max(1).optional()
});

export function parseSearchArguments(query: string | undefined, flags: unknown) {
  const raw = parseInput(SearchFlagsSchema, flags);
  return parseInput(SearchRequestSchema, {
    query,
    modules: splitList(raw.modules),
    docTypes: splitList(raw.types),
    minReliability: optionalNumber(raw.minReliability)
  });
}

const ExportFlagsSchema = z.object({
  format: z.enum(EXPORT_FORMATS, { errorMap: unsupportedValue('export format') })
});

export function parseExportArguments(flags: unknown) {
  return parseInput(ExportFlagsSchema, flags);
}

const HealthFlagsSchema = z.object({ fix: z.boolean().optional() });

const InitFlagsSchema = z.object({ sampleBatch: z.boolean().optional() });

function formatCounts(counts: Partial<Record<string, number>>): string[] {
  return Object.entries(counts)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, count]) => `  ${key}: ${count ?? 0}`);
}

/**
 * Human-readable statistics report
 */
export function formatStatistics(statistics: KnowledgeStatistics): string[] {
  const lines = [
    `Documents: ${statistics.totalDocuments}`,
    `Concepts: ${statistics.totalConcepts}`,
    `Average reliability: ${statistics.averageReliability.toFixed(2)}`,
    `Languages: ${statistics.languages.join(', ') || '-'}`,
    `Publication dates: ${statistics.dateRange.earliest ?? '-'} .. ${statistics.dateRange.latest ?? '-'}`
  ];

  lines.push('Documents by type:', ...formatCounts(statistics.documentsByType));
  lines.push('Documents by module:', ...formatCounts(statistics.documentsByModule));
  lines.push('Concepts by module:', ...formatCounts(statistics.conceptsByModule));
  return lines;
}

/**
 * Human-readable health report
 */
export function formatHealthReport(report: HealthReport): string[] {
  return [
    `Status: ${report.status}`,
    ...Object.entries(report.checks).map(([name, outcome]) => `  ${name}: ${outcome}`),
    ...report.warnings.map(warning => `Warning: ${warning}`),
    ...report.errors.map(error => `Error: ${error}`)
  ];
}

function formatDocument(document: RegulatoryDocument): string {
  const articles = document.regulatoryArticles.length > 0 ? ` [${document.regulatoryArticles.join(', ')}]` : '';
  return `${document.reliabilityScore.toFixed(2)}  ${document.id}  ${document.title}${articles}`;
}

function ingestionService(context: CliContext, repository: IKnowledgeRepository): IngestionService {
  return new IngestionService({
    repository,
    extractors: context.extractors,
    logger: context.logger,
    maxFileSizeMb: context.config.maxFileSizeMb,
    now: context.now
  });
}

/**
 * Build the command tree bound to a context
 */
export function buildProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('scrkb')
    .description('Regulatory knowledge base for SCR prompt generation')
    .version(CLI_VERSION);

  program
    .command('add')
    .description('Ingest one document (PDF, HTML file or web page)')
    .argument('<locator>', 'file path or http(s) URL')
    .requiredOption('-t, --type <docType>', 'document type')
    .requiredOption('-m, --modules <modules>', 'comma-separated SCR modules')
    .option('--title <title>', 'title, instead of the detected one')
    .option('--url <url>', 'reference URL for a local file')
    .option('--reliability <score>', 'reliability score in [0, 1]')
    .option('--language <code>', 'language code')
    .option('--date <yyyy-mm-dd>', 'publication date')
    .action(async (locator: string, flags: unknown) => {
      const request = parseAddArguments(locator, flags);

      const result = await context.withRepository(repository =>
        ingestionService(context, repository).ingest({
          locator: request.locator,
          docType: request.docType,
          modules: request.modules,
          overrides: request.metadata
        })
      );

      for (const warning of result.warnings) {
        context.print(`! ${warning}`);
      }
      if (result.success) {
        context.print(`Stored ${result.documentId ?? request.locator} (${result.conceptsStored} concepts)`);
      } else {
        context.print(`Failed ${request.locator}: ${result.errorMessage ?? 'unknown error'}`);
        context.setExitCode(1);
      }
    });

  program
    .command('batch')
    .description('Ingest the documents listed in a JSON batch file, in order')
    .argument('<file>', 'JSON array of { locator, docType, modules, metadata }')
    .action(async (file: string) => {
      const entries = readBatchFile(file);

      const batch = await context.withRepository(repository =>
        ingestionService(context, repository).ingestBatch(
          entries.map(entry => ({
            locator: entry.locator,
            docType: entry.docType,
            modules: entry.modules,
            overrides: entry.metadata
          }))
        )
      );

      for (const item of batch.results) {
        context.print(item.success ? `ok      ${item.locator}` : `failed  ${item.locator}: ${item.errorMessage ?? 'unknown error'}`);
      }
      context.print(`${batch.succeeded}/${batch.total} documents stored, ${batch.failed} failed`);
      if (batch.failed > 0) {
        context.setExitCode(1);
      }
    });

  program
    .command('stats')
    .description('Show knowledge base statistics')
    .action(async () => {
      const statistics = await context.withRepository(repository => repository.getStatistics());
      formatStatistics(statistics).forEach(line => context.print(line));
    });

  const runHealthCheck = () =>
    checkSystemHealth({
      dataDir: context.config.dataDir,
      readStatistics: () => context.withRepository(repository => repository.getStatistics()),
      freeDiskBytes: context.freeDiskBytes,
      logger: context.logger
    });

  program
    .command('health')
    .description('Check the store, the data directory and free disk space')
    .option('--fix', 'create missing directories and check again')
    .action(async (flags: unknown) => {
      const { fix } = parseInput(HealthFlagsSchema, flags);
      let report = await runHealthCheck();
      formatHealthReport(report).forEach(line => context.print(line));

      if (fix && report.status !== 'healthy') {
        ensureDirectories(context.config);
        report = await runHealthCheck();
        context.print(`Status after fix: ${report.status}`);
      }

      if (report.status === 'unhealthy') {
        context.setExitCode(1);
      }
    });

  program
    .command('init')
    .description('Create the data directories and open the store once')
    .option('--sample-batch', `write ${SAMPLE_BATCH_FILE} into the data directory`)
    .action(async (flags: unknown) => {
      const { sampleBatch } = parseInput(InitFlagsSchema, flags);
      ensureDirectories(context.config);
      context.print(`Data directory: ${context.config.dataDir}`);

      if (sampleBatch) {
        const samplePath = path.join(context.config.dataDir, SAMPLE_BATCH_FILE);
        await fs.promises.writeFile(samplePath, `${JSON.stringify(SAMPLE_BATCH, null, 2)}\n`, 'utf-8');
        context.print(`Sample batch file: ${samplePath}`);
      }

      try {
        const statistics = await context.withRepository(repository => repository.getStatistics());
        context.print(`Knowledge base ready: ${statistics.totalDocuments} documents`);
      } catch (error) {
        context.logger.logError(error, 'init');
        context.print(`Initialisation problem: ${describeError(error)}`);
        context.setExitCode(1);
      }
    });

  program
    .command('search')
    .description('Search stored documents by title or article')
    .argument('[query]', 'text to look for')
    .option('-m, --modules <modules>', 'comma-separated SCR modules')
    .option('--types <docTypes>', 'comma-separated document types')
    .option('--min-reliability <score>', 'minimum reliability score')
    .action(async (query: string | undefined, flags: unknown) => {
      const search = parseSearchArguments(query, flags);
      const documents = await context.withRepository(repository =>
        searchDocuments(repository, search, context.logger)
      );

      documents.forEach(document => context.print(formatDocument(document)));
      context.print(`${documents.length} documents found`);
    });

  program
    .command('export')
    .description('Export documents and concepts')
    .argument('<path>', 'output file')
    .option('-f, --format <format>', 'json, csv or yaml', 'json')
    .action(async (exportPath: string, flags: unknown) => {
      const { format } = parseExportArguments(flags);
      const summary = await context.withRepository(repository =>
        exportKnowledgeBase(repository, exportPath, format, { logger: context.logger, now: context.now })
      );

      context.print(
        `Exported ${summary.totalDocuments} documents and ${summary.totalConcepts} concepts to ${summary.files.join(', ')}`
      );
    });

  return program;
}
