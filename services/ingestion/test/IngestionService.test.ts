import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../../shared/domain/errors.js';
import { ScrConcept } from '../../../shared/domain/models/ScrConcept.js';
import { RegulatoryDocument } from '../../../shared/domain/models/Document.js';
import { IKnowledgeRepository } from '../../../shared/domain/repositories/KnowledgeRepository.js';
import {
  ContentExtractor,
  ExtractedContent,
  SourceRef,
  countWords
} from '../../../shared/infrastructure/ContentExtractor.js';
import { Logger } from '../../../shared/infrastructure/logging.js';
import { SqliteKnowledgeRepository } from '../../../shared/infrastructure/repositories/SqliteKnowledgeRepository.js';
import { IngestionService, buildDocumentMetadata } from '../IngestionService.js';
import { computeContentHash } from '../SignalExtractor.js';

const TEXT = [
  'Règlement délégué (UE) 2015/35 de la Commission',
  'Article 176',
  'Le facteur de spread: dépend de la qualité du titre.'
].join('\n');

function extracted(text: string, extra: Partial<ExtractedContent> = {}): ExtractedContent {
  return {
    textContent: text,
    metadata: { title: '' },
    statistics: { wordCount: countWords(text), charCount: text.length, tableCount: 0 },
    auxiliary: { tables: [], headings: [], links: [] },
    warnings: [],
    ...extra
  };
}

function fakeExtractor(name: string, content: ExtractedContent) {
  return { name, extract: vi.fn(async (_source: SourceRef) => content) } satisfies ContentExtractor;
}

describe('IngestionService', () => {
  let dir: string;
  let repository: SqliteKnowledgeRepository;
  let clock: Date;

  const T1 = new Date('2024-05-01T10:00:00.000Z');
  const T2 = new Date('2024-05-02T10:00:00.000Z');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scrkb-ingest-'));
    repository = new SqliteKnowledgeRepository(':memory:', Logger.silent());
    clock = T1;
  });

  afterEach(() => {
    repository.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function placeFile(name: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, 'placeholder bytes');
    return file;
  }

  function service(content: ExtractedContent = extracted(TEXT), options: { maxFileSizeMb?: number } = {}) {
    const pdf = fakeExtractor('pdf', content);
    const html = fakeExtractor('html', content);
    const ingestion = new IngestionService({
      repository,
      extractors: { pdf, html },
      logger: Logger.silent(),
      now: () => clock,
      ...options
    });
    return { ingestion, pdf, html };
  }

  it('stores a local document with its signals and concepts', async () => {
    const file = placeFile('reglement.pdf');
    const { ingestion, pdf } = service();

    const result = await ingestion.ingest({ locator: file, docType: 'regulation_eu', modules: ['spread', 'equity'] });

    const id = `regulation_eu_reglement_${computeContentHash(TEXT).slice(0, 8)}`;
    expect(pdf.extract).toHaveBeenCalledWith({ origin: 'file', format: 'pdf', path: file });
    expect(result).toMatchObject({ success: true, documentId: id, conceptsStored: 2, warnings: [] });

    const document = repository.findDocumentById(id);
    expect(document).toMatchObject({
      title: 'Règlement délégué (UE) 2015/35 de la Commission',
      docType: 'regulation_eu',
      url: null,
      filePath: file,
      regulatoryArticles: ['176', '2015/35'],
      scrModules: ['spread', 'equity'],
      language: 'fr',
      reliabilityScore: 0.9,
      lastUpdated: T1
    });
    expect(document?.metadata.scr_keywords).toEqual(['spread']);
    expect(repository.findConceptsByModule('equity').map(concept => concept.conceptName)).toEqual(['facteur de spread']);
  });

  it('stores a web page under its URL', async () => {
    const { ingestion, html } = service(extracted(TEXT, { metadata: { title: 'EIOPA Guidelines on spread risk' } }));

    const stored = await ingestion.addDocument('https://www.eiopa.europa.eu/gl/spread', 'eiopa_guidelines', ['spread']);

    expect(stored).toBe(true);
    expect(html.extract).toHaveBeenCalledWith({
      origin: 'url',
      format: 'html',
      url: 'https://www.eiopa.europa.eu/gl/spread'
    });
    const [document] = repository.findDocumentsByModule('spread');
    expect(document?.id).toBe(`eiopa_guidelines_eiopa_europa_eu_${computeContentHash(TEXT).slice(0, 8)}`);
    expect(document?.title).toBe('EIOPA Guidelines on spread risk');
    expect(document?.url).toBe('https://www.eiopa.europa.eu/gl/spread');
    expect(document?.filePath).toBeNull();
  });

  it('applies caller overrides over the heuristics', async () => {
    const file = placeFile('note.pdf');
    const { ingestion } = service();

    const result = await ingestion.ingest({
      locator: file,
      docType: 'internal_doc',
      modules: ['spread'],
      overrides: {
        title: 'Note interne',
        url: 'https://example.org/note',
        reliabilityScore: 0.42,
        language: 'en',
        publicationDate: '2024-03-31'
      }
    });

    const document = repository.findDocumentById(result.documentId ?? '');
    expect(document).toMatchObject({
      title: 'Note interne',
      url: 'https://example.org/note',
      filePath: file,
      reliabilityScore: 0.42,
      language: 'en',
      publicationDate: '2024-03-31'
    });
  });

  it('replaces the record when the same document is ingested again', async () => {
    const file = placeFile('reglement.pdf');
    const { ingestion } = service();

    const first = await ingestion.ingest({ locator: file, docType: 'regulation_eu', modules: ['spread'] });
    clock = T2;
    const second = await ingestion.ingest({ locator: file, docType: 'regulation_eu', modules: ['spread'] });

    expect(second.documentId).toBe(first.documentId);
    const statistics = repository.getStatistics();
    expect(statistics.totalDocuments).toBe(1);
    expect(statistics.totalConcepts).toBe(2);
    expect(repository.findDocumentById(first.documentId ?? '')?.lastUpdated).toEqual(T2);
  });

  it('keeps one record per source for identical text', async () => {
    const { ingestion } = service();

    await ingestion.ingest({ locator: placeFile('a.pdf'), docType: 'directive', modules: ['spread'] });
    await ingestion.ingest({ locator: placeFile('b.pdf'), docType: 'directive', modules: ['spread'] });

    expect(repository.getStatistics().totalDocuments).toBe(2);
  });

  it('fails a missing file before extraction', async () => {
    const { ingestion, pdf } = service();
    const missing = path.join(dir, 'missing.pdf');

    const result = await ingestion.ingest({ locator: missing, docType: 'directive', modules: ['spread'] });

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe(`Source '${missing}' not found.`);
    expect(pdf.extract).not.toHaveBeenCalled();
    expect(repository.getStatistics().totalDocuments).toBe(0);
  });

  it('fails an unsupported locator', async () => {
    const { ingestion } = service();

    expect(await ingestion.addDocument('notes.docx', 'directive', ['spread'])).toBe(false);
  });

  it('fails when nothing was extracted', async () => {
    const { ingestion } = service(extracted('  \n '));
    const file = placeFile('empty.pdf');

    const result = await ingestion.ingest({ locator: file, docType: 'directive', modules: ['spread'] });

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe(`No text content extracted from ${file}`);
  });

  it('warns about large files and records the warning', async () => {
    const file = placeFile('big.pdf');
    const { ingestion } = service(extracted(TEXT, { warnings: ['Page 2 could not be read: bad xref'] }), {
      maxFileSizeMb: 0.000001
    });

    const result = await ingestion.ingest({ locator: file, docType: 'directive', modules: ['spread'] });

    expect(result.warnings).toEqual([
      'Large file (0.0MB), extraction may be partial',
      'Page 2 could not be read: bad xref'
    ]);
    expect(repository.findDocumentById(result.documentId ?? '')?.metadata.warnings).toEqual(result.warnings);
  });

  it('lets an invalid override escape as ValidationError', async () => {
    const { ingestion } = service();

    await expect(
      ingestion.ingest({
        locator: placeFile('a.pdf'),
        docType: 'directive',
        modules: ['spread'],
        overrides: { reliabilityScore: 1.5 }
      })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports a rejected write as a failure', async () => {
    const rejecting: IKnowledgeRepository = {
      saveDocument: (_document: RegulatoryDocument) => false,
      saveConcept: (_concept: ScrConcept) => null,
      findDocumentById: () => null,
      findDocumentsByModule: () => [],
      findConceptsByModule: () => [],
      getStatistics: () => repository.getStatistics(),
      close: () => undefined
    };
    const content = extracted(TEXT);
    const ingestion = new IngestionService({
      repository: rejecting,
      extractors: { pdf: fakeExtractor('pdf', content), html: fakeExtractor('html', content) },
      logger: Logger.silent()
    });

    const result = await ingestion.ingest({ locator: placeFile('a.pdf'), docType: 'directive', modules: ['spread'] });

    expect(result.success).toBe(false);
    expect(result.errorMessage).toMatch(/^Store write failed: document directive_a_[0-9a-f]{8} was not stored\.$/);
  });

  it('keeps the document when every concept write fails', async () => {
    const conceptRejecting: IKnowledgeRepository = {
      saveDocument: document => repository.saveDocument(document),
      saveConcept: (_concept: ScrConcept) => null,
      findDocumentById: id => repository.findDocumentById(id),
      findDocumentsByModule: (module, limit) => repository.findDocumentsByModule(module, limit),
      findConceptsByModule: module => repository.findConceptsByModule(module),
      getStatistics: () => repository.getStatistics(),
      close: () => undefined
    };
    const content = extracted(TEXT);
    const ingestion = new IngestionService({
      repository: conceptRejecting,
      extractors: { pdf: fakeExtractor('pdf', content), html: fakeExtractor('html', content) },
      logger: Logger.silent()
    });

    const result = await ingestion.ingest({
      locator: placeFile('reglement.pdf'),
      docType: 'regulation_eu',
      modules: ['spread', 'equity']
    });

    const id = `regulation_eu_reglement_${computeContentHash(TEXT).slice(0, 8)}`;
    expect(result).toMatchObject({ success: true, documentId: id, conceptsStored: 0 });
    expect(repository.findDocumentById(id)?.scrModules).toEqual(['spread', 'equity']);
    expect(repository.getStatistics().totalConcepts).toBe(0);
  });

  it('continues a batch past failed entries', async () => {
    const { ingestion } = service();
    const good = placeFile('a.pdf');
    const missing = path.join(dir, 'missing.pdf');

    const batch = await ingestion.ingestBatch([
      { locator: good, docType: 'directive', modules: ['spread'] },
      { locator: missing, docType: 'directive', modules: ['spread'] },
      { locator: good, docType: 'directive', modules: ['spread'], overrides: { reliabilityScore: 1.5 } }
    ]);

    expect(batch.total).toBe(3);
    expect(batch.succeeded).toBe(1);
    expect(batch.failed).toBe(2);
    expect(batch.results.map(result => result.success)).toEqual([true, false, false]);
    expect(batch.results[2]?.errorMessage).toBe('Validation failed: reliabilityScore must be between 0 and 1');
  });
});

describe('buildDocumentMetadata', () => {
  it('flattens statistics, source metadata and file information', () => {
    const content = extracted('Le SCR spread', {
      metadata: {
        title: 'x',
        author: 'Test Author',
        keywords: ['SCR'],
        creator: 'Test Writer',
        creationDate: 'D:20150117120000'
      },
      statistics: { wordCount: 3, charCount: 13, pageCount: 2, pagesProcessed: 2, tableCount: 0 },
      fileInfo: { name: 'a.pdf', sizeMb: 1.23456, extension: '.pdf' }
    });

    expect(buildDocumentMetadata(content, [], new Date('2024-05-01T10:00:00.000Z'))).toEqual({
      word_count: 3,
      char_count: 13,
      page_count: 2,
      pages_processed: 2,
      table_count: 0,
      reading_time_minutes: 1,
      scr_keywords: ['SCR', 'spread'],
      author: 'Test Author',
      creator: 'Test Writer',
      creation_date: 'D:20150117120000',
      keywords: ['SCR'],
      file_info: { name: 'a.pdf', size_mb: 1.23, extension: '.pdf' },
      processed_at: '2024-05-01T10:00:00.000Z'
    });
  });
});
