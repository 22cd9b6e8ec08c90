import fs from 'fs';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExportError } from '../../../shared/domain/errors.js';
import { Logger } from '../../../shared/infrastructure/logging.js';
import { SqliteKnowledgeRepository } from '../../../shared/infrastructure/repositories/SqliteKnowledgeRepository.js';
import { buildKnowledgeExport, csvExportPath, exportKnowledgeBase } from '../KnowledgeExporter.js';
import { seedKnowledge } from './fixtures.js';

const EXPORTED_AT = new Date('2024-06-01T08:30:00.000Z');

describe('KnowledgeExporter', () => {
  let dir: string;
  let repository: SqliteKnowledgeRepository;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scrkb-export-'));
    repository = new SqliteKnowledgeRepository(':memory:', Logger.silent());
    seedKnowledge(repository);
  });

  afterEach(() => {
    repository.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const options = { now: () => EXPORTED_AT };

  it('snapshots documents and concepts', () => {
    const snapshot = buildKnowledgeExport(repository, EXPORTED_AT);

    expect(snapshot.metadata).toEqual({
      export_date: '2024-06-01T08:30:00.000Z',
      total_documents: 3,
      total_concepts: 1,
      version: '1.0.0'
    });
    expect(snapshot.documents[2]).toEqual({
      id: 'd3',
      title: 'Equity shocks',
      doc_type: 'regulation_eu',
      scr_modules: ['equity'],
      regulatory_articles: ['169'],
      language: 'fr',
      reliability_score: 0.9,
      url: null,
      file_path: null,
      publication_date: '2015-01-17'
    });
    expect(snapshot.concepts).toEqual([
      {
        id: 1,
        concept_name: 'Choc actions',
        scr_module: 'equity',
        definition: '39% type 1',
        formula: null,
        regulatory_article: '169',
        source_document_id: 'd3',
        examples: ['type 1', 'type 2'],
        confidence_score: 0.8
      }
    ]);
  });

  it('writes indented JSON', () => {
    const file = path.join(dir, 'kb.json');

    const summary = exportKnowledgeBase(repository, file, 'JSON', options);

    expect(summary).toEqual({ format: 'json', files: [file], totalDocuments: 3, totalConcepts: 1 });
    const written = fs.readFileSync(file, 'utf-8');
    expect(written.split('\n')[1]).toBe('  "metadata": {');
    expect(JSON.parse(written)).toEqual(buildKnowledgeExport(repository, EXPORTED_AT));
  });

  it('writes YAML with the same content', () => {
    const file = path.join(dir, 'nested', 'kb.yaml');

    exportKnowledgeBase(repository, file, 'yaml', options);

    expect(parseYaml(fs.readFileSync(file, 'utf-8'))).toEqual(buildKnowledgeExport(repository, EXPORTED_AT));
  });

  it('writes two CSV files beside the requested path', () => {
    const file = path.join(dir, 'kb.csv');

    const summary = exportKnowledgeBase(repository, file, 'csv', options);

    const documentsFile = path.join(dir, 'kb.documents.csv');
    const conceptsFile = path.join(dir, 'kb.concepts.csv');
    expect(summary.files).toEqual([documentsFile, conceptsFile]);
    expect(fs.readFileSync(documentsFile, 'utf-8').trimEnd().split('\n')).toEqual([
      'id,title,doc_type,scr_modules,regulatory_articles,language,reliability_score,url,file_path,publication_date',
      'd1,Spread risk guidelines,eiopa_guidelines,spread,176,fr,0.9,,,',
      'd2,Annual report,industry_paper,spread; equity,,fr,0.7,,,',
      'd3,Equity shocks,regulation_eu,equity,169,fr,0.9,,,2015-01-17'
    ]);
    expect(fs.readFileSync(conceptsFile, 'utf-8').trimEnd().split('\n')).toEqual([
      'id,concept_name,scr_module,definition,formula,regulatory_article,source_document_id,examples,confidence_score',
      '1,Choc actions,equity,39% type 1,,169,d3,type 1; type 2,0.8'
    ]);
  });

  it('derives CSV paths from the requested name', () => {
    expect(csvExportPath(path.join('out', 'kb.csv'), 'concepts')).toBe(path.join('out', 'kb.concepts.csv'));
    expect(csvExportPath('kb', 'documents')).toBe('kb.documents.csv');
  });

  it('rejects an unknown format', () => {
    expect(() => exportKnowledgeBase(repository, path.join(dir, 'kb.xml'), 'xml', options)).toThrow(
      "Export error: unsupported format 'xml'."
    );
  });

  it('wraps write failures', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, '');

    expect(() => exportKnowledgeBase(repository, path.join(blocker, 'kb.json'), 'json', options)).toThrow(ExportError);
  });
});
