/**
 * Content extraction contract
 *
 * A ContentExtractor turns one source (local file or web page) into
 * normalized text plus structural metadata. Which extractor handles a
 * locator is decided by `resolveSource` from the locator string alone,
 * before any I/O.
 */

import path from 'path';
import { UnsupportedSourceError } from '../domain/errors.js';

/**
 * Where a document comes from and how it is encoded
 */
export type SourceRef =
  | { origin: 'file'; format: 'pdf'; path: string }
  | { origin: 'file'; format: 'html'; path: string }
  | { origin: 'url'; format: 'html'; url: string };

/**
 * Metadata extracted from a document
 */
export interface ExtractedMetadata {
  /** Document title, empty when the source carries none */
  title: string;

  description?: string;

  keywords?: string[];

  /** Language declared by the source itself */
  language?: string;

  author?: string;

  subject?: string;

  creator?: string;

  creationDate?: string;
}

export interface ExtractionStatistics {
  wordCount: number;
  charCount: number;
  pageCount?: number;
  pagesProcessed?: number;
  linkCount?: number;
  tableCount: number;
  headingCount?: number;
}

export interface ExtractedTable {
  /** Page number (PDF) or table index (HTML) */
  index: number;
  rows: string[][];
}

export interface ExtractedHeading {
  /** Heading level (1-6) */
  level: number;
  text: string;
}

export interface ExtractedLink {
  text: string;
  url: string;
}

export interface FileInfo {
  name: string;
  sizeMb: number;
  extension: string;
}

/**
 * Result of content extraction
 */
export interface ExtractedContent {
  /** Normalized plain text, one block per line */
  textContent: string;

  metadata: ExtractedMetadata;

  statistics: ExtractionStatistics;

  auxiliary: {
    tables: ExtractedTable[];
    headings: ExtractedHeading[];
    links: ExtractedLink[];
  };

  /** Non-fatal problems met during extraction */
  warnings: string[];

  /** Present for local files */
  fileInfo?: FileInfo;
}

/**
 * Interface implemented by the PDF and HTML extractors
 */
export interface ContentExtractor {
  readonly name: string;

  /**
   * Extract the content of a source.
   * Throws SourceNotFoundError for a missing file, FetchFailedError when a
   * page cannot be fetched.
   */
  extract(source: SourceRef): Promise<ExtractedContent>;
}

export function isWebLocator(locator: string): boolean {
  return locator.startsWith('http://') || locator.startsWith('https://');
}

/**
 * Map a locator to its source shape; every locator maps to exactly one
 * shape or throws UnsupportedSourceError
 */
export function resolveSource(locator: string): SourceRef {
  if (isWebLocator(locator)) {
    return { origin: 'url', format: 'html', url: locator };
  }

  const extension = path.extname(locator).toLowerCase();
  if (extension === '.pdf') {
    return { origin: 'file', format: 'pdf', path: locator };
  }
  if (extension === '.html' || extension === '.htm') {
    return { origin: 'file', format: 'html', path: locator };
  }

  throw new UnsupportedSourceError(locator, { extension: extension || null });
}

export function sourceLocator(source: SourceRef): string {
  return source.origin === 'url' ? source.url : source.path;
}

/**
 * Count whitespace-separated words
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * The pair of extractors a pipeline routes between
 */
export interface ContentExtractors {
  pdf: ContentExtractor;
  html: ContentExtractor;
}

export function extractorFor(source: SourceRef, extractors: ContentExtractors): ContentExtractor {
  switch (source.format) {
    case 'pdf':
      return extractors.pdf;
    case 'html':
      return extractors.html;
  }
}
