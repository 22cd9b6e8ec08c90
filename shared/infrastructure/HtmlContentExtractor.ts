/**
 * HTML content extraction
 *
 * Reads a local HTML file or fetches a web page, strips non-content markup
 * and returns the remaining text one block per line, along with tables,
 * headings and a bounded list of links.
 */

import { isUtf8 } from 'buffer';
import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { JSDOM } from 'jsdom';
import { SourceNotFoundError } from '../domain/errors.js';
import {
  ContentExtractor,
  ExtractedContent,
  ExtractedHeading,
  ExtractedLink,
  ExtractedMetadata,
  ExtractedTable,
  FileInfo,
  SourceRef,
  countWords
} from './ContentExtractor.js';
import { IHttpClient } from './HttpClient.js';
import { Logger } from './logging.js';

export interface HtmlExtractionOptions {
  /** Maximum number of links kept */
  maxLinks?: number;

  /** Selectors removed before text extraction */
  ignoreSelectors?: string[];
}

const defaultOptions: Required<HtmlExtractionOptions> = {
  maxLinks: 50,
  ignoreSelectors: ['script', 'style', 'nav', 'footer', 'header']
};

const SHOW_TEXT = 0x4;
const CHARSET_PARAMETER = /charset=["']?([^;"'\s]+)/i;
const MIN_LINK_TEXT = 4;
const MAX_LINK_TEXT = 100;

export class HtmlContentExtractor implements ContentExtractor {
  readonly name = 'HtmlContentExtractor';
  private readonly options: Required<HtmlExtractionOptions>;

  constructor(
    private readonly httpClient: IHttpClient,
    private readonly logger: Logger,
    options: HtmlExtractionOptions = {}
  ) {
    this.options = { ...defaultOptions, ...options };
  }

  async extract(source: SourceRef): Promise<ExtractedContent> {
    if (source.origin === 'url') {
      const response = await this.httpClient.get(source.url);
      return this.parse(response.body, source.url, true, response.headers['content-type']);
    }

    if (!fs.existsSync(source.path)) {
      throw new SourceNotFoundError(source.path);
    }

    const html = await fs.promises.readFile(source.path);
    const stats = await fs.promises.stat(source.path);
    const fileInfo: FileInfo = {
      name: path.basename(source.path),
      sizeMb: stats.size / (1024 * 1024),
      extension: path.extname(source.path)
    };

    return { ...this.parse(html, pathToFileURL(path.resolve(source.path)).href, false), fileInfo };
  }

  /**
   * Parse raw HTML
   * @param baseUrl URL the document is resolved against
   * @param resolveLinks Make link targets absolute (web pages only)
   * @param declaredContentType Content-Type header sent with the page, if any
   */
  parse(html: Buffer, baseUrl: string, resolveLinks: boolean, declaredContentType?: string): ExtractedContent {
    const context = this.name;
    const dom = new JSDOM(html, { url: baseUrl, contentType: htmlContentType(html, declaredContentType) });
    const document = dom.window.document;

    const metadata = extractMetadata(document);

    if (this.options.ignoreSelectors.length > 0) {
      for (const element of Array.from(document.querySelectorAll(this.options.ignoreSelectors.join(', ')))) {
        element.remove();
      }
    }

    const textContent = extractTextLines(document).join('\n');
    const allLinks = extractLinks(document, resolveLinks);
    const links = allLinks.slice(0, this.options.maxLinks);
    const tables = extractTables(document);
    const headings = extractHeadings(document);
    const wordCount = countWords(textContent);

    this.logger.info(`HTML processed: ${metadata.title.slice(0, 50)} (${wordCount} words)`, context);

    return {
      textContent,
      metadata,
      statistics: {
        wordCount,
        charCount: textContent.length,
        linkCount: allLinks.length,
        tableCount: tables.length,
        headingCount: headings.length
      },
      auxiliary: { tables, headings, links },
      warnings: []
    };
  }
}

/**
 * Content type handed to jsdom for decoding.
 * A charset from the header wins; otherwise valid UTF-8 is taken as such and
 * anything else is left to the page's own meta charset (windows-1252 if none).
 */
export function htmlContentType(body: Buffer, declared?: string): string {
  const charset = declared?.match(CHARSET_PARAMETER)?.[1];
  if (charset) {
    return `text/html; charset=${charset}`;
  }
  return isUtf8(body) ? 'text/html; charset=utf-8' : 'text/html';
}

function metaContent(document: Document, name: string): string | undefined {
  const value = document.querySelector(`meta[name="${name}"]`)?.getAttribute('content')?.trim();
  return value || undefined;
}

/**
 * Extract metadata from a document
 */
function extractMetadata(document: Document): ExtractedMetadata {
  const title = document.querySelector('title')?.textContent?.trim() ?? '';
  const keywords = metaContent(document, 'keywords')
    ?.split(',')
    .map(keyword => keyword.trim())
    .filter(Boolean);
  const language = document.documentElement.getAttribute('lang')?.trim();

  return {
    title,
    description: metaContent(document, 'description'),
    keywords: keywords && keywords.length > 0 ? keywords : undefined,
    author: metaContent(document, 'author'),
    language: language || undefined
  };
}

/**
 * Every non-blank text node, trimmed, in document order
 */
function extractTextLines(document: Document): string[] {
  const lines: string[] = [];
  const walker = document.createTreeWalker(document.documentElement, SHOW_TEXT);
  while (walker.nextNode()) {
    const text = walker.currentNode.textContent?.trim();
    if (text) {
      lines.push(text);
    }
  }
  return lines;
}

function cellText(element: Element): string {
  return (element.textContent ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Extract links with meaningful text
 */
function extractLinks(document: Document, resolve: boolean): ExtractedLink[] {
  const links: ExtractedLink[] = [];

  for (const element of Array.from(document.querySelectorAll('a[href]'))) {
    const href = element.getAttribute('href');
    const text = cellText(element);
    if (!href || text.length < MIN_LINK_TEXT) continue;

    let url = href;
    if (resolve) {
      try {
        url = new URL(href, document.URL).href;
      } catch {
        continue; // unresolvable href
      }
    }

    links.push({ text: text.slice(0, MAX_LINK_TEXT), url });
  }

  return links;
}

function extractTables(document: Document): ExtractedTable[] {
  const tables: ExtractedTable[] = [];

  Array.from(document.querySelectorAll('table')).forEach((table, index) => {
    const rows: string[][] = [];
    for (const row of Array.from(table.querySelectorAll('tr'))) {
      const cells = Array.from(row.querySelectorAll('td, th')).map(cellText);
      if (cells.length > 0) {
        rows.push(cells);
      }
    }
    if (rows.length > 0) {
      tables.push({ index, rows });
    }
  });

  return tables;
}

/**
 * Extract headings from a document
 */
function extractHeadings(document: Document): ExtractedHeading[] {
  const headings: ExtractedHeading[] = [];

  for (const element of Array.from(document.querySelectorAll('h1, h2, h3, h4, h5, h6'))) {
    const text = cellText(element);
    if (text) {
      headings.push({ level: parseInt(element.tagName.substring(1), 10), text });
    }
  }

  return headings;
}
