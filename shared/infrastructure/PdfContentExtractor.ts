/**
 * PDF content extraction
 *
 * Reads at most `maxPages` pages of a local PDF. A page that fails to
 * render is skipped with a warning; the document still succeeds when any
 * other page yields text. Tables are looked for on the first pages only.
 */

import fs from 'fs';
import path from 'path';
import { createRequire } from 'module';
import { SourceNotFoundError, UnsupportedSourceError } from '../domain/errors.js';
import {
  ContentExtractor,
  ExtractedContent,
  ExtractedMetadata,
  ExtractedTable,
  SourceRef,
  countWords
} from './ContentExtractor.js';
import { Logger } from './logging.js';

/**
 * Text items of one rendered page, as pdf.js reports them
 */
export interface PdfTextItem {
  str: string;
  /** Text matrix; [4] is x and [5] is y */
  transform: number[];
  width?: number;
}

export interface PdfTextContent {
  items: PdfTextItem[];
}

export interface PdfPage {
  pageNumber?: number;
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<PdfTextContent>;
}

export interface PdfReadOptions {
  /** Maximum pages rendered; 0 renders every page */
  max: number;
  /** Called once per rendered page, in page order */
  pagerender: (page: PdfPage) => Promise<string>;
}

export interface PdfReadResult {
  numpages: number;
  numrender: number;
  info: Record<string, unknown> | null;
  text: string;
}

/**
 * Reads a PDF buffer; the default implementation is pdf-parse
 */
export type PdfReader = (data: Buffer, options: PdfReadOptions) => Promise<PdfReadResult>;

const requireCjs = createRequire(import.meta.url);

/**
 * pdf-parse, loaded through its library entry point: the package root runs
 * a self-test when it has no parent module, which is the case under ESM
 */
export const pdfParseReader: PdfReader = (data, options) => {
  const pdfParse: PdfReader = requireCjs('pdf-parse/lib/pdf-parse.js');
  return pdfParse(data, options);
};

export interface PdfExtractionOptions {
  /** Hard cap on pages read */
  maxPages?: number;

  /** Pages searched for tables, from the first */
  tablePages?: number;
}

/** Horizontal gap, in text space units, that separates two cells */
const CELL_GAP = 12;

/**
 * Join the text items of a page, starting a new line whenever the
 * vertical position changes
 */
export function renderPageText(content: PdfTextContent): string {
  let lastY: number | undefined;
  let text = '';
  for (const item of content.items) {
    const y = item.transform[5];
    if (lastY === undefined || lastY === y) {
      text += item.str;
    } else {
      text += '\n' + item.str;
    }
    lastY = y;
  }
  return text;
}

function splitCells(row: PdfTextItem[]): string[] {
  const cells: string[] = [];
  let current = '';
  let lastEnd: number | undefined;

  for (const item of [...row].sort((a, b) => (a.transform[4] ?? 0) - (b.transform[4] ?? 0))) {
    if (!item.str.trim()) {
      current += ' ';
      continue;
    }
    const x = item.transform[4] ?? 0;
    if (lastEnd !== undefined && x - lastEnd > CELL_GAP) {
      cells.push(current);
      current = '';
    }
    current += item.str;
    lastEnd = item.width === undefined ? undefined : x + item.width;
  }
  cells.push(current);

  return cells.map(cell => cell.replace(/\s+/g, ' ').trim()).filter(Boolean);
}

/**
 * Tables of one page: runs of at least two consecutive lines that each
 * split into two or more cells. Items without a width never split.
 */
export function extractPageTables(content: PdfTextContent): string[][][] {
  const lines: PdfTextItem[][] = [];
  let lastY: number | undefined;
  for (const item of content.items) {
    const y = item.transform[5];
    const line = lines[lines.length - 1];
    if (line !== undefined && y === lastY) {
      line.push(item);
    } else {
      lines.push([item]);
    }
    lastY = y;
  }

  const tables: string[][][] = [];
  let run: string[][] = [];
  const closeRun = () => {
    if (run.length >= 2) {
      tables.push(run);
    }
    run = [];
  };

  for (const line of lines) {
    const cells = splitCells(line);
    if (cells.length >= 2) {
      run.push(cells);
    } else {
      closeRun();
    }
  }
  closeRun();

  return tables;
}

function infoString(info: Record<string, unknown> | null, key: string): string | undefined {
  const value = info?.[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export class PdfContentExtractor implements ContentExtractor {
  readonly name = 'PdfContentExtractor';
  private readonly maxPages: number;
  private readonly tablePages: number;

  constructor(
    private readonly logger: Logger,
    options: PdfExtractionOptions = {},
    private readonly reader: PdfReader = pdfParseReader
  ) {
    this.maxPages = options.maxPages ?? 200;
    this.tablePages = options.tablePages ?? 10;
  }

  async extract(source: SourceRef): Promise<ExtractedContent> {
    const context = this.name;

    if (source.origin !== 'file' || source.format !== 'pdf') {
      throw new UnsupportedSourceError(source.origin === 'url' ? source.url : source.path, {
        extractor: this.name
      });
    }

    const filePath = source.path;
    if (!fs.existsSync(filePath)) {
      throw new SourceNotFoundError(filePath);
    }

    const data = await fs.promises.readFile(filePath);
    const warnings: string[] = [];
    const pageTexts: string[] = [];
    const tables: ExtractedTable[] = [];
    let pageCursor = 0;

    const pagerender = async (page: PdfPage): Promise<string> => {
      pageCursor += 1;
      const pageNumber = page.pageNumber ?? pageCursor;
      try {
        const content = await page.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });
        const text = renderPageText(content);
        if (text.trim()) {
          pageTexts.push(text);
        }
        if (pageNumber <= this.tablePages) {
          for (const rows of extractPageTables(content)) {
            tables.push({ index: pageNumber, rows });
          }
        }
        return text;
      } catch (error) {
        const message = `Page ${pageNumber} could not be read: ${error instanceof Error ? error.message : String(error)}`;
        warnings.push(message);
        this.logger.warn(message, context, { file: filePath });
        return '';
      }
    };

    const result = await this.reader(data, { max: this.maxPages, pagerender });

    const pagesProcessed = Math.min(result.numpages, this.maxPages);
    if (result.numpages > this.maxPages) {
      const message = `Large document (${result.numpages} pages), only the first ${this.maxPages} were read`;
      warnings.push(message);
      this.logger.warn(message, context, { file: filePath });
    }

    const textContent = pageTexts.join('\n');
    const metadata: ExtractedMetadata = {
      title: infoString(result.info, 'Title') ?? '',
      author: infoString(result.info, 'Author'),
      subject: infoString(result.info, 'Subject'),
      creator: infoString(result.info, 'Creator'),
      creationDate: infoString(result.info, 'CreationDate')
    };
    const wordCount = countWords(textContent);
    const stats = await fs.promises.stat(filePath);

    this.logger.info(`PDF processed: ${path.basename(filePath)} (${pagesProcessed} pages, ${wordCount} words)`, context);

    return {
      textContent,
      metadata,
      statistics: {
        pageCount: result.numpages,
        pagesProcessed,
        wordCount,
        charCount: textContent.length,
        tableCount: tables.length
      },
      auxiliary: { tables, headings: [], links: [] },
      warnings,
      fileInfo: {
        name: path.basename(filePath),
        sizeMb: stats.size / (1024 * 1024),
        extension: path.extname(filePath)
      }
    };
  }
}
