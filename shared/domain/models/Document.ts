/**
 * Regulatory document entity
 * A regulatory or informational source stored in the knowledge base
 */
import { ValidationError } from '../errors.js';
import {
  DEFAULT_LANGUAGE,
  DocumentType,
  JsonObject,
  ScrModule,
  SupportedLanguage,
  isDocumentType,
  isScrModule,
  isSupportedLanguage
} from './Vocabulary.js';

export interface RegulatoryDocument {
  /** Derived identifier: `{docType}_{sourceName}_{hash8}` */
  readonly id: string;

  readonly title: string;

  readonly docType: DocumentType;

  /** Remote location, when the document came from (or refers to) a web page */
  readonly url: string | null;

  /** Local location, when the document was read from disk */
  readonly filePath: string | null;

  /** Calendar date, `YYYY-MM-DD` */
  readonly publicationDate: string | null;

  /** Deduplicated article identifiers */
  readonly regulatoryArticles: readonly string[];

  /** Deduplicated, never empty */
  readonly scrModules: readonly ScrModule[];

  readonly language: SupportedLanguage;

  /** Heuristic trust in [0, 1] */
  readonly reliabilityScore: number;

  /** MD5 hex digest of the normalized text */
  readonly contentHash: string;

  readonly lastUpdated: Date;

  /** Extractor-supplied statistics and other open metadata */
  readonly metadata: JsonObject;
}

/**
 * Properties accepted when building a document; collections and
 * optional attributes default to empty values
 */
export interface RegulatoryDocumentProps {
  id: string;
  title: string;
  docType: DocumentType;
  url?: string | null;
  filePath?: string | null;
  publicationDate?: string | null;
  regulatoryArticles?: readonly string[];
  scrModules: readonly ScrModule[];
  language?: string;
  reliabilityScore?: number;
  contentHash?: string;
  lastUpdated?: Date;
  metadata?: JsonObject;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function unique<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}

/**
 * Build a document, enforcing its invariants.
 * Out-of-range reliability, an empty module set or a malformed date throw
 * ValidationError; an unsupported language falls back to French.
 */
export function createRegulatoryDocument(props: RegulatoryDocumentProps): RegulatoryDocument {
  const reliabilityScore = props.reliabilityScore ?? 0.8;
  if (!(reliabilityScore >= 0 && reliabilityScore <= 1)) {
    throw new ValidationError('reliabilityScore must be between 0 and 1', { reliabilityScore });
  }

  if (!props.id.trim()) {
    throw new ValidationError('document id is required');
  }

  if (!isDocumentType(props.docType)) {
    throw new ValidationError(`unsupported document type '${props.docType}'`);
  }

  const scrModules = unique(props.scrModules);
  if (scrModules.length === 0) {
    throw new ValidationError('a document must belong to at least one SCR module', { id: props.id });
  }
  for (const module of scrModules) {
    if (!isScrModule(module)) {
      throw new ValidationError(`unsupported SCR module '${module}'`);
    }
  }

  const publicationDate = props.publicationDate ?? null;
  if (publicationDate !== null && !isIsoCalendarDate(publicationDate)) {
    throw new ValidationError(`invalid publication date '${publicationDate}'`, { id: props.id });
  }

  const requestedLanguage = props.language ?? DEFAULT_LANGUAGE;
  const language = isSupportedLanguage(requestedLanguage) ? requestedLanguage : DEFAULT_LANGUAGE;

  return {
    id: props.id,
    title: props.title,
    docType: props.docType,
    url: props.url ?? null,
    filePath: props.filePath ?? null,
    publicationDate,
    regulatoryArticles: unique(props.regulatoryArticles ?? []),
    scrModules,
    language,
    reliabilityScore,
    contentHash: props.contentHash ?? '',
    lastUpdated: props.lastUpdated ?? new Date(),
    metadata: props.metadata ?? {}
  };
}

export function withRegulatoryArticle(document: RegulatoryDocument, article: string): RegulatoryDocument {
  if (document.regulatoryArticles.includes(article)) {
    return document;
  }
  return { ...document, regulatoryArticles: [...document.regulatoryArticles, article] };
}

export function withScrModule(document: RegulatoryDocument, module: ScrModule): RegulatoryDocument {
  if (document.scrModules.includes(module)) {
    return document;
  }
  return { ...document, scrModules: [...document.scrModules, module] };
}

export function isRelevantForModule(document: RegulatoryDocument, module: ScrModule): boolean {
  return document.scrModules.includes(module);
}

const ARTICLE_SHAPES = [
  /^\d+[a-z]?$/, // 180, 180a
  /^\d+\/\d+$/, // 2015/35
  /^\d+\/\d+\/CE$/ // 2009/138/CE
];

/**
 * Whether an identifier looks like an article or act number
 */
export function isValidRegulatoryArticle(article: string): boolean {
  return ARTICLE_SHAPES.some(shape => shape.test(article));
}
