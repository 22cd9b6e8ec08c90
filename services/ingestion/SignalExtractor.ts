/**
 * Signal extraction
 *
 * Pattern-based heuristics run over normalized document text: article
 * references, SCR vocabulary, title, language and reliability. None of
 * them fail; no match yields an empty or default result.
 */

import crypto from 'crypto';
import path from 'path';
import { isWebLocator } from '../../shared/infrastructure/ContentExtractor.js';
import { DocumentType } from '../../shared/domain/models/Vocabulary.js';

/**
 * Article and act reference patterns, applied in order
 */
const ARTICLE_PATTERNS: readonly RegExp[] = [
  /Article\s+(\d+[a-z]?)\b/gi, // Article 180, Article 180a
  /Art\.\s+(\d+[a-z]?)\b/gi, // Art. 180
  /Article\s+(\d+[a-z]?)\s*\([^)]+\)/gi, // Article 180 (bis)
  /(?:Règlement|Regulation).*?(\d+\/\d+)/gi, // Règlement 2015/35
  /Directive.*?(\d+\/\d+\/CE)/gi // Directive 2009/138/CE
];

const MAX_ARTICLE_LENGTH = 10;

export const SCR_KEYWORDS: readonly string[] = [
  'SCR',
  'spread',
  'duration',
  'rating',
  'notation',
  'facteur de stress',
  'stress factor',
  'choc',
  'obligation',
  'bond',
  'crédit',
  'credit',
  'contrepartie',
  'counterparty',
  'concentration',
  'taux',
  'interest rate',
  'actions',
  'equity',
  'devise',
  'currency',
  'opérationnel',
  'operational'
];

const TITLE_KEYWORDS = [
  'règlement',
  'directive',
  'scr',
  'solvabilité',
  'solvency',
  'eiopa',
  'guidelines',
  'article',
  'commission',
  'délégué'
];

const FRENCH_INDICATORS = ['règlement', 'solvabilité', 'assurance', 'société', 'européenne'];
const ENGLISH_INDICATORS = ['regulation', 'solvency', 'insurance', 'european', 'commission'];

const BASE_RELIABILITY: Record<DocumentType, number> = {
  regulation_eu: 1.0,
  directive: 0.95,
  eiopa_guidelines: 0.9,
  technical_standards: 0.85,
  industry_paper: 0.7,
  internal_doc: 0.6,
  academic_paper: 0.75
};

const WORDS_PER_MINUTE = 200;

function compareByLengthThenValue(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Regulatory article identifiers found in the text, deduplicated and
 * sorted by length then value
 */
export function extractRegulatoryArticles(content: string): string[] {
  const articles = new Set<string>();

  for (const pattern of ARTICLE_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const article = (match[1] ?? '').trim();
      if (article && article.length <= MAX_ARTICLE_LENGTH) {
        articles.add(article);
      }
    }
  }

  return Array.from(articles).sort(compareByLengthThenValue);
}

/**
 * Vocabulary entries present in the text, in vocabulary order
 */
export function extractScrKeywords(content: string): string[] {
  const lower = content.toLowerCase();
  return SCR_KEYWORDS.filter(keyword => lower.includes(keyword.toLowerCase()));
}

/**
 * Short name of a source used inside document ids: the host for web pages,
 * the file stem otherwise, at most 20 characters
 */
export function deriveSourceName(locator: string): string {
  if (isWebLocator(locator)) {
    let host: string;
    try {
      host = new URL(locator).host;
    } catch {
      host = locator.replace(/^https?:\/\//, '').split('/')[0] ?? '';
    }
    return host.replace(/www\./g, '').replace(/\./g, '_').slice(0, 20);
  }
  return path.parse(locator).name.slice(0, 20);
}

/**
 * Deterministic document id `{docType}_{sourceName}_{hash8}`; characters
 * outside `[A-Za-z0-9_-]` in the source name become `_`
 */
export function deriveDocumentId(docType: DocumentType, locator: string, contentHash: string): string {
  const sourceName = deriveSourceName(locator).replace(/[^A-Za-z0-9_-]/g, '_');
  return `${docType}_${sourceName}_${contentHash.slice(0, 8)}`;
}

/**
 * MD5 hex digest of the normalized text; identity, not security
 */
export function computeContentHash(text: string): string {
  return crypto.createHash('md5').update(text, 'utf8').digest('hex');
}

/**
 * Best title for a document
 * @param metadataTitle Title declared by the source itself
 */
export function extractTitle(content: string, metadataTitle: string | undefined, locator: string): string {
  const declared = metadataTitle?.trim();
  if (declared && declared.length > 5) {
    return declared;
  }

  const lines = content
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .slice(0, 15);

  for (const line of lines) {
    if (line.length >= 10 && line.length <= 200) {
      const lower = line.toLowerCase();
      if (TITLE_KEYWORDS.some(keyword => lower.includes(keyword))) {
        return line;
      }
    }
  }

  if (isWebLocator(locator)) {
    return `Document web - ${deriveSourceName(locator)}`;
  }
  return `Document - ${path.parse(locator).name}`;
}

/**
 * 'fr' or 'en' by which indicator list has more words present; ties go
 * to French
 */
export function detectLanguage(content: string): 'fr' | 'en' {
  const lower = content.toLowerCase();
  const frenchCount = FRENCH_INDICATORS.filter(word => lower.includes(word)).length;
  const englishCount = ENGLISH_INDICATORS.filter(word => lower.includes(word)).length;
  return englishCount > frenchCount ? 'en' : 'fr';
}

/**
 * Reliability from the document type, adjusted by article density and
 * length, clamped to [0.1, 1.0]
 */
export function calculateReliabilityScore(content: string, docType: DocumentType, wordCount: number): number {
  let score = BASE_RELIABILITY[docType];

  const articleMentions = content.match(/article/gi)?.length ?? 0;
  if (articleMentions > 10) {
    score += 0.1;
  }

  if (wordCount > 5000) {
    score += 0.05;
  } else if (wordCount < 500) {
    score -= 0.1;
  }

  return Math.min(Math.max(score, 0.1), 1.0);
}

/**
 * Minutes needed to read a text, at least 1
 */
export function estimateReadingTime(wordCount: number): number {
  return Math.max(1, Math.floor(wordCount / WORDS_PER_MINUTE));
}
