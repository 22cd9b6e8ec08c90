/**
 * Concept mining
 *
 * Finds label/value phrases that define calculation elements (formulas,
 * factors, durations, ratings, shocks) and turns each accepted match into
 * one concept per SCR module of the owning document.
 */

import { ScrConcept, createScrConcept } from '../../shared/domain/models/ScrConcept.js';
import { ScrModule } from '../../shared/domain/models/Vocabulary.js';

export type ConceptKind =
  | 'formula'
  | 'factor'
  | 'coefficient'
  | 'duration'
  | 'sensitivity'
  | 'rating'
  | 'shock';

interface ConceptPattern {
  kind: ConceptKind;
  pattern: RegExp;
}

const CONCEPT_PATTERNS: readonly ConceptPattern[] = [
  { kind: 'formula', pattern: /SCR[_\s]*([\p{L}\p{N}_]+)\s*=\s*([^.\n]{10,100})/giu },
  { kind: 'factor', pattern: /([Ff]acteur[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi },
  { kind: 'coefficient', pattern: /([Cc]oefficient[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi },
  { kind: 'duration', pattern: /([Dd]uration[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi },
  { kind: 'sensitivity', pattern: /([Ss]ensibilité[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi },
  { kind: 'rating', pattern: /([Nn]otation[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi },
  { kind: 'rating', pattern: /([Rr]ating[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi },
  { kind: 'shock', pattern: /([Cc]hoc[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi },
  { kind: 'shock', pattern: /([Ss]tress[^:]{0,30})\s*[:-]\s*([^.\n]{10,80})/gi }
];

const ARTICLE_WINDOW = 200;
const NEARBY_ARTICLE = /[Aa]rticle\s+(\d+[a-z]?)/;
const MARKUP_CHARACTERS = /[<>{}]/;

export const MINED_CONCEPT_CONFIDENCE = 0.8;

/**
 * One accepted pattern match, before fan-out to modules
 */
export interface ConceptCandidate {
  kind: ConceptKind;
  label: string;
  value: string;
  regulatoryArticle: string | null;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ');
}

/**
 * Accepted matches in pattern order, then text order
 */
export function findConceptCandidates(content: string): ConceptCandidate[] {
  const candidates: ConceptCandidate[] = [];

  for (const { kind, pattern } of CONCEPT_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const label = (match[1] ?? '').trim();
      const value = (match[2] ?? '').trim();

      if (label.length < 3 || label.length > 50) continue;
      if (value.length < 10 || value.length > 150) continue;
      if (MARKUP_CHARACTERS.test(value)) continue;

      const start = match.index ?? 0;
      const end = start + match[0].length;
      const window = content.slice(Math.max(0, start - ARTICLE_WINDOW), end + ARTICLE_WINDOW);
      const article = NEARBY_ARTICLE.exec(window);

      candidates.push({
        kind,
        label: collapseWhitespace(label),
        value: collapseWhitespace(value),
        regulatoryArticle: article?.[1] ?? null
      });
    }
  }

  return candidates;
}

/**
 * Concepts for a document: every candidate repeated once per module
 */
export function mineConcepts(
  content: string,
  modules: readonly ScrModule[],
  sourceDocumentId: string,
  now: () => Date = () => new Date()
): ScrConcept[] {
  const concepts: ScrConcept[] = [];

  for (const candidate of findConceptCandidates(content)) {
    for (const scrModule of modules) {
      concepts.push(
        createScrConcept({
          conceptName: candidate.label,
          scrModule,
          definition: candidate.value,
          formula: candidate.kind === 'formula' ? candidate.value : null,
          regulatoryArticle: candidate.regulatoryArticle,
          sourceDocumentId,
          confidenceScore: MINED_CONCEPT_CONFIDENCE,
          createdAt: now()
        })
      );
    }
  }

  return concepts;
}
