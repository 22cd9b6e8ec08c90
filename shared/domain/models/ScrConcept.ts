/**
 * Mined SCR concept entity
 */
import { ValidationError } from '../errors.js';
import { ScrModule, isScrModule } from './Vocabulary.js';

export interface ScrConcept {
  /** Assigned by the store on insert */
  readonly id: number | null;

  readonly conceptName: string;

  readonly scrModule: ScrModule;

  readonly definition: string;

  readonly formula: string | null;

  /** Nearest article mention around the match, if any */
  readonly regulatoryArticle: string | null;

  /** Weak reference to RegulatoryDocument.id */
  readonly sourceDocumentId: string | null;

  readonly examples: readonly string[];

  readonly confidenceScore: number;

  readonly createdAt: Date;
}

export interface ScrConceptProps {
  id?: number | null;
  conceptName: string;
  scrModule: ScrModule;
  definition: string;
  formula?: string | null;
  regulatoryArticle?: string | null;
  sourceDocumentId?: string | null;
  examples?: readonly string[];
  confidenceScore?: number;
  createdAt?: Date;
}

export const MIN_CONCEPT_NAME_LENGTH = 3;

export function createScrConcept(props: ScrConceptProps): ScrConcept {
  const confidenceScore = props.confidenceScore ?? 0.8;
  if (!(confidenceScore >= 0 && confidenceScore <= 1)) {
    throw new ValidationError('confidenceScore must be between 0 and 1', { confidenceScore });
  }

  const conceptName = props.conceptName.trim();
  if (conceptName.length < MIN_CONCEPT_NAME_LENGTH) {
    throw new ValidationError(`conceptName must be at least ${MIN_CONCEPT_NAME_LENGTH} characters`, {
      conceptName: props.conceptName
    });
  }

  if (!isScrModule(props.scrModule)) {
    throw new ValidationError(`unsupported SCR module '${props.scrModule}'`);
  }

  let examples: readonly string[] = [];
  for (const example of props.examples ?? []) {
    examples = addExample(examples, example);
  }

  return {
    id: props.id ?? null,
    conceptName,
    scrModule: props.scrModule,
    definition: props.definition,
    formula: props.formula ?? null,
    regulatoryArticle: props.regulatoryArticle ?? null,
    sourceDocumentId: props.sourceDocumentId ?? null,
    examples,
    confidenceScore,
    createdAt: props.createdAt ?? new Date()
  };
}

function addExample(examples: readonly string[], example: string): readonly string[] {
  const trimmed = example.trim();
  if (!trimmed || examples.includes(trimmed)) {
    return examples;
  }
  return [...examples, trimmed];
}

export function withExample(concept: ScrConcept, example: string): ScrConcept {
  const examples = addExample(concept.examples, example);
  return examples === concept.examples ? concept : { ...concept, examples };
}
