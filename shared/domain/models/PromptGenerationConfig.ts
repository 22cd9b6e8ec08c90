/**
 * Prompt generation settings consumed by the prompt layer.
 * Out-of-range values are clamped; an unknown provider or expertise
 * level is rejected.
 */
import { ValidationError } from '../errors.js';
import { AiProvider, ExpertiseLevel, ScrModule, isAiProvider, isExpertiseLevel } from './Vocabulary.js';

export type ContextLevel = 'low' | 'medium' | 'high';

export interface PromptGenerationConfig {
  readonly aiProvider: AiProvider;
  readonly expertiseLevel: ExpertiseLevel;
  readonly scrModule: ScrModule;
  readonly language: string;
  readonly outputFormat: string;
  readonly includeExamples: boolean;
  readonly includeFormulas: boolean;
  readonly includeRegulatoryRefs: boolean;
  /** Words, within [500, 10000] */
  readonly maxLength: number;
  readonly customRequirements: readonly string[];
  readonly contextLevel: ContextLevel;
  /** 1 to 5 */
  readonly technicalDepth: number;
}

export interface PromptGenerationConfigProps {
  aiProvider: string;
  expertiseLevel: string;
  scrModule: ScrModule;
  language?: string;
  outputFormat?: string;
  includeExamples?: boolean;
  includeFormulas?: boolean;
  includeRegulatoryRefs?: boolean;
  maxLength?: number;
  customRequirements?: readonly string[];
  contextLevel?: string;
  technicalDepth?: number;
}

export const MIN_PROMPT_LENGTH = 500;
export const MAX_PROMPT_LENGTH = 10000;

function isContextLevel(value: string): value is ContextLevel {
  return value === 'low' || value === 'medium' || value === 'high';
}

export function createPromptGenerationConfig(props: PromptGenerationConfigProps): PromptGenerationConfig {
  const depth = props.technicalDepth ?? 3;
  const contextLevel = props.contextLevel ?? 'high';
  const maxLength = props.maxLength ?? 3000;

  const { aiProvider, expertiseLevel } = props;
  if (!isAiProvider(aiProvider)) {
    throw new ValidationError(`unsupported AI provider '${aiProvider}'`);
  }
  if (!isExpertiseLevel(expertiseLevel)) {
    throw new ValidationError(`unsupported expertise level '${expertiseLevel}'`);
  }

  return {
    aiProvider,
    expertiseLevel,
    scrModule: props.scrModule,
    language: props.language ?? 'fr',
    outputFormat: props.outputFormat ?? 'technical_sheet',
    includeExamples: props.includeExamples ?? true,
    includeFormulas: props.includeFormulas ?? true,
    includeRegulatoryRefs: props.includeRegulatoryRefs ?? true,
    maxLength: Math.min(Math.max(maxLength, MIN_PROMPT_LENGTH), MAX_PROMPT_LENGTH),
    customRequirements: [...(props.customRequirements ?? [])],
    contextLevel: isContextLevel(contextLevel) ? contextLevel : 'high',
    technicalDepth: depth >= 1 && depth <= 5 ? depth : 3
  };
}

const EXPERTISE_WEIGHT: Record<ExpertiseLevel, number> = {
  junior: 0.2,
  confirmed: 0.5,
  expert: 0.8,
  regulation_specialist: 1.0
};

const CONTEXT_WEIGHT: Record<ContextLevel, number> = {
  low: 0.2,
  medium: 0.5,
  high: 0.8
};

/**
 * Complexity of the requested prompt, in [0, 1]
 */
export function complexityScore(config: PromptGenerationConfig): number {
  let score = EXPERTISE_WEIGHT[config.expertiseLevel] * 0.4;
  score += (config.technicalDepth / 5) * 0.3;
  score += CONTEXT_WEIGHT[config.contextLevel] * 0.2;

  if (config.includeFormulas) score += 0.05;
  if (config.includeExamples) score += 0.03;
  if (config.customRequirements.length > 0) score += 0.02;

  return Math.min(score, 1.0);
}

/**
 * Complexity adjusted by how much stored material exists for the module
 * @param documentsForModule Count from the store statistics
 */
export function knowledgeAwareComplexity(config: PromptGenerationConfig, documentsForModule: number): number {
  let complexity = complexityScore(config);
  if (documentsForModule === 0) {
    complexity *= 0.7;
  } else if (documentsForModule > 5) {
    complexity *= 1.1;
  }
  return Math.min(complexity, 1.0);
}
