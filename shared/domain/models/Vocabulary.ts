/**
 * Closed vocabularies shared by documents, concepts and prompt configuration
 */

/** SCR modules of the Solvency II standard formula */
export const SCR_MODULES = [
  'spread',
  'interest_rate',
  'equity',
  'currency',
  'concentration',
  'market_global',
  'counterparty',
  'operational',
  'life',
  'non_life'
] as const;

export type ScrModule = typeof SCR_MODULES[number];

/** Kinds of source documents */
export const DOCUMENT_TYPES = [
  'regulation_eu',
  'directive',
  'eiopa_guidelines',
  'technical_standards',
  'industry_paper',
  'internal_doc',
  'academic_paper'
] as const;

export type DocumentType = typeof DOCUMENT_TYPES[number];

/** Target LLM providers for generated prompts */
export const AI_PROVIDERS = [
  'claude-sonnet-4',
  'claude-opus-4',
  'gpt-4',
  'gpt-4-turbo',
  'gemini-pro'
] as const;

export type AiProvider = typeof AI_PROVIDERS[number];

export const EXPERTISE_LEVELS = ['junior', 'confirmed', 'expert', 'regulation_specialist'] as const;

export type ExpertiseLevel = typeof EXPERTISE_LEVELS[number];

/** Languages a stored document may carry */
export const SUPPORTED_LANGUAGES = ['fr', 'en', 'de', 'es', 'it'] as const;

export type SupportedLanguage = typeof SUPPORTED_LANGUAGES[number];

export const DEFAULT_LANGUAGE: SupportedLanguage = 'fr';

function includes<T extends string>(values: readonly T[], value: string): value is T {
  const list: readonly string[] = values;
  return list.includes(value);
}

export function isScrModule(value: string): value is ScrModule {
  return includes(SCR_MODULES, value);
}

export function isDocumentType(value: string): value is DocumentType {
  return includes(DOCUMENT_TYPES, value);
}

export function isAiProvider(value: string): value is AiProvider {
  return includes(AI_PROVIDERS, value);
}

export function isExpertiseLevel(value: string): value is ExpertiseLevel {
  return includes(EXPERTISE_LEVELS, value);
}

export function isSupportedLanguage(value: string): value is SupportedLanguage {
  return includes(SUPPORTED_LANGUAGES, value);
}

/**
 * JSON-compatible value, used for open metadata maps
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };
