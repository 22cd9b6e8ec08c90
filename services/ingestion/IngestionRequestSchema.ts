/**
 * Validation of ingestion input coming from outside the process
 * (command-line flags, batch files). Enum values are checked here so that
 * an unsupported value never reaches the orchestrator.
 */

import fs from 'fs';
import { z } from 'zod';
import { ValidationError } from '../../shared/domain/errors.js';
import { isIsoCalendarDate } from '../../shared/domain/models/Document.js';
import { DOCUMENT_TYPES, SCR_MODULES, SUPPORTED_LANGUAGES } from '../../shared/domain/models/Vocabulary.js';

/**
 * Error map naming the rejected value and the accepted ones
 */
export function unsupportedValue(label: string): z.ZodErrorMap {
  return (issue, ctx) =>
    issue.code === 'invalid_enum_value'
      ? { message: `unsupported value '${String(issue.received)}' for ${label} (expected one of: ${issue.options.join(', ')})` }
      : { message: ctx.defaultError };
}

export const DocumentTypeSchema = z.enum(DOCUMENT_TYPES, { errorMap: unsupportedValue('document type') });
export const ScrModuleSchema = z.enum(SCR_MODULES, { errorMap: unsupportedValue('SCR module') });
export const LanguageSchema = z.enum(SUPPORTED_LANGUAGES, { errorMap: unsupportedValue('language') });

export const DocumentOverridesSchema = z
  .object({
    title: z.string().min(1).optional(),
    url: z.string().url().optional(),
    reliabilityScore: z.number().min(0).max(1).optional(),
    language: LanguageSchema.optional(),
    publicationDate: z
      .string()
      .refine(isIsoCalendarDate, { message: 'expected a YYYY-MM-DD date' })
      .optional()
  })
  .strict();

export const IngestionRequestSchema = z.object({
  locator: z.string().min(1),
  docType: DocumentTypeSchema,
  modules: z.array(ScrModuleSchema).min(1, { message: 'at least one SCR module is required' }),
  metadata: DocumentOverridesSchema.default({})
});

export const BatchFileSchema = z.array(IngestionRequestSchema);

export type DocumentOverrides = z.infer<typeof DocumentOverridesSchema>;
export type BatchEntry = z.infer<typeof IngestionRequestSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate raw input with a schema, raising ValidationError on failure
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(describeIssues(parsed.error), { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Read and validate a batch file: a JSON array of
 * `{ locator, docType, modules, metadata? }`
 */
export function readBatchFile(filePath: string): BatchEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`cannot read batch file ${filePath}`, {
      reason: error instanceof Error ? error.message : String(error)
    });
  }
  return parseInput(BatchFileSchema, raw);
}
