/**
 * Defines custom error types for the SCR knowledge base.
 */

/**
 * Base class for all knowledge-base specific errors.
 * Carries a stable errorCode and optional details.
 */
export class ScrKbError extends Error {
  public readonly errorCode: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Source Related Errors ---

export class SourceNotFoundError extends ScrKbError {
  constructor(locator: string, details?: Record<string, unknown>) {
    super(`Source '${locator}' not found.`, 'SOURCE_NOT_FOUND', { locator, ...details });
  }
}

export class UnsupportedSourceError extends ScrKbError {
  constructor(locator: string, details?: Record<string, unknown>) {
    super(`Unsupported source type: ${locator}`, 'UNSUPPORTED_SOURCE', { locator, ...details });
  }
}

export class FetchFailedError extends ScrKbError {
  public readonly statusCode?: number;

  constructor(url: string, reason: string, statusCode?: number, details?: Record<string, unknown>) {
    super(`Fetch failed for URL ${url}: ${reason}`, 'FETCH_FAILED', { url, statusCode, ...details });
    this.statusCode = statusCode;
  }
}

export class ExtractionEmptyError extends ScrKbError {
  constructor(locator: string, details?: Record<string, unknown>) {
    super(`No text content extracted from ${locator}`, 'EXTRACTION_EMPTY', { locator, ...details });
  }
}

// --- Validation Errors ---

export class ValidationError extends ScrKbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, 'VALIDATION_ERROR', details);
  }
}

// --- Storage Errors ---

export class StoreWriteError extends ScrKbError {
  constructor(message: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Store write failed: ${message}. ${originalError?.message || ''}`.trim(), 'STORE_WRITE_FAILED', {
      originalError: originalError?.message,
      ...details
    });
  }
}

// --- Configuration Errors ---

export class ConfigurationError extends ScrKbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

// --- Export Errors ---

export class ExportError extends ScrKbError {
  constructor(message: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Export error: ${message}. ${originalError?.message || ''}`.trim(), 'EXPORT_ERROR', {
      originalError: originalError?.message,
      ...details
    });
  }
}

export function isScrKbError(error: unknown): error is ScrKbError {
  return error instanceof ScrKbError;
}

/**
 * Short human-readable reason for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
