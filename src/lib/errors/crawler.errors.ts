/**
 * Crawler Errors
 * Error taxonomy shared by the fetch, parse and storage layers
 */

/**
 * Base class for all crawler errors.
 * Carries a stable code for summaries and an optional details bag.
 */
export class CrawlerError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Content errors ---

export class ParseError extends CrawlerError {
  constructor(public readonly url: string, reason: string, originalError?: Error) {
    super(
      `Could not parse ${url}: ${reason}${originalError ? ` (${originalError.message})` : ''}`,
      'PARSE_ERROR',
      { url }
    );
  }
}

/**
 * Not a failure: the page was fetched but carried no usable text.
 */
export class QualityFilterSkip extends CrawlerError {
  constructor(public readonly url: string, reason: string) {
    super(`Skipped ${url}: ${reason}`, 'QUALITY_FILTER_SKIP', { url });
  }
}

// --- Fatal errors ---

export class ConfigurationError extends CrawlerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message,
      'CONFIGURATION_ERROR',
      { issues }
    );
  }
}

export class StorageError extends CrawlerError {
  constructor(message: string, public readonly path: string, originalError?: unknown) {
    super(
      `Storage error: ${message} (Path: ${path})${originalError instanceof Error ? `. ${originalError.message}` : ''}`,
      'STORAGE_ERROR',
      { path }
    );
  }
}

// --- Scheduling ---

export class AdmissionAbortedError extends CrawlerError {
  constructor(public readonly host: string) {
    super(`Admission for host ${host} was aborted`, 'ADMISSION_ABORTED', { host });
  }
}

/**
 * True for a filesystem error raised because the path does not exist
 */
export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
