/**
 * Error taxonomy shared by the ingestion pipeline and the query engine.
 *
 * Batch ingestion logs and skips FetchError / ExtractionError per item.
 * Query handling turns IndexUnavailableError / GenerationError into an
 * `error` stream event. ConfigurationError is fatal at startup.
 */

export type NewsRagErrorCode =
  | 'CONFIGURATION'
  | 'FETCH'
  | 'EXTRACTION'
  | 'INDEX_UNAVAILABLE'
  | 'GENERATION';

export class NewsRagError extends Error {
  readonly code: NewsRagErrorCode;

  constructor(code: NewsRagErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NewsRagError';
    this.code = code;
  }
}

export class ConfigurationError extends NewsRagError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class FetchError extends NewsRagError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options?: ErrorOptions & { status?: number }) {
    super('FETCH', message, options);
    this.name = 'FetchError';
    this.url = url;
    this.status = options?.status ?? null;
  }
}

export class ExtractionError extends NewsRagError {
  readonly url: string;

  constructor(url: string, message: string) {
    super('EXTRACTION', `${message} (${url})`);
    this.name = 'ExtractionError';
    this.url = url;
  }
}

export class IndexUnavailableError extends NewsRagError {
  constructor(message: string, options?: ErrorOptions) {
    super('INDEX_UNAVAILABLE', message, options);
    this.name = 'IndexUnavailableError';
  }
}

export class GenerationError extends NewsRagError {
  /** Answer text produced before the failure */
  readonly partialAnswer: string;

  constructor(message: string, partialAnswer = '', options?: ErrorOptions) {
    super('GENERATION', message, options);
    this.name = 'GenerationError';
    this.partialAnswer = partialAnswer;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
