/**
 * Error types raised by the extraction pipeline
 */

/**
 * Base class for every error the extractor raises on purpose
 */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * One or both API keys are absent from the environment.
 * Raised before any request is issued.
 */
export class MissingCredentialsError extends ExtractionError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing credentials: set ${missing.join(' and ')} in the environment`);
    this.name = 'MissingCredentialsError';
    this.missing = missing;
  }
}

/**
 * The upstream API answered with a non-200 status, or the retry budget ran out.
 * `statusCode` is undefined when no response was ever received.
 */
export class RequestFailedError extends ExtractionError {
  readonly statusCode?: number;
  readonly body: unknown;
  readonly attempts: number;

  constructor(message: string, options: { statusCode?: number; body: unknown; attempts: number }) {
    super(message);
    this.name = 'RequestFailedError';
    this.statusCode = options.statusCode;
    this.body = options.body;
    this.attempts = options.attempts;
  }
}

export class RequestAbortedError extends ExtractionError {
  constructor(message = 'Request aborted') {
    super(message);
    this.name = 'RequestAbortedError';
  }
}

/**
 * The response body is not the `{data: {offset, total, count, results}}` envelope
 */
export class MalformedResponseError extends ExtractionError {
  readonly body: unknown;

  constructor(message: string, body: unknown) {
    super(message);
    this.name = 'MalformedResponseError';
    this.body = body;
  }
}

/**
 * A record does not carry a field the shaped row needs.
 * Signals an unannounced upstream schema change.
 */
export class MalformedRecordError extends ExtractionError {
  readonly field: string;
  readonly index?: number;

  constructor(field: string, index?: number) {
    const where = index === undefined ? '' : ` at record #${index}`;
    super(`Malformed record${where}: field "${field}" is missing or has an unexpected shape`);
    this.name = 'MalformedRecordError';
    this.field = field;
    this.index = index;
  }
}

/**
 * Renders any thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
