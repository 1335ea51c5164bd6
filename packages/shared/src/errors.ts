/**
 * Error Taxonomy
 *
 * Every failure the harness records carries a stable code so the report can
 * tally failures by kind and consumers can judge benchmark validity.
 */

export type ErrorCode =
  | 'MALFORMED_SOURCE'
  | 'AMBIGUOUS_MEMBERSHIP'
  | 'EXTRACTION_TIMEOUT'
  | 'SCHEMA_VIOLATION'
  | 'TEMPLATE_MISMATCH'
  | 'EXTRACTION_FAILED'
  | 'PIPELINE_HALTED'
  | 'UNKNOWN_BACKEND'
  | 'INTERNAL_ERROR';

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
}

export abstract class MemoBenchError extends Error {
  abstract readonly code: ErrorCode;
  /** Whether the adapter may retry the operation that raised this error */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Source content is empty or not text. Fatal for that record.
 */
export class MalformedSourceError extends MemoBenchError {
  readonly code = 'MALFORMED_SOURCE';

  constructor(
    message: string,
    readonly sourceUri: string
  ) {
    super(message);
  }
}

/**
 * A record matched the eval membership list through disagreeing identity signals.
 */
export class AmbiguousMembershipError extends MemoBenchError {
  readonly code = 'AMBIGUOUS_MEMBERSHIP';

  constructor(
    message: string,
    readonly recordId: string,
    readonly sourceUri: string
  ) {
    super(message);
  }
}

/**
 * A single backend call exceeded its per-call timeout.
 */
export class ExtractionTimeoutError extends MemoBenchError {
  readonly code = 'EXTRACTION_TIMEOUT';
  override readonly retryable = true;

  constructor(
    readonly backendId: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Backend ${backendId} did not respond within ${timeoutMs}ms`, options);
  }
}

/**
 * A backend returned output outside the closed schema. Never coerced.
 */
export class SchemaViolationError extends MemoBenchError {
  readonly code = 'SCHEMA_VIOLATION';

  constructor(
    message: string,
    readonly violations: string[]
  ) {
    super(violations.length > 0 ? `${message}: ${violations.join('; ')}` : message);
  }
}

/**
 * A memo cannot be composed into the canonical section layout.
 */
export class TemplateMismatchError extends MemoBenchError {
  readonly code = 'TEMPLATE_MISMATCH';
}

/**
 * A backend call failed for a reason other than timeout or schema violation.
 */
export class ExtractionFailedError extends MemoBenchError {
  readonly code = 'EXTRACTION_FAILED';

  constructor(
    readonly backendId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Too many records could not be split deterministically; the run stops.
 */
export class PipelineHaltedError extends MemoBenchError {
  readonly code = 'PIPELINE_HALTED';

  constructor(
    message: string,
    readonly ambiguousCount: number,
    readonly recordCount: number
  ) {
    super(message);
  }
}

export class UnknownBackendError extends MemoBenchError {
  readonly code = 'UNKNOWN_BACKEND';

  constructor(readonly backendId: string) {
    super(`No extraction backend registered with id: ${backendId}`);
  }
}

export function isMemoBenchError(error: unknown): error is MemoBenchError {
  return error instanceof MemoBenchError;
}

/**
 * Reduce any thrown value to the code/message pair recorded in results.
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (isMemoBenchError(error)) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}
