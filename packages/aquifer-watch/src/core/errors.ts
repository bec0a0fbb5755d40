/**
 * Aquifer Watch Error Types
 *
 * Unit-local kinds (retrieval, geometry, series) are isolated to the unit that
 * raised them and recorded in the run manifest. InsufficientDataError comes
 * from the population-wide classification step and ends the run, as does
 * DuplicateUnitError when two units would share one manifest entry.
 */

/**
 * Stable identifiers used in the run manifest
 */
export type ErrorKind =
  | 'RetrievalError'
  | 'GeometryError'
  | 'InsufficientDataError'
  | 'MalformedSeriesError'
  | 'DuplicateUnitError'
  | 'UnexpectedError';

/**
 * Base class carrying the manifest kind
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: Exclude<ErrorKind, 'UnexpectedError'>;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Upstream unreachable, returned an error status, or sent a response that
 * does not match the expected shape.
 */
export class RetrievalError extends PipelineError {
  readonly kind = 'RetrievalError' as const;
  readonly statusCode: number | undefined;

  /**
   * @param endpoint - Endpoint kind or URL that failed
   * @param statusCode - HTTP status when the server answered
   */
  constructor(
    message: string,
    public readonly endpoint: string,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, options);
    this.statusCode = options?.statusCode;
  }
}

/**
 * A polygon record that cannot be normalized.
 */
export class GeometryError extends PipelineError {
  readonly kind = 'GeometryError' as const;

  constructor(
    message: string,
    public readonly featureId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Too few distinct values to derive percentile breaks.
 */
export class InsufficientDataError extends PipelineError {
  readonly kind = 'InsufficientDataError' as const;

  /**
   * @param reason - Why the population came up short, appended to the message
   */
  constructor(
    public readonly distinctValues: number,
    public readonly required: number,
    reason?: string
  ) {
    super(
      `Percentile classification needs at least ${required} distinct values, got ${distinctValues}` +
        (reason ? ` (${reason})` : '')
    );
  }
}

/**
 * A time series with a non-finite value, an unparsable timestamp or a
 * duplicated timestamp.
 */
export class MalformedSeriesError extends PipelineError {
  readonly kind = 'MalformedSeriesError' as const;

  /**
   * @param seriesKey - `<entity>/<metric>` of the offending series
   * @param position - Index of the offending record in its input
   */
  constructor(
    message: string,
    public readonly seriesKey: string,
    public readonly position?: number
  ) {
    super(message);
  }
}

/**
 * A unit id that is already recorded in the run manifest.
 */
export class DuplicateUnitError extends PipelineError {
  readonly kind = 'DuplicateUnitError' as const;

  constructor(public readonly unitId: string) {
    super(`Unit ${unitId} is already recorded in this run`);
  }
}

/**
 * Classify any thrown value for the manifest
 */
export function errorKind(error: unknown): ErrorKind {
  return error instanceof PipelineError ? error.kind : 'UnexpectedError';
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
