/**
 * Error Types
 *
 * Typed errors raised by the window resolver and the report builder.
 * Each carries the offending field and value so callers can report them.
 */

export class WorkSummaryError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = 'WorkSummaryError';
  }
}

/** Malformed or contradictory window selector or summary option. */
export class ValidationError extends WorkSummaryError {
  constructor(field: string, value: unknown, message: string) {
    super(message, field, value);
    this.name = 'ValidationError';
  }
}

/** Unknown output format or grouping mode. */
export class FormatError extends WorkSummaryError {
  constructor(field: string, value: unknown, message: string) {
    super(message, field, value);
    this.name = 'FormatError';
  }
}
