/**
 * Set-Log Errors
 *
 * Line-scoped failures raised while parsing and evaluating a workout log.
 * A failing line is rejected whole; callers decide whether the document
 * continues (see parseWorkoutLog).
 */

export class MalformedSetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedSetError';
  }
}

export class NumericRangeError extends Error {
  constructor(
    message: string,
    public value: number
  ) {
    super(message);
    this.name = 'NumericRangeError';
  }
}

export class SetLogSyntaxError extends Error {
  constructor(
    message: string,
    public column: number
  ) {
    super(`${message} (column ${column})`);
    this.name = 'SetLogSyntaxError';
  }
}

export class SynonymConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SynonymConfigurationError';
  }
}

export class SynonymTableSealedError extends Error {
  constructor() {
    super('Synonym table cannot be extended after the first lookup');
    this.name = 'SynonymTableSealedError';
  }
}

/**
 * Raised by parseWorkoutLog when the line error policy is 'abort'
 */
export class LogLineError extends Error {
  constructor(
    public lineNumber: number,
    public source: string,
    public lineError: Error
  ) {
    super(`Line ${lineNumber}: ${lineError.message}`);
    this.name = 'LogLineError';
  }
}

/**
 * Errors that reject a single line without stopping the document
 */
export function isLineError(
  error: unknown
): error is MalformedSetError | NumericRangeError | SetLogSyntaxError {
  return (
    error instanceof MalformedSetError ||
    error instanceof NumericRangeError ||
    error instanceof SetLogSyntaxError
  );
}
