/**
 * Errors thrown for caller mistakes and I/O failures.
 * Data conditions (duplicates, empty input, small populations) are reported
 * as diagnostics instead.
 */

export class InvalidWinnerCountError extends Error {
  count: number;

  constructor(message: string, count: number) {
    super(message);
    this.name = 'InvalidWinnerCountError';
    this.count = count;
  }
}

export class InvalidSeedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSeedError';
  }
}

/**
 * An input file could not be read
 */
export class InputFileError extends Error {
  path: string;
  hint: string;

  constructor(message: string, path: string, hint: string) {
    super(message);
    this.name = 'InputFileError';
    this.path = path;
    this.hint = hint;
  }
}

/**
 * Bad command-line arguments
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
