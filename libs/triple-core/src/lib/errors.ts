/**
 * Base class for every error raised by the triple store packages.
 */
export class TripleStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TripleStoreError';
  }
}

/**
 * A primitive, triple or query clause is not well formed. Always raised at
 * construction time, never deferred.
 */
export class TripleFormatError extends TripleStoreError {
  constructor(message: string) {
    super(message);
    this.name = 'TripleFormatError';
  }
}

export class MissingArgumentError extends TripleStoreError {
  readonly argument: string;

  constructor(argument: string) {
    super(`Missing required argument: ${argument}`);
    this.name = 'MissingArgumentError';
    this.argument = argument;
  }
}

/**
 * Throws a MissingArgumentError when `value` is null or undefined.
 * Runs before any other validation of the argument.
 */
export function requireArgument<T>(
  value: T | null | undefined,
  argument: string
): asserts value is T {
  if (value === null || value === undefined) {
    throw new MissingArgumentError(argument);
  }
}
