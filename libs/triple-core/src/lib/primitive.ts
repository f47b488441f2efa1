import { TripleFormatError, requireArgument } from './errors.js';

/** Reserved first character marking a primitive as a variable. */
export const VARIABLE_PREFIX = '?';

const QUOTES = new Set(['"', "'"]);

// Letters, digits and underscore are word characters; nothing else is.
const ONLY_NON_WORD = /^[^\p{L}\p{Nd}_]*$/u;

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

/**
 * Normalize a raw token into a primitive: trim, lowercase, then strip
 * matching quote pairs until the value no longer starts with a quote.
 * Rejects blank input, unbalanced quotes and tokens made only of
 * punctuation. The result never starts with a quote, so normalizing it again
 * returns it unchanged.
 *
 * @example
 * normalizePrimitive('  "Hello World" ') // 'hello world'
 * normalizePrimitive('?Name')            // '?name'
 */
export function normalizePrimitive(raw: string): string {
  requireArgument(raw, 'primitive');
  if (isBlank(raw)) {
    throw new TripleFormatError('Primitive must be a non-empty string.');
  }

  let primitive = raw.trim().toLowerCase();
  while (QUOTES.has(primitive[0])) {
    const quote = primitive[0];
    if (primitive.length <= 2 || primitive[primitive.length - 1] !== quote) {
      throw new TripleFormatError(
        `Malformed quoted primitive: ${raw}. Quotes must be balanced and enclose a value.`
      );
    }
    primitive = primitive.slice(1, -1).trim();
  }

  if (ONLY_NON_WORD.test(primitive)) {
    throw new TripleFormatError(
      `Invalid triple primitive. Primitive must not contain only special characters. Primitive = ${raw}`
    );
  }

  return primitive;
}

export function isVariable(token: string): boolean {
  requireArgument(token, 'token');
  return token.trim().startsWith(VARIABLE_PREFIX);
}

/**
 * Canonical variable form of `name`: trimmed, prefixed with `?` when the
 * prefix is missing. `asVariable('a')` and `asVariable('?a')` are both `?a`.
 */
export function asVariable(name: string): string {
  requireArgument(name, 'name');
  if (isBlank(name)) {
    throw new TripleFormatError('Variable name must be a non-empty string.');
  }
  const trimmed = name.trim();
  return trimmed.startsWith(VARIABLE_PREFIX) ? trimmed : VARIABLE_PREFIX + trimmed;
}

/** Build the variable token for a bare name, e.g. `variable('a')` → `?a`. */
export function variable(name: string): string {
  return asVariable(name).toLowerCase();
}

/** Case-insensitive primitive comparison. */
export function samePrimitive(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
