import { TripleFormatError, requireArgument } from './errors.js';
import { Triple } from './triple.js';

/** Separator between the clauses of a conjunctive query. */
export const CLAUSE_SEPARATOR = ' . ';

// A quoted span is one token; anything else splits on whitespace.
const TOKEN = /"[^"]*"|'[^']*'|\S+/g;

/**
 * Parse a conjunctive query such as `?a likes ?b . ?b likes cake` into one
 * triple per clause, in input order.
 */
export function parseClauses(text: string): Triple[] {
  requireArgument(text, 'query');
  if (text.trim().length === 0) {
    throw new TripleFormatError('Query string must be a non-empty string.');
  }
  return text
    .toLowerCase()
    .split(CLAUSE_SEPARATOR)
    .map((clause) => parseClause(clause.trim()));
}

/** Parse a single `id predicate object` clause. */
export function parseClause(clause: string): Triple {
  requireArgument(clause, 'clause');
  const tokens = clause.match(TOKEN) ?? [];
  if (tokens.length !== 3) {
    throw new TripleFormatError(`Query string is malformed: "${clause}"`);
  }
  const [id, predicate, object] = tokens;
  return new Triple(id, predicate, object);
}
