export {
  TripleStoreError,
  TripleFormatError,
  MissingArgumentError,
  requireArgument,
} from './lib/errors.js';
export {
  VARIABLE_PREFIX,
  normalizePrimitive,
  isVariable,
  asVariable,
  variable,
  samePrimitive,
} from './lib/primitive.js';
export { Binding, Bindings } from './lib/bindings.js';
export { Triple, SLOTS } from './lib/triple.js';
export type { Slot, MatchScratch } from './lib/triple.js';
export { CLAUSE_SEPARATOR, parseClauses, parseClause } from './lib/parser.js';
export { patternVariables, deriveConjunction } from './lib/conjunction.js';
