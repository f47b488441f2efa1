import { requireArgument } from './errors.js';
import { Bindings } from './bindings.js';
import { isVariable } from './primitive.js';
import type { Triple } from './triple.js';

/**
 * Distinct variable tokens of `patterns`, in order of first appearance.
 */
export function patternVariables(patterns: readonly Triple[]): string[] {
  requireArgument(patterns, 'patterns');
  const variables = new Set<string>();
  for (const pattern of patterns) {
    for (const slot of pattern.slots()) {
      if (isVariable(slot)) variables.add(slot);
    }
  }
  return Array.from(variables);
}

/**
 * Re-derive the bindings of a conjunction from the facts it matched,
 * `facts[i]` being the fact matched by `patterns[i]`. Earlier patterns take
 * precedence. Null when a pair does not match or the lists differ in length.
 */
export function deriveConjunction(
  patterns: readonly Triple[],
  facts: readonly Triple[],
  seed: Bindings = Bindings.EMPTY
): Bindings | null {
  requireArgument(patterns, 'patterns');
  requireArgument(facts, 'facts');
  if (patterns.length !== facts.length) {
    return null;
  }

  const scratch = new Map<string, string>();
  let bindings: Bindings | null = seed;
  for (let i = 0; i < patterns.length && bindings; i++) {
    bindings = patterns[i].deriveBindings(facts[i], bindings, scratch);
  }
  return bindings;
}
