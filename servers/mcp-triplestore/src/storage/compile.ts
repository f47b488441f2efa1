import { isVariable, patternVariables, SLOTS } from 'triple-core';
import type { Slot, Triple } from 'triple-core';

export interface Projection {
  /** Variable token, e.g. `?who`. */
  variable: string;
  /** Column alias in the result row, `v` plus the variable's first-appearance index. */
  alias: string;
  expression: string;
}

export interface CompiledPatterns {
  conditions: string[];
  projections: Projection[];
  /** Literal values, in the order their placeholders appear in `conditions`. */
  parameters: string[];
}

export interface CompileTarget {
  /** Expression reading `slot` of the row bound to pattern `index`. */
  column(index: number, slot: Slot): string;
  placeholder(position: number): string;
}

/**
 * Turn a conjunction into join conditions and projections for a declarative
 * engine. A literal slot becomes an equality against a parameter; the first
 * occurrence of a variable becomes its projection and every later occurrence
 * an equality against that first expression.
 */
export function compilePatterns(
  patterns: readonly Triple[],
  target: CompileTarget
): CompiledPatterns {
  const conditions: string[] = [];
  const projections: Projection[] = [];
  const parameters: string[] = [];
  const variables = patternVariables(patterns);
  const firstSeen = new Map<string, string>();

  patterns.forEach((pattern, index) => {
    const values = pattern.slots();
    SLOTS.forEach((slot, i) => {
      const value = values[i];
      const expression = target.column(index, slot);
      if (!isVariable(value)) {
        conditions.push(`${expression} = ${target.placeholder(parameters.length)}`);
        parameters.push(value);
        return;
      }
      const first = firstSeen.get(value);
      if (first === undefined) {
        firstSeen.set(value, expression);
        projections.push({ variable: value, alias: `v${variables.indexOf(value)}`, expression });
      } else {
        conditions.push(`${expression} = ${first}`);
      }
    });
  });

  return { conditions, projections, parameters };
}
