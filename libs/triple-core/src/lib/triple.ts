import { TripleFormatError, requireArgument } from './errors.js';
import { Binding, Bindings } from './bindings.js';
import { isVariable, normalizePrimitive, samePrimitive } from './primitive.js';

export const SLOTS = ['id', 'predicate', 'object'] as const;
export type Slot = (typeof SLOTS)[number];

/**
 * Scratch table for one matching attempt: variable token → fact value seen so
 * far. Owned by the caller when reused; cleared at the start of every match.
 */
export type MatchScratch = Map<string, string>;

// Lets substitute() skip normalization for values that came out of a store.
const normalizedSlots = Symbol('normalizedSlots');

/**
 * A subject/predicate/object triple. A triple with at least one variable slot
 * is a pattern; one without is a fact.
 *
 * Every slot is normalized at construction (see `normalizePrimitive`) and the
 * instance never changes afterwards. Equality and hashing ignore case.
 */
export class Triple {
  readonly id: string;
  readonly predicate: string;
  readonly object: string;
  readonly isPattern: boolean;

  constructor(id: string, predicate: string, object: string, trust?: typeof normalizedSlots) {
    requireArgument(id, 'id');
    requireArgument(predicate, 'predicate');
    requireArgument(object, 'object');

    if (trust === normalizedSlots) {
      this.id = id;
      this.predicate = predicate;
      this.object = object;
    } else {
      this.id = normalizeSlot(id, 'ID');
      this.predicate = normalizeSlot(predicate, 'Predicate');
      this.object = normalizeSlot(object, 'Object');
    }
    this.isPattern = isVariable(this.id) || isVariable(this.predicate) || isVariable(this.object);
  }

  slots(): readonly [string, string, string] {
    return [this.id, this.predicate, this.object];
  }

  /** String identity, equal for triples that are `equals`. */
  get key(): string {
    return this.slots()
      .map((slot) => slot.toLowerCase())
      .join('\u0000');
  }

  /**
   * Whether `fact` fits this pattern. Literal slots must equal the fact's
   * slot; variable slots match anything, but a variable used twice must see
   * the same value both times.
   *
   * Pass `scratch` to reuse one table across many calls. It is cleared first.
   */
  matchesFact(fact: Triple, scratch: MatchScratch = new Map()): boolean {
    requireArgument(fact, 'fact');
    scratch.clear();
    const factSlots = fact.slots();
    return this.slots().every((slot, i) => matchSlot(slot, factSlots[i], scratch));
  }

  /**
   * Bindings implied by matching `fact`, layered on top of `existing`, or
   * null when the fact does not match. Variables already bound in `existing`
   * keep their value.
   */
  deriveBindings(
    fact: Triple,
    existing: Bindings = Bindings.EMPTY,
    scratch?: MatchScratch
  ): Bindings | null {
    requireArgument(fact, 'fact');
    requireArgument(existing, 'existing');
    if (!this.matchesFact(fact, scratch)) {
      return null;
    }

    const additions: Binding[] = [];
    const factSlots = fact.slots();
    this.slots().forEach((slot, i) => {
      if (isVariable(slot) && !existing.has(slot)) {
        additions.push(new Binding(slot, factSlots[i]));
      }
    });
    return Bindings.layered(existing, additions);
  }

  /**
   * Replace every bound variable slot with its value. Returns this instance
   * when nothing changes.
   */
  substitute(bindings: Bindings): Triple {
    requireArgument(bindings, 'bindings');
    const [id, predicate, object] = this.slots().map((slot) => {
      const value = isVariable(slot) ? bindings.get(slot) : undefined;
      return value ?? slot;
    });
    const changed =
      !samePrimitive(id, this.id) ||
      !samePrimitive(predicate, this.predicate) ||
      !samePrimitive(object, this.object);
    return changed ? new Triple(id, predicate, object, normalizedSlots) : this;
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof Triple)) return false;
    return (
      samePrimitive(this.id, other.id) &&
      samePrimitive(this.predicate, other.predicate) &&
      samePrimitive(this.object, other.object)
    );
  }

  hashCode(): number {
    let hash = 9949;
    for (const slot of this.slots()) {
      hash = (Math.imul(hash, 12277) + stringHash(slot.toLowerCase())) | 0;
    }
    return hash;
  }

  toString(): string {
    return `<${this.id}, ${this.predicate}, ${this.object}>`;
  }
}

function normalizeSlot(raw: string, label: string): string {
  if (raw.trim().length === 0) {
    throw new TripleFormatError(`${label} must be a non-null and non-empty string.`);
  }
  return normalizePrimitive(raw);
}

function matchSlot(slot: string, factSlot: string, scratch: MatchScratch): boolean {
  if (!isVariable(slot)) {
    return samePrimitive(slot, factSlot);
  }
  const seen = scratch.get(slot);
  if (seen !== undefined && !samePrimitive(seen, factSlot)) {
    return false;
  }
  scratch.set(slot, factSlot);
  return true;
}

// djb2
function stringHash(value: string): number {
  let hash = 5381;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 33) + value.charCodeAt(i)) | 0;
  }
  return hash;
}
