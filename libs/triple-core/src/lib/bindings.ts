import { TripleFormatError, requireArgument } from './errors.js';
import { variable } from './primitive.js';

/**
 * A single value bound to a variable. Immutable.
 */
export class Binding {
  /** Canonical variable token, always carrying the `?` prefix. */
  readonly name: string;
  readonly value: string;

  constructor(name: string, value: string) {
    requireArgument(name, 'name');
    requireArgument(value, 'value');
    if (value.trim().length === 0) {
      throw new TripleFormatError(`Binding value for ${name} must be a non-empty string.`);
    }
    this.name = variable(name);
    this.value = value;
  }

  toString(): string {
    return `${this.name} = ${this.value}`;
  }
}

/**
 * Immutable set of variable bindings keyed by canonical variable name.
 *
 * Construction is first-write-wins: a key that is already present is never
 * replaced by a later entry. `Bindings.layered` relies on this to stack new
 * bindings on top of an existing set without touching the base, which stays
 * valid on its own.
 */
export class Bindings implements Iterable<Binding> {
  static readonly EMPTY = new Bindings();

  private readonly entries: ReadonlyMap<string, Binding>;

  constructor(bindings?: Iterable<Binding>) {
    const entries = new Map<string, Binding>();
    if (bindings) {
      addAbsent(entries, bindings);
    }
    this.entries = entries;
  }

  /**
   * Copy every entry of `base`, then add the entries of `additions` whose
   * variable is not bound yet.
   */
  static layered(base: Bindings, additions: Iterable<Binding> = []): Bindings {
    requireArgument(base, 'base');
    const entries = new Map<string, Binding>(base.entries);
    addAbsent(entries, additions);
    return new Bindings(entries.values());
  }

  /** Build from a plain `{ variable: value }` record; keys may omit the `?`. */
  static fromObject(record: Readonly<Record<string, string>>): Bindings {
    requireArgument(record, 'record');
    return new Bindings(
      Object.entries(record).map(([name, value]) => new Binding(name, value))
    );
  }

  /** Value bound to `name`, or undefined. `name` may omit the `?` prefix. */
  get(name: string): string | undefined {
    requireArgument(name, 'name');
    return this.entries.get(variable(name))?.value;
  }

  has(name: string): boolean {
    requireArgument(name, 'name');
    return this.entries.has(variable(name));
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<Binding> {
    return this.entries.values();
  }

  toObject(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const binding of this.entries.values()) {
      record[binding.name] = binding.value;
    }
    return record;
  }

  toString(): string {
    const values = Array.from(this.entries.values(), (b) => ` "${b.value}" `);
    return `Bindings = {${values.join('')}}`;
  }
}

function addAbsent(entries: Map<string, Binding>, bindings: Iterable<Binding>): void {
  for (const binding of bindings) {
    if (!entries.has(binding.name)) {
      entries.set(binding.name, binding);
    }
  }
}
