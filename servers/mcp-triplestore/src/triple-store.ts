import {
  Bindings,
  Triple,
  TripleFormatError,
  isVariable,
  parseClauses,
  requireArgument,
  variable,
} from 'triple-core';
import type { FactStoreBackend, QueryInput } from './types/index.js';

export interface OpenOptions {
  /** Remove every stored fact once the backend is up. */
  clear?: boolean;
}

function toTriple(input: Triple | string, predicate?: string, object?: string): Triple {
  if (input instanceof Triple) return input;
  requireArgument(predicate, 'predicate');
  requireArgument(object, 'object');
  return new Triple(input, predicate, object);
}

function toPatterns(input: QueryInput, predicate?: string, object?: string): Triple[] {
  requireArgument(input, 'query');
  if (typeof input === 'string') {
    return predicate === undefined && object === undefined
      ? parseClauses(input)
      : [toTriple(input, predicate, object)];
  }
  if (input instanceof Triple) return [input];
  return [...input];
}

// `?a ?b ?c` with three different variables matches every fact.
function matchesEverything(pattern: Triple): boolean {
  const slots = pattern.slots();
  return slots.every((slot) => isVariable(slot)) && new Set(slots).size === slots.length;
}

/**
 * Fact store: parses and validates triples and queries, then delegates
 * storage and conjunctive matching to a FactStoreBackend.
 *
 * Text queries use the clause syntax of `parseClauses`, e.g.
 * `?who likes ?what . ?what is sweet`.
 */
export class TripleStore {
  constructor(private readonly backend: FactStoreBackend) {}

  /**
   * Initialize `backend` and wrap it in a store.
   */
  static async open(backend: FactStoreBackend, options: OpenOptions = {}): Promise<TripleStore> {
    requireArgument(backend, 'backend');
    await backend.initialize();
    const store = new TripleStore(backend);
    if (options.clear) {
      console.error('Clearing triple store on startup');
      await store.clear();
    }
    return store;
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  // ---------- write ----------

  add(triple: Triple): Promise<boolean>;
  add(id: string, predicate: string, object: string): Promise<boolean>;
  async add(input: Triple | string, predicate?: string, object?: string): Promise<boolean> {
    const fact = toTriple(input, predicate, object);
    if (fact.isPattern) {
      throw new TripleFormatError(`Cannot store a pattern as a fact: ${fact}`);
    }
    return this.backend.insert(fact);
  }

  /**
   * Remove every fact matched by the query and return the facts actually
   * deleted, without duplicates.
   */
  remove(query: QueryInput): Promise<Triple[]>;
  remove(id: string, predicate: string, object: string): Promise<Triple[]>;
  async remove(input: QueryInput, predicate?: string, object?: string): Promise<Triple[]> {
    const patterns = toPatterns(input, predicate, object);
    if (patterns.length === 1) {
      return this.removePattern(patterns[0]);
    }
    if (patterns.length === 0) {
      return [];
    }

    const removed = new Map<string, Triple>();
    for (const bindings of await this.backend.enumerate(patterns)) {
      for (const pattern of patterns) {
        await this.deleteSubstituted(pattern, bindings, removed);
      }
    }
    return Array.from(removed.values());
  }

  async clear(): Promise<boolean> {
    return this.backend.clear();
  }

  // ---------- read ----------

  /** True iff `triple` is a concrete fact in the store; false for any pattern. */
  async contains(triple: Triple): Promise<boolean> {
    requireArgument(triple, 'triple');
    if (triple.isPattern) return false;
    const answers = await this.backend.enumerate([triple]);
    return answers.length > 0;
  }

  /**
   * Bindings for every answer to the query. A variable-free query yields
   * one empty Bindings when it holds and none otherwise.
   */
  query(query: QueryInput): Promise<Bindings[]>;
  query(id: string, predicate: string, object: string): Promise<Bindings[]>;
  async query(input: QueryInput, predicate?: string, object?: string): Promise<Bindings[]> {
    return this.backend.enumerate(toPatterns(input, predicate, object));
  }

  async all(): Promise<Triple[]> {
    const pattern = new Triple(variable('a'), variable('b'), variable('c'));
    const facts = new Map<string, Triple>();
    for (const bindings of await this.backend.enumerate([pattern])) {
      const fact = pattern.substitute(bindings);
      facts.set(fact.key, fact);
    }
    return Array.from(facts.values());
  }

  async count(): Promise<number> {
    const facts = await this.all();
    return facts.length;
  }

  // ---------- helpers ----------

  private async removePattern(pattern: Triple): Promise<Triple[]> {
    if (!pattern.isPattern) {
      return (await this.backend.delete(pattern)) ? [pattern] : [];
    }
    if (matchesEverything(pattern)) {
      const facts = await this.all();
      return (await this.backend.clear()) ? facts : [];
    }

    const removed = new Map<string, Triple>();
    for (const bindings of await this.backend.enumerate([pattern])) {
      await this.deleteSubstituted(pattern, bindings, removed);
    }
    return Array.from(removed.values());
  }

  private async deleteSubstituted(
    pattern: Triple,
    bindings: Bindings,
    removed: Map<string, Triple>
  ): Promise<void> {
    const fact = pattern.substitute(bindings);
    if (fact.isPattern || removed.has(fact.key)) return;
    if (await this.backend.delete(fact)) {
      removed.set(fact.key, fact);
    }
  }
}
