import type { Bindings, Triple } from 'triple-core';

/**
 * Storage engine behind a TripleStore. Facts handed to `insert` and `delete`
 * are always concrete (no variables).
 */
export interface FactStoreBackend {
  initialize(): Promise<void>;
  close(): Promise<void>;

  /**
   * One Bindings per distinct answer to the conjunction of `patterns`. A
   * variable-free conjunction yields `[Bindings.EMPTY]` when all of its facts
   * are stored and `[]` otherwise. An empty list yields `[]`.
   */
  enumerate(patterns: readonly Triple[]): Promise<Bindings[]>;

  insert(fact: Triple): Promise<boolean>;
  /** True iff a stored fact was removed. */
  delete(fact: Triple): Promise<boolean>;
  clear(): Promise<boolean>;
}

export interface BackendOptions {
  /** Log every generated SQL/Cypher statement to stderr. */
  logQueries?: boolean;
}

/** A query given as text, a single triple or an ordered conjunction. */
export type QueryInput = string | Triple | readonly Triple[];

export type BackendKind = 'sqlite' | 'neo4j';

export interface Neo4jSettings {
  uri: string;
  username: string;
  password: string;
}

export interface TripleStoreConfig {
  backend: BackendKind;
  dbPath: string;
  neo4j?: Neo4jSettings;
  clearOnStart: boolean;
  logQueries: boolean;
}
