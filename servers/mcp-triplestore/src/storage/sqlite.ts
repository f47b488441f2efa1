import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { Binding, Bindings, TripleStoreError } from 'triple-core';
import type { Triple } from 'triple-core';
import { SCHEMA_DDL } from './schema.js';
import { compilePatterns } from './compile.js';
import type { Projection } from './compile.js';
import type { BackendOptions, FactStoreBackend } from '../types/index.js';

type Row = Record<string, unknown>;

const MEMORY = ':memory:';

function rowToBindings(row: Row, projections: Projection[]): Bindings {
  return new Bindings(
    projections.map((p) => {
      const value = row[p.alias];
      if (typeof value !== 'string') {
        throw new TripleStoreError(`Column ${p.alias} for ${p.variable} is not text`);
      }
      return new Binding(p.variable, value);
    })
  );
}

/**
 * Fact store on a single SQLite table. Conjunctions run as one self-join,
 * `triples t0, triples t1, ...`, one alias per pattern.
 */
export class SqliteBackend implements FactStoreBackend {
  private db: Database.Database | null = null;

  constructor(
    private readonly dbPath: string = MEMORY,
    private readonly options: BackendOptions = {}
  ) {}

  // ---------- lifecycle ----------

  async initialize(): Promise<void> {
    if (this.dbPath !== MEMORY) {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA_DDL);
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  // ---------- read ----------

  async enumerate(patterns: readonly Triple[]): Promise<Bindings[]> {
    if (patterns.length === 0) return [];

    const db = this.connection();
    const { conditions, projections, parameters } = compilePatterns(patterns, {
      column: (index, slot) => `t${index}.${slot}`,
      placeholder: () => '?',
    });
    const from = patterns.map((_, i) => `triples AS t${i}`).join(', ');
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';

    if (projections.length === 0) {
      const sql = `SELECT 1 AS matched FROM ${from}${where} LIMIT 1`;
      const row = this.read(sql, () => db.prepare<unknown[], Row>(sql).get(...parameters));
      return row ? [Bindings.EMPTY] : [];
    }

    const select = projections.map((p) => `${p.expression} AS ${p.alias}`).join(', ');
    const sql = `SELECT DISTINCT ${select} FROM ${from}${where}`;
    const rows = this.read(sql, () => db.prepare<unknown[], Row>(sql).all(...parameters));
    return rows.map((row) => rowToBindings(row, projections));
  }

  // ---------- write ----------

  async insert(fact: Triple): Promise<boolean> {
    return this.write(
      'INSERT OR IGNORE INTO triples (id, predicate, object) VALUES (?, ?, ?)',
      fact.slots()
    ) >= 0;
  }

  async delete(fact: Triple): Promise<boolean> {
    return this.write(
      'DELETE FROM triples WHERE id = ? AND predicate = ? AND object = ?',
      fact.slots()
    ) > 0;
  }

  async clear(): Promise<boolean> {
    return this.write('DELETE FROM triples', []) >= 0;
  }

  // ---------- helpers ----------

  private connection(): Database.Database {
    if (!this.db) {
      throw new TripleStoreError('SQLite backend used before initialize()');
    }
    return this.db;
  }

  private read<T>(sql: string, run: () => T): T {
    if (this.options.logQueries) {
      console.error(`Executing SQL query: ${sql}`);
    }
    try {
      return run();
    } catch (error) {
      console.error(`Error querying the triple store with query ${sql}:`, error);
      throw error;
    }
  }

  /** Number of changed rows, or -1 when the statement failed. */
  private write(sql: string, parameters: readonly string[]): number {
    const db = this.connection();
    if (this.options.logQueries) {
      console.error(`Executing SQL statement: ${sql}`);
    }
    try {
      return db.prepare(sql).run(...parameters).changes;
    } catch (error) {
      console.error(`Failed when executing statement ${sql}:`, error);
      return -1;
    }
  }
}
