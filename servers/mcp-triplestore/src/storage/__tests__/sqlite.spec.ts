import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Bindings, Triple, TripleStoreError, parseClauses } from 'triple-core';
import { SqliteBackend } from '../sqlite';

let backend: SqliteBackend;

beforeEach(async () => {
  backend = new SqliteBackend(':memory:');
  await backend.initialize();
});

afterEach(async () => {
  await backend.close();
});

async function insertAll(...clauses: string[]) {
  for (const clause of clauses) {
    await backend.insert(parseClauses(clause)[0]);
  }
}

function answers(list: Bindings[]) {
  return list
    .map((bindings) => bindings.toObject())
    .sort((a, b) => JSON.stringify(a).localeCompare(JSON.stringify(b)));
}

// ---- lifecycle ----
describe('lifecycle', () => {
  it('refuses to query before initialize', async () => {
    const idle = new SqliteBackend(':memory:');
    await expect(idle.enumerate([new Triple('a', 'b', 'c')])).rejects.toThrow(TripleStoreError);
  });

  it('creates the directory of a database file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'triplestore-'));
    const file = path.join(dir, 'nested', 'facts.db');
    const fileBackend = new SqliteBackend(file);
    await fileBackend.initialize();
    await fileBackend.close();
    expect(fs.existsSync(path.join(dir, 'nested'))).toBe(true);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

// ---- insert / delete ----
describe('insert and delete', () => {
  it('stores a fact once', async () => {
    const fact = new Triple('alice', 'likes', 'cake');
    expect(await backend.insert(fact)).toBe(true);
    expect(await backend.insert(fact)).toBe(true);
    const all = await backend.enumerate([new Triple('?s', '?p', '?o')]);
    expect(all).toHaveLength(1);
  });

  it('reports whether a fact was removed', async () => {
    await insertAll('alice likes cake');
    expect(await backend.delete(new Triple('alice', 'likes', 'cake'))).toBe(true);
    expect(await backend.delete(new Triple('alice', 'likes', 'cake'))).toBe(false);
  });

  it('clears every fact', async () => {
    await insertAll('alice likes cake', 'bob likes pie');
    expect(await backend.clear()).toBe(true);
    expect(await backend.enumerate([new Triple('?s', '?p', '?o')])).toEqual([]);
  });
});

// ---- enumeration ----
describe('enumerate', () => {
  beforeEach(async () => {
    await insertAll(
      'alice likes bob',
      'bob likes cake',
      'carol likes dave',
      'bob knows bob',
      'bob knows alice'
    );
  });

  it('answers a variable-free pattern with one empty binding set', async () => {
    const present = await backend.enumerate([new Triple('bob', 'likes', 'cake')]);
    expect(present).toHaveLength(1);
    expect(present[0].size).toBe(0);
    expect(await backend.enumerate([new Triple('bob', 'likes', 'pie')])).toEqual([]);
  });

  it('binds the variables of a single pattern', async () => {
    const result = await backend.enumerate(parseClauses('?who likes ?what'));
    expect(answers(result)).toEqual([
      { '?who': 'alice', '?what': 'bob' },
      { '?who': 'bob', '?what': 'cake' },
      { '?who': 'carol', '?what': 'dave' },
    ]);
  });

  it('joins a conjunction on shared variables', async () => {
    const result = await backend.enumerate(parseClauses('?a likes ?b . ?b likes cake'));
    expect(answers(result)).toEqual([{ '?a': 'alice', '?b': 'bob' }]);
  });

  it('honours a variable repeated inside one pattern', async () => {
    const result = await backend.enumerate(parseClauses('?a knows ?a'));
    expect(answers(result)).toEqual([{ '?a': 'bob' }]);
  });

  it('returns nothing when a clause has no match', async () => {
    expect(await backend.enumerate(parseClauses('?a likes ?b . ?b hates ?c'))).toEqual([]);
  });

  it('returns nothing for an empty conjunction', async () => {
    expect(await backend.enumerate([])).toEqual([]);
  });

  it('logs generated queries when asked to', async () => {
    const logging = new SqliteBackend(':memory:', { logQueries: true });
    const log = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      await logging.initialize();
      await logging.enumerate([new Triple('a', 'b', 'c')]);
      expect(log).toHaveBeenCalledWith(
        'Executing SQL query: SELECT 1 AS matched FROM triples AS t0 WHERE t0.id = ? AND t0.predicate = ? AND t0.object = ? LIMIT 1'
      );
    } finally {
      log.mockRestore();
      await logging.close();
    }
  });
});
