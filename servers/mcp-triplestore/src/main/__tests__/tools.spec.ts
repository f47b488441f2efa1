import { SqliteBackend } from '../../storage/sqlite';
import { TripleStore } from '../../triple-store';
import { TOOLS, handleToolCall } from '../tools';

let store: TripleStore;

beforeEach(async () => {
  store = await TripleStore.open(new SqliteBackend(':memory:'));
  await store.add('alice', 'likes', 'cake');
  await store.add('bob', 'likes', 'pie');
});

afterEach(async () => {
  await store.close();
});

async function call(name: string, args: Record<string, unknown> = {}) {
  const result = await handleToolCall(store, name, args);
  return { isError: result.isError, text: result.content[0].text };
}

describe('tools', () => {
  it('registers the fact tools', () => {
    expect(TOOLS.map((tool) => tool.name)).toEqual([
      'add_fact',
      'query_facts',
      'remove_facts',
      'list_facts',
      'count_facts',
      'clear_facts',
    ]);
  });

  it('adds a fact', async () => {
    const result = await call('add_fact', { id: 'carol', predicate: 'likes', object: 'tea' });
    expect(result.isError).toBeUndefined();
    expect(JSON.parse(result.text)).toEqual({ added: true });
    expect(await store.count()).toBe(3);
  });

  it('reports a missing argument', async () => {
    const result = await call('add_fact', { id: 'carol', object: 'tea' });
    expect(result).toEqual({
      isError: true,
      text: 'Error adding fact: Missing required argument: predicate',
    });
  });

  it('reports a non-string argument', async () => {
    const result = await call('query_facts', { query: 42 });
    expect(result).toEqual({
      isError: true,
      text: 'Error querying facts: Argument query must be a string',
    });
  });

  it('queries facts', async () => {
    const result = await call('query_facts', { query: '?who likes cake' });
    expect(JSON.parse(result.text)).toEqual({ count: 1, answers: [{ '?who': 'alice' }] });
  });

  it('reports malformed queries', async () => {
    const result = await call('query_facts', { query: 'a b' });
    expect(result).toEqual({
      isError: true,
      text: 'Error querying facts: Query string is malformed: "a b"',
    });
  });

  it('removes facts', async () => {
    const result = await call('remove_facts', { query: '?who likes pie' });
    expect(JSON.parse(result.text)).toEqual({
      removed: 1,
      facts: [{ id: 'bob', predicate: 'likes', object: 'pie' }],
    });
  });

  it('lists, counts and clears facts', async () => {
    const listed = JSON.parse((await call('list_facts')).text);
    expect(listed.count).toBe(2);
    expect(JSON.parse((await call('count_facts')).text)).toEqual({ count: 2 });
    expect(JSON.parse((await call('clear_facts')).text)).toEqual({ cleared: true });
    expect(JSON.parse((await call('count_facts')).text)).toEqual({ count: 0 });
  });

  it('throws on an unknown tool', async () => {
    await expect(handleToolCall(store, 'nope')).rejects.toThrow('Unknown tool: nope');
  });
});
