import * as os from 'os';
import * as path from 'path';
import { ConfigError, loadConfig } from '../config';
import { Neo4jBackend, SqliteBackend, createBackend } from '../storage';

describe('loadConfig', () => {
  it('defaults to a SQLite file in the home directory', () => {
    expect(loadConfig({})).toEqual({
      backend: 'sqlite',
      dbPath: path.join(os.homedir(), '.mcp-triplestore', 'facts.db'),
      neo4j: undefined,
      clearOnStart: false,
      logQueries: false,
    });
  });

  it('reads flags and the database path', () => {
    const config = loadConfig({
      TRIPLESTORE_DB_PATH: '/tmp/facts.db',
      TRIPLESTORE_CLEAR_ON_START: 'TRUE',
      TRIPLESTORE_LOG_QUERIES: '1',
    });
    expect(config.dbPath).toBe('/tmp/facts.db');
    expect(config.clearOnStart).toBe(true);
    expect(config.logQueries).toBe(true);
  });

  it('reads Neo4j settings', () => {
    const config = loadConfig({
      TRIPLESTORE_BACKEND: 'Neo4j',
      NEO4J_URI: 'bolt://localhost:7687',
      NEO4J_PASSWORD: 'test-secret',
    });
    expect(config.backend).toBe('neo4j');
    expect(config.neo4j).toEqual({
      uri: 'bolt://localhost:7687',
      username: 'neo4j',
      password: 'test-secret',
    });
  });

  it('requires a Neo4j URI', () => {
    expect(() => loadConfig({ TRIPLESTORE_BACKEND: 'neo4j', NEO4J_PASSWORD: 'test-secret' })).toThrow(
      new ConfigError('NEO4J_URI is required when TRIPLESTORE_BACKEND=neo4j')
    );
  });

  it('rejects an unknown backend', () => {
    expect(() => loadConfig({ TRIPLESTORE_BACKEND: 'redis' })).toThrow(
      'Unknown TRIPLESTORE_BACKEND "redis". Expected one of: sqlite, neo4j'
    );
  });
});

describe('createBackend', () => {
  it('builds the configured backend', async () => {
    expect(createBackend(loadConfig({ TRIPLESTORE_DB_PATH: ':memory:' }))).toBeInstanceOf(
      SqliteBackend
    );
    const neo4j = createBackend(
      loadConfig({
        TRIPLESTORE_BACKEND: 'neo4j',
        NEO4J_URI: 'bolt://localhost:7687',
        NEO4J_PASSWORD: 'test-secret',
      })
    );
    expect(neo4j).toBeInstanceOf(Neo4jBackend);
    await neo4j.close();
  });
});
