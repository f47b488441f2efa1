import * as os from 'os';
import * as path from 'path';
import { TripleStoreError } from 'triple-core';
import type { BackendKind, Neo4jSettings, TripleStoreConfig } from './types/index.js';

export class ConfigError extends TripleStoreError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const BACKENDS: readonly BackendKind[] = ['sqlite', 'neo4j'];

function isBackendKind(value: string): value is BackendKind {
  return (BACKENDS as readonly string[]).includes(value);
}

function isEnabled(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function neo4jSettings(env: NodeJS.ProcessEnv): Neo4jSettings {
  const uri = env.NEO4J_URI?.trim();
  const password = env.NEO4J_PASSWORD;
  if (!uri) {
    throw new ConfigError('NEO4J_URI is required when TRIPLESTORE_BACKEND=neo4j');
  }
  if (!password) {
    throw new ConfigError('NEO4J_PASSWORD is required when TRIPLESTORE_BACKEND=neo4j');
  }
  return { uri, username: env.NEO4J_USERNAME?.trim() || 'neo4j', password };
}

/**
 * Read the server configuration from environment variables:
 *
 * - `TRIPLESTORE_BACKEND`: `sqlite` (default) or `neo4j`
 * - `TRIPLESTORE_DB_PATH`: SQLite file, default `~/.mcp-triplestore/facts.db`
 * - `NEO4J_URI`, `NEO4J_USERNAME`, `NEO4J_PASSWORD`
 * - `TRIPLESTORE_CLEAR_ON_START`, `TRIPLESTORE_LOG_QUERIES`: boolean flags
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TripleStoreConfig {
  const backend = (env.TRIPLESTORE_BACKEND ?? 'sqlite').trim().toLowerCase();
  if (!isBackendKind(backend)) {
    throw new ConfigError(
      `Unknown TRIPLESTORE_BACKEND "${backend}". Expected one of: ${BACKENDS.join(', ')}`
    );
  }

  return {
    backend,
    dbPath:
      env.TRIPLESTORE_DB_PATH ?? path.join(os.homedir(), '.mcp-triplestore', 'facts.db'),
    neo4j: backend === 'neo4j' ? neo4jSettings(env) : undefined,
    clearOnStart: isEnabled(env.TRIPLESTORE_CLEAR_ON_START),
    logQueries: isEnabled(env.TRIPLESTORE_LOG_QUERIES),
  };
}
