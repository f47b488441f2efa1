import { driver as connectToNeo4j, auth as Neo4jAuth } from 'neo4j-driver';
import { TripleStoreError } from 'triple-core';
import { SqliteBackend } from './sqlite.js';
import { Neo4jBackend } from './neo4j.js';
import type { FactStoreBackend, TripleStoreConfig } from '../types/index.js';

export { SqliteBackend } from './sqlite.js';
export { Neo4jBackend } from './neo4j.js';
export { compilePatterns } from './compile.js';
export type { CompiledPatterns, CompileTarget, Projection } from './compile.js';

/**
 * Build the backend selected by `config`. The backend still has to be
 * initialized.
 */
export function createBackend(config: TripleStoreConfig): FactStoreBackend {
  const options = { logQueries: config.logQueries };
  switch (config.backend) {
    case 'sqlite':
      return new SqliteBackend(config.dbPath, options);
    case 'neo4j': {
      if (!config.neo4j) {
        throw new TripleStoreError('Neo4j backend selected without connection settings');
      }
      const { uri, username, password } = config.neo4j;
      return new Neo4jBackend(connectToNeo4j(uri, Neo4jAuth.basic(username, password)), options);
    }
  }
}
