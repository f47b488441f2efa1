export { TripleStore } from './triple-store.js';
export type { OpenOptions } from './triple-store.js';
export { loadConfig, ConfigError } from './config.js';
export { SqliteBackend, Neo4jBackend, createBackend, compilePatterns } from './storage/index.js';
export type {
  BackendKind,
  BackendOptions,
  FactStoreBackend,
  Neo4jSettings,
  QueryInput,
  TripleStoreConfig,
} from './types/index.js';
