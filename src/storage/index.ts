import type { DatabaseConfig } from '../config.js';
import { DatabaseStore } from './database.js';

/**
 * Storage module
 *
 * The server always talks to MySQL through `DatabaseStore`; `MemoryStore`
 * serves the same interface from an in-process dataset.
 *
 * @module storage/index
 */

export type { IMarketStore } from './interface.js';
export { DatabaseStore, escapeLikePattern, isConnectionError, marketQueries } from './database.js';
export { MemoryStore } from './memory.js';

/**
 * Create the MySQL-backed store for the configured database
 *
 * @example
 * ```ts
 * const store = createStore(getConfig().database);
 * await store.initialize(getRetryOptionsFromEnv());
 * ```
 */
export function createStore(config: DatabaseConfig): DatabaseStore {
  return new DatabaseStore(config);
}
