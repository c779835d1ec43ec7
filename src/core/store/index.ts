/**
 * Store Module
 *
 * @module
 */

export { SqliteFactStore } from "./sqlite-fact-store.js";
export { PrefixRegistry, type PrefixEntry } from "./prefixes.js";
export { FACT_COLUMNS, PREFIX_TABLE, factTableDdl, quoteTable } from "./schema.js";

import type { FactStoreConfig, IFactStore } from "../interfaces/IFactStore.js";
import { SqliteFactStore } from "./sqlite-fact-store.js";

/**
 * Create and initialize a fact store
 */
export async function createFactStore(config: FactStoreConfig): Promise<IFactStore> {
  const store = new SqliteFactStore(config);
  await store.initialize();
  return store;
}
