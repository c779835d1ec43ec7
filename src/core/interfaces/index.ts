/**
 * Core Interfaces Module
 *
 * Contracts between the extraction engine and its backing store. Tests
 * substitute fakes for the store through these.
 *
 * @module
 */

export type { IFactStore, FactStoreConfig } from "./IFactStore.js";
