/**
 * Versioning
 *
 * In-memory per-file version trees with recency and size rankings.
 *
 * @module versioning
 */

export type * from "./types.js";

export { VersionTree } from "./version-tree.js";
export { FileRegistry, validateFilename } from "./file-registry.js";
export { VersionStore, type VersionStoreOptions } from "./version-store.js";
