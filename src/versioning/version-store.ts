/**
 * Version Store
 *
 * Ties the file registry to the two ranked indices. Each operation resolves
 * the file, runs one tree operation, and only if that succeeded swaps the
 * file's stale index entries for fresh ones.
 */

import type { Clock } from "../infra/clock.js";
import type { RecentFile, SnapshotInfo, TreeSize, VersionInfo } from "./types.js";
import type { VersionTree } from "./version-tree.js";
import { systemClock } from "../infra/clock.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { RankedIndex, compareNumbers } from "../ranking/ranked-index.js";
import { FileRegistry } from "./file-registry.js";

const log = createSubsystemLogger("versioning");

export interface VersionStoreOptions {
  clock?: Clock;
}

export class VersionStore {
  private readonly registry: FileRegistry;
  private readonly recent = new RankedIndex<number>(compareNumbers);
  private readonly biggest = new RankedIndex<number>(compareNumbers);

  constructor(options: VersionStoreOptions = {}) {
    this.registry = new FileRegistry(options.clock ?? systemClock);
  }

  get fileCount(): number {
    return this.registry.size;
  }

  create(name: string): VersionInfo {
    const tree = this.registry.create(name);
    this.reindex(name, tree, { size: true });
    log.debug(`Created ${name}`);
    return tree.active();
  }

  read(name: string): string {
    return this.registry.lookup(name).read();
  }

  insert(name: string, text: string): VersionInfo {
    const tree = this.registry.lookup(name);
    const version = tree.insertContent(text);
    this.reindex(name, tree, { size: true });
    log.debug(`Inserted ${text.length} char(s) into ${name} at version ${version.id}`);
    return version;
  }

  update(name: string, text: string): VersionInfo {
    const tree = this.registry.lookup(name);
    const version = tree.updateContent(text);
    this.reindex(name, tree, { size: true });
    log.debug(`Updated ${name} at version ${version.id}`);
    return version;
  }

  snapshot(name: string, message = ""): VersionInfo {
    const tree = this.registry.lookup(name);
    const version = tree.snapshot(message);
    this.reindex(name, tree, { size: false });
    log.debug(`Snapshotted ${name} at version ${version.id}`);
    return version;
  }

  /**
   * Step to the parent version, or check out `id` directly when given
   */
  rollback(name: string, id?: number): VersionInfo {
    const tree = this.registry.lookup(name);
    const version = tree.rollback(id);
    this.reindex(name, tree, { size: false });
    log.debug(`Rolled ${name} back to version ${version.id}`);
    return version;
  }

  history(name: string): SnapshotInfo[] {
    return this.registry.lookup(name).history();
  }

  /**
   * Most recently modified files first
   *
   * @param k - defaults to every file
   */
  recentFiles(k?: number): RecentFile[] {
    return this.recent
      .topK(k)
      .map((entry) => ({ filename: entry.filename, lastModified: entry.key }));
  }

  /**
   * Files with the most versions first
   *
   * @param k - defaults to every file
   */
  biggestTrees(k?: number): TreeSize[] {
    return this.biggest
      .topK(k)
      .map((entry) => ({ filename: entry.filename, totalVersions: entry.key }));
  }

  private reindex(name: string, tree: VersionTree, changed: { size: boolean }): void {
    this.recent.removeByFilename(name);
    this.recent.insert(tree.lastModified(), name);
    if (changed.size) {
      this.biggest.removeByFilename(name);
      this.biggest.insert(tree.totalVersions(), name);
    }
  }
}
