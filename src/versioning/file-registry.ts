/**
 * File Registry - filename -> VersionTree. No removal.
 */

import type { Clock } from "../infra/clock.js";
import { systemClock } from "../infra/clock.js";
import { ConflictError, NotFoundError, ValidationError } from "../infra/errors.js";
import { VersionTree } from "./version-tree.js";

const WHITESPACE_RE = /\s/;

export function validateFilename(name: string): void {
  if (!name) {
    throw new ValidationError("File name cannot be empty");
  }
  if (WHITESPACE_RE.test(name)) {
    throw new ValidationError(`File name cannot contain whitespace: '${name}'`);
  }
}

export class FileRegistry {
  private readonly files = new Map<string, VersionTree>();
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  get size(): number {
    return this.files.size;
  }

  /**
   * Register a new file. Its tree starts with a snapshotted, empty root.
   */
  create(name: string): VersionTree {
    validateFilename(name);
    if (this.files.has(name)) {
      throw new ConflictError(`File already exists: ${name}`);
    }
    const tree = new VersionTree(this.clock);
    this.files.set(name, tree);
    return tree;
  }

  lookup(name: string): VersionTree {
    if (!name) {
      throw new ValidationError("File name cannot be empty");
    }
    const tree = this.files.get(name);
    if (!tree) {
      throw new NotFoundError(`File not found: ${name}`);
    }
    return tree;
  }

  has(name: string): boolean {
    return this.files.has(name);
  }

  /**
   * Registered names in creation order
   */
  names(): string[] {
    return [...this.files.keys()];
  }
}
