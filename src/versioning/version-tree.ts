/**
 * Version Tree
 *
 * Per-file tree of versions. Exactly one node is active; edits go to it while
 * it is open, and branch into a new child once it has been snapshotted.
 * Nodes sit in an append-only arena indexed by id, so jump-by-id is O(1) and
 * history is never freed.
 */

import type { Clock } from "../infra/clock.js";
import type { SnapshotInfo, VersionInfo, VersionNode } from "./types.js";
import { systemClock } from "../infra/clock.js";
import { ConflictError, OutOfRangeError, StateError, ValidationError } from "../infra/errors.js";

export class VersionTree {
  private readonly nodes: VersionNode[] = [];
  private readonly clock: Clock;
  private activeId = 0;
  private lastModifiedAt: number;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
    const now = clock.now();
    this.nodes.push({
      id: 0,
      content: "",
      message: "",
      createdAt: now,
      snapshottedAt: null,
      parent: null,
      children: [],
    });
    this.lastModifiedAt = now;
    this.snapshot("");
  }

  /**
   * Content of the active version
   */
  read(): string {
    return this.current.content;
  }

  /**
   * Append to the active version, or branch a child holding
   * `active.content + text` when the active version is a snapshot
   */
  insertContent(text: string): VersionInfo {
    const active = this.current;
    this.touch();
    if (active.snapshottedAt === null) {
      active.content += text;
      return toInfo(active);
    }
    return toInfo(this.branch(active, active.content + text));
  }

  /**
   * Replace the active version's content, or branch a child holding exactly
   * `text` when the active version is a snapshot
   */
  updateContent(text: string): VersionInfo {
    const active = this.current;
    this.touch();
    if (active.snapshottedAt === null) {
      active.content = text;
      return toInfo(active);
    }
    return toInfo(this.branch(active, text));
  }

  /**
   * Freeze the active version. Fails if it already is a snapshot.
   */
  snapshot(message = ""): VersionInfo {
    const active = this.current;
    if (active.snapshottedAt !== null) {
      throw new ConflictError("Current version is already a snapshot");
    }
    const now = this.touch();
    active.snapshottedAt = now;
    active.message = message;
    return toInfo(active);
  }

  /**
   * Move the active reference.
   *
   * With an id this is a direct checkout: any node of the tree, ancestor of
   * the active one or not. Without one it steps to the active node's parent.
   */
  rollback(id?: number): VersionInfo {
    if (id !== undefined) {
      const target = this.nodeAt(id, "rollback");
      this.activeId = target.id;
    } else {
      const parent = this.current.parent;
      if (parent === null) {
        throw new StateError("No parent version to rollback to");
      }
      this.activeId = parent;
    }
    this.touch();
    return toInfo(this.current);
  }

  /**
   * Snapshotted versions on the path root -> active, root first
   */
  history(): SnapshotInfo[] {
    const path: VersionNode[] = [];
    let node: VersionNode | undefined = this.current;
    while (node) {
      path.push(node);
      node = node.parent === null ? undefined : this.nodes[node.parent];
    }
    return path
      .reverse()
      .flatMap((n) =>
        n.snapshottedAt === null ? [] : [{ ...toInfo(n), snapshottedAt: n.snapshottedAt }],
      );
  }

  active(): VersionInfo {
    return toInfo(this.current);
  }

  getVersion(id: number): VersionInfo {
    return toInfo(this.nodeAt(id, "lookup"));
  }

  lastModified(): number {
    return this.lastModifiedAt;
  }

  totalVersions(): number {
    return this.nodes.length;
  }

  private get current(): VersionNode {
    return this.nodes[this.activeId];
  }

  private nodeAt(id: number, purpose: string): VersionNode {
    if (!Number.isInteger(id)) {
      throw new ValidationError(`Version id must be an integer, got ${id}`);
    }
    if (id < 0 || id >= this.nodes.length) {
      throw new OutOfRangeError(
        `Invalid version id for ${purpose}: ${id} (expected 0-${this.nodes.length - 1})`,
      );
    }
    return this.nodes[id];
  }

  private branch(parent: VersionNode, content: string): VersionNode {
    const child: VersionNode = {
      id: this.nodes.length,
      content,
      message: "",
      createdAt: this.clock.now(),
      snapshottedAt: null,
      parent: parent.id,
      children: [],
    };
    this.nodes.push(child);
    parent.children.push(child.id);
    this.activeId = child.id;
    return child;
  }

  private touch(): number {
    this.lastModifiedAt = this.clock.now();
    return this.lastModifiedAt;
  }
}

function toInfo(node: VersionNode): VersionInfo {
  return { ...node, children: [...node.children] };
}
