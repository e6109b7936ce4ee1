/**
 * Version Tree Types
 */

/**
 * One point in a file's version tree. Lives in the tree's arena; `parent`
 * and `children` are arena ids.
 */
export interface VersionNode {
  /** Dense id, equal to the node's arena index */
  id: number;
  content: string;
  /** Snapshot message; empty until the node is snapshotted */
  message: string;
  createdAt: number;
  /** Set once when snapshotted, null before */
  snapshottedAt: number | null;
  parent: number | null;
  /** Append-only */
  children: number[];
}

/**
 * Read-only view of a node handed out to callers
 */
export interface VersionInfo {
  readonly id: number;
  readonly content: string;
  readonly message: string;
  readonly createdAt: number;
  readonly snapshottedAt: number | null;
  readonly parent: number | null;
  readonly children: readonly number[];
}

/**
 * A version that has been snapshotted, as listed by history
 */
export interface SnapshotInfo extends VersionInfo {
  readonly snapshottedAt: number;
}

/**
 * Row of a RECENT_FILES answer
 */
export interface RecentFile {
  filename: string;
  lastModified: number;
}

/**
 * Row of a BIGGEST_TREES answer
 */
export interface TreeSize {
  filename: string;
  totalVersions: number;
}
