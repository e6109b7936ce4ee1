import type { SnapshotInfo, VersionStore } from "../versioning/index.js";
import type { ParsedCommand } from "./commands.js";
import { formatTimestamp } from "../infra/clock.js";
import { helpText } from "./commands.js";

export type CommandOutcome = {
  /** Lines for stdout, without the blank separator line */
  lines: string[];
  /** True once EXIT was handled */
  exit: boolean;
};

type CommandHandlerContext = {
  store: VersionStore;
  formatTime?: (timestamp: number) => string;
};

export function createCommandHandlers(context: CommandHandlerContext) {
  const { store } = context;
  const formatTime = context.formatTime ?? formatTimestamp;

  const done = (...lines: string[]): CommandOutcome => ({ lines, exit: false });

  const formatHistoryEntry = (version: SnapshotInfo): string[] => [
    `Version ${version.id}`,
    ` | Created: ${formatTime(version.createdAt)}` +
      ` | Snapshot: ${formatTime(version.snapshottedAt)}` +
      ` | Message: ${version.message}`,
  ];

  /**
   * Run one parsed command. Core errors propagate to the caller.
   */
  const handleCommand = (command: ParsedCommand): CommandOutcome => {
    switch (command.name) {
      case "HELP":
        return done(helpText());

      case "EXIT":
        return { lines: ["Exiting..."], exit: true };

      case "CREATE":
        store.create(command.filename);
        return done(`[CREATE] File created: ${command.filename}`);

      case "READ":
        return done(
          `[READ] Content of file '${command.filename}':`,
          store.read(command.filename),
        );

      case "INSERT":
        store.insert(command.filename, command.content);
        return done(
          `[INSERT] Content inserted into file '${command.filename}':`,
          command.content,
          "Current content:",
          store.read(command.filename),
        );

      case "UPDATE":
        store.update(command.filename, command.content);
        return done(
          `[UPDATE] Content updated in file '${command.filename}':`,
          command.content,
          "Current content:",
          store.read(command.filename),
        );

      case "SNAPSHOT": {
        store.snapshot(command.filename, command.message);
        const lines = [`[SNAPSHOT] Snapshot created for file '${command.filename}'.`];
        if (command.message) {
          lines.push(`Message: ${command.message}`);
        }
        return done(...lines);
      }

      case "ROLLBACK": {
        const version = store.rollback(command.filename, command.versionId);
        const target =
          command.versionId === undefined
            ? "previous version"
            : `version ${command.versionId}`;
        return done(
          `[ROLLBACK] File '${command.filename}' rolled back to ${target}.`,
          "Current content:",
          version.content,
        );
      }

      case "HISTORY": {
        const snapshots = store.history(command.filename);
        const lines = [`[HISTORY] Snapshots for file '${command.filename}':`];
        if (snapshots.length === 0) {
          lines.push("(no snapshots yet)");
        }
        for (const version of snapshots) {
          lines.push(...formatHistoryEntry(version));
        }
        return done(...lines);
      }

      case "RECENT_FILES": {
        const files = store.recentFiles(command.count);
        return done(
          `[RECENT_FILES] Showing ${files.length} file(s):`,
          ...files.map((f) => `${f.filename} -> ${formatTime(f.lastModified)}`),
        );
      }

      case "BIGGEST_TREES": {
        const trees = store.biggestTrees(command.count);
        return done(
          `[BIGGEST_TREES] Showing ${trees.length} file(s) by version count:`,
          ...trees.map((t) => `${t.totalVersions} -> ${t.filename}`),
        );
      }
    }
  };

  return { handleCommand };
}
