import { describe, it, expect, beforeEach } from "vitest";
import { ManualClock } from "../infra/clock.js";
import { NotFoundError } from "../infra/errors.js";
import { VersionStore } from "../versioning/index.js";
import { createCommandHandlers } from "./command-handlers.js";
import { helpText } from "./commands.js";

const START = Date.UTC(2026, 0, 2, 3, 4, 5);

describe("createCommandHandlers", () => {
  let clock: ManualClock;
  let store: VersionStore;
  let handleCommand: ReturnType<typeof createCommandHandlers>["handleCommand"];

  beforeEach(() => {
    clock = new ManualClock(START);
    store = new VersionStore({ clock });
    ({ handleCommand } = createCommandHandlers({ store }));
    handleCommand({ name: "CREATE", filename: "a" });
  });

  it("should print help", () => {
    expect(handleCommand({ name: "HELP" })).toEqual({ lines: [helpText()], exit: false });
  });

  it("should signal exit", () => {
    expect(handleCommand({ name: "EXIT" })).toEqual({ lines: ["Exiting..."], exit: true });
  });

  it("should confirm creation", () => {
    expect(handleCommand({ name: "CREATE", filename: "b" }).lines).toEqual([
      "[CREATE] File created: b",
    ]);
  });

  it("should echo inserted text and the resulting content", () => {
    handleCommand({ name: "INSERT", filename: "a", content: "Hello" });

    expect(handleCommand({ name: "INSERT", filename: "a", content: " world" }).lines).toEqual([
      "[INSERT] Content inserted into file 'a':",
      " world",
      "Current content:",
      "Hello world",
    ]);
  });

  it("should echo updated content", () => {
    expect(handleCommand({ name: "UPDATE", filename: "a", content: "fresh" }).lines).toEqual([
      "[UPDATE] Content updated in file 'a':",
      "fresh",
      "Current content:",
      "fresh",
    ]);
    expect(handleCommand({ name: "READ", filename: "a" }).lines).toEqual([
      "[READ] Content of file 'a':",
      "fresh",
    ]);
  });

  it("should show the snapshot message only when given", () => {
    handleCommand({ name: "INSERT", filename: "a", content: "x" });
    expect(handleCommand({ name: "SNAPSHOT", filename: "a", message: "v1" }).lines).toEqual([
      "[SNAPSHOT] Snapshot created for file 'a'.",
      "Message: v1",
    ]);

    handleCommand({ name: "INSERT", filename: "a", content: "y" });
    expect(handleCommand({ name: "SNAPSHOT", filename: "a", message: "" }).lines).toEqual([
      "[SNAPSHOT] Snapshot created for file 'a'.",
    ]);
  });

  it("should describe both rollback forms", () => {
    handleCommand({ name: "INSERT", filename: "a", content: "x" });

    expect(handleCommand({ name: "ROLLBACK", filename: "a" }).lines).toEqual([
      "[ROLLBACK] File 'a' rolled back to previous version.",
      "Current content:",
      "",
    ]);
    expect(handleCommand({ name: "ROLLBACK", filename: "a", versionId: 1 }).lines).toEqual([
      "[ROLLBACK] File 'a' rolled back to version 1.",
      "Current content:",
      "x",
    ]);
  });

  it("should format history with UTC timestamps", () => {
    handleCommand({ name: "INSERT", filename: "a", content: "x" });
    clock.advance(61_000);
    handleCommand({ name: "SNAPSHOT", filename: "a", message: "first" });

    expect(handleCommand({ name: "HISTORY", filename: "a" }).lines).toEqual([
      "[HISTORY] Snapshots for file 'a':",
      "Version 0",
      " | Created: 2026-01-02 03:04:05 | Snapshot: 2026-01-02 03:04:05 | Message: ",
      "Version 1",
      " | Created: 2026-01-02 03:04:05 | Snapshot: 2026-01-02 03:05:06 | Message: first",
    ]);
  });

  it("should list recent files", () => {
    clock.advance(1000);
    handleCommand({ name: "CREATE", filename: "b" });

    expect(handleCommand({ name: "RECENT_FILES" }).lines).toEqual([
      "[RECENT_FILES] Showing 2 file(s):",
      "b -> 2026-01-02 03:04:06",
      "a -> 2026-01-02 03:04:05",
    ]);
  });

  it("should list the biggest trees", () => {
    handleCommand({ name: "CREATE", filename: "b" });
    handleCommand({ name: "UPDATE", filename: "b", content: "x" });

    expect(handleCommand({ name: "BIGGEST_TREES", count: 1 }).lines).toEqual([
      "[BIGGEST_TREES] Showing 1 file(s) by version count:",
      "2 -> b",
    ]);
  });

  it("should use a custom time formatter", () => {
    const custom = createCommandHandlers({ store, formatTime: (ts) => `t${ts - START}` });

    expect(custom.handleCommand({ name: "RECENT_FILES", count: 1 }).lines).toEqual([
      "[RECENT_FILES] Showing 1 file(s):",
      "a -> t0",
    ]);
  });

  it("should let store errors propagate", () => {
    expect(() => handleCommand({ name: "READ", filename: "ghost" })).toThrow(NotFoundError);
  });
});
