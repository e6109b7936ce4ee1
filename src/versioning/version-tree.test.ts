import { describe, it, expect, beforeEach } from "vitest";
import { ManualClock } from "../infra/clock.js";
import { ConflictError, OutOfRangeError, StateError, ValidationError } from "../infra/errors.js";
import { VersionTree } from "./version-tree.js";

describe("VersionTree", () => {
  let clock: ManualClock;
  let tree: VersionTree;

  beforeEach(() => {
    clock = new ManualClock(1000);
    tree = new VersionTree(clock);
  });

  describe("initial state", () => {
    it("should start with a snapshotted empty root", () => {
      expect(tree.read()).toBe("");
      expect(tree.totalVersions()).toBe(1);
      expect(tree.lastModified()).toBe(1000);
      expect(tree.active()).toEqual({
        id: 0,
        content: "",
        message: "",
        createdAt: 1000,
        snapshottedAt: 1000,
        parent: null,
        children: [],
      });
    });

    it("should list the root in history", () => {
      expect(tree.history().map((v) => v.id)).toEqual([0]);
    });
  });

  describe("insertContent", () => {
    it("should branch from a snapshotted version", () => {
      clock.set(2000);
      const version = tree.insertContent("X");

      expect(version).toEqual({
        id: 1,
        content: "X",
        message: "",
        createdAt: 2000,
        snapshottedAt: null,
        parent: 0,
        children: [],
      });
      expect(tree.getVersion(0).children).toEqual([1]);
      expect(tree.totalVersions()).toBe(2);
      expect(tree.lastModified()).toBe(2000);
    });

    it("should append in place while the version is open", () => {
      tree.insertContent("X");
      clock.set(3000);
      const version = tree.insertContent("Y");

      expect(version.id).toBe(1);
      expect(tree.read()).toBe("XY");
      expect(tree.totalVersions()).toBe(2);
      expect(tree.lastModified()).toBe(3000);
    });

    it("should carry the snapshotted content into the branch", () => {
      tree.insertContent("X");
      tree.snapshot("m1");
      const version = tree.insertContent("Y");

      expect(version.id).toBe(2);
      expect(version.parent).toBe(1);
      expect(tree.read()).toBe("XY");
      expect(tree.getVersion(1).content).toBe("X");
    });

    it("should accept an empty insert", () => {
      const version = tree.insertContent("");

      expect(version.id).toBe(1);
      expect(tree.read()).toBe("");
    });
  });

  describe("updateContent", () => {
    it("should branch with exactly the new text from a snapshot", () => {
      tree.insertContent("old");
      tree.snapshot();
      const version = tree.updateContent("new");

      expect(version.id).toBe(2);
      expect(version.content).toBe("new");
      expect(tree.getVersion(1).content).toBe("old");
    });

    it("should overwrite an open version in place", () => {
      tree.insertContent("old");
      const version = tree.updateContent("new");

      expect(version.id).toBe(1);
      expect(tree.read()).toBe("new");
      expect(tree.totalVersions()).toBe(2);
    });
  });

  describe("snapshot", () => {
    it("should freeze the active version with a message", () => {
      tree.insertContent("X");
      clock.set(5000);
      const version = tree.snapshot("first draft");

      expect(version.snapshottedAt).toBe(5000);
      expect(version.message).toBe("first draft");
      expect(tree.lastModified()).toBe(5000);
    });

    it("should refuse to snapshot twice", () => {
      expect(() => tree.snapshot("again")).toThrow(ConflictError);
      expect(() => tree.snapshot("again")).toThrow("Current version is already a snapshot");
    });

    it("should keep the tree unchanged when refusing", () => {
      clock.set(9000);
      expect(() => tree.snapshot()).toThrow(ConflictError);
      expect(tree.lastModified()).toBe(1000);
    });
  });

  describe("rollback", () => {
    it("should step to the parent version", () => {
      tree.insertContent("X");
      tree.snapshot("m1");
      tree.insertContent("Y");
      clock.set(7000);

      const version = tree.rollback();

      expect(version.id).toBe(1);
      expect(tree.read()).toBe("X");
      expect(tree.totalVersions()).toBe(3);
      expect(tree.lastModified()).toBe(7000);
      expect(tree.history().map((v) => [v.id, v.message])).toEqual([
        [0, ""],
        [1, "m1"],
      ]);
    });

    it("should fail at the root", () => {
      expect(() => tree.rollback()).toThrow(StateError);
      expect(() => tree.rollback()).toThrow("No parent version to rollback to");
    });

    it("should check out any version by id", () => {
      tree.insertContent("a");
      tree.snapshot();
      tree.rollback(0);
      tree.updateContent("b");

      expect(tree.active().id).toBe(2);
      expect(tree.active().parent).toBe(0);

      const version = tree.rollback(1);

      expect(version.content).toBe("a");
      expect(tree.getVersion(0).children).toEqual([1, 2]);
    });

    it("should reject out of range ids", () => {
      tree.insertContent("X");

      expect(() => tree.rollback(2)).toThrow(OutOfRangeError);
      expect(() => tree.rollback(2)).toThrow("Invalid version id for rollback: 2 (expected 0-1)");
      expect(() => tree.rollback(-1)).toThrow(OutOfRangeError);
      expect(tree.active().id).toBe(1);
    });

    it("should reject non-integer ids", () => {
      expect(() => tree.rollback(1.5)).toThrow(ValidationError);
      expect(() => tree.rollback(1.5)).toThrow("Version id must be an integer, got 1.5");
    });

    it("should allow editing an open version again after checkout", () => {
      tree.insertContent("open");
      tree.rollback(0);
      tree.rollback(1);
      tree.insertContent("!");

      expect(tree.read()).toBe("open!");
      expect(tree.totalVersions()).toBe(2);
    });
  });

  describe("history", () => {
    it("should skip open versions on the path", () => {
      tree.insertContent("X");

      expect(tree.history().map((v) => v.id)).toEqual([0]);
    });

    it("should only list versions with a snapshot time", () => {
      tree.insertContent("a");
      clock.set(4000);
      tree.snapshot("one");
      tree.insertContent("b");

      expect(tree.history().map((v) => [v.id, v.snapshottedAt])).toEqual([
        [0, 1000],
        [1, 4000],
      ]);
    });

    it("should only follow the active branch", () => {
      tree.insertContent("a");
      tree.snapshot("left");
      tree.rollback(0);
      tree.insertContent("b");
      tree.snapshot("right");

      expect(tree.history().map((v) => v.message)).toEqual(["", "right"]);
    });
  });

  describe("getVersion", () => {
    it("should return copies", () => {
      tree.insertContent("X");
      const first = tree.getVersion(0);
      const second = tree.getVersion(0);

      expect(first).toEqual(second);
      expect(first).not.toBe(second);
      expect(first.children).not.toBe(second.children);
    });

    it("should reject unknown ids", () => {
      expect(() => tree.getVersion(3)).toThrow("Invalid version id for lookup: 3 (expected 0-0)");
    });
  });
});
