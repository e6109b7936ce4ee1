/**
 * Ranked Index - max-heap over (key, filename) with O(log n) removal by filename.
 *
 * Every content mutation leaves a stale entry for its file behind. The index
 * keeps its own filename -> array position map, so the stale entry is found
 * in O(1) and excised in O(log n) instead of scanning the heap.
 *
 * Ordering: higher key first; equal keys fall back to ascending filename so
 * results are reproducible for a given sequence of inserts and removals.
 */

import { OutOfRangeError, ValidationError } from "../infra/errors.js";

export interface RankedEntry<K> {
  key: K;
  filename: string;
}

/**
 * Returns > 0 when `a` ranks above `b`, < 0 when below, 0 when equal
 */
export type KeyComparator<K> = (a: K, b: K) => number;

export const compareNumbers: KeyComparator<number> = (a, b) => a - b;

export class RankedIndex<K> {
  private heap: RankedEntry<K>[] = [];
  private positions = new Map<string, number>();

  constructor(private readonly compareKeys: KeyComparator<K>) {}

  get size(): number {
    return this.heap.length;
  }

  has(filename: string): boolean {
    return this.positions.has(filename);
  }

  /**
   * Current array position of a file's entry, or undefined if not indexed
   */
  positionOf(filename: string): number | undefined {
    return this.positions.get(filename);
  }

  keyOf(filename: string): K | undefined {
    const idx = this.positions.get(filename);
    return idx === undefined ? undefined : this.heap[idx].key;
  }

  peek(): RankedEntry<K> | undefined {
    const top = this.heap[0];
    return top ? { ...top } : undefined;
  }

  /**
   * Insert an entry. A filename that is already indexed has its old entry
   * replaced, so there is never more than one entry per file.
   */
  insert(key: K, filename: string): void {
    this.removeByFilename(filename);
    this.heap.push({ key, filename });
    this.positions.set(filename, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Extract the top entry from the live index
   */
  pop(): RankedEntry<K> | undefined {
    if (this.heap.length === 0) {
      return undefined;
    }
    const top = this.heap[0];
    this.removeAt(0);
    return top;
  }

  /**
   * Remove a file's entry. Returns false (and does nothing) when the file was
   * never indexed.
   */
  removeByFilename(filename: string): boolean {
    const idx = this.positions.get(filename);
    if (idx === undefined) {
      return false;
    }
    this.removeAt(idx);
    return true;
  }

  /**
   * Top `k` entries, highest first. Runs extract-max on a disposable copy;
   * the live index is left exactly as it was.
   *
   * @param k - defaults to every entry
   */
  topK(k: number = this.heap.length): RankedEntry<K>[] {
    if (!Number.isInteger(k) || k < 0) {
      throw new ValidationError(`Requested count must be a non-negative integer, got ${k}`);
    }
    if (k > this.heap.length) {
      throw new OutOfRangeError(
        `Requested ${k} file(s) but only ${this.heap.length} file(s) are indexed`,
      );
    }

    const scratch = this.clone();
    const result: RankedEntry<K>[] = [];
    for (let i = 0; i < k; i++) {
      const top = scratch.pop();
      if (!top) break;
      result.push(top);
    }
    return result;
  }

  /**
   * Entries in heap (array) order
   */
  entries(): RankedEntry<K>[] {
    return this.heap.map((entry) => ({ ...entry }));
  }

  clone(): RankedIndex<K> {
    const copy = new RankedIndex<K>(this.compareKeys);
    copy.heap = this.entries();
    copy.positions = new Map(this.positions);
    return copy;
  }

  private removeAt(idx: number): void {
    const lastIdx = this.heap.length - 1;
    if (idx !== lastIdx) {
      this.swap(idx, lastIdx);
    }
    const removed = this.heap.pop();
    if (removed) {
      this.positions.delete(removed.filename);
    }
    // The former last entry now sits at idx and may belong above or below it
    if (idx < this.heap.length) {
      this.siftDown(this.siftUp(idx));
    }
  }

  private outranks(a: RankedEntry<K>, b: RankedEntry<K>): boolean {
    const byKey = this.compareKeys(a.key, b.key);
    if (byKey !== 0) {
      return byKey > 0;
    }
    return a.filename < b.filename;
  }

  private siftUp(idx: number): number {
    while (idx > 0) {
      const parentIdx = Math.floor((idx - 1) / 2);
      if (!this.outranks(this.heap[idx], this.heap[parentIdx])) break;
      this.swap(idx, parentIdx);
      idx = parentIdx;
    }
    return idx;
  }

  private siftDown(idx: number): number {
    const length = this.heap.length;
    while (true) {
      const leftIdx = 2 * idx + 1;
      const rightIdx = 2 * idx + 2;
      let best = idx;

      if (leftIdx < length && this.outranks(this.heap[leftIdx], this.heap[best])) {
        best = leftIdx;
      }
      if (rightIdx < length && this.outranks(this.heap[rightIdx], this.heap[best])) {
        best = rightIdx;
      }
      if (best === idx) break;
      this.swap(idx, best);
      idx = best;
    }
    return idx;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.positions.set(b.filename, i);
    this.positions.set(a.filename, j);
  }
}
