/**
 * Collection Differ
 *
 * Structural diff for order-sensitive sequences under identity comparison.
 * Each check() pairs the current items with the previous snapshot and
 * reports additions, removals and the minimal set of moves:
 *
 * 1. Previous positions are bucketed by item identity into FIFO queues, so
 *    repeated values pair first-seen with first-reused.
 * 2. Matched items whose previous positions form the longest increasing
 *    subsequence keep their relative order and are not moves; every other
 *    matched item is a move.
 * 3. Unmatched previous items are removals, unmatched current items are
 *    additions.
 */

import type { CollectionChangeItem } from './types.js';

/**
 * Result of one CollectionDiffer check. All lists are in iteration order:
 * current order for items, additions and moves, previous order for removals.
 */
export class CollectionChangeRecord<V = unknown> {
  constructor(
    readonly iterable: Iterable<V>,
    readonly items: readonly CollectionChangeItem<V>[],
    readonly additions: readonly CollectionChangeItem<V>[],
    readonly moves: readonly CollectionChangeItem<V>[],
    readonly removals: readonly CollectionChangeItem<V>[]
  ) {}

  get isEmpty(): boolean {
    return this.additions.length === 0 && this.moves.length === 0 && this.removals.length === 0;
  }

  forEachAddition(fn: (addition: CollectionChangeItem<V>) => void): void {
    this.additions.forEach((item) => fn(item));
  }

  forEachMove(fn: (move: CollectionChangeItem<V>) => void): void {
    this.moves.forEach((item) => fn(item));
  }

  forEachRemoval(fn: (removal: CollectionChangeItem<V>) => void): void {
    this.removals.forEach((item) => fn(item));
  }
}

/**
 * Indices (into `sequence`) of one longest strictly increasing subsequence.
 * Patience sorting with predecessor links, O(n log n).
 */
export function longestIncreasingSubsequence(sequence: readonly number[]): Set<number> {
  const tails: number[] = []; // tails[k] = index of smallest tail of a run of length k + 1
  const predecessors: number[] = new Array<number>(sequence.length).fill(-1);

  for (let i = 0; i < sequence.length; i++) {
    const value = sequence[i];
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (sequence[tails[mid]] < value) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    if (lo > 0) {
      predecessors[i] = tails[lo - 1];
    }
    tails[lo] = i;
  }

  const result = new Set<number>();
  let cursor = tails.length > 0 ? tails[tails.length - 1] : -1;
  while (cursor !== -1) {
    result.add(cursor);
    cursor = predecessors[cursor];
  }
  return result;
}

/**
 * Stateful differ for one watched sequence. Retains the previous iteration
 * snapshot between checks.
 */
export class CollectionDiffer<V = unknown> {
  private previous: V[];
  private lastRecord: CollectionChangeRecord<V>;

  constructor(initial?: Iterable<V>) {
    this.previous = initial ? Array.from(initial) : [];
    const items = this.previous.map((item, index) => ({ previousIndex: index, currentIndex: index, item }));
    this.lastRecord = new CollectionChangeRecord(initial ?? this.previous, items, [], [], []);
  }

  /** The change record produced by the most recent check (or the initial snapshot). */
  get record(): CollectionChangeRecord<V> {
    return this.lastRecord;
  }

  /**
   * Diff `iterable` against the previous snapshot and make it the new one.
   */
  check(iterable: Iterable<V>): CollectionChangeRecord<V> {
    const current = Array.from(iterable);

    // Step 1: FIFO buckets of previous positions per identity.
    // Map keys use SameValueZero, which is the engine's identity rule.
    const buckets = new Map<V, number[]>();
    this.previous.forEach((item, index) => {
      const bucket = buckets.get(item);
      if (bucket) {
        bucket.push(index);
      } else {
        buckets.set(item, [index]);
      }
    });
    const consumedCount = new Map<V, number>();
    const consumed = new Array<boolean>(this.previous.length).fill(false);

    // Step 2: pair each current item with the oldest unconsumed previous one
    const previousIndexOf: Array<number | null> = current.map((item) => {
      const bucket = buckets.get(item);
      const used = consumedCount.get(item) ?? 0;
      if (!bucket || used >= bucket.length) {
        return null;
      }
      consumedCount.set(item, used + 1);
      consumed[bucket[used]] = true;
      return bucket[used];
    });

    // Step 3: survivors outside the longest in-order run are moves
    const survivorPositions: number[] = [];
    const survivorPrevious: number[] = [];
    previousIndexOf.forEach((previousIndex, currentIndex) => {
      if (previousIndex !== null) {
        survivorPositions.push(currentIndex);
        survivorPrevious.push(previousIndex);
      }
    });
    const stable = new Set<number>();
    for (const k of longestIncreasingSubsequence(survivorPrevious)) {
      stable.add(survivorPositions[k]);
    }

    const items: CollectionChangeItem<V>[] = [];
    const additions: CollectionChangeItem<V>[] = [];
    const moves: CollectionChangeItem<V>[] = [];
    current.forEach((item, currentIndex) => {
      const entry = { previousIndex: previousIndexOf[currentIndex], currentIndex, item };
      items.push(entry);
      if (entry.previousIndex === null) {
        additions.push(entry);
      } else if (!stable.has(currentIndex)) {
        moves.push(entry);
      }
    });

    // Step 4: unconsumed previous items, in their original order
    const removals: CollectionChangeItem<V>[] = [];
    this.previous.forEach((item, previousIndex) => {
      if (!consumed[previousIndex]) {
        removals.push({ previousIndex, currentIndex: null, item });
      }
    });

    this.previous = current;
    this.lastRecord = new CollectionChangeRecord(iterable, items, additions, moves, removals);
    return this.lastRecord;
  }
}
