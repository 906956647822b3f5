/**
 * Watch Run
 *
 * Every record and group marker of a detector lives in one doubly linked
 * list. A group owns only the boundaries of its contiguous run (its marker
 * and its tail), so a whole subtree can be spliced out by relinking the
 * entries on either side of it.
 */

import { DigestInProgressError } from './errors.js';

export abstract class RunEntry {
  /** @internal */
  prevEntry: RunEntry | null = null;
  /** @internal */
  nextEntry: RunEntry | null = null;
}

/**
 * Link `entry` directly after `anchor`.
 */
export function insertAfter(anchor: RunEntry, entry: RunEntry): void {
  const after = anchor.nextEntry;
  entry.prevEntry = anchor;
  entry.nextEntry = after;
  if (after) {
    after.prevEntry = entry;
  }
  anchor.nextEntry = entry;
}

/**
 * Splice the run `first..last` out of the list, joining its neighbours.
 * Entries inside the run keep their links to each other.
 */
export function unlinkRun(first: RunEntry, last: RunEntry): void {
  const before = first.prevEntry;
  const after = last.nextEntry;
  if (before) {
    before.nextEntry = after;
  }
  if (after) {
    after.prevEntry = before;
  }
  first.prevEntry = null;
  last.nextEntry = null;
}

/**
 * Shared by every group of one detector; tracks whether a digest pass is
 * running so the tree cannot be mutated underneath it.
 */
export class DigestState {
  private running = false;

  get active(): boolean {
    return this.running;
  }

  assertIdle(operation: string): void {
    if (this.running) {
      throw new DigestInProgressError(operation);
    }
  }

  run<T>(pass: () => T): T {
    this.assertIdle('start a digest');
    this.running = true;
    try {
      return pass();
    } finally {
      this.running = false;
    }
  }
}
