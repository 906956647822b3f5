/**
 * Watch Group
 *
 * Groups related watches and guarantees they are reported in registration
 * order. The traversal order of a detector is pre-order: a group's own
 * records, then each child group's subtree in creation order.
 *
 * Layout inside the shared run:
 *
 *   [group marker] [own records ...] [child 1 run] [child 2 run] ...
 *                                ^ recordTail              tail ^
 *
 * New records go after `recordTail`, new child groups after `tail`, and
 * remove() splices out `marker..tail` in one step.
 */

import type { FieldSelector } from './types.js';
import { RunEntry, DigestState, insertAfter, unlinkRun } from './run.js';
import { WatchRecord, type RecordOwner } from './watch-record.js';
import { parseFieldSelector } from './selector.js';
import { GroupRemovedError } from './errors.js';

export class WatchGroup<H = unknown> extends RunEntry implements RecordOwner<H> {
  protected readonly digest: DigestState;
  private readonly parent: WatchGroup<H> | null;
  private readonly children = new Set<WatchGroup<H>>();
  /** Last of this group's own records, or the marker when there are none */
  private recordTail: RunEntry = this;
  /** Last entry of this group's whole subtree */
  private tail: RunEntry = this;
  private ownRecords = 0;
  private detached = false;

  protected constructor(parent: WatchGroup<H> | null, digest: DigestState) {
    super();
    this.parent = parent;
    this.digest = digest;
  }

  /** True once this group or any of its ancestors has been removed. */
  get removed(): boolean {
    for (let group: WatchGroup<H> | null = this; group !== null; group = group.parent) {
      if (group.detached) return true;
    }
    return false;
  }

  /** Number of live records registered directly on this group. */
  get recordCount(): number {
    return this.ownRecords;
  }

  /** Number of live child groups. */
  get groupCount(): number {
    return this.children.size;
  }

  /**
   * Watch `field` on `object`:
   * - a name watches that field (or Map key)
   * - `"[]"` watches all items of an iterable
   * - `"{}"` watches all entries of a Map or plain object
   * - `"."` watches the object identity
   *
   * @throws InvalidFieldSelectorError when the selector does not fit `object`
   * @throws DigestInProgressError during a digest pass
   * @throws GroupRemovedError when the group has been removed
   */
  watch(object: unknown, field: string | FieldSelector, handler: H): WatchRecord<H> {
    this.assertWritable('register a watch');

    const record = new WatchRecord<H>(this, object, parseFieldSelector(field), handler);
    const previousTail = this.recordTail;
    insertAfter(previousTail, record);
    this.recordTail = record;
    this.replaceTail(previousTail, record);
    this.ownRecords++;
    return record;
  }

  /**
   * Create a child group, ordered after every existing child.
   */
  newGroup(): WatchGroup<H> {
    this.assertWritable('create a group');

    const child = new WatchGroup<H>(this, this.digest);
    const previousTail = this.tail;
    insertAfter(previousTail, child);
    this.children.add(child);
    this.replaceTail(previousTail, child);
    return child;
  }

  /**
   * Detach this group, its descendants and all of their records. The cost
   * does not depend on how many records the subtree holds. Removing an
   * already-removed group is a no-op.
   */
  remove(): void {
    if (this.removed) return;
    this.digest.assertIdle('remove a watch group');

    if (this.parent === null) {
      // Root: drop everything after the marker.
      const first = this.nextEntry;
      if (first) {
        unlinkRun(first, this.tail);
      }
      this.tail = this;
      this.recordTail = this;
      this.children.clear();
    } else {
      const before = this.prevEntry;
      const last = this.tail;
      unlinkRun(this, last);
      this.parent.children.delete(this);
      if (before) {
        this.parent.replaceTail(last, before);
      }
    }

    this.detached = true;
  }

  /**
   * Records of this group's subtree, in digest order.
   */
  *records(): Generator<WatchRecord<H>> {
    const last = this.tail;
    let entry: RunEntry | null = this;
    while (entry !== last && entry !== null) {
      entry = entry.nextEntry;
      if (entry instanceof WatchRecord) {
        yield entry;
      }
    }
  }

  /** @internal */
  detachRecord(record: WatchRecord<H>): void {
    this.digest.assertIdle('remove a watch record');

    const before = record.prevEntry;
    unlinkRun(record, record);
    this.ownRecords--;
    if (before) {
      if (this.recordTail === record) {
        this.recordTail = before;
      }
      this.replaceTail(record, before);
    }
  }

  /**
   * Move the tail of this group, and of every ancestor that ended at the
   * same entry, from `oldTail` to `newTail`.
   */
  private replaceTail(oldTail: RunEntry, newTail: RunEntry): void {
    for (
      let group: WatchGroup<H> | null = this;
      group !== null && group.tail === oldTail;
      group = group.parent
    ) {
      group.tail = newTail;
    }
  }

  private assertWritable(operation: string): void {
    this.digest.assertIdle(operation);
    if (this.removed) {
      throw new GroupRemovedError(operation);
    }
  }
}
