import type { BaseRecord, FieldSelector } from './types.js';

/**
 * Snapshot of one detected change. Change records of a digest pass are
 * linked through `nextChange` in registration order.
 */
export class ChangeRecord<H = unknown> implements BaseRecord<H> {
  private next: ChangeRecord<H> | null = null;

  constructor(
    readonly object: unknown,
    readonly field: FieldSelector,
    readonly handler: H,
    readonly currentValue: unknown,
    readonly previousValue: unknown
  ) {}

  /** The change detected after this one in the same pass, or null. */
  get nextChange(): ChangeRecord<H> | null {
    return this.next;
  }

  /** @internal Used by the digest to append the following change. */
  linkNext(change: ChangeRecord<H>): void {
    this.next = change;
  }
}

/**
 * Walk a change list from its head.
 */
export function* iterateChanges<H>(head: ChangeRecord<H> | null): Generator<ChangeRecord<H>> {
  for (let change = head; change !== null; change = change.nextChange) {
    yield change;
  }
}

export function changesToArray<H>(head: ChangeRecord<H> | null): ChangeRecord<H>[] {
  return Array.from(iterateChanges(head));
}
