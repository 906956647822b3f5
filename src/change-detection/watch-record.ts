/**
 * Watch Record
 *
 * A single watched binding. The selector is resolved once, at registration,
 * into a Binding; check() dispatches on it without inspecting the object's
 * type again.
 */

import type { BaseRecord, FieldSelector } from './types.js';
import { RunEntry } from './run.js';
import { ChangeRecord } from './change-record.js';
import { CollectionDiffer } from './collection-differ.js';
import { MapDiffer } from './map-differ.js';
import { asIterable, asWatchedMap, readField, validateSelectorTarget } from './selector.js';
import { isIdentical } from '../utils/helpers.js';

type Binding =
  | { kind: 'field'; name: string }
  | { kind: 'identity' }
  | { kind: 'collection'; differ: CollectionDiffer }
  | { kind: 'map'; differ: MapDiffer };

function bind(object: unknown, field: FieldSelector): { binding: Binding; current: unknown } {
  switch (field.kind) {
    case 'field':
      return { binding: { kind: 'field', name: field.name }, current: readField(object, field.name) };
    case 'identity':
      return { binding: { kind: 'identity' }, current: object };
    case 'collection': {
      const differ = new CollectionDiffer(asIterable(object));
      return { binding: { kind: 'collection', differ }, current: differ.record };
    }
    case 'map': {
      const differ = new MapDiffer(asWatchedMap(object));
      return { binding: { kind: 'map', differ }, current: differ.record };
    }
  }
}

/**
 * The group a record belongs to.
 */
export interface RecordOwner<H> {
  readonly removed: boolean;
  detachRecord(record: WatchRecord<H>): void;
}

export class WatchRecord<H = unknown> extends RunEntry implements BaseRecord<H> {
  readonly field: FieldSelector;
  readonly handler: H;

  private readonly owner: RecordOwner<H>;
  private readonly binding: Binding;
  private watched: unknown;
  private current: unknown;
  private previous: unknown;
  private detached = false;

  /**
   * Use WatchGroup.watch() instead; this validates the selector against
   * `object` and captures its current value.
   */
  constructor(owner: RecordOwner<H>, object: unknown, field: FieldSelector, handler: H) {
    super();
    this.owner = owner;
    this.field = field;
    this.handler = handler;
    this.watched = object;

    const { binding, current } = bind(object, field);
    this.binding = binding;
    this.current = current;
  }

  get object(): unknown {
    return this.watched;
  }

  /**
   * Point the record at another object. The next check() compares against
   * the values cached from the previous object.
   * @throws InvalidFieldSelectorError when the selector does not fit `value`
   */
  set object(value: unknown) {
    validateSelectorTarget(value, this.field);
    this.watched = value;
  }

  get currentValue(): unknown {
    return this.current;
  }

  get previousValue(): unknown {
    return this.previous;
  }

  /** True once this record, or a group containing it, has been removed. */
  get removed(): boolean {
    return this.detached || this.owner.removed;
  }

  /**
   * Re-read the watched value and report a change, or null if there is none.
   * Collection and map watches report whenever their differ found any
   * addition, removal, move or changed entry.
   */
  check(): ChangeRecord<H> | null {
    let value: unknown;

    switch (this.binding.kind) {
      case 'field':
        value = readField(this.watched, this.binding.name);
        if (isIdentical(value, this.current)) return null;
        break;
      case 'identity':
        value = this.watched;
        if (isIdentical(value, this.current)) return null;
        break;
      case 'collection': {
        const record = this.binding.differ.check(asIterable(this.watched));
        if (record.isEmpty) return null;
        value = record;
        break;
      }
      case 'map': {
        const record = this.binding.differ.check(asWatchedMap(this.watched));
        if (record.isEmpty) return null;
        value = record;
        break;
      }
    }

    this.previous = this.current;
    this.current = value;
    return new ChangeRecord(this.watched, this.field, this.handler, this.current, this.previous);
  }

  /**
   * Remove this record from its group. Removing twice is a no-op.
   */
  remove(): void {
    if (this.detached) return;
    this.owner.detachRecord(this);
    this.detached = true;
  }
}
