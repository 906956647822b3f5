/**
 * Map Differ
 *
 * Diff for key/value collections. Keys are stable identifiers, so there is
 * no move concept: an entry is either changed (same key, value no longer
 * identical), added or removed.
 */

import type { MapKeyValue, WatchedMap } from './types.js';
import { isIdentical } from '../utils/helpers.js';

/**
 * Result of one MapDiffer check. `entries`, `changes` and `additions` follow
 * the collection's iteration order at check time; `removals` follow the
 * previous snapshot's order.
 */
export class MapChangeRecord<V = unknown> {
  constructor(
    readonly map: WatchedMap<V>,
    readonly entries: readonly MapKeyValue<unknown, V>[],
    readonly changes: readonly MapKeyValue<unknown, V>[],
    readonly additions: readonly MapKeyValue<unknown, V>[],
    readonly removals: readonly MapKeyValue<unknown, V>[]
  ) {}

  get isEmpty(): boolean {
    return this.changes.length === 0 && this.additions.length === 0 && this.removals.length === 0;
  }

  forEachChange(fn: (change: MapKeyValue<unknown, V>) => void): void {
    this.changes.forEach((entry) => fn(entry));
  }

  forEachAddition(fn: (addition: MapKeyValue<unknown, V>) => void): void {
    this.additions.forEach((entry) => fn(entry));
  }

  forEachRemoval(fn: (removal: MapKeyValue<unknown, V>) => void): void {
    this.removals.forEach((entry) => fn(entry));
  }
}

/**
 * Snapshot the entries of a Map (by entries()) or a plain object (own
 * enumerable string keys), in iteration order.
 */
export function snapshotEntries<V>(map: WatchedMap<V>): Map<unknown, V> {
  if (map instanceof Map) {
    return new Map(map);
  }
  return new Map<unknown, V>(Object.entries(map));
}

/**
 * Stateful differ for one watched key/value collection.
 */
export class MapDiffer<V = unknown> {
  private previous: Map<unknown, V>;
  private lastRecord: MapChangeRecord<V>;

  constructor(initial?: WatchedMap<V>) {
    this.previous = initial ? snapshotEntries(initial) : new Map();
    const entries: MapKeyValue<unknown, V>[] = [];
    this.previous.forEach((value, key) => {
      entries.push({ key, previousValue: value, currentValue: value });
    });
    this.lastRecord = new MapChangeRecord<V>(initial ?? new Map(), entries, [], [], []);
  }

  get record(): MapChangeRecord<V> {
    return this.lastRecord;
  }

  /**
   * Diff `map` against the previous snapshot and make it the new one.
   */
  check(map: WatchedMap<V>): MapChangeRecord<V> {
    const current = snapshotEntries(map);
    const entries: MapKeyValue<unknown, V>[] = [];
    const changes: MapKeyValue<unknown, V>[] = [];
    const additions: MapKeyValue<unknown, V>[] = [];
    const removals: MapKeyValue<unknown, V>[] = [];

    current.forEach((currentValue, key) => {
      if (this.previous.has(key)) {
        const previousValue = this.previous.get(key);
        const entry: MapKeyValue<unknown, V> = { key, previousValue, currentValue };
        entries.push(entry);
        if (!isIdentical(previousValue, currentValue)) {
          changes.push(entry);
        }
      } else {
        const entry: MapKeyValue<unknown, V> = { key, previousValue: undefined, currentValue };
        entries.push(entry);
        additions.push(entry);
      }
    });

    this.previous.forEach((previousValue, key) => {
      if (!current.has(key)) {
        removals.push({ key, previousValue, currentValue: undefined });
      }
    });

    this.previous = current;
    this.lastRecord = new MapChangeRecord<V>(map, entries, changes, additions, removals);
    return this.lastRecord;
  }
}
