/**
 * Change Detection Types
 *
 * Shared shapes for watch records, change records and the structural
 * change records produced by the collection and map differs.
 */

/**
 * What a WatchRecord observes on its object.
 * - `field`: a named property (or key, when the object is a Map)
 * - `collection`: every item of an iterable, diffed structurally
 * - `map`: every entry of a Map or plain object, diffed by key
 * - `identity`: the object reference itself
 */
export type FieldSelector =
  | { kind: 'field'; name: string }
  | { kind: 'collection' }
  | { kind: 'map' }
  | { kind: 'identity' };

export type SelectorKind = FieldSelector['kind'];

/**
 * Fields common to a live WatchRecord and the ChangeRecord it produces.
 */
export interface BaseRecord<H> {
  /** The observed object. */
  readonly object: unknown;
  readonly field: FieldSelector;
  /** Opaque value supplied at registration; never inspected by the engine. */
  readonly handler: H;
  readonly currentValue: unknown;
  readonly previousValue: unknown;
}

/**
 * Called for each record whose check() throws during a digest pass.
 */
export type EvalExceptionHandler<H> = (error: unknown, record: BaseRecord<H>) => void;

/**
 * One item of a diffed sequence. `previousIndex` is null for additions,
 * `currentIndex` is null for removals.
 */
export interface CollectionChangeItem<V> {
  readonly previousIndex: number | null;
  readonly currentIndex: number | null;
  readonly item: V;
}

/**
 * One entry of a diffed key/value collection. The absent side of an
 * addition or removal is undefined.
 */
export interface MapKeyValue<K, V> {
  readonly key: K;
  readonly previousValue: V | undefined;
  readonly currentValue: V | undefined;
}

/**
 * Key/value collections a MapDiffer understands.
 */
export type WatchedMap<V = unknown> = Map<unknown, V> | { [key: string]: V };

/**
 * Counts of a collection diff, mainly for logging.
 */
export interface CollectionStats {
  items: number;
  additions: number;
  moves: number;
  removals: number;
}

export interface MapStats {
  entries: number;
  changes: number;
  additions: number;
  removals: number;
}
