/**
 * Change Detection
 *
 * Identity-based change detection over a tree of watch groups, with
 * structural diffs for sequences and key/value collections.
 *
 * Usage:
 * ```typescript
 * import { ChangeDetector, changesToArray } from './change-detection/index.js';
 *
 * const detector = new ChangeDetector<string>();
 * const user = { name: 'Ada', tags: ['a', 'b'] };
 *
 * detector.watch(user, 'name', 'render-name');
 * detector.newGroup().watch(user.tags, '[]', 'render-tags');
 *
 * user.name = 'Grace';
 * user.tags.push('c');
 *
 * for (const change of changesToArray(detector.collectChanges())) {
 *   console.log(change.handler, change.previousValue, '->', change.currentValue);
 * }
 * ```
 */

// Types
export type {
  FieldSelector,
  SelectorKind,
  BaseRecord,
  EvalExceptionHandler,
  CollectionChangeItem,
  MapKeyValue,
  WatchedMap,
  CollectionStats,
  MapStats,
} from './types.js';

// Errors
export {
  ErrorCode,
  ChangeDetectionError,
  InvalidFieldSelectorError,
  DigestInProgressError,
  GroupRemovedError,
  isChangeDetectionError,
} from './errors.js';

// Selectors
export {
  IDENTITY_SELECTOR,
  COLLECTION_SELECTOR,
  MAP_SELECTOR,
  parseFieldSelector,
  formatFieldSelector,
  validateSelectorTarget,
} from './selector.js';

// Differs
export {
  CollectionDiffer,
  CollectionChangeRecord,
  longestIncreasingSubsequence,
} from './collection-differ.js';
export { MapDiffer, MapChangeRecord } from './map-differ.js';

// Watch tree
export { ChangeRecord, iterateChanges, changesToArray } from './change-record.js';
export { WatchRecord } from './watch-record.js';
export { WatchGroup } from './watch-group.js';
export { ChangeDetector, type ChangeDetectorOptions } from './detector.js';

// Summaries
export {
  getCollectionStats,
  getMapStats,
  summarizeCollectionChanges,
  summarizeMapChanges,
  summarizeDigest,
} from './summary.js';
