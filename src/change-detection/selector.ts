/**
 * Field Selectors
 *
 * Parses the string forms of a selector into a FieldSelector and checks,
 * at registration time, that the selector can be applied to the object:
 * - `"."`  watch the object identity
 * - `"[]"` watch all items of a sequence
 * - `"{}"` watch all entries of a Map or plain object
 * - any other name: watch that field (or Map key)
 */

import type { FieldSelector, WatchedMap } from './types.js';
import { InvalidFieldSelectorError } from './errors.js';
import { isIterableObject, isObjectLike, isPlainObject } from '../utils/helpers.js';

export const IDENTITY_SELECTOR = '.';
export const COLLECTION_SELECTOR = '[]';
export const MAP_SELECTOR = '{}';

/**
 * Parse a selector string. Already-parsed selectors are returned as-is.
 */
export function parseFieldSelector(field: string | FieldSelector): FieldSelector {
  if (typeof field !== 'string') {
    if (field.kind === 'field' && field.name === '') {
      throw new InvalidFieldSelectorError('', 'field name cannot be empty');
    }
    return field;
  }

  switch (field) {
    case IDENTITY_SELECTOR:
      return { kind: 'identity' };
    case COLLECTION_SELECTOR:
      return { kind: 'collection' };
    case MAP_SELECTOR:
      return { kind: 'map' };
    case '':
      throw new InvalidFieldSelectorError(field, 'field name cannot be empty');
    default:
      return { kind: 'field', name: field };
  }
}

/**
 * Render a selector back to its string form (used in messages and output).
 */
export function formatFieldSelector(selector: FieldSelector): string {
  switch (selector.kind) {
    case 'identity':
      return IDENTITY_SELECTOR;
    case 'collection':
      return COLLECTION_SELECTOR;
    case 'map':
      return MAP_SELECTOR;
    case 'field':
      return selector.name;
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'Map';
  return typeof value;
}

/**
 * Narrow `object` to an iterable a CollectionDiffer can walk.
 * @throws InvalidFieldSelectorError for Maps, strings, one-shot iterators and non-iterables
 */
export function asIterable(object: unknown): Iterable<unknown> {
  if (object instanceof Map) {
    throw new InvalidFieldSelectorError(COLLECTION_SELECTOR, 'Map entries must be watched with "{}"');
  }
  if (!isIterableObject(object)) {
    throw new InvalidFieldSelectorError(
      COLLECTION_SELECTOR,
      `expected an iterable object, received ${describeValue(object)}`
    );
  }
  if (isOneShotIterator(object)) {
    throw new InvalidFieldSelectorError(
      COLLECTION_SELECTOR,
      'one-shot iterators cannot be re-read; watch the collection instead'
    );
  }
  return object;
}

// Generators and iterators returned by values(), entries() etc. are their
// own iterable and are exhausted by a single walk
function isOneShotIterator(object: Iterable<unknown>): boolean {
  const iterator: unknown = object[Symbol.iterator]();
  return iterator === object && 'next' in object && typeof object.next === 'function';
}

/**
 * Narrow `object` to a key/value collection a MapDiffer can walk.
 * @throws InvalidFieldSelectorError for anything but a Map or plain object
 */
export function asWatchedMap(object: unknown): WatchedMap {
  if (object instanceof Map || isPlainObject(object)) {
    return object;
  }
  throw new InvalidFieldSelectorError(
    MAP_SELECTOR,
    `expected a Map or plain object, received ${describeValue(object)}`
  );
}

/**
 * Validate that `selector` can be applied to `object`.
 * @throws InvalidFieldSelectorError when the shapes are incompatible
 */
export function validateSelectorTarget(object: unknown, selector: FieldSelector): void {
  switch (selector.kind) {
    case 'identity':
      return;
    case 'field':
      if (!isObjectLike(object)) {
        throw new InvalidFieldSelectorError(
          selector.name,
          `cannot read a field from ${describeValue(object)}`
        );
      }
      return;
    case 'collection':
      asIterable(object);
      return;
    case 'map':
      asWatchedMap(object);
      return;
  }
}

/**
 * Read a named field. Maps are read by key.
 */
export function readField(object: unknown, name: string): unknown {
  if (object instanceof Map) {
    return object.get(name);
  }
  if (!isObjectLike(object)) {
    throw new InvalidFieldSelectorError(name, `cannot read a field from ${describeValue(object)}`);
  }
  return Reflect.get(object, name);
}
