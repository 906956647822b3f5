/**
 * Identity comparison used throughout the engine: strict equality, except
 * that NaN is identical to NaN (SameValueZero, the same rule Map keys use).
 */
export function isIdentical(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

/**
 * True for a non-null object or function, i.e. something with properties.
 */
export function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * True for objects that can be iterated with for...of.
 */
export function isIterableObject(value: unknown): value is Iterable<unknown> {
  return isObjectLike(value) && Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

/**
 * True for plain key/value objects: not a Map, not iterable.
 */
export function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !(value instanceof Map) && !isIterableObject(value);
}
