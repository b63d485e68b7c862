import { InvalidTypeIdError } from '../errors/errors.js';

/**
 * Branded type for symbolic type identifiers.
 * Prevents accidental use of raw strings as registry keys.
 */
export type TypeId = string & { __brand: 'TypeId' };

/**
 * Create a type id from a symbolic type's name.
 *
 * Surrounding whitespace is dropped; an empty name is rejected because it
 * could never be told apart in diagnostics.
 *
 * @example
 * ```typescript
 * const BorderSidesId = typeId('BorderSides');
 * ```
 */
export function typeId(name: string): TypeId {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new InvalidTypeIdError(name);
  }
  return name.trim() as TypeId;
}

/**
 * Runtime check for values usable as a type id.
 */
export function isTypeId(x: unknown): x is TypeId {
  return typeof x === 'string' && x.length > 0 && x === x.trim();
}
