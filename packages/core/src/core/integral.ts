import {
  IntegralOverflowError,
  UndefinedValueError,
  type IntegralBridgeFailure,
} from '../errors/errors.js';
import { err, ok, type Result } from '../types/types.js';
import type { EnumDescriptor } from './descriptor.js';
import { isExactUnion, isFlagShaped } from './flags.js';
import { fitsIn, toBigInt, wrapTo } from './kinds.js';

/**
 * Convert a member value to the widest integral representation.
 *
 * Exact: the value must be an integer that fits the descriptor's kind.
 * Nothing is rounded or truncated.
 *
 * @returns the value as a bigint, or an IntegralOverflowError
 */
export function toIntegral(
  descriptor: EnumDescriptor,
  value: number | bigint
): Result<bigint, IntegralOverflowError> {
  const v = toBigInt(value);
  if (v === undefined || !fitsIn(descriptor.kind, v)) {
    return err(new IntegralOverflowError(descriptor.typeId, value, descriptor.kind));
  }
  return ok(v);
}

/**
 * Reinterpret a raw integer as a value of the symbolic type.
 *
 * Permissive on purpose, like an unchecked cast: membership is not checked
 * and bits beyond the declared width are dropped. Use fromIntegralChecked()
 * to reject values the type does not declare.
 */
export function fromIntegral(descriptor: EnumDescriptor, raw: bigint): bigint {
  return wrapTo(descriptor.kind, raw);
}

/**
 * Strict counterpart of fromIntegral().
 *
 * Accepts `raw` when it fits the kind and is either a declared value or, for
 * flag-shaped descriptors, an exact union of atomic members.
 */
export function fromIntegralChecked(
  descriptor: EnumDescriptor,
  raw: bigint
): Result<bigint, IntegralBridgeFailure> {
  if (!fitsIn(descriptor.kind, raw)) {
    return err(new IntegralOverflowError(descriptor.typeId, raw, descriptor.kind));
  }
  if (descriptor.byValue.has(raw)) return ok(raw);
  if (isFlagShaped(descriptor) && isExactUnion(descriptor, raw)) return ok(raw);
  return err(new UndefinedValueError(descriptor.typeId, raw));
}
