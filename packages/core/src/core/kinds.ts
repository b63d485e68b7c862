/*
 * Integral kinds
 * --------------
 * Width arithmetic shared by the descriptor, the integral bridge and the
 * flag decomposer. Every value travels as a bigint; a kind only decides which
 * bigints are representable and how a bit pattern is read back.
 *
 *   signed n-bit:   [-2^(n-1), 2^(n-1) - 1]
 *   unsigned n-bit: [0, 2^n - 1]
 *
 * Signed values are stored as plain negative bigints. Bit algorithms work on
 * the two's-complement pattern returned by toUnsignedBits().
 */
import type { IntegralKind } from '../types/types.js';

export interface IntegralRange {
  readonly min: bigint;
  readonly max: bigint;
}

const rangeCache = new Map<string, IntegralRange>();

const keyOf = (kind: IntegralKind): string => `${kind.signed ? 'i' : 'u'}${kind.width}`;

/**
 * Human-readable kind name used in diagnostics (`Int32`, `UInt8`, ...).
 */
export function describeKind(kind: IntegralKind): string {
  return `${kind.signed ? 'Int' : 'UInt'}${kind.width}`;
}

export function isIntegralKind(x: unknown): x is IntegralKind {
  if (typeof x !== 'object' || x === null) return false;
  if (!('width' in x) || !('signed' in x)) return false;
  const { width, signed } = x;
  return (width === 8 || width === 16 || width === 32 || width === 64) && typeof signed === 'boolean';
}

/**
 * Inclusive range of values representable by a kind.
 */
export function integralRange(kind: IntegralKind): IntegralRange {
  const key = keyOf(kind);
  let range = rangeCache.get(key);
  if (!range) {
    const bits = BigInt(kind.width);
    range = kind.signed
      ? Object.freeze({ min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n })
      : Object.freeze({ min: 0n, max: (1n << bits) - 1n });
    rangeCache.set(key, range);
  }
  return range;
}

export function fitsIn(kind: IntegralKind, value: bigint): boolean {
  const { min, max } = integralRange(kind);
  return value >= min && value <= max;
}

/**
 * Reinterpret any bigint in the kind's width, the way an unchecked cast does:
 * higher bits are dropped and the result is sign-extended for signed kinds.
 */
export function wrapTo(kind: IntegralKind, value: bigint): bigint {
  return kind.signed ? BigInt.asIntN(kind.width, value) : BigInt.asUintN(kind.width, value);
}

/**
 * Two's-complement bit pattern of a value in the kind's width.
 */
export function toUnsignedBits(kind: IntegralKind, value: bigint): bigint {
  return BigInt.asUintN(kind.width, value);
}

/**
 * Bit pattern used for flag arithmetic.
 *
 * Negative values that fit the kind are read as two's complement in its
 * width. Anything else is used as it is, so bits outside the width survive
 * and show up as unrecognized.
 */
export function bitsOf(kind: IntegralKind, value: bigint): bigint {
  return value < 0n && fitsIn(kind, value) ? toUnsignedBits(kind, value) : value;
}

/**
 * Convert a host number to a bigint, or undefined when it has no exact
 * integral value (fractions, NaN, infinities, integers past 2^53 - 1).
 */
export function toBigInt(value: number | bigint): bigint | undefined {
  if (typeof value === 'bigint') return value;
  return Number.isSafeInteger(value) ? BigInt(value) : undefined;
}
