import { describe, expect, it } from 'vitest';

import {
  bitsOf,
  describeKind,
  fitsIn,
  integralRange,
  isIntegralKind,
  toBigInt,
  toUnsignedBits,
  wrapTo,
} from '../src/core/kinds.js';
import { IntegralKinds } from '../src/types/types.js';

describe('integral kinds', () => {
  it('computes inclusive ranges for every width', () => {
    expect(integralRange(IntegralKinds.Int8)).toEqual({ min: -128n, max: 127n });
    expect(integralRange(IntegralKinds.UInt8)).toEqual({ min: 0n, max: 255n });
    expect(integralRange(IntegralKinds.Int16)).toEqual({ min: -32768n, max: 32767n });
    expect(integralRange(IntegralKinds.UInt32)).toEqual({ min: 0n, max: 4294967295n });
    expect(integralRange(IntegralKinds.Int64)).toEqual({ min: -(2n ** 63n), max: 2n ** 63n - 1n });
    expect(integralRange(IntegralKinds.UInt64).max).toBe(2n ** 64n - 1n);
  });

  it('returns the same frozen range object on repeated calls', () => {
    const first = integralRange(IntegralKinds.Int32);
    expect(integralRange({ width: 32, signed: true })).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('checks whether a value fits', () => {
    expect(fitsIn(IntegralKinds.UInt8, 255n)).toBe(true);
    expect(fitsIn(IntegralKinds.UInt8, 256n)).toBe(false);
    expect(fitsIn(IntegralKinds.UInt8, -1n)).toBe(false);
    expect(fitsIn(IntegralKinds.Int8, -128n)).toBe(true);
    expect(fitsIn(IntegralKinds.Int8, -129n)).toBe(false);
  });

  it('wraps values like an unchecked cast', () => {
    expect(wrapTo(IntegralKinds.UInt8, 256n)).toBe(0n);
    expect(wrapTo(IntegralKinds.UInt8, -1n)).toBe(255n);
    expect(wrapTo(IntegralKinds.Int8, 200n)).toBe(-56n);
    expect(wrapTo(IntegralKinds.Int64, 2n ** 63n)).toBe(-(2n ** 63n));
  });

  it('exposes two-complement bit patterns', () => {
    expect(toUnsignedBits(IntegralKinds.Int8, -1n)).toBe(255n);
    expect(toUnsignedBits(IntegralKinds.Int16, -2n)).toBe(65534n);
    expect(bitsOf(IntegralKinds.Int8, -128n)).toBe(128n);
    expect(bitsOf(IntegralKinds.UInt8, 300n)).toBe(300n);
    expect(bitsOf(IntegralKinds.UInt8, -1n)).toBe(-1n);
    expect(bitsOf(IntegralKinds.Int8, -129n)).toBe(-129n);
  });

  it('converts host numbers exactly or not at all', () => {
    expect(toBigInt(3)).toBe(3n);
    expect(toBigInt(-7)).toBe(-7n);
    expect(toBigInt(5n)).toBe(5n);
    expect(toBigInt(1.5)).toBeUndefined();
    expect(toBigInt(Number.NaN)).toBeUndefined();
    expect(toBigInt(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(toBigInt(Number.MAX_SAFE_INTEGER)).toBe(9007199254740991n);
    expect(toBigInt(Number.MAX_SAFE_INTEGER + 2)).toBeUndefined();
    expect(toBigInt(-(2 ** 60))).toBeUndefined();
  });

  it('names and validates kinds', () => {
    expect(describeKind(IntegralKinds.UInt16)).toBe('UInt16');
    expect(describeKind(IntegralKinds.Int64)).toBe('Int64');
    expect(isIntegralKind(IntegralKinds.Int32)).toBe(true);
    expect(isIntegralKind({ width: 12, signed: true })).toBe(false);
    expect(isIntegralKind({ width: 8 })).toBe(false);
    expect(isIntegralKind(null)).toBe(false);
  });
});
