/*
 * Flag decomposition
 * ------------------
 * Splits combined values into the single-bit ("atomic") members of a
 * descriptor.
 *
 * Algorithm:
 *   1. atomic set = members whose bit pattern is a non-zero power of two,
 *      in declaration order
 *   2. walk the atomic set; emit every member whose bit is still present in
 *      the working copy, then clear that bit
 *   3. whatever is left in the working copy is reported as unrecognized
 *
 * Composite members (`All = Left | Right | Top | Bottom`) never appear in a
 * decomposition. An atomic value declared twice is emitted once, under its
 * first name, because step 2 checks the working copy.
 *
 * Nothing here throws: a value with unknown bits is inspectable data.
 */
import type { EnumDescriptor, EnumMember } from './descriptor.js';
import { bitsOf } from './kinds.js';

export interface FlagDecomposition {
  /** Matched atomic members, in declaration order. */
  readonly members: readonly EnumMember[];
  /** Bits of the input that match no atomic member (0n when exact). */
  readonly unrecognized: bigint;
}

/**
 * Atomic sets per descriptor.
 *
 * Kept beside the descriptor rather than on it: not every descriptor is a
 * flags type. WeakMap so dropped descriptors are collected.
 */
const atomicCache = new WeakMap<EnumDescriptor, readonly EnumMember[]>();
const maskCache = new WeakMap<EnumDescriptor, bigint>();

const isPowerOfTwo = (v: bigint): boolean => v > 0n && (v & (v - 1n)) === 0n;

/**
 * Members whose value is a single set bit, in declaration order.
 * On signed kinds the sign bit counts as a single bit.
 */
export function atomicMembers(descriptor: EnumDescriptor): readonly EnumMember[] {
  let atomic = atomicCache.get(descriptor);
  if (!atomic) {
    atomic = Object.freeze(descriptor.members.filter((m) => isPowerOfTwo(bitsOf(descriptor.kind, m.value))));
    atomicCache.set(descriptor, atomic);
  }
  return atomic;
}

/**
 * Union of every atomic member's bit.
 */
export function allAtomicBits(descriptor: EnumDescriptor): bigint {
  let mask = maskCache.get(descriptor);
  if (mask === undefined) {
    mask = 0n;
    for (const m of atomicMembers(descriptor)) mask |= bitsOf(descriptor.kind, m.value);
    maskCache.set(descriptor, mask);
  }
  return mask;
}

/**
 * Whether combined values of this descriptor are formatted as flags.
 *
 * Requires at least one atomic member. `flags: false` opts out; otherwise
 * the descriptor is flag-shaped.
 */
export function isFlagShaped(descriptor: EnumDescriptor): boolean {
  return atomicMembers(descriptor).length > 0 && (descriptor.flags ?? true);
}

/**
 * Strict flags check: at least one atomic member, and every declared value is
 * zero or a union of atomic members.
 */
export function isFlagsDescriptor(descriptor: EnumDescriptor): boolean {
  const mask = allAtomicBits(descriptor);
  if (mask === 0n) return false;
  return descriptor.members.every((m) => (bitsOf(descriptor.kind, m.value) & ~mask) === 0n);
}

export function decompose(descriptor: EnumDescriptor, raw: bigint): FlagDecomposition {
  let remaining = bitsOf(descriptor.kind, raw);
  const members: EnumMember[] = [];
  for (const m of atomicMembers(descriptor)) {
    if (remaining === 0n) break;
    const bit = bitsOf(descriptor.kind, m.value);
    if ((remaining & bit) === bit) {
      members.push(m);
      remaining &= ~bit;
    }
  }
  return { members, unrecognized: remaining };
}

/**
 * True when `raw` is made only of declared atomic members (0 included).
 */
export function isExactUnion(descriptor: EnumDescriptor, raw: bigint): boolean {
  return decompose(descriptor, raw).unrecognized === 0n;
}

/**
 * Count set bits by repeatedly clearing the lowest one (`v &= v - 1`).
 * O(popcount); negative values are counted over their 64-bit pattern.
 */
export function countSetBits(raw: bigint): number {
  let v = raw >= 0n ? raw : BigInt.asUintN(64, raw);
  let count = 0;
  while (v !== 0n) {
    v &= v - 1n;
    count++;
  }
  return count;
}

/**
 * Number of set bits in `raw` that belong to a declared atomic member.
 */
export function countSetAtomicBits(descriptor: EnumDescriptor, raw: bigint): number {
  return countSetBits(bitsOf(descriptor.kind, raw) & allAtomicBits(descriptor));
}

/**
 * `(raw & flag) === flag`. A zero flag is always contained.
 */
export function hasFlag(raw: bigint, flag: bigint): boolean {
  return (raw & flag) === flag;
}

export function intersect(a: bigint, b: bigint): bigint {
  return a & b;
}

/**
 * Bits of `a` that are not in `b`.
 */
export function except(a: bigint, b: bigint): bigint {
  return a & ~b;
}

export function union(...values: bigint[]): bigint {
  let acc = 0n;
  for (const v of values) acc |= v;
  return acc;
}
