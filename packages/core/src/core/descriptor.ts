/*
 * EnumDescriptor
 * --------------
 * Immutable metadata for one symbolic type:
 *  - ordered members (declaration order is kept; it drives formatting)
 *  - the integral kind backing the type
 *  - lookup indices built once at construction:
 *      name -> value
 *      lower-cased name -> declared name (first declared wins)
 *      value -> first declared name (aliases share a value)
 *
 * Descriptors are frozen before they are returned. Caching and sharing them is
 * the registry's job; building one has no side effects.
 */
import {
  DuplicateMemberNameError,
  EmptyMembersError,
  NonIntegralMemberError,
  ValueOutOfRangeError,
} from '../errors/errors.js';
import type { DescriptorOptions, IntegralKind, RawMember } from '../types/types.js';
import { fitsIn, toBigInt } from './kinds.js';
import type { TypeId } from './type-id.js';

export interface EnumMember {
  readonly name: string;
  readonly value: bigint;
}

export interface EnumDescriptor {
  readonly typeId: TypeId;
  readonly kind: IntegralKind;
  /** Members in declaration order. */
  readonly members: readonly EnumMember[];
  /** Explicit flags hint; undefined means "infer from the members". */
  readonly flags: boolean | undefined;
  readonly byName: ReadonlyMap<string, bigint>;
  readonly byFoldedName: ReadonlyMap<string, string>;
  readonly byValue: ReadonlyMap<bigint, string>;
}

const fold = (name: string): string => name.toLowerCase();

/**
 * Build a descriptor from a type's declared members.
 *
 * @throws EmptyMembersError when `rawMembers` is empty
 * @throws NonIntegralMemberError when a value is not an integer
 * @throws ValueOutOfRangeError when a value does not fit `kind`
 * @throws DuplicateMemberNameError when a name is declared twice
 *
 * @example
 * ```typescript
 * const sides = buildDescriptor(typeId('BorderSides'), [
 *   { name: 'None', value: 0 },
 *   { name: 'Left', value: 1 },
 *   { name: 'Right', value: 2 },
 * ], IntegralKinds.Int32);
 * ```
 */
export function buildDescriptor(
  id: TypeId,
  rawMembers: readonly RawMember[],
  kind: IntegralKind,
  options: DescriptorOptions = {}
): EnumDescriptor {
  if (rawMembers.length === 0) throw new EmptyMembersError(id);

  const members: EnumMember[] = [];
  const byName = new Map<string, bigint>();
  const byFoldedName = new Map<string, string>();
  const byValue = new Map<bigint, string>();

  for (const raw of rawMembers) {
    const value = toBigInt(raw.value);
    if (value === undefined) throw new NonIntegralMemberError(id, raw.name, raw.value);
    if (!fitsIn(kind, value)) throw new ValueOutOfRangeError(id, raw.name, value, kind);
    if (byName.has(raw.name)) throw new DuplicateMemberNameError(id, raw.name);

    members.push(Object.freeze({ name: raw.name, value }));
    byName.set(raw.name, value);
    const folded = fold(raw.name);
    if (!byFoldedName.has(folded)) byFoldedName.set(folded, raw.name);
    if (!byValue.has(value)) byValue.set(value, raw.name);
  }

  return Object.freeze({
    typeId: id,
    kind: Object.freeze({ width: kind.width, signed: kind.signed }),
    members: Object.freeze(members),
    flags: options.flags,
    byName,
    byFoldedName,
    byValue,
  });
}

/** Member names in declaration order. */
export function names(descriptor: EnumDescriptor): string[] {
  return descriptor.members.map((m) => m.name);
}

/** Member values in declaration order, aliases included. */
export function values(descriptor: EnumDescriptor): bigint[] {
  return descriptor.members.map((m) => m.value);
}

export function valueOf(descriptor: EnumDescriptor, name: string): bigint | undefined {
  return descriptor.byName.get(name);
}

/**
 * First declared name carrying `value`, or undefined.
 */
export function nameOf(descriptor: EnumDescriptor, value: bigint): string | undefined {
  return descriptor.byValue.get(value);
}

/**
 * Look up a member by name.
 *
 * With `ignoreCase`, an exact match still wins over a case-folded one, so
 * `Left` finds `Left` even when `LEFT` is declared earlier.
 */
export function findMember(descriptor: EnumDescriptor, name: string, ignoreCase = false): EnumMember | undefined {
  let declared: string | undefined = descriptor.byName.has(name) ? name : undefined;
  if (declared === undefined && ignoreCase) declared = descriptor.byFoldedName.get(fold(name));
  if (declared === undefined) return undefined;
  const value = descriptor.byName.get(declared);
  return value === undefined ? undefined : { name: declared, value };
}

/**
 * Whether a name, or a single value, is declared.
 *
 * Combined flag values are not "defined" unless declared as a member; use
 * isExactUnion() for those.
 */
export function isDefined(descriptor: EnumDescriptor, nameOrValue: string | bigint): boolean {
  return typeof nameOrValue === 'string'
    ? descriptor.byName.has(nameOrValue)
    : descriptor.byValue.has(nameOrValue);
}
