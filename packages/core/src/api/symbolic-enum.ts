import {
  findMember,
  isDefined,
  names,
  valueOf,
  type EnumDescriptor,
  type EnumMember,
} from '../core/descriptor.js';
import {
  atomicMembers,
  countSetAtomicBits,
  decompose,
  hasFlag,
  isExactUnion,
  isFlagShaped,
  type FlagDecomposition,
} from '../core/flags.js';
import { fromIntegral, fromIntegralChecked, toIntegral } from '../core/integral.js';
import { format, formatAs, parse } from '../core/text-codec.js';
import type { TypeId } from '../core/type-id.js';
import {
  UnknownMemberError,
  type IntegralBridgeFailure,
  type IntegralOverflowError,
  type ParseFailure,
} from '../errors/errors.js';
import type { FormatSpecifier, ParseOptions, Result } from '../types/types.js';

/**
 * Typed view over a descriptor.
 *
 * `N` is the union of member names, so `value('Left')` and
 * `combine('Left', 'Top')` are checked at compile time. Every method
 * delegates to the free functions of the core modules; the class holds no
 * state besides the (immutable) descriptor and can be shared freely.
 *
 * @template N - Member names of the symbolic type
 *
 * @example
 * ```typescript
 * const Sides = defineEnum(BorderSides, { name: 'BorderSides' });
 * Sides.format(Sides.combine('Left', 'Right')); // 'Left, Right'
 * ```
 */
export class SymbolicEnum<N extends string = string> {
  constructor(readonly descriptor: EnumDescriptor) {}

  get typeId(): TypeId {
    return this.descriptor.typeId;
  }

  /** Member names in declaration order. */
  get names(): N[] {
    return names(this.descriptor).filter((n): n is N => this.isName(n));
  }

  get members(): readonly EnumMember[] {
    return this.descriptor.members;
  }

  get isFlags(): boolean {
    return isFlagShaped(this.descriptor);
  }

  /** Single-bit members, in declaration order. */
  get atomicNames(): N[] {
    return atomicMembers(this.descriptor)
      .map((m) => m.name)
      .filter((n): n is N => this.isName(n));
  }

  isName(name: string): name is N {
    return this.descriptor.byName.has(name);
  }

  /**
   * @throws UnknownMemberError when `name` is not declared (only possible
   * when the compile-time check was bypassed)
   */
  value(name: N): bigint {
    const v = valueOf(this.descriptor, name);
    if (v === undefined) throw new UnknownMemberError(this.typeId, name, names(this.descriptor));
    return v;
  }

  /** OR the values of the given members together. */
  combine(...memberNames: N[]): bigint {
    let acc = 0n;
    for (const name of memberNames) acc |= this.value(name);
    return acc;
  }

  /**
   * Find a member by name, case-insensitively unless told otherwise.
   */
  lookup(name: string, options: ParseOptions = {}): EnumMember | undefined {
    return findMember(this.descriptor, name, options.ignoreCase ?? true);
  }

  isDefined(nameOrValue: string | bigint): boolean {
    return isDefined(this.descriptor, nameOrValue);
  }

  toIntegral(value: number | bigint): Result<bigint, IntegralOverflowError> {
    return toIntegral(this.descriptor, value);
  }

  /**
   * @throws IntegralOverflowError
   */
  toIntegralOrThrow(value: number | bigint): bigint {
    const result = toIntegral(this.descriptor, value);
    if (!result.ok) throw result.error;
    return result.value;
  }

  fromIntegral(raw: bigint): bigint {
    return fromIntegral(this.descriptor, raw);
  }

  fromIntegralChecked(raw: bigint): Result<bigint, IntegralBridgeFailure> {
    return fromIntegralChecked(this.descriptor, raw);
  }

  decompose(raw: bigint): FlagDecomposition {
    return decompose(this.descriptor, raw);
  }

  /** Names of the atomic members set in `raw`, in declaration order. */
  flagsOf(raw: bigint): N[] {
    return decompose(this.descriptor, raw)
      .members.map((m) => m.name)
      .filter((n): n is N => this.isName(n));
  }

  hasFlag(raw: bigint, flag: N | bigint): boolean {
    return hasFlag(raw, typeof flag === 'bigint' ? flag : this.value(flag));
  }

  isExactUnion(raw: bigint): boolean {
    return isExactUnion(this.descriptor, raw);
  }

  countSetAtomicBits(raw: bigint): number {
    return countSetAtomicBits(this.descriptor, raw);
  }

  format(raw: bigint): string {
    return format(this.descriptor, raw);
  }

  formatAs(raw: bigint, specifier: FormatSpecifier): string {
    return formatAs(this.descriptor, raw, specifier);
  }

  parse(text: string, options?: ParseOptions): Result<bigint, ParseFailure> {
    return parse(this.descriptor, text, options);
  }

  /**
   * @throws UnknownMemberError | EmptyInputError
   */
  parseOrThrow(text: string, options?: ParseOptions): bigint {
    const result = parse(this.descriptor, text, options);
    if (!result.ok) throw result.error;
    return result.value;
  }
}
