import { typeId } from '../core/type-id.js';
import { NonIntegralMemberError } from '../errors/errors.js';
import { DescriptorRegistry } from '../registry/descriptor-registry.js';
import { IntegralKinds, type IntegralKind, type RawMember } from '../types/types.js';
import { SymbolicEnum } from './symbolic-enum.js';

/**
 * Anything shaped like a TypeScript `enum` object or an `as const` map of
 * names to integral values.
 */
export type EnumLike = Readonly<Record<string, string | number | bigint>>;

/**
 * Names of the integral members of an enum-like object.
 *
 * Drops the numeric reverse-mapping keys TypeScript adds to numeric enums.
 */
export type EnumNames<E> = Extract<
  { [K in keyof E]: E[K] extends number | bigint ? K : never }[keyof E],
  string
>;

export interface DefineEnumOptions {
  /** Type id under which the descriptor is registered. */
  name: string;

  /**
   * Underlying integral kind.
   *
   * @default IntegralKinds.Int32
   */
  kind?: IntegralKind;

  /** See DescriptorOptions.flags. */
  flags?: boolean;

  /**
   * Registry to register into.
   *
   * @default DescriptorRegistry.shared()
   */
  registry?: DescriptorRegistry;
}

/**
 * A numeric TypeScript enum maps `E[E.Left] = 'Left'`: the key is the
 * value's decimal text and the value points back at a numeric member.
 */
function isReverseMapping(source: EnumLike, key: string, value: string): boolean {
  const forward = source[value];
  return typeof forward === 'number' && String(forward) === key;
}

/**
 * Read the members of an enum-like object, in declaration order.
 *
 * @param source - TypeScript enum object or plain name → value map
 * @param label - Type name used in error messages
 * @throws NonIntegralMemberError for string-valued members
 *
 * @example
 * ```typescript
 * enum Priority { Low = 1, Medium = 2, High = 3 }
 * membersOf(Priority);
 * // [{ name: 'Low', value: 1 }, { name: 'Medium', value: 2 }, { name: 'High', value: 3 }]
 * ```
 */
export function membersOf(source: EnumLike, label = 'enum'): RawMember[] {
  const members: RawMember[] = [];
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'number' || typeof value === 'bigint') {
      members.push({ name: key, value });
      continue;
    }
    if (isReverseMapping(source, key, value)) continue;
    throw new NonIntegralMemberError(label, key, value);
  }
  return members;
}

/**
 * Register an enum-like object and return its typed view.
 *
 * Defining the same enum twice returns an equivalent view over the cached
 * descriptor.
 *
 * @example
 * ```typescript
 * enum BorderSides { None = 0, Left = 1, Right = 2, Top = 4, Bottom = 8 }
 * const Sides = defineEnum(BorderSides, { name: 'BorderSides' });
 * Sides.parse('left, top'); // { ok: true, value: 5n }
 * ```
 */
export function defineEnum<E extends EnumLike>(source: E, options: DefineEnumOptions): SymbolicEnum<EnumNames<E>> {
  const id = typeId(options.name);
  const registry = options.registry ?? DescriptorRegistry.shared();
  const descriptor = registry.register(id, membersOf(source, id), options.kind ?? IntegralKinds.Int32, {
    flags: options.flags,
  });
  return new SymbolicEnum<EnumNames<E>>(descriptor);
}
