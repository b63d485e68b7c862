import type { TypeId } from '../core/type-id.js';

/**
 * Bit widths an enumeration may be backed by.
 */
export type IntegralWidth = 8 | 16 | 32 | 64;

/**
 * Underlying integral type of a symbolic type: width plus signedness.
 */
export interface IntegralKind {
  readonly width: IntegralWidth;
  readonly signed: boolean;
}

/**
 * Named integral kinds.
 *
 * Plain objects rather than a TypeScript `enum` so they can be spread,
 * compared structurally and consumed from JavaScript.
 *
 * @example
 * ```typescript
 * registry.register('FileSize', members, IntegralKinds.Int64);
 * ```
 */
export const IntegralKinds = {
  Int8: { width: 8, signed: true },
  UInt8: { width: 8, signed: false },
  Int16: { width: 16, signed: true },
  UInt16: { width: 16, signed: false },
  Int32: { width: 32, signed: true },
  UInt32: { width: 32, signed: false },
  Int64: { width: 64, signed: true },
  UInt64: { width: 64, signed: false },
} as const satisfies Record<string, IntegralKind>;

export type IntegralKindName = keyof typeof IntegralKinds;

/**
 * A member as supplied by the host at registration time.
 * `number` values must be safe integers; larger values must be given as `bigint`.
 */
export interface RawMember {
  readonly name: string;
  readonly value: number | bigint;
}

/**
 * Options accepted when a descriptor is built.
 */
export interface DescriptorOptions {
  /**
   * Whether combined values should be formatted as flags.
   *
   * Leave undefined to infer it: a descriptor with at least one single-bit
   * member is treated as flag-shaped. Set `false` for sequential enums whose
   * values happen to be powers of two (`Low = 1, Medium = 2, High = 3`).
   * A descriptor without single-bit members is never flag-shaped.
   */
  flags?: boolean;
}

/**
 * Everything `DescriptorRegistry.getOrBuild()` needs to build a descriptor.
 */
export interface DescriptorSource extends DescriptorOptions {
  members: readonly RawMember[];
  kind: IntegralKind;
}

/**
 * What the registry does when a type id is registered a second time with
 * different members. The first registration is always the one kept.
 *
 * - 'error' (default): throw TypeIdCollisionError
 * - 'warn': log the mismatch and keep the first descriptor
 * - 'allow': keep the first descriptor silently
 */
export type CollisionPolicy = 'error' | 'warn' | 'allow';

/**
 * Registry configuration passed to the constructor.
 */
export interface RegistryConfig {
  /**
   * Optional name for diagnostics and error messages.
   *
   * @default 'default'
   */
  name?: string;

  /**
   * @default 'error'
   */
  collisionPolicy?: CollisionPolicy;

  /**
   * Optional hook invoked after a descriptor is built.
   *
   * Receives the type id and the build duration in nanoseconds.
   */
  onBuild?: (typeId: TypeId, durationNs: number) => void;
}

export interface ParseOptions {
  /**
   * Match member names case-insensitively.
   *
   * @default true
   */
  ignoreCase?: boolean;
}

/**
 * Format specifiers understood by `formatAs()`.
 *
 *   - G: general (names, flags when the descriptor is flag-shaped)
 *   - F: flags (names, even when the descriptor opted out of flags)
 *   - D: decimal
 *   - X: hexadecimal, zero-padded to the width of the kind
 */
export type FormatSpecifier = 'G' | 'g' | 'F' | 'f' | 'D' | 'd' | 'X' | 'x';

/**
 * Outcome of an operation whose failure is an expected, recoverable state.
 */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): { readonly ok: true; readonly value: T } => ({ ok: true, value });

export const err = <E>(error: E): { readonly ok: false; readonly error: E } => ({ ok: false, error });
