export { defineEnum, membersOf } from './api/define.js';
export type { DefineEnumOptions, EnumLike, EnumNames } from './api/define.js';
export { SymbolicEnum } from './api/symbolic-enum.js';

export { DescriptorRegistry } from './registry/descriptor-registry.js';

export {
  buildDescriptor,
  findMember,
  isDefined,
  nameOf,
  names,
  valueOf,
  values,
} from './core/descriptor.js';
export type { EnumDescriptor, EnumMember } from './core/descriptor.js';

export { describeKind, fitsIn, integralRange, toUnsignedBits, wrapTo } from './core/kinds.js';
export type { IntegralRange } from './core/kinds.js';

export { fromIntegral, fromIntegralChecked, toIntegral } from './core/integral.js';

export {
  allAtomicBits,
  atomicMembers,
  countSetAtomicBits,
  countSetBits,
  decompose,
  except,
  hasFlag,
  intersect,
  isExactUnion,
  isFlagShaped,
  isFlagsDescriptor,
  union,
} from './core/flags.js';
export type { FlagDecomposition } from './core/flags.js';

export { format, formatAs, parse } from './core/text-codec.js';

export * from './core/type-id.js';

export { IntegralKinds, err, ok } from './types/types.js';
export type {
  CollisionPolicy,
  DescriptorOptions,
  DescriptorSource,
  FormatSpecifier,
  IntegralKind,
  IntegralKindName,
  IntegralWidth,
  ParseOptions,
  RawMember,
  RegistryConfig,
  Result,
} from './types/types.js';

// Errors
export {
  DescriptorBuildError,
  DescriptorNotFoundError,
  DuplicateMemberNameError,
  EmptyInputError,
  EmptyMembersError,
  FormatSpecifierError,
  IntegralBridgeError,
  IntegralOverflowError,
  InvalidRegistryConfigError,
  InvalidTypeIdError,
  NonIntegralMemberError,
  ParseError,
  TypeIdCollisionError,
  UndefinedValueError,
  UnknownMemberError,
  ValueOutOfRangeError,
} from './errors/errors.js';
export type {
  DescriptorBuildFailure,
  DescriptorBuildReason,
  IntegralBridgeFailure,
  IntegralBridgeReason,
  ParseErrorReason,
  ParseFailure,
} from './errors/errors.js';
