import { describeKind } from '../core/kinds.js';
import type { IntegralKind } from '../types/types.js';

const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const listNames = (names: readonly string[]): string[] => {
  if (names.length === 0) return ['The type declares no members.'];
  if (names.length > 10) return [`${names.length} members are declared.`];
  return ['Declared members:', ...names.map((n) => `  - ${n}`)];
};

// ---- descriptor build ----

export type DescriptorBuildReason = 'ValueOutOfRange' | 'DuplicateName' | 'EmptyMembers' | 'NonIntegral';

/**
 * Base class for failures while building a descriptor.
 *
 * These are fatal to registration and always thrown.
 */
export class DescriptorBuildError<R extends DescriptorBuildReason = DescriptorBuildReason> extends Error {
  constructor(
    public readonly typeId: string,
    public readonly reason: R,
    message: string
  ) {
    super(message);
    this.name = 'DescriptorBuildError';
  }
}

export class ValueOutOfRangeError extends DescriptorBuildError<'ValueOutOfRange'> {
  constructor(
    typeId: string,
    public readonly memberName: string,
    public readonly value: bigint,
    public readonly kind: IntegralKind
  ) {
    const kindName = describeKind(kind);
    const dev = [
      'Member value out of range',
      '',
      `Member '${memberName}' of '${typeId}' has value ${value}, which does not fit ${kindName}.`,
      '',
      'To fix this:',
      `  1. Declare '${typeId}' with a wider integral kind`,
      `  2. Or change the value of '${memberName}'`,
    ];
    super(typeId, 'ValueOutOfRange', format(`Value ${value} of '${typeId}.${memberName}' does not fit ${kindName}.`, dev));
    this.name = 'ValueOutOfRangeError';
  }
}

export class DuplicateMemberNameError extends DescriptorBuildError<'DuplicateName'> {
  constructor(
    typeId: string,
    public readonly memberName: string
  ) {
    const dev = [
      'Duplicate member name',
      '',
      `Member '${memberName}' is declared more than once in '${typeId}'.`,
      'Aliases must use distinct names; several names may share one value.',
    ];
    super(typeId, 'DuplicateName', format(`Member '${memberName}' is declared twice in '${typeId}'.`, dev));
    this.name = 'DuplicateMemberNameError';
  }
}

export class EmptyMembersError extends DescriptorBuildError<'EmptyMembers'> {
  constructor(typeId: string) {
    const dev = [
      'Empty symbolic type',
      '',
      `'${typeId}' was registered without members.`,
      'Pass at least one (name, value) pair.',
    ];
    super(typeId, 'EmptyMembers', format(`'${typeId}' declares no members.`, dev));
    this.name = 'EmptyMembersError';
  }
}

export class NonIntegralMemberError extends DescriptorBuildError<'NonIntegral'> {
  constructor(
    typeId: string,
    public readonly memberName: string,
    public readonly value: unknown
  ) {
    const shown = typeof value === 'string' ? `'${value}'` : String(value);
    const dev = [
      'Non-integral member value',
      '',
      `Member '${memberName}' of '${typeId}' has value ${shown}.`,
      'Only safe integer numbers and bigints can back a symbolic type.',
      'Write values past Number.MAX_SAFE_INTEGER as bigint literals.',
    ];
    super(typeId, 'NonIntegral', format(`Member '${typeId}.${memberName}' is not integral.`, dev));
    this.name = 'NonIntegralMemberError';
  }
}

export type DescriptorBuildFailure =
  | ValueOutOfRangeError
  | DuplicateMemberNameError
  | EmptyMembersError
  | NonIntegralMemberError;

// ---- integral bridge ----

export type IntegralBridgeReason = 'Overflow' | 'Undefined';

/**
 * Base class for integral conversion failures.
 *
 * Returned inside a Result; the caller decides the fallback.
 */
export class IntegralBridgeError<R extends IntegralBridgeReason = IntegralBridgeReason> extends Error {
  constructor(
    public readonly typeId: string,
    public readonly reason: R,
    public readonly value: bigint | number,
    message: string
  ) {
    super(message);
    this.name = 'IntegralBridgeError';
  }
}

export class IntegralOverflowError extends IntegralBridgeError<'Overflow'> {
  constructor(
    typeId: string,
    value: bigint | number,
    public readonly kind: IntegralKind
  ) {
    const kindName = describeKind(kind);
    const dev = [
      'Integral overflow',
      '',
      `Value ${value} cannot be represented by '${typeId}' (${kindName}).`,
    ];
    super(typeId, 'Overflow', value, format(`Value ${value} overflows ${kindName} of '${typeId}'.`, dev));
    this.name = 'IntegralOverflowError';
  }
}

export class UndefinedValueError extends IntegralBridgeError<'Undefined'> {
  constructor(typeId: string, value: bigint) {
    const dev = [
      'Undefined value',
      '',
      `Value ${value} fits '${typeId}' but is neither a declared member nor a union of declared flags.`,
      '',
      'Use fromIntegral() to accept undeclared values as-is.',
    ];
    super(typeId, 'Undefined', value, format(`Value ${value} is not defined by '${typeId}'.`, dev));
    this.name = 'UndefinedValueError';
  }
}

export type IntegralBridgeFailure = IntegralOverflowError | UndefinedValueError;

// ---- text codec ----

export type ParseErrorReason = 'UnknownMember' | 'EmptyInput';

/**
 * Base class for failures while parsing symbolic text.
 */
export class ParseError<R extends ParseErrorReason = ParseErrorReason> extends Error {
  constructor(
    public readonly typeId: string,
    public readonly reason: R,
    message: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class UnknownMemberError extends ParseError<'UnknownMember'> {
  constructor(
    typeId: string,
    public readonly token: string,
    public readonly knownNames: readonly string[]
  ) {
    const dev = [
      `'${token}' is not a member of '${typeId}'.`,
      '',
      ...listNames(knownNames),
      '',
      'To fix this:',
      '  1. Check the spelling of the name',
      '  2. Pass { ignoreCase: true } if the casing differs',
    ];
    super(typeId, 'UnknownMember', format(`'${token}' is not a member of '${typeId}'.`, dev));
    this.name = 'UnknownMemberError';
  }
}

export class EmptyInputError extends ParseError<'EmptyInput'> {
  constructor(typeId: string) {
    const dev = [
      'Empty input',
      '',
      `Cannot parse an empty string as '${typeId}'.`,
      'Pass one or more member names separated by commas.',
    ];
    super(typeId, 'EmptyInput', format(`Cannot parse empty input as '${typeId}'.`, dev));
    this.name = 'EmptyInputError';
  }
}

export type ParseFailure = UnknownMemberError | EmptyInputError;

export class FormatSpecifierError extends Error {
  constructor(public readonly specifier: string) {
    const dev = [
      'Invalid format specifier',
      '',
      `'${specifier}' is not a known format specifier.`,
      '',
      'Valid specifiers:',
      '  - G: names',
      '  - F: names, formatted as flags',
      '  - D: decimal',
      '  - X: hexadecimal',
    ];
    super(format(`Invalid format specifier '${specifier}'.`, dev));
    this.name = 'FormatSpecifierError';
  }
}

// ---- registry ----

export class TypeIdCollisionError extends Error {
  constructor(
    public readonly typeId: string,
    public readonly registryName: string,
    public readonly differences: readonly string[]
  ) {
    const dev = [
      'Type id collision',
      '',
      `'${typeId}' is already registered in registry '${registryName}' with different members:`,
      ...differences.map((d) => `  - ${d}`),
      '',
      'To fix this:',
      `  1. Register '${typeId}' once, at startup`,
      `  2. Or give the second type a distinct id`,
      `  3. Or set collisionPolicy: 'warn' to keep the first registration`,
    ];
    super(format(`'${typeId}' is already registered in '${registryName}'.`, dev));
    this.name = 'TypeIdCollisionError';
  }
}

export class DescriptorNotFoundError extends Error {
  constructor(
    public readonly typeId: string,
    public readonly registryName: string,
    public readonly availableTypes: readonly string[]
  ) {
    const parts: string[] = [`No descriptor registered for '${typeId}' in registry '${registryName}'.`, ''];

    if (availableTypes.length > 0 && availableTypes.length <= 10) {
      parts.push('Registered types:');
      availableTypes.forEach((t) => parts.push(`  - ${t}`));
      parts.push('');
    } else if (availableTypes.length > 10) {
      parts.push(`${availableTypes.length} types are registered.`, '');
    }

    parts.push('Register the type before querying it, or use getOrBuild().');

    super(format(`No descriptor registered for '${typeId}'.`, parts));
    this.name = 'DescriptorNotFoundError';
  }
}

export class InvalidTypeIdError extends Error {
  constructor(public readonly received: unknown) {
    let shown: string;
    try {
      shown = JSON.stringify(received) ?? String(received);
    } catch {
      shown = String(received);
    }

    const dev = [
      'Invalid type id',
      '',
      'Expected a non-empty type name.',
      '',
      'Received:',
      `  ${shown}`,
    ];
    super(format('Invalid type id.', dev));
    this.name = 'InvalidTypeIdError';
  }
}

export class InvalidRegistryConfigError extends Error {
  constructor(public readonly reason: string) {
    const dev = ['Invalid registry configuration', '', `Invalid registry configuration: ${reason}`];
    super(format(`Invalid registry configuration: ${reason}`, dev));
    this.name = 'InvalidRegistryConfigError';
  }
}
