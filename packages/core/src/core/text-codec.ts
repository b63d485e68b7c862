/*
 * Symbolic text codec
 * -------------------
 * Combined value <-> comma-separated member names.
 *
 * format():
 *   flag-shaped, exact union  -> atomic names in declaration order, ", "-joined
 *   flag-shaped, zero         -> name of a declared zero member, else "0"
 *   plain, declared value     -> first declared name for that value
 *   anything else             -> decimal string
 *
 * formatAs('X') pads values that fit the kind to its width; values that do
 * not are written unpadded, like the decimal fallback.
 *
 * parse():
 *   split on ',', trim, look up each token, OR the values together. Integer
 *   literals are accepted as tokens as long as they fit the kind.
 */
import { EmptyInputError, FormatSpecifierError, UnknownMemberError, type ParseFailure } from '../errors/errors.js';
import { err, ok, type FormatSpecifier, type ParseOptions, type Result } from '../types/types.js';
import { findMember, names, type EnumDescriptor } from './descriptor.js';
import { atomicMembers, decompose, isFlagShaped } from './flags.js';
import { fitsIn, toUnsignedBits } from './kinds.js';

const SEPARATOR = ', ';
const INTEGER_LITERAL = /^[+-]?\d+$/;

function formatFlags(descriptor: EnumDescriptor, raw: bigint): string {
  if (raw === 0n) return descriptor.byValue.get(0n) ?? '0';
  const { members, unrecognized } = decompose(descriptor, raw);
  if (unrecognized !== 0n) return raw.toString();
  return members.map((m) => m.name).join(SEPARATOR);
}

/**
 * Render a combined value as member names. Never throws.
 */
export function format(descriptor: EnumDescriptor, raw: bigint): string {
  if (isFlagShaped(descriptor)) return formatFlags(descriptor, raw);
  return descriptor.byValue.get(raw) ?? raw.toString();
}

/**
 * Render a value with a format specifier (G, F, D or X, either case).
 *
 * @throws FormatSpecifierError for any other specifier
 */
export function formatAs(descriptor: EnumDescriptor, raw: bigint, specifier: FormatSpecifier): string {
  switch (specifier) {
    case 'G':
    case 'g':
      return format(descriptor, raw);
    case 'F':
    case 'f':
      return atomicMembers(descriptor).length > 0 ? formatFlags(descriptor, raw) : format(descriptor, raw);
    case 'D':
    case 'd':
      return raw.toString();
    case 'X':
    case 'x': {
      const digits = descriptor.kind.width / 4;
      const hex = fitsIn(descriptor.kind, raw)
        ? toUnsignedBits(descriptor.kind, raw).toString(16).padStart(digits, '0')
        : raw.toString(16);
      return specifier === 'X' ? hex.toUpperCase() : hex;
    }
    default:
      throw new FormatSpecifierError(String(specifier));
  }
}

/**
 * Parse comma-separated names (or integer literals) into a combined value.
 *
 * Case-insensitive unless `ignoreCase: false` is passed; the choice applies
 * to every token of the call.
 */
export function parse(
  descriptor: EnumDescriptor,
  text: string,
  options: ParseOptions = {}
): Result<bigint, ParseFailure> {
  const ignoreCase = options.ignoreCase ?? true;
  if (text.trim() === '') return err(new EmptyInputError(descriptor.typeId));

  let acc = 0n;
  for (const part of text.split(',')) {
    const token = part.trim();
    const member = findMember(descriptor, token, ignoreCase);
    if (member) {
      acc |= member.value;
      continue;
    }
    if (INTEGER_LITERAL.test(token)) {
      const literal = BigInt(token);
      if (fitsIn(descriptor.kind, literal)) {
        acc |= literal;
        continue;
      }
    }
    return err(new UnknownMemberError(descriptor.typeId, token, names(descriptor)));
  }
  return ok(acc);
}
