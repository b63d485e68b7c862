import { describe, expect, it } from 'vitest';

import { isExactUnion } from '../src/core/flags.js';
import { format, formatAs, parse } from '../src/core/text-codec.js';
import { EmptyInputError, FormatSpecifierError, UnknownMemberError } from '../src/errors/errors.js';
import { IntegralKinds } from '../src/types/types.js';
import { borderSides, days, describeType, priority, sides } from './fixtures.js';

describe('format()', () => {
  it('joins atomic names in declaration order', () => {
    expect(format(sides(), 3n)).toBe('Left, Right');
    expect(format(sides(), 13n)).toBe('Left, Top, Bottom');
    expect(format(days(), 96n)).toBe('Saturday, Sunday');
  });

  it('formats composites through their atomic members', () => {
    expect(format(borderSides(), 3n)).toBe('Left, Right');
    expect(format(borderSides(), 15n)).toBe('Left, Right, Top, Bottom');
  });

  it('uses the zero member for an empty set', () => {
    expect(format(sides(), 0n)).toBe('None');
    expect(
      format(
        describeType('NoZero', [
          ['A', 1],
          ['B', 2],
        ]),
        0n
      )
    ).toBe('0');
  });

  it('falls back to decimal when bits are unrecognized', () => {
    expect(format(sides(), 255n)).toBe('255');
    expect(format(sides(), 16n)).toBe('16');
  });

  it('names single values of plain enums', () => {
    const plain = priority({ flags: false });

    expect(format(plain, 3n)).toBe('High');
    expect(format(plain, 9n)).toBe('9');
  });

  it('uses the first declared name for aliased values of plain enums', () => {
    const d = describeType('Codes', [
      ['Three', 3],
      ['Five', 5],
      ['Trio', 3],
    ]);

    expect(format(d, 3n)).toBe('Three');
    expect(format(d, 6n)).toBe('6');
  });

  it('reports exact unions exactly when no decimal fallback happens', () => {
    const d = sides();
    for (let raw = 0n; raw < 32n; raw++) {
      expect(isExactUnion(d, raw)).toBe(!/^-?\d+$/.test(format(d, raw)));
    }
  });
});

describe('parse()', () => {
  it('ORs comma-separated names', () => {
    expect(parse(sides(), 'Left, Right')).toEqual({ ok: true, value: 3n });
    expect(parse(borderSides(), 'LeftRight, Top')).toEqual({ ok: true, value: 7n });
    expect(parse(borderSides(), 'All')).toEqual({ ok: true, value: 15n });
  });

  it('ignores case by default', () => {
    expect(parse(sides(), 'LEFT,RIGHT')).toEqual(parse(sides(), 'left, right'));
    expect(parse(sides(), 'left, right')).toEqual({ ok: true, value: 3n });
  });

  it('matches case exactly when asked', () => {
    const result = parse(sides(), 'left', { ignoreCase: false });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownMemberError);
    expect(result.error).toMatchObject({ reason: 'UnknownMember', token: 'left' });
  });

  it('reports the first unknown token', () => {
    const result = parse(sides(), 'Left,Bogus');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownMemberError);
    expect(result.error).toMatchObject({ typeId: 'Sides', token: 'Bogus' });
  });

  it('rejects empty input', () => {
    for (const text of ['', '   ']) {
      const result = parse(sides(), text);
      expect(result.ok).toBe(false);
      if (result.ok) continue;
      expect(result.error).toBeInstanceOf(EmptyInputError);
      expect(result.error.reason).toBe('EmptyInput');
    }
  });

  it('rejects empty tokens between separators', () => {
    expect(parse(sides(), 'Left,,Right')).toMatchObject({ ok: false, error: { token: '' } });
  });

  it('accepts integer literals that fit the kind', () => {
    expect(parse(sides(), '5')).toEqual({ ok: true, value: 5n });
    expect(parse(sides(), 'Left, 8')).toEqual({ ok: true, value: 9n });
    expect(parse(sides(), '-1')).toEqual({ ok: true, value: -1n });
    expect(parse(sides(), '4294967296')).toMatchObject({ ok: false, error: { token: '4294967296' } });
  });

  it('formats negative values outside the kind as decimal', () => {
    const ubyte = describeType(
      'UByte',
      [
        ['None', 0],
        ['A', 1],
        ['B', 2],
      ],
      IntegralKinds.UInt8
    );
    const sbyte = describeType('SByte', [['A', 1], ['B', 2]], IntegralKinds.Int8);

    expect(format(ubyte, -256n)).toBe('-256');
    expect(format(ubyte, -253n)).toBe('-253');
    expect(parse(ubyte, format(ubyte, -253n))).toMatchObject({ ok: false, error: { token: '-253' } });
    expect(format(sbyte, -129n)).toBe('-129');
  });

  it('names declared values when flags are forced on a type without atomic members', () => {
    const forced = describeType('Forced', [['Three', 3], ['Five', 5]], IntegralKinds.Int32, { flags: true });

    expect(format(forced, 5n)).toBe('Five');
    expect(format(forced, 0n)).toBe('0');
    expect(format(forced, 7n)).toBe('7');
  });

  it('inverts format() for exact unions', () => {
    const d = sides();
    for (let raw = 0n; raw < 16n; raw++) {
      expect(parse(d, format(d, raw))).toEqual({ ok: true, value: raw });
    }
  });
});

describe('formatAs()', () => {
  it('renders general, decimal and hexadecimal forms', () => {
    const d = sides();

    expect(formatAs(d, 4n, 'G')).toBe('Top');
    expect(formatAs(d, 4n, 'D')).toBe('4');
    expect(formatAs(d, 4n, 'X')).toBe('00000004');
    expect(formatAs(d, 3n, 'g')).toBe('Left, Right');
  });

  it('pads hexadecimal output to the kind width', () => {
    const signedByte = describeType('SignedByte', [['A', 1]], IntegralKinds.Int8);
    const word = describeType('Word', [['A', 1]], IntegralKinds.UInt16);

    expect(formatAs(signedByte, -1n, 'X')).toBe('FF');
    expect(formatAs(word, 0xabn, 'x')).toBe('00ab');
    expect(formatAs(word, 0xabn, 'X')).toBe('00AB');
  });

  it('writes values outside the kind as unpadded hexadecimal', () => {
    const ubyte = describeType('UByte', [['A', 1]], IntegralKinds.UInt8);

    expect(formatAs(ubyte, 256n, 'X')).toBe('100');
    expect(formatAs(ubyte, 0x1ffn, 'x')).toBe('1ff');
    expect(formatAs(ubyte, -256n, 'X')).toBe('-100');
    expect(formatAs(ubyte, 255n, 'X')).toBe('FF');
  });

  it('forces flag formatting with F', () => {
    const plain = priority({ flags: false });

    expect(formatAs(plain, 3n, 'G')).toBe('High');
    expect(formatAs(plain, 3n, 'F')).toBe('Low, Medium');
    expect(formatAs(plain, 3n, 'd')).toBe('3');
  });

  it('rejects unknown specifiers', () => {
    expect(() => formatAs(sides(), 1n, 'Q' as never)).toThrow(FormatSpecifierError);
  });
});
