import { describe, expect, it } from 'vitest';

import { formatCharacter, isSingleByte, toAsciiBytes, toCodeString } from '../characters.js';

describe('formatCharacter', () => {
  it('shows printable ASCII as is', () => {
    expect(formatCharacter('A')).toBe('A');
    expect(formatCharacter(' ')).toBe(' ');
    expect(formatCharacter('~')).toBe('~');
  });

  it('escapes control and non-ASCII characters', () => {
    expect(formatCharacter('\n')).toBe('\\u000A');
    expect(formatCharacter('é')).toBe('\\u00E9');
    expect(formatCharacter('\u007f')).toBe('\\u007F');
  });
});

describe('toCodeString', () => {
  it('passes strings through', () => {
    expect(toCodeString('ESVUFB')).toBe('ESVUFB');
  });

  it('maps each byte to one character', () => {
    expect(toCodeString(new Uint8Array([69, 83]))).toBe('ES');
    expect(toCodeString(new Uint8Array([0xff]))).toBe('ÿ');
  });
});

describe('toAsciiBytes', () => {
  it('encodes one byte per character', () => {
    expect(toAsciiBytes('ES')).toEqual(new Uint8Array([69, 83]));
    expect(toAsciiBytes('\u00FF')).toEqual(new Uint8Array([0xff]));
  });

  it('refuses characters wider than one byte', () => {
    expect(() => toAsciiBytes('IXXXX\u20AC')).toThrow(RangeError);
    expect(() => toAsciiBytes('IXXXX\u20AC')).toThrow("Character '\\u20AC' at position 5 does not fit in one byte");
  });
});

describe('isSingleByte', () => {
  it('accepts characters up to U+00FF', () => {
    expect(isSingleByte('X')).toBe(true);
    expect(isSingleByte('\u00FF')).toBe(true);
  });

  it('rejects wider characters and surrogate pairs', () => {
    expect(isSingleByte('\u0100')).toBe(false);
    expect(isSingleByte('\u20AC')).toBe(false);
    expect(isSingleByte('\u{1F600}')).toBe(false);
    expect(isSingleByte('\uD83D')).toBe(false);
  });
});
