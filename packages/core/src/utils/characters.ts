/**
 * Render a single character for an error message. Printable ASCII is shown as is,
 * anything else as a \uXXXX escape.
 */
export function formatCharacter(char: string): string {
  const codePoint = char.codePointAt(0) ?? 0;
  if (char.length === 1 && codePoint >= 0x20 && codePoint <= 0x7e) {
    return char;
  }
  return `\\u${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Normalise parser input to a string with one character per byte.
 * Bytes map through Latin-1, so a non-ASCII byte stays a single (invalid) character.
 */
export function toCodeString(input: string | Uint8Array): string {
  if (typeof input === 'string') {
    return input;
  }
  let out = '';
  for (const byte of input) {
    out += String.fromCharCode(byte);
  }
  return out;
}

/** True when the character fits in one byte, so it survives `toAsciiBytes` and `toCodeString`. */
export function isSingleByte(char: string): boolean {
  return char.length === 1 && char.charCodeAt(0) <= 0xff;
}

/**
 * Encode a validated code string, one byte per character.
 * @throws RangeError when a character does not fit in one byte
 */
export function toAsciiBytes(code: string): Uint8Array {
  const bytes = new Uint8Array(code.length);
  for (let i = 0; i < code.length; i++) {
    const charCode = code.charCodeAt(i);
    if (charCode > 0xff) {
      throw new RangeError(`Character '${formatCharacter(code.charAt(i))}' at position ${i} does not fit in one byte`);
    }
    bytes[i] = charCode;
  }
  return bytes;
}

