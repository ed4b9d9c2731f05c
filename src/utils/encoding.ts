/**
 * Byte handling for sentence input
 * @module utils/encoding
 */

const utf8Encoder = new TextEncoder();

/**
 * Sentence input accepted by the decoder: text or raw bytes.
 */
export type SentenceInput = string | Uint8Array;

/**
 * Get the bytes of a sentence as they would arrive on the wire.
 * Strings are encoded as UTF-8, so a stray non-ASCII character counts
 * toward the length ceiling and the checksum the way the bytes would.
 *
 * @param input - Sentence text or bytes
 * @returns The sentence bytes
 */
export function toSentenceBytes(input: SentenceInput): Uint8Array {
  return typeof input === 'string' ? utf8Encoder.encode(input) : input;
}

/**
 * Map each byte to the character with the same code (0-255).
 * The result has one character per byte, so string offsets equal byte
 * offsets and `charCodeAt` gives back the original byte.
 *
 * @param bytes - Raw bytes
 * @returns Binary string
 */
export function bytesToBinaryString(bytes: Uint8Array): string {
  const chars: string[] = [];

  for (const byte of bytes) {
    chars.push(String.fromCharCode(byte));
  }

  return chars.join('');
}

/**
 * Drop one trailing line ending (CR LF, LF or CR).
 *
 * @example
 * stripLineEnding('$GPGLL,...*1D\r\n') // => '$GPGLL,...*1D'
 */
export function stripLineEnding(text: string): string {
  if (text.endsWith('\r\n')) {
    return text.slice(0, -2);
  }
  if (text.endsWith('\n') || text.endsWith('\r')) {
    return text.slice(0, -1);
  }
  return text;
}
