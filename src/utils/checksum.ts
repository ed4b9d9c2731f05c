/**
 * NMEA checksum utilities
 * @module utils/checksum
 */

import { ChecksumFormatError } from '../errors.js';

const HEX_BYTE = /^[0-9A-Fa-f]{2}$/;

/**
 * XOR-fold every byte of the input.
 *
 * For strings each character contributes its low byte, which is exact for
 * the binary strings produced by `bytesToBinaryString` and for ASCII text.
 *
 * @param data - Bytes or binary string
 * @returns Checksum in the range 0-255
 *
 * @example
 * checksum('GPGGA,,,,,,0,,,,,,,,') // => 0x66
 */
export function checksum(data: string | Uint8Array): number {
  let sum = 0;

  if (typeof data === 'string') {
    for (let i = 0; i < data.length; i++) {
      sum ^= data.charCodeAt(i) & 0xff;
    }
  } else {
    for (const byte of data) {
      sum ^= byte;
    }
  }

  return sum;
}

/**
 * Compute the checksum a sentence should declare: the XOR over
 * `talkerId ++ messageId ++ ',' ++ payload`.
 */
export function sentenceChecksum(sentence: {
  readonly talkerId: string;
  readonly messageId: string;
  readonly payload: string;
}): number {
  return checksum(`${sentence.talkerId}${sentence.messageId},${sentence.payload}`);
}

/**
 * Decode the two hex digits that follow `*`.
 *
 * @throws {ChecksumFormatError} If the text is not exactly two hex digits
 */
export function parseChecksumHex(text: string): number {
  if (!HEX_BYTE.test(text)) {
    throw new ChecksumFormatError(text);
  }
  return parseInt(text, 16);
}

/**
 * Format a checksum as two upper-case hex digits.
 *
 * @example
 * formatChecksum(0x2b) // => '2B'
 */
export function formatChecksum(value: number): string {
  return (value & 0xff).toString(16).toUpperCase().padStart(2, '0');
}
