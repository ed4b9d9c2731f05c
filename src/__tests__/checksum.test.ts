/**
 * Checksum Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  checksum,
  sentenceChecksum,
  parseChecksumHex,
  formatChecksum,
} from '../utils/checksum.js';
import { ChecksumFormatError } from '../errors.js';

// =============================================================================
// Fixtures
// =============================================================================

// $GPGGA,,,,,,0,,,,,,,,*66
const EMPTY_GGA_BODY = 'GPGGA,,,,,,0,,,,,,,,';

// =============================================================================
// Test Suites
// =============================================================================

describe('checksum', () => {
  it('should XOR every character of a string', () => {
    expect(checksum(EMPTY_GGA_BODY)).toBe(0x66);
  });

  it('should give the same value for bytes', () => {
    const bytes = new TextEncoder().encode(EMPTY_GGA_BODY);
    expect(checksum(bytes)).toBe(0x66);
  });

  it('should be zero for empty input', () => {
    expect(checksum('')).toBe(0);
    expect(checksum(new Uint8Array())).toBe(0);
  });

  it('should cancel out repeated characters', () => {
    expect(checksum('AA')).toBe(0);
    expect(checksum('AAA')).toBe(0x41);
  });
});

describe('sentenceChecksum', () => {
  it('should cover talker id, message id, comma and payload', () => {
    const value = sentenceChecksum({
      talkerId: 'GP',
      messageId: 'RMC',
      payload: '225446.33,A,4916.45,N,12311.12,W,000.5,054.7,191194,020.3,E,A',
    });
    expect(value).toBe(0x2b);
  });
});

describe('parseChecksumHex', () => {
  it('should decode upper and lower case hex', () => {
    expect(parseChecksumHex('2B')).toBe(0x2b);
    expect(parseChecksumHex('2b')).toBe(0x2b);
    expect(parseChecksumHex('00')).toBe(0);
    expect(parseChecksumHex('FF')).toBe(255);
  });

  it('should reject non-hex digits', () => {
    expect(() => parseChecksumHex('G1')).toThrow(ChecksumFormatError);
  });

  it('should reject the wrong number of digits', () => {
    expect(() => parseChecksumHex('2')).toThrow(ChecksumFormatError);
    expect(() => parseChecksumHex('2B0')).toThrow(ChecksumFormatError);
  });

  it('should keep the rejected text on the error', () => {
    let caught: unknown;
    try {
      parseChecksumHex('ZZ');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ChecksumFormatError);
    expect(caught).toMatchObject({ rawChecksum: 'ZZ', kind: 'checksum-format' });
  });
});

describe('formatChecksum', () => {
  it('should pad to two upper-case digits', () => {
    expect(formatChecksum(0x2b)).toBe('2B');
    expect(formatChecksum(5)).toBe('05');
    expect(formatChecksum(0)).toBe('00');
  });
});
