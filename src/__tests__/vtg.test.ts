/**
 * VTG Decoder Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { parseSentence } from '../parsers/sentence.js';
import { parseVtg } from '../parsers/vtg.js';
import { KMH_PER_KNOT } from '../config.js';
import { MessageIdMismatchError } from '../errors.js';
import type { RawSentence } from '../types.js';

// =============================================================================
// Fixtures
// =============================================================================

const MOVING_VTG = '$GPVTG,054.7,T,034.4,M,005.5,N,010.2,K*48';
const STATIONARY_VTG = '$GPVTG,360.0,T,348.7,M,000.0,N,000.0,K*43';
const EMPTY_VTG = '$GPVTG,,T,,M,,N,,K,N*2C';
const KMH_ONLY_VTG = '$GPVTG,,T,,M,,N,010.2,K*63';

function vtg(payload: string): RawSentence {
  return { talkerId: 'GP', messageId: 'VTG', payload, checksum: 0 };
}

// =============================================================================
// Test Suites
// =============================================================================

describe('VTG Decoder', () => {
  describe('Basic Parsing', () => {
    it('should decode true course and speed in knots', () => {
      expect(parseVtg(parseSentence(MOVING_VTG))).toEqual({ trueCourse: 54.7, speedKnots: 5.5 });
    });

    it('should keep a zero speed', () => {
      expect(parseVtg(parseSentence(STATIONARY_VTG))).toEqual({ trueCourse: 360, speedKnots: 0 });
    });

    it('should decode empty fields as null and ignore the mode field', () => {
      expect(parseVtg(parseSentence(EMPTY_VTG))).toEqual({ trueCourse: null, speedKnots: null });
    });

    it('should accept a sentence without the km/h unit letter', () => {
      expect(parseVtg(vtg('054.7,T,034.4,M,005.5,N,010.2'))).toEqual({ trueCourse: 54.7, speedKnots: 5.5 });
    });
  });

  describe('Speed Fallback', () => {
    it('should convert km/h to knots when the knots field is empty', () => {
      const data = parseVtg(parseSentence(KMH_ONLY_VTG));
      expect(data.speedKnots).toBe(10.2 / KMH_PER_KNOT);
    });

    it('should prefer knots when both speeds are present', () => {
      const data = parseVtg(vtg(',T,,M,001.0,N,999.0,K'));
      expect(data.speedKnots).toBe(1);
    });
  });

  describe('Grammar Errors', () => {
    it('should reject a truncated sentence', () => {
      expect(() => parseVtg(vtg('054.7,T,034.4,M,005.5,N'))).toThrow(
        "Parse error in VTG field 'speed km/h': missing field (payload has 6 fields)"
      );
    });

    it('should reject a malformed true course', () => {
      expect(() => parseVtg(vtg('05x.7,T,,M,,N,,K'))).toThrow("field 'true course'");
    });

    it('should validate the magnetic course even though it is dropped', () => {
      expect(() => parseVtg(vtg('054.7,T,bad,M,,N,,K'))).toThrow("field 'magnetic course'");
    });

    it('should refuse a sentence of another type', () => {
      expect(() => parseVtg({ ...vtg(''), messageId: 'GLL' })).toThrow(MessageIdMismatchError);
    });
  });
});
