/**
 * GSV Decoder Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { parseSentence } from '../parsers/sentence.js';
import { parseGsv } from '../parsers/gsv.js';
import { MessageIdMismatchError, ParseError } from '../errors.js';
import type { RawSentence } from '../types.js';

// =============================================================================
// Fixtures
// =============================================================================

const GAPPY_GSV = '$GPGSV,2,1,08,01,,083,46,02,17,308,,12,07,344,39,14,22,228,*75';
const FULL_GSV = '$GPGSV,2,1,08,01,40,083,46,02,17,308,41,12,07,344,39,14,22,228,45*75';
const GLONASS_TAIL_GSV = '$GLGSV,3,3,10,72,40,075,43,87,00,000,*6F';

function gsv(talkerId: string, payload: string): RawSentence {
  return { talkerId, messageId: 'GSV', payload, checksum: 0 };
}

// =============================================================================
// Test Suites
// =============================================================================

describe('GSV Decoder', () => {
  describe('Basic Parsing', () => {
    it('should decode the header and satellites with empty fields', () => {
      const data = parseGsv(parseSentence(GAPPY_GSV));

      expect(data.constellation).toBe('gps');
      expect(data.sentenceCount).toBe(2);
      expect(data.sentenceIndex).toBe(1);
      expect(data.satellitesInView).toBe(8);
      expect(data.satellites[0]).toEqual({
        constellation: 'gps',
        prn: 1,
        elevation: null,
        azimuth: 83,
        snr: 46,
      });
      expect(data.satellites[1]).toEqual({
        constellation: 'gps',
        prn: 2,
        elevation: 17,
        azimuth: 308,
        snr: null,
      });
      expect(data.satellites[2]).toEqual({
        constellation: 'gps',
        prn: 12,
        elevation: 7,
        azimuth: 344,
        snr: 39,
      });
      expect(data.satellites[3]).toEqual({
        constellation: 'gps',
        prn: 14,
        elevation: 22,
        azimuth: 228,
        snr: null,
      });
    });

    it('should decode four complete blocks', () => {
      const data = parseGsv(parseSentence(FULL_GSV));

      expect(data.satellites.map((sat) => sat?.prn)).toEqual([1, 2, 12, 14]);
      expect(data.satellites[3]?.snr).toBe(45);
    });

    it('should leave trailing slots null when fewer than four are reported', () => {
      const data = parseGsv(parseSentence(GLONASS_TAIL_GSV));

      expect(data.constellation).toBe('glonass');
      expect(data.sentenceCount).toBe(3);
      expect(data.sentenceIndex).toBe(3);
      expect(data.satellitesInView).toBe(10);
      expect(data.satellites).toEqual([
        { constellation: 'glonass', prn: 72, elevation: 40, azimuth: 75, snr: 43 },
        { constellation: 'glonass', prn: 87, elevation: 0, azimuth: 0, snr: null },
        null,
        null,
      ]);
    });

    it('should accept a sentence with no satellites', () => {
      const data = parseGsv(gsv('GA', '1,1,00'));

      expect(data.constellation).toBe('galileo');
      expect(data.satellitesInView).toBe(0);
      expect(data.satellites).toEqual([null, null, null, null]);
    });

    it('should read a block whose SNR field is cut off', () => {
      const data = parseGsv(gsv('GP', '1,1,01,05,40,083'));
      expect(data.satellites[0]).toEqual({ constellation: 'gps', prn: 5, elevation: 40, azimuth: 83, snr: null });
    });

    it('should ignore a trailing signal id field', () => {
      const data = parseGsv(gsv('GP', '1,1,01,05,40,083,46,1'));

      expect(data.satellites[0]?.snr).toBe(46);
      expect(data.satellites[1]).toBeNull();
    });

    it('should read an all-empty block as an empty slot', () => {
      const data = parseGsv(gsv('GP', '1,1,01,05,40,083,46,,,,'));
      expect(data.satellites).toEqual([
        { constellation: 'gps', prn: 5, elevation: 40, azimuth: 83, snr: 46 },
        null,
        null,
        null,
      ]);
    });
  });

  describe('Talker Ids', () => {
    it.each([
      ['GP', 'gps'],
      ['GA', 'galileo'],
      ['GL', 'glonass'],
      ['GN', 'glonass'],
      ['BD', 'beidou'],
      ['GB', 'beidou'],
      ['QZ', 'qzss'],
    ])('should map %s to %s', (talkerId, constellation) => {
      const data = parseGsv(gsv(talkerId, '1,1,01,05,40,083,46'));

      expect(data.constellation).toBe(constellation);
      expect(data.satellites[0]?.constellation).toBe(constellation);
    });

    it('should reject an unknown talker', () => {
      expect(() => parseGsv(gsv('GX', '1,1,01,05,40,083,46'))).toThrow("unknown GNSS talker 'GX'");
    });

    it('should use configured talker overrides', () => {
      const options = { constellations: { GX: 'qzss', GP: 'galileo' } as const };

      expect(parseGsv(gsv('GX', '1,1,00'), options).constellation).toBe('qzss');
      expect(parseGsv(gsv('GP', '1,1,00'), options).constellation).toBe('galileo');
      expect(parseGsv(gsv('GL', '1,1,00'), options).constellation).toBe('glonass');
    });
  });

  describe('Grammar Errors', () => {
    it('should require the three header fields', () => {
      expect(() => parseGsv(gsv('GP', '2,1'))).toThrow("field 'satellites in view'");
      expect(() => parseGsv(gsv('GP', ',1,08'))).toThrow("field 'sentence count': required field is empty");
    });

    it('should reject a block with data but no PRN', () => {
      expect(() => parseGsv(gsv('GP', '1,1,01,,40,083,46'))).toThrow(
        "Parse error in GSV field 'satellite 1 prn': required field is empty"
      );
    });

    it('should reject a satellite after an empty block', () => {
      expect(() => parseGsv(gsv('GP', '1,1,08,,,,,05,40,083,46'))).toThrow(
        "Parse error in GSV field 'satellite 2 prn': satellite follows an empty block"
      );
    });

    it('should reject a 20-digit PRN', () => {
      expect(() => parseGsv(gsv('GP', '1,1,01,12345678901234567890,40,083,46'))).toThrow(
        "field 'satellite 1 prn'"
      );
    });

    it('should reject non-numeric satellite fields', () => {
      expect(() => parseGsv(gsv('GP', '1,1,01,05,4x,083,46'))).toThrow("field 'satellite 1 elevation'");
    });

    it('should refuse a sentence of another type', () => {
      expect(() => parseGsv({ ...gsv('GP', '1,1,00'), messageId: 'GSA' })).toThrow(MessageIdMismatchError);
    });

    it('should report unknown talkers as grammar errors', () => {
      expect(() => parseGsv(gsv('ZZ', '1,1,00'))).toThrow(ParseError);
    });
  });
});
