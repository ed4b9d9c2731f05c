/**
 * GGA (positioning fix) decoder
 * @module parsers/gga
 *
 * ```
 * $GPGGA,123519,4807.038,N,01131.324,E,1,08,0.9,545.4,M,46.9,M,,*42
 * 123519        UTC time of fix
 * 4807.038,N    latitude 48 deg 07.038' N
 * 01131.324,E   longitude 11 deg 31.324' E
 * 1             fix quality 0-8
 * 08            satellites in use
 * 0.9           HDOP
 * 545.4,M       altitude above mean sea level, metres
 * 46.9,M        geoid height above the WGS84 ellipsoid, metres
 * ,             DGPS age and station id (ignored)
 * ```
 */

import type { GgaData, RawSentence } from '../types.js';
import { FIX_QUALITY_MAP } from '../types.js';
import { FieldCursor } from '../utils/index.js';
import { expectMessageId } from './sentence.js';

/**
 * Decode a GGA sentence.
 *
 * @throws {MessageIdMismatchError} If the sentence is not GGA
 * @throws {ParseError} If a field breaks the grammar
 */
export function parseGga(sentence: RawSentence): GgaData {
  expectMessageId(sentence, 'GGA');

  const cursor = new FieldCursor('GGA', sentence.payload);

  const fixTime = cursor.optionalTime('time');
  const position = cursor.optionalPosition();
  const fixType = cursor.oneOf('fix quality', FIX_QUALITY_MAP);
  const satelliteCount = cursor.optionalInteger('satellites');
  const hdop = cursor.optionalDecimal('hdop');
  const altitude = cursor.optionalDecimal('altitude');
  cursor.skip('altitude unit');
  const geoidHeight = cursor.optionalDecimal('geoid height');
  cursor.skip('geoid height unit');

  return {
    fixTime,
    fixType,
    latitude: position?.latitude ?? null,
    longitude: position?.longitude ?? null,
    satelliteCount,
    hdop,
    altitude,
    geoidHeight,
  };
}
