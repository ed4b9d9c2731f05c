/**
 * RMC (recommended minimum navigation data) decoder
 * @module parsers/rmc
 *
 * Fields: time, status (A/D/V), latitude, N/S, longitude, E/W,
 * speed over ground in knots, course made good, date (ddmmyy).
 * Magnetic variation and the FAA mode indicator that may follow are
 * not decoded. SiRF chipsets omit them entirely.
 */

import type { RawSentence, RmcData } from '../types.js';
import { RMC_STATUS_MAP } from '../types.js';
import { FieldCursor } from '../utils/index.js';
import { expectMessageId } from './sentence.js';

/**
 * Decode an RMC sentence.
 *
 * @throws {MessageIdMismatchError} If the sentence is not RMC
 * @throws {ParseError} If a field breaks the grammar
 */
export function parseRmc(sentence: RawSentence): RmcData {
  expectMessageId(sentence, 'RMC');

  const cursor = new FieldCursor('RMC', sentence.payload);

  const fixTime = cursor.optionalTime('time');
  const status = cursor.oneOf('status', RMC_STATUS_MAP);
  const position = cursor.optionalPosition();
  const speedKnots = cursor.optionalDecimal('speed');
  const trueCourse = cursor.optionalDecimal('course');
  const fixDate = cursor.optionalDate('date');

  return {
    fixTime,
    status,
    latitude: position?.latitude ?? null,
    longitude: position?.longitude ?? null,
    speedKnots,
    trueCourse,
    fixDate,
  };
}
