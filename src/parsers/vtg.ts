/**
 * VTG (course and speed over ground) decoder
 * @module parsers/vtg
 *
 * ```
 * $GPVTG,054.7,T,034.4,M,005.5,N,010.2,K*48
 * 054.7,T   course, degrees true
 * 034.4,M   course, degrees magnetic (validated, not kept)
 * 005.5,N   speed, knots
 * 010.2,K   speed, km/h
 * ```
 */

import type { RawSentence, VtgData } from '../types.js';
import { KMH_PER_KNOT } from '../config.js';
import { FieldCursor } from '../utils/index.js';
import { expectMessageId } from './sentence.js';

/**
 * Decode a VTG sentence. Speed is reported in knots, converted from km/h
 * when only that is present.
 *
 * @throws {MessageIdMismatchError} If the sentence is not VTG
 * @throws {ParseError} If a field breaks the grammar
 */
export function parseVtg(sentence: RawSentence): VtgData {
  expectMessageId(sentence, 'VTG');

  const cursor = new FieldCursor('VTG', sentence.payload);

  const trueCourse = cursor.optionalDecimal('true course');
  cursor.skip('true course unit');
  cursor.optionalDecimal('magnetic course');
  cursor.skip('magnetic course unit');
  const knots = cursor.optionalDecimal('speed knots');
  cursor.skip('speed knots unit');
  const kmh = cursor.optionalDecimal('speed km/h');

  let speedKnots: number | null = null;
  if (knots !== null) {
    speedKnots = knots;
  } else if (kmh !== null) {
    speedKnots = kmh / KMH_PER_KNOT;
  }

  return { trueCourse, speedKnots };
}
