/**
 * GLL (geographic position) decoder
 * @module parsers/gll
 *
 * | Field | Example  | Description                                  |
 * |-------|----------|----------------------------------------------|
 * | 1,2   | 4916.45,N | Latitude DDmm.mm, N/S                       |
 * | 3,4   | 12311.12,W | Longitude DDDmm.mm, E/W                    |
 * | 5     | 225444   | UTC time of position                         |
 * | 6     | A        | Data status: A valid, V invalid              |
 * | 7     | A        | Mode indicator (NMEA 2.3+), may be absent    |
 *
 * Unlike GGA and RMC, a GLL flagged `V` fails to decode instead of
 * producing a record with its position missing.
 */

import type { GllData, PositioningMode, RawSentence } from '../types.js';
import { POSITIONING_MODE_MAP } from '../types.js';
import { ParseError } from '../errors.js';
import { FieldCursor } from '../utils/index.js';
import { expectMessageId } from './sentence.js';

/**
 * Decode a GLL sentence.
 *
 * @throws {MessageIdMismatchError} If the sentence is not GLL
 * @throws {ParseError} If a field breaks the grammar or the data is flagged invalid
 */
export function parseGll(sentence: RawSentence): GllData {
  expectMessageId(sentence, 'GLL');

  const cursor = new FieldCursor('GLL', sentence.payload);

  const { latitude, longitude } = cursor.requiredPosition();
  const fixTime = cursor.requiredTime('time');

  const status = cursor.next('status');
  if (status !== 'A') {
    throw new ParseError(`status '${status}' is not A (data valid)`, 'GLL', 'status', status);
  }

  const mode = parseMode(cursor.nextOrEmpty());

  return { latitude, longitude, fixTime, mode };
}

function parseMode(text: string): PositioningMode | null {
  if (text === '') {
    return null;
  }
  // Unknown letters read as "not valid" rather than failing the sentence
  if (!Object.hasOwn(POSITIONING_MODE_MAP, text)) {
    return 'data-not-valid';
  }
  return POSITIONING_MODE_MAP[text] ?? 'data-not-valid';
}
