/**
 * GSV (satellites in view) decoder
 * @module parsers/gsv
 *
 * ```
 * $GPGSV,2,1,08,01,40,083,46,02,17,308,41,12,07,344,39,14,22,228,45*75
 * 2            number of sentences in this group
 * 1            this sentence's 1-based index
 * 08           satellites in view
 * 01,40,083,46 PRN, elevation, azimuth, SNR; repeated up to 4 times
 * ```
 *
 * The talker id picks the constellation. BD/GB (BeiDou) and QZ (QZSS)
 * appear alongside GP/GA/GL/GN on multi-constellation receivers.
 */

import type { Constellation, GsvData, RawSentence, Satellite, SatelliteSlots } from '../types.js';
import { getConstellation, type DecodeOptions } from '../config.js';
import { ParseError } from '../errors.js';
import { FieldCursor } from '../utils/index.js';
import { expectMessageId } from './sentence.js';

const SLOTS_PER_SENTENCE = 4;

/** PRN, elevation and azimuth; SNR may be cut off at the end of the payload */
const MIN_BLOCK_FIELDS = 3;

/**
 * Decode a GSV sentence.
 *
 * @param sentence - Framed sentence
 * @param options - `constellations` overrides for the talker lookup
 * @throws {MessageIdMismatchError} If the sentence is not GSV
 * @throws {ParseError} If the talker is unknown or a field breaks the grammar
 */
export function parseGsv(sentence: RawSentence, options: DecodeOptions = {}): GsvData {
  expectMessageId(sentence, 'GSV');

  const constellation = getConstellation(sentence.talkerId, options.constellations);
  if (constellation === undefined) {
    throw new ParseError(
      `unknown GNSS talker '${sentence.talkerId}'`,
      'GSV',
      'talker id',
      sentence.talkerId
    );
  }

  const cursor = new FieldCursor('GSV', sentence.payload);

  const sentenceCount = cursor.requiredInteger('sentence count');
  const sentenceIndex = cursor.requiredInteger('sentence index');
  const satellitesInView = cursor.requiredInteger('satellites in view');

  const satellites: Satellite[] = [];
  let padded = false;

  // Fewer than three trailing fields cannot hold a block; NMEA 4.10 puts a
  // signal id there.
  for (let slot = 1; slot <= SLOTS_PER_SENTENCE && cursor.remaining >= MIN_BLOCK_FIELDS; slot++) {
    const satellite = parseSatellite(cursor, constellation, slot);
    if (satellite === null) {
      padded = true;
    } else if (padded) {
      throw new ParseError('satellite follows an empty block', 'GSV', `satellite ${String(slot)} prn`);
    } else {
      satellites.push(satellite);
    }
  }

  return {
    constellation,
    sentenceCount,
    sentenceIndex,
    satellitesInView,
    satellites: toSlots(satellites),
  };
}

/**
 * Read one `PRN,elevation,azimuth,SNR` block. A block with every field
 * empty is padding and reads as null; only trailing blocks may be padding.
 */
function parseSatellite(
  cursor: FieldCursor,
  constellation: Constellation,
  slot: number
): Satellite | null {
  const label = `satellite ${String(slot)}`;
  const prn = cursor.optionalInteger(`${label} prn`);
  const elevation = cursor.optionalInteger(`${label} elevation`);
  const azimuth = cursor.optionalInteger(`${label} azimuth`);
  const snr = cursor.hasMore ? cursor.optionalInteger(`${label} snr`) : null;

  if (prn === null) {
    if (elevation !== null || azimuth !== null || snr !== null) {
      throw new ParseError('required field is empty', 'GSV', `${label} prn`);
    }
    return null;
  }

  return { constellation, prn, elevation, azimuth, snr };
}

function toSlots(slots: readonly Satellite[]): SatelliteSlots {
  return [slots[0] ?? null, slots[1] ?? null, slots[2] ?? null, slots[3] ?? null];
}
