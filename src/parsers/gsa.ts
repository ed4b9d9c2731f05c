/**
 * GSA (active satellites, dilution of precision) decoder
 * @module parsers/gsa
 *
 * ```
 * $GPGSA,A,3,,,,,,16,18,,22,24,,,3.6,2.1,2.2*3C
 * A        selection mode: M manual, A automatic
 * 3        fix mode: 1 none, 2 2D, 3 3D
 * ...      PRNs used in the fix, empty for unused slots
 * 3.6      PDOP
 * 2.1      HDOP
 * 2.2      VDOP
 * ```
 *
 * Most documents give 12 PRN slots, but the count varies (the CH-4701
 * sends 24), so the PRN list is read up to the DOP triple instead of
 * by position. Some SiRF receivers send `$GPGSA,A,1,,,,*32` with no
 * fix: an all-empty tail decodes to no PRNs and no DOPs.
 */

import type { GsaData, RawSentence } from '../types.js';
import { GSA_FIX_MODE_MAP, GSA_SELECTION_MODE_MAP } from '../types.js';
import { ParseError } from '../errors.js';
import { FieldCursor, parseDecimal, parseInteger } from '../utils/index.js';
import { expectMessageId } from './sentence.js';

const DOP_FIELDS = ['pdop', 'hdop', 'vdop'] as const;
const PRN_FIELD = /^\d*$/;

/**
 * Decode a GSA sentence.
 *
 * @throws {MessageIdMismatchError} If the sentence is not GSA
 * @throws {ParseError} If a field breaks the grammar
 */
export function parseGsa(sentence: RawSentence): GsaData {
  expectMessageId(sentence, 'GSA');

  const cursor = new FieldCursor('GSA', sentence.payload);

  const selectionMode = cursor.oneOf('selection mode', GSA_SELECTION_MODE_MAP);
  const fixMode = cursor.oneOf('fix mode', GSA_FIX_MODE_MAP);
  const tail = cursor.rest();

  if (tail.length > 1 && tail.every((field) => field === '')) {
    return { selectionMode, fixMode, prns: [], pdop: null, hdop: null, vdop: null };
  }

  if (tail.length < DOP_FIELDS.length) {
    throw new ParseError(
      `expected PRN list and ${String(DOP_FIELDS.length)} DOP fields, got ${String(tail.length)} fields`,
      'GSA'
    );
  }

  // PRN slots are empty or all digits; the first field that is neither,
  // or the last three fields, start the DOP triple.
  let dopStart = 0;
  while (dopStart < tail.length - DOP_FIELDS.length && PRN_FIELD.test(tail[dopStart] ?? '')) {
    dopStart++;
  }

  const prns: number[] = [];
  for (const [i, field] of tail.slice(0, dopStart).entries()) {
    if (field !== '') {
      prns.push(parseInteger(field, { messageId: 'GSA', field: `prn ${String(i + 1)}` }));
    }
  }

  const dops = tail.slice(dopStart, dopStart + DOP_FIELDS.length);
  if (dops.every((field) => field === '')) {
    throw new ParseError('PRNs reported without a DOP triple', 'GSA', 'pdop');
  }

  const [pdop, hdop, vdop] = DOP_FIELDS.map((name, i) => {
    const field = tail[dopStart + i] ?? '';
    if (field === '') {
      throw new ParseError('DOP values must be all present or all empty', 'GSA', name);
    }
    return parseDecimal(field, { messageId: 'GSA', field: name });
  });

  return {
    selectionMode,
    fixMode,
    prns,
    pdop: pdop ?? null,
    hdop: hdop ?? null,
    vdop: vdop ?? null,
  };
}
