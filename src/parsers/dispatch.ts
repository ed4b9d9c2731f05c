/**
 * Sentence dispatcher
 * @module parsers/dispatch
 *
 * frame → verify checksum → route by message id → wrap in a tagged result.
 */

import type { ParseResult, RawSentence } from '../types.js';
import { isSupportedSentenceType, type DecodeOptions } from '../config.js';
import type { SentenceInput } from '../utils/index.js';
import { parseSentence, verifyChecksum } from './sentence.js';
import { parseGga } from './gga.js';
import { parseRmc } from './rmc.js';
import { parseGsv } from './gsv.js';
import { parseGsa } from './gsa.js';
import { parseVtg } from './vtg.js';
import { parseGll } from './gll.js';

/**
 * Decode one NMEA 0183 sentence.
 *
 * Sentence types other than GGA, RMC, GSV, GSA, VTG and GLL come back as
 * `{ type: 'unsupported' }` rather than an error, since receivers mix many
 * proprietary and rarely used sentences into the same stream.
 *
 * @param input - One sentence, text or bytes, optionally ending in CR LF
 * @param options - Framing and talker options
 * @returns The decoded, tagged record
 * @throws {NmeaError} Subclass describing the first failure
 *
 * @example
 * ```typescript
 * const result = decodeSentence('$GPVTG,360.0,T,348.7,M,000.0,N,000.0,K*43');
 * if (result.type === 'VTG') {
 *   console.log(result.data.speedKnots); // 0
 * }
 * ```
 */
export function decodeSentence(input: SentenceInput, options: DecodeOptions = {}): ParseResult {
  const sentence = parseSentence(input, options);
  verifyChecksum(sentence);
  return dispatch(sentence, options);
}

/**
 * Route a framed, checksum-verified sentence to its grammar decoder.
 */
export function dispatch(sentence: RawSentence, options: DecodeOptions = {}): ParseResult {
  const { talkerId, messageId } = sentence;

  if (!isSupportedSentenceType(messageId)) {
    return { type: 'unsupported', talkerId, messageId };
  }

  switch (messageId) {
    case 'GGA':
      return { type: 'GGA', talkerId, data: parseGga(sentence) };
    case 'RMC':
      return { type: 'RMC', talkerId, data: parseRmc(sentence) };
    case 'GSV':
      return { type: 'GSV', talkerId, data: parseGsv(sentence, options) };
    case 'GSA':
      return { type: 'GSA', talkerId, data: parseGsa(sentence) };
    case 'VTG':
      return { type: 'VTG', talkerId, data: parseVtg(sentence) };
    case 'GLL':
      return { type: 'GLL', talkerId, data: parseGll(sentence) };
  }
}
