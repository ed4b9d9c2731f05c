/**
 * Parser module exports
 * @module parsers
 */

export { parseSentence, verifyChecksum, expectMessageId } from './sentence.js';
export { decodeSentence, dispatch } from './dispatch.js';

export { parseGga } from './gga.js';
export { parseRmc } from './rmc.js';
export { parseGsv } from './gsv.js';
export { parseGsa } from './gsa.js';
export { parseVtg } from './vtg.js';
export { parseGll } from './gll.js';
