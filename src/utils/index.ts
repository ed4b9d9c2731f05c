/**
 * Utility module exports
 * @module utils
 */

export {
  checksum,
  sentenceChecksum,
  parseChecksumHex,
  formatChecksum,
} from './checksum.js';

export {
  toSentenceBytes,
  bytesToBinaryString,
  stripLineEnding,
  type SentenceInput,
} from './encoding.js';

export {
  parseInteger,
  parseDecimal,
  parseTimeOfDay,
  parseCalendarDate,
  parseLatitude,
  parseLongitude,
  type FieldContext,
} from './fields.js';

export { FieldCursor, type FieldDecoder, type Position } from './cursor.js';
