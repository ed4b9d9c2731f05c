/**
 * Sentence framer
 * @module parsers/sentence
 *
 * Splits `$ttmmm,<payload>*hh` into talker id, message id, payload and
 * declared checksum. Field grammar is left to the per-type decoders.
 */

import type { RawSentence } from '../types.js';
import { MAX_SENTENCE_LENGTH, type DecodeOptions } from '../config.js';
import {
  ChecksumMismatchError,
  MalformedSentenceError,
  MessageIdMismatchError,
  SentenceTooLongError,
} from '../errors.js';
import {
  bytesToBinaryString,
  parseChecksumHex,
  sentenceChecksum,
  stripLineEnding,
  toSentenceBytes,
  type SentenceInput,
} from '../utils/index.js';

/** `$` + 2-char talker + 3-char message id */
const ID_END = 6;

/**
 * Frame one sentence.
 *
 * The length ceiling is checked on the raw bytes before anything else.
 * `maxSentenceLength` may lower the ceiling but not raise it.
 * A trailing line ending is dropped afterwards unless
 * `stripLineEnding` is false.
 *
 * @param input - One candidate sentence
 * @param options - Length ceiling and line ending handling
 * @returns The framed sentence; its checksum is not verified yet
 * @throws {SentenceTooLongError} If the input exceeds the ceiling
 * @throws {MalformedSentenceError} If the envelope is broken
 * @throws {ChecksumFormatError} If the checksum is not two hex digits
 *
 * @example
 * parseSentence('$GPGGA,,,,,,0,,,,,,,,*66')
 * // => { talkerId: 'GP', messageId: 'GGA', payload: ',,,,,0,,,,,,,,', checksum: 0x66 }
 */
export function parseSentence(input: SentenceInput, options: DecodeOptions = {}): RawSentence {
  const { stripLineEnding: strip = true } = options;
  const maxLength = resolveMaxLength(options.maxSentenceLength);

  const bytes = toSentenceBytes(input);
  if (bytes.length > maxLength) {
    throw new SentenceTooLongError(bytes.length, maxLength);
  }

  const decoded = bytesToBinaryString(bytes);
  const text = strip ? stripLineEnding(decoded) : decoded;

  if (!text.startsWith('$')) {
    throw new MalformedSentenceError("missing '$' start marker", text);
  }
  if (text.length <= ID_END) {
    throw new MalformedSentenceError('truncated talker or message id', text);
  }
  if (text[ID_END] !== ',') {
    throw new MalformedSentenceError(`expected ',' after '${text.slice(0, ID_END)}'`, text);
  }

  const star = text.indexOf('*', ID_END + 1);
  if (star === -1) {
    throw new MalformedSentenceError("missing '*' before checksum", text);
  }

  const checksumText = text.slice(star + 1);
  if (checksumText.length < 2) {
    throw new MalformedSentenceError('truncated checksum', text);
  }
  if (checksumText.length > 2) {
    throw new MalformedSentenceError('unexpected data after checksum', text);
  }

  return {
    talkerId: text.slice(1, 3),
    messageId: text.slice(3, ID_END),
    payload: text.slice(ID_END + 1, star),
    checksum: parseChecksumHex(checksumText),
  };
}

/**
 * The ceiling can be lowered, never raised. Anything but a positive
 * integer falls back to the protocol limit.
 */
function resolveMaxLength(requested: number | undefined): number {
  if (requested === undefined || !Number.isInteger(requested) || requested <= 0) {
    return MAX_SENTENCE_LENGTH;
  }
  return Math.min(requested, MAX_SENTENCE_LENGTH);
}

/**
 * Compare the declared checksum with the XOR over the sentence body.
 *
 * @throws {ChecksumMismatchError} If they differ
 */
export function verifyChecksum(sentence: RawSentence): void {
  const computed = sentenceChecksum(sentence);
  if (computed !== sentence.checksum) {
    throw new ChecksumMismatchError(sentence.checksum, computed);
  }
}

/**
 * Guard used by the grammar decoders against being handed the wrong type.
 *
 * @throws {MessageIdMismatchError} If the message id differs
 */
export function expectMessageId(sentence: RawSentence, messageId: string): void {
  if (sentence.messageId !== messageId) {
    throw new MessageIdMismatchError(messageId, sentence.messageId);
  }
}
