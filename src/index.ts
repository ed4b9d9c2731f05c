/**
 * NMEA 0183 Sentence SDK
 *
 * Decodes single NMEA 0183 sentences (GGA, RMC, GSV, GSA, VTG, GLL) into
 * typed records after checking framing and checksum.
 *
 * @example
 * ```typescript
 * import { NmeaDecoder } from 'nmea-sentence-sdk';
 *
 * const decoder = new NmeaDecoder();
 *
 * const result = decoder.decode('$GPGGA,,,,,,0,,,,,,,,*66');
 * if (result.type === 'GGA') {
 *   console.log(result.data.fixType); // 'invalid'
 * }
 *
 * // Without exceptions
 * const outcome = decoder.safeDecode(line);
 * if (!outcome.success) {
 *   console.warn(outcome.error.kind);
 * }
 * ```
 *
 * @module
 */

import type { Constellation, ParseResult, SentenceType } from './types.js';
import { SUPPORTED_SENTENCE_TYPES, type DecodeOptions } from './config.js';
import { ParseError, isNmeaError, type NmeaError } from './errors.js';
import { decodeSentence } from './parsers/dispatch.js';
import { decoderConfigSchema, formatIssues, parseOrThrow, parseResultSchema } from './schemas.js';
import type { SentenceInput } from './utils/index.js';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Configuration options for NmeaDecoder.
 */
export interface NmeaDecoderConfig {
  /**
   * Length ceiling in bytes. May be lowered, not raised.
   * @default 102
   */
  maxSentenceLength?: number;

  /**
   * Whether to drop a trailing CR LF / LF / CR before framing.
   * @default true
   */
  stripLineEnding?: boolean;

  /**
   * Talker id → constellation entries for GSV, merged over the built-in
   * table. Lets receivers with vendor talker ids be decoded without an
   * SDK update.
   * @default {}
   */
  constellations?: Record<string, Constellation>;

  /**
   * Whether to check every decoded record against `parseResultSchema`
   * (coordinate ranges, DOP signs) before returning it.
   * @default false
   */
  validateOutput?: boolean;
}

/**
 * Result of `safeDecode`.
 */
export type DecodeOutcome =
  | { readonly success: true; readonly data: ParseResult }
  | { readonly success: false; readonly error: NmeaError };

// =============================================================================
// Main Decoder Class
// =============================================================================

/**
 * NMEA 0183 sentence decoder.
 *
 * Holds only configuration; every call decodes its input from scratch
 * and shares nothing with other calls.
 *
 * @example
 * ```typescript
 * const decoder = new NmeaDecoder({ constellations: { GI: 'gps' } });
 * const result = decoder.decode('$GPRMC,225446.33,A,4916.45,N,12311.12,W,000.5,054.7,191194,020.3,E,A*2B');
 * ```
 */
export class NmeaDecoder {
  private readonly options: Readonly<DecodeOptions>;
  private readonly validateOutput: boolean;

  /**
   * Create a new decoder.
   *
   * @param config - Decoder configuration options
   * @throws {Error} If the configuration is invalid
   */
  constructor(config: NmeaDecoderConfig = {}) {
    // Validate config with Zod schema for runtime safety
    const validated = parseOrThrow(decoderConfigSchema, config, 'Invalid decoder config');

    this.options = Object.freeze({
      maxSentenceLength: validated.maxSentenceLength,
      stripLineEnding: validated.stripLineEnding,
      constellations: Object.freeze({ ...validated.constellations }),
    });
    this.validateOutput = validated.validateOutput;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Decode one sentence.
   *
   * @param input - Sentence text or bytes
   * @returns Tagged record; `type: 'unsupported'` for other sentence kinds
   * @throws {SentenceTooLongError} If the input is over the length ceiling
   * @throws {MalformedSentenceError} If the envelope is broken
   * @throws {ChecksumFormatError} If the checksum is not hex
   * @throws {ChecksumMismatchError} If the checksum does not match
   * @throws {ParseError} If the payload breaks its grammar
   */
  decode(input: SentenceInput): ParseResult {
    const result = decodeSentence(input, this.options);

    if (this.validateOutput) {
      this.checkOutput(result);
    }

    return result;
  }

  /**
   * Decode one sentence without throwing decode failures.
   * Errors that are not NmeaErrors still propagate.
   */
  safeDecode(input: SentenceInput): DecodeOutcome {
    try {
      return { success: true, data: this.decode(input) };
    } catch (error) {
      if (isNmeaError(error)) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Get the message ids this decoder turns into records.
   */
  getSupportedSentenceTypes(): readonly SentenceType[] {
    return SUPPORTED_SENTENCE_TYPES;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private checkOutput(result: ParseResult): void {
    const check = parseResultSchema.safeParse(result);
    if (!check.success) {
      const messageId = result.type === 'unsupported' ? result.messageId : result.type;
      throw new ParseError(`decoded record failed validation: ${formatIssues(check.error)}`, messageId);
    }
  }
}

// =============================================================================
// Re-exports
// =============================================================================

// Types
export type {
  RawSentence,
  TimeOfDay,
  CalendarDate,
  FixType,
  RmcStatus,
  GsaSelectionMode,
  GsaFixMode,
  PositioningMode,
  Constellation,
  SentenceType,
  Satellite,
  SatelliteSlots,
  GgaData,
  RmcData,
  GsvData,
  GsaData,
  VtgData,
  GllData,
  UnsupportedSentence,
  ParseResult,
} from './types.js';

export {
  FIX_QUALITY_MAP,
  RMC_STATUS_MAP,
  GSA_SELECTION_MODE_MAP,
  GSA_FIX_MODE_MAP,
  POSITIONING_MODE_MAP,
} from './types.js';

// Config
export {
  MAX_SENTENCE_LENGTH,
  KMH_PER_KNOT,
  SUPPORTED_SENTENCE_TYPES,
  TALKER_CONSTELLATIONS,
  isSupportedSentenceType,
  getConstellation,
} from './config.js';
export type { DecodeOptions } from './config.js';

// Errors
export {
  NmeaError,
  SentenceTooLongError,
  MalformedSentenceError,
  ChecksumFormatError,
  ChecksumMismatchError,
  MessageIdMismatchError,
  ParseError,
  isNmeaError,
  isChecksumError,
} from './errors.js';
export type { NmeaErrorKind } from './errors.js';

// Parsers
export {
  decodeSentence,
  parseSentence,
  verifyChecksum,
  parseGga,
  parseRmc,
  parseGsv,
  parseGsa,
  parseVtg,
  parseGll,
} from './parsers/index.js';

// Schemas
export {
  parseResultSchema,
  decoderConfigSchema,
  ggaDataSchema,
  rmcDataSchema,
  gsvDataSchema,
  gsaDataSchema,
  vtgDataSchema,
  gllDataSchema,
  satelliteSchema,
  timeOfDaySchema,
  calendarDateSchema,
  sentenceTypeSchema,
} from './schemas.js';
export type { ValidatedParseResult } from './schemas.js';

// Utilities
export {
  checksum,
  sentenceChecksum,
  formatChecksum,
  parseChecksumHex,
  type SentenceInput,
} from './utils/index.js';
