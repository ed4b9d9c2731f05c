/**
 * Protocol constants and talker configuration for the NMEA sentence SDK
 * @module config
 */

// =============================================================================
// Protocol Limits
// =============================================================================

/**
 * Longest sentence accepted, in bytes.
 *
 * NMEA 0183 3.01 caps a sentence at 82 characters including `$` and the
 * trailing CR LF, but several receivers emit longer ones (a 91-character
 * GGA from the Trimble BX-960, a 100-character PSTI from the Skytraq
 * S2525F8). Much longer input is usually two sentences merged by a
 * garbled transport, so it is rejected before tokenizing.
 */
export const MAX_SENTENCE_LENGTH = 102;

/** Kilometres per hour in one knot */
export const KMH_PER_KNOT = 1.852;

// =============================================================================
// Sentence Types
// =============================================================================

/**
 * Message ids the SDK decodes.
 */
export const SUPPORTED_SENTENCE_TYPES = ['GGA', 'RMC', 'GSV', 'GSA', 'VTG', 'GLL'] as const;

export type SentenceType = (typeof SUPPORTED_SENTENCE_TYPES)[number];

/**
 * Check whether a message id is one the SDK decodes.
 */
export function isSupportedSentenceType(messageId: string): messageId is SentenceType {
  return (SUPPORTED_SENTENCE_TYPES as readonly string[]).includes(messageId);
}

// =============================================================================
// Talker → Constellation Matrix
// =============================================================================

/**
 * Satellite constellations.
 * - gps: GPS, including SBAS
 * - galileo: Galileo
 * - glonass: GLONASS
 * - beidou: BeiDou
 * - qzss: Japanese QZSS
 */
export type Constellation = 'gps' | 'galileo' | 'glonass' | 'beidou' | 'qzss';

/**
 * Talker id to constellation mapping used by GSV.
 *
 * GL is sometimes sent for mixed GSV groups and GN for GLONASS-only
 * ones; usage across vendors is inconsistent, so both map to GLONASS.
 * Callers can extend or override this via `NmeaDecoderConfig.constellations`.
 */
export const TALKER_CONSTELLATIONS: Readonly<Record<string, Constellation>> = {
  GP: 'gps',
  GA: 'galileo',
  GL: 'glonass',
  GN: 'glonass',
  BD: 'beidou',
  GB: 'beidou',
  QZ: 'qzss',
} as const;

/**
 * Resolve the constellation for a talker id, checking overrides first.
 *
 * @returns The constellation, or undefined if the talker is unknown
 */
export function getConstellation(
  talkerId: string,
  overrides?: Readonly<Record<string, Constellation>>
): Constellation | undefined {
  return overrides?.[talkerId] ?? TALKER_CONSTELLATIONS[talkerId];
}

// =============================================================================
// Decode Options
// =============================================================================

/**
 * Options shared by the framer, the dispatcher and the grammar decoders.
 * `NmeaDecoder` fills these from its validated config.
 */
export interface DecodeOptions {
  /** Length ceiling in bytes, at most 102 (default: 102) */
  readonly maxSentenceLength?: number;

  /** Drop a trailing CR/LF before framing (default: true) */
  readonly stripLineEnding?: boolean;

  /** Extra or replacement talker → constellation entries for GSV */
  readonly constellations?: Readonly<Record<string, Constellation>>;
}
