/**
 * Core type definitions for the NMEA sentence SDK
 * @module types
 */

// Import and re-export protocol types from config to avoid duplication
import type { Constellation, SentenceType } from './config.js';
export type { Constellation, SentenceType } from './config.js';

// =============================================================================
// Envelope
// =============================================================================

/**
 * A framed sentence with its envelope stripped.
 * Talker and message ids are left uninterpreted.
 */
export interface RawSentence {
  /** Two-character talker id, e.g. `GP` */
  readonly talkerId: string;

  /** Three-character message id, e.g. `GGA` */
  readonly messageId: string;

  /** Everything between the comma after the message id and the `*` */
  readonly payload: string;

  /** Declared checksum, decoded from the two hex digits after `*` */
  readonly checksum: number;
}

// =============================================================================
// Primitive Values
// =============================================================================

/**
 * UTC time of day as reported by the receiver.
 */
export interface TimeOfDay {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
  /** Fractional second, rounded to whole nanoseconds */
  readonly nanoseconds: number;
}

/**
 * Calendar date as sent on the wire.
 * `year` is the two-digit value (0-99); the century is not guessed.
 */
export interface CalendarDate {
  readonly day: number;
  readonly month: number;
  readonly year: number;
}

// =============================================================================
// Enumerations
// =============================================================================

/**
 * GGA fix quality.
 * - invalid: no fix
 * - gps: standard GPS fix
 * - dgps: differential GPS
 * - pps: precise positioning service
 * - rtk-fixed: real time kinematic, fixed integers
 * - rtk-float: real time kinematic, float
 * - estimated: dead reckoning
 * - manual: manual input
 * - simulator: simulated data
 */
export type FixType =
  | 'invalid'
  | 'gps'
  | 'dgps'
  | 'pps'
  | 'rtk-fixed'
  | 'rtk-float'
  | 'estimated'
  | 'manual'
  | 'simulator';

/**
 * GGA fix-quality digit to FixType mapping.
 */
export const FIX_QUALITY_MAP: Readonly<Record<string, FixType>> = {
  '0': 'invalid',
  '1': 'gps',
  '2': 'dgps',
  '3': 'pps',
  '4': 'rtk-fixed',
  '5': 'rtk-float',
  '6': 'estimated',
  '7': 'manual',
  '8': 'simulator',
} as const;

/** RMC status of fix */
export type RmcStatus = 'autonomous' | 'differential' | 'invalid';

export const RMC_STATUS_MAP: Readonly<Record<string, RmcStatus>> = {
  A: 'autonomous',
  D: 'differential',
  V: 'invalid',
} as const;

/** GSA selection mode (first field) */
export type GsaSelectionMode = 'manual' | 'automatic';

export const GSA_SELECTION_MODE_MAP: Readonly<Record<string, GsaSelectionMode>> = {
  M: 'manual',
  A: 'automatic',
} as const;

/** GSA fix mode (second field) */
export type GsaFixMode = 'no-fix' | 'fix-2d' | 'fix-3d';

export const GSA_FIX_MODE_MAP: Readonly<Record<string, GsaFixMode>> = {
  '1': 'no-fix',
  '2': 'fix-2d',
  '3': 'fix-3d',
} as const;

/**
 * Positioning system mode indicator (NMEA 2.3 and later).
 * Letters other than A/D/E/M/N read as 'data-not-valid'.
 */
export type PositioningMode =
  | 'autonomous'
  | 'differential'
  | 'estimated'
  | 'manual'
  | 'data-not-valid';

export const POSITIONING_MODE_MAP: Readonly<Record<string, PositioningMode>> = {
  A: 'autonomous',
  D: 'differential',
  E: 'estimated',
  M: 'manual',
  N: 'data-not-valid',
} as const;

// =============================================================================
// Sentence Records
// =============================================================================

/**
 * One satellite block from a GSV sentence.
 */
export interface Satellite {
  readonly constellation: Constellation;
  /** Pseudo-random noise code, the satellite id within its constellation */
  readonly prn: number;
  /** Elevation in degrees */
  readonly elevation: number | null;
  /** Azimuth in degrees from true north */
  readonly azimuth: number | null;
  /** Signal-to-noise ratio in dB-Hz */
  readonly snr: number | null;
}

/**
 * Up to four satellite slots; trailing slots are null when the
 * sentence reports fewer.
 */
export type SatelliteSlots = readonly [
  Satellite | null,
  Satellite | null,
  Satellite | null,
  Satellite | null,
];

/** GSV: satellites in view */
export interface GsvData {
  readonly constellation: Constellation;
  /** Number of GSV sentences in this group */
  readonly sentenceCount: number;
  /** 1-based position of this sentence in the group */
  readonly sentenceIndex: number;
  readonly satellitesInView: number;
  readonly satellites: SatelliteSlots;
}

/** GGA: positioning fix */
export interface GgaData {
  readonly fixTime: TimeOfDay | null;
  readonly fixType: FixType;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly satelliteCount: number | null;
  readonly hdop: number | null;
  /** Altitude above mean sea level, metres */
  readonly altitude: number | null;
  /** Height of the geoid above the WGS84 ellipsoid, metres */
  readonly geoidHeight: number | null;
}

/** RMC: recommended minimum navigation data */
export interface RmcData {
  readonly fixTime: TimeOfDay | null;
  readonly status: RmcStatus;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly speedKnots: number | null;
  /** Course over ground, degrees true */
  readonly trueCourse: number | null;
  readonly fixDate: CalendarDate | null;
}

/** GSA: active satellites and dilution of precision */
export interface GsaData {
  readonly selectionMode: GsaSelectionMode;
  readonly fixMode: GsaFixMode;
  /** PRNs used in the fix, empty slots dropped */
  readonly prns: readonly number[];
  readonly pdop: number | null;
  readonly hdop: number | null;
  readonly vdop: number | null;
}

/** VTG: course and speed over ground */
export interface VtgData {
  readonly trueCourse: number | null;
  readonly speedKnots: number | null;
}

/** GLL: geographic position */
export interface GllData {
  readonly latitude: number;
  readonly longitude: number;
  readonly fixTime: TimeOfDay;
  readonly mode: PositioningMode | null;
}

// =============================================================================
// Parse Result
// =============================================================================

interface Decoded<T extends SentenceType, D> {
  readonly type: T;
  readonly talkerId: string;
  readonly data: D;
}

/**
 * Sentence kinds the SDK does not decode.
 * Routine in live streams, so not an error.
 */
export interface UnsupportedSentence {
  readonly type: 'unsupported';
  readonly talkerId: string;
  readonly messageId: string;
}

/**
 * Tagged result of decoding one sentence.
 */
export type ParseResult =
  | Decoded<'GGA', GgaData>
  | Decoded<'RMC', RmcData>
  | Decoded<'GSV', GsvData>
  | Decoded<'GSA', GsaData>
  | Decoded<'VTG', VtgData>
  | Decoded<'GLL', GllData>
  | UnsupportedSentence;
