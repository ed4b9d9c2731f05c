/**
 * Zod schemas for runtime validation
 * @module schemas
 *
 * These schemas cover:
 * - Decoder configuration (defaults applied here)
 * - Decoded records, for consumers receiving results across a process
 *   or network boundary, and for the decoder's `validateOutput` option
 */

import { z } from 'zod';
import { MAX_SENTENCE_LENGTH, SUPPORTED_SENTENCE_TYPES } from './config.js';

// =============================================================================
// Enumerations
// =============================================================================

export const constellationSchema = z.enum(['gps', 'galileo', 'glonass', 'beidou', 'qzss']);

export const fixTypeSchema = z.enum([
  'invalid',
  'gps',
  'dgps',
  'pps',
  'rtk-fixed',
  'rtk-float',
  'estimated',
  'manual',
  'simulator',
]);

export const sentenceTypeSchema = z.enum(SUPPORTED_SENTENCE_TYPES);

// =============================================================================
// Primitive Values
// =============================================================================

/** Latitude in signed decimal degrees */
const latitudeSchema = z.number().min(-90).max(90);

/** Longitude in signed decimal degrees */
const longitudeSchema = z.number().min(-180).max(180);

/** Dilution of precision, never negative */
const dopSchema = z.number().nonnegative();

export const timeOfDaySchema = z.object({
  hours: z.number().int().min(0).max(23),
  minutes: z.number().int().min(0).max(59),
  seconds: z.number().int().min(0).max(59),
  nanoseconds: z.number().int().min(0).max(999_999_999),
});

export const calendarDateSchema = z.object({
  day: z.number().int().min(1).max(31),
  month: z.number().int().min(1).max(12),
  /** Two-digit year as sent */
  year: z.number().int().min(0).max(99),
});

// =============================================================================
// Sentence Records
// =============================================================================

export const satelliteSchema = z.object({
  constellation: constellationSchema,
  prn: z.number().int().nonnegative(),
  elevation: z.number().nullable(),
  azimuth: z.number().nullable(),
  snr: z.number().nullable(),
});

export const gsvDataSchema = z.object({
  constellation: constellationSchema,
  sentenceCount: z.number().int().nonnegative(),
  sentenceIndex: z.number().int().nonnegative(),
  satellitesInView: z.number().int().nonnegative(),
  satellites: z.tuple([
    satelliteSchema.nullable(),
    satelliteSchema.nullable(),
    satelliteSchema.nullable(),
    satelliteSchema.nullable(),
  ]),
});

export const ggaDataSchema = z.object({
  fixTime: timeOfDaySchema.nullable(),
  fixType: fixTypeSchema,
  latitude: latitudeSchema.nullable(),
  longitude: longitudeSchema.nullable(),
  satelliteCount: z.number().int().nonnegative().nullable(),
  hdop: dopSchema.nullable(),
  altitude: z.number().nullable(),
  geoidHeight: z.number().nullable(),
});

export const rmcDataSchema = z.object({
  fixTime: timeOfDaySchema.nullable(),
  status: z.enum(['autonomous', 'differential', 'invalid']),
  latitude: latitudeSchema.nullable(),
  longitude: longitudeSchema.nullable(),
  speedKnots: z.number().nullable(),
  trueCourse: z.number().nullable(),
  fixDate: calendarDateSchema.nullable(),
});

export const gsaDataSchema = z.object({
  selectionMode: z.enum(['manual', 'automatic']),
  fixMode: z.enum(['no-fix', 'fix-2d', 'fix-3d']),
  prns: z.array(z.number().int().nonnegative()),
  pdop: dopSchema.nullable(),
  hdop: dopSchema.nullable(),
  vdop: dopSchema.nullable(),
});

export const vtgDataSchema = z.object({
  trueCourse: z.number().nullable(),
  speedKnots: z.number().nullable(),
});

export const gllDataSchema = z.object({
  latitude: latitudeSchema,
  longitude: longitudeSchema,
  fixTime: timeOfDaySchema,
  mode: z.enum(['autonomous', 'differential', 'estimated', 'manual', 'data-not-valid']).nullable(),
});

// =============================================================================
// Parse Result Schema
// =============================================================================

const talkerIdSchema = z.string().length(2);

/**
 * Schema for the tagged result of one decode call.
 */
export const parseResultSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('GGA'), talkerId: talkerIdSchema, data: ggaDataSchema }),
  z.object({ type: z.literal('RMC'), talkerId: talkerIdSchema, data: rmcDataSchema }),
  z.object({ type: z.literal('GSV'), talkerId: talkerIdSchema, data: gsvDataSchema }),
  z.object({ type: z.literal('GSA'), talkerId: talkerIdSchema, data: gsaDataSchema }),
  z.object({ type: z.literal('VTG'), talkerId: talkerIdSchema, data: vtgDataSchema }),
  z.object({ type: z.literal('GLL'), talkerId: talkerIdSchema, data: gllDataSchema }),
  z.object({
    type: z.literal('unsupported'),
    talkerId: talkerIdSchema,
    messageId: z.string().length(3),
  }),
]);

export type ValidatedParseResult = z.infer<typeof parseResultSchema>;

// =============================================================================
// Decoder Config Schema
// =============================================================================

/**
 * Schema for NmeaDecoder configuration.
 */
export const decoderConfigSchema = z.object({
  /** Length ceiling in bytes; can only be tightened below the protocol slack */
  maxSentenceLength: z.number().int().positive().max(MAX_SENTENCE_LENGTH).default(MAX_SENTENCE_LENGTH),

  /** Drop a trailing CR/LF before framing */
  stripLineEnding: z.boolean().default(true),

  /** Extra talker id → constellation entries for GSV */
  constellations: z.record(z.string().regex(/^[A-Z0-9]{2}$/, 'Talker id must be 2 characters'), constellationSchema).default({}),

  /** Validate every decoded record against parseResultSchema */
  validateOutput: z.boolean().default(false),
}).strict();

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Join Zod issues into one line: `path: message, path: message`.
 */
export function formatIssues(error: Pick<z.ZodError, 'issues'>): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

/**
 * Parse a value with a Zod schema, throwing a detailed error on failure.
 */
export function parseOrThrow<T>(schema: z.ZodType<T>, data: unknown, context?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  throw new Error(`${context ?? 'Validation failed'}: ${formatIssues(result.error)}`);
}
