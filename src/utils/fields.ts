/**
 * Primitive field decoders
 * @module utils/fields
 *
 * Each decoder takes the text of one field and throws a ParseError naming
 * the sentence and field when the text does not fit. Empty fields never
 * reach these functions: the cursor turns them into null first.
 */

import { ParseError } from '../errors.js';
import type { CalendarDate, TimeOfDay } from '../types.js';

/**
 * Where a field sits, for error messages.
 */
export interface FieldContext {
  readonly messageId: string;
  readonly field: string;
}

const DIGITS = /^\d+$/;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SECONDS = /^\d+(?:\.\d*)?$/;
const NANOS_PER_SECOND = 1_000_000_000;

function fail(message: string, text: string, ctx: FieldContext): never {
  throw new ParseError(message, ctx.messageId, ctx.field, text);
}

/**
 * Parse a run of ASCII digits.
 *
 * @example
 * parseInteger('07', ctx) // => 7
 */
export function parseInteger(text: string, ctx: FieldContext): number {
  if (!DIGITS.test(text)) {
    fail(`'${text}' is not an unsigned integer`, text, ctx);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    fail(`'${text}' is too large`, text, ctx);
  }
  return value;
}

/**
 * Parse a decimal number: optional sign, digits, optional fraction
 * and exponent.
 *
 * @example
 * parseDecimal('054.7', ctx) // => 54.7
 */
export function parseDecimal(text: string, ctx: FieldContext): number {
  if (!DECIMAL.test(text)) {
    fail(`'${text}' is not a number`, text, ctx);
  }
  return Number(text);
}

/**
 * Parse `hhmmss[.sss]` UTC time.
 * Hours and minutes are fixed two-digit fields; seconds take the rest
 * and may carry any number of fractional digits.
 *
 * @example
 * parseTimeOfDay('225446.33', ctx)
 * // => { hours: 22, minutes: 54, seconds: 46, nanoseconds: 330000000 }
 */
export function parseTimeOfDay(text: string, ctx: FieldContext): TimeOfDay {
  if (text.length < 5) {
    fail(`'${text}' is too short for hhmmss`, text, ctx);
  }

  const hours = parseInteger(text.slice(0, 2), ctx);
  const minutes = parseInteger(text.slice(2, 4), ctx);
  const secondsText = text.slice(4);
  if (!SECONDS.test(secondsText)) {
    fail(`seconds '${secondsText}' are not an unsigned decimal`, text, ctx);
  }
  const rawSeconds = Number(secondsText);

  if (hours >= 24) {
    fail(`hour ${String(hours)} is not below 24`, text, ctx);
  }
  if (minutes >= 60) {
    fail(`minute ${String(minutes)} is not below 60`, text, ctx);
  }
  if (rawSeconds >= 60) {
    fail(`second ${String(rawSeconds)} is not below 60`, text, ctx);
  }

  const seconds = Math.trunc(rawSeconds);
  const nanoseconds = Math.min(
    Math.round((rawSeconds - seconds) * NANOS_PER_SECOND),
    NANOS_PER_SECOND - 1
  );

  return { hours, minutes, seconds, nanoseconds };
}

/**
 * Parse a `ddmmyy` date. Only the month (1-12) and day (1-31) ranges are
 * checked; the day is not checked against the month length.
 *
 * @example
 * parseCalendarDate('191194', ctx) // => { day: 19, month: 11, year: 94 }
 */
export function parseCalendarDate(text: string, ctx: FieldContext): CalendarDate {
  if (text.length !== 6) {
    fail(`'${text}' is not a ddmmyy date`, text, ctx);
  }

  const day = parseInteger(text.slice(0, 2), ctx);
  const month = parseInteger(text.slice(2, 4), ctx);
  const year = parseInteger(text.slice(4, 6), ctx);

  if (month < 1 || month > 12) {
    fail(`month ${String(month)} is outside 1-12`, text, ctx);
  }
  if (day < 1 || day > 31) {
    fail(`day ${String(day)} is outside 1-31`, text, ctx);
  }

  return { day, month, year };
}

/**
 * Parse a `DDmm.mmm` / `DDDmm.mmm` angle into decimal degrees.
 *
 * @param degreeDigits - Width of the degree part (2 for latitude, 3 for longitude)
 */
function parseAngle(text: string, degreeDigits: number, ctx: FieldContext): number {
  if (text.length <= degreeDigits) {
    fail(`'${text}' has no minutes after the degrees`, text, ctx);
  }

  const degrees = parseInteger(text.slice(0, degreeDigits), ctx);
  const minutes = parseDecimal(text.slice(degreeDigits), ctx);

  return degrees + minutes / 60;
}

/**
 * Parse latitude `DDmm.mmm` with its N/S hemisphere.
 *
 * @example
 * parseLatitude('4916.45', 'N', ctx) // => 49.274166...
 */
export function parseLatitude(text: string, hemisphere: string, ctx: FieldContext): number {
  const value = parseAngle(text, 2, ctx);

  switch (hemisphere) {
    case 'N':
      return value;
    case 'S':
      return -value;
    default:
      return fail(`hemisphere '${hemisphere}' is not N or S`, hemisphere, ctx);
  }
}

/**
 * Parse longitude `DDDmm.mmm` with its E/W hemisphere.
 *
 * @example
 * parseLongitude('12311.12', 'W', ctx) // => -123.185333...
 */
export function parseLongitude(text: string, hemisphere: string, ctx: FieldContext): number {
  const value = parseAngle(text, 3, ctx);

  switch (hemisphere) {
    case 'E':
      return value;
    case 'W':
      return -value;
    default:
      return fail(`hemisphere '${hemisphere}' is not E or W`, hemisphere, ctx);
  }
}
