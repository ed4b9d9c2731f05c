/**
 * Field cursor over a sentence payload
 * @module utils/cursor
 *
 * Grammar decoders read their fields in source order through a FieldCursor,
 * so each decoder is a flat list of "take this field as that" calls
 * instead of index arithmetic. An empty field decodes to null through the
 * `optional*` readers and fails through the `required*` ones.
 */

import { ParseError } from '../errors.js';
import {
  parseCalendarDate,
  parseDecimal,
  parseInteger,
  parseLatitude,
  parseLongitude,
  parseTimeOfDay,
  type FieldContext,
} from './fields.js';
import type { CalendarDate, TimeOfDay } from '../types.js';

/**
 * Decoder for the text of one non-empty field.
 */
export type FieldDecoder<T> = (text: string, ctx: FieldContext) => T;

/**
 * A latitude/longitude pair in signed decimal degrees.
 */
export interface Position {
  readonly latitude: number;
  readonly longitude: number;
}

export class FieldCursor {
  private readonly fields: readonly string[];
  private index = 0;

  /**
   * @param messageId - Sentence type, used in error messages
   * @param payload - Data between the id comma and the `*`
   */
  constructor(
    private readonly messageId: string,
    payload: string
  ) {
    this.fields = payload.split(',');
  }

  /** Whether any fields are left */
  get hasMore(): boolean {
    return this.index < this.fields.length;
  }

  /** Number of fields left */
  get remaining(): number {
    return this.fields.length - this.index;
  }

  /**
   * Take the next field's raw text.
   *
   * @throws {ParseError} If the payload has no more fields
   */
  next(name: string): string {
    const text = this.fields[this.index];
    if (text === undefined) {
      throw new ParseError(
        `missing field (payload has ${String(this.fields.length)} fields)`,
        this.messageId,
        name
      );
    }
    this.index++;
    return text;
  }

  /**
   * Take the next field, or '' when the payload has run out.
   */
  nextOrEmpty(): string {
    return this.hasMore ? this.next('') : '';
  }

  /**
   * Consume a field whose value is not used (unit letters and the like).
   */
  skip(name: string): void {
    this.next(name);
  }

  /**
   * Take every remaining field.
   */
  rest(): string[] {
    const fields = this.fields.slice(this.index);
    this.index = this.fields.length;
    return fields;
  }

  /**
   * Decode the next field, or null if it is empty.
   */
  optional<T>(name: string, decode: FieldDecoder<T>): T | null {
    const text = this.next(name);
    return text === '' ? null : decode(text, this.context(name));
  }

  /**
   * Decode the next field, which must not be empty.
   */
  required<T>(name: string, decode: FieldDecoder<T>): T {
    const text = this.next(name);
    if (text === '') {
      throw new ParseError('required field is empty', this.messageId, name);
    }
    return decode(text, this.context(name));
  }

  optionalInteger(name: string): number | null {
    return this.optional(name, parseInteger);
  }

  requiredInteger(name: string): number {
    return this.required(name, parseInteger);
  }

  optionalDecimal(name: string): number | null {
    return this.optional(name, parseDecimal);
  }

  optionalTime(name: string): TimeOfDay | null {
    return this.optional(name, parseTimeOfDay);
  }

  requiredTime(name: string): TimeOfDay {
    return this.required(name, parseTimeOfDay);
  }

  optionalDate(name: string): CalendarDate | null {
    return this.optional(name, parseCalendarDate);
  }

  /**
   * Take a single-character field and map it through a lookup table.
   *
   * @throws {ParseError} If the field is not one of the table's keys
   */
  oneOf<T>(name: string, table: Readonly<Record<string, T>>): T {
    const text = this.next(name);
    const value = Object.hasOwn(table, text) ? table[text] : undefined;
    if (value === undefined) {
      const allowed = Object.keys(table).join('/');
      throw new ParseError(`'${text}' is not one of ${allowed}`, this.messageId, name, text);
    }
    return value;
  }

  /**
   * Take the four fields `lat,N|S,lon,E|W`, or null when all four are empty
   * (the receiver has no fix).
   */
  optionalPosition(): Position | null {
    const fields = this.takePositionFields();
    if (fields.every((text) => text === '')) {
      return null;
    }
    return this.decodePosition(fields);
  }

  /**
   * Take the four fields `lat,N|S,lon,E|W`; none may be empty.
   */
  requiredPosition(): Position {
    return this.decodePosition(this.takePositionFields());
  }

  private takePositionFields(): readonly [string, string, string, string] {
    return [
      this.next('latitude'),
      this.next('latitude hemisphere'),
      this.next('longitude'),
      this.next('longitude hemisphere'),
    ];
  }

  private decodePosition([lat, ns, lon, ew]: readonly [string, string, string, string]): Position {
    return {
      latitude: parseLatitude(lat, ns, this.context('latitude')),
      longitude: parseLongitude(lon, ew, this.context('longitude')),
    };
  }

  private context(field: string): FieldContext {
    return { messageId: this.messageId, field };
  }
}
