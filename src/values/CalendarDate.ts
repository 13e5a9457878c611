/**
 * CalendarDate - A day on the calendar, without time or time zone
 *
 * The API transmits and filters dates as `YYYY-MM-DD`. A JavaScript `Date`
 * is an instant, so round-tripping one through `toISOString()` can shift the
 * day; this type keeps the three parts as they were written.
 *
 * @example
 * ```typescript
 * CalendarDate.of(2024, 2, 28).toString(); // '2024-02-28'
 * CalendarDate.parse('2023-02-29');        // null
 * ```
 */

import { z } from 'zod';

/** Strict `YYYY-MM-DD` that also rejects days the month does not have */
const isoDate = z.string().date();

export class CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  private constructor(year: number, month: number, day: number) {
    this.year = year;
    this.month = month;
    this.day = day;
  }

  /**
   * Create a date from its parts (month and day are 1-based)
   *
   * @throws RangeError if the parts do not name a real day
   */
  static of(year: number, month: number, day: number): CalendarDate {
    const text = `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
    const date = Number.isInteger(year) && year >= 0 && year <= 9999
      ? CalendarDate.parse(text)
      : null;

    if (date === null) {
      throw new RangeError(`Invalid calendar date: ${String(year)}-${String(month)}-${String(day)}`);
    }
    return date;
  }

  /**
   * Parse exactly `YYYY-MM-DD`
   *
   * @returns The date, or null when the text is not a valid date
   */
  static parse(text: string): CalendarDate | null {
    if (!isoDate.safeParse(text).success) {
      return null;
    }

    const [year, month, day] = text.split('-').map(Number);
    if (year === undefined || month === undefined || day === undefined) {
      return null;
    }
    return new CalendarDate(year, month, day);
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  /** Renders `YYYY-MM-DD` */
  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
