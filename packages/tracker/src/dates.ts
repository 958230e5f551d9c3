// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { InvalidDateError } from './errors.js';

/** A day in the proleptic Gregorian calendar, with no time or zone. */
export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
}

export interface HijriDate {
  readonly year: number;
  /** 1-12; 1 is Muharram. */
  readonly month: number;
  readonly day: number;
}

const CALENDAR_DATE_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4})$/;

/**
 * Parse a zero-padded `DD.MM.YYYY` string. Returns undefined for any other
 * shape and for days that do not exist (31.04, 29.02 outside leap years).
 */
export function parseCalendarDate(input: string): CalendarDate | undefined {
  const match = CALENDAR_DATE_PATTERN.exec(input);
  if (match === null) return undefined;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return undefined;

  const candidate = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 onto 1900-1999.
  candidate.setUTCFullYear(year);
  if (candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) return undefined;

  return { year, month, day };
}

/**
 * Like parseCalendarDate, but throws.
 *
 * @throws InvalidDateError
 */
export function requireCalendarDate(input: string): CalendarDate {
  const parsed = parseCalendarDate(input);
  if (parsed === undefined) {
    throw new InvalidDateError(input);
  }
  return parsed;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${pad(date.day, 2)}.${pad(date.month, 2)}.${pad(date.year, 4)}`;
}

/** The local calendar day of an instant. */
export function calendarDateOf(instant: Date): CalendarDate {
  return { year: instant.getFullYear(), month: instant.getMonth() + 1, day: instant.getDate() };
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Midnight UTC of `date` as an ISO-8601 instant. */
export function calendarDateToIso(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}T00:00:00.000Z`;
}

// ---------------------------------------------------------------------------
// Hijri conversion
// ---------------------------------------------------------------------------

const HIJRI_CALENDAR = 'islamic-umalqura';

let hijriFormatter: Intl.DateTimeFormat | null | undefined;

/** Null when the runtime's ICU data lacks the Umm al-Qura calendar. */
function getHijriFormatter(): Intl.DateTimeFormat | null {
  if (hijriFormatter === undefined) {
    const formatter = new Intl.DateTimeFormat(`en-US-u-ca-${HIJRI_CALENDAR}-nu-latn`, {
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      timeZone: 'UTC',
    });
    hijriFormatter = formatter.resolvedOptions().calendar === HIJRI_CALENDAR ? formatter : null;
  }
  return hijriFormatter;
}

/**
 * Convert a Gregorian day to the Umm al-Qura Hijri calendar.
 *
 * Returns undefined when the conversion is unavailable; observations then
 * carry null Hijri fields.
 */
export function toHijri(date: CalendarDate): HijriDate | undefined {
  const formatter = getHijriFormatter();
  if (formatter === null) return undefined;

  const instant = new Date(Date.UTC(date.year, date.month - 1, date.day, 12));
  if (Number.isNaN(instant.getTime())) return undefined;

  let year: number | undefined;
  let month: number | undefined;
  let day: number | undefined;
  for (const part of formatter.formatToParts(instant)) {
    const value = Number.parseInt(part.value, 10);
    if (part.type === 'year') year = value;
    else if (part.type === 'month') month = value;
    else if (part.type === 'day') day = value;
  }

  if (year === undefined || month === undefined || day === undefined) return undefined;
  if ([year, month, day].some((value) => Number.isNaN(value))) return undefined;
  return { year, month, day };
}

/** `d/m/yyyy`, without zero padding. */
export function formatHijriDate(date: HijriDate): string {
  return `${date.day}/${date.month}/${date.year}`;
}

/**
 * Whether `next` is the Hijri month immediately after `previous`
 * (Dhu al-Hijjah rolls over into Muharram of the following year).
 */
export function isSuccessiveHijriMonth(
  previous: { readonly year: number; readonly month: number },
  next: { readonly year: number; readonly month: number },
): boolean {
  if (previous.month === 12) {
    return next.year === previous.year + 1 && next.month === 1;
  }
  return next.year === previous.year && next.month === previous.month + 1;
}
