import { Logger } from '@nestjs/common';
import { CellValue } from './cell-value';

/**
 * Date helpers.
 *
 * Spreadsheet timestamps are wall-clock values without a zone. They are kept as
 * UTC instants carrying the same wall-clock fields, so every helper here works
 * on the UTC accessors and no local-zone conversion ever happens.
 */

const logger = new Logger('DateUtils');

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

/** Day 0 of the spreadsheet serial calendar is 1899-12-30 */
const SERIAL_EPOCH_OFFSET_DAYS = 25569;
const MIN_SERIAL = 20000; // 1954
const MAX_SERIAL = 80000; // 2119

const ISO_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;
const ISO_WITH_ZONE_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;
const US_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AaPp][Mm])?)?$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AaPp][Mm])?$/;

/**
 * Get the current date, or the demo date if DEMO_DATE is set.
 */
export function getCurrentDate(): Date {
  const demoDate = process.env.DEMO_DATE;
  if (demoDate) {
    const parsed = parseDateValue(demoDate);
    if (parsed) {
      return parsed;
    }
    logger.warn(`Invalid DEMO_DATE: ${demoDate}, using real time`);
  }
  return new Date();
}

/**
 * Build a UTC instant, rejecting components that would roll over
 * (e.g. February 30th).
 */
function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function to24Hour(hours: number, meridiem: string | undefined): number {
  if (!meridiem) return hours;
  const isPm = meridiem.toLowerCase() === 'pm';
  if (hours === 12) return isPm ? 12 : 0;
  return isPm ? hours + 12 : hours;
}

/**
 * Convert a spreadsheet serial day number (fractional days) to a Date.
 */
export function fromSerialDate(serial: number): Date | null {
  if (!Number.isFinite(serial) || serial < MIN_SERIAL || serial > MAX_SERIAL) {
    return null;
  }
  const seconds = Math.round((serial - SERIAL_EPOCH_OFFSET_DAYS) * 86400);
  return new Date(seconds * 1000);
}

/**
 * Parse a timestamp cell.
 *
 * Supported formats:
 * - ISO: "2025-02-14", "2025-02-14 08:30", "2025-02-14T08:30:15"
 * - ISO with zone: "2025-02-14T08:30:00Z" (converted to UTC)
 * - US: "2/14/2025", "2/14/25 8:30 AM", "02/14/2025 17:05:00"
 * - Spreadsheet serial numbers and Date cells
 *
 * @returns Date or null when the value is not a recognizable timestamp
 */
export function parseDateValue(value: CellValue | undefined): Date | null {
  if (value === null || value === undefined || typeof value === 'boolean') {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === 'number') {
    return fromSerialDate(value);
  }

  const text = value.trim();
  if (text === '') return null;

  if (ISO_WITH_ZONE_PATTERN.test(text)) {
    const zoned = new Date(text);
    return Number.isNaN(zoned.getTime()) ? null : zoned;
  }

  const iso = ISO_PATTERN.exec(text);
  if (iso) {
    return buildUtcDate(
      Number(iso[1]),
      Number(iso[2]),
      Number(iso[3]),
      Number(iso[4] ?? 0),
      Number(iso[5] ?? 0),
      Number(iso[6] ?? 0),
    );
  }

  const us = US_PATTERN.exec(text);
  if (us) {
    const rawYear = Number(us[3]);
    const year = us[3].length === 2 ? 2000 + rawYear : rawYear;
    const hours = us[4] === undefined ? 0 : to24Hour(Number(us[4]), us[7]);
    return buildUtcDate(
      year,
      Number(us[1]),
      Number(us[2]),
      hours,
      Number(us[5] ?? 0),
      Number(us[6] ?? 0),
    );
  }

  if (/^\d+(\.\d+)?$/.test(text)) {
    return fromSerialDate(Number(text));
  }

  return null;
}

/**
 * Parse a clock-in/clock-out cell. Full timestamps are taken as-is; a bare
 * time of day ("7:30 AM", or a serial day fraction) is placed on `day`.
 */
export function parseClockValue(
  value: CellValue | undefined,
  day: Date,
): Date | null {
  if (typeof value === 'number' && value >= 0 && value < 1) {
    return new Date(startOfUtcDay(day).getTime() + Math.round(value * 86400) * 1000);
  }

  const full = parseDateValue(value);
  if (full) return full;

  if (typeof value !== 'string') return null;
  const time = TIME_PATTERN.exec(value.trim());
  if (!time) return null;

  const hours = to24Hour(Number(time[1]), time[4]);
  const minutes = Number(time[2]);
  const seconds = Number(time[3] ?? 0);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return new Date(
    startOfUtcDay(day).getTime() +
      ((hours * 60 + minutes) * 60 + seconds) * 1000,
  );
}

/** YYYY-MM-DD of the wall-clock day */
export function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * MS_PER_HOUR);
}

/**
 * Monday 00:00 of the week containing `date` (weeks run Monday to Sunday).
 */
export function startOfWeek(date: Date): Date {
  const day = startOfUtcDay(date);
  const offset = (day.getUTCDay() + 6) % 7;
  return addDays(day, -offset);
}

/**
 * Whole days between two instants, floored (negative when `to` is earlier).
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}
