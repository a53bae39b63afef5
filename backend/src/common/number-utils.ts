import { CellValue } from './cell-value';

/**
 * Parse a cell into a finite number, or null when it holds no number.
 * Accepts thousands separators, a leading currency sign and surrounding spaces.
 */
export function parseNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined || value instanceof Date) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'boolean') {
    return null;
  }

  const cleaned = value.trim().replace(/^\$/, '').replace(/,/g, '');
  if (cleaned === '') {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Numeric coercion used for hours, rates and tap counts: anything unparseable is 0.
 */
export function toNumber(value: CellValue | undefined): number {
  return parseNumber(value) ?? 0;
}

export function round(value: number, places = 2): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

/**
 * Arithmetic mean; null for an empty list.
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return sum(values) / values.length;
}
