import type { ExtraValue, RawCellValue } from '../db/types';

const numericPattern = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const commaDecimalPattern = /^[+-]?\d+,\d+(?:[eE][+-]?\d+)?$/;

export type ParsedCell<T> = { ok: true; value: T } | { ok: false; reason: string };

export function isBlankCell(value: RawCellValue | undefined): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}

/** Strict numeric parse; accepts a single decimal comma ("12,5"). */
export function parseNumericCell(value: RawCellValue | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const cleaned = value.trim().replace(/\s+/g, '');
  if (!cleaned) {
    return null;
  }
  const normalized = commaDecimalPattern.test(cleaned) ? cleaned.replace(',', '.') : cleaned;
  if (!numericPattern.test(normalized)) {
    return null;
  }
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Coordinates may be absent (null) but never malformed or out of range.
 */
export function parseCoordinate(
  value: RawCellValue | undefined,
  axis: 'latitude' | 'longitude'
): ParsedCell<number | null> {
  if (isBlankCell(value)) {
    return { ok: true, value: null };
  }
  const parsed = parseNumericCell(value);
  if (parsed === null) {
    return { ok: false, reason: `${axis} "${value}" is not numeric` };
  }
  const limit = axis === 'latitude' ? 90 : 180;
  if (parsed < -limit || parsed > limit) {
    return { ok: false, reason: `${axis} ${parsed} is outside [-${limit}, ${limit}]` };
  }
  return { ok: true, value: parsed };
}

export function parseMetricValue(value: RawCellValue | undefined): ParsedCell<number> {
  if (isBlankCell(value)) {
    return { ok: false, reason: 'metric value is empty' };
  }
  const parsed = parseNumericCell(value);
  if (parsed === null) {
    return { ok: false, reason: `metric value "${value}" is not numeric` };
  }
  return { ok: true, value: parsed };
}

/**
 * Best-effort coercion for columns kept under `extra`; never fails. A value
 * only becomes a number when printing that number gives back the same text,
 * so codes with leading zeros, oversized integers and exponent forms stay strings.
 */
export function coerceExtraValue(value: RawCellValue | undefined): ExtraValue {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed) && String(parsed) === trimmed) {
      return parsed;
    }
  }
  return trimmed;
}
