// ============================================================
// Length Units — parsing & formatting of unit-suffixed lengths
// ============================================================

import { NM_PER_INCH, NM_PER_MIL, NM_PER_MM } from '@/constants';

/** Nanometres per unit. Every factor is exact. */
const UNIT_FACTORS: Record<string, number> = {
  nm: 1,
  um: 1_000,
  µm: 1_000,     // micro (Unicode)
  mm: NM_PER_MM,
  cm: 10 * NM_PER_MM,
  mil: NM_PER_MIL,
  in: NM_PER_INCH,
  inch: NM_PER_INCH,
};

/** Units tried when formatting — largest first */
const FORMAT_UNITS: { symbol: string; factor: number }[] = [
  { symbol: 'mm', factor: NM_PER_MM },
  { symbol: 'um', factor: 1_000 },
  { symbol: 'nm', factor: 1 },
];

/** Result of parsing a length string */
export interface ParsedLength {
  /** Length in nanometres, rounded to the nearest integer */
  nanometres: number;
  /** The numeric part as written */
  value: number;
  /** Unit symbol found */
  unit: string;
  /** Original input string */
  raw: string;
}

/**
 * Parse a length with a mandatory unit suffix.
 *
 * Handles formats like:
 *   "50mm", "-12.5 mm", "100mil", "2in", "0.5cm", "250um"
 *
 * A bare number has no unit and is rejected (returns null): an offset of
 * "50" is far more likely a forgotten unit than 50 nm.
 */
export function parseLength(input: string): ParsedLength | null {
  if (!input || typeof input !== 'string') return null;
  const raw = input;

  const match = input.trim().match(/^([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)\s*([a-zA-Zµ]+)$/);
  if (!match) return null;

  const value = parseFloat(match[1]);
  const unit = match[2].toLowerCase();
  const factor = UNIT_FACTORS[unit];
  if (factor === undefined || !isFinite(value)) return null;

  // + 0 folds a rounded -0 into 0
  return { nanometres: Math.round(value * factor) + 0, value, unit, raw };
}

/** Convenience wrapper that returns just the nanometre value. */
export function toNanometres(input: string): number | null {
  const parsed = parseLength(input);
  return parsed ? parsed.nanometres : null;
}

/**
 * Format a nanometre length with the largest unit that keeps it readable.
 *
 * @param digits  Maximum significant digits (default 6)
 */
export function formatLength(nanometres: number, digits = 6): string {
  if (nanometres === 0) return '0mm';

  const absVal = Math.abs(nanometres);
  for (const { symbol, factor } of FORMAT_UNITS) {
    if (absVal >= factor) {
      const str = parseFloat((nanometres / factor).toPrecision(digits)).toString();
      return `${str}${symbol}`;
    }
  }
  return `${nanometres}nm`;
}
