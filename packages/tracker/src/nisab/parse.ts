// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Parse a number written with `.` as the thousands separator and `,` as the
 * decimal separator, e.g. `1.234,56` -> 1234.56.
 *
 * Returns NaN for anything that is not such a number.
 */
export function parseLocalizedNumber(text: string): number {
  const trimmed = text.trim();
  if (!/^-?\d{1,3}(\.\d{3})*(,\d+)?$|^-?\d+(,\d+)?$/.test(trimmed)) {
    return Number.NaN;
  }
  return Number(trimmed.replace(/\./g, '').replace(',', '.'));
}

export interface NisabBounds {
  readonly min: number;
  readonly max: number;
}

export type NisabExtraction =
  | { readonly ok: true; readonly value: number; readonly pattern: number }
  | { readonly ok: false; readonly reason: string };

/**
 * Find the nisab in a page.
 *
 * Patterns are tried in order, each against its first match only. A match
 * whose value falls outside `bounds` counts as a failed pattern, not as data.
 */
export function extractNisab(page: string, patterns: readonly string[], bounds: NisabBounds): NisabExtraction {
  const reasons: string[] = [];

  for (const [index, source] of patterns.entries()) {
    const match = new RegExp(source, 'i').exec(page);
    const captured = match?.[1];
    if (captured === undefined) {
      reasons.push(`pattern ${index + 1} did not match`);
      continue;
    }
    const value = parseLocalizedNumber(captured);
    if (Number.isNaN(value)) {
      reasons.push(`pattern ${index + 1} matched unparseable "${captured}"`);
      continue;
    }
    if (value < bounds.min || value > bounds.max) {
      reasons.push(`pattern ${index + 1} value ${value} outside [${bounds.min}, ${bounds.max}]`);
      continue;
    }
    return { ok: true, value, pattern: index + 1 };
  }

  return { ok: false, reason: reasons.join(', ') || 'no patterns configured' };
}
