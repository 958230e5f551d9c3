// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { isPaymentMarker, sortByTimestamp } from '@hawl/ledger';
import type { HistoryRecord, ObservationRecord } from '@hawl/ledger';
import type { YearProgressOverride } from '../config.js';
import { isSuccessiveHijriMonth } from '../dates.js';

export interface StreakOptions {
  /**
   * Also stop at two counted observations that are not in successive Hijri
   * months. Observations without a Hijri month end the streak in this mode.
   */
  readonly strictCalendar?: boolean;
}

/**
 * Count the trailing run of above-nisab observations.
 *
 * The ledger is replayed in timestamp order from the newest entry back. A
 * payment marker or a below-nisab observation ends the run. The count is in
 * ledger entries, not elapsed months, unless `strictCalendar` is set.
 */
export function computeStreak(ledger: readonly HistoryRecord[], options: StreakOptions = {}): number {
  const ordered = sortByTimestamp(ledger);
  const strict = options.strictCalendar ?? false;

  let streak = 0;
  let newer: ObservationRecord | undefined;

  for (let index = ordered.length - 1; index >= 0; index -= 1) {
    const entry = ordered[index];
    if (entry === undefined || isPaymentMarker(entry)) break;
    if (!entry.above_nisab) break;

    if (strict) {
      if (entry.hijri_year === null || entry.hijri_month === null) break;
      if (
        newer !== undefined &&
        newer.hijri_year !== null &&
        newer.hijri_month !== null &&
        !isSuccessiveHijriMonth(
          { year: entry.hijri_year, month: entry.hijri_month },
          { year: newer.hijri_year, month: newer.hijri_month },
        )
      ) {
        break;
      }
    }

    streak += 1;
    newer = entry;
  }

  return streak;
}

export interface OverrideOutcome {
  readonly streak: number;
  readonly applied: boolean;
}

/**
 * Credit manually asserted prior months.
 *
 * The first counted entry is taken to be the month the override was set, so
 * it is not counted twice: `effective = months_above_nisab + (streak - 1)`.
 * A zero streak is never raised.
 */
export function applyYearProgressOverride(streak: number, override: YearProgressOverride | undefined): OverrideOutcome {
  if (override === undefined || !override.enabled || streak <= 0) {
    return { streak, applied: false };
  }
  const effective = override.months_above_nisab + Math.max(0, streak - 1);
  return effective > streak ? { streak: effective, applied: true } : { streak, applied: false };
}
