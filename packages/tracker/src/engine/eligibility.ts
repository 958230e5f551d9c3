// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { MAX_HISTORY_ENTRIES, OBSERVATION_TYPE, evictOldest, isObservation, upsertObservation } from '@hawl/ledger';
import type { HistoryRecord, ObservationRecord } from '@hawl/ledger';
import type { YearProgressOverride } from '../config.js';
import { requireCalendarDate } from '../dates.js';
import type { EligibilityVerdict } from '../types.js';
import { applyYearProgressOverride, computeStreak } from './streak.js';

export const DEFAULT_ZAKAT_RATE = 0.025;
export const DEFAULT_HIJRI_YEAR_MONTHS = 12;

/** One new observation, before it is admitted to the ledger. */
export interface EligibilityInput {
  /** Sum of the tracked accounts, in the reference currency. */
  readonly bankBalance: number;
  /** Assets held elsewhere; added to the bank balance. Defaults to 0. */
  readonly additionalAssets?: number;
  readonly nisabThreshold: number;
  /** `DD.MM.YYYY` the observation is filed under. */
  readonly gregorianDate: string;
  /** Hijri year and month of `gregorianDate`, when known. */
  readonly hijri?: { readonly year: number; readonly month: number } | null;
}

export interface EligibilityOptions {
  /** Timestamp given to the new observation. Defaults to the current instant. */
  readonly now?: Date;
  readonly maxHistoryEntries?: number;
  readonly hijriYearMonths?: number;
  readonly zakatRate?: number;
  readonly override?: YearProgressOverride;
  readonly strictCalendar?: boolean;
}

export interface EligibilityResult {
  /** The ledger to persist: deduplicated, appended and capped. */
  readonly ledger: HistoryRecord[];
  readonly observation: ObservationRecord;
  readonly verdict: EligibilityVerdict;
  /** Streak before the override. */
  readonly rawStreak: number;
  readonly overrideApplied: boolean;
  /** An observation with the same date was replaced. */
  readonly replaced: boolean;
  /** Entries dropped by the cap. */
  readonly evicted: number;
}

/**
 * Admit one observation and decide whether zakat is due.
 *
 * Pure: `ledger` is not modified and nothing is persisted. The caller saves
 * `result.ledger`; until it does, the run has no effect.
 *
 * @throws InvalidDateError when `input.gregorianDate` is not `DD.MM.YYYY`.
 */
export function evaluateEligibility(
  ledger: readonly HistoryRecord[],
  input: EligibilityInput,
  options: EligibilityOptions = {},
): EligibilityResult {
  requireCalendarDate(input.gregorianDate);

  const additionalAssets = input.additionalAssets ?? 0;
  const totalAssets = input.bankBalance + additionalAssets;
  const aboveNisab = totalAssets >= input.nisabThreshold;
  const now = options.now ?? new Date();

  const observation: ObservationRecord = {
    type: OBSERVATION_TYPE,
    total_assets: totalAssets,
    nisab_threshold: input.nisabThreshold,
    above_nisab: aboveNisab,
    hijri_year: input.hijri?.year ?? null,
    hijri_month: input.hijri?.month ?? null,
    gregorian_date: input.gregorianDate,
    timestamp: now.toISOString(),
  };

  const replaced = ledger.some(
    (record) => isObservation(record) && record.gregorian_date === input.gregorianDate,
  );
  const appended = upsertObservation(ledger, observation);
  const capped = evictOldest(appended, options.maxHistoryEntries ?? MAX_HISTORY_ENTRIES);

  const rawStreak = computeStreak(capped, { strictCalendar: options.strictCalendar ?? false });
  const { streak, applied } = applyYearProgressOverride(rawStreak, options.override);

  const hijriYearComplete = streak >= (options.hijriYearMonths ?? DEFAULT_HIJRI_YEAR_MONTHS);
  const verdict: EligibilityVerdict = {
    bank_balance: input.bankBalance,
    additional_assets: additionalAssets,
    total_assets: totalAssets,
    nisab_threshold: input.nisabThreshold,
    above_nisab: aboveNisab,
    consecutive_months_above_nisab: streak,
    hijri_year_complete: hijriYearComplete,
    zakat_due: hijriYearComplete,
    zakat_amount: hijriYearComplete ? totalAssets * (options.zakatRate ?? DEFAULT_ZAKAT_RATE) : 0,
  };

  return {
    ledger: capped,
    observation,
    verdict,
    rawStreak,
    overrideApplied: applied,
    replaced,
    evicted: appended.length - capped.length,
  };
}
