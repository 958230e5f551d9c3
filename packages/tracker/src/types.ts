// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Shared tracker types.
 *
 * Types that cross the API boundary (readings, verdicts, reports) use
 * snake_case field names to match the persisted ledger and the JSON the
 * API layer returns. Inputs built in code use camelCase.
 */

// ---------------------------------------------------------------------------
// Balance readings
// ---------------------------------------------------------------------------

/** One account's balance as read from a statement. */
export interface BalanceReading {
  readonly account_id: string;
  readonly account_currency: string;
  /** Null when the statement could not be found or parsed. */
  readonly raw_balance: number | null;
  /** `DD.MM.YYYY`; null together with `raw_balance`. */
  readonly statement_period_end_date: string | null;
  readonly found: boolean;
}

/** A reading after conversion into the reference currency. */
export interface AccountContribution {
  readonly account_id: string;
  readonly account_currency: string;
  readonly raw_balance: number;
  readonly converted_balance: number;
  readonly statement_period_end_date: string | null;
  readonly found: boolean;
}

/** Totals for one statement source (e.g. "personal", "business"). */
export interface SourceBreakdown {
  readonly name: string;
  readonly status: 'ok' | 'failed';
  readonly total: number;
  readonly accounts: readonly AccountContribution[];
  /** `"<name>: OK"` or `"<name>: <ErrorName>: <message>"`. */
  readonly diagnostic: string;
}

/** Normalizer output: one total for one observation date. */
export interface NormalizedObservation {
  readonly total_assets_in_reference_currency: number;
  /** Latest statement period end across contributing readings, `DD.MM.YYYY`. */
  readonly observation_date: string;
  readonly reference_currency: string;
  readonly accounts: readonly AccountContribution[];
  /** Present when produced by BalanceNormalizer.collect(). */
  readonly sources?: readonly SourceBreakdown[];
}

// ---------------------------------------------------------------------------
// Nisab
// ---------------------------------------------------------------------------

export type NisabSource = 'authoritative' | 'fallback';

export interface NisabResolution {
  readonly value: number;
  readonly source: NisabSource;
  /** The URL the value came from, or why the fallback was used. */
  readonly detail: string;
  /** ISO-8601 instant of the resolution. */
  readonly fetched_at: string;
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

/** Derived on every run; never persisted. */
export interface EligibilityVerdict {
  readonly bank_balance: number;
  readonly additional_assets: number;
  readonly total_assets: number;
  readonly nisab_threshold: number;
  readonly above_nisab: boolean;
  readonly consecutive_months_above_nisab: number;
  readonly hijri_year_complete: boolean;
  readonly zakat_due: boolean;
  readonly zakat_amount: number;
}

/** What `NisabTracker.runAnalysis` returns. */
export interface AnalysisReport extends EligibilityVerdict {
  /** `DD.MM.YYYY` of the recorded observation. */
  readonly gregorian_date: string;
  /** `d/m/yyyy`, or empty when Hijri conversion is unavailable. */
  readonly hijri_date: string;
  readonly nisab_source: NisabSource;
  readonly override_applied: boolean;
  readonly sources: readonly SourceBreakdown[];
}
