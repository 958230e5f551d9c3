// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { calendarDateOf, compareCalendarDates, formatCalendarDate, parseCalendarDate } from '../dates.js';
import type { CalendarDate } from '../dates.js';
import { InvalidConfigError, InvalidDateError, NoDataError } from '../errors.js';
import { maskAccount } from '../masking.js';
import type { AccountContribution, BalanceReading, NormalizedObservation } from '../types.js';

/** Fixed rates into one reference currency. No live FX lookups. */
export interface CurrencyConversion {
  readonly referenceCurrency: string;
  /** Units of the reference currency per one unit of the keyed currency. */
  readonly rates: Readonly<Record<string, number>>;
}

export const DEFAULT_CONVERSION: CurrencyConversion = {
  referenceCurrency: 'BAM',
  rates: { EUR: 1.95583 },
};

/** @throws InvalidConfigError when no rate is configured for `currency`. */
export function conversionRate(currency: string, conversion: CurrencyConversion): number {
  if (currency === conversion.referenceCurrency) return 1;
  const rate = conversion.rates[currency];
  if (rate === undefined) {
    throw new InvalidConfigError([
      `conversionRates.${currency}: no rate configured from ${currency} to ${conversion.referenceCurrency}`,
    ]);
  }
  return rate;
}

/**
 * Convert each reading into the reference currency. Missing readings
 * contribute zero and keep `found: false`.
 *
 * Every found reading's rate is checked before anything is converted.
 */
export function convertReadings(
  readings: readonly BalanceReading[],
  conversion: CurrencyConversion,
): AccountContribution[] {
  for (const reading of readings) {
    if (reading.found) conversionRate(reading.account_currency, conversion);
  }

  return readings.map((reading) => {
    const rawBalance = reading.found ? reading.raw_balance : null;
    if (rawBalance === null) {
      return {
        account_id: reading.account_id,
        account_currency: reading.account_currency,
        raw_balance: 0,
        converted_balance: 0,
        statement_period_end_date: null,
        found: false,
      };
    }
    return {
      account_id: reading.account_id,
      account_currency: reading.account_currency,
      raw_balance: rawBalance,
      converted_balance: rawBalance * conversionRate(reading.account_currency, conversion),
      statement_period_end_date: reading.statement_period_end_date,
      found: true,
    };
  });
}

/**
 * Latest statement period end among `contributions`, compared as calendar
 * dates. Undefined when none carries a date.
 *
 * @throws InvalidDateError for a period end that is not `DD.MM.YYYY`.
 */
export function latestPeriodEnd(contributions: readonly AccountContribution[]): CalendarDate | undefined {
  let latest: CalendarDate | undefined;
  for (const contribution of contributions) {
    const raw = contribution.statement_period_end_date;
    if (!contribution.found || raw === null) continue;
    const parsed = parseCalendarDate(raw);
    if (parsed === undefined) {
      throw new InvalidDateError(raw, `statement period end for account ${maskAccount(contribution.account_id)}`);
    }
    if (latest === undefined || compareCalendarDates(parsed, latest) > 0) {
      latest = parsed;
    }
  }
  return latest;
}

export interface NormalizeOptions {
  /** Date used when no reading carries a period end. Defaults to now. */
  readonly today?: Date;
}

/**
 * Turn per-account readings into one total for one observation date.
 *
 * A single missing account degrades the total; it does not fail the call.
 *
 * @throws NoDataError when no reading was found, or the found readings sum
 *         to zero. Recording that as an observation would break the streak
 *         with a false below-nisab entry.
 * @throws InvalidConfigError when a found reading's currency has no rate.
 */
export function normalizeReadings(
  readings: readonly BalanceReading[],
  conversion: CurrencyConversion = DEFAULT_CONVERSION,
  options: NormalizeOptions = {},
): NormalizedObservation {
  const accounts = convertReadings(readings, conversion);

  if (!accounts.some((account) => account.found)) {
    throw new NoDataError(accounts.map((account) => `${maskAccount(account.account_id)}: not found`));
  }

  const total = accounts.reduce((sum, account) => sum + account.converted_balance, 0);
  if (total === 0) {
    throw new NoDataError(['combined balance is zero']);
  }

  const observationDate = latestPeriodEnd(accounts) ?? calendarDateOf(options.today ?? new Date());

  return {
    total_assets_in_reference_currency: total,
    observation_date: formatCalendarDate(observationDate),
    reference_currency: conversion.referenceCurrency,
    accounts,
  };
}
