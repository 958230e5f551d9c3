// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, expect, it } from 'vitest';
import { createPaymentMarker } from '@hawl/ledger';
import type { HistoryRecord, ObservationRecord } from '@hawl/ledger';
import { applyYearProgressOverride, computeStreak, evaluateEligibility } from '../src/engine/index.js';
import type { EligibilityOptions } from '../src/engine/index.js';
import { InvalidDateError } from '../src/errors.js';

const NISAB = 24_624;

/** Date of the 15th of `month` months after January 2024. */
function dateFor(month: number): { gregorian: string; now: Date } {
  const instant = new Date(Date.UTC(2024, month, 15, 9));
  const mm = String(instant.getUTCMonth() + 1).padStart(2, '0');
  return { gregorian: `15.${mm}.${instant.getUTCFullYear()}`, now: instant };
}

function observe(
  ledger: readonly HistoryRecord[],
  month: number,
  bankBalance: number,
  options: EligibilityOptions = {},
): ReturnType<typeof evaluateEligibility> {
  const { gregorian, now } = dateFor(month);
  return evaluateEligibility(ledger, { bankBalance, nisabThreshold: NISAB, gregorianDate: gregorian }, { now, ...options });
}

function runMonths(balances: readonly number[], options: EligibilityOptions = {}): ReturnType<typeof evaluateEligibility> {
  let ledger: readonly HistoryRecord[] = [];
  let last: ReturnType<typeof evaluateEligibility> | undefined;
  balances.forEach((balance, month) => {
    last = observe(ledger, month, balance, options);
    ledger = last.ledger;
  });
  if (last === undefined) throw new Error('no months given');
  return last;
}

function hijriObservation(
  timestamp: string,
  hijri: { year: number; month: number } | null,
  above = true,
): ObservationRecord {
  return {
    type: 'observation',
    total_assets: above ? 30_000 : 1_000,
    nisab_threshold: NISAB,
    above_nisab: above,
    hijri_year: hijri?.year ?? null,
    hijri_month: hijri?.month ?? null,
    gregorian_date: timestamp.slice(8, 10) + '.' + timestamp.slice(5, 7) + '.' + timestamp.slice(0, 4),
    timestamp,
  };
}

describe('evaluateEligibility', () => {
  it('counts a single month above nisab', () => {
    const result = runMonths([30_000]);
    expect(result.verdict.above_nisab).toBe(true);
    expect(result.verdict.consecutive_months_above_nisab).toBe(1);
    expect(result.verdict.zakat_due).toBe(false);
    expect(result.verdict.zakat_amount).toBe(0);
  });

  it('treats a total equal to the nisab as above it', () => {
    const result = runMonths([NISAB]);
    expect(result.verdict.above_nisab).toBe(true);
    expect(result.verdict.consecutive_months_above_nisab).toBe(1);
  });

  it('adds additional assets to the bank balance', () => {
    const result = evaluateEligibility(
      [],
      { bankBalance: 20_000, additionalAssets: 5_000, nisabThreshold: NISAB, gregorianDate: '15.01.2024' },
      { now: new Date('2024-01-15T09:00:00.000Z') },
    );
    expect(result.verdict.bank_balance).toBe(20_000);
    expect(result.verdict.additional_assets).toBe(5_000);
    expect(result.verdict.total_assets).toBe(25_000);
    expect(result.verdict.above_nisab).toBe(true);
    expect(result.observation.total_assets).toBe(25_000);
  });

  it('makes zakat due after twelve consecutive months', () => {
    const result = runMonths(Array.from({ length: 12 }, () => 30_000));
    expect(result.verdict.consecutive_months_above_nisab).toBe(12);
    expect(result.verdict.hijri_year_complete).toBe(true);
    expect(result.verdict.zakat_due).toBe(true);
    expect(result.verdict.zakat_amount).toBeCloseTo(750, 6);
  });

  it('is not due after eleven months', () => {
    const result = runMonths(Array.from({ length: 11 }, () => 30_000));
    expect(result.verdict.consecutive_months_above_nisab).toBe(11);
    expect(result.verdict.zakat_due).toBe(false);
  });

  it('restarts the count after a month below nisab', () => {
    const result = runMonths([30_000, 30_000, 30_000, 1_000, 30_000]);
    expect(result.verdict.consecutive_months_above_nisab).toBe(1);
  });

  it('reports zero for a month below nisab', () => {
    const result = runMonths([30_000, 30_000, 1_000]);
    expect(result.verdict.above_nisab).toBe(false);
    expect(result.verdict.consecutive_months_above_nisab).toBe(0);
  });

  it('re-observing the same date replaces the earlier entry', () => {
    const first = observe([], 0, 30_000);
    const { now } = dateFor(0);
    const again = evaluateEligibility(
      first.ledger,
      { bankBalance: 31_000, nisabThreshold: NISAB, gregorianDate: '15.01.2024' },
      { now: new Date(now.getTime() + 60_000) },
    );
    expect(again.replaced).toBe(true);
    expect(again.ledger).toHaveLength(1);
    expect(again.verdict.consecutive_months_above_nisab).toBe(1);
    expect(again.ledger[0]).toEqual(again.observation);
  });

  it('lets a payment marker end the streak', () => {
    const first = runMonths([30_000, 30_000, 30_000]);
    const marker = createPaymentMarker('20.03.2024', '2024-03-20T00:00:00.000Z');
    let ledger: readonly HistoryRecord[] = [...first.ledger, marker];
    ledger = observe(ledger, 3, 30_000).ledger;
    const result = observe(ledger, 4, 30_000);
    expect(result.verdict.consecutive_months_above_nisab).toBe(2);
    expect(result.verdict.zakat_due).toBe(false);
  });

  it('clears a due year once the payment is recorded', () => {
    const year = runMonths(Array.from({ length: 12 }, () => 30_000));
    expect(year.verdict.consecutive_months_above_nisab).toBe(12);
    expect(year.verdict.zakat_due).toBe(true);

    const marker = createPaymentMarker('20.12.2024', '2024-12-20T00:00:00.000Z');
    let ledger: readonly HistoryRecord[] = [...year.ledger, marker];
    ledger = observe(ledger, 12, 30_000).ledger;
    const result = observe(ledger, 13, 30_000);

    expect(result.verdict.consecutive_months_above_nisab).toBe(2);
    expect(result.verdict.zakat_due).toBe(false);
    expect(result.verdict.zakat_amount).toBe(0);
  });

  it('caps the ledger at the configured size', () => {
    const result = runMonths(Array.from({ length: 30 }, () => 30_000));
    expect(result.ledger).toHaveLength(24);
    expect(result.ledger[0]?.gregorian_date).toBe('15.07.2024');
    expect(result.verdict.consecutive_months_above_nisab).toBe(24);
  });

  it('reports how many entries the cap dropped', () => {
    const result = runMonths([30_000, 30_000, 30_000], { maxHistoryEntries: 2 });
    expect(result.evicted).toBe(1);
    expect(result.ledger.map((record) => record.gregorian_date)).toEqual(['15.02.2024', '15.03.2024']);
  });

  it('applies the year progress override to a live streak', () => {
    const override = { enabled: true, months_above_nisab: 8, as_of_hijri_date: '1/7/1446' };
    const result = runMonths([30_000, 30_000, 30_000], { override });
    expect(result.rawStreak).toBe(3);
    expect(result.overrideApplied).toBe(true);
    expect(result.verdict.consecutive_months_above_nisab).toBe(10);
  });

  it('does not revive a broken streak with the override', () => {
    const override = { enabled: true, months_above_nisab: 8, as_of_hijri_date: '' };
    const result = runMonths([30_000, 1_000], { override });
    expect(result.overrideApplied).toBe(false);
    expect(result.verdict.consecutive_months_above_nisab).toBe(0);
  });

  it('uses the configured rate and year length', () => {
    const result = runMonths([40_000, 40_000, 40_000], { hijriYearMonths: 3, zakatRate: 0.03 });
    expect(result.verdict.zakat_due).toBe(true);
    expect(result.verdict.zakat_amount).toBeCloseTo(1_200, 6);
  });

  it('does not mutate the ledger it is given', () => {
    const first = observe([], 0, 30_000);
    const snapshot = [...first.ledger];
    observe(first.ledger, 1, 30_000);
    expect(first.ledger).toEqual(snapshot);
  });

  it('rejects a malformed date', () => {
    expect(() =>
      evaluateEligibility([], { bankBalance: 1, nisabThreshold: NISAB, gregorianDate: '2024-01-15' }),
    ).toThrow(InvalidDateError);
  });
});

describe('computeStreak', () => {
  it('returns 0 for an empty ledger', () => {
    expect(computeStreak([])).toBe(0);
  });

  it('orders by timestamp rather than ledger position', () => {
    const ledger: HistoryRecord[] = [
      hijriObservation('2024-03-15T09:00:00.000Z', null),
      hijriObservation('2024-01-15T09:00:00.000Z', null, false),
      hijriObservation('2024-02-15T09:00:00.000Z', null),
    ];
    expect(computeStreak(ledger)).toBe(2);
  });

  it('counts entries regardless of Hijri gaps by default', () => {
    const ledger: HistoryRecord[] = [
      hijriObservation('2024-01-15T09:00:00.000Z', { year: 1445, month: 7 }),
      hijriObservation('2024-04-15T09:00:00.000Z', { year: 1445, month: 10 }),
    ];
    expect(computeStreak(ledger)).toBe(2);
  });

  describe('strict calendar', () => {
    it('counts successive Hijri months across the year boundary', () => {
      const ledger: HistoryRecord[] = [
        hijriObservation('2024-06-10T09:00:00.000Z', { year: 1445, month: 12 }),
        hijriObservation('2024-07-10T09:00:00.000Z', { year: 1446, month: 1 }),
        hijriObservation('2024-08-10T09:00:00.000Z', { year: 1446, month: 2 }),
      ];
      expect(computeStreak(ledger, { strictCalendar: true })).toBe(3);
    });

    it('stops at a skipped Hijri month', () => {
      const ledger: HistoryRecord[] = [
        hijriObservation('2024-01-15T09:00:00.000Z', { year: 1445, month: 7 }),
        hijriObservation('2024-04-15T09:00:00.000Z', { year: 1445, month: 10 }),
        hijriObservation('2024-05-15T09:00:00.000Z', { year: 1445, month: 11 }),
      ];
      expect(computeStreak(ledger, { strictCalendar: true })).toBe(2);
    });

    it('stops at an observation without a Hijri month', () => {
      const ledger: HistoryRecord[] = [
        hijriObservation('2024-04-15T09:00:00.000Z', { year: 1445, month: 10 }),
        hijriObservation('2024-05-15T09:00:00.000Z', null),
      ];
      expect(computeStreak(ledger, { strictCalendar: true })).toBe(0);
    });
  });
});

describe('applyYearProgressOverride', () => {
  const enabled = { enabled: true, months_above_nisab: 8, as_of_hijri_date: '' };

  it('credits the asserted months without counting the first entry twice', () => {
    expect(applyYearProgressOverride(1, enabled)).toEqual({ streak: 8, applied: true });
    expect(applyYearProgressOverride(3, enabled)).toEqual({ streak: 10, applied: true });
  });

  it('leaves a zero streak alone', () => {
    expect(applyYearProgressOverride(0, enabled)).toEqual({ streak: 0, applied: false });
  });

  it('is ignored when disabled or absent', () => {
    expect(applyYearProgressOverride(3, { ...enabled, enabled: false })).toEqual({ streak: 3, applied: false });
    expect(applyYearProgressOverride(3, undefined)).toEqual({ streak: 3, applied: false });
  });

  it('can complete a year from a short asserted count', () => {
    expect(applyYearProgressOverride(11, { ...enabled, months_above_nisab: 2 })).toEqual({
      streak: 12,
      applied: true,
    });
  });

  it('is not applied when it would lower the streak', () => {
    expect(applyYearProgressOverride(5, { ...enabled, months_above_nisab: 0 })).toEqual({
      streak: 5,
      applied: false,
    });
  });
});
