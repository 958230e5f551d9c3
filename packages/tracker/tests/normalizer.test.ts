// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, expect, it, vi } from 'vitest';
import { InvalidConfigError, InvalidDateError, NoDataError } from '../src/errors.js';
import { EVENT_SOURCE_FAILED, TrackerEventEmitter } from '../src/events.js';
import { BalanceNormalizer, latestPeriodEnd, normalizeReadings } from '../src/normalizer/index.js';
import type { StatementSource } from '../src/normalizer/index.js';
import type { BalanceReading } from '../src/types.js';

const NOON = new Date('2025-02-10T12:00:00.000Z');

function found(accountId: string, currency: string, balance: number, periodEnd: string | null): BalanceReading {
  return {
    account_id: accountId,
    account_currency: currency,
    raw_balance: balance,
    statement_period_end_date: periodEnd,
    found: true,
  };
}

function missing(accountId: string, currency: string): BalanceReading {
  return {
    account_id: accountId,
    account_currency: currency,
    raw_balance: null,
    statement_period_end_date: null,
    found: false,
  };
}

function staticSource(readings: readonly BalanceReading[]): StatementSource {
  return { read: () => Promise.resolve(readings) };
}

function failingSource(error: Error): StatementSource {
  return { read: () => Promise.reject(error) };
}

describe('normalizeReadings', () => {
  it('converts and sums readings into the reference currency', () => {
    const result = normalizeReadings(
      [found('1610000011112222', 'BAM', 5_000, '31.01.2025'), found('1610000033334444', 'EUR', 1_000, '28.01.2025')],
      undefined,
      { today: NOON },
    );
    expect(result.total_assets_in_reference_currency).toBeCloseTo(6_955.83, 6);
    expect(result.reference_currency).toBe('BAM');
    expect(result.observation_date).toBe('31.01.2025');
    expect(result.accounts[1]?.converted_balance).toBeCloseTo(1_955.83, 6);
  });

  it('lets a missing account contribute zero', () => {
    const result = normalizeReadings([found('11112222', 'BAM', 5_000, '31.01.2025'), missing('33334444', 'EUR')]);
    expect(result.total_assets_in_reference_currency).toBe(5_000);
    expect(result.accounts[1]).toEqual({
      account_id: '33334444',
      account_currency: 'EUR',
      raw_balance: 0,
      converted_balance: 0,
      statement_period_end_date: null,
      found: false,
    });
  });

  it('falls back to today when no reading carries a period end', () => {
    const result = normalizeReadings([found('11112222', 'BAM', 5_000, null)], undefined, { today: NOON });
    expect(result.observation_date).toBe('10.02.2025');
  });

  it('raises NoDataError with masked accounts when nothing was found', () => {
    expect(() => normalizeReadings([missing('1610000011112222', 'BAM')])).toThrow(
      'No balance data could be obtained from any account (****2222: not found).',
    );
  });

  it('raises NoDataError when the found balances sum to zero', () => {
    let caught: unknown;
    try {
      normalizeReadings([found('11112222', 'BAM', 0, '31.01.2025')]);
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NoDataError);
    if (caught instanceof NoDataError) {
      expect(caught.diagnostics).toEqual(['combined balance is zero']);
    }
  });

  it('rejects a found reading in a currency without a rate', () => {
    expect(() => normalizeReadings([found('11112222', 'USD', 100, '31.01.2025')])).toThrow(InvalidConfigError);
  });

  it('ignores the rate of a currency that was not found', () => {
    const result = normalizeReadings([found('11112222', 'BAM', 100, '31.01.2025'), missing('33334444', 'USD')]);
    expect(result.total_assets_in_reference_currency).toBe(100);
  });
});

describe('latestPeriodEnd', () => {
  it('compares period ends as dates, not strings', () => {
    const accounts = normalizeReadings([
      found('11112222', 'BAM', 1, '31.12.2024'),
      found('33334444', 'BAM', 1, '05.01.2025'),
    ]).accounts;
    expect(latestPeriodEnd(accounts)).toEqual({ year: 2025, month: 1, day: 5 });
  });

  it('rejects a malformed period end', () => {
    const accounts = [
      {
        account_id: '11112222',
        account_currency: 'BAM',
        raw_balance: 1,
        converted_balance: 1,
        statement_period_end_date: '2025-01-31',
        found: true,
      },
    ];
    expect(() => latestPeriodEnd(accounts)).toThrow(InvalidDateError);
  });
});

describe('BalanceNormalizer', () => {
  const config = {
    sources: [
      { name: 'personal', accounts: [{ accountId: '1610000011112222', currency: 'BAM' }] },
      { name: 'business', accounts: [{ accountId: '1610000033334444', currency: 'EUR' }] },
    ],
  };

  it('requires a collaborator for every enabled source', () => {
    expect(() => new BalanceNormalizer({ config, sources: { personal: staticSource([]) } })).toThrow(
      'Tracker configuration is invalid: sources.business: no statement source registered',
    );
  });

  it('does not require collaborators for disabled sources', () => {
    const normalizer = new BalanceNormalizer({
      config: { sources: [{ name: 'personal', enabled: false }] },
      sources: {},
    });
    expect(normalizer.conversion).toEqual({ referenceCurrency: 'BAM', rates: { EUR: 1.95583 } });
  });

  it('combines every source and reports a breakdown', async () => {
    const normalizer = new BalanceNormalizer({
      config,
      sources: {
        personal: staticSource([found('1610000011112222', 'BAM', 20_000, '31.01.2025')]),
        business: staticSource([found('1610000033334444', 'EUR', 5_000, '30.01.2025')]),
      },
      clock: () => NOON,
    });

    const result = await normalizer.collect();
    expect(result.total_assets_in_reference_currency).toBeCloseTo(29_779.15, 6);
    expect(result.observation_date).toBe('31.01.2025');
    expect(result.sources?.map((source) => source.diagnostic)).toEqual(['personal: OK', 'business: OK']);
  });

  it('continues past a failing source and reports it', async () => {
    const events = new TrackerEventEmitter();
    const failed = vi.fn();
    events.on(EVENT_SOURCE_FAILED, failed);
    const normalizer = new BalanceNormalizer({
      config,
      sources: {
        personal: staticSource([found('1610000011112222', 'BAM', 20_000, '31.01.2025')]),
        business: failingSource(new TypeError('mailbox unreachable')),
      },
      events,
      clock: () => NOON,
    });

    const result = await normalizer.collect();
    expect(result.total_assets_in_reference_currency).toBe(20_000);
    expect(result.sources?.[1]).toEqual({
      name: 'business',
      status: 'failed',
      total: 0,
      accounts: [],
      diagnostic: 'business: TypeError: mailbox unreachable',
    });
    expect(failed).toHaveBeenCalledWith({
      source: 'business',
      errorName: 'TypeError',
      message: 'mailbox unreachable',
      timestamp: '2025-02-10T12:00:00.000Z',
    });
  });

  it('marks a source failed when its period end is malformed', async () => {
    const events = new TrackerEventEmitter();
    const failed = vi.fn();
    events.on(EVENT_SOURCE_FAILED, failed);
    const normalizer = new BalanceNormalizer({
      config,
      sources: {
        personal: staticSource([found('1610000011112222', 'BAM', 20_000, '31.01.2025')]),
        business: staticSource([found('1610000033334444', 'EUR', 5_000, '2025-01-31')]),
      },
      events,
      clock: () => NOON,
    });

    const result = await normalizer.collect();
    expect(result.total_assets_in_reference_currency).toBe(20_000);
    expect(result.observation_date).toBe('31.01.2025');
    expect(result.sources?.[1]).toEqual({
      name: 'business',
      status: 'failed',
      total: 0,
      accounts: [],
      diagnostic: 'business: InvalidDateError: Invalid date "2025-01-31": statement period end for account ****4444.',
    });
    expect(failed).toHaveBeenCalledTimes(1);
  });

  it('still fails the run when a source reports a currency without a rate', async () => {
    const normalizer = new BalanceNormalizer({
      config,
      sources: {
        personal: staticSource([found('1610000011112222', 'BAM', 20_000, '31.01.2025')]),
        business: staticSource([found('1610000033334444', 'USD', 5_000, '30.01.2025')]),
      },
    });

    await expect(normalizer.collect()).rejects.toThrow(InvalidConfigError);
  });

  it('raises NoDataError with one line per source when nothing was read', async () => {
    const normalizer = new BalanceNormalizer({
      config,
      sources: {
        personal: staticSource([missing('1610000011112222', 'BAM')]),
        business: failingSource(new Error('login failed')),
      },
    });

    await expect(normalizer.collect()).rejects.toThrow(NoDataError);
    await expect(normalizer.collect()).rejects.toMatchObject({
      diagnostics: ['personal: no balance data returned', 'business: Error: login failed'],
    });
  });

  it('raises NoDataError when no source is configured', async () => {
    const normalizer = new BalanceNormalizer({ sources: {} });
    await expect(normalizer.collect()).rejects.toMatchObject({ diagnostics: ['no sources processed'] });
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    const read = vi.fn(() => Promise.resolve([found('1610000033334444', 'EUR', 1, '30.01.2025')]));
    const normalizer = new BalanceNormalizer({
      config,
      sources: {
        personal: {
          read: () => {
            controller.abort(new Error('cancelled'));
            return Promise.reject(new Error('interrupted'));
          },
        },
        business: { read },
      },
    });

    await expect(normalizer.collect(controller.signal)).rejects.toThrow('interrupted');
    expect(read).not.toHaveBeenCalled();
  });

  it('hands each source its own configuration', async () => {
    const read = vi.fn(() => Promise.resolve([found('1610000011112222', 'BAM', 1, '31.01.2025')]));
    const normalizer = new BalanceNormalizer({
      config: { sources: [{ name: 'personal', credentials: { password: 'test-secret' } }] },
      sources: { personal: { read } },
    });

    await normalizer.collect();
    expect(read).toHaveBeenCalledWith({
      config: { name: 'personal', enabled: true, accounts: [], credentials: { password: 'test-secret' } },
      signal: undefined,
    });
  });
});
