// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryLedger } from '@hawl/ledger';
import type { HistoryRecord } from '@hawl/ledger';
import { InvalidConfigError, InvalidDateError } from '../src/errors.js';
import {
  EVENT_ANALYSIS_COMPLETED,
  EVENT_OBSERVATION_RECORDED,
  EVENT_OVERRIDE_APPLIED,
  EVENT_PAYMENT_RECORDED,
} from '../src/events.js';
import { TrackerTracer } from '../src/telemetry/otel.js';
import type { OTelSpanLike, OTelTracerLike } from '../src/telemetry/otel.js';
import { NisabTracker } from '../src/tracker.js';
import type { NisabResolution, NormalizedObservation } from '../src/types.js';

const NOW = new Date('2025-01-20T12:00:00.000Z');

const NISAB: NisabResolution = {
  value: 24_624,
  source: 'authoritative',
  detail: 'https://nisab.test/a',
  fetched_at: '2025-01-20T11:59:00.000Z',
};

function observationOn(date: string, total = 30_000): NormalizedObservation {
  return {
    total_assets_in_reference_currency: total,
    observation_date: date,
    reference_currency: 'BAM',
    accounts: [],
  };
}

class FailingLedger extends MemoryLedger {
  override async save(): Promise<void> {
    throw new Error('disk full');
  }
}

type Attributes = Record<string, string | number | boolean>;

class FakeSpan implements OTelSpanLike {
  readonly attributes: Attributes;
  readonly events: Array<{ name: string; attributes?: Attributes }> = [];
  status: { code: number; message?: string } | undefined;
  ended = false;

  constructor(
    readonly name: string,
    attributes: Attributes = {},
  ) {
    this.attributes = { ...attributes };
  }

  setAttribute(key: string, value: string | number | boolean): this {
    this.attributes[key] = value;
    return this;
  }

  setStatus(status: { code: number; message?: string }): this {
    this.status = status;
    return this;
  }

  addEvent(name: string, attributes?: Attributes): this {
    this.events.push({ name, attributes });
    return this;
  }

  end(): void {
    this.ended = true;
  }
}

class FakeTracer implements OTelTracerLike {
  readonly spans: FakeSpan[] = [];

  startSpan(name: string, options?: { attributes?: Attributes }): FakeSpan {
    const span = new FakeSpan(name, options?.attributes);
    this.spans.push(span);
    return span;
  }
}

describe('NisabTracker.runAnalysis', () => {
  it('records the observation and returns a report', async () => {
    const ledger = new MemoryLedger();
    const tracker = new NisabTracker({ ledger, clock: () => NOW });

    const report = await tracker.runAnalysis(observationOn('15.01.2025'), NISAB);

    expect(report.gregorian_date).toBe('15.01.2025');
    expect(report.hijri_date).toMatch(/^\d{1,2}\/7\/1446$/);
    expect(report.total_assets).toBe(30_000);
    expect(report.above_nisab).toBe(true);
    expect(report.consecutive_months_above_nisab).toBe(1);
    expect(report.nisab_source).toBe('authoritative');
    expect(report.override_applied).toBe(false);
    expect(report.sources).toEqual([]);

    const history = await ledger.load();
    expect(history).toEqual([
      {
        type: 'observation',
        total_assets: 30_000,
        nisab_threshold: 24_624,
        above_nisab: true,
        hijri_year: 1446,
        hijri_month: 7,
        gregorian_date: '15.01.2025',
        timestamp: '2025-01-20T12:00:00.000Z',
      },
    ]);
  });

  it('adds the configured additional assets', async () => {
    const tracker = new NisabTracker({ ledger: new MemoryLedger(), config: { additionalAssets: 5_000 } });
    const report = await tracker.runAnalysis(observationOn('15.01.2025', 20_000), NISAB);
    expect(report.bank_balance).toBe(20_000);
    expect(report.total_assets).toBe(25_000);
    expect(report.above_nisab).toBe(true);
  });

  it('emits the recorded observation and the completed analysis', async () => {
    const tracker = new NisabTracker({ ledger: new MemoryLedger(), clock: () => NOW });
    const recorded = vi.fn();
    const completed = vi.fn();
    tracker.events.on(EVENT_OBSERVATION_RECORDED, recorded);
    tracker.events.on(EVENT_ANALYSIS_COMPLETED, completed);

    await tracker.runAnalysis(observationOn('15.01.2025'), NISAB);
    await tracker.runAnalysis(observationOn('15.01.2025', 31_000), NISAB);

    expect(recorded).toHaveBeenLastCalledWith({
      gregorianDate: '15.01.2025',
      aboveNisab: true,
      replaced: true,
      evicted: 0,
      ledgerSize: 1,
      timestamp: '2025-01-20T12:00:00.000Z',
    });
    expect(completed).toHaveBeenCalledTimes(2);
    expect(completed.mock.calls[1]?.[0]).toMatchObject({ totalAssets: 31_000, consecutiveMonths: 1, zakatDue: false });
  });

  it('applies a per-run override and reports it', async () => {
    const tracker = new NisabTracker({ ledger: new MemoryLedger(), clock: () => NOW });
    const applied = vi.fn();
    tracker.events.on(EVENT_OVERRIDE_APPLIED, applied);

    const report = await tracker.runAnalysis(observationOn('15.01.2025'), NISAB, {
      enabled: true,
      months_above_nisab: 8,
      as_of_hijri_date: '1/7/1446',
    });

    expect(report.consecutive_months_above_nisab).toBe(8);
    expect(report.override_applied).toBe(true);
    expect(applied).toHaveBeenCalledWith({
      rawStreak: 1,
      effectiveStreak: 8,
      monthsAboveNisab: 8,
      asOfHijriDate: '1/7/1446',
      timestamp: '2025-01-20T12:00:00.000Z',
    });
  });

  it('enables a per-run override that omits the enabled flag', async () => {
    const tracker = new NisabTracker({ ledger: new MemoryLedger(), clock: () => NOW });
    const report = await tracker.runAnalysis(observationOn('15.01.2025'), NISAB, { months_above_nisab: 8 });
    expect(report.consecutive_months_above_nisab).toBe(8);
    expect(report.override_applied).toBe(true);
  });

  it('ignores a per-run override that is explicitly disabled', async () => {
    const tracker = new NisabTracker({ ledger: new MemoryLedger(), clock: () => NOW });
    const report = await tracker.runAnalysis(observationOn('15.01.2025'), NISAB, {
      enabled: false,
      months_above_nisab: 8,
    });
    expect(report.consecutive_months_above_nisab).toBe(1);
    expect(report.override_applied).toBe(false);
  });

  it('rejects an invalid override before touching the ledger', async () => {
    const ledger = new MemoryLedger();
    const tracker = new NisabTracker({ ledger });
    await expect(
      tracker.runAnalysis(observationOn('15.01.2025'), NISAB, { enabled: true, months_above_nisab: 12 }),
    ).rejects.toThrow(InvalidConfigError);
    expect(ledger.saves).toBe(0);
  });

  it('rejects a malformed observation date', async () => {
    const ledger = new MemoryLedger();
    const tracker = new NisabTracker({ ledger });
    await expect(tracker.runAnalysis(observationOn('2025-01-15'), NISAB)).rejects.toThrow(InvalidDateError);
    expect(ledger.saves).toBe(0);
  });

  it('leaves the history untouched and emits nothing when the save fails', async () => {
    const existing: HistoryRecord[] = [
      { type: 'zakat_paid', gregorian_date: '01.01.2025', timestamp: '2025-01-01T00:00:00.000Z' },
    ];
    const ledger = new FailingLedger(existing);
    const tracker = new NisabTracker({ ledger });
    const completed = vi.fn();
    tracker.events.on(EVENT_ANALYSIS_COMPLETED, completed);

    await expect(tracker.runAnalysis(observationOn('15.01.2025'), NISAB)).rejects.toThrow('disk full');
    await expect(ledger.load()).resolves.toEqual(existing);
    expect(completed).not.toHaveBeenCalled();
  });

  it('serialises overlapping runs on one instance', async () => {
    const ledger = new MemoryLedger();
    const tracker = new NisabTracker({ ledger, clock: () => NOW });

    await Promise.all([
      tracker.runAnalysis(observationOn('15.01.2025'), NISAB),
      tracker.runAnalysis(observationOn('15.02.2025'), NISAB),
      tracker.recordPayment('16.02.2025'),
    ]);

    const history = await tracker.getHistory();
    expect(history.map((record) => record.gregorian_date)).toEqual(['15.01.2025', '15.02.2025', '16.02.2025']);
  });
});

describe('NisabTracker with a failing listener', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves runAnalysis once the observation is saved', async () => {
    const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const ledger = new MemoryLedger();
    const tracker = new NisabTracker({ ledger, clock: () => NOW });
    tracker.events.on(EVENT_ANALYSIS_COMPLETED, () => {
      throw new Error('listener broke');
    });

    const report = await tracker.runAnalysis(observationOn('15.01.2025'), NISAB);

    expect(report.consecutive_months_above_nisab).toBe(1);
    expect(await ledger.load()).toHaveLength(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('resolves recordPayment once the marker is saved', async () => {
    vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const ledger = new MemoryLedger();
    const tracker = new NisabTracker({ ledger, clock: () => NOW });
    tracker.events.on(EVENT_PAYMENT_RECORDED, () => {
      throw new Error('listener broke');
    });

    await expect(tracker.recordPayment('18.01.2025')).resolves.toBeDefined();
    expect(await ledger.load()).toEqual([
      { type: 'zakat_paid', gregorian_date: '18.01.2025', timestamp: '2025-01-18T00:00:00.000Z' },
    ]);
  });
});

describe('NisabTracker.getCurrentStreak', () => {
  it('replays the stored history', async () => {
    const tracker = new NisabTracker({ ledger: new MemoryLedger() });
    expect(await tracker.getCurrentStreak()).toBe(0);

    await tracker.runAnalysis(observationOn('15.01.2025'), NISAB);
    expect(await tracker.getCurrentStreak()).toBe(1);
  });

  it('applies the configured override', async () => {
    const tracker = new NisabTracker({
      ledger: new MemoryLedger(),
      config: { yearProgressOverride: { enabled: true, months_above_nisab: 8 } },
    });
    await tracker.runAnalysis(observationOn('15.01.2025'), NISAB);
    expect(await tracker.getCurrentStreak()).toBe(8);
  });

  it('drops to zero after a payment', async () => {
    let now = new Date('2025-01-20T12:00:00.000Z');
    const tracker = new NisabTracker({ ledger: new MemoryLedger(), clock: () => now });
    await tracker.runAnalysis(observationOn('15.01.2025'), NISAB);

    now = new Date('2025-01-25T12:00:00.000Z');
    await tracker.recordPayment();

    expect(await tracker.getCurrentStreak()).toBe(0);
  });
});

describe('NisabTracker tracing', () => {
  it('wraps an analysis in a span carrying the verdict', async () => {
    const otel = new FakeTracer();
    const tracker = new NisabTracker({
      ledger: new MemoryLedger(),
      tracer: new TrackerTracer({ tracer: otel }),
      clock: () => NOW,
    });

    await tracker.runAnalysis(observationOn('15.01.2025'), NISAB);

    expect(otel.spans).toHaveLength(1);
    const span = otel.spans[0];
    expect(span?.name).toBe('hawl.tracker.run_analysis');
    expect(span?.attributes).toEqual({
      'service.name': 'hawl-tracker',
      'hawl.observation_date': '15.01.2025',
      'hawl.above_nisab': true,
      'hawl.consecutive_months': 1,
      'hawl.zakat_due': false,
      'hawl.nisab_source': 'authoritative',
      'hawl.override_applied': false,
    });
    expect(span?.status).toEqual({ code: 1 });
    expect(span?.ended).toBe(true);
  });

  it('records the error code when a payment fails', async () => {
    const otel = new FakeTracer();
    const tracker = new NisabTracker({
      ledger: new FailingLedger(),
      tracer: new TrackerTracer({ tracer: otel, serviceName: 'hawl-test' }),
    });

    await expect(tracker.recordPayment('01.01.2025')).rejects.toThrow('disk full');

    const span = otel.spans[0];
    expect(span?.name).toBe('hawl.tracker.record_payment');
    expect(span?.status).toEqual({ code: 2, message: 'disk full' });
    expect(span?.events).toEqual([{ name: 'hawl.error', attributes: { 'error.message': 'disk full' } }]);
    expect(span?.ended).toBe(true);
  });
});
