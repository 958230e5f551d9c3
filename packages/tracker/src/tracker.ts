// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { HistoryRecord, LedgerBackend, PaymentMarkerRecord } from '@hawl/ledger';
import { parseTrackerConfig, parseYearProgressOverride } from './config.js';
import type { TrackerConfig, TrackerConfigInput, YearProgressOverride } from './config.js';
import { formatHijriDate, requireCalendarDate, toHijri } from './dates.js';
import { applyYearProgressOverride, computeStreak, evaluateEligibility } from './engine/index.js';
import {
  EVENT_ANALYSIS_COMPLETED,
  EVENT_OBSERVATION_RECORDED,
  EVENT_OVERRIDE_APPLIED,
  TrackerEventEmitter,
} from './events.js';
import { PaymentRecorder } from './payment/recorder.js';
import { SerialQueue } from './serial-queue.js';
import type { TrackerTracer } from './telemetry/otel.js';
import type { AnalysisReport, NisabResolution, NormalizedObservation } from './types.js';

export interface NisabTrackerOptions {
  readonly ledger: LedgerBackend;
  readonly config?: TrackerConfigInput;
  /** Defaults to a fresh emitter, reachable through `tracker.events`. */
  readonly events?: TrackerEventEmitter;
  readonly tracer?: TrackerTracer;
  readonly clock?: () => Date;
}

/**
 * The tracker's public face: what an API handler, scheduler or CLI calls.
 *
 * Every operation that writes runs through one SerialQueue, so overlapping
 * calls on the same instance see each other's writes.
 *
 * Usage:
 * ```ts
 * const tracker = new NisabTracker({
 *   ledger: new EncryptedFileLedger({ filePath, secret }),
 *   config: { additionalAssets: 1500 },
 * });
 *
 * const report = await tracker.runAnalysis(observation, await resolver.resolve());
 * if (report.zakat_due) console.log(`Due: ${report.zakat_amount.toFixed(2)}`);
 * ```
 */
export class NisabTracker {
  readonly #ledger: LedgerBackend;
  readonly #config: TrackerConfig;
  readonly #events: TrackerEventEmitter;
  readonly #tracer: TrackerTracer | undefined;
  readonly #clock: () => Date;
  readonly #queue = new SerialQueue();
  readonly #payments: PaymentRecorder;

  constructor(options: NisabTrackerOptions) {
    this.#ledger = options.ledger;
    this.#config = parseTrackerConfig(options.config ?? {});
    this.#events = options.events ?? new TrackerEventEmitter();
    this.#tracer = options.tracer;
    this.#clock = options.clock ?? (() => new Date());
    this.#payments = new PaymentRecorder({
      ledger: this.#ledger,
      maxHistoryEntries: this.#config.maxHistoryEntries,
      clock: this.#clock,
      events: this.#events,
    });
  }

  get events(): TrackerEventEmitter {
    return this.#events;
  }

  get config(): TrackerConfig {
    return this.#config;
  }

  /**
   * Record one observation and return the verdict.
   *
   * The ledger is saved only after the verdict has been computed; if the save
   * fails the stored history is unchanged. Events are published after the
   * save, and a listener failure does not reject the call.
   *
   * @param override - Replaces the configured year progress override for
   *                   this run only. Supplying one enables it unless
   *                   `enabled: false` is given.
   * @throws InvalidDateError when `observation.observation_date` is malformed.
   * @throws InvalidConfigError when `override` is invalid.
   * @throws DecryptionError / CorruptionError when the ledger cannot be read.
   */
  async runAnalysis(
    observation: NormalizedObservation,
    nisab: NisabResolution,
    override?: Partial<YearProgressOverride>,
  ): Promise<AnalysisReport> {
    requireCalendarDate(observation.observation_date);
    const effectiveOverride =
      override !== undefined
        ? parseYearProgressOverride({ enabled: true, ...override })
        : this.#config.yearProgressOverride;

    const run = (): Promise<AnalysisReport> =>
      this.#queue.run(() => this.#analyse(observation, nisab, effectiveOverride));
    return this.#tracer !== undefined ? this.#tracer.traceAnalysis(observation.observation_date, run) : run();
  }

  /**
   * Insert a payment marker. See PaymentRecorder.recordPayment.
   *
   * @throws InvalidDateError before the ledger is touched.
   */
  async recordPayment(date?: string): Promise<PaymentMarkerRecord> {
    if (date !== undefined) requireCalendarDate(date);
    const run = (): Promise<PaymentMarkerRecord> => this.#queue.run(() => this.#payments.recordPayment(date));
    return this.#tracer !== undefined ? this.#tracer.traceStep('record_payment', run) : run();
  }

  /** The stored history in ledger order. */
  getHistory(): Promise<readonly HistoryRecord[]> {
    return this.#queue.run(() => this.#ledger.load());
  }

  /**
   * Replay the stored history without writing anything. The configured
   * override is applied as it would be in runAnalysis.
   */
  getCurrentStreak(): Promise<number> {
    return this.#queue.run(async () => {
      const history = await this.#ledger.load();
      const raw = computeStreak(history, { strictCalendar: this.#config.strictCalendar });
      return applyYearProgressOverride(raw, this.#config.yearProgressOverride).streak;
    });
  }

  async #analyse(
    observation: NormalizedObservation,
    nisab: NisabResolution,
    override: YearProgressOverride,
  ): Promise<AnalysisReport> {
    const history = await this.#ledger.load();
    const hijri = toHijri(requireCalendarDate(observation.observation_date));
    const now = this.#clock();

    const result = evaluateEligibility(
      history,
      {
        bankBalance: observation.total_assets_in_reference_currency,
        additionalAssets: this.#config.additionalAssets,
        nisabThreshold: nisab.value,
        gregorianDate: observation.observation_date,
        hijri: hijri ?? null,
      },
      {
        now,
        maxHistoryEntries: this.#config.maxHistoryEntries,
        hijriYearMonths: this.#config.hijriYearMonths,
        zakatRate: this.#config.zakatRate,
        override,
        strictCalendar: this.#config.strictCalendar,
      },
    );

    await this.#ledger.save(result.ledger);

    const timestamp = now.toISOString();
    const hijriDate = hijri !== undefined ? formatHijriDate(hijri) : '';
    const { verdict } = result;

    this.#events.publish(EVENT_OBSERVATION_RECORDED, {
      gregorianDate: observation.observation_date,
      aboveNisab: verdict.above_nisab,
      replaced: result.replaced,
      evicted: result.evicted,
      ledgerSize: result.ledger.length,
      timestamp,
    });
    if (result.overrideApplied) {
      this.#events.publish(EVENT_OVERRIDE_APPLIED, {
        rawStreak: result.rawStreak,
        effectiveStreak: verdict.consecutive_months_above_nisab,
        monthsAboveNisab: override.months_above_nisab,
        asOfHijriDate: override.as_of_hijri_date,
        timestamp,
      });
    }
    this.#events.publish(EVENT_ANALYSIS_COMPLETED, {
      gregorianDate: observation.observation_date,
      hijriDate,
      totalAssets: verdict.total_assets,
      nisabThreshold: verdict.nisab_threshold,
      aboveNisab: verdict.above_nisab,
      consecutiveMonths: verdict.consecutive_months_above_nisab,
      zakatDue: verdict.zakat_due,
      zakatAmount: verdict.zakat_amount,
      timestamp,
    });

    return {
      ...verdict,
      gregorian_date: observation.observation_date,
      hijri_date: hijriDate,
      nisab_source: nisab.source,
      override_applied: result.overrideApplied,
      sources: observation.sources ?? [],
    };
  }
}
