// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { NisabTracker } from './tracker.js';
import type { AnalysisReport, NisabResolution, NormalizedObservation } from './types.js';

/** Anything that can produce this cycle's observation, e.g. a BalanceNormalizer. */
export interface ObservationCollector {
  collect(signal?: AbortSignal): Promise<NormalizedObservation>;
}

/** Anything that can produce the current nisab, e.g. a NisabResolver. */
export interface NisabProvider {
  resolve(signal?: AbortSignal): Promise<NisabResolution>;
}

export interface NisabMonitorOptions {
  readonly normalizer: ObservationCollector;
  readonly resolver: NisabProvider;
  readonly tracker: NisabTracker;
}

/**
 * One monitoring cycle: gather balances, resolve the nisab, then record the
 * observation and return the verdict.
 *
 * Cancellation covers the gathering steps only. Once the tracker step has
 * started it runs to completion, so an abort never leaves a half-written
 * ledger behind.
 */
export class NisabMonitor {
  readonly #normalizer: ObservationCollector;
  readonly #resolver: NisabProvider;
  readonly #tracker: NisabTracker;

  constructor(options: NisabMonitorOptions) {
    this.#normalizer = options.normalizer;
    this.#resolver = options.resolver;
    this.#tracker = options.tracker;
  }

  /**
   * @throws NoDataError when no balance could be read; nothing is recorded.
   * @throws the signal's reason when aborted before the tracker step.
   */
  async run(signal?: AbortSignal): Promise<AnalysisReport> {
    signal?.throwIfAborted();
    const observation = await this.#normalizer.collect(signal);
    signal?.throwIfAborted();
    const nisab = await this.#resolver.resolve(signal);
    signal?.throwIfAborted();
    return this.#tracker.runAnalysis(observation, nisab);
  }
}
