// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { parseNormalizerConfig } from '../config.js';
import type { NormalizerConfig, NormalizerConfigInput, StatementSourceConfig } from '../config.js';
import { InvalidConfigError, NoDataError } from '../errors.js';
import { EVENT_SOURCE_FAILED } from '../events.js';
import type { TrackerEventEmitter } from '../events.js';
import type { AccountContribution, BalanceReading, NormalizedObservation, SourceBreakdown } from '../types.js';
import { convertReadings, latestPeriodEnd, normalizeReadings } from './normalize.js';
import type { CurrencyConversion } from './normalize.js';

/**
 * Supplies balance readings for one configured source, e.g. the statements
 * found in one mailbox. Retrieval and parsing live behind this interface.
 */
export interface StatementSource {
  /**
   * Read one balance per configured account. An account whose statement
   * could not be found is returned with `found: false`, not thrown.
   * Rejecting marks the whole source as failed.
   */
  read(request: {
    readonly config: StatementSourceConfig;
    readonly signal?: AbortSignal;
  }): Promise<readonly BalanceReading[]>;
}

export interface BalanceNormalizerOptions {
  readonly config?: NormalizerConfigInput;
  /** One collaborator per enabled source, keyed by the configured name. */
  readonly sources: Readonly<Record<string, StatementSource>>;
  readonly events?: TrackerEventEmitter;
  readonly clock?: () => Date;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : `Error: ${String(error)}`;
}

/**
 * Collects readings from every enabled source and folds them into one
 * NormalizedObservation.
 *
 * Sources are read one after another. A source that fails, or returns a
 * statement period end that is not a real date, is recorded in the
 * diagnostics and skipped; the run fails only when no source yields data.
 * A currency without a configured rate still fails the run.
 */
export class BalanceNormalizer {
  readonly #config: NormalizerConfig;
  readonly #sources: Readonly<Record<string, StatementSource>>;
  readonly #events: TrackerEventEmitter | undefined;
  readonly #clock: () => Date;

  constructor(options: BalanceNormalizerOptions) {
    this.#config = parseNormalizerConfig(options.config ?? {});
    this.#sources = options.sources;
    this.#events = options.events;
    this.#clock = options.clock ?? (() => new Date());

    const missing = this.#config.sources
      .filter((source) => source.enabled && options.sources[source.name] === undefined)
      .map((source) => `sources.${source.name}: no statement source registered`);
    if (missing.length > 0) {
      throw new InvalidConfigError(missing);
    }
  }

  get conversion(): CurrencyConversion {
    return { referenceCurrency: this.#config.referenceCurrency, rates: this.#config.conversionRates };
  }

  /**
   * @throws NoDataError carrying one diagnostic line per source when nothing
   *         usable was read.
   * @throws InvalidConfigError when a found reading's currency has no rate.
   * @throws the signal's reason when `signal` is aborted.
   */
  async collect(signal?: AbortSignal): Promise<NormalizedObservation> {
    const conversion = this.conversion;
    const diagnostics: string[] = [];
    const breakdowns: SourceBreakdown[] = [];
    const readings: BalanceReading[] = [];

    for (const sourceConfig of this.#config.sources) {
      if (!sourceConfig.enabled) continue;
      signal?.throwIfAborted();

      const name = sourceConfig.name;
      const source = this.#sources[name];
      if (source === undefined) continue;

      let sourceReadings: readonly BalanceReading[];
      let accounts: AccountContribution[];
      try {
        sourceReadings = await source.read({ config: sourceConfig, signal });
        accounts = convertReadings(sourceReadings, conversion);
        latestPeriodEnd(accounts);
      } catch (error: unknown) {
        if (signal?.aborted === true || error instanceof InvalidConfigError) throw error;
        const diagnostic = `${name}: ${describeError(error)}`;
        diagnostics.push(diagnostic);
        breakdowns.push({ name, status: 'failed', total: 0, accounts: [], diagnostic });
        this.#events?.publish(EVENT_SOURCE_FAILED, {
          source: name,
          errorName: error instanceof Error ? error.name : 'Error',
          message: error instanceof Error ? error.message : String(error),
          timestamp: this.#clock().toISOString(),
        });
        continue;
      }

      const total = accounts.reduce((sum, account) => sum + account.converted_balance, 0);
      const hasData = accounts.some((account) => account.found);
      const diagnostic = hasData ? `${name}: OK` : `${name}: no balance data returned`;
      diagnostics.push(diagnostic);
      breakdowns.push({ name, status: hasData ? 'ok' : 'failed', total, accounts, diagnostic });
      readings.push(...sourceReadings);
    }

    const total = breakdowns.reduce((sum, breakdown) => sum + breakdown.total, 0);
    if (!breakdowns.some((breakdown) => breakdown.status === 'ok') || total === 0) {
      throw new NoDataError(diagnostics.length > 0 ? diagnostics : ['no sources processed']);
    }

    const normalized = normalizeReadings(readings, conversion, { today: this.#clock() });
    return { ...normalized, sources: breakdowns };
  }
}
