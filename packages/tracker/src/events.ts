// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @hawl/tracker: Tracker Event Emitter
 *
 * `TrackerEventEmitter` is the tracker's logging channel: a typed
 * publish-subscribe bus that the facade, normalizer and resolver report to.
 * Nothing is printed by the library itself; hosts subscribe and decide.
 *
 * Supported events (see EVENT_* constants below):
 *   - tracker:analysis:completed   : after every successful runAnalysis
 *   - tracker:observation:recorded : after an observation has been persisted
 *   - tracker:payment:recorded     : after a payment marker has been persisted
 *   - tracker:nisab:resolved       : after every nisab resolution
 *   - tracker:source:failed        : when one statement source fails
 *   - tracker:override:applied     : when the year progress override raised the streak
 *
 * Payloads never carry account identifiers. Balances appear only in
 * `tracker:analysis:completed`.
 *
 * Usage:
 * ```ts
 * import { TrackerEventEmitter, EVENT_ANALYSIS_COMPLETED } from '@hawl/tracker';
 *
 * const events = new TrackerEventEmitter();
 *
 * events.on(EVENT_ANALYSIS_COMPLETED, (payload) => {
 *   console.log('Streak:', payload.consecutiveMonths, 'due:', payload.zakatDue);
 * });
 * ```
 */

import type { NisabSource } from './types.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

export const EVENT_ANALYSIS_COMPLETED = 'tracker:analysis:completed' as const;

export const EVENT_OBSERVATION_RECORDED = 'tracker:observation:recorded' as const;

export const EVENT_PAYMENT_RECORDED = 'tracker:payment:recorded' as const;

export const EVENT_NISAB_RESOLVED = 'tracker:nisab:resolved' as const;

export const EVENT_SOURCE_FAILED = 'tracker:source:failed' as const;

export const EVENT_OVERRIDE_APPLIED = 'tracker:override:applied' as const;

/** Union of all supported event name constants. */
export type TrackerEventName =
  | typeof EVENT_ANALYSIS_COMPLETED
  | typeof EVENT_OBSERVATION_RECORDED
  | typeof EVENT_PAYMENT_RECORDED
  | typeof EVENT_NISAB_RESOLVED
  | typeof EVENT_SOURCE_FAILED
  | typeof EVENT_OVERRIDE_APPLIED;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface TrackerAnalysisCompletedEventPayload {
  readonly gregorianDate: string;
  /** `d/m/yyyy` or empty. */
  readonly hijriDate: string;
  readonly totalAssets: number;
  readonly nisabThreshold: number;
  readonly aboveNisab: boolean;
  readonly consecutiveMonths: number;
  readonly zakatDue: boolean;
  readonly zakatAmount: number;
  /** ISO 8601 timestamp of the run. */
  readonly timestamp: string;
}

export interface TrackerObservationRecordedEventPayload {
  readonly gregorianDate: string;
  readonly aboveNisab: boolean;
  /** True when an observation for the same date was replaced. */
  readonly replaced: boolean;
  /** Entries dropped by the history cap on this write. */
  readonly evicted: number;
  /** Entries in the ledger after the write. */
  readonly ledgerSize: number;
  readonly timestamp: string;
}

export interface TrackerPaymentRecordedEventPayload {
  readonly gregorianDate: string;
  /** True when the caller supplied a date. */
  readonly backdated: boolean;
  readonly ledgerSize: number;
  readonly timestamp: string;
}

export interface TrackerNisabResolvedEventPayload {
  readonly source: NisabSource;
  readonly detail: string;
  readonly timestamp: string;
}

export interface TrackerSourceFailedEventPayload {
  /** Configured source name, e.g. "business". */
  readonly source: string;
  readonly errorName: string;
  readonly message: string;
  readonly timestamp: string;
}

export interface TrackerOverrideAppliedEventPayload {
  readonly rawStreak: number;
  readonly effectiveStreak: number;
  readonly monthsAboveNisab: number;
  readonly asOfHijriDate: string;
  readonly timestamp: string;
}

// ---------------------------------------------------------------------------
// Event payload map
// ---------------------------------------------------------------------------

export interface TrackerEventPayloadMap {
  [EVENT_ANALYSIS_COMPLETED]: TrackerAnalysisCompletedEventPayload;
  [EVENT_OBSERVATION_RECORDED]: TrackerObservationRecordedEventPayload;
  [EVENT_PAYMENT_RECORDED]: TrackerPaymentRecordedEventPayload;
  [EVENT_NISAB_RESOLVED]: TrackerNisabResolvedEventPayload;
  [EVENT_SOURCE_FAILED]: TrackerSourceFailedEventPayload;
  [EVENT_OVERRIDE_APPLIED]: TrackerOverrideAppliedEventPayload;
}

export type TrackerEventListener<E extends TrackerEventName> = (
  payload: TrackerEventPayloadMap[E],
) => void;

// ---------------------------------------------------------------------------
// TrackerEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed publish-subscribe emitter. All operations are synchronous; listeners
 * run in registration order.
 *
 * A listener that throws does not stop the listeners after it. Its error
 * goes to `onListenerError` when one is given. Otherwise `emit` rethrows the
 * first such error once every listener has run, and `publish` raises each
 * one as a process warning.
 */
export class TrackerEventEmitter {
  readonly #listeners: Map<
    TrackerEventName,
    Array<{ listener: (payload: unknown) => void; once: boolean }>
  > = new Map();

  readonly #onListenerError: ((error: unknown, event: TrackerEventName) => void) | undefined;

  constructor(options: { onListenerError?: (error: unknown, event: TrackerEventName) => void } = {}) {
    this.#onListenerError = options.onListenerError;
  }

  on<E extends TrackerEventName>(event: E, listener: TrackerEventListener<E>): this {
    this.#addListener(event, listener as (payload: unknown) => void, false);
    return this;
  }

  /** Registers a listener that is removed after its first invocation. */
  once<E extends TrackerEventName>(event: E, listener: TrackerEventListener<E>): this {
    this.#addListener(event, listener as (payload: unknown) => void, true);
    return this;
  }

  /** Removes the first matching registration of `listener`. */
  off<E extends TrackerEventName>(event: E, listener: TrackerEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.findIndex(
      (entry) => entry.listener === (listener as (payload: unknown) => void),
    );
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Invokes every listener for `event`.
   *
   * @returns `true` if at least one listener was invoked.
   * @throws the first listener error when no `onListenerError` was given.
   */
  emit<E extends TrackerEventName>(event: E, payload: TrackerEventPayloadMap[E]): boolean {
    const { invoked, failures } = this.#dispatch(event, payload);
    if (failures.length > 0) {
      throw failures[0];
    }
    return invoked;
  }

  /**
   * Like `emit`, but never throws. The tracker reports through this once an
   * operation has taken effect, so a failing listener cannot turn a
   * completed write into a rejected call. Listener errors go to
   * `onListenerError`, or are raised as process warnings when none was given.
   */
  publish<E extends TrackerEventName>(event: E, payload: TrackerEventPayloadMap[E]): boolean {
    const { invoked, failures } = this.#dispatch(event, payload);
    for (const failure of failures) {
      process.emitWarning(failure instanceof Error ? failure : String(failure), {
        type: 'TrackerListenerError',
        detail: `Listener for "${event}" threw.`,
      });
    }
    return invoked;
  }

  removeAllListeners(event?: TrackerEventName): this {
    if (event !== undefined) {
      this.#listeners.delete(event);
    } else {
      this.#listeners.clear();
    }
    return this;
  }

  listenerCount(event: TrackerEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }

  /** Runs the listeners; failures are collected unless `onListenerError` takes them. */
  #dispatch<E extends TrackerEventName>(
    event: E,
    payload: TrackerEventPayloadMap[E],
  ): { invoked: boolean; failures: unknown[] } {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return { invoked: false, failures: [] };

    // Listeners added or removed during emission do not affect this call.
    const snapshot = [...entries];

    const remaining = entries.filter((entry) => !entry.once);
    if (remaining.length !== entries.length) {
      if (remaining.length === 0) {
        this.#listeners.delete(event);
      } else {
        this.#listeners.set(event, remaining);
      }
    }

    const failures: unknown[] = [];
    for (const { listener } of snapshot) {
      try {
        listener(payload);
      } catch (error: unknown) {
        if (this.#onListenerError !== undefined) {
          this.#onListenerError(error, event);
        } else {
          failures.push(error);
        }
      }
    }
    return { invoked: true, failures };
  }

  #addListener(
    event: TrackerEventName,
    listener: (payload: unknown) => void,
    once: boolean,
  ): void {
    const existing = this.#listeners.get(event);
    if (existing !== undefined) {
      existing.push({ listener, once });
    } else {
      this.#listeners.set(event, [{ listener, once }]);
    }
  }
}
