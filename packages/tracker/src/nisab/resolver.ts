// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { parseNisabConfig } from '../config.js';
import type { NisabConfig, NisabConfigInput } from '../config.js';
import { EVENT_NISAB_RESOLVED } from '../events.js';
import type { TrackerEventEmitter } from '../events.js';
import type { NisabResolution } from '../types.js';
import { extractNisab } from './parse.js';

/** The slice of the WHATWG `fetch` the resolver uses. */
export type FetchLike = (
  url: string,
  init: { readonly signal: AbortSignal; readonly headers: Record<string, string> },
) => Promise<{ readonly ok: boolean; readonly status: number; text(): Promise<string> }>;

export interface NisabResolverOptions {
  readonly config?: NisabConfigInput;
  /** Defaults to the global `fetch`. */
  readonly fetch?: FetchLike;
  readonly events?: TrackerEventEmitter;
  readonly clock?: () => Date;
}

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent': 'hawl-nisab-resolver/0.1',
  Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves the current nisab, preferring the published value over the
 * configured fallback.
 *
 * URLs are tried in order, each with its own timeout. The first page yielding
 * an in-range value wins. `resolve` never rejects: network errors, non-2xx
 * responses, unmatched pages and out-of-range values all end in the fallback.
 */
export class NisabResolver {
  readonly #config: NisabConfig;
  readonly #fetch: FetchLike;
  readonly #events: TrackerEventEmitter | undefined;
  readonly #clock: () => Date;

  constructor(options: NisabResolverOptions = {}) {
    this.#config = parseNisabConfig(options.config ?? {});
    this.#fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.#events = options.events;
    this.#clock = options.clock ?? (() => new Date());
  }

  /**
   * @param signal - Aborting skips any remaining URLs and returns the
   *                 fallback.
   */
  async resolve(signal?: AbortSignal): Promise<NisabResolution> {
    const failures: string[] = [];
    let published: { value: number; url: string } | undefined;

    for (const url of this.#config.urls) {
      if (signal?.aborted === true) {
        failures.push('aborted');
        break;
      }
      try {
        const page = await this.#fetchPage(url, signal);
        const extraction = extractNisab(page, this.#config.patterns, {
          min: this.#config.minValue,
          max: this.#config.maxValue,
        });
        if (extraction.ok) {
          published = { value: extraction.value, url };
          break;
        }
        failures.push(`${url}: ${extraction.reason}`);
      } catch (error: unknown) {
        failures.push(`${url}: ${describeError(error)}`);
      }
    }

    if (published !== undefined) {
      return this.#finish({ value: published.value, source: 'authoritative', detail: published.url });
    }
    const reason = failures.length > 0 ? failures.join('; ') : 'no URLs configured';
    return this.#finish({
      value: this.#config.fallbackValue,
      source: 'fallback',
      detail: `Fallback configuration (${this.#config.fallbackValue}): ${reason}`,
    });
  }

  async #fetchPage(url: string, signal: AbortSignal | undefined): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`timed out after ${this.#config.timeoutMs} ms`));
    }, this.#config.timeoutMs);
    const forwardAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await this.#fetch(url, { signal: controller.signal, headers: REQUEST_HEADERS });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      return await response.text();
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  #finish(result: Omit<NisabResolution, 'fetched_at'>): NisabResolution {
    const resolution: NisabResolution = { ...result, fetched_at: this.#clock().toISOString() };
    this.#events?.publish(EVENT_NISAB_RESOLVED, {
      source: resolution.source,
      detail: resolution.detail,
      timestamp: resolution.fetched_at,
    });
    return resolution;
  }
}
