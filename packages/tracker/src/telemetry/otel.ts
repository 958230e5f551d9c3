// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AnalysisReport } from '../types.js';

/**
 * Minimal OpenTelemetry Span interface.
 *
 * This avoids a hard dependency on @opentelemetry/api.  Any OTel-compatible
 * tracer that produces spans with these methods can be used.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  addEvent(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

/**
 * Minimal OpenTelemetry Tracer interface.
 */
export interface OTelTracerLike {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpanLike;
}

export interface TrackerOTelConfig {
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans. Defaults to "hawl-tracker". */
  serviceName?: string;
}

/** OTel span status codes (matching OpenTelemetry SpanStatusCode). */
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * Wraps tracker operations in spans.
 *
 * Spans carry the verdict flags and streak length. Balances are left out so
 * traces can be exported without exposing what the user holds.
 *
 * Usage:
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const tracer = new TrackerTracer({ tracer: trace.getTracer('hawl') });
 * const tracker = new NisabTracker({ ledger, tracer });
 * ```
 */
export class TrackerTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: TrackerOTelConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'hawl-tracker';
  }

  async traceAnalysis(
    observationDate: string,
    analyseFn: () => Promise<AnalysisReport>,
  ): Promise<AnalysisReport> {
    const span = this.#tracer.startSpan('hawl.tracker.run_analysis', {
      attributes: {
        'service.name': this.#serviceName,
        'hawl.observation_date': observationDate,
      },
    });

    try {
      const report = await analyseFn();
      span.setAttribute('hawl.above_nisab', report.above_nisab);
      span.setAttribute('hawl.consecutive_months', report.consecutive_months_above_nisab);
      span.setAttribute('hawl.zakat_due', report.zakat_due);
      span.setAttribute('hawl.nisab_source', report.nisab_source);
      span.setAttribute('hawl.override_applied', report.override_applied);
      if (report.zakat_due) {
        span.addEvent('hawl.zakat_due');
      }
      span.setStatus({ code: SPAN_STATUS_OK });
      return report;
    } catch (error: unknown) {
      this.#recordError(span, error);
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Creates a span for any other tracker step, e.g. "record_payment" or
   * "get_current_streak".
   */
  async traceStep<T>(stepName: string, executeFn: () => Promise<T>): Promise<T> {
    const span = this.#tracer.startSpan(`hawl.tracker.${stepName}`, {
      attributes: {
        'service.name': this.#serviceName,
        'hawl.step': stepName,
      },
    });

    try {
      const result = await executeFn();
      span.setStatus({ code: SPAN_STATUS_OK });
      return result;
    } catch (error: unknown) {
      this.#recordError(span, error);
      throw error;
    } finally {
      span.end();
    }
  }

  #recordError(span: OTelSpanLike, error: unknown): void {
    const message = error instanceof Error ? error.message : 'Unknown error';
    span.setStatus({ code: SPAN_STATUS_ERROR, message });
    const attributes: Record<string, string> = { 'error.message': message };
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
      attributes['error.code'] = error.code;
    }
    span.addEvent('hawl.error', attributes);
  }
}
