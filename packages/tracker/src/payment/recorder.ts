// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { MAX_HISTORY_ENTRIES, appendRecord, createPaymentMarker } from '@hawl/ledger';
import type { LedgerBackend, PaymentMarkerRecord } from '@hawl/ledger';
import { calendarDateOf, calendarDateToIso, formatCalendarDate, requireCalendarDate } from '../dates.js';
import { EVENT_PAYMENT_RECORDED } from '../events.js';
import type { TrackerEventEmitter } from '../events.js';

export interface PaymentRecorderOptions {
  readonly ledger: LedgerBackend;
  readonly maxHistoryEntries?: number;
  readonly clock?: () => Date;
  readonly events?: TrackerEventEmitter;
}

/**
 * Inserts "zakat was paid" markers, which end the streak at their position.
 *
 * Each call is its own load -> append -> save cycle against the backend,
 * independent of any analysis run.
 */
export class PaymentRecorder {
  readonly #ledger: LedgerBackend;
  readonly #maxHistoryEntries: number;
  readonly #clock: () => Date;
  readonly #events: TrackerEventEmitter | undefined;

  constructor(options: PaymentRecorderOptions) {
    this.#ledger = options.ledger;
    this.#maxHistoryEntries = options.maxHistoryEntries ?? MAX_HISTORY_ENTRIES;
    this.#clock = options.clock ?? (() => new Date());
    this.#events = options.events;
  }

  /**
   * Record a payment.
   *
   * Without `date` the marker is filed under today with the current instant.
   * With `date` (`DD.MM.YYYY`) it is timestamped at midnight UTC of that day,
   * so it sorts at its calendar position among existing observations.
   *
   * @throws InvalidDateError before the ledger is read when `date` is
   *         malformed or names a day that does not exist.
   */
  async recordPayment(date?: string): Promise<PaymentMarkerRecord> {
    let marker: PaymentMarkerRecord;
    if (date !== undefined) {
      const day = requireCalendarDate(date);
      marker = createPaymentMarker(formatCalendarDate(day), calendarDateToIso(day));
    } else {
      const now = this.#clock();
      marker = createPaymentMarker(formatCalendarDate(calendarDateOf(now)), now.toISOString());
    }

    const history = await this.#ledger.load();
    const updated = appendRecord(history, marker, this.#maxHistoryEntries);
    await this.#ledger.save(updated);

    this.#events?.publish(EVENT_PAYMENT_RECORDED, {
      gregorianDate: marker.gregorian_date,
      backdated: date !== undefined,
      ledgerSize: updated.length,
      timestamp: this.#clock().toISOString(),
    });
    return marker;
  }
}
