// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { canonicaliseHistoryRecords } from "../record.js";
import type { HistoryRecord } from "../record.js";
import type { LedgerBackend } from "./interface.js";

/**
 * Volatile in-memory backend.
 *
 * Records are validated like the file backend does and copied on the way in
 * and out, so callers cannot reach stored state through a returned array.
 * Suitable for tests and short-lived processes; data is lost when the
 * process exits.
 */
export class MemoryLedger implements LedgerBackend {
  private records: HistoryRecord[] | undefined;
  private saveCount = 0;

  constructor(initial?: readonly HistoryRecord[]) {
    this.records = initial !== undefined ? canonicaliseHistoryRecords(initial) : undefined;
  }

  async load(): Promise<HistoryRecord[]> {
    return this.records !== undefined ? structuredClone(this.records) : [];
  }

  async save(records: readonly HistoryRecord[]): Promise<void> {
    this.records = canonicaliseHistoryRecords(records);
    this.saveCount += 1;
  }

  async exists(): Promise<boolean> {
    return this.records !== undefined;
  }

  async clear(): Promise<void> {
    await this.save([]);
  }

  async delete(): Promise<boolean> {
    const existed = this.records !== undefined;
    this.records = undefined;
    return existed;
  }

  /** Number of successful `save` calls. */
  get saves(): number {
    return this.saveCount;
  }
}
