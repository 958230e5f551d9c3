// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { HistoryRecord } from "../record.js";

/**
 * Contract every ledger backend satisfies.
 *
 * A backend is pure persistence: it has no notion of streaks, deduplication
 * or caps. Callers load the whole history, work on it in memory, and hand
 * the full sequence back to `save`.
 */
export interface LedgerBackend {
  /**
   * Return the stored history in ledger order. Resolves to `[]` when no
   * store exists yet.
   *
   * Rejects with DecryptionError or CorruptionError for a store that exists
   * but cannot be read; never resolves to `[]` in that case.
   */
  load(): Promise<HistoryRecord[]>;

  /**
   * Replace the stored history with `records` in one step. Either the whole
   * sequence is persisted or the previous store is left untouched.
   */
  save(records: readonly HistoryRecord[]): Promise<void>;

  /** Whether a store has been written. */
  exists(): Promise<boolean>;

  /** Persist an empty history. */
  clear(): Promise<void>;

  /** Remove the store. Resolves to false when there was nothing to remove. */
  delete(): Promise<boolean>;
}
