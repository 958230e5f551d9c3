// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { isObservation } from "./record.js";
import type { HistoryRecord, ObservationRecord } from "./record.js";

/**
 * Number of entries (observations and payment markers combined) a ledger
 * retains. Older entries are dropped once the cap is exceeded.
 */
export const MAX_HISTORY_ENTRIES = 24;

/**
 * Pure operations over an in-memory history. None of these mutate their
 * input; each returns a fresh array.
 */

/**
 * Replace any observation with the same `gregorian_date` and append the new
 * one at the end. Payment markers are never removed here.
 *
 * Last write wins by calendar date, independent of the timestamps involved.
 */
export function upsertObservation(
  records: readonly HistoryRecord[],
  observation: ObservationRecord,
): HistoryRecord[] {
  const kept = records.filter(
    (record) => !(isObservation(record) && record.gregorian_date === observation.gregorian_date),
  );
  kept.push(observation);
  return kept;
}

/**
 * Keep only the most recent `cap` entries by position (oldest-first
 * truncation).
 */
export function evictOldest(records: readonly HistoryRecord[], cap: number = MAX_HISTORY_ENTRIES): HistoryRecord[] {
  if (!Number.isInteger(cap) || cap <= 0) {
    throw new RangeError(`History cap must be a positive integer, got ${cap}.`);
  }
  return records.length > cap ? records.slice(records.length - cap) : records.slice();
}

/** Append any record, then apply the cap. */
export function appendRecord(
  records: readonly HistoryRecord[],
  record: HistoryRecord,
  cap: number = MAX_HISTORY_ENTRIES,
): HistoryRecord[] {
  return evictOldest([...records, record], cap);
}

/** Milliseconds since the epoch for a record's `timestamp`. */
export function timestampOf(record: HistoryRecord): number {
  return Date.parse(record.timestamp);
}

/**
 * Sort ascending by timestamp instant. The sort is stable, so entries with
 * equal instants keep their ledger order.
 */
export function sortByTimestamp(records: readonly HistoryRecord[]): HistoryRecord[] {
  return records
    .map((record, index) => ({ record, index, at: timestampOf(record) }))
    .sort((a, b) => a.at - b.at || a.index - b.index)
    .map((entry) => entry.record);
}

/** The last `count` entries by position, newest last. */
export function recentEntries(records: readonly HistoryRecord[], count = 12): HistoryRecord[] {
  if (count <= 0) return [];
  return records.slice(-count);
}

/** Observation and marker counts for a history. */
export function countEntries(records: readonly HistoryRecord[]): {
  observations: number;
  markers: number;
  total: number;
} {
  const observations = records.filter(isObservation).length;
  return { observations, markers: records.length - observations, total: records.length };
}
