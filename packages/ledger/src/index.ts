// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @hawl/ledger: encrypted-at-rest balance history.
 *
 * Public API surface:
 *
 *   Backends:
 *     EncryptedFileLedger : AES-256-GCM file store with scrypt key derivation
 *     MemoryLedger        : volatile in-process store
 *     GitSyncLedger       : file store mirrored to a git remote after each save
 *
 *   Pure history operations:
 *     upsertObservation, evictOldest, appendRecord, sortByTimestamp,
 *     recentEntries, countEntries, timestampOf, MAX_HISTORY_ENTRIES
 *
 *   Records:
 *     ObservationRecord, PaymentMarkerRecord, HistoryRecord (+ zod schemas),
 *     createPaymentMarker, isPaymentMarker, isObservation,
 *     parseHistoryRecords, canonicaliseHistoryRecords
 *
 *   Errors:
 *     LedgerError, DecryptionError, CorruptionError, InvalidRecordError,
 *     InvalidSecretError, LedgerSyncError
 */

// Backends
export { EncryptedFileLedger } from "./storage/encrypted-file.js";
export type { EncryptedFileLedgerOptions } from "./storage/encrypted-file.js";
export { MemoryLedger } from "./storage/memory.js";
export { GitSyncLedger, execFileRunner } from "./storage/git-sync.js";
export type { CommandResult, CommandRunner, GitSyncLedgerOptions } from "./storage/git-sync.js";
export type { LedgerBackend } from "./storage/interface.js";

// History operations
export {
  MAX_HISTORY_ENTRIES,
  appendRecord,
  countEntries,
  evictOldest,
  recentEntries,
  sortByTimestamp,
  timestampOf,
  upsertObservation,
} from "./ledger.js";

// Records
export {
  HistoryRecordSchema,
  OBSERVATION_TYPE,
  ObservationRecordSchema,
  PAYMENT_MARKER_TYPE,
  PaymentMarkerRecordSchema,
  canonicaliseHistoryRecords,
  createPaymentMarker,
  isObservation,
  isPaymentMarker,
  parseHistoryRecords,
} from "./record.js";
export type { HistoryRecord, ObservationRecord, PaymentMarkerRecord } from "./record.js";

// Envelope
export { DEFAULT_SCRYPT_PARAMS, openEnvelope, sealEnvelope } from "./crypto/envelope.js";
export type { ScryptParams } from "./crypto/envelope.js";

// Errors
export {
  CorruptionError,
  DecryptionError,
  InvalidRecordError,
  InvalidSecretError,
  LedgerError,
  LedgerSyncError,
} from "./errors.js";
