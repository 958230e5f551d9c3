// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Base class for all @hawl/ledger errors.
 *
 * Every ledger error carries a machine-readable `code` so callers can tell a
 * wrong secret apart from a damaged file without parsing messages.
 */
export class LedgerError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when an existing store cannot be decrypted with the supplied
 * secret: wrong secret, flipped bytes anywhere in the envelope, or a file
 * that is not a ledger envelope at all.
 *
 * Callers must not fall back to an empty history on this error; doing so
 * would discard the streak the store holds.
 */
export class DecryptionError extends LedgerError {
  /** The store that failed to decrypt, when file-backed. */
  readonly filePath: string | undefined;

  constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
    super("DECRYPTION_FAILED", message, { cause: options?.cause });
    this.name = "DecryptionError";
    this.filePath = options?.filePath;
  }
}

/**
 * Thrown when a store decrypts successfully but the plaintext is not a JSON
 * array of valid history records.
 *
 * `issues` holds one `path: message` entry per validation failure.
 */
export class CorruptionError extends LedgerError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super("LEDGER_CORRUPTED", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.name = "CorruptionError";
    this.issues = issues;
  }
}

/**
 * Thrown by `save()` when the caller hands over records that would not load
 * back. Nothing is written.
 */
export class InvalidRecordError extends LedgerError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("INVALID_RECORD", `Refusing to save invalid history records: ${issues.join("; ")}`);
    this.name = "InvalidRecordError";
    this.issues = issues;
  }
}

/** Thrown at construction when the ledger secret is empty. */
export class InvalidSecretError extends LedgerError {
  constructor() {
    super("INVALID_SECRET", "Ledger secret cannot be empty.");
    this.name = "InvalidSecretError";
  }
}

/**
 * Thrown when the remote sync step of a GitSyncLedger fails.
 *
 * The local encrypted file has already been written when this is raised;
 * only the remote copy is stale.
 */
export class LedgerSyncError extends LedgerError {
  /** The command line that failed, e.g. `git push`. */
  readonly command: string;
  /** Process exit code, when the command ran at all. */
  readonly exitCode: number | undefined;

  constructor(command: string, detail: string, options?: { exitCode?: number; cause?: unknown }) {
    const exitClause = options?.exitCode !== undefined ? ` (exit ${options.exitCode})` : "";
    super("LEDGER_SYNC_FAILED", `Ledger sync command "${command}" failed${exitClause}: ${detail}`, {
      cause: options?.cause,
    });
    this.name = "LedgerSyncError";
    this.command = command;
    this.exitCode = options?.exitCode;
  }
}
