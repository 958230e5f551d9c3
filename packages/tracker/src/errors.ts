// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Base class for all @hawl/tracker errors.
 *
 * Every tracker error includes a machine-readable `code` that calling code
 * can switch on without parsing human-readable messages. Ledger failures
 * (DecryptionError, CorruptionError, LedgerSyncError) come from
 * @hawl/ledger and are re-exported from the package root.
 */
export class TrackerError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'TrackerError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when no balance reading could be obtained from any account or
 * source. Nothing is written to the ledger for that run.
 *
 * `diagnostics` holds one `"<source>: <outcome>"` line per source so the
 * caller can show which source failed and why.
 */
export class NoDataError extends TrackerError {
  readonly diagnostics: readonly string[];

  constructor(diagnostics: readonly string[] = []) {
    const suffix = diagnostics.length > 0 ? ` (${diagnostics.join('; ')})` : '';
    super('NO_BALANCE_DATA', `No balance data could be obtained from any account${suffix}.`);
    this.name = 'NoDataError';
    this.diagnostics = diagnostics;
  }
}

/**
 * Thrown when a payment date is not a zero-padded `DD.MM.YYYY` string naming
 * a real calendar day. Raised before the ledger is touched.
 */
export class InvalidDateError extends TrackerError {
  /** The rejected input, verbatim. */
  readonly input: string;

  constructor(input: string, reason = 'expected a real calendar date in DD.MM.YYYY format') {
    super('INVALID_DATE', `Invalid date "${input}": ${reason}.`);
    this.name = 'InvalidDateError';
    this.input = input;
  }
}

/**
 * Thrown when tracker configuration fails validation.
 */
export class InvalidConfigError extends TrackerError {
  /** Structured list of individual validation failures. */
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Tracker configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}
