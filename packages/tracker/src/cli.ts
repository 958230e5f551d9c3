// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Command-line front end over NisabTracker.
 *
 *   hawl mark-paid [--date DD.MM.YYYY]
 *   hawl history [--limit N]
 *   hawl streak
 *
 * This is the only module that reads process environment, and only through
 * the `env` argument of runCli:
 *   HAWL_SECRET       ledger secret (required)
 *   HAWL_LEDGER_PATH  ledger file (default ~/.hawl/history.enc)
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { EncryptedFileLedger, LedgerError, isPaymentMarker, recentEntries } from '@hawl/ledger';
import type { HistoryRecord, LedgerBackend } from '@hawl/ledger';
import { TrackerError } from './errors.js';
import {
  EVENT_ANALYSIS_COMPLETED,
  EVENT_OBSERVATION_RECORDED,
  EVENT_OVERRIDE_APPLIED,
  EVENT_PAYMENT_RECORDED,
  TrackerEventEmitter,
} from './events.js';
import type { TrackerEventName } from './events.js';
import { NisabTracker } from './tracker.js';

export const DEFAULT_LEDGER_FILE = 'history.enc';

const USAGE = `Usage:
  hawl mark-paid [--date DD.MM.YYYY]   Record a zakat payment (default: today)
  hawl history [--limit N]             Show the most recent ledger entries (default: 12)
  hawl streak                          Show consecutive months above nisab

Options:
  --ledger <path>   Ledger file (default: $HAWL_LEDGER_PATH or ~/.hawl/history.enc)
  --verbose, -v     Log tracker events to stderr
  --help, -h        Show this help message

Environment:
  HAWL_SECRET       Secret the ledger key is derived from (required)`;

/** Thrown for malformed command lines. */
export class CliUsageError extends TrackerError {
  constructor(message: string) {
    super('INVALID_USAGE', message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand = 'mark-paid' | 'history' | 'streak' | 'help';

export interface CliArgs {
  readonly command: CliCommand;
  readonly date?: string;
  readonly limit: number;
  readonly ledgerPath?: string;
  readonly verbose: boolean;
}

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliDependencies {
  /** Builds the backend; defaults to an EncryptedFileLedger. */
  readonly createLedger?: (options: { readonly filePath: string; readonly secret: string }) => LedgerBackend;
  readonly clock?: () => Date;
}

const COMMANDS: readonly CliCommand[] = ['mark-paid', 'history', 'streak'];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse the arguments after the executable name.
 *
 * @throws CliUsageError
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  let command: CliCommand | undefined;
  let date: string | undefined;
  let limit = 12;
  let ledgerPath: string | undefined;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const [flag, inline]: [string, string | undefined] =
      arg.startsWith('--') && arg.includes('=') ? splitOnce(arg, '=') : [arg, undefined];

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CliUsageError(`Option ${flag} requires a value.`);
      }
      i++;
      return next;
    };

    if (flag === '--help' || flag === '-h') {
      return { command: 'help', limit, verbose };
    } else if (flag === '--verbose' || flag === '-v') {
      verbose = true;
    } else if (flag === '--date') {
      date = takeValue();
    } else if (flag === '--ledger') {
      ledgerPath = takeValue();
    } else if (flag === '--limit') {
      const raw = takeValue();
      limit = Number(raw);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new CliUsageError(`--limit must be a positive integer, got "${raw}".`);
      }
    } else if (flag.startsWith('-')) {
      throw new CliUsageError(`Unknown option ${flag}.`);
    } else if (command === undefined && isCommand(flag)) {
      command = flag;
    } else {
      throw new CliUsageError(`Unexpected argument "${arg}".`);
    }
  }

  if (command === undefined) {
    throw new CliUsageError('No command given.');
  }
  if (date !== undefined && command !== 'mark-paid') {
    throw new CliUsageError('--date only applies to mark-paid.');
  }
  return { command, date, limit, ledgerPath, verbose };
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator);
  return [value.slice(0, index), value.slice(index + 1)];
}

function formatAmount(value: number): string {
  return value.toFixed(2);
}

/** One line per entry, for `hawl history`. */
export function formatHistoryLine(record: HistoryRecord): string {
  if (isPaymentMarker(record)) {
    return `${record.gregorian_date}  zakat paid`;
  }
  const status = record.above_nisab ? 'above' : 'below';
  const hijri =
    record.hijri_year !== null && record.hijri_month !== null ? `  (${record.hijri_month}/${record.hijri_year})` : '';
  return `${record.gregorian_date}  ${status}  ${formatAmount(record.total_assets)} / ${formatAmount(record.nisab_threshold)}${hijri}`;
}

function subscribeVerbose(events: TrackerEventEmitter, io: CliIo): void {
  const log = (event: TrackerEventName, payload: object): void => {
    io.stderr(`[hawl] ${event} ${JSON.stringify(payload)}`);
  };
  events.on(EVENT_PAYMENT_RECORDED, (payload) => log(EVENT_PAYMENT_RECORDED, payload));
  events.on(EVENT_OBSERVATION_RECORDED, (payload) => log(EVENT_OBSERVATION_RECORDED, payload));
  events.on(EVENT_OVERRIDE_APPLIED, (payload) => log(EVENT_OVERRIDE_APPLIED, payload));
  events.on(EVENT_ANALYSIS_COMPLETED, (payload) => log(EVENT_ANALYSIS_COMPLETED, payload));
}

/**
 * Run one CLI invocation.
 *
 * @returns The process exit code: 0 on success, 1 for a failed operation,
 *          2 for a usage or environment problem.
 */
export async function runCli(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
  io: CliIo,
  dependencies: CliDependencies = {},
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error: unknown) {
    if (error instanceof CliUsageError) {
      io.stderr(`Error: ${error.message}`);
      io.stderr(USAGE);
      return 2;
    }
    throw error;
  }

  if (args.command === 'help') {
    io.stdout(USAGE);
    return 0;
  }

  const secret = env['HAWL_SECRET'] ?? '';
  if (secret.length === 0) {
    io.stderr('Error: HAWL_SECRET is not set.');
    return 2;
  }
  const filePath = args.ledgerPath ?? env['HAWL_LEDGER_PATH'] ?? join(homedir(), '.hawl', DEFAULT_LEDGER_FILE);

  const events = new TrackerEventEmitter();
  if (args.verbose) subscribeVerbose(events, io);

  try {
    const createLedger: NonNullable<CliDependencies['createLedger']> =
      dependencies.createLedger ?? ((options) => new EncryptedFileLedger(options));
    const tracker = new NisabTracker({
      ledger: createLedger({ filePath, secret }),
      events,
      clock: dependencies.clock,
    });

    switch (args.command) {
      case 'mark-paid': {
        const marker = await tracker.recordPayment(args.date);
        io.stdout(`Zakat payment recorded for ${marker.gregorian_date}. The 12-month counter has been reset.`);
        return 0;
      }
      case 'history': {
        const history = await tracker.getHistory();
        if (history.length === 0) {
          io.stdout('No history recorded yet.');
          return 0;
        }
        for (const record of recentEntries(history, args.limit)) {
          io.stdout(formatHistoryLine(record));
        }
        return 0;
      }
      case 'streak': {
        const streak = await tracker.getCurrentStreak();
        const required = tracker.config.hijriYearMonths;
        io.stdout(`Consecutive months above nisab: ${streak} of ${required}`);
        return 0;
      }
    }
    return 0;
  } catch (error: unknown) {
    if (error instanceof TrackerError || error instanceof LedgerError) {
      io.stderr(`Error [${error.code}]: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
