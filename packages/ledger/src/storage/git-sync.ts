// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { execFile } from "node:child_process";
import { relative } from "node:path";
import { LedgerSyncError } from "../errors.js";
import type { HistoryRecord } from "../record.js";
import type { LedgerBackend } from "./interface.js";

/** Outcome of one external command. A non-zero exit is not a rejection. */
export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs an external command. Rejects only when the command could not be
 * started at all.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { readonly cwd: string },
) => Promise<CommandResult>;

/** Default runner backed by `child_process.execFile` (no shell). */
export const execFileRunner: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    execFile(command, [...args], { cwd: options.cwd }, (error, stdout, stderr) => {
      if (error === null) {
        resolve({ exitCode: 0, stdout, stderr });
      } else if (typeof error.code === "number") {
        resolve({ exitCode: error.code, stdout, stderr });
      } else {
        reject(error);
      }
    });
  });

export interface GitSyncLedgerOptions {
  /** The local backend that owns the file. */
  readonly inner: LedgerBackend & { readonly filePath: string };
  /** Working tree the ledger file lives in. */
  readonly repositoryPath: string;
  readonly runner?: CommandRunner;
  /** Commit identity, configured locally on the repository before committing. */
  readonly author?: { readonly name: string; readonly email: string };
  /** Push after committing. Defaults to true. */
  readonly push?: boolean;
  readonly commitMessage?: (now: Date) => string;
  /**
   * Receives sync failures instead of having `save` reject. The local file
   * is already written when this is called.
   */
  readonly onSyncError?: (error: LedgerSyncError) => void;
  readonly clock?: () => Date;
}

const DEFAULT_AUTHOR = { name: "Hawl Ledger Bot", email: "ledger-bot@localhost" } as const;

function defaultCommitMessage(now: Date): string {
  return `Update balance history - ${now.toISOString()}`;
}

/**
 * Backend that mirrors every save to a git remote.
 *
 * `load` reads the local file through the wrapped backend. `save` writes
 * locally first, then stages the file, commits only when the staged file
 * differs from HEAD, and pushes.
 */
export class GitSyncLedger implements LedgerBackend {
  readonly filePath: string;
  private readonly inner: LedgerBackend;
  private readonly repositoryPath: string;
  private readonly runner: CommandRunner;
  private readonly author: { readonly name: string; readonly email: string };
  private readonly push: boolean;
  private readonly commitMessage: (now: Date) => string;
  private readonly onSyncError: ((error: LedgerSyncError) => void) | undefined;
  private readonly clock: () => Date;

  constructor(options: GitSyncLedgerOptions) {
    this.inner = options.inner;
    this.filePath = options.inner.filePath;
    this.repositoryPath = options.repositoryPath;
    this.runner = options.runner ?? execFileRunner;
    this.author = options.author ?? DEFAULT_AUTHOR;
    this.push = options.push ?? true;
    this.commitMessage = options.commitMessage ?? defaultCommitMessage;
    this.onSyncError = options.onSyncError;
    this.clock = options.clock ?? (() => new Date());
  }

  load(): Promise<HistoryRecord[]> {
    return this.inner.load();
  }

  async save(records: readonly HistoryRecord[]): Promise<void> {
    await this.inner.save(records);
    try {
      await this.sync();
    } catch (error) {
      const syncError =
        error instanceof LedgerSyncError ? error : new LedgerSyncError("git", String(error), { cause: error });
      if (this.onSyncError === undefined) {
        throw syncError;
      }
      this.onSyncError(syncError);
    }
  }

  exists(): Promise<boolean> {
    return this.inner.exists();
  }

  async clear(): Promise<void> {
    await this.save([]);
  }

  delete(): Promise<boolean> {
    return this.inner.delete();
  }

  /**
   * Stage, commit and push the ledger file.
   *
   * @returns false when the staged file matched HEAD and nothing was committed.
   */
  async sync(): Promise<boolean> {
    const file = relative(this.repositoryPath, this.filePath);

    await this.git(["config", "--local", "user.name", this.author.name]);
    await this.git(["config", "--local", "user.email", this.author.email]);
    await this.git(["add", "--", file]);

    // Exit 0: nothing staged for this file. Exit 1: changes staged.
    const diff = await this.git(["diff", "--cached", "--quiet", "--", file], [0, 1]);
    if (diff.exitCode === 0) {
      return false;
    }

    await this.git(["commit", "-m", this.commitMessage(this.clock()), "--", file]);
    if (this.push) {
      await this.git(["push"]);
    }
    return true;
  }

  private async git(args: readonly string[], acceptedExitCodes: readonly number[] = [0]): Promise<CommandResult> {
    const result = await this.runner("git", args, { cwd: this.repositoryPath });
    if (!acceptedExitCodes.includes(result.exitCode)) {
      throw new LedgerSyncError(`git ${args.join(" ")}`, result.stderr.trim() || result.stdout.trim(), {
        exitCode: result.exitCode,
      });
    }
    return result;
  }
}
