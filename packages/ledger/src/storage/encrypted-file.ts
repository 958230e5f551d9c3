// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { randomBytes } from "node:crypto";
import { chmod, mkdir, open, readFile, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { openEnvelope, resolveScryptParams, sealEnvelope } from "../crypto/envelope.js";
import type { ScryptParams } from "../crypto/envelope.js";
import { CorruptionError, InvalidSecretError } from "../errors.js";
import { canonicaliseHistoryRecords, parseHistoryRecords } from "../record.js";
import type { HistoryRecord } from "../record.js";
import type { LedgerBackend } from "./interface.js";

/** Owner read/write only. */
const FILE_MODE = 0o600;
const DIRECTORY_MODE = 0o700;

export interface EncryptedFileLedgerOptions {
  /** Absolute path of the encrypted store, e.g. `~/.hawl/history.enc`. */
  readonly filePath: string;
  /** User secret the per-file key is derived from. Must be non-empty. */
  readonly secret: string;
  /** scrypt cost overrides. Lower them only in tests. */
  readonly scrypt?: Partial<ScryptParams>;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Encrypted-at-rest file backend.
 *
 * The whole history is one JSON array sealed in an AES-256-GCM envelope (see
 * `crypto/envelope.ts`). Saves write a sibling temp file with owner-only
 * permissions, flush it to disk and rename it over the store, so an
 * interrupted save leaves the previous store intact.
 *
 * There is no locking: two processes saving concurrently race, and the last
 * rename wins.
 */
export class EncryptedFileLedger implements LedgerBackend {
  readonly filePath: string;
  private readonly secret: string;
  private readonly params: ScryptParams;

  constructor(options: EncryptedFileLedgerOptions) {
    if (options.secret.length === 0) {
      throw new InvalidSecretError();
    }
    this.filePath = options.filePath;
    this.secret = options.secret;
    this.params = resolveScryptParams(options.scrypt);
  }

  async load(): Promise<HistoryRecord[]> {
    let envelope: Buffer;
    try {
      envelope = await readFile(this.filePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const plaintext = await openEnvelope(envelope, this.secret, this.params, this.filePath);

    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext.toString("utf8"));
    } catch (error) {
      throw new CorruptionError(`Ledger ${this.filePath} does not contain valid JSON`, [], { cause: error });
    }
    return parseHistoryRecords(parsed);
  }

  async save(records: readonly HistoryRecord[]): Promise<void> {
    const canonical = canonicaliseHistoryRecords(records);
    const plaintext = Buffer.from(JSON.stringify(canonical, null, 2), "utf8");
    const envelope = await sealEnvelope(plaintext, this.secret, this.params);

    await mkdir(dirname(this.filePath), { recursive: true, mode: DIRECTORY_MODE });

    const tempPath = `${this.filePath}.${randomBytes(6).toString("hex")}.tmp`;
    try {
      const handle = await open(tempPath, "w", FILE_MODE);
      try {
        await handle.writeFile(envelope);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
    await chmod(this.filePath, FILE_MODE);
  }

  async exists(): Promise<boolean> {
    try {
      await stat(this.filePath);
      return true;
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async clear(): Promise<void> {
    await this.save([]);
  }

  async delete(): Promise<boolean> {
    if (!(await this.exists())) {
      return false;
    }
    await rm(this.filePath);
    return true;
  }
}
