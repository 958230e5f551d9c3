// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { createCipheriv, createDecipheriv, randomBytes, scrypt } from "node:crypto";
import { DecryptionError } from "../errors.js";

/**
 * Authenticated envelope for ledger files.
 *
 * Layout (all lengths in bytes):
 *
 *   magic "HAWL" (4) | version (1) | salt (16) | iv (12) | tag (16) | ciphertext
 *
 * The key is derived from the caller's secret with scrypt over the per-file
 * salt; a fresh salt and IV are drawn on every seal. AES-256-GCM provides
 * tamper evidence: any flipped byte makes `openEnvelope` throw.
 */

const MAGIC = Buffer.from("HAWL", "ascii");
const FORMAT_VERSION = 1;
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const PREAMBLE_LENGTH = MAGIC.length + 1;
const HEADER_LENGTH = PREAMBLE_LENGTH + SALT_LENGTH + IV_LENGTH + TAG_LENGTH;

/** scrypt cost parameters. */
export interface ScryptParams {
  /** CPU/memory cost; a power of two. */
  readonly N: number;
  readonly r: number;
  readonly p: number;
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = { N: 2 ** 15, r: 8, p: 1 };

export function resolveScryptParams(overrides?: Partial<ScryptParams>): ScryptParams {
  const params = { ...DEFAULT_SCRYPT_PARAMS, ...overrides };
  if (params.N < 2 || (params.N & (params.N - 1)) !== 0) {
    throw new RangeError(`scrypt N must be a power of two greater than 1, got ${params.N}.`);
  }
  if (params.r < 1 || params.p < 1) {
    throw new RangeError("scrypt r and p must be at least 1.");
  }
  return params;
}

/** Derive a 256-bit key from `secret` and `salt`. */
export function deriveKey(secret: string, salt: Buffer, params: ScryptParams): Promise<Buffer> {
  // scrypt needs 128 * N * r bytes; leave headroom over Node's 32 MiB default.
  const maxmem = 256 * params.N * params.r;
  return new Promise<Buffer>((resolve, reject) => {
    scrypt(secret, salt, KEY_LENGTH, { N: params.N, r: params.r, p: params.p, maxmem }, (error, key) => {
      if (error !== null) {
        reject(error);
      } else {
        resolve(key);
      }
    });
  });
}

/** Encrypt `plaintext` into a self-describing envelope. */
export async function sealEnvelope(plaintext: Buffer, secret: string, params: ScryptParams): Promise<Buffer> {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const key = await deriveKey(secret, salt, params);
  const preamble = Buffer.concat([MAGIC, Buffer.from([FORMAT_VERSION])]);

  const cipher = createCipheriv("aes-256-gcm", key, iv, { authTagLength: TAG_LENGTH });
  cipher.setAAD(preamble);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const tag = cipher.getAuthTag();

  return Buffer.concat([preamble, salt, iv, tag, ciphertext]);
}

/**
 * Decrypt an envelope produced by `sealEnvelope`.
 *
 * @throws DecryptionError for a wrong secret, a tampered envelope, or bytes
 *         that are not an envelope at all.
 */
export async function openEnvelope(
  envelope: Buffer,
  secret: string,
  params: ScryptParams,
  filePath?: string,
): Promise<Buffer> {
  if (envelope.length < HEADER_LENGTH) {
    throw new DecryptionError("Ledger envelope is truncated.", { filePath });
  }
  if (!envelope.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new DecryptionError("File is not a ledger envelope.", { filePath });
  }
  const version = envelope[MAGIC.length];
  if (version !== FORMAT_VERSION) {
    throw new DecryptionError(`Unsupported ledger envelope version ${String(version)}.`, { filePath });
  }

  let offset = PREAMBLE_LENGTH;
  const salt = envelope.subarray(offset, (offset += SALT_LENGTH));
  const iv = envelope.subarray(offset, (offset += IV_LENGTH));
  const tag = envelope.subarray(offset, (offset += TAG_LENGTH));
  const ciphertext = envelope.subarray(offset);

  const key = await deriveKey(secret, salt, params);
  const decipher = createDecipheriv("aes-256-gcm", key, iv, { authTagLength: TAG_LENGTH });
  decipher.setAAD(envelope.subarray(0, PREAMBLE_LENGTH));
  decipher.setAuthTag(tag);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (error) {
    throw new DecryptionError("Failed to decrypt ledger: wrong secret or tampered file.", {
      filePath,
      cause: error,
    });
  }
}
