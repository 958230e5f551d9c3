// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * encrypted_history.ts
 *
 * Writes a small history to an encrypted ledger file, reads it back, and
 * shows that a wrong secret fails loudly instead of returning an empty
 * history.
 *
 * Run: npx tsx packages/ledger/examples/encrypted_history.ts
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DecryptionError,
  EncryptedFileLedger,
  countEntries,
  createPaymentMarker,
  upsertObservation,
} from "../src/index.js";
import type { HistoryRecord } from "../src/index.js";

async function main(): Promise<void> {
  const directory = await mkdtemp(join(tmpdir(), "hawl-example-"));
  const filePath = join(directory, "history.enc");

  try {
    const ledger = new EncryptedFileLedger({ filePath, secret: "example-secret" });

    let history: HistoryRecord[] = await ledger.load();
    console.log(`Fresh store holds ${history.length} entries.`);

    history = upsertObservation(history, {
      type: "observation",
      total_assets: 27_500,
      nisab_threshold: 24_624,
      above_nisab: true,
      hijri_year: 1446,
      hijri_month: 7,
      gregorian_date: "01.01.2025",
      timestamp: new Date().toISOString(),
    });
    history.push(createPaymentMarker("02.01.2025", new Date().toISOString()));
    await ledger.save(history);

    const reloaded = await ledger.load();
    console.log("Reloaded:", countEntries(reloaded));

    const intruder = new EncryptedFileLedger({ filePath, secret: "not-the-secret" });
    try {
      await intruder.load();
    } catch (error) {
      if (error instanceof DecryptionError) {
        console.log(`Wrong secret rejected: ${error.code}`);
      } else {
        throw error;
      }
    }
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
