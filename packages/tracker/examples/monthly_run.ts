// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * monthly_run.ts
 *
 * Twelve monthly cycles against an in-memory ledger, with a stub statement
 * source and a resolver that has no URLs (so it always uses the fallback).
 * The twelfth cycle reports zakat as due; recording the payment resets the
 * count.
 *
 * Run: npx tsx packages/tracker/examples/monthly_run.ts
 */

import {
  BalanceNormalizer,
  EVENT_ANALYSIS_COMPLETED,
  EVENT_NISAB_RESOLVED,
  MemoryLedger,
  NisabMonitor,
  NisabResolver,
  NisabTracker,
  TrackerEventEmitter,
} from '../src/index.js';
import type { BalanceReading, StatementSource } from '../src/index.js';

function monthEnd(month: number): string {
  const last = new Date(Date.UTC(2025, month + 1, 0));
  const dd = String(last.getUTCDate()).padStart(2, '0');
  const mm = String(last.getUTCMonth() + 1).padStart(2, '0');
  return `${dd}.${mm}.${last.getUTCFullYear()}`;
}

async function main(): Promise<void> {
  const events = new TrackerEventEmitter();
  events.on(EVENT_NISAB_RESOLVED, ({ source, detail }) => {
    console.log(`  nisab (${source}): ${detail}`);
  });
  events.on(EVENT_ANALYSIS_COMPLETED, (payload) => {
    const due = payload.zakatDue ? `due ${payload.zakatAmount.toFixed(2)}` : 'not due';
    console.log(`  ${payload.gregorianDate}: ${payload.consecutiveMonths} months, ${due}`);
  });

  let month = 0;
  const statements: StatementSource = {
    read: async ({ config }): Promise<BalanceReading[]> =>
      config.accounts.map((account) => ({
        account_id: account.accountId,
        account_currency: account.currency,
        raw_balance: account.currency === 'EUR' ? 4_000 : 22_000 + month * 100,
        statement_period_end_date: monthEnd(month),
        found: true,
      })),
  };

  const ledger = new MemoryLedger();
  const tracker = new NisabTracker({ ledger, events });
  const monitor = new NisabMonitor({
    normalizer: new BalanceNormalizer({
      config: {
        sources: [
          {
            name: 'personal',
            accounts: [
              { accountId: '1610000011112222', currency: 'BAM' },
              { accountId: '1610000033334444', currency: 'EUR' },
            ],
          },
        ],
      },
      sources: { personal: statements },
      events,
    }),
    resolver: new NisabResolver({ config: { urls: [] }, events }),
    tracker,
  });

  for (month = 0; month < 12; month += 1) {
    console.log(`Cycle ${month + 1}`);
    await monitor.run();
  }

  const marker = await tracker.recordPayment();
  console.log(`Paid on ${marker.gregorian_date}; streak is now ${await tracker.getCurrentStreak()}.`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
