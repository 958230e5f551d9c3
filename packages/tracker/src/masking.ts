// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Display helper for diagnostics and listeners. Event payloads never carry
 * raw account numbers; anything that needs to mention one passes it
 * through maskAccount first.
 */

/** `****1234`; `****` alone for missing or short values. */
export function maskAccount(account: string | null | undefined): string {
  if (account === null || account === undefined || account.length < 4) {
    return '****';
  }
  return `****${account.slice(-4)}`;
}
