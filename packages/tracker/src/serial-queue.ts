// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Runs async tasks one at a time, in submission order.
 *
 * The tracker wraps every load -> mutate -> save cycle in one task so two
 * calls on the same instance cannot interleave their reads and writes. This
 * guards a single process only; separate processes sharing a ledger file
 * still race.
 */
export class SerialQueue {
  #tail: Promise<void> = Promise.resolve();
  #pending = 0;

  /** Schedule `task` after every previously submitted task has settled. */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.#tail.then(task);
    this.#pending += 1;
    // The caller observes failures through `result`; the tail only orders.
    this.#tail = result.then(
      () => {
        this.#pending -= 1;
      },
      () => {
        this.#pending -= 1;
      },
    );
    return result;
  }

  /** Tasks submitted and not yet settled. */
  get pending(): number {
    return this.#pending;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.#tail;
  }
}
