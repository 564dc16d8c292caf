/**
 * KeyedLock: FIFO async mutual exclusion per string key.
 *
 * Callers holding different keys never wait on each other. A caller that
 * cannot get its turn within the timeout gives up with
 * ConcurrencyConflictError and does not block the queue behind it.
 */

import { ConcurrencyConflictError } from './errors.js';

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly defaultTimeoutMs: number = 2000) {}

  /** Number of keys with a holder or waiters. */
  get activeKeys(): number {
    return this.tails.size;
  }

  async withLock<T>(key: string, fn: () => Promise<T>, timeoutMs = this.defaultTimeoutMs): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    // Forget the key once nobody is queued behind this caller.
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    try {
      await waitForTurn(previous, key, timeoutMs);
      return await fn();
    } finally {
      release();
    }
  }
}

async function waitForTurn(previous: Promise<void>, key: string, timeoutMs: number): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ConcurrencyConflictError(key, timeoutMs)), timeoutMs);
  });

  try {
    await Promise.race([previous, expired]);
  } finally {
    clearTimeout(timer);
  }
}
