import type { StoreIOError } from 'memory-core';

export interface IoHealthObserver {
  recordSuccess(): void;
  recordFailure(error: StoreIOError): void;
}

export interface HealthSnapshot {
  healthy: boolean;
  consecutiveIoErrors: number;
  lastIoError?: string;
  lastIoErrorAt?: string;
}

/**
 * Tracks consecutive store I/O failures. After `threshold` failures in a row
 * the daemon reports itself degraded until the next successful operation.
 */
export class HealthTracker implements IoHealthObserver {
  private consecutiveFailures = 0;
  private lastError: { message: string; at: string } | null = null;

  constructor(private readonly threshold: number) {}

  recordSuccess(): void {
    this.consecutiveFailures = 0;
  }

  recordFailure(error: StoreIOError): void {
    this.consecutiveFailures++;
    this.lastError = { message: error.message, at: new Date().toISOString() };
  }

  get healthy(): boolean {
    return this.consecutiveFailures < this.threshold;
  }

  snapshot(): HealthSnapshot {
    return {
      healthy: this.healthy,
      consecutiveIoErrors: this.consecutiveFailures,
      ...(this.lastError && { lastIoError: this.lastError.message, lastIoErrorAt: this.lastError.at }),
    };
  }
}
