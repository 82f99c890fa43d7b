// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';

export interface CircuitBreakerOptions {
  threshold?: number;
  resetTimeout?: number;
}

/**
 * Per-account breaker: after `threshold` consecutive failures, calls for that
 * account are refused until `resetTimeout` ms have passed since the last one.
 */
export class CircuitBreaker {
  private failures: Map<string, number> = new Map();
  private lastFailureTime: Map<string, number> = new Map();
  private threshold: number;
  private resetTimeout: number;

  constructor(
    private logger: Logger,
    options: CircuitBreakerOptions = {}
  ) {
    this.threshold = options.threshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000;
  }

  canExecute(account: string): boolean {
    const failures = this.failures.get(account) ?? 0;
    const lastFailure = this.lastFailureTime.get(account) ?? 0;

    if (failures >= this.threshold) {
      const timeSinceLastFailure = Date.now() - lastFailure;

      if (timeSinceLastFailure < this.resetTimeout) {
        this.logger.warn('Circuit breaker open', { account, failures });
        return false;
      }

      this.failures.set(account, 0);
    }

    return true;
  }

  recordSuccess(account: string): void {
    this.failures.set(account, 0);
  }

  recordFailure(account: string): void {
    const current = this.failures.get(account) ?? 0;
    this.failures.set(account, current + 1);
    this.lastFailureTime.set(account, Date.now());
  }
}
