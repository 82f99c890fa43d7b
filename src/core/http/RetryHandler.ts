// src/core/http/RetryHandler.ts

import { isAxiosError, type AxiosResponse } from 'axios';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { CircuitBreaker } from './CircuitBreaker';

type ResponseHeaders = AxiosResponse['headers'];

export interface RetryWait {
  delay: number; // milliseconds
  source: 'retry-after' | 'ratelimit-reset' | 'backoff';
}

/**
 * Retries responses whose status is configured as retryable.
 *
 * The wait comes from the remote whenever it states one: `Retry-After` first,
 * then Reddit's `x-ratelimit-reset` once `x-ratelimit-remaining` is used up.
 * Without either, exponential backoff with jitter capped at `maxDelay`.
 */
export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private circuitBreaker?: CircuitBreaker
  ) {}

  async execute<T>(task: () => Promise<T>, account: string): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await task();
      } catch (error: unknown) {
        const response = isAxiosError(error) ? error.response : undefined;

        if (
          !response ||
          !this.config.retryableStatusCodes.includes(response.status) ||
          attempt >= this.config.maxRetries
        ) {
          throw error;
        }

        // Another request for this account may have opened the circuit meanwhile
        if (this.circuitBreaker && !this.circuitBreaker.canExecute(account)) {
          this.logger.warn('Circuit breaker open, skipping retry', { account, attempt });
          throw error;
        }

        const wait = this.waitFor(response.headers, attempt);
        this.logger.warn('Retrying request', {
          account,
          attempt: attempt + 1,
          status: response.status,
          delay: wait.delay,
          source: wait.source,
        });

        await new Promise((resolve) => setTimeout(resolve, wait.delay));
      }
    }
  }

  private waitFor(headers: ResponseHeaders, attempt: number): RetryWait {
    const retryAfter = this.header(headers, 'retry-after');
    if (retryAfter !== undefined) {
      const seconds = Number(retryAfter);
      const delay = Number.isNaN(seconds)
        ? Math.max(0, new Date(retryAfter).getTime() - Date.now())
        : seconds * 1000;
      if (!Number.isNaN(delay)) {
        return { delay, source: 'retry-after' };
      }
    }

    // Reddit reports the remaining budget as a float ("0.0") and the reset in whole seconds
    const remaining = Number(this.header(headers, 'x-ratelimit-remaining'));
    const reset = Number(this.header(headers, 'x-ratelimit-reset'));
    if (remaining < 1 && Number.isFinite(reset) && reset >= 0) {
      return { delay: reset * 1000, source: 'ratelimit-reset' };
    }

    return {
      delay: Math.min(
        this.config.baseDelay * Math.pow(2, attempt) + Math.random() * 1000,
        this.config.maxDelay
      ),
      source: 'backoff',
    };
  }

  private header(headers: ResponseHeaders, name: string): string | undefined {
    const value: unknown = headers[name];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }
}
