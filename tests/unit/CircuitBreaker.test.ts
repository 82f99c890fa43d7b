// tests/unit/CircuitBreaker.test.ts

import { describe, it, expect, afterEach, vi } from 'vitest';
import { CircuitBreaker } from '../../src/core/http/CircuitBreaker';
import { createTestLogger } from '../helpers/InMemorySession';

describe('CircuitBreaker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should open after the failure threshold', () => {
    const breaker = new CircuitBreaker(createTestLogger(), { threshold: 3 });

    breaker.recordFailure('old_account');
    breaker.recordFailure('old_account');
    expect(breaker.canExecute('old_account')).toBe(true);

    breaker.recordFailure('old_account');
    expect(breaker.canExecute('old_account')).toBe(false);
  });

  it('should track accounts independently', () => {
    const breaker = new CircuitBreaker(createTestLogger(), { threshold: 1 });

    breaker.recordFailure('old_account');

    expect(breaker.canExecute('old_account')).toBe(false);
    expect(breaker.canExecute('new_account')).toBe(true);
  });

  it('should reset on success', () => {
    const breaker = new CircuitBreaker(createTestLogger(), { threshold: 2 });

    breaker.recordFailure('old_account');
    breaker.recordSuccess('old_account');
    breaker.recordFailure('old_account');

    expect(breaker.canExecute('old_account')).toBe(true);
  });

  it('should close again after the reset timeout', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const breaker = new CircuitBreaker(createTestLogger(), { threshold: 1, resetTimeout: 1000 });

    breaker.recordFailure('old_account');
    expect(breaker.canExecute('old_account')).toBe(false);

    vi.setSystemTime(new Date('2024-01-01T00:00:01.001Z'));
    expect(breaker.canExecute('old_account')).toBe(true);
  });
});
