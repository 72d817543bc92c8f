/**
 * Unit tests for the sliding window rate limiter
 */
import { beforeEach, describe, expect, it } from 'vitest';
import { SlidingWindowRateLimiter } from '../utils/rateLimiter.js';

describe('SlidingWindowRateLimiter', () => {
  let limiter: SlidingWindowRateLimiter;

  beforeEach(() => {
    limiter = new SlidingWindowRateLimiter();
  });

  it('should admit up to the limit and reject the next request', () => {
    const now = 1_000_000;

    expect(limiter.allow(1, now, 3, 60)).toBe(true);
    expect(limiter.allow(1, now + 1, 3, 60)).toBe(true);
    expect(limiter.allow(1, now + 2, 3, 60)).toBe(true);
    expect(limiter.allow(1, now + 3, 3, 60)).toBe(false);
    expect(limiter.getCount(1)).toBe(3);
  });

  it('should not record rejected requests', () => {
    const now = 1_000_000;
    limiter.allow(1, now, 1, 60);

    expect(limiter.allow(1, now + 10, 1, 60)).toBe(false);
    expect(limiter.allow(1, now + 20, 1, 60)).toBe(false);
    expect(limiter.getCount(1)).toBe(1);
  });

  it('should admit again once the oldest request leaves the window', () => {
    const now = 1_000_000;
    limiter.allow(1, now, 2, 60);
    limiter.allow(1, now + 30_000, 2, 60);

    expect(limiter.allow(1, now + 59_999, 2, 60)).toBe(false);
    // A request exactly one window old no longer counts
    expect(limiter.allow(1, now + 60_000, 2, 60)).toBe(true);
    expect(limiter.getCount(1)).toBe(2);
  });

  it('should track chats independently', () => {
    const now = 1_000_000;

    expect(limiter.allow(1, now, 1, 60)).toBe(true);
    expect(limiter.allow(1, now, 1, 60)).toBe(false);
    expect(limiter.allow(2, now, 1, 60)).toBe(true);
  });

  it('should forget everything on reset', () => {
    limiter.allow(1, 1_000, 1, 60);
    limiter.reset();

    expect(limiter.getCount(1)).toBe(0);
    expect(limiter.allow(1, 1_001, 1, 60)).toBe(true);
  });
});
