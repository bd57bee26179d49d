import { describe, it, expect } from '@jest/globals';
import { BackoffPolicy, parseRetryAfter } from './BackoffPolicy';

describe('BackoffPolicy', () => {
    const noJitter = new BackoffPolicy({ random: () => 0 });

    it('should double the delay per attempt', () => {
        expect(noJitter.delay(1, 1)).toBe(1);
        expect(noJitter.delay(2, 1)).toBe(2);
        expect(noJitter.delay(3, 1)).toBe(4);
        expect(noJitter.delay(4, 2.5)).toBe(20);
    });

    it('should cap the delay at 120 seconds', () => {
        expect(noJitter.baseDelay(10, 60)).toBe(120);
        expect(noJitter.delay(10, 60)).toBe(120);
    });

    it('should add at most ten percent jitter', () => {
        const maxJitter = new BackoffPolicy({ random: () => 0.999 });
        const delay = maxJitter.delay(2, 1);
        expect(delay).toBeGreaterThan(2);
        expect(delay).toBeLessThanOrEqual(2.2);

        const halfJitter = new BackoffPolicy({ random: () => 0.5 });
        expect(halfJitter.delay(1, 10)).toBeCloseTo(10.5);
    });

    it('should never exceed the cap once jitter is added', () => {
        const maxJitter = new BackoffPolicy({ random: () => 0.999 });
        expect(maxJitter.delay(8, 60)).toBe(120);
    });

    it('should honour a larger server-suggested delay', () => {
        expect(noJitter.delay(1, 1, 30)).toBe(30);
    });

    it('should ignore a smaller server-suggested delay', () => {
        expect(noJitter.delay(3, 2, 1)).toBe(8);
    });

    it('should cap a server-suggested delay', () => {
        expect(noJitter.delay(1, 1, 3600)).toBe(120);
    });

    it('should accept a custom ceiling', () => {
        const policy = new BackoffPolicy({ random: () => 0, maxDelaySeconds: 10 });
        expect(policy.delay(5, 1)).toBe(10);
    });
});

describe('parseRetryAfter', () => {
    const now = Date.parse('2024-05-01T10:00:00Z');

    it('should parse delta seconds', () => {
        expect(parseRetryAfter('120', now)).toBe(120);
        expect(parseRetryAfter(' 1.5 ', now)).toBe(1.5);
    });

    it('should parse an HTTP date relative to now', () => {
        expect(parseRetryAfter('Wed, 01 May 2024 10:00:30 GMT', now)).toBe(30);
    });

    it('should clamp dates in the past to zero', () => {
        expect(parseRetryAfter('Wed, 01 May 2024 09:00:00 GMT', now)).toBe(0);
    });

    it('should ignore missing or unparseable values', () => {
        expect(parseRetryAfter(null, now)).toBeUndefined();
        expect(parseRetryAfter(undefined, now)).toBeUndefined();
        expect(parseRetryAfter('', now)).toBeUndefined();
        expect(parseRetryAfter('soon', now)).toBeUndefined();
    });
});
