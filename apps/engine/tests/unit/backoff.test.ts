import { BackoffPolicy, calculateBackOff } from '../../src/utils/backoff';

const noJitter = () => 0.5;

describe('calculateBackOff', () => {
    it('returns ~1000ms for attempt 1 (default)', () => {
        const delay = calculateBackOff(1);
        expect(delay).toBeGreaterThanOrEqual(900);
        expect(delay).toBeLessThanOrEqual(1100);
    });

    it('grows by a factor of four per attempt', () => {
        expect([1, 2, 3].map((a) => calculateBackOff(a, undefined, noJitter))).toEqual([1000, 4000, 16000]);
    });

    it('caps at maxIntervalMs', () => {
        expect(calculateBackOff(4, undefined, noJitter)).toBe(60000);
        expect(calculateBackOff(10, undefined, noJitter)).toBe(60000);
    });

    it('spreads by the jitter ratio in both directions', () => {
        expect(calculateBackOff(1, undefined, () => 0)).toBe(900);
        expect(calculateBackOff(1, undefined, () => 1)).toBe(1100);
    });

    it('takes a custom policy', () => {
        const policy: BackoffPolicy = { initialIntervalMs: 200, multiplier: 2, maxIntervalMs: 1000, jitterRatio: 0 };
        expect([1, 2, 3, 4].map((a) => calculateBackOff(a, policy))).toEqual([200, 400, 800, 1000]);
    });

    it('treats attempt 0 like attempt 1', () => {
        expect(calculateBackOff(0, undefined, noJitter)).toBe(1000);
    });
});
