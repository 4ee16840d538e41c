/**
 * Despike (Hampel) filter tests
 */

import { despike } from './DespikeFilter';

describe('despike', () => {
    test('leaves a series without outliers unchanged', () => {
        const ramp = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
        expect(despike(ramp)).toEqual(ramp);
    });

    test('never replaces the center of a zero-MAD window', () => {
        // MAD is 0 in every window, so even the 100 survives
        const flatWithSpike = [5, 5, 5, 5, 5, 100, 5, 5, 5, 5, 5];
        expect(despike(flatWithSpike)).toEqual(flatWithSpike);
    });

    test('replaces a spike with the local median', () => {
        const noisy = [10, 11, 10, 11, 10, 500, 11, 10, 11, 10, 11];
        // Full window at index 5: median 11, MAD 1, threshold 5 * 1.4826
        expect(despike(noisy)).toEqual([10, 11, 10, 11, 10, 11, 11, 10, 11, 10, 11]);
    });

    test('does not mutate its input', () => {
        const noisy = [10, 11, 10, 11, 10, 500, 11, 10, 11, 10, 11];
        despike(noisy);
        expect(noisy[5]).toBe(500);
    });

    test('a higher threshold keeps the spike', () => {
        const noisy = [10, 11, 10, 11, 10, 500, 11, 10, 11, 10, 11];
        expect(despike(noisy, { nSigmas: 1000 })[5]).toBe(500);
    });

    test('window of one is the identity', () => {
        expect(despike([1, 900, 2], { windowSize: 1 })).toEqual([1, 900, 2]);
    });

    test('empty series yields an empty array', () => {
        expect(despike([])).toEqual([]);
    });

    test('rejects invalid window sizes', () => {
        expect(() => despike([1, 2, 3], { windowSize: 0 })).toThrow(RangeError);
        expect(() => despike([1, 2, 3], { windowSize: 2.5 })).toThrow(RangeError);
    });
});
