import { median, medianAbsoluteDeviation } from '../shared/statistics';

/** Scale factor turning a MAD into a standard-deviation estimate for normal data. */
export const HAMPEL_SCALE = 1.4826;

export interface DespikeOptions {
    /** Centered window width in samples; clipped at the series edges. */
    windowSize: number;
    /** Replacement threshold in robust standard deviations. */
    nSigmas: number;
}

export const DEFAULT_DESPIKE_OPTIONS: DespikeOptions = {
    windowSize: 11,
    nSigmas: 5.0,
};

/**
 * Hampel filter: replace samples further than `nSigmas` robust deviations from their
 * local median with that median. A flat window (MAD of zero) never replaces.
 * Returns a new array; the input is left untouched.
 */
export function despike(values: readonly number[], options: Partial<DespikeOptions> = {}): number[] {
    const { windowSize, nSigmas } = { ...DEFAULT_DESPIKE_OPTIONS, ...options };
    if (!Number.isInteger(windowSize) || windowSize < 1) {
        throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
    }

    const n = values.length;
    const halfWindow = Math.floor(windowSize / 2);
    const filtered = [...values];

    for (let i = 0; i < n; i++) {
        const window = values.slice(Math.max(0, i - halfWindow), Math.min(n, i + halfWindow + 1));
        const center = median(window);
        const mad = medianAbsoluteDeviation(window, center);
        if (mad === 0) continue;

        const threshold = nSigmas * HAMPEL_SCALE * mad;
        if (Math.abs(values[i] - center) > threshold) {
            filtered[i] = center;
        }
    }

    return filtered;
}
