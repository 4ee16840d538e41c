/**
 * Numeric helpers shared by the calibration and filtering modules.
 * All functions are pure and never mutate their inputs.
 */

/** Straight line `y = slope * x + intercept`. */
export interface LinearModel {
    slope: number;
    intercept: number;
}

/**
 * Median of a series. Even-length series average the two middle values.
 * @throws RangeError on an empty series
 */
export function median(values: readonly number[]): number {
    if (values.length === 0) {
        throw new RangeError('median of an empty series');
    }

    const sorted = [...values].sort((a, b) => a - b);
    const mid = sorted.length >> 1;
    return sorted.length % 2 === 1
        ? sorted[mid]
        : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Median absolute deviation around a given center. */
export function medianAbsoluteDeviation(values: readonly number[], center: number): number {
    return median(values.map(v => Math.abs(v - center)));
}

/**
 * Least-squares fit of a first-degree polynomial.
 * A degenerate x axis (all values equal) yields a flat line through the mean of y.
 */
export function leastSquaresLine(xs: readonly number[], ys: readonly number[]): LinearModel {
    const n = Math.min(xs.length, ys.length);
    if (n === 0) {
        throw new RangeError('least squares fit needs at least one point');
    }

    let sumX = 0;
    let sumY = 0;
    for (let i = 0; i < n; i++) {
        sumX += xs[i];
        sumY += ys[i];
    }
    const meanX = sumX / n;
    const meanY = sumY / n;

    let sxx = 0;
    let sxy = 0;
    for (let i = 0; i < n; i++) {
        const dx = xs[i] - meanX;
        sxx += dx * dx;
        sxy += dx * (ys[i] - meanY);
    }

    if (sxx === 0) {
        return { slope: 0, intercept: meanY };
    }

    const slope = sxy / sxx;
    return { slope, intercept: meanY - slope * meanX };
}

/**
 * One-dimensional linear interpolation over a non-decreasing x axis.
 * Queries outside the axis clamp to the first/last y value.
 */
export function interpolate(x: number, xp: readonly number[], fp: readonly number[]): number {
    const n = xp.length;
    if (n === 0 || fp.length !== n) {
        throw new RangeError('interpolation axes must be non-empty and of equal length');
    }

    if (x <= xp[0]) return fp[0];
    if (x >= xp[n - 1]) return fp[n - 1];

    // Largest j with xp[j] <= x; then xp[j] <= x < xp[j + 1]
    let lo = 0;
    let hi = n - 1;
    while (hi - lo > 1) {
        const mid = (lo + hi) >> 1;
        if (xp[mid] <= x) {
            lo = mid;
        } else {
            hi = mid;
        }
    }

    const x0 = xp[lo];
    const x1 = xp[hi];
    const t = (x - x0) / (x1 - x0);
    return fp[lo] + t * (fp[hi] - fp[lo]);
}
