import { interpolate, leastSquaresLine, LinearModel } from '../shared/statistics';
import {
    CalibrationError,
    CalibrationMethod,
    CalibrationOptions,
    CalibrationPoint,
    DEFAULT_CALIBRATION_OPTIONS,
    ForceAndMass,
    isCalibrationMethod,
    STANDARD_GRAVITY,
} from './types';

/**
 * Raw ADC count to force (N) conversion built from a calibration table.
 *
 * The table was recorded against one zero-load reading; every session measures its own
 * baseline on connect, and the raw axis is shifted so that the first table point lines up
 * with that baseline before each conversion. Instances are immutable.
 */
export class CalibrationModel {
    readonly method: CalibrationMethod;
    readonly allowExtrapolation: boolean;

    private readonly sortedPoints: readonly CalibrationPoint[];
    private readonly raw: readonly number[];
    private readonly force: readonly number[];
    private readonly fit: LinearModel;

    constructor(points: readonly CalibrationPoint[], options: Partial<CalibrationOptions> = {}) {
        const { method, allowExtrapolation } = { ...DEFAULT_CALIBRATION_OPTIONS, ...options };

        if (points.length < 2) {
            throw new CalibrationError('Need at least 2 calibration points.');
        }
        if (!isCalibrationMethod(method)) {
            throw new CalibrationError(`method must be 'piecewise' or 'linear_fit', got '${method}'`);
        }

        this.method = method;
        this.allowExtrapolation = allowExtrapolation;

        // Array.prototype.sort is stable: duplicate raw values keep table order
        this.sortedPoints = Object.freeze([...points].sort((a, b) => a.rawCount - b.rawCount));
        this.raw = Object.freeze(this.sortedPoints.map(p => p.rawCount));
        this.force = Object.freeze(this.sortedPoints.map(p => p.forceN));
        this.fit = Object.freeze(leastSquaresLine(this.raw, this.force));
    }

    /** Calibration points sorted by raw count. */
    get points(): CalibrationPoint[] {
        return [...this.sortedPoints];
    }

    /** Best-fit line `Force_N = slope * raw + intercept` over the unshifted table. */
    get linearModel(): LinearModel {
        return { ...this.fit };
    }

    /**
     * Convert one raw reading to Newtons, re-anchoring the table at `currentBaseline`.
     */
    convert(rawValue: number, currentBaseline: number): number {
        const x = rawValue;
        const offset = currentBaseline - this.raw[0];
        const shifted = this.raw.map(r => r + offset);

        if (this.method === 'linear_fit') {
            const { slope, intercept } = leastSquaresLine(shifted, this.force);
            return slope * x + intercept;
        }

        if (this.allowExtrapolation) {
            const last = shifted.length - 1;
            if (x <= shifted[0]) {
                return this.extrapolate(x, shifted, 0, 1);
            }
            if (x >= shifted[last]) {
                return this.extrapolate(x, shifted, last - 1, last);
            }
        }

        return interpolate(x, shifted, this.force);
    }

    convertWithMass(rawValue: number, currentBaseline: number, g: number = STANDARD_GRAVITY): ForceAndMass {
        const forceN = this.convert(rawValue, currentBaseline);
        return { forceN, massKg: forceN / g };
    }

    private extrapolate(x: number, shifted: readonly number[], i0: number, i1: number): number {
        const x0 = shifted[i0];
        const y0 = this.force[i0];
        const x1 = shifted[i1];
        const y1 = this.force[i1];

        if (x1 === x0) {
            return y0;
        }

        const slope = (y1 - y0) / (x1 - x0);
        return y0 + slope * (x - x0);
    }
}
