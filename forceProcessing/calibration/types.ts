/**
 * Types for the calibration module.
 */

/** One row of the calibration table: a known load and the mean raw reading it produced. */
export interface CalibrationPoint {
    readonly forceN: number;
    readonly rawCount: number;
}

export type CalibrationMethod = 'piecewise' | 'linear_fit';

export const CALIBRATION_METHODS: readonly CalibrationMethod[] = ['piecewise', 'linear_fit'];

export interface CalibrationOptions {
    /** Conversion method (default: piecewise). */
    method: CalibrationMethod;
    /**
     * Piecewise only: extrapolate linearly beyond the table instead of clamping.
     * A fitted line always extrapolates.
     */
    allowExtrapolation: boolean;
}

export const DEFAULT_CALIBRATION_OPTIONS: CalibrationOptions = {
    method: 'piecewise',
    allowExtrapolation: true,
};

/** Force plus the equivalent hanging mass. */
export interface ForceAndMass {
    forceN: number;
    massKg: number;
}

/** Column names of the calibration table file. */
export const CALIBRATION_COLUMNS = {
    FORCE: 'Force_N',
    RAW: 'V3_mean',
} as const;

export const STANDARD_GRAVITY = 9.81;

export class CalibrationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CalibrationError';
    }
}

export function isCalibrationMethod(value: string): value is CalibrationMethod {
    return CALIBRATION_METHODS.some(method => method === value);
}
