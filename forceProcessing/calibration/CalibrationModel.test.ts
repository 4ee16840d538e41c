/**
 * CalibrationModel Tests
 */

import { CalibrationModel } from './CalibrationModel';
import { CalibrationError, CalibrationPoint } from './types';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

function point(forceN: number, rawCount: number): CalibrationPoint {
    return { forceN, rawCount };
}

// Two segments with different slopes: 0.01 N/count, then 0.02 N/count
const TABLE = [point(0, 1000), point(10, 2000), point(30, 3000)];

// Exactly linear: Force_N = 0.01 * raw - 10
const LINEAR_TABLE = [point(0, 1000), point(10, 2000), point(20, 3000)];

// ─────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────

describe('CalibrationModel', () => {
    describe('construction', () => {
        test('needs at least two points', () => {
            expect(() => new CalibrationModel([point(0, 1000)])).toThrow(CalibrationError);
        });

        test('rejects an unknown method', () => {
            const options = JSON.parse('{"method":"cubic"}');
            expect(() => new CalibrationModel(TABLE, options)).toThrow(CalibrationError);
        });

        test('sorts points by raw count', () => {
            const model = new CalibrationModel([point(30, 3000), point(0, 1000), point(10, 2000)]);
            expect(model.points.map(p => p.rawCount)).toEqual([1000, 2000, 3000]);
        });

        test('defaults to piecewise with extrapolation', () => {
            const model = new CalibrationModel(TABLE);
            expect(model.method).toBe('piecewise');
            expect(model.allowExtrapolation).toBe(true);
        });

        test('caches the least-squares line', () => {
            const { slope, intercept } = new CalibrationModel(LINEAR_TABLE).linearModel;
            expect(slope).toBeCloseTo(0.01, 12);
            expect(intercept).toBeCloseTo(-10, 9);
        });
    });

    describe('piecewise', () => {
        test('interpolates within the table at its own baseline', () => {
            const model = new CalibrationModel(TABLE);
            expect(model.convert(1500, 1000)).toBe(5);
            expect(model.convert(2500, 1000)).toBe(20);
        });

        test('realigns the raw axis to the session baseline', () => {
            const model = new CalibrationModel(TABLE);
            // Shifted axis [1200, 2200, 3200]
            expect(model.convert(1200, 1200)).toBe(0);
            expect(model.convert(1700, 1200)).toBe(5);
        });

        test('baseline shift equals shifting the query', () => {
            const model = new CalibrationModel(TABLE);
            const b1 = 1000;
            const b2 = 1300;

            for (const raw of [900, 1500, 2600, 3500]) {
                expect(model.convert(raw - (b2 - b1), b1)).toBeCloseTo(model.convert(raw, b2), 9);
            }
        });

        test('extrapolates from the boundary segments', () => {
            const model = new CalibrationModel(TABLE, { allowExtrapolation: true });
            expect(model.convert(500, 1000)).toBeCloseTo(-5, 9);
            expect(model.convert(4000, 1000)).toBeCloseTo(50, 9);
        });

        test('is continuous at the shifted boundary points', () => {
            const model = new CalibrationModel(TABLE, { allowExtrapolation: true });
            expect(model.convert(1000, 1000)).toBeCloseTo(0, 9);
            expect(model.convert(3000, 1000)).toBeCloseTo(30, 9);
        });

        test('clamps to boundary forces without extrapolation', () => {
            const model = new CalibrationModel(TABLE, { allowExtrapolation: false });
            expect(model.convert(500, 1000)).toBe(0);
            expect(model.convert(4000, 1000)).toBe(30);
            expect(model.convert(4000, 1500)).toBe(30);
        });

        test('equal raw values on the boundary return the boundary force', () => {
            const model = new CalibrationModel([point(5, 1000), point(7, 1000)]);
            expect(model.convert(900, 1000)).toBe(5);
            expect(model.convert(1100, 1000)).toBe(5);
        });
    });

    describe('linear_fit', () => {
        test('evaluates the fitted line and extrapolates', () => {
            const model = new CalibrationModel(LINEAR_TABLE, { method: 'linear_fit' });
            expect(model.convert(2500, 1000)).toBeCloseTo(15, 9);
            expect(model.convert(5000, 1000)).toBeCloseTo(40, 9);
        });

        test('refits against the shifted axis', () => {
            const model = new CalibrationModel(LINEAR_TABLE, { method: 'linear_fit' });
            expect(model.convert(2500, 2000)).toBeCloseTo(5, 9);
        });
    });

    test('convertWithMass divides by gravity', () => {
        const model = new CalibrationModel(TABLE);
        const { forceN, massKg } = model.convertWithMass(2000, 1000);
        expect(forceN).toBe(10);
        expect(massKg).toBeCloseTo(10 / 9.81, 12);
        expect(model.convertWithMass(2000, 1000, 10).massKg).toBe(1);
    });

    test('conversion carries no state between calls', () => {
        const model = new CalibrationModel(TABLE);
        const first = model.convert(1700, 1200);
        model.convert(9999, 50);
        expect(model.convert(1700, 1200)).toBe(first);
    });
});
