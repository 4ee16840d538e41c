import * as fs from 'fs';
import { CalibrationError, CalibrationPoint, CALIBRATION_COLUMNS } from './types';

const MIN_POINTS = 2;

/**
 * Read a calibration table (`Force_N,V3_mean`) from disk.
 * The returned array is frozen so sessions can share it safely.
 */
export function loadCalibrationTable(csvPath: string): readonly CalibrationPoint[] {
    let text: string;
    try {
        text = fs.readFileSync(csvPath, 'utf-8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new CalibrationError(`Cannot read calibration table ${csvPath}: ${reason}`);
    }
    return parseCalibrationCsv(text);
}

/**
 * Parse calibration table text. Column order is free and extra columns are ignored;
 * rows whose force or raw field is not a finite number are skipped.
 */
export function parseCalibrationCsv(text: string): readonly CalibrationPoint[] {
    const lines = text
        .replace(/^\uFEFF/, '')
        .split(/\r?\n/)
        .filter(line => line.trim().length > 0);

    if (lines.length === 0) {
        throw new CalibrationError('Calibration table has no header');
    }

    const header = splitRow(lines[0]);
    const forceIndex = header.indexOf(CALIBRATION_COLUMNS.FORCE);
    const rawIndex = header.indexOf(CALIBRATION_COLUMNS.RAW);
    if (forceIndex === -1 || rawIndex === -1) {
        throw new CalibrationError(
            `Calibration table must contain columns ${CALIBRATION_COLUMNS.FORCE},${CALIBRATION_COLUMNS.RAW}; got ${header.join(',')}`
        );
    }

    const points: CalibrationPoint[] = [];
    for (const line of lines.slice(1)) {
        const cells = splitRow(line);
        const forceN = parseNumber(cells[forceIndex]);
        const rawCount = parseNumber(cells[rawIndex]);
        if (forceN === null || rawCount === null) continue;
        points.push(Object.freeze({ forceN, rawCount }));
    }

    if (points.length < MIN_POINTS) {
        throw new CalibrationError(`Need at least ${MIN_POINTS} calibration points, found ${points.length}`);
    }

    return Object.freeze(points);
}

function splitRow(line: string): string[] {
    return line.split(',').map(cell => cell.trim().replace(/^"(.*)"$/, '$1'));
}

function parseNumber(cell: string | undefined): number | null {
    if (cell === undefined || cell === '') return null;
    const value = Number(cell);
    return Number.isFinite(value) ? value : null;
}
