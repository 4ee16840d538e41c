/**
 * Types for the recording module.
 */

/** One timestamped value. `hostTime` is seconds since the Unix epoch. */
export interface Sample {
    hostTime: number;
    value: number;
}

/** Labels attached to one capture. */
export interface SessionMeta {
    athleteId: string;
    distanceCm: number;
    weightKg: number;
}

export const DEFAULT_SESSION_META: Readonly<SessionMeta> = Object.freeze({
    athleteId: '',
    distanceCm: 0,
    weightKg: 0,
});

/** One persisted row. */
export interface ArtifactRow {
    hostTime: number;
    raw: number;
    force: number;
    filteredRaw: number;
}

export const ARTIFACT_COLUMNS = ['Host_Time_s', 'Raw_V3', 'Force_N', 'Raw_V3_Filtered'] as const;

export const ARTIFACT_SUFFIX = '_grip_data.csv';

export class ArtifactWriteError extends Error {
    constructor(
        public readonly filePath: string,
        public readonly cause: unknown
    ) {
        super(`Failed to write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'ArtifactWriteError';
    }
}
