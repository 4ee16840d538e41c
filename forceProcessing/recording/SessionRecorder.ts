import { despike, DespikeOptions } from '../filtering';
import { CSVExporter } from './CSVExporter';
import { ArtifactRow, Sample, SessionMeta } from './types';
import { bleLogger } from '../../ble-bridge';

export interface SessionRecorderOptions {
    /** Root directory for artifacts (`~` is expanded). */
    readingsDir: string;
    despike?: Partial<DespikeOptions>;
    /** Clock used for the artifact date and timestamp. */
    now?: () => Date;
}

/**
 * Turns the index-aligned raw/force buffers of one capture into a CSV artifact.
 * Shared by all sessions; holds no per-capture state.
 */
export class SessionRecorder {
    private readonly readingsDir: string;
    private readonly despikeOptions: Partial<DespikeOptions>;
    private readonly now: () => Date;

    constructor(options: SessionRecorderOptions) {
        this.readingsDir = options.readingsDir;
        this.despikeOptions = options.despike ?? {};
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Persist one capture.
     * @returns the artifact path, or null when there was nothing to save
     * @throws ArtifactWriteError when the file cannot be written
     */
    async save(
        rawSamples: readonly Sample[],
        forceSamples: readonly Sample[],
        meta: SessionMeta
    ): Promise<string | null> {
        const rows = SessionRecorder.buildRows(rawSamples, forceSamples, this.despikeOptions);

        if (rows.length === 0) {
            bleLogger.info('No data to save', undefined, 'RECORDER');
            return null;
        }

        const filePath = await CSVExporter.write(this.readingsDir, rows, meta, this.now());
        bleLogger.info(`Saved ${rows.length} samples to ${filePath}`, undefined, 'RECORDER');
        return filePath;
    }

    /** Pair buffers by index (up to the shorter one) and attach the despiked raw series. */
    static buildRows(
        rawSamples: readonly Sample[],
        forceSamples: readonly Sample[],
        despikeOptions: Partial<DespikeOptions> = {}
    ): ArtifactRow[] {
        const count = Math.min(rawSamples.length, forceSamples.length);
        if (count === 0) return [];

        const rawValues = rawSamples.slice(0, count).map(s => s.value);
        const filtered = despike(rawValues, despikeOptions);

        const rows: ArtifactRow[] = [];
        for (let i = 0; i < count; i++) {
            rows.push({
                hostTime: rawSamples[i].hostTime,
                raw: rawValues[i],
                force: forceSamples[i].value,
                filteredRaw: filtered[i],
            });
        }
        return rows;
    }
}
