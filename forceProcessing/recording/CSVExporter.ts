import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ARTIFACT_COLUMNS, ARTIFACT_SUFFIX, ArtifactRow, ArtifactWriteError, SessionMeta } from './types';

/** Highest `_<n>` suffix tried before giving up on a free file name. */
const MAX_NAME_SUFFIX = 99;

/**
 * Writes session artifacts as flat CSV files.
 */
export class CSVExporter {

    /**
     * Write rows under `<readingsDir>/<date>[_<athleteId>]/` and return the file path.
     * An existing file is never overwritten; a numeric suffix is appended instead.
     */
    static async write(
        readingsDir: string,
        rows: readonly ArtifactRow[],
        meta: SessionMeta,
        now: Date
    ): Promise<string> {
        const dir = path.join(CSVExporter.expandHomePath(readingsDir), CSVExporter.generateDirectoryName(meta, now));
        const content = CSVExporter.generateCSVContent(rows);
        const baseName = CSVExporter.generateBaseName(meta, now);

        try {
            await fs.promises.mkdir(dir, { recursive: true });
        } catch (err) {
            throw new ArtifactWriteError(dir, err);
        }

        for (let attempt = 0; attempt <= MAX_NAME_SUFFIX; attempt++) {
            const fileName = attempt === 0
                ? `${baseName}${ARTIFACT_SUFFIX}`
                : `${baseName}_${attempt}${ARTIFACT_SUFFIX}`;
            const filePath = path.join(dir, fileName);

            try {
                await fs.promises.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
                return filePath;
            } catch (err) {
                if (isAlreadyExists(err)) continue;
                throw new ArtifactWriteError(filePath, err);
            }
        }

        throw new ArtifactWriteError(
            path.join(dir, `${baseName}${ARTIFACT_SUFFIX}`),
            new Error(`no free file name after ${MAX_NAME_SUFFIX} attempts`)
        );
    }

    /**
     * Generate CSV content string.
     */
    static generateCSVContent(rows: readonly ArtifactRow[]): string {
        const lines: string[] = [ARTIFACT_COLUMNS.join(',')];

        for (const row of rows) {
            lines.push(`${row.hostTime.toFixed(6)},${row.raw},${row.force},${row.filteredRaw}`);
        }

        return lines.join('\n') + '\n';
    }

    /** `<YYYY-MM-DD>` or `<YYYY-MM-DD>_<athleteId>`, local calendar date. */
    static generateDirectoryName(meta: SessionMeta, now: Date): string {
        const date = [
            now.getFullYear(),
            String(now.getMonth() + 1).padStart(2, '0'),
            String(now.getDate()).padStart(2, '0'),
        ].join('-');
        const athleteId = meta.athleteId.trim();
        return athleteId ? `${date}_${athleteId}` : date;
    }

    /** `<unixSeconds>_<cm>cm_<kg>kg`, without the artifact suffix. */
    static generateBaseName(meta: SessionMeta, now: Date): string {
        const timestampS = Math.floor(now.getTime() / 1000);
        return `${timestampS}_${Math.trunc(meta.distanceCm)}cm_${Math.trunc(meta.weightKg)}kg`;
    }

    /**
     * Expand ~ to home directory (Node.js doesn't do this automatically).
     */
    static expandHomePath(filePath: string): string {
        if (filePath === '~') {
            return os.homedir();
        }
        if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
            return path.join(os.homedir(), filePath.slice(2));
        }
        return filePath;
    }
}

// fs errors can come from another realm (Jest sandboxes), so match on the code alone
function isAlreadyExists(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'EEXIST';
}
