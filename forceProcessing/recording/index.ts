export { SessionRecorder } from './SessionRecorder';
export type { SessionRecorderOptions } from './SessionRecorder';
export { CSVExporter } from './CSVExporter';
export {
    ARTIFACT_COLUMNS,
    ARTIFACT_SUFFIX,
    ArtifactWriteError,
    DEFAULT_SESSION_META,
} from './types';
export type { ArtifactRow, Sample, SessionMeta } from './types';
