export { despike, DEFAULT_DESPIKE_OPTIONS, HAMPEL_SCALE } from './DespikeFilter';
export type { DespikeOptions } from './DespikeFilter';
