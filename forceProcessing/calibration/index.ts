export { CalibrationModel } from './CalibrationModel';
export { loadCalibrationTable, parseCalibrationCsv } from './CalibrationTable';
export {
    CalibrationError,
    CALIBRATION_COLUMNS,
    CALIBRATION_METHODS,
    DEFAULT_CALIBRATION_OPTIONS,
    STANDARD_GRAVITY,
    isCalibrationMethod,
} from './types';
export type { CalibrationMethod, CalibrationOptions, CalibrationPoint, ForceAndMass } from './types';
