/**
 * Application configuration from environment variables (.env is loaded by app/main.ts).
 * Invalid values fall back to the default with a warning.
 */

import { bleLogger, FORCE_BLE_CONFIG, LogLevelName } from '../ble-bridge';
import { CalibrationMethod, isCalibrationMethod } from '../forceProcessing/calibration';
import { DEFAULT_SESSION_TIMING } from '../ble-management';

export interface AppConfig {
  readingsDir: string;
  calibrationCsv: string;
  calibrationMethod: CalibrationMethod;
  allowExtrapolation: boolean;
  deviceFilter: string;
  scanTimeoutMs: number;
  connectTimeoutMs: number;
  promptTimeoutMs: number;
  logLevel: LogLevelName;
  /** null disables the file transport */
  logFile: string | null;
  useMockTransport: boolean;
}

export const DEFAULT_APP_CONFIG: Readonly<AppConfig> = Object.freeze({
  readingsDir: 'readings',
  calibrationCsv: 'calibrationWeight/V3_calibration.csv',
  calibrationMethod: 'piecewise',
  allowExtrapolation: true,
  deviceFilter: FORCE_BLE_CONFIG.DEVICE_NAME_FILTER,
  scanTimeoutMs: FORCE_BLE_CONFIG.SCAN_TIMEOUT,
  connectTimeoutMs: DEFAULT_SESSION_TIMING.connectTimeoutMs,
  promptTimeoutMs: DEFAULT_SESSION_TIMING.promptTimeoutMs,
  logLevel: 'info',
  logFile: 'logs/force-bridge.log',
  useMockTransport: false,
});

const LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug'];
const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

type Env = Record<string, string | undefined>;

export function loadAppConfig(env: Env = process.env): AppConfig {
  const defaults = DEFAULT_APP_CONFIG;

  return {
    readingsDir: readString(env, 'FORCE_READINGS_DIR', defaults.readingsDir),
    calibrationCsv: readString(env, 'FORCE_CALIBRATION_CSV', defaults.calibrationCsv),
    calibrationMethod: readChoice(env, 'FORCE_CALIBRATION_METHOD', isCalibrationMethod, defaults.calibrationMethod),
    allowExtrapolation: readBoolean(env, 'FORCE_ALLOW_EXTRAPOLATION', defaults.allowExtrapolation),
    // An empty filter is meaningful: it lists every device
    deviceFilter: env.FORCE_DEVICE_FILTER ?? defaults.deviceFilter,
    scanTimeoutMs: readPositiveInt(env, 'FORCE_SCAN_TIMEOUT_MS', defaults.scanTimeoutMs),
    connectTimeoutMs: readPositiveInt(env, 'FORCE_CONNECT_TIMEOUT_MS', defaults.connectTimeoutMs),
    promptTimeoutMs: readPositiveInt(env, 'FORCE_PROMPT_TIMEOUT_MS', defaults.promptTimeoutMs),
    logLevel: readChoice(env, 'FORCE_LOG_LEVEL', isLogLevel, defaults.logLevel),
    logFile: readLogFile(env, defaults.logFile),
    useMockTransport: readBoolean(env, 'FORCE_MOCK_TRANSPORT', defaults.useMockTransport),
  };
}

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some(level => level === value);
}

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const value = env[key]?.trim();
  if (!value) return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    warnInvalid(key, value, fallback);
    return fallback;
  }
  return parsed;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return fallback;

  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  warnInvalid(key, value, fallback);
  return fallback;
}

function readChoice<T extends string>(
  env: Env,
  key: string,
  isValid: (value: string) => value is T,
  fallback: T
): T {
  const value = env[key]?.trim();
  if (!value) return fallback;

  if (isValid(value)) return value;
  warnInvalid(key, value, fallback);
  return fallback;
}

// "off" disables file logging
function readLogFile(env: Env, fallback: string | null): string | null {
  const value = env.FORCE_LOG_FILE?.trim();
  if (!value) return fallback;
  return value.toLowerCase() === 'off' ? null : value;
}

function warnInvalid(key: string, value: string, fallback: unknown): void {
  bleLogger.warn(`Invalid ${key}="${value}", using ${String(fallback)}`, undefined, 'CONFIG');
}
