/**
 * BLE Session Logger
 * Logs all BLE and recording operations to console and file for debugging connection issues
 */

import * as path from 'path';
import log from 'electron-log/node';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerSettings {
  level: LogLevelName;
  /** Log file path, or null to disable file logging */
  filePath: string | null;
}

const LINE_FORMAT = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';
const MAX_LOG_FILE_SIZE = 10 * 1024 * 1024; // 10MB

class BleLogger {
  private logFilePath = '';

  constructor() {
    log.transports.console.format = LINE_FORMAT;
    log.transports.file.format = LINE_FORMAT;
    log.transports.file.maxSize = MAX_LOG_FILE_SIZE;
    // File logging stays off until configure() names a file
    log.transports.file.level = false;
  }

  configure(settings: LoggerSettings): void {
    log.transports.console.level = settings.level;

    if (settings.filePath) {
      const resolved = path.resolve(settings.filePath);
      log.transports.file.resolvePathFn = () => resolved;
      log.transports.file.level = settings.level;
      this.logFilePath = resolved;
    } else {
      log.transports.file.level = false;
      this.logFilePath = '';
    }
  }

  private formatMessage(category: string, message: string, data?: unknown): string {
    let logLine = `[${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data)}`;
      } catch {
        logLine += ` | [Unserializable data]`;
      }
    }

    return logLine;
  }

  log(level: LogLevelName, message: string, data?: unknown, category: string = 'BLE'): void {
    const formattedMessage = this.formatMessage(category, message, data);

    switch (level) {
      case 'error':
        log.error(formattedMessage);
        break;
      case 'warn':
        log.warn(formattedMessage);
        break;
      case 'debug':
        log.debug(formattedMessage);
        break;
      default:
        log.info(formattedMessage);
    }
  }

  info(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('info', message, data, category);
  }

  warn(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('warn', message, data, category);
  }

  error(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('error', message, data, category);
  }

  debug(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('debug', message, data, category);
  }

  // Connection-specific logging
  logConnection(deviceId: string, deviceName: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${deviceName} (${deviceId})`, details, 'CONNECTION');
  }

  logConnectionError(deviceId: string, deviceName: string, phase: string, error: unknown): void {
    this.error(`${phase} FAILED - ${deviceName} (${deviceId})`, describeError(error), 'CONNECTION');
  }

  // Noble event logging
  logNobleEvent(eventName: string, details?: unknown): void {
    this.info(`Noble event: ${eventName}`, details, 'NOBLE');
  }

  // Peripheral event logging
  logPeripheralEvent(deviceId: string, eventName: string, details?: unknown): void {
    this.info(`Peripheral event: ${eventName}`, { deviceId, details }, 'PERIPHERAL');
  }

  // Session state logging
  logSessionState(deviceId: string, from: string, to: string, details?: unknown): void {
    this.info(`Session state: ${from} → ${to}`, { deviceId, details }, 'SESSION');
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

// Singleton instance
export const bleLogger = new BleLogger();
