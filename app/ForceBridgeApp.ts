/**
 * Force Bridge application service
 *
 * Wires configuration, logger, transport, calibration table and session registry,
 * and exposes the controller flows a presentation layer drives.
 */

import {
  bleLogger,
  createTransport,
  describeError,
  DeviceIdentity,
  IForceTransport,
  MockForceTransport,
} from '../ble-bridge';
import {
  DeviceSession,
  SessionCapabilities,
  SessionSnapshot,
  SessionState,
  SessionTimingConfig,
} from '../ble-management';
import {
  CalibrationModel,
  CalibrationOptions,
  CalibrationPoint,
  loadCalibrationTable,
} from '../forceProcessing/calibration';
import { DEFAULT_SESSION_META, SessionMeta, SessionRecorder } from '../forceProcessing/recording';
import { BatchResult, SessionRegistry } from '../registry-management';
import { AppConfig } from '../shared/config';
import { ApiResponse, BridgeStatus, ConnectionResponse, RecordingResponse, ScanResponse } from './types';

export interface ForceBridgeAppDeps {
  transport?: IForceTransport;
  capabilities?: SessionCapabilities;
  /** Session timing beyond what the environment configures (tests shorten the baseline window) */
  sessionTiming?: Partial<SessionTimingConfig>;
  now?: () => Date;
}

export class ForceBridgeApp {
  private readonly transport: IForceTransport;
  private readonly recorder: SessionRecorder;
  private readonly registry: SessionRegistry;
  private readonly capabilities: SessionCapabilities;
  private readonly sessionTiming: Partial<SessionTimingConfig>;

  private calibrationPoints: readonly CalibrationPoint[] = [];
  private discovered: DeviceIdentity[] = [];
  private lastMeta: SessionMeta = { ...DEFAULT_SESSION_META };
  private isInitialized = false;

  constructor(private readonly config: AppConfig, deps: ForceBridgeAppDeps = {}) {
    this.transport = deps.transport ?? createTransport({ useMock: config.useMockTransport });
    this.recorder = new SessionRecorder({ readingsDir: config.readingsDir, now: deps.now });
    this.capabilities = deps.capabilities ?? {};
    this.sessionTiming = {
      connectTimeoutMs: config.connectTimeoutMs,
      promptTimeoutMs: config.promptTimeoutMs,
      ...deps.sessionTiming,
    };
    this.registry = new SessionRegistry(identity => this.createSession(identity));
  }

  /**
   * Load the calibration table and bring up the transport.
   * @throws CalibrationError when the table is missing or unusable
   */
  async initialize(): Promise<ApiResponse> {
    if (this.isInitialized) {
      return { success: true, message: 'Already initialized' };
    }

    bleLogger.configure({ level: this.config.logLevel, filePath: this.config.logFile });
    if (this.config.logFile) {
      bleLogger.info(`Logging to ${bleLogger.getLogPath()}`, undefined, 'APP');
    }

    this.calibrationPoints = loadCalibrationTable(this.config.calibrationCsv);
    // Fail on an unusable table now rather than on first connect
    const model = new CalibrationModel(this.calibrationPoints, this.calibrationOptions());
    bleLogger.info(
      `Loaded ${this.calibrationPoints.length} calibration points`,
      { file: this.config.calibrationCsv, method: model.method, fit: model.linearModel },
      'APP'
    );

    const ready = await this.transport.initialize();
    if (!ready) {
      return { success: false, message: 'Bluetooth transport could not be initialized' };
    }

    this.isInitialized = true;
    return { success: true, message: 'Force bridge ready' };
  }

  async scan(): Promise<ScanResponse> {
    if (!this.isInitialized) {
      return { success: false, message: 'Not initialized' };
    }

    try {
      this.discovered = await this.transport.discover(this.config.deviceFilter, this.config.scanTimeoutMs);
      return {
        success: true,
        message: `Found ${this.discovered.length} device(s)`,
        data: this.discovered.map(device => ({ ...device })),
      };
    } catch (error) {
      bleLogger.error('Scan failed', describeError(error), 'APP');
      return { success: false, message: `Scan failed: ${describeError(error).error}` };
    }
  }

  /** Connect devices from the last scan, one after another. */
  async connect(deviceIds: readonly string[]): Promise<ConnectionResponse> {
    const identities: DeviceIdentity[] = [];
    const unknown: BatchResult<boolean>[] = [];

    for (const deviceId of deviceIds) {
      const identity = this.discovered.find(device => device.id === deviceId);
      if (identity) {
        identities.push(identity);
      } else {
        unknown.push({ deviceId, success: false, error: new Error('Device not found in last scan') });
      }
    }

    const results = [...await this.registry.connectMany(identities), ...unknown];
    return summarize(results, 'connected');
  }

  /** Refused while any of the selected devices is reading. */
  async disconnect(deviceIds: readonly string[]): Promise<ConnectionResponse> {
    const reading = new Set(this.registry.getReadingIds());
    const busy = deviceIds.filter(deviceId => reading.has(deviceId));
    if (busy.length > 0) {
      return { success: false, message: `Stop reading before disconnecting: ${busy.join(', ')}` };
    }

    return summarize(await this.registry.disconnectMany(deviceIds), 'disconnected');
  }

  /** Start reading on every connected device. */
  async startReading(meta: SessionMeta): Promise<ConnectionResponse> {
    const armed = this.registry.getSnapshots()
      .filter(snapshot => snapshot.state === SessionState.ARMED)
      .map(snapshot => snapshot.identity.id);
    if (armed.length === 0) {
      return { success: false, message: 'No armed devices' };
    }

    this.lastMeta = { ...meta };
    return summarize(await this.registry.startReadingMany(armed, meta), 'reading');
  }

  /** Stop every reading device and save its capture. */
  async stopReading(meta: SessionMeta): Promise<RecordingResponse> {
    const reading = this.registry.getReadingIds();
    if (reading.length === 0) {
      return { success: false, message: 'No devices are reading' };
    }

    this.lastMeta = { ...meta };
    return summarize(await this.registry.stopReadingMany(reading, meta), 'saved');
  }

  /**
   * Save any running captures with the last used meta, disconnect everything, release the transport.
   */
  async shutdown(): Promise<void> {
    const reading = this.registry.getReadingIds();
    if (reading.length > 0) {
      bleLogger.info(`Saving ${reading.length} running capture(s) before shutdown`, undefined, 'APP');
      await this.registry.stopReadingMany(reading, this.lastMeta);
    }

    await this.registry.clear();
    await this.transport.cleanup();
    this.isInitialized = false;
    bleLogger.info('Force bridge shut down', undefined, 'APP');
  }

  getStatus(): BridgeStatus {
    return {
      initialized: this.isInitialized,
      transport: this.transport instanceof MockForceTransport ? 'mock' : 'noble',
      discovered: this.discovered.map(device => ({ ...device })),
      sessions: this.getSnapshots(),
    };
  }

  getSnapshots(): SessionSnapshot[] {
    return this.registry.getSnapshots();
  }

  /** Resolves once every session has drained its queued work (recoveries included) */
  async idle(): Promise<void> {
    const ids = this.registry.getSnapshots().map(snapshot => snapshot.identity.id);
    for (const id of ids) {
      await this.registry.get(id)?.idle();
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ───────────────────────────────────────────────────────────────────────────

  private calibrationOptions(): CalibrationOptions {
    return {
      method: this.config.calibrationMethod,
      allowExtrapolation: this.config.allowExtrapolation,
    };
  }

  // Each session owns its model; the parsed points are shared read-only
  private createSession(identity: DeviceIdentity): DeviceSession {
    return new DeviceSession(identity, {
      transport: this.transport,
      calibration: new CalibrationModel(this.calibrationPoints, this.calibrationOptions()),
      recorder: this.recorder,
      timing: this.sessionTiming,
      capabilities: this.capabilities,
    });
  }
}

function summarize<T>(results: BatchResult<T>[], verb: string): ApiResponse<BatchResult<T>[]> {
  const succeeded = results.filter(result => result.success).length;
  return {
    success: results.length > 0 && succeeded === results.length,
    message: `${succeeded}/${results.length} ${verb}`,
    data: results,
  };
}
