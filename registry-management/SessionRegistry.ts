/**
 * Session Registry
 *
 * Owns one DeviceSession per device id. Sessions are created on first connect and
 * reused across reconnects; no two sessions ever exist for the same id.
 *
 * Batch operations are a strictly sequential fan-out: each device's operation is
 * awaited before the next starts, and a failure is reported per device without
 * aborting the rest.
 */

import { bleLogger, describeError, DeviceIdentity } from '../ble-bridge';
import { DeviceSession, SessionNotFoundError, SessionSnapshot } from '../ble-management';
import { SessionMeta } from '../forceProcessing/recording';

export type SessionFactory = (identity: DeviceIdentity) => DeviceSession;

export interface BatchResult<T> {
  deviceId: string;
  success: boolean;
  value?: T;
  error?: Error;
}

export class SessionRegistry {
  // Primary storage: device id → session
  private sessions = new Map<string, DeviceSession>();

  constructor(private readonly createSession: SessionFactory) {}

  // ───────────────────────────────────────────────────────────────────────────
  // Single-device operations
  // ───────────────────────────────────────────────────────────────────────────

  async connect(identity: DeviceIdentity): Promise<boolean> {
    let session = this.sessions.get(identity.id);
    if (!session) {
      session = this.createSession(identity);
      this.sessions.set(identity.id, session);
      bleLogger.debug('Session created', { deviceId: identity.id, name: identity.name }, 'REGISTRY');
    }
    return session.connect();
  }

  /** Unknown ids count as already disconnected */
  async disconnect(deviceId: string): Promise<boolean> {
    const session = this.sessions.get(deviceId);
    if (!session) return true;
    return session.disconnect();
  }

  async startReading(deviceId: string, meta: SessionMeta): Promise<boolean> {
    return this.require(deviceId).startReading(meta);
  }

  async stopReading(deviceId: string, meta: SessionMeta): Promise<string | null> {
    return this.require(deviceId).stopReading(meta);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Batch operations
  // ───────────────────────────────────────────────────────────────────────────

  connectMany(identities: readonly DeviceIdentity[]): Promise<BatchResult<boolean>[]> {
    return this.fanOut(
      identities.map(identity => identity.id),
      (_deviceId, index) => this.connect(identities[index])
    );
  }

  disconnectMany(deviceIds: readonly string[]): Promise<BatchResult<boolean>[]> {
    return this.fanOut(deviceIds, deviceId => this.disconnect(deviceId));
  }

  startReadingMany(deviceIds: readonly string[], meta: SessionMeta): Promise<BatchResult<boolean>[]> {
    return this.fanOut(deviceIds, deviceId => this.startReading(deviceId, meta));
  }

  stopReadingMany(deviceIds: readonly string[], meta: SessionMeta): Promise<BatchResult<string | null>[]> {
    return this.fanOut(deviceIds, deviceId => this.stopReading(deviceId, meta));
  }

  /** Disconnect every session; per-device failures are logged and otherwise ignored */
  async disconnectAll(): Promise<void> {
    for (const deviceId of Array.from(this.sessions.keys())) {
      try {
        await this.disconnect(deviceId);
      } catch (error) {
        bleLogger.warn('Disconnect during disconnectAll failed', { deviceId, ...describeError(error) }, 'REGISTRY');
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifetime
  // ───────────────────────────────────────────────────────────────────────────

  /** Disconnect and forget one session */
  async remove(deviceId: string): Promise<boolean> {
    const session = this.sessions.get(deviceId);
    if (!session) return false;

    await session.disconnect();
    await session.idle();
    this.sessions.delete(deviceId);
    return true;
  }

  async clear(): Promise<void> {
    await this.disconnectAll();
    await Promise.all(Array.from(this.sessions.values()).map(session => session.idle()));
    this.sessions.clear();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lookups
  // ───────────────────────────────────────────────────────────────────────────

  get(deviceId: string): DeviceSession | undefined {
    return this.sessions.get(deviceId);
  }

  /** @throws SessionNotFoundError */
  require(deviceId: string): DeviceSession {
    const session = this.sessions.get(deviceId);
    if (!session) {
      throw new SessionNotFoundError(deviceId);
    }
    return session;
  }

  has(deviceId: string): boolean {
    return this.sessions.has(deviceId);
  }

  get size(): number {
    return this.sessions.size;
  }

  getSnapshots(): SessionSnapshot[] {
    return Array.from(this.sessions.values()).map(session => session.getSnapshot());
  }

  getConnectedIds(): string[] {
    return this.getSnapshots().filter(s => s.isConnected).map(s => s.identity.id);
  }

  getReadingIds(): string[] {
    return this.getSnapshots().filter(s => s.isReading).map(s => s.identity.id);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ───────────────────────────────────────────────────────────────────────────

  private async fanOut<T>(
    deviceIds: readonly string[],
    operation: (deviceId: string, index: number) => Promise<T>
  ): Promise<BatchResult<T>[]> {
    const results: BatchResult<T>[] = [];

    for (let i = 0; i < deviceIds.length; i++) {
      const deviceId = deviceIds[i];
      try {
        const value = await operation(deviceId, i);
        results.push({ deviceId, success: value !== false, value });
      } catch (error) {
        const normalized = error instanceof Error ? error : new Error(String(error));
        bleLogger.warn('Batch operation failed', { deviceId, ...describeError(normalized) }, 'REGISTRY');
        results.push({ deviceId, success: false, error: normalized });
      }
    }

    return results;
  }
}
