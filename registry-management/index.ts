/**
 * Registry Management Module
 *
 * Keyed collection of device sessions with sequential batch operations.
 *
 * Usage:
 * ```typescript
 * const registry = new SessionRegistry(identity => new DeviceSession(identity, deps));
 *
 * const results = await registry.connectMany(selectedDevices);
 * const failed = results.filter(r => !r.success).map(r => r.deviceId);
 * ```
 */

export { SessionRegistry } from './SessionRegistry';
export type { BatchResult, SessionFactory } from './SessionRegistry';
