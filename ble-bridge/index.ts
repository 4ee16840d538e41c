/**
 * BLE Bridge - wireless force sensor transport
 *
 * Noble-backed transport for real hardware, in-process mock for tests and demos,
 * and the text protocol the sensor streams on its notification characteristic.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Interfaces & types
// ─────────────────────────────────────────────────────────────────────────────

export type { IForceLink, IForceTransport } from './interfaces/ITransport';
export type { DeviceIdentity, ForceFrame, FrameHandler, LinkLostHandler } from './BleBridgeTypes';

// ─────────────────────────────────────────────────────────────────────────────
// Transports
// ─────────────────────────────────────────────────────────────────────────────

export { NobleTransport } from './transports/NobleTransport';
export { MockForceTransport } from './MockForceTransport';
export type { MockTransportOptions } from './MockForceTransport';
export { createTransport } from './TransportFactory';
export type { TransportOptions } from './TransportFactory';

// ─────────────────────────────────────────────────────────────────────────────
// Protocol, discovery & constants
// ─────────────────────────────────────────────────────────────────────────────

export { ForceFrameProtocol } from './ForceFrameProtocol';
export { matchesNameFilter, sortDevicesByName, normalizeUuid } from './DeviceDiscovery';
export { FORCE_BLE_CONFIG, FRAME_FORMAT, MOCK_STREAM } from './BleBridgeConstants';

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export { bleLogger, describeError } from './BleLogger';
export type { LogLevelName, LoggerSettings } from './BleLogger';
