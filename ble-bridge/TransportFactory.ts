/**
 * Transport Factory - selects the noble transport or the in-process mock
 */

import { IForceTransport } from './interfaces/ITransport';
import { NobleTransport } from './transports/NobleTransport';
import { MockForceTransport } from './MockForceTransport';
import { MOCK_STREAM } from './BleBridgeConstants';
import { bleLogger } from './BleLogger';

export interface TransportOptions {
  useMock: boolean;
}

// Simulated sensors offered by the mock transport
export const DEMO_DEVICES = [
  { id: 'mock-force-01', name: 'Force Sensor A' },
  { id: 'mock-force-02', name: 'Force Sensor B' },
] as const;

export function createTransport(options: TransportOptions): IForceTransport {
  if (options.useMock) {
    bleLogger.info('Using mock transport with demo devices', { count: DEMO_DEVICES.length }, 'FACTORY');
    const mock = new MockForceTransport({ streamIntervalMs: MOCK_STREAM.INTERVAL_MS, scanDelayMs: 500 });
    for (const device of DEMO_DEVICES) {
      mock.addDevice(device.id, device.name);
    }
    return mock;
  }

  bleLogger.info('Using noble transport', undefined, 'FACTORY');
  return new NobleTransport();
}
