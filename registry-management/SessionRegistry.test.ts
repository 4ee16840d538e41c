import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SessionRegistry } from './SessionRegistry';
import { DeviceSession } from '../ble-management/DeviceSession';
import { SessionNotFoundError, SessionState } from '../ble-management/types';
import { MockForceTransport } from '../ble-bridge/MockForceTransport';
import { DeviceIdentity } from '../ble-bridge/BleBridgeTypes';
import { bleLogger } from '../ble-bridge/BleLogger';
import { ForceFrameProtocol } from '../ble-bridge/ForceFrameProtocol';
import { CalibrationModel } from '../forceProcessing/calibration/CalibrationModel';
import { SessionRecorder } from '../forceProcessing/recording/SessionRecorder';
import { SessionMeta } from '../forceProcessing/recording/types';

const DEVICES: DeviceIdentity[] = [
  { id: 'dev-1', name: 'Force 1' },
  { id: 'dev-2', name: 'Force 2' },
  { id: 'dev-3', name: 'Force 3' },
];
const META: SessionMeta = { athleteId: 'a1', distanceCm: 10, weightKg: 50 };
const TABLE = [{ forceN: 0, rawCount: 1000 }, { forceN: 10, rawCount: 2000 }];

describe('SessionRegistry', () => {
  let tmpDir: string;
  let transport: MockForceTransport;
  let factory: jest.Mock<DeviceSession, [DeviceIdentity]>;
  let registry: SessionRegistry;

  beforeAll(() => {
    bleLogger.configure({ level: 'error', filePath: null });
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'registry-'));
    transport = new MockForceTransport();
    DEVICES.forEach(d => transport.addDevice(d.id, d.name));
    const recorder = new SessionRecorder({ readingsDir: tmpDir });

    factory = jest.fn((identity: DeviceIdentity) => new DeviceSession(identity, {
      transport,
      calibration: new CalibrationModel(TABLE),
      recorder,
      timing: { baselineWindowMs: 5 },
    }));
    registry = new SessionRegistry(factory);
  });

  afterEach(async () => {
    await transport.cleanup();
    fs.rmSync(tmpDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  test('creates a session on first connect and reuses it', async () => {
    expect(await registry.connect(DEVICES[0])).toBe(true);
    await registry.disconnect(DEVICES[0].id);
    expect(await registry.connect(DEVICES[0])).toBe(true);

    expect(factory).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(1);
  });

  test('disconnecting an unknown device succeeds', async () => {
    await expect(registry.disconnect('nope')).resolves.toBe(true);
  });

  test('reading on an unknown device raises SessionNotFoundError', async () => {
    await expect(registry.startReading('nope', META)).rejects.toBeInstanceOf(SessionNotFoundError);
    expect(() => registry.require('nope')).toThrow('Session not found: nope');
  });

  test('connectMany runs one device at a time and reports each result', async () => {
    const statesAtOpen: string[] = [];
    const open = transport.open.bind(transport);
    jest.spyOn(transport, 'open').mockImplementation((deviceId, onLinkLost, timeoutMs) => {
      statesAtOpen.push(registry.getSnapshots().map(s => `${s.identity.id}:${s.state}`).join(','));
      return open(deviceId, onLinkLost, timeoutMs);
    });
    transport.failNextOpen('dev-2');

    const results = await registry.connectMany(DEVICES);

    expect(results).toEqual([
      { deviceId: 'dev-1', success: true, value: true },
      { deviceId: 'dev-2', success: false, value: false },
      { deviceId: 'dev-3', success: true, value: true },
    ]);
    expect(statesAtOpen).toEqual([
      'dev-1:connecting',
      'dev-1:armed,dev-2:connecting',
      'dev-1:armed,dev-2:idle,dev-3:connecting',
    ]);
    expect(registry.getConnectedIds()).toEqual(['dev-1', 'dev-3']);
  });

  test('a failing device does not abort the batch', async () => {
    await registry.connectMany(DEVICES.slice(0, 2));

    const results = await registry.startReadingMany(['dev-1', 'missing', 'dev-2'], META);

    expect(results.map(r => r.success)).toEqual([true, false, true]);
    expect(results[1].error).toBeInstanceOf(SessionNotFoundError);
    expect(registry.getReadingIds()).toEqual(['dev-1', 'dev-2']);
  });

  test('stopping one device leaves the other reading', async () => {
    await registry.connectMany(DEVICES.slice(0, 2));
    await registry.startReadingMany(['dev-1', 'dev-2'], META);
    transport.pushFrame('dev-1', ForceFrameProtocol.formatFrame({ deviceTimeMs: 0, channels: [0, 0, 1500, 0] }));
    transport.pushFrame('dev-2', ForceFrameProtocol.formatFrame({ deviceTimeMs: 0, channels: [0, 0, 1600, 0] }));

    const [result] = await registry.stopReadingMany(['dev-1'], META);

    expect(result.success).toBe(true);
    expect(typeof result.value).toBe('string');
    expect(registry.getReadingIds()).toEqual(['dev-2']);
    expect(registry.get('dev-2')?.getSnapshot().sampleCount).toBe(1);
  });

  test('disconnectAll swallows per-device errors', async () => {
    await registry.connectMany(DEVICES);
    jest.spyOn(registry.require('dev-2'), 'disconnect').mockRejectedValue(new Error('stuck'));

    await expect(registry.disconnectAll()).resolves.toBeUndefined();

    expect(registry.get('dev-1')?.getSnapshot().state).toBe(SessionState.IDLE);
    expect(registry.get('dev-3')?.getSnapshot().state).toBe(SessionState.IDLE);
  });

  test('disconnectMany reports per-device errors', async () => {
    await registry.connectMany(DEVICES.slice(0, 2));
    jest.spyOn(registry.require('dev-1'), 'disconnect').mockRejectedValue(new Error('stuck'));

    const results = await registry.disconnectMany(['dev-1', 'dev-2']);

    expect(results[0]).toMatchObject({ deviceId: 'dev-1', success: false });
    expect(results[0].error?.message).toBe('stuck');
    expect(results[1]).toEqual({ deviceId: 'dev-2', success: true, value: true });
  });

  test('remove and clear forget sessions', async () => {
    await registry.connectMany(DEVICES);

    expect(await registry.remove('dev-1')).toBe(true);
    expect(await registry.remove('dev-1')).toBe(false);
    expect(registry.has('dev-1')).toBe(false);
    expect(transport.isLinkOpen('dev-1')).toBe(false);

    await registry.clear();
    expect(registry.size).toBe(0);
    expect(transport.isLinkOpen('dev-2')).toBe(false);
  });
});
