/**
 * NobleTransport Tests
 *
 * Noble is replaced by an in-process event emitter; no Bluetooth adapter is touched.
 */

import { EventEmitter } from 'events';
import { NobleTransport } from './NobleTransport';
import { FORCE_BLE_CONFIG } from '../BleBridgeConstants';
import { bleLogger } from '../BleLogger';
import { TimeoutError } from '../../shared/async';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

class FakeNoble extends EventEmitter {
  _state = 'poweredOn';
  startScanningAsync = jest.fn(async () => undefined);
  stopScanningAsync = jest.fn(async () => undefined);
}

class FakeCharacteristic extends EventEmitter {
  subscribeAsync = jest.fn(async () => undefined);
  unsubscribeAsync = jest.fn(async () => undefined);

  constructor(readonly uuid: string) {
    super();
  }
}

interface Discovery {
  services: unknown[];
  characteristics: FakeCharacteristic[];
}

class FakePeripheral extends EventEmitter {
  state = 'disconnected';
  readonly advertisement: { localName: string };

  connectAsync = jest.fn(async () => {
    this.state = 'connected';
  });
  disconnectAsync = jest.fn(async () => {
    this.state = 'disconnected';
    this.emit('disconnect');
  });
  discoverSomeServicesAndCharacteristicsAsync = jest.fn(
    async (): Promise<Discovery> => ({ services: [], characteristics: [this.notify] })
  );

  readonly notify = new FakeCharacteristic(FORCE_BLE_CONFIG.NOTIFY_CHARACTERISTIC_UUID.replace(/-/g, ''));

  constructor(readonly id: string, localName: string) {
    super();
    this.advertisement = { localName };
  }
}

const mockNoble = new FakeNoble();
jest.mock('@abandonware/noble', () => mockNoble);

// ─────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────

describe('NobleTransport', () => {
  let transport: NobleTransport;

  beforeAll(() => {
    bleLogger.configure({ level: 'error', filePath: null });
  });

  beforeEach(() => {
    mockNoble._state = 'poweredOn';
    transport = new NobleTransport();
  });

  afterEach(async () => {
    await transport.cleanup();
    mockNoble.removeAllListeners();
  });

  async function discoverPeripherals(...peripherals: FakePeripheral[]) {
    const scanning = transport.discover('force', 10);
    peripherals.forEach(p => mockNoble.emit('discover', p));
    return scanning;
  }

  test('initializes at once when the adapter is already powered on', async () => {
    await expect(transport.initialize()).resolves.toBe(true);
    expect(transport.isInitialized).toBe(true);
  });

  test('waits for the adapter to power on', async () => {
    mockNoble._state = 'poweredOff';

    const initializing = transport.initialize();
    mockNoble.emit('stateChange', 'poweredOn');

    await expect(initializing).resolves.toBe(true);
    expect(mockNoble.listenerCount('stateChange')).toBe(1);
  });

  test('discover keeps matching devices seen in this scan, sorted by name', async () => {
    await transport.initialize();

    const devices = await discoverPeripherals(
      new FakePeripheral('p-2', 'Force Sensor B'),
      new FakePeripheral('p-hr', 'Heart Rate'),
      new FakePeripheral('p-1', 'force sensor A')
    );

    expect(devices).toEqual([
      { id: 'p-1', name: 'force sensor A' },
      { id: 'p-2', name: 'Force Sensor B' },
    ]);
    expect(mockNoble.stopScanningAsync).toHaveBeenCalledTimes(1);
  });

  test('open connects, subscribes and forwards an unexpected disconnect', async () => {
    const peripheral = new FakePeripheral('p-1', 'Force Sensor A');
    await transport.initialize();
    await discoverPeripherals(peripheral);
    const onLinkLost = jest.fn();
    const onFrame = jest.fn();

    const link = await transport.open('p-1', onLinkLost, 100);
    await transport.subscribe(link, FORCE_BLE_CONFIG.NOTIFY_CHARACTERISTIC_UUID, onFrame);
    peripheral.notify.emit('data', Buffer.from('Time:1,V1:0,V2:0,V3:5,V4:0'));
    peripheral.emit('disconnect');

    expect(link.isConnected).toBe(true);
    expect(peripheral.notify.subscribeAsync).toHaveBeenCalledTimes(1);
    expect(onFrame).toHaveBeenCalledWith(Buffer.from('Time:1,V1:0,V2:0,V3:5,V4:0'));
    expect(onLinkLost).toHaveBeenCalledTimes(1);
  });

  test('a failed characteristic discovery disconnects the peripheral', async () => {
    const peripheral = new FakePeripheral('p-1', 'Force Sensor A');
    peripheral.discoverSomeServicesAndCharacteristicsAsync.mockRejectedValue(new Error('GATT error'));
    await transport.initialize();
    await discoverPeripherals(peripheral);
    const onLinkLost = jest.fn();

    await expect(transport.open('p-1', onLinkLost, 100)).rejects.toThrow('GATT error');

    expect(peripheral.disconnectAsync).toHaveBeenCalledTimes(1);
    expect(peripheral.state).toBe('disconnected');
    expect(onLinkLost).not.toHaveBeenCalled();
  });

  test('a hung characteristic discovery times out and disconnects', async () => {
    const peripheral = new FakePeripheral('p-1', 'Force Sensor A');
    peripheral.discoverSomeServicesAndCharacteristicsAsync.mockReturnValue(new Promise<Discovery>(() => undefined));
    await transport.initialize();
    await discoverPeripherals(peripheral);

    await expect(transport.open('p-1', jest.fn(), 30)).rejects.toBeInstanceOf(TimeoutError);
    expect(peripheral.disconnectAsync).toHaveBeenCalledTimes(1);
  });

  test('open rejects a device that was never discovered', async () => {
    await transport.initialize();
    await expect(transport.open('nope', jest.fn(), 100)).rejects.toThrow('Device nope has not been discovered');
  });
});
