/**
 * Noble Transport Implementation
 * Wraps @abandonware/noble behind the IForceTransport capability
 *
 * Noble is loaded on initialize() rather than at import time, so the rest of the
 * bridge (and its tests) load on machines without Bluetooth bindings.
 */

import type { Characteristic, Peripheral } from '@abandonware/noble';
import { IForceLink, IForceTransport } from '../interfaces/ITransport';
import { DeviceIdentity, FrameHandler, LinkLostHandler } from '../BleBridgeTypes';
import { FORCE_BLE_CONFIG } from '../BleBridgeConstants';
import { matchesNameFilter, normalizeUuid, sortDevicesByName } from '../DeviceDiscovery';
import { bleLogger } from '../BleLogger';
import { delay, withTimeout } from '../../shared/async';

type NobleModule = typeof import('@abandonware/noble');

// ─────────────────────────────────────────────────────────────────────────────
// Noble Link
// Connected peripheral plus its discovered characteristics
// ─────────────────────────────────────────────────────────────────────────────

class NobleLink implements IForceLink {
  private characteristics = new Map<string, Characteristic>();

  constructor(
    readonly peripheral: Peripheral,
    readonly deviceName: string
  ) {}

  get deviceId(): string {
    return this.peripheral.id;
  }

  get isConnected(): boolean {
    return this.peripheral.state === 'connected';
  }

  setCharacteristics(characteristics: Characteristic[]): void {
    this.characteristics.clear();
    for (const characteristic of characteristics) {
      this.characteristics.set(normalizeUuid(characteristic.uuid), characteristic);
    }
  }

  getCharacteristic(uuid: string): Characteristic | null {
    return this.characteristics.get(normalizeUuid(uuid)) ?? null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NobleTransport implements IForceTransport {
  private noble: NobleModule | null = null;
  private _isInitialized = false;
  private discoveredPeripherals = new Map<string, Peripheral>();
  private seenThisScan = new Set<string>();

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  async initialize(): Promise<boolean> {
    if (this._isInitialized) return true;

    try {
      bleLogger.info('Initializing noble transport...', undefined, 'NOBLE');

      let noble: NobleModule;
      try {
        noble = require('@abandonware/noble');
      } catch (error) {
        bleLogger.error('Noble not available', { error: String(error) }, 'NOBLE');
        return false;
      }

      this.noble = noble;
      this.setupNobleEvents(noble);
      await this.waitForBluetoothReady(noble);

      this._isInitialized = true;
      bleLogger.info('Noble transport initialized', undefined, 'NOBLE');
      return true;
    } catch (error) {
      bleLogger.error('Noble initialization failed', { error: String(error) }, 'NOBLE');
      return false;
    }
  }

  async cleanup(): Promise<void> {
    bleLogger.info('Cleaning up noble transport...', undefined, 'NOBLE');

    for (const peripheral of this.discoveredPeripherals.values()) {
      if (peripheral.state === 'connected') {
        try {
          await peripheral.disconnectAsync();
        } catch (error) {
          bleLogger.warn('Error disconnecting peripheral', { id: peripheral.id, error: String(error) }, 'NOBLE');
        }
      }
    }

    this.discoveredPeripherals.clear();
    this.noble?.removeAllListeners('discover');
    this._isInitialized = false;
  }

  async discover(nameFilter: string, timeoutMs: number): Promise<DeviceIdentity[]> {
    const noble = this.requireNoble();

    bleLogger.info(`Scanning ${timeoutMs}ms for "${nameFilter}"`, undefined, 'NOBLE');
    this.seenThisScan.clear();

    await noble.startScanningAsync([], false);
    try {
      await delay(timeoutMs);
    } finally {
      try {
        await noble.stopScanningAsync();
      } catch (error) {
        bleLogger.warn('Error stopping scan', { error: String(error) }, 'NOBLE');
      }
    }

    const devices: DeviceIdentity[] = [];
    for (const id of this.seenThisScan) {
      const peripheral = this.discoveredPeripherals.get(id);
      if (!peripheral) continue;
      const name = peripheral.advertisement?.localName ?? '';
      if (matchesNameFilter(name, nameFilter)) {
        devices.push({ id, name });
      }
    }

    bleLogger.info(`Scan complete. Found ${devices.length} matching devices`, undefined, 'NOBLE');
    return sortDevicesByName(devices);
  }

  async open(deviceId: string, onLinkLost: LinkLostHandler, timeoutMs: number): Promise<IForceLink> {
    this.requireNoble();

    const peripheral = this.discoveredPeripherals.get(deviceId);
    if (!peripheral) {
      throw new Error(`Device ${deviceId} has not been discovered`);
    }
    const deviceName = peripheral.advertisement?.localName ?? deviceId;

    bleLogger.logConnection(deviceId, deviceName, 'Connecting', { state: peripheral.state });

    const link = new NobleLink(peripheral, deviceName);
    try {
      await withTimeout(peripheral.connectAsync(), timeoutMs, 'Connection timeout');
      const { characteristics } = await withTimeout(
        peripheral.discoverSomeServicesAndCharacteristicsAsync([], []),
        timeoutMs,
        'Characteristic discovery timeout'
      );
      link.setCharacteristics(characteristics);
    } catch (error) {
      // Leave the peripheral in a clean state for the next attempt
      if (peripheral.state !== 'disconnected') {
        await peripheral.disconnectAsync().catch(closeError =>
          bleLogger.warn('Cleanup disconnect failed', { deviceId, error: String(closeError) }, 'NOBLE')
        );
      }
      throw error;
    }

    peripheral.once('disconnect', () => {
      bleLogger.logPeripheralEvent(deviceId, 'disconnect');
      onLinkLost();
    });

    bleLogger.logConnection(deviceId, deviceName, 'Link open', { state: peripheral.state });
    return link;
  }

  async subscribe(link: IForceLink, channelId: string, onFrame: FrameHandler): Promise<void> {
    const characteristic = this.requireCharacteristic(link, channelId);
    characteristic.removeAllListeners('data');
    characteristic.on('data', (data: Buffer) => onFrame(data));
    await characteristic.subscribeAsync();
  }

  async unsubscribe(link: IForceLink, channelId: string): Promise<void> {
    const characteristic = this.requireCharacteristic(link, channelId);
    characteristic.removeAllListeners('data');
    await characteristic.unsubscribeAsync();
  }

  async close(link: IForceLink): Promise<void> {
    const nobleLink = this.requireLink(link);
    if (nobleLink.peripheral.state === 'disconnected') return;
    await nobleLink.peripheral.disconnectAsync();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private requireNoble(): NobleModule {
    if (!this._isInitialized || !this.noble) {
      throw new Error('Transport not initialized');
    }
    return this.noble;
  }

  private requireLink(link: IForceLink): NobleLink {
    if (!(link instanceof NobleLink)) {
      throw new Error(`Link for ${link.deviceId} was not opened by this transport`);
    }
    return link;
  }

  private requireCharacteristic(link: IForceLink, channelId: string): Characteristic {
    const characteristic = this.requireLink(link).getCharacteristic(channelId);
    if (!characteristic) {
      throw new Error(`Characteristic ${channelId} not found on ${link.deviceName}`);
    }
    return characteristic;
  }

  private setupNobleEvents(noble: NobleModule): void {
    noble.on('stateChange', (state: string) => {
      bleLogger.logNobleEvent('stateChange', { state });
    });

    noble.on('discover', (peripheral: Peripheral) => {
      // Noble fires discover for every advertisement; keep the first wrapper
      if (!this.discoveredPeripherals.has(peripheral.id)) {
        this.discoveredPeripherals.set(peripheral.id, peripheral);
      }
      this.seenThisScan.add(peripheral.id);
    });
  }

  private waitForBluetoothReady(noble: NobleModule): Promise<void> {
    // The typings declare the adapter state as _state
    if (noble._state === 'poweredOn') {
      return Promise.resolve();
    }

    let stateChangeHandler: (state: string) => void = () => undefined;
    const ready = new Promise<void>(resolve => {
      stateChangeHandler = (state: string) => {
        if (state === 'poweredOn') {
          resolve();
        }
      };
      noble.on('stateChange', stateChangeHandler);
    });

    return withTimeout(ready, FORCE_BLE_CONFIG.ADAPTER_READY_TIMEOUT, 'Bluetooth adapter timeout')
      .finally(() => noble.removeListener('stateChange', stateChangeHandler));
  }
}
