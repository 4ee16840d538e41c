/**
 * Mock force transport for testing and for running without Bluetooth hardware
 * Simulates force sensors in process: discovery, links, notifications and link loss
 */

import { IForceLink, IForceTransport } from './interfaces/ITransport';
import { DeviceIdentity, FrameHandler, LinkLostHandler } from './BleBridgeTypes';
import { MOCK_STREAM } from './BleBridgeConstants';
import { ForceFrameProtocol } from './ForceFrameProtocol';
import { matchesNameFilter, sortDevicesByName } from './DeviceDiscovery';
import { bleLogger } from './BleLogger';
import { delay } from '../shared/async';

export interface MockTransportOptions {
  /** Emit synthetic frames at this interval while a device is subscribed (0 = off) */
  streamIntervalMs?: number;
  /** Simulated scan duration cap, so tests do not wait for the full timeout */
  scanDelayMs?: number;
}

type OpenBehaviour =
  | { kind: 'connect' }
  | { kind: 'fail'; error: Error }
  | { kind: 'disconnected' };

class MockLink implements IForceLink {
  connected = true;
  readonly subscriptions = new Map<string, FrameHandler>();

  constructor(
    readonly deviceId: string,
    readonly deviceName: string,
    readonly onLinkLost: LinkLostHandler
  ) {}

  get isConnected(): boolean {
    return this.connected;
  }
}

interface MockDevice {
  identity: DeviceIdentity;
  nextOpen: OpenBehaviour;
  link: MockLink | null;
  streamTimer: NodeJS.Timeout | null;
  streamCounter: number;
}

export class MockForceTransport implements IForceTransport {
  private devices = new Map<string, MockDevice>();
  private _isInitialized = false;
  private readonly streamIntervalMs: number;
  private readonly scanDelayMs: number;

  /** Number of open() calls per device id */
  readonly openCounts = new Map<string, number>();

  constructor(options: MockTransportOptions = {}) {
    this.streamIntervalMs = options.streamIntervalMs ?? 0;
    this.scanDelayMs = options.scanDelayMs ?? 0;
  }

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  async initialize(): Promise<boolean> {
    bleLogger.info('Mock transport initialized (no Bluetooth hardware used)', undefined, 'MOCK');
    this._isInitialized = true;
    return true;
  }

  async cleanup(): Promise<void> {
    for (const device of this.devices.values()) {
      this.stopStream(device);
      if (device.link) {
        device.link.connected = false;
        device.link.subscriptions.clear();
        device.link = null;
      }
    }
    this._isInitialized = false;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Simulation controls
  // ───────────────────────────────────────────────────────────────────────────

  addDevice(id: string, name: string): void {
    this.devices.set(id, {
      identity: { id, name },
      nextOpen: { kind: 'connect' },
      link: null,
      streamTimer: null,
      streamCounter: 0,
    });
  }

  /** The next open() for this device rejects with `error` */
  failNextOpen(id: string, error: Error = new Error('Simulated connection failure')): void {
    this.requireDevice(id).nextOpen = { kind: 'fail', error };
  }

  /** The next open() for this device resolves with a link that is not connected */
  openReturnsDisconnected(id: string): void {
    this.requireDevice(id).nextOpen = { kind: 'disconnected' };
  }

  /**
   * Deliver one notification payload to every subscribed channel of the device's open link.
   * @returns false when nothing is subscribed
   */
  pushFrame(id: string, payload: string | Buffer): boolean {
    const link = this.requireDevice(id).link;
    if (!link || !link.connected || link.subscriptions.size === 0) return false;

    const data = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
    for (const handler of link.subscriptions.values()) {
      handler(data);
    }
    return true;
  }

  /** Simulate an unexpected link drop (device powered off, out of range) */
  dropLink(id: string): void {
    const device = this.requireDevice(id);
    const link = device.link;
    if (!link) return;

    this.teardownLink(device);
    link.onLinkLost();
  }

  isLinkOpen(id: string): boolean {
    return this.requireDevice(id).link?.connected ?? false;
  }

  subscriptionCount(id: string): number {
    return this.requireDevice(id).link?.subscriptions.size ?? 0;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // IForceTransport
  // ───────────────────────────────────────────────────────────────────────────

  async discover(nameFilter: string, timeoutMs: number): Promise<DeviceIdentity[]> {
    await delay(Math.min(this.scanDelayMs, timeoutMs));
    const matches = Array.from(this.devices.values())
      .map(device => ({ ...device.identity }))
      .filter(identity => matchesNameFilter(identity.name, nameFilter));
    return sortDevicesByName(matches);
  }

  async open(deviceId: string, onLinkLost: LinkLostHandler, _timeoutMs: number): Promise<IForceLink> {
    const device = this.requireDevice(deviceId);
    this.openCounts.set(deviceId, (this.openCounts.get(deviceId) ?? 0) + 1);

    const behaviour = device.nextOpen;
    device.nextOpen = { kind: 'connect' };

    if (behaviour.kind === 'fail') {
      throw behaviour.error;
    }

    const link = new MockLink(deviceId, device.identity.name, onLinkLost);
    if (behaviour.kind === 'disconnected') {
      link.connected = false;
      return link;
    }

    device.link = link;
    return link;
  }

  async subscribe(link: IForceLink, channelId: string, onFrame: FrameHandler): Promise<void> {
    const { device, mockLink } = this.requireOpenLink(link);
    mockLink.subscriptions.set(channelId, onFrame);
    if (this.streamIntervalMs > 0 && !device.streamTimer) {
      this.startStream(device);
    }
  }

  async unsubscribe(link: IForceLink, channelId: string): Promise<void> {
    const { device, mockLink } = this.requireOpenLink(link);
    mockLink.subscriptions.delete(channelId);
    if (mockLink.subscriptions.size === 0) {
      this.stopStream(device);
    }
  }

  async close(link: IForceLink): Promise<void> {
    const device = this.requireDevice(link.deviceId);
    if (device.link !== link) return;

    // Like a real peripheral, the disconnect event fires before close() settles
    const mockLink = device.link;
    this.teardownLink(device);
    mockLink.onLinkLost();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ───────────────────────────────────────────────────────────────────────────

  private requireDevice(id: string): MockDevice {
    const device = this.devices.get(id);
    if (!device) {
      throw new Error(`Mock device ${id} not found`);
    }
    return device;
  }

  private requireOpenLink(link: IForceLink): { device: MockDevice; mockLink: MockLink } {
    const device = this.requireDevice(link.deviceId);
    const mockLink = device.link;
    if (!mockLink || mockLink !== link || !mockLink.connected) {
      throw new Error(`Link to ${link.deviceName} is not open`);
    }
    return { device, mockLink };
  }

  private teardownLink(device: MockDevice): void {
    this.stopStream(device);
    if (device.link) {
      device.link.connected = false;
      device.link.subscriptions.clear();
    }
    device.link = null;
  }

  private startStream(device: MockDevice): void {
    device.streamTimer = setInterval(() => {
      device.streamCounter++;
      const phase = (device.streamCounter % MOCK_STREAM.PERIOD_SAMPLES) / MOCK_STREAM.PERIOD_SAMPLES;
      const load = Math.max(0, Math.sin(phase * 2 * Math.PI)) * MOCK_STREAM.LOAD_AMPLITUDE;
      const v3 = MOCK_STREAM.REST_LEVEL + load;
      this.pushFrame(device.identity.id, ForceFrameProtocol.formatFrame({
        deviceTimeMs: device.streamCounter * MOCK_STREAM.INTERVAL_MS,
        channels: [0, 0, v3, 0],
      }));
    }, this.streamIntervalMs);
    device.streamTimer.unref();
  }

  private stopStream(device: MockDevice): void {
    if (device.streamTimer) {
      clearInterval(device.streamTimer);
      device.streamTimer = null;
    }
  }
}
