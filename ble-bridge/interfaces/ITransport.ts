/**
 * BLE Transport Interface
 * Black-box capability the device sessions consume: discover, open, notify, close
 */

import { DeviceIdentity, FrameHandler, LinkLostHandler } from '../BleBridgeTypes';

// ─────────────────────────────────────────────────────────────────────────────
// Link Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface IForceLink {
  readonly deviceId: string;
  readonly deviceName: string;
  readonly isConnected: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface IForceTransport {
  readonly isInitialized: boolean;

  // Lifecycle
  initialize(): Promise<boolean>;
  cleanup(): Promise<void>;

  /**
   * Scan for `timeoutMs` and return devices whose name contains `nameFilter`
   * (case-insensitive), sorted case-insensitively by name.
   */
  discover(nameFilter: string, timeoutMs: number): Promise<DeviceIdentity[]>;

  /**
   * Open a link. Rejects on transport error or timeout.
   * `onLinkLost` fires from the transport's event context whenever the link drops,
   * including after close().
   */
  open(deviceId: string, onLinkLost: LinkLostHandler, timeoutMs: number): Promise<IForceLink>;

  // Notifications
  subscribe(link: IForceLink, channelId: string, onFrame: FrameHandler): Promise<void>;
  unsubscribe(link: IForceLink, channelId: string): Promise<void>;

  close(link: IForceLink): Promise<void>;
}
