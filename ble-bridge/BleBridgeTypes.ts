/**
 * BLE Bridge Types - force sensor text streaming
 */

// Discovered device: transport address plus advertised name
export interface DeviceIdentity {
  id: string;
  name: string;
}

// One decoded notification record
export interface ForceFrame {
  deviceTimeMs: number;
  channels: [number, number, number, number]; // V1..V4
}

// Notification payload callback
export type FrameHandler = (data: Buffer) => void;

// Called from the transport's own context when a link drops
export type LinkLostHandler = () => void;
