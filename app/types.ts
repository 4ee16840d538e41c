import { DeviceIdentity } from '../ble-bridge';
import { SessionSnapshot } from '../ble-management';
import { BatchResult } from '../registry-management';

export interface ApiResponse<T = undefined> {
  success: boolean;
  message: string;
  data?: T;
}

export type ScanResponse = ApiResponse<DeviceIdentity[]>;

export type ConnectionResponse = ApiResponse<BatchResult<boolean>[]>;

export type RecordingResponse = ApiResponse<BatchResult<string | null>[]>;

export interface BridgeStatus {
  initialized: boolean;
  transport: 'noble' | 'mock';
  discovered: DeviceIdentity[];
  sessions: SessionSnapshot[];
}
