/**
 * Device Session Types
 * State machine, timing policy and capabilities of one force sensor session
 */

import { DeviceIdentity, FORCE_BLE_CONFIG } from '../ble-bridge';

// ─────────────────────────────────────────────────────────────────────────────
// State Machine Enums
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Session state
 * Idle → Connecting → BaselineCalibrating → Armed → Reading → (Stopping | Disconnecting*) → Idle
 */
export enum SessionState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  BASELINE_CALIBRATING = 'baseline_calibrating',
  ARMED = 'armed',
  READING = 'reading',
  STOPPING = 'stopping',
  DISCONNECTING_INTENTIONAL = 'disconnecting_intentional',
  DISCONNECTING_ERROR = 'disconnecting_error',
}

// ─────────────────────────────────────────────────────────────────────────────
// State Machine Transitions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Valid state transitions
 * Any transition not in this map is invalid and will throw
 */
export const SESSION_TRANSITION_RULES: Record<SessionState, SessionState[]> = {
  [SessionState.IDLE]: [
    SessionState.CONNECTING,
  ],
  [SessionState.CONNECTING]: [
    SessionState.BASELINE_CALIBRATING,
    SessionState.IDLE,
  ],
  [SessionState.BASELINE_CALIBRATING]: [
    SessionState.ARMED,
    SessionState.IDLE,
  ],
  [SessionState.ARMED]: [
    SessionState.READING,
    SessionState.DISCONNECTING_INTENTIONAL,
    SessionState.DISCONNECTING_ERROR,
  ],
  [SessionState.READING]: [
    SessionState.STOPPING,
    SessionState.DISCONNECTING_INTENTIONAL,
    SessionState.DISCONNECTING_ERROR,
  ],
  [SessionState.STOPPING]: [
    SessionState.ARMED,
  ],
  [SessionState.DISCONNECTING_INTENTIONAL]: [
    SessionState.IDLE,
  ],
  [SessionState.DISCONNECTING_ERROR]: [
    SessionState.IDLE,
  ],
};

// States in which the link is open and baseline is known
export const CONNECTED_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.ARMED,
  SessionState.READING,
  SessionState.STOPPING,
]);

// ─────────────────────────────────────────────────────────────────────────────
// Timing
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionTimingConfig {
  connectTimeoutMs: number;
  /** Warm-up window whose median becomes the baseline */
  baselineWindowMs: number;
  /** How long recovery waits for a save decision before saving anyway */
  promptTimeoutMs: number;
}

export const DEFAULT_SESSION_TIMING: Readonly<SessionTimingConfig> = Object.freeze({
  connectTimeoutMs: FORCE_BLE_CONFIG.CONNECTION_TIMEOUT,
  baselineWindowMs: FORCE_BLE_CONFIG.BASELINE_WINDOW,
  promptTimeoutMs: FORCE_BLE_CONFIG.SAVE_PROMPT_TIMEOUT,
});

// ─────────────────────────────────────────────────────────────────────────────
// Capabilities (supplied by the presentation layer)
// ─────────────────────────────────────────────────────────────────────────────

/** Decide whether to keep a partial capture after an unexpected link loss */
export type ConfirmSave = (deviceId: string, deviceName?: string) => Promise<boolean>;

/** Connectivity or error flags changed; re-read the snapshot */
export type StateChangedListener = () => void;

/** A recovery save failed; the session has already returned to Idle */
export type RecoveryErrorListener = (identity: DeviceIdentity, error: unknown) => void;

export interface SessionCapabilities {
  confirmSave?: ConfirmSave;
  onStateChanged?: StateChangedListener;
  onRecoveryError?: RecoveryErrorListener;
}

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionSnapshot {
  identity: DeviceIdentity;
  state: SessionState;
  isConnected: boolean;
  isReading: boolean;
  linkError: boolean;
  baseline: number;
  sampleCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export class InvalidTransitionError extends Error {
  constructor(
    public readonly deviceId: string,
    public readonly fromState: SessionState,
    public readonly toState: SessionState
  ) {
    super(`Invalid transition for device ${deviceId}: ${fromState} → ${toState}`);
    this.name = 'InvalidTransitionError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly deviceId: string) {
    super(`Session not found: ${deviceId}`);
    this.name = 'SessionNotFoundError';
  }
}
