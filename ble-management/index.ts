/**
 * BLE Management Module
 * Per-device session state machine and its operation queue
 */

// ─────────────────────────────────────────────────────────────────
// Core Types & Enums
// ─────────────────────────────────────────────────────────────────

export {
  SessionState,
  SESSION_TRANSITION_RULES,
  CONNECTED_STATES,
  DEFAULT_SESSION_TIMING,
  InvalidTransitionError,
  SessionNotFoundError,
} from './types';

export type {
  SessionTimingConfig,
  SessionCapabilities,
  SessionSnapshot,
  ConfirmSave,
  StateChangedListener,
  RecoveryErrorListener,
} from './types';

// ─────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────

export { DeviceSession } from './DeviceSession';
export type { DeviceSessionDeps } from './DeviceSession';
export { SessionOperationQueue } from './SessionOperationQueue';
