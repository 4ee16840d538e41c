/**
 * BLE Bridge Constants - force sensor protocol
 */

export const FORCE_BLE_CONFIG = {
  // Nordic UART TX characteristic; the sensor streams text records on it
  NOTIFY_CHARACTERISTIC_UUID: '6e400003-b5a3-f393-e0a9-e50e24dcca9e',

  // Device identification: advertised name contains this (case-insensitive)
  DEVICE_NAME_FILTER: 'force',

  SCAN_TIMEOUT: 6000,            // 6 seconds
  CONNECTION_TIMEOUT: 20000,     // 20 seconds (BLE connection can be slow)
  ADAPTER_READY_TIMEOUT: 15000,  // Wait for adapter poweredOn
  BASELINE_WINDOW: 5000,         // Zero-load warm-up after connect
  SAVE_PROMPT_TIMEOUT: 60000,    // Unanswered save question after a link loss means save
} as const;

export const FRAME_FORMAT = {
  // Time:<int>,V1:<float>,V2:<float>,V3:<float>,V4:<float>
  PATTERN: /^Time:(-?\d+),V1:(-?\d+(?:\.\d+)?),V2:(-?\d+(?:\.\d+)?),V3:(-?\d+(?:\.\d+)?),V4:(-?\d+(?:\.\d+)?)/,
  // Index into the captured channels [V1, V2, V3, V4] of the value the session records
  RECORDED_CHANNEL_INDEX: 2,
} as const;

export const MOCK_STREAM = {
  INTERVAL_MS: 10,          // 100Hz
  REST_LEVEL: 1000,
  LOAD_AMPLITUDE: 2500,
  PERIOD_SAMPLES: 500,
} as const;
