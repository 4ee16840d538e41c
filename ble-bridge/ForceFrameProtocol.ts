/**
 * Text protocol of the force sensor's notification characteristic.
 * One record per notification: Time:<int>,V1:<float>,V2:<float>,V3:<float>,V4:<float>
 */

import { ForceFrame } from './BleBridgeTypes';
import { FRAME_FORMAT } from './BleBridgeConstants';

export class ForceFrameProtocol {
  /** Decode one record; null for anything malformed. */
  static parseFrame(data: Buffer | string): ForceFrame | null {
    const line = (typeof data === 'string' ? data : data.toString('utf8')).trim();
    const match = FRAME_FORMAT.PATTERN.exec(line);
    if (!match) return null;

    return {
      deviceTimeMs: Number(match[1]),
      channels: [Number(match[2]), Number(match[3]), Number(match[4]), Number(match[5])],
    };
  }

  /** The channel value a session records, or null when the record is malformed. */
  static parseRawValue(data: Buffer | string): number | null {
    const frame = ForceFrameProtocol.parseFrame(data);
    return frame ? frame.channels[FRAME_FORMAT.RECORDED_CHANNEL_INDEX] : null;
  }

  static formatFrame(frame: ForceFrame): string {
    const [v1, v2, v3, v4] = frame.channels;
    return `Time:${Math.trunc(frame.deviceTimeMs)},V1:${formatChannel(v1)},V2:${formatChannel(v2)},V3:${formatChannel(v3)},V4:${formatChannel(v4)}`;
  }
}

// The wire format has no exponent notation
function formatChannel(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}
