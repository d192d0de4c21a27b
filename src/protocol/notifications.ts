/**
 * Notification frame parsing.
 */

import type {
  LocationUpdate,
  Notification,
  TransitionUpdate,
} from '../models/notifications';
import {
  CLOCKWISE_FLAG,
  NOTIFICATION_ID_OFFSET,
  NOTIFICATION_PAYLOAD_OFFSET,
  NotificationId,
} from './constants';

// Frame sizes including the length and id bytes
const LOCATION_UPDATE_SIZE = NOTIFICATION_PAYLOAD_OFFSET + 9;
const TRANSITION_UPDATE_SIZE = NOTIFICATION_PAYLOAD_OFFSET + 7;

/**
 * Extract the notification id from a raw frame.
 *
 * @returns The id byte, or null if the frame is too short to carry one
 */
export function unpackNotificationId(data: Uint8Array): number | null {
  if (data.length <= NOTIFICATION_ID_OFFSET) {
    return null;
  }
  return data[NOTIFICATION_ID_OFFSET];
}

/**
 * Parse location update payload.
 *
 * Format: [len:1][0x27][location:1][piece:1][offset:f32LE][speed:2LE][clockwise:1]
 */
export function parseLocationUpdate(data: Uint8Array): LocationUpdate | null {
  if (data.length < LOCATION_UPDATE_SIZE) {
    return null;
  }

  const view = new DataView(data.buffer, data.byteOffset + NOTIFICATION_PAYLOAD_OFFSET);
  return {
    kind: 'location',
    location: view.getUint8(0),
    piece: view.getUint8(1),
    offset: view.getFloat32(2, true),
    speed: view.getUint16(6, true),
    clockwise: view.getUint8(8) === CLOCKWISE_FLAG,
  };
}

/**
 * Parse piece transition payload.
 *
 * Format: [len:1][0x29][piece:1][previousPiece:1][offset:f32LE][direction:1]
 */
export function parseTransitionUpdate(data: Uint8Array): TransitionUpdate | null {
  if (data.length < TRANSITION_UPDATE_SIZE) {
    return null;
  }

  const view = new DataView(data.buffer, data.byteOffset + NOTIFICATION_PAYLOAD_OFFSET);
  return {
    kind: 'transition',
    piece: view.getUint8(0),
    previousPiece: view.getUint8(1),
    offset: view.getFloat32(2, true),
    direction: view.getUint8(6),
  };
}

/**
 * Decode a raw notification frame.
 *
 * Unknown ids and truncated frames are not errors; they decode to null.
 *
 * @param data - Raw bytes received on the read characteristic
 * @returns Decoded notification, or null if the frame is not understood
 */
export function decodeNotification(data: Uint8Array): Notification | null {
  switch (unpackNotificationId(data)) {
    case NotificationId.LOCATION_UPDATE:
      return parseLocationUpdate(data);
    case NotificationId.TRANSITION_UPDATE:
      return parseTransitionUpdate(data);
    case NotificationId.PONG:
      return { kind: 'pong' };
    default:
      return null;
  }
}
