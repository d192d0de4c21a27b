/**
 * BLE protocol constants for Overdrive vehicles.
 */

export const SERVICE_UUID = 'be15beef-6186-407e-8381-0bd89c4d8df4';
export const READ_CHARACTERISTIC_UUID = 'be15bee0-6186-407e-8381-0bd89c4d8df4';
export const WRITE_CHARACTERISTIC_UUID = 'be15bee1-6186-407e-8381-0bd89c4d8df4';

// Handle range searched for both characteristics
export const HANDLE_RANGE_START = 0x0001;
export const HANDLE_RANGE_END = 0xffff;

export const SPEED_MIN = 0;
export const SPEED_MAX = 1000;

export const LANE_PITCH = 44.5; // track units between adjacent lanes

export const CLOCKWISE_FLAG = 0x47;
export const SET_SPEED_FLAG = 0x01;

export const MAX_FRAME_PAYLOAD = 0xff;

// Notification id sits right after the length byte
export const NOTIFICATION_ID_OFFSET = 1;
export const NOTIFICATION_PAYLOAD_OFFSET = 2;

/**
 * Command ids sent to the vehicle.
 */
export enum CommandId {
  DISCONNECT = 0x0d,
  PING = 0x16,
  SET_SPEED = 0x24,
  CHANGE_LANE = 0x25,
  SET_LANE_OFFSET = 0x2c,
  SDK_MODE = 0x90,
}

/**
 * Notification ids received from the vehicle.
 */
export enum NotificationId {
  PONG = 0x17,
  LOCATION_UPDATE = 0x27,
  TRANSITION_UPDATE = 0x29,
}
