/**
 * BLE protocol command builders for Overdrive vehicles.
 *
 * Every builder returns a complete frame: a length byte followed by the
 * command payload. Multi-byte fields are little-endian.
 */

import { InvalidCommandError } from '../exceptions';
import {
  CommandId,
  LANE_PITCH,
  MAX_FRAME_PAYLOAD,
  SET_SPEED_FLAG,
  SPEED_MAX,
  SPEED_MIN,
} from './constants';

function assertSpeedValue(name: string, value: number): void {
  if (!Number.isInteger(value) || value < SPEED_MIN || value > SPEED_MAX) {
    throw new InvalidCommandError(
      `${name} must be an integer between ${SPEED_MIN} and ${SPEED_MAX}, got ${value}`
    );
  }
}

function assertOffset(offset: number): void {
  if (!Number.isFinite(offset)) {
    throw new InvalidCommandError(`Lane offset must be a finite number, got ${offset}`);
  }
}

/**
 * Prefix a command payload with its length byte.
 *
 * @param payload - Command id followed by its fields
 * @returns Frame: [length:1][payload]
 * @throws {InvalidCommandError} If the payload is empty or longer than 255 bytes
 */
export function frameCommand(payload: Uint8Array): Uint8Array {
  if (payload.length === 0 || payload.length > MAX_FRAME_PAYLOAD) {
    throw new InvalidCommandError(
      `Command payload must be 1-${MAX_FRAME_PAYLOAD} bytes, got ${payload.length}`
    );
  }

  const frame = new Uint8Array(1 + payload.length);
  frame[0] = payload.length;
  frame.set(payload, 1);
  return frame;
}

/**
 * Build set speed command.
 *
 * Format:
 *   [len:1][cmd:1][speed:2LE][accel:2LE][flag:1]
 *   - cmd: 0x24
 *   - flag: always 0x01
 */
export function buildSetSpeedCommand(speed: number, accel: number): Uint8Array {
  assertSpeedValue('Speed', speed);
  assertSpeedValue('Acceleration', accel);

  const buffer = new ArrayBuffer(6);
  const view = new DataView(buffer);
  view.setUint8(0, CommandId.SET_SPEED);
  view.setUint16(1, speed, true);
  view.setUint16(3, accel, true);
  view.setUint8(5, SET_SPEED_FLAG);
  return frameCommand(new Uint8Array(buffer));
}

/**
 * Build change lane command.
 *
 * Format:
 *   [len:1][cmd:1][speed:2LE][accel:2LE][offset:f32LE]
 *   - cmd: 0x25
 *   - offset: relative to the current lane, negative moves left
 */
export function buildChangeLaneCommand(
  speed: number,
  accel: number,
  offset: number
): Uint8Array {
  assertSpeedValue('Speed', speed);
  assertSpeedValue('Acceleration', accel);
  assertOffset(offset);

  const buffer = new ArrayBuffer(9);
  const view = new DataView(buffer);
  view.setUint8(0, CommandId.CHANGE_LANE);
  view.setUint16(1, speed, true);
  view.setUint16(3, accel, true);
  view.setFloat32(5, offset, true);
  return frameCommand(new Uint8Array(buffer));
}

/**
 * Build set lane offset command.
 *
 * Format:
 *   [len:1][cmd:1][offset:f32LE]
 *   - cmd: 0x2C
 */
export function buildSetLaneOffsetCommand(offset: number): Uint8Array {
  assertOffset(offset);

  const buffer = new ArrayBuffer(5);
  const view = new DataView(buffer);
  view.setUint8(0, CommandId.SET_LANE_OFFSET);
  view.setFloat32(1, offset, true);
  return frameCommand(new Uint8Array(buffer));
}

/**
 * Build the frame pair for a relative lane change.
 *
 * The firmware expects its lane offset to be reset before each relative move,
 * so a set-lane-offset(0.0) frame always precedes the change-lane frame.
 *
 * @returns Tuple of [resetFrame, changeLaneFrame]
 */
export function buildLaneChangeSequence(
  speed: number,
  accel: number,
  offset: number
): [Uint8Array, Uint8Array] {
  const changeLane = buildChangeLaneCommand(speed, accel, offset);
  return [buildSetLaneOffsetCommand(0.0), changeLane];
}

export function buildLaneChangeLeftSequence(
  speed: number,
  accel: number
): [Uint8Array, Uint8Array] {
  return buildLaneChangeSequence(speed, accel, -LANE_PITCH);
}

export function buildLaneChangeRightSequence(
  speed: number,
  accel: number
): [Uint8Array, Uint8Array] {
  return buildLaneChangeSequence(speed, accel, LANE_PITCH);
}

/**
 * Build command that switches the vehicle into SDK mode.
 *
 * @returns Frame bytes: 03 90 01 01
 */
export function buildSdkModeCommand(): Uint8Array {
  return frameCommand(new Uint8Array([CommandId.SDK_MODE, 0x01, 0x01]));
}

/**
 * @returns Frame bytes: 01 16
 */
export function buildPingCommand(): Uint8Array {
  return frameCommand(new Uint8Array([CommandId.PING]));
}

/**
 * Build command asking the vehicle to drop the link.
 *
 * @returns Frame bytes: 01 0D
 */
export function buildDisconnectCommand(): Uint8Array {
  return frameCommand(new Uint8Array([CommandId.DISCONNECT]));
}
