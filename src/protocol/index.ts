/**
 * Protocol layer exports for Overdrive BLE communication.
 */

export * from './constants';
export * from './commands';
export * from './notifications';
