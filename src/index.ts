/**
 * overdrive-ble - TypeScript driver for Overdrive BLE vehicles
 *
 * Main entry point exporting the public API.
 */

// Core vehicle API
export { Vehicle, type VehicleOptions, type StateChangeCallback } from './vehicle';
export type {
  LocationChangeCallback,
  TransitionCallback,
  PongCallback,
} from './session/dispatcher';

// Transport
export type { Peripheral, HandleRange, NotificationListener } from './transport/peripheral';
export { NoblePeripheral, type NoblePeripheralOptions } from './transport/noble-peripheral';

// Protocol and models
export * from './protocol';
export * from './models';

// Logging
export { createLogger, LogLevel, type Logger } from './utils/logger';

// Exceptions
export * from './exceptions';
