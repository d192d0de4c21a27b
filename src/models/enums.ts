/**
 * Enums for Overdrive session state.
 */

/**
 * Connection state of a vehicle session.
 */
export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  CONNECTED = 'connected',
  RECONNECTING = 'reconnecting',
}

/**
 * Delivery worker states.
 */
export enum WorkerState {
  RUNNING = 'running',
  RECONNECTING = 'reconnecting',
  STOPPED = 'stopped',
}
