/**
 * Main Overdrive vehicle session class.
 */

import { ConnectionAbortedError } from './exceptions';
import { ConnectionState, WorkerState } from './models/enums';
import type { Notification } from './models/notifications';
import {
  buildLaneChangeLeftSequence,
  buildLaneChangeRightSequence,
  buildLaneChangeSequence,
  buildPingCommand,
  buildSetLaneOffsetCommand,
  buildSetSpeedCommand,
  frameCommand,
} from './protocol/commands';
import {
  NotificationDispatcher,
  type LocationChangeCallback,
  type PongCallback,
  type TransitionCallback,
} from './session/dispatcher';
import { DeliveryWorker } from './session/delivery-worker';
import { Link } from './session/link';
import { TaskRunner } from './session/task-runner';
import { CommandQueue } from './transport/command-queue';
import type { Peripheral } from './transport/peripheral';
import { createLogger, hex, type Logger } from './utils/logger';
import { sleep } from './utils/sleep';

export type StateChangeCallback = (
  address: string,
  state: ConnectionState,
  previous: ConnectionState
) => void | Promise<void>;

export interface VehicleOptions {
  /**
   * Transport used to reach the vehicle
   */
  peripheral: Peripheral;

  /**
   * Time allowed for the first notification after subscribing (default: 3000)
   */
  handshakeTimeoutMs?: number;

  /**
   * Notification wait per idle worker iteration (default: 1)
   */
  pollIntervalMs?: number;

  /**
   * Pause between failed handshake attempts (default: 500)
   */
  reconnectDelayMs?: number;

  /**
   * Callbacks allowed to run at the same time (default: 16)
   */
  maxConcurrentCallbacks?: number;

  logger?: Logger;
}

function validateDuration(name: string, value: number, allowZero: boolean): number {
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new RangeError(
      `${name} must be a ${allowZero ? 'non-negative' : 'positive'} finite number, got ${value}`
    );
  }
  return value;
}

const WORKER_TO_CONNECTION: Record<WorkerState, ConnectionState> = {
  [WorkerState.RUNNING]: ConnectionState.CONNECTED,
  [WorkerState.RECONNECTING]: ConnectionState.RECONNECTING,
  [WorkerState.STOPPED]: ConnectionState.DISCONNECTED,
};

/**
 * Overdrive vehicle reachable over BLE.
 *
 * Motion commands are encoded and queued immediately; a single background
 * worker writes them in order and polls for telemetry, reconnecting on its
 * own whenever the link drops.
 *
 * @example
 * ```typescript
 * const car = new Vehicle('e6:d8:52:f1:d9:43', { peripheral: new NoblePeripheral() });
 * car.setLocationChangeCallback((addr, location, piece) => {
 *   console.log(`${addr}: piece=${piece} location=${location}`);
 * });
 * await car.connect();
 * car.changeSpeed(500, 1000);
 * car.changeLaneRight(1000, 1000);
 * ```
 */
export class Vehicle {
  static readonly DEFAULT_HANDSHAKE_TIMEOUT = 3000;
  static readonly DEFAULT_POLL_INTERVAL = 1;
  static readonly DEFAULT_RECONNECT_DELAY = 500;
  static readonly DEFAULT_MAX_CONCURRENT_CALLBACKS = 16;

  readonly address: string;

  private readonly queue = new CommandQueue();
  private readonly logger: Logger;
  private readonly runner: TaskRunner;
  private readonly dispatcher: NotificationDispatcher;
  private readonly link: Link;
  private readonly pollIntervalMs: number;
  private readonly reconnectDelayMs: number;

  private worker: DeliveryWorker | null = null;
  private workerDone: Promise<void> | null = null;
  private connecting: Promise<void> | null = null;
  private active = false;
  // Set by connect() and cleared by disconnect(), even while a teardown is pending
  private wanted = false;
  private _state = ConnectionState.DISCONNECTED;
  private stateChangeCallback: StateChangeCallback | null = null;

  private _speed = 0;
  private _location = 0;
  private _piece = 0;
  private _clockwise = false;

  /**
   * Create a session for one vehicle. No I/O happens until connect().
   *
   * @param address - Transport address of the vehicle
   * @throws {RangeError} If a timing option is out of range
   */
  constructor(address: string, options: VehicleOptions) {
    this.address = address;
    this.logger = options.logger ?? createLogger(address);

    const handshakeTimeoutMs = validateDuration(
      'handshakeTimeoutMs',
      options.handshakeTimeoutMs ?? Vehicle.DEFAULT_HANDSHAKE_TIMEOUT,
      false
    );
    this.pollIntervalMs = validateDuration(
      'pollIntervalMs',
      options.pollIntervalMs ?? Vehicle.DEFAULT_POLL_INTERVAL,
      false
    );
    this.reconnectDelayMs = validateDuration(
      'reconnectDelayMs',
      options.reconnectDelayMs ?? Vehicle.DEFAULT_RECONNECT_DELAY,
      true
    );
    const maxConcurrentCallbacks =
      options.maxConcurrentCallbacks ?? Vehicle.DEFAULT_MAX_CONCURRENT_CALLBACKS;
    if (!Number.isInteger(maxConcurrentCallbacks) || maxConcurrentCallbacks < 1) {
      throw new RangeError(
        `maxConcurrentCallbacks must be a positive integer, got ${maxConcurrentCallbacks}`
      );
    }

    this.runner = new TaskRunner(maxConcurrentCallbacks, this.logger);
    this.dispatcher = new NotificationDispatcher(address, this.runner, this.logger, (n) =>
      this.recordTelemetry(n)
    );
    this.link = new Link({
      address,
      peripheral: options.peripheral,
      dispatcher: this.dispatcher,
      handshakeTimeoutMs,
      logger: this.logger,
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === ConnectionState.CONNECTED;
  }

  /**
   * Last speed reported by the vehicle, or last commanded if none reported yet.
   */
  get speed(): number {
    return this._speed;
  }

  get location(): number {
    return this._location;
  }

  get piece(): number {
    return this._piece;
  }

  get clockwise(): boolean {
    return this._clockwise;
  }

  /**
   * Notifications received since the last subscribe attempt.
   */
  get notificationsReceived(): number {
    return this.dispatcher.notificationsReceived;
  }

  get pendingCommands(): number {
    return this.queue.size;
  }

  /**
   * Connect to the vehicle, retrying the handshake until it succeeds.
   *
   * Resolves once the first handshake completes and the delivery worker has
   * started. There is no timeout: an unreachable vehicle keeps this pending
   * until disconnect() is called.
   *
   * @throws {ConnectionAbortedError} If disconnect() is called before success
   */
  connect(): Promise<void> {
    if (this.worker && this.active) {
      return Promise.resolve();
    }
    this.wanted = true;
    if (!this.connecting) {
      const teardown = this.workerDone;
      this.connecting = (async () => {
        // A worker from the previous connection may still be closing the link
        if (teardown) {
          await teardown;
        }
        if (!this.wanted) {
          throw new ConnectionAbortedError(this.address, 'connect');
        }
        this.active = true;
        await this.establishInitialLink();
      })().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Disconnect from the vehicle.
   *
   * With a running worker this only marks the session for teardown; the worker
   * sends the disconnect frame and closes the link on its way out. Resolves
   * once the link is closed. Queued commands are kept for the next connect().
   */
  async disconnect(): Promise<void> {
    this.wanted = false;
    this.active = false;

    const workerDone = this.workerDone;
    const connecting = this.connecting;
    if (workerDone) {
      await workerDone;
    }
    if (connecting) {
      // The connect() caller receives the abort error
      await Promise.allSettled([connecting]);
    }
    if (workerDone || connecting) {
      return;
    }
    if (this.link.isOpen) {
      await this.link.close();
    }
    this.setState(ConnectionState.DISCONNECTED);
  }

  /**
   * Change speed.
   *
   * @param speed - Desired speed (0-1000)
   * @param accel - Desired acceleration (0-1000)
   * @throws {InvalidCommandError} If either value is out of range
   */
  changeSpeed(speed: number, accel: number): void {
    this.enqueue(buildSetSpeedCommand(speed, accel));
    this._speed = speed;
  }

  /**
   * Switch to the adjacent left lane.
   */
  changeLaneLeft(speed: number, accel: number): void {
    this.enqueue(...buildLaneChangeLeftSequence(speed, accel));
  }

  /**
   * Switch to the adjacent right lane.
   */
  changeLaneRight(speed: number, accel: number): void {
    this.enqueue(...buildLaneChangeRightSequence(speed, accel));
  }

  /**
   * Move laterally by `offset` track units from the current lane.
   *
   * The vehicle's lane offset is reset to 0.0 first, then the lane change is
   * queued. Negative offsets move left.
   *
   * @throws {InvalidCommandError} If speed, accel or offset is invalid
   */
  changeLane(speed: number, accel: number, offset: number): void {
    this.enqueue(...buildLaneChangeSequence(speed, accel, offset));
  }

  /**
   * Set the vehicle's internal lane offset.
   */
  setLane(offset: number): void {
    this.enqueue(buildSetLaneOffsetCommand(offset));
  }

  ping(): void {
    this.enqueue(buildPingCommand());
  }

  /**
   * Queue a raw command. The length byte is added here.
   *
   * @param payload - Command id followed by its fields
   */
  sendCommand(payload: Uint8Array): void {
    this.enqueue(frameCommand(payload));
  }

  setLocationChangeCallback(callback: LocationChangeCallback | null): void {
    this.dispatcher.callbacks.location = callback;
  }

  setTransitionCallback(callback: TransitionCallback | null): void {
    this.dispatcher.callbacks.transition = callback;
  }

  setPongCallback(callback: PongCallback | null): void {
    this.dispatcher.callbacks.pong = callback;
  }

  setStateChangeCallback(callback: StateChangeCallback | null): void {
    this.stateChangeCallback = callback;
  }

  private async establishInitialLink(): Promise<void> {
    const isActive = () => this.active;

    for (;;) {
      try {
        await this.link.establish(isActive, 'connect');
        break;
      } catch (error) {
        if (error instanceof ConnectionAbortedError) {
          await this.link.close();
          throw error;
        }
        this.logger.error(`Connect to ${this.address} failed`, error);
        await sleep(this.reconnectDelayMs);
      }
    }

    // disconnect() may have landed while the last handshake step was pending
    if (!this.active) {
      await this.link.close();
      throw new ConnectionAbortedError(this.address, 'connect');
    }

    this.startWorker();
  }

  private startWorker(): void {
    const worker = new DeliveryWorker({
      address: this.address,
      link: this.link,
      queue: this.queue,
      isActive: () => this.active,
      pollIntervalMs: this.pollIntervalMs,
      reconnectDelayMs: this.reconnectDelayMs,
      logger: this.logger,
      onStateChange: (state) => this.setState(WORKER_TO_CONNECTION[state]),
    });

    this.worker = worker;
    this.setState(ConnectionState.CONNECTED);
    this.workerDone = worker.run().finally(() => {
      this.worker = null;
      this.workerDone = null;
    });
  }

  private enqueue(...frames: Uint8Array[]): void {
    for (const frame of frames) {
      this.queue.push(frame);
      this.logger.debug(`Queued ${hex(frame)}`);
    }
  }

  private recordTelemetry(notification: Notification): void {
    switch (notification.kind) {
      case 'location':
        this._location = notification.location;
        this._piece = notification.piece;
        this._speed = notification.speed;
        this._clockwise = notification.clockwise;
        break;
      case 'transition':
        this._piece = notification.piece;
        break;
      case 'pong':
        break;
    }
  }

  private setState(state: ConnectionState): void {
    const previous = this._state;
    if (previous === state) {
      return;
    }
    this._state = state;
    this.logger.info(`State ${previous} -> ${state}`);

    const callback = this.stateChangeCallback;
    if (callback) {
      this.runner.spawn('state change', () => callback(this.address, state, previous));
    }
  }
}
