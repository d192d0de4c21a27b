/**
 * Routes decoded notifications to the registered callbacks.
 */

import type { Notification } from '../models/notifications';
import { decodeNotification } from '../protocol/notifications';
import type { NotificationListener } from '../transport/peripheral';
import { hex, type Logger } from '../utils/logger';
import type { TaskRunner } from './task-runner';

export type LocationChangeCallback = (
  address: string,
  location: number,
  piece: number,
  speed: number,
  clockwise: boolean
) => void | Promise<void>;

export type TransitionCallback = (
  address: string,
  piece: number,
  previousPiece: number,
  offset: number,
  direction: number
) => void | Promise<void>;

export type PongCallback = (address: string) => void | Promise<void>;

export interface NotificationCallbacks {
  location: LocationChangeCallback | null;
  transition: TransitionCallback | null;
  pong: PongCallback | null;
}

/**
 * Decodes raw notifications for one vehicle and fans them out.
 *
 * Callbacks run on the task runner, so a slow or failing callback never
 * holds up the delivery worker that polled the notification.
 */
export class NotificationDispatcher {
  readonly callbacks: NotificationCallbacks = {
    location: null,
    transition: null,
    pong: null,
  };

  private handle: number | null = null;
  private received = 0;

  constructor(
    private readonly address: string,
    private readonly runner: TaskRunner,
    private readonly logger: Logger,
    private readonly onDecoded: (notification: Notification) => void
  ) {}

  /**
   * Listener to install on the peripheral.
   */
  readonly listener: NotificationListener = (handle, data) => {
    this.handleNotification(handle, data);
  };

  /**
   * Bind to the read characteristic of a fresh link.
   */
  setHandle(handle: number): void {
    this.handle = handle;
    this.received = 0;
  }

  resetCounter(): void {
    this.received = 0;
  }

  /**
   * Notifications seen on the bound handle since the last reset.
   */
  get notificationsReceived(): number {
    return this.received;
  }

  handleNotification(handle: number, data: Uint8Array): void {
    if (handle !== this.handle) {
      return;
    }
    this.received++;

    const notification = decodeNotification(data);
    if (!notification) {
      this.logger.debug(`Ignoring notification: ${hex(data)}`);
      return;
    }

    this.onDecoded(notification);
    this.dispatch(notification);
  }

  private dispatch(notification: Notification): void {
    const address = this.address;

    switch (notification.kind) {
      case 'location': {
        const callback = this.callbacks.location;
        if (callback) {
          const { location, piece, speed, clockwise } = notification;
          this.runner.spawn('location', () =>
            callback(address, location, piece, speed, clockwise)
          );
        }
        break;
      }
      case 'transition': {
        const callback = this.callbacks.transition;
        if (callback) {
          const { piece, previousPiece, offset, direction } = notification;
          this.runner.spawn('transition', () =>
            callback(address, piece, previousPiece, offset, direction)
          );
        }
        break;
      }
      case 'pong': {
        const callback = this.callbacks.pong;
        if (callback) {
          this.runner.spawn('pong', () => callback(address));
        }
        break;
      }
    }
  }
}
