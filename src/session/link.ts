/**
 * Handshake and framed I/O over one peripheral.
 *
 * A Link is used by exactly one owner at a time: the connecting caller until
 * the delivery worker starts, the worker afterwards.
 */

import { ConnectionAbortedError, LinkError, type ConnectionPhase } from '../exceptions';
import {
  buildDisconnectCommand,
  buildPingCommand,
  buildSdkModeCommand,
} from '../protocol/commands';
import {
  HANDLE_RANGE_END,
  HANDLE_RANGE_START,
  READ_CHARACTERISTIC_UUID,
  WRITE_CHARACTERISTIC_UUID,
} from '../protocol/constants';
import type { Peripheral } from '../transport/peripheral';
import { hex, type Logger } from '../utils/logger';
import type { NotificationDispatcher } from './dispatcher';

export interface LinkOptions {
  address: string;
  peripheral: Peripheral;
  dispatcher: NotificationDispatcher;
  handshakeTimeoutMs: number;
  logger: Logger;
}

export class Link {
  private readonly address: string;
  private readonly peripheral: Peripheral;
  private readonly dispatcher: NotificationDispatcher;
  private readonly handshakeTimeoutMs: number;
  private readonly logger: Logger;

  private writeHandle: number | null = null;
  private open = false;

  constructor(options: LinkOptions) {
    this.address = options.address;
    this.peripheral = options.peripheral;
    this.dispatcher = options.dispatcher;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs;
    this.logger = options.logger;
  }

  /**
   * True once the peripheral accepted a connection and until close().
   */
  get isOpen(): boolean {
    return this.open;
  }

  /**
   * Run one handshake: connect, discover, SDK mode, verified subscribe.
   *
   * The subscribe step repeats until a notification is observed.
   *
   * @param shouldContinue - Polled between steps; false aborts the handshake
   * @throws {LinkError} If any transport step fails
   * @throws {ConnectionAbortedError} If shouldContinue() turns false
   */
  async establish(shouldContinue: () => boolean, phase: ConnectionPhase): Promise<void> {
    this.ensureContinuing(shouldContinue, phase);
    this.writeHandle = null;

    await this.call('Connect failed', () => this.peripheral.connect(this.address));
    this.open = true;

    const range = { start: HANDLE_RANGE_START, end: HANDLE_RANGE_END };
    const readHandle = await this.call('Read characteristic discovery failed', () =>
      this.peripheral.discoverCharacteristic(range, READ_CHARACTERISTIC_UUID)
    );
    this.writeHandle = await this.call('Write characteristic discovery failed', () =>
      this.peripheral.discoverCharacteristic(range, WRITE_CHARACTERISTIC_UUID)
    );

    this.dispatcher.setHandle(readHandle);
    this.peripheral.setNotificationListener(this.dispatcher.listener);

    await this.write(buildSdkModeCommand());
    await this.enableNotify(readHandle, shouldContinue, phase);

    this.logger.info(`Handshake with ${this.address} complete`);
  }

  /**
   * Write a complete frame to the write characteristic.
   *
   * @throws {LinkError} If no link is established or the write fails
   */
  async write(frame: Uint8Array): Promise<void> {
    const handle = this.writeHandle;
    if (handle === null) {
      throw new LinkError('Write characteristic not discovered');
    }
    await this.call('Write failed', () => this.peripheral.writeCharacteristic(handle, frame));
    this.logger.debug(`TX ${hex(frame)}`);
  }

  /**
   * Give the peripheral a bounded window to deliver one notification.
   *
   * @throws {LinkError} On transport fault
   */
  poll(timeoutMs: number): Promise<boolean> {
    return this.call('Notification wait failed', () =>
      this.peripheral.waitForNotification(timeoutMs)
    );
  }

  /**
   * Send the disconnect frame and drop the link. Failures are logged only.
   */
  async close(): Promise<void> {
    if (!this.open) {
      return;
    }

    if (this.writeHandle !== null) {
      try {
        await this.write(buildDisconnectCommand());
      } catch (error) {
        this.logger.error(`Disconnect frame to ${this.address} failed`, error);
      }
    }

    try {
      await this.peripheral.disconnect();
    } catch (error) {
      this.logger.error(`Disconnect from ${this.address} failed`, error);
    } finally {
      this.peripheral.setNotificationListener(null);
      this.writeHandle = null;
      this.open = false;
    }
  }

  private async enableNotify(
    readHandle: number,
    shouldContinue: () => boolean,
    phase: ConnectionPhase
  ): Promise<void> {
    for (;;) {
      this.ensureContinuing(shouldContinue, phase);

      this.dispatcher.resetCounter();
      await this.call('Subscribe failed', () => this.peripheral.subscribe(readHandle));
      await this.write(buildPingCommand());
      await this.poll(this.handshakeTimeoutMs);

      if (this.dispatcher.notificationsReceived > 0) {
        return;
      }
      this.logger.error('Set notify failed');
    }
  }

  private ensureContinuing(shouldContinue: () => boolean, phase: ConnectionPhase): void {
    if (!shouldContinue()) {
      throw new ConnectionAbortedError(this.address, phase);
    }
  }

  private async call<T>(context: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw LinkError.from(error, context);
    }
  }
}
