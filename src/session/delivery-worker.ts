/**
 * Background loop that owns the link once a session is connected.
 *
 * Each iteration either writes one queued frame or, when the queue is empty,
 * polls briefly for a notification. Any link failure switches the loop into
 * reconnecting, where the handshake is retried until it succeeds and the frame
 * that was in flight is written again before normal service resumes.
 */

import { ConnectionAbortedError } from '../exceptions';
import { WorkerState } from '../models/enums';
import type { CommandQueue } from '../transport/command-queue';
import { hex, type Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import type { Link } from './link';

export interface DeliveryWorkerOptions {
  address: string;
  link: Link;
  queue: CommandQueue;

  /**
   * Polled every iteration; the loop exits once it returns false.
   */
  isActive: () => boolean;

  pollIntervalMs: number;
  reconnectDelayMs: number;
  logger: Logger;
  onStateChange: (state: WorkerState) => void;
}

export class DeliveryWorker {
  private _state = WorkerState.RUNNING;
  private inFlight: Uint8Array | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly options: DeliveryWorkerOptions) {}

  get state(): WorkerState {
    return this._state;
  }

  /**
   * Frame awaiting redelivery after a failed write, if any.
   */
  get pendingRedelivery(): Uint8Array | null {
    return this.inFlight;
  }

  /**
   * Start the loop. Resolves after the final disconnect once the session
   * stops being active. Calling again returns the same promise.
   */
  run(): Promise<void> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  private async loop(): Promise<void> {
    const { link, queue, isActive, pollIntervalMs, logger } = this.options;

    while (isActive()) {
      if (this._state === WorkerState.RECONNECTING) {
        await this.reconnect();
        continue;
      }

      const frame = queue.tryShift();
      if (frame) {
        this.inFlight = frame;
        try {
          await link.write(frame);
          this.inFlight = null;
        } catch (error) {
          this.fail(error);
        }
      } else {
        try {
          await link.poll(pollIntervalMs);
        } catch (error) {
          this.fail(error);
        }
      }
    }

    if (this.inFlight) {
      logger.info(`Dropping undelivered frame ${hex(this.inFlight)} on disconnect`);
      this.inFlight = null;
    }
    await link.close();
    this.setState(WorkerState.STOPPED);
  }

  private async reconnect(): Promise<void> {
    const { address, link, isActive, reconnectDelayMs, logger } = this.options;

    try {
      await link.establish(isActive, 'reconnect');
      if (this.inFlight) {
        logger.info(`Redelivering ${hex(this.inFlight)}`);
        await link.write(this.inFlight);
        this.inFlight = null;
      }
      this.setState(WorkerState.RUNNING);
    } catch (error) {
      if (error instanceof ConnectionAbortedError) {
        return;
      }
      logger.error(`Reconnect to ${address} failed`, error);
      await sleep(reconnectDelayMs);
    }
  }

  private fail(error: unknown): void {
    this.options.logger.error(`Link to ${this.options.address} lost`, error);
    this.setState(WorkerState.RECONNECTING);
  }

  private setState(state: WorkerState): void {
    if (this._state === state) {
      return;
    }
    this._state = state;
    this.options.onStateChange(state);
  }
}
