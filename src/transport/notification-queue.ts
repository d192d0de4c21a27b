/**
 * Notification queue for BLE characteristic data.
 *
 * Node BLE stacks deliver notifications as events at arbitrary times.
 * This queue buffers them until the session polls, so the session's
 * listener only ever runs inside waitForNotification().
 */

import { LinkError } from '../exceptions';

export interface QueuedNotification {
  handle: number;
  data: Uint8Array;
}

interface PendingResolver {
  resolve: (entry: QueuedNotification | null) => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout;
}

/**
 * Queue for managing BLE notifications.
 *
 * - Buffers notifications that arrive before being requested
 * - Queues requests that wait for future notifications
 * - Resolves a waiting request with null when its timeout expires
 */
export class NotificationQueue {
  private queue: QueuedNotification[] = [];
  private pendingResolvers: PendingResolver[] = [];

  /**
   * Add a notification to the queue.
   *
   * If there are pending consumers waiting, immediately resolve the oldest one.
   * Otherwise, buffer the notification for future consumption.
   */
  enqueue(entry: QueuedNotification): void {
    const pending = this.pendingResolvers.shift();
    if (pending) {
      clearTimeout(pending.timeoutId);
      pending.resolve(entry);
    } else {
      this.queue.push(entry);
    }
  }

  /**
   * Get the next notification from the queue.
   *
   * @param timeoutMs - Maximum time to wait in milliseconds
   * @returns The notification, or null if none arrived in time
   */
  async dequeue(timeoutMs: number): Promise<QueuedNotification | null> {
    const buffered = this.queue.shift();
    if (buffered) {
      return buffered;
    }

    return new Promise<QueuedNotification | null>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        const index = this.pendingResolvers.findIndex((p) => p.resolve === resolve);
        if (index !== -1) {
          this.pendingResolvers.splice(index, 1);
          resolve(null);
        }
      }, timeoutMs);

      this.pendingResolvers.push({ resolve, reject, timeoutId });
    });
  }

  /**
   * Clear the queue and reject all pending requests.
   *
   * @param reason - Reason for clearing (default: "Connection closed")
   */
  clear(reason: string = 'Connection closed'): void {
    this.queue = [];

    for (const pending of this.pendingResolvers) {
      clearTimeout(pending.timeoutId);
      pending.reject(new LinkError(reason));
    }

    this.pendingResolvers = [];
  }

  /**
   * Get the number of buffered notifications.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Get the number of pending consumers waiting for notifications.
   */
  get pendingCount(): number {
    return this.pendingResolvers.length;
  }
}
