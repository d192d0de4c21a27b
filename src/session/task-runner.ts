/**
 * Bounded runner for notification callbacks.
 *
 * Each task starts on a later macrotask, never inline with the caller. At most
 * `maxConcurrent` tasks are in progress at once; the rest wait in FIFO order.
 */

import type { Logger } from '../utils/logger';

export type Task = () => void | Promise<void>;

interface QueuedTask {
  label: string;
  task: Task;
}

export class TaskRunner {
  private backlog: QueuedTask[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly maxConcurrent: number,
    private readonly logger: Logger
  ) {}

  /**
   * Schedule a task. Faults are logged under `label` and never rethrown.
   */
  spawn(label: string, task: Task): void {
    this.backlog.push({ label, task });
    setImmediate(() => this.drain());
  }

  /**
   * Number of tasks started but not yet settled.
   */
  get active(): number {
    return this.running;
  }

  /**
   * Number of tasks waiting for a free slot.
   */
  get pending(): number {
    return this.backlog.length;
  }

  /**
   * Resolve once every scheduled task has settled.
   */
  idle(): Promise<void> {
    if (this.running === 0 && this.backlog.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.running < this.maxConcurrent) {
      const next = this.backlog.shift();
      if (!next) {
        break;
      }
      this.running++;
      void this.execute(next).finally(() => {
        this.running--;
        if (this.backlog.length > 0) {
          setImmediate(() => this.drain());
        } else if (this.running === 0) {
          this.notifyIdle();
        }
      });
    }
  }

  private async execute({ label, task }: QueuedTask): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.logger.error(`${label} callback failed`, error);
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
