/**
 * FIFO of framed commands waiting for the delivery worker.
 *
 * Callers push from anywhere; only the worker shifts. Shifting never waits:
 * an empty queue is the common case between commands.
 */
export class CommandQueue {
  private frames: Uint8Array[] = [];

  push(frame: Uint8Array): void {
    this.frames.push(frame);
  }

  /**
   * Remove and return the oldest frame, if any.
   */
  tryShift(): Uint8Array | undefined {
    return this.frames.shift();
  }

  /**
   * Get the number of queued frames.
   */
  get size(): number {
    return this.frames.length;
  }
}
