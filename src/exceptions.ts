/**
 * Exception classes for the Overdrive driver.
 */

export class OverdriveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OverdriveError';
  }
}

/**
 * Any transport-level failure: connect refused, characteristic missing,
 * write failed, notification wait failed.
 */
export class LinkError extends OverdriveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkError';
  }

  /**
   * Wrap an arbitrary transport failure, keeping LinkErrors as they are.
   */
  static from(error: unknown, context: string): LinkError {
    if (error instanceof LinkError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new LinkError(`${context}: ${detail}`, { cause: error });
  }
}

export class InvalidCommandError extends OverdriveError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCommandError';
  }
}

export type ConnectionPhase = 'connect' | 'reconnect';

/**
 * Thrown when disconnect() is called while a handshake is still being retried.
 */
export class ConnectionAbortedError extends OverdriveError {
  constructor(
    public readonly address: string,
    public readonly phase: ConnectionPhase
  ) {
    super(`Connection to ${address} aborted during ${phase}`);
    this.name = 'ConnectionAbortedError';
  }
}
