/**
 * Decoded notification structures.
 */

export interface LocationUpdate {
  kind: 'location';

  /** Location id within the current piece */
  location: number;

  /** Road piece id */
  piece: number;

  /** Lateral offset from road center, in track units */
  offset: number;

  /** Measured speed */
  speed: number;

  clockwise: boolean;
}

export interface TransitionUpdate {
  kind: 'transition';
  piece: number;
  previousPiece: number;
  offset: number;
  direction: number;
}

export interface Pong {
  kind: 'pong';
}

export type Notification = LocationUpdate | TransitionUpdate | Pong;
