/**
 * Replay specific types for cursor and playback operations.
 */

import type { DocumentObject } from './document';

/**
 * How indexed header paths (`signal[0]`, `signal.1`) become arrays.
 *
 * - `grouped`: indexed columns sharing a base path are collected first and
 *   emitted as one dense array, gaps filled with null
 * - `pointer`: every path is written directly, arrays padded as they grow,
 *   last write wins
 */
export type ArrayStrategy = 'grouped' | 'pointer';

export const ARRAY_STRATEGIES: readonly ArrayStrategy[] = ['grouped', 'pointer'];

export interface ReplayOptions {
  /** Wrap around to the first data row at end of file (default: false) */
  loop?: boolean;
  /** Array building strategy (default: 'grouped') */
  arrayStrategy?: ArrayStrategy;
}

/**
 * Handle passed to play() callbacks so an unbounded loop can be ended
 */
export interface PlayControl {
  stop: () => void;
  /** Documents delivered so far in this play() call, including the current one */
  readonly delivered: number;
}

/**
 * Callback for play() operations
 */
export type DocumentCallback = (document: DocumentObject, control: PlayControl) => void;

export type { DocumentObject };
