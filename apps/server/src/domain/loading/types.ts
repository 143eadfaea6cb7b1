/**
 * Core types for the track loading pipeline
 */

import { Track, User } from '@trackline/shared';
import type { IReplySink } from './interfaces';

/**
 * How bad a resolution failure is.
 * COMMON failures are the user's to fix and are shown verbatim; the others
 * are unexpected and go to the operator log.
 */
export type FailureSeverity = 'COMMON' | 'SUSPICIOUS' | 'FAULT';

/**
 * The four ways a resolution can end
 */
export type LoadOutcome =
  | { readonly type: 'TRACK_LOADED'; readonly track: Track }
  | { readonly type: 'PLAYLIST_LOADED'; readonly name: string; readonly tracks: readonly Track[] }
  | { readonly type: 'NO_MATCHES' }
  | {
      readonly type: 'LOAD_FAILED';
      readonly severity: FailureSeverity;
      readonly message: string;
      readonly cause?: unknown;
    };

export type LoadFailure = Extract<LoadOutcome, { type: 'LOAD_FAILED' }>;

/**
 * What an importer knows about a collection before loading it
 */
export interface CollectionMetadata {
  readonly name: string;
  readonly totalTracks: number;
}

/**
 * One pending resolution. Immutable; consumed exactly once by the loader.
 */
export interface LoadRequest {
  readonly identifier: string;
  readonly requester: User;
  readonly isPriority: boolean;
  readonly isQuiet: boolean;
  readonly positionMs: number;
  readonly sink: IReplySink;
}

export type LoaderState = 'idle' | 'resolving';

export interface LoaderStats {
  readonly state: LoaderState;
  readonly pending: number;
  readonly tracksLoaded: number;
  readonly loadsFailed: number;
  readonly rateLimited: number;
  readonly capacityRejected: number;
}
