/**
 * Ports consumed by the track loading pipeline
 */

import { Result, RateLimitError, User } from '@trackline/shared';
import { CollectionMetadata, LoadOutcome, LoadRequest, LoaderState, LoaderStats } from './types';

/**
 * Turns an identifier (URL, search term, playlist id) into playable tracks.
 * The returned promise settles exactly once per call.
 */
export interface IResolver {
  resolve(identifier: string): Promise<LoadOutcome>;
}

/**
 * Source of metadata for collections that are slow to load
 */
export interface ICollectionImporter {
  getCollectionMetadata(identifier: string): Promise<CollectionMetadata | null>;
}

export interface IRateLimiter {
  /**
   * Metadata of the collection behind `identifier`, or null when it is not a
   * slow-loading collection
   */
  collectionMetadata(identifier: string): Promise<CollectionMetadata | null>;

  /**
   * Whether the requester must be refused this collection. A load that is
   * allowed is counted against the requester.
   */
  isRateLimited(request: LoadRequest, collection: CollectionMetadata, itemCount: number): boolean;

  /** Milliseconds until the requester's window frees up again */
  getTimeUntilReset(user: User): number;
}

/**
 * Where notices for one request go. Delivery is fire-and-forget.
 */
export interface IReplySink {
  reply(text: string): void | Promise<void>;
  replyWithRequesterName(text: string): void | Promise<void>;
}

/**
 * The parts of a player the loader looks at after changing the queue
 */
export interface IPlaybackController {
  readonly isPlaying: boolean;
  readonly isPaused: boolean;
  /** Queued entries plus the one playing, if any */
  readonly trackCount: number;
  play(): Promise<void>;
}

export interface ITrackLoader {
  submit(request: LoadRequest): Promise<Result<void, RateLimitError>>;
  getState(): LoaderState;
  getStats(): LoaderStats;
  whenIdle(): Promise<void>;
  close(): void;
}
