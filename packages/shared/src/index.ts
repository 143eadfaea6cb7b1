/**
 * Shared types and contracts for the trackline scheduler
 *
 * Core domain value objects, validation and error details used by the queue,
 * the loading pipeline and the outer surfaces.
 */

// Domain entities and value objects
export type { Track, TrackCreateData, TrackError } from './domain/Track';
export { TrackValidator } from './domain/Track';

export type { User } from './domain/QueueEntry';
export { QueueEntry } from './domain/QueueEntry';

// Queue modes and rate data
export type { RepeatMode, UserRateData, RequestRecord } from './domain/QueueState';
export { REPEAT_MODES, isRepeatMode } from './domain/QueueState';

// Error types and utilities
export type {
  QueueError,
  RateLimitError,
  LoadRequestError,
  ErrorDetails
} from './domain/errors';
export { ErrorFactory } from './domain/errors';

// Ordering and text utilities
export { RANK_MAX, RANK_MIN, randomRank, spreadRank, compareRanks } from './utils/rank';
export { nextEntryId } from './utils/ids';
export { escapeMarkdown, defuseMentions, escapeAndDefuse } from './utils/text';

// Utility types
export type { Result } from './domain/Track';
