/**
 * Track loading domain exports
 */

export type {
  FailureSeverity,
  LoadOutcome,
  LoadFailure,
  CollectionMetadata,
  LoadRequest,
  LoaderState,
  LoaderStats
} from './types';

export type {
  IResolver,
  ICollectionImporter,
  IRateLimiter,
  IReplySink,
  IPlaybackController,
  ITrackLoader
} from './interfaces';

export { LoadMessages } from './messages';
