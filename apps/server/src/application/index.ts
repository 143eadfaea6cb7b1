/**
 * Application layer exports
 * Queueing, loading and playback use cases
 */

export { TrackQueue } from './TrackQueue';
export { LoadRequestFactory } from './LoadRequest';
export type { LoadRequestCreateData } from './LoadRequest';
export { TrackLoader, DEFAULT_LOADER_OPTIONS } from './TrackLoader';
export type { TrackLoaderOptions } from './TrackLoader';
export { CollectionRateLimiter, DEFAULT_RATE_LIMIT_OPTIONS } from './RateLimiter';
export type { CollectionRateLimitOptions } from './RateLimiter';
export { PlaybackSession } from './PlaybackSession';
export { SessionRegistry } from './SessionRegistry';
export type { Session, SessionRegistryDependencies } from './SessionRegistry';
