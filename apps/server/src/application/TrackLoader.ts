import { QueueEntry, RateLimitError, Result, Track } from '@trackline/shared';
import { ITrackQueue } from '../domain/queue';
import {
  IPlaybackController,
  IRateLimiter,
  IResolver,
  ITrackLoader,
  CollectionMetadata,
  LoadFailure,
  LoadOutcome,
  LoadRequest,
  LoaderState,
  LoaderStats,
  LoadMessages
} from '../domain/loading';
import { createLogger, Logger } from '../infrastructure/logging';

export interface TrackLoaderOptions {
  /** Queued plus playing tracks a session may hold */
  queueTrackLimit: number;
  /** Collections with more items than this are announced before loading */
  announceThreshold: number;
  /** Reply with an upstream-blocking notice instead of the generic apology */
  showUpstreamBlockWarning: boolean;
}

export const DEFAULT_LOADER_OPTIONS: TrackLoaderOptions = {
  queueTrackLimit: 10000,
  announceThreshold: 50,
  showUpstreamBlockWarning: false
};

function toFault(error: unknown): LoadFailure {
  return {
    type: 'LOAD_FAILED',
    severity: 'FAULT',
    message: error instanceof Error ? error.message : String(error),
    cause: error
  };
}

/**
 * Serialises load requests so that at most one resolution is in flight.
 *
 * Admission runs one request at a time in submission order, and only an
 * admitted request is appended to `pending`. The drain loop started by the
 * first admission while idle is the only consumer and the only writer of
 * `state`.
 */
export class TrackLoader implements ITrackLoader {
  private readonly pending: LoadRequest[] = [];
  private readonly options: TrackLoaderOptions;
  private readonly log: Logger;
  private state: LoaderState = 'idle';
  private worker: Promise<void> = Promise.resolve();
  private admission: Promise<void> = Promise.resolve();
  private closed = false;

  private tracksLoaded = 0;
  private loadsFailed = 0;
  private rateLimited = 0;
  private capacityRejected = 0;

  constructor(
    private readonly queue: ITrackQueue,
    private readonly player: IPlaybackController,
    private readonly resolver: IResolver,
    private readonly rateLimiter: IRateLimiter,
    options: Partial<TrackLoaderOptions> = {},
    logger?: Logger
  ) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, ...options };
    this.log = logger ?? createLogger('loader');
  }

  /**
   * Queue a request for resolution. Slow collections are checked against the
   * rate limiter first; a refused request never reaches the pipeline. A
   * request waits for every earlier one to be admitted or refused, so slow
   * collection lookups never reorder submissions.
   */
  submit(request: LoadRequest): Promise<Result<void, RateLimitError>> {
    const turn = this.admission.then(async (): Promise<Result<void, RateLimitError>> => {
      if (!(await this.admit(request))) {
        this.rateLimited++;
        return { success: false, error: 'RATE_LIMIT_EXCEEDED' };
      }
      this.enqueue(request);
      return { success: true, value: undefined };
    });
    this.admission = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  /**
   * Drop pending requests and ignore new ones. A resolution already in
   * flight runs to completion but its outcome is discarded.
   */
  close(): void {
    this.closed = true;
    this.pending.length = 0;
  }

  getState(): LoaderState {
    return this.state;
  }

  getStats(): LoaderStats {
    return {
      state: this.state,
      pending: this.pending.length,
      tracksLoaded: this.tracksLoaded,
      loadsFailed: this.loadsFailed,
      rateLimited: this.rateLimited,
      capacityRejected: this.capacityRejected
    };
  }

  /**
   * Resolves once the pipeline has nothing left to do
   */
  async whenIdle(): Promise<void> {
    await this.admission;
    while (this.state !== 'idle') {
      await this.worker;
    }
  }

  private enqueue(request: LoadRequest): void {
    if (this.closed) {
      this.log.info({ identifier: request.identifier }, 'Dropped a load for a closed session');
      return;
    }
    this.pending.push(request);
    if (this.state === 'idle') {
      this.state = 'resolving';
      this.worker = this.drain();
    }
  }

  private async admit(request: LoadRequest): Promise<boolean> {
    let collection: CollectionMetadata | null;
    try {
      collection = await this.rateLimiter.collectionMetadata(request.identifier);
    } catch (error) {
      this.log.warn(
        { err: error, identifier: request.identifier },
        'Collection lookup failed, loading without rate limit check'
      );
      return true;
    }

    if (collection === null) {
      return true;
    }

    if (this.rateLimiter.isRateLimited(request, collection, collection.totalTracks)) {
      const waitMs = this.rateLimiter.getTimeUntilReset(request.requester);
      this.deliver(request, LoadMessages.rateLimited(waitMs), true);
      return false;
    }

    if (collection.totalTracks > this.options.announceThreshold) {
      this.deliver(request, LoadMessages.announcePlaylist(collection.name, collection.totalTracks), true);
    }
    return true;
  }

  private async drain(): Promise<void> {
    try {
      for (let request = this.pending.shift(); request !== undefined; request = this.pending.shift()) {
        try {
          await this.process(request);
        } catch (error) {
          this.log.error({ err: error, identifier: request.identifier }, 'Error while loading a track');
        }
      }
    } finally {
      this.state = 'idle';
    }
  }

  private async process(request: LoadRequest): Promise<void> {
    try {
      if (this.player.trackCount >= this.options.queueTrackLimit) {
        this.capacityRejected++;
        this.deliver(request, LoadMessages.queueLimitReached(this.options.queueTrackLimit), true);
        return;
      }

      const outcome = await this.resolve(request.identifier);
      if (this.closed) {
        this.log.debug({ identifier: request.identifier }, 'Discarded a load resolved after close');
        return;
      }
      await this.handleOutcome(request, outcome);
    } catch (error) {
      this.handleFailure(request, toFault(error));
    }
  }

  private async resolve(identifier: string): Promise<LoadOutcome> {
    try {
      return await this.resolver.resolve(identifier);
    } catch (error) {
      return toFault(error);
    }
  }

  private async handleOutcome(request: LoadRequest, outcome: LoadOutcome): Promise<void> {
    switch (outcome.type) {
      case 'TRACK_LOADED':
        return this.trackLoaded(request, outcome.track);
      case 'PLAYLIST_LOADED':
        return this.playlistLoaded(request, outcome.name, outcome.tracks);
      case 'NO_MATCHES':
        this.deliver(request, LoadMessages.noMatches(request.identifier));
        return;
      case 'LOAD_FAILED':
        this.handleFailure(request, outcome);
        return;
      default: {
        const unhandled: never = outcome;
        throw new Error(`Unknown load outcome: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async trackLoaded(request: LoadRequest, track: Track): Promise<void> {
    const notice = !this.player.isPlaying
      ? LoadMessages.trackPlaying(track.title)
      : request.isPriority
        ? LoadMessages.trackQueuedFirst(track.title)
        : LoadMessages.trackQueued(track.title);

    const entry = new QueueEntry(track, request.requester, request.isPriority, request.positionMs);
    if (request.isPriority) {
      this.queue.addFirst(entry);
    } else {
      this.queue.add(entry);
    }
    this.tracksLoaded++;

    this.notifySuccess(request, notice);
    await this.startPlayback();
  }

  private async playlistLoaded(request: LoadRequest, name: string, tracks: readonly Track[]): Promise<void> {
    const limit = this.options.queueTrackLimit;
    if (this.player.trackCount + tracks.length > limit) {
      this.capacityRejected++;
      this.deliver(request, LoadMessages.playlistTooLarge(tracks.length, limit), true);
      return;
    }

    const entries = tracks.map((track) => new QueueEntry(track, request.requester, request.isPriority));
    if (request.isPriority) {
      this.queue.addAllFirst(entries);
    } else {
      this.queue.addAll(entries);
    }
    this.tracksLoaded += entries.length;

    this.notifySuccess(request, LoadMessages.playlistQueued(entries.length, name));
    await this.startPlayback();
  }

  private notifySuccess(request: LoadRequest, notice: string): void {
    if (request.isQuiet) {
      this.log.info({ identifier: request.identifier, requester: request.requester.id }, 'Quietly loaded');
      return;
    }
    this.deliver(request, notice);
  }

  private async startPlayback(): Promise<void> {
    if (!this.player.isPaused) {
      await this.player.play();
    }
  }

  private handleFailure(request: LoadRequest, failure: LoadFailure): void {
    this.loadsFailed++;

    if (failure.severity === 'COMMON') {
      this.log.debug({ identifier: request.identifier, reason: failure.message }, 'Common load failure');
      this.deliver(request, LoadMessages.commonError(request.identifier, failure.message));
      return;
    }

    this.log.error(
      {
        err: failure.cause ?? new Error(failure.message),
        identifier: request.identifier,
        requester: request.requester.id,
        severity: failure.severity
      },
      'Failed to load a track'
    );

    const notice = this.options.showUpstreamBlockWarning
      ? LoadMessages.upstreamBlocked(request.identifier)
      : LoadMessages.suspiciousError(request.identifier);
    this.deliver(request, notice);
  }

  /**
   * Send a notice without letting a broken sink affect the pipeline
   */
  private deliver(request: LoadRequest, text: string, withRequesterName = false): void {
    const onError = (error: unknown): void => {
      this.log.warn({ err: error, identifier: request.identifier }, 'Failed to deliver a notice');
    };

    try {
      const delivery = withRequesterName
        ? request.sink.replyWithRequesterName(text)
        : request.sink.reply(text);
      if (delivery instanceof Promise) {
        void delivery.catch(onError);
      }
    } catch (error) {
      onError(error);
    }
  }
}
