import { IRateLimiter, IResolver } from '../domain/loading';
import { ITrackQueue } from '../domain/queue';
import { IAudioOutput } from '../domain/playback';
import { createLogger, Logger } from '../infrastructure/logging';
import { PlaybackSession } from './PlaybackSession';
import { TrackLoader, TrackLoaderOptions } from './TrackLoader';
import { TrackQueue } from './TrackQueue';

export interface Session {
  readonly id: string;
  readonly queue: ITrackQueue;
  readonly player: PlaybackSession;
  readonly loader: TrackLoader;
}

export interface SessionRegistryDependencies {
  resolver: IResolver;
  rateLimiter: IRateLimiter;
  createOutput: (sessionId: string) => IAudioOutput;
  loaderOptions?: Partial<TrackLoaderOptions> | undefined;
}

/**
 * Owns every session, creating queue, player and loader together on first use.
 * The resolver and rate limiter are shared by all sessions.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly log: Logger;

  constructor(private readonly dependencies: SessionRegistryDependencies, logger?: Logger) {
    this.log = logger ?? createLogger('sessions');
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  getOrCreate(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const queue = new TrackQueue();
    const player = new PlaybackSession(sessionId, queue, this.dependencies.createOutput(sessionId));
    const loader = new TrackLoader(
      queue,
      player,
      this.dependencies.resolver,
      this.dependencies.rateLimiter,
      this.dependencies.loaderOptions
    );

    const session: Session = { id: sessionId, queue, player, loader };
    this.sessions.set(sessionId, session);
    this.log.info({ sessionId }, 'Session created');
    return session;
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  size(): number {
    return this.sessions.size;
  }

  playingCount(): number {
    return this.list().filter((session) => session.player.isPlaying).length;
  }

  /**
   * Close one session and forget it. Returns false for an unknown id.
   */
  async close(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    this.sessions.delete(sessionId);
    session.loader.close();
    session.queue.clear();
    await session.player.close();
    this.log.info({ sessionId }, 'Session closed');
    return true;
  }

  /**
   * Close every session's loader and output. Loads already resolving are
   * left to finish and their outcomes dropped.
   */
  async shutdown(): Promise<void> {
    const sessions = this.list();
    this.sessions.clear();
    sessions.forEach((session) => session.loader.close());

    const results = await Promise.allSettled(sessions.map((session) => session.player.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.log.error({ err: result.reason, sessionId: sessions[index].id }, 'Failed to close session');
      }
    });
  }
}
