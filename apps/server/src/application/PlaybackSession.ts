/**
 * PlaybackSession - one session's player
 * Pulls entries from its track queue and hands them to an audio output.
 */

import { QueueEntry, RepeatMode, Result } from '@trackline/shared';
import { ITrackQueue } from '../domain/queue';
import { IPlaybackController } from '../domain/loading';
import {
  IAudioOutput,
  AudioOutputEvent,
  PlaybackState,
  PlaybackStatus,
  PlaybackError
} from '../domain/playback';
import { createLogger, Logger } from '../infrastructure/logging';

export class PlaybackSession implements IPlaybackController {
  private current: QueueEntry | null = null;
  private paused = false;
  private transitions: Promise<void> = Promise.resolve();
  private readonly log: Logger;
  private readonly onOutputEvent = (event: AudioOutputEvent): void => {
    if (event.type === 'track_finished') {
      this.handleTrackFinished(event.entry).catch((error: unknown) => {
        this.log.error({ err: error, entryId: event.entry.entryId }, 'Failed to advance after a track ended');
      });
    }
  };

  constructor(
    readonly sessionId: string,
    readonly queue: ITrackQueue,
    private readonly output: IAudioOutput,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('playback').child({ sessionId });
    this.output.addEventListener(this.onOutputEvent);
  }

  get isPlaying(): boolean {
    return this.current !== null && !this.paused;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get trackCount(): number {
    return this.queue.size() + (this.current !== null ? 1 : 0);
  }

  get playingEntry(): QueueEntry | null {
    return this.current;
  }

  get status(): PlaybackStatus {
    if (this.current === null) {
      return 'idle';
    }
    return this.paused ? 'paused' : 'playing';
  }

  /**
   * Unpause, and start the next entry if nothing is loaded
   */
  play(): Promise<void> {
    return this.serialized(() => this.unpauseOrStart());
  }

  pause(): Promise<Result<void, PlaybackError>> {
    return this.serialized<Result<void, PlaybackError>>(async () => {
      if (this.current === null) {
        return { success: false, error: 'NOTHING_PLAYING' };
      }
      if (this.paused) {
        return { success: false, error: 'ALREADY_PAUSED' };
      }
      this.paused = true;
      await this.output.pause();
      return { success: true, value: undefined };
    });
  }

  resume(): Promise<Result<void, PlaybackError>> {
    return this.serialized<Result<void, PlaybackError>>(async () => {
      if (!this.paused) {
        return { success: false, error: 'NOT_PAUSED' };
      }
      await this.unpauseOrStart();
      return { success: true, value: undefined };
    });
  }

  /**
   * Drop the playing entry and its repeat source, then start whatever is next
   */
  skip(): Promise<Result<QueueEntry | null, PlaybackError>> {
    return this.serialized<Result<QueueEntry | null, PlaybackError>>(async () => {
      if (this.current === null && this.queue.isEmpty()) {
        return { success: false, error: 'NOTHING_PLAYING' };
      }

      this.queue.skipped();
      this.current = null;
      await this.output.stop();

      const next = this.paused ? null : await this.startNext();
      return { success: true, value: next };
    });
  }

  /**
   * Stop playback and empty the queue
   */
  stop(): Promise<void> {
    return this.serialized(async () => {
      this.queue.clear();
      this.current = null;
      this.paused = false;
      await this.output.stop();
    });
  }

  handleTrackFinished(entry: QueueEntry): Promise<void> {
    return this.serialized(async () => {
      if (entry !== this.current) {
        return;
      }
      this.current = null;
      if (!this.paused) {
        await this.startNext();
      }
    });
  }

  setRepeatMode(mode: RepeatMode): void {
    this.queue.repeatMode = mode;
  }

  setShuffle(shuffle: boolean): void {
    this.queue.isShuffle = shuffle;
  }

  getState(): PlaybackState {
    return {
      sessionId: this.sessionId,
      status: this.status,
      currentEntry: this.current,
      repeatMode: this.queue.repeatMode,
      shuffle: this.queue.isShuffle,
      queueSize: this.queue.size(),
      queueDurationMs: this.queue.durationMillis,
      streams: this.queue.streamsCount()
    };
  }

  /**
   * Detach from the output and stop it. The queue is left as it is.
   */
  close(): Promise<void> {
    this.output.removeEventListener(this.onOutputEvent);
    return this.serialized(async () => {
      this.current = null;
      await this.output.stop();
    });
  }

  /**
   * Run one state transition after the previous one has settled. Transitions
   * read and replace `current` across awaits, so two must never interleave.
   */
  private serialized<T>(transition: () => Promise<T>): Promise<T> {
    const run = this.transitions.then(transition);
    this.transitions = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async unpauseOrStart(): Promise<void> {
    if (this.paused) {
      this.paused = false;
      if (this.current !== null) {
        await this.output.resume();
        return;
      }
    }
    if (this.current === null) {
      await this.startNext();
    }
  }

  /**
   * Start the next entry the queue provides. An entry the output refuses is
   * dropped along with its repeat source, and the one after it is tried.
   */
  private async startNext(): Promise<QueueEntry | null> {
    for (let attempts = this.queue.size() + 1; attempts > 0; attempts--) {
      const next = this.queue.provideNext();
      if (next === null) {
        break;
      }

      this.queue.setLastTrack(next);
      this.current = next;
      try {
        await this.output.start(next);
        this.log.debug({ entryId: next.entryId, title: next.track.title }, 'Track started');
        return next;
      } catch (error) {
        this.log.error({ err: error, entryId: next.entryId }, 'Audio output refused a track');
        this.current = null;
        this.queue.skipped();
      }
    }

    this.current = null;
    return null;
  }
}
