/**
 * Test doubles for the queue, loader and playback tests
 */

import { QueueEntry, Track, User } from '@trackline/shared';
import {
  CollectionMetadata,
  LoadOutcome,
  LoadRequest
} from '../../domain/loading/types';
import {
  IPlaybackController,
  IRateLimiter,
  IReplySink,
  IResolver
} from '../../domain/loading/interfaces';
import { IAudioOutput } from '../../domain/playback/interfaces';
import { AudioOutputListener } from '../../domain/playback/types';

let trackCounter = 0;

export function makeTrack(overrides: Partial<Track> = {}): Track {
  trackCounter++;
  return {
    identifier: `track-${trackCounter}`,
    title: `Track ${trackCounter}`,
    author: 'Test Artist',
    durationMs: 180000,
    isStream: false,
    ...overrides
  };
}

export function makeUser(id: string, name = `User ${id}`): User {
  return { id, name };
}

export function makeEntry(ownerId: string, overrides: Partial<Track> = {}, isPriority = false): QueueEntry {
  return new QueueEntry(makeTrack(overrides), makeUser(ownerId), isPriority);
}

export function makeRequest(overrides: Partial<LoadRequest> = {}): LoadRequest {
  return {
    identifier: 'https://example.com/song.mp3',
    requester: makeUser('alice'),
    isPriority: false,
    isQuiet: false,
    positionMs: 0,
    sink: new RecordingSink(),
    ...overrides
  };
}

/**
 * Records notices, keeping name-prefixed ones apart
 */
export class RecordingSink implements IReplySink {
  readonly replies: string[] = [];
  readonly namedReplies: string[] = [];

  reply(text: string): void {
    this.replies.push(text);
  }

  replyWithRequesterName(text: string): void {
    this.namedReplies.push(text);
  }

  get all(): string[] {
    return [...this.replies, ...this.namedReplies];
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Resolver whose calls stay pending until the test settles them
 */
export class ControlledResolver implements IResolver {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private readonly pending: Deferred<LoadOutcome>[] = [];

  resolve(identifier: string): Promise<LoadOutcome> {
    this.calls.push(identifier);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    const call = deferred<LoadOutcome>();
    this.pending.push(call);
    return call.promise.finally(() => {
      this.inFlight--;
    });
  }

  get waiting(): number {
    return this.pending.length;
  }

  settleNext(outcome: LoadOutcome): void {
    const call = this.pending.shift();
    if (!call) {
      throw new Error('No resolution is waiting');
    }
    call.resolve(outcome);
  }

  failNext(error: unknown): void {
    const call = this.pending.shift();
    if (!call) {
      throw new Error('No resolution is waiting');
    }
    call.reject(error);
  }
}

/**
 * Resolver answering from a fixed table, or with an outcome function
 */
export class StaticResolver implements IResolver {
  readonly calls: string[] = [];

  constructor(private readonly answer: (identifier: string) => LoadOutcome) {}

  async resolve(identifier: string): Promise<LoadOutcome> {
    this.calls.push(identifier);
    return this.answer(identifier);
  }
}

export class FakePlayer implements IPlaybackController {
  isPlaying = false;
  isPaused = false;
  trackCount = 0;
  playCalls = 0;

  async play(): Promise<void> {
    this.playCalls++;
    this.isPlaying = true;
  }
}

/**
 * Rate limiter that knows a fixed set of collections
 */
export class FakeRateLimiter implements IRateLimiter {
  readonly collections = new Map<string, CollectionMetadata>();
  limited = false;
  timeUntilReset = 30000;
  readonly checks: Array<{ identifier: string; itemCount: number }> = [];
  lookupDelay: (identifier: string) => Promise<void> = () => Promise.resolve();

  async collectionMetadata(identifier: string): Promise<CollectionMetadata | null> {
    await this.lookupDelay(identifier);
    return this.collections.get(identifier) ?? null;
  }

  isRateLimited(request: LoadRequest, _collection: CollectionMetadata, itemCount: number): boolean {
    this.checks.push({ identifier: request.identifier, itemCount });
    return this.limited;
  }

  getTimeUntilReset(): number {
    return this.timeUntilReset;
  }
}

/**
 * Audio output that records calls and finishes entries on demand
 */
export class FakeAudioOutput implements IAudioOutput {
  readonly started: QueueEntry[] = [];
  stops = 0;
  pauses = 0;
  resumes = 0;
  refuse: (entry: QueueEntry) => boolean = () => false;
  private readonly listeners = new Set<AudioOutputListener>();

  async start(entry: QueueEntry): Promise<void> {
    if (this.refuse(entry)) {
      throw new Error(`cannot play ${entry.track.identifier}`);
    }
    this.started.push(entry);
  }

  async stop(): Promise<void> {
    this.stops++;
  }

  async pause(): Promise<void> {
    this.pauses++;
  }

  async resume(): Promise<void> {
    this.resumes++;
  }

  addEventListener(listener: AudioOutputListener): void {
    this.listeners.add(listener);
  }

  removeEventListener(listener: AudioOutputListener): void {
    this.listeners.delete(listener);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  finish(entry: QueueEntry): void {
    for (const listener of this.listeners) {
      listener({ type: 'track_finished', entry, timestamp: new Date() });
    }
  }
}

/**
 * Let every queued promise continuation run
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
