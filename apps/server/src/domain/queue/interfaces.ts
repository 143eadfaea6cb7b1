/**
 * Track queue capability set.
 *
 * Each ordering policy is its own implementation of this interface; callers
 * never depend on how a policy orders entries, only on the presentation order
 * it exposes through the index-based reads.
 */

import { QueueEntry, RepeatMode } from '@trackline/shared';

export interface ITrackQueue {
  /** Current repeat policy, consulted only when `provideNext` runs */
  repeatMode: RepeatMode;

  /** Turning shuffle on clears every priority flag and the cached order */
  isShuffle: boolean;

  /** The entry most recently handed out for playback, source of repeats */
  readonly lastTrack: QueueEntry | null;

  /** Sum of effective durations of every non-stream entry */
  readonly durationMillis: number;

  add(entry: QueueEntry): void;
  addAll(entries: readonly QueueEntry[]): void;
  addFirst(entry: QueueEntry): void;
  addAllFirst(entries: readonly QueueEntry[]): void;

  remove(entry: QueueEntry): boolean;
  removeAll(entries: Iterable<QueueEntry>): void;
  removeAllById(entryIds: Iterable<number>): void;
  clear(): void;

  getTrack(index: number): QueueEntry | null;
  getTracksInRange(startIndex: number, endIndex: number): QueueEntry[];
  asList(): QueueEntry[];
  asListOrdered(): readonly QueueEntry[];
  peek(): QueueEntry | null;

  provideNext(): QueueEntry | null;
  setLastTrack(entry: QueueEntry): void;
  skipped(): void;
  reshuffle(): void;

  size(): number;
  isEmpty(): boolean;
  streamsCount(): number;
  isUserTrackOwner(userId: string, entryIds: Iterable<number>): boolean;
}
