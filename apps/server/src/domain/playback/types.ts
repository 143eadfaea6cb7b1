/**
 * Core types for session playback
 */

import { QueueEntry, RepeatMode } from '@trackline/shared';

export type PlaybackStatus = 'idle' | 'playing' | 'paused';

/**
 * Snapshot of one session's player and queue
 */
export interface PlaybackState {
  readonly sessionId: string;
  readonly status: PlaybackStatus;
  readonly currentEntry: QueueEntry | null;
  readonly repeatMode: RepeatMode;
  readonly shuffle: boolean;
  readonly queueSize: number;
  readonly queueDurationMs: number;
  readonly streams: number;
}

export type AudioOutputEventType = 'track_finished';

export interface AudioOutputEvent {
  readonly type: AudioOutputEventType;
  readonly entry: QueueEntry;
  readonly timestamp: Date;
}

export type AudioOutputListener = (event: AudioOutputEvent) => void;
