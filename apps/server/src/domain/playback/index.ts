/**
 * Playback domain exports
 */

export type {
  PlaybackStatus,
  PlaybackState,
  AudioOutputEventType,
  AudioOutputEvent,
  AudioOutputListener
} from './types';

export type { PlaybackError } from './errors';
export { PlaybackErrorFactory } from './errors';

export type { IAudioOutput } from './interfaces';
