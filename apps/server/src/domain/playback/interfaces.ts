/**
 * Playback ports
 */

import { QueueEntry } from '@trackline/shared';
import { AudioOutputListener } from './types';

/**
 * Something that can render one entry at a time and report when it ends.
 * Stopping or replacing an entry never reports it as finished.
 */
export interface IAudioOutput {
  start(entry: QueueEntry): Promise<void>;
  stop(): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  addEventListener(listener: AudioOutputListener): void;
  removeEventListener(listener: AudioOutputListener): void;
}
