/**
 * ClockAudioOutput - plays entries against the wall clock
 * An entry "ends" once its effective duration has elapsed. Streams never end.
 */

import { EventEmitter } from 'events';
import { QueueEntry } from '@trackline/shared';
import { IAudioOutput, AudioOutputEvent, AudioOutputListener } from '../../domain/playback';

export class ClockAudioOutput extends EventEmitter implements IAudioOutput {
  private current: QueueEntry | null = null;
  private timer: NodeJS.Timeout | null = null;
  private remainingMs = 0;
  private startedAt = 0;
  private paused = false;

  async start(entry: QueueEntry): Promise<void> {
    this.clearTimer();
    this.current = entry;
    this.paused = false;
    this.remainingMs = entry.effectiveDurationMs;
    this.schedule();
  }

  async stop(): Promise<void> {
    this.clearTimer();
    this.current = null;
    this.paused = false;
    this.remainingMs = 0;
  }

  async pause(): Promise<void> {
    if (this.current === null || this.paused) {
      return;
    }
    this.paused = true;
    if (this.timer !== null) {
      this.remainingMs = Math.max(0, this.remainingMs - (Date.now() - this.startedAt));
      this.clearTimer();
    }
  }

  async resume(): Promise<void> {
    if (this.current === null || !this.paused) {
      return;
    }
    this.paused = false;
    this.schedule();
  }

  addEventListener(listener: AudioOutputListener): void {
    this.on('event', listener);
  }

  removeEventListener(listener: AudioOutputListener): void {
    this.off('event', listener);
  }

  private schedule(): void {
    const entry = this.current;
    if (entry === null || entry.isStream) {
      return;
    }

    this.startedAt = Date.now();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = null;
      const event: AudioOutputEvent = { type: 'track_finished', entry, timestamp: new Date() };
      this.emit('event', event);
    }, this.remainingMs);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
