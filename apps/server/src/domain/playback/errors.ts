/**
 * Error types for session playback
 */

import { ErrorDetails } from '@trackline/shared';

export type PlaybackError = 'NOTHING_PLAYING' | 'ALREADY_PAUSED' | 'NOT_PAUSED' | 'SESSION_NOT_FOUND';

export class PlaybackErrorFactory {
  static createPlaybackError(error: PlaybackError, context?: Record<string, unknown>): ErrorDetails {
    const messages: Record<PlaybackError, string> = {
      NOTHING_PLAYING: 'Nothing is playing in this session',
      ALREADY_PAUSED: 'Playback is already paused',
      NOT_PAUSED: 'Playback is not paused',
      SESSION_NOT_FOUND: 'No session exists with that id'
    };

    const suggestions: Record<PlaybackError, string> = {
      NOTHING_PLAYING: 'Load a track first',
      ALREADY_PAUSED: 'Resume playback instead',
      NOT_PAUSED: 'Pause playback first',
      SESSION_NOT_FOUND: 'Load a track into the session to create it'
    };

    return {
      code: error,
      message: messages[error],
      context,
      suggestion: suggestions[error]
    };
  }
}
