/**
 * Error types shared across the scheduler
 */

// Import and re-export domain-specific errors
import type { TrackError } from './Track';

export type { TrackError };

/**
 * Queue operation error types
 */
export type QueueError =
  | 'NOT_ENTRY_OWNER'
  | 'INVALID_RANGE';

/**
 * Rate limiting error types
 */
export type RateLimitError = 'RATE_LIMIT_EXCEEDED';

/**
 * Load request error types
 */
export type LoadRequestError =
  | 'INVALID_IDENTIFIER'
  | 'INVALID_REQUESTER'
  | 'INVALID_POSITION';

/**
 * Error details with context information
 */
export interface ErrorDetails {
  code: string;
  message: string;
  context?: Record<string, unknown> | undefined;
  suggestion?: string | undefined;
}

/**
 * Error factory for creating consistent error responses
 */
export class ErrorFactory {
  static createTrackError(error: TrackError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<TrackError, string> = {
      INVALID_IDENTIFIER: 'Track identifier must be a non-empty string',
      INVALID_TITLE: 'Track title must be a non-empty string',
      INVALID_DURATION: 'Duration must be a non-negative integer (milliseconds)'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: 'The source returned incomplete track data'
    };
  }

  static createQueueError(error: QueueError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<QueueError, string> = {
      NOT_ENTRY_OWNER: 'Only the user who queued a track may remove it',
      INVALID_RANGE: 'Range bounds must be non-negative integers'
    };

    const suggestions: Record<QueueError, string> = {
      NOT_ENTRY_OWNER: 'Remove only tracks you added yourself',
      INVALID_RANGE: 'Please check your input and try again'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: suggestions[error]
    };
  }

  static createRateLimitError(error: RateLimitError, timeRemaining?: number | undefined): ErrorDetails {
    const messages: Record<RateLimitError, string> = {
      RATE_LIMIT_EXCEEDED: `Rate limit exceeded. ${timeRemaining ? `Try again in ${Math.ceil(timeRemaining / 1000)} seconds.` : 'Please wait before loading more playlists.'}`
    };

    return {
      code: error,
      message: messages[error],
      context: timeRemaining ? { timeRemaining } : undefined,
      suggestion: 'Wait for the rate limit window to reset'
    };
  }

  static createLoadRequestError(error: LoadRequestError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<LoadRequestError, string> = {
      INVALID_IDENTIFIER: 'Load identifier must be a non-empty string',
      INVALID_REQUESTER: 'Load request needs a valid requester',
      INVALID_POSITION: 'Start position must be a non-negative integer (milliseconds)'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: 'Please check your input and try again'
    };
  }
}
