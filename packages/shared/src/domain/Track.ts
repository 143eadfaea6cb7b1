/**
 * Track value object: one playable item as handed back by a resolver.
 * The queue never mutates it; per-play state lives on the QueueEntry.
 */
export interface Track {
  readonly identifier: string;
  readonly title: string;
  readonly author: string;
  readonly uri?: string;
  readonly durationMs: number;
  readonly isStream: boolean;
}

/**
 * Track creation data for validation
 */
export interface TrackCreateData {
  identifier: string;
  title: string;
  author?: string;
  uri?: string;
  durationMs?: number;
  isStream?: boolean;
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

/**
 * Track-related error types
 */
export type TrackError =
  | 'INVALID_IDENTIFIER'
  | 'INVALID_TITLE'
  | 'INVALID_DURATION';

const UNKNOWN_AUTHOR = 'Unknown author';

/**
 * Track validation and creation functions
 */
export class TrackValidator {
  static validateIdentifier(identifier: string): boolean {
    return typeof identifier === 'string' && identifier.trim().length > 0;
  }

  static validateTitle(title: string): boolean {
    return typeof title === 'string' && title.trim().length > 0;
  }

  static validateDuration(durationMs: number): boolean {
    return typeof durationMs === 'number' && Number.isInteger(durationMs) && durationMs >= 0;
  }

  static create(data: TrackCreateData): Result<Track, TrackError> {
    if (!this.validateIdentifier(data.identifier)) {
      return { success: false, error: 'INVALID_IDENTIFIER' };
    }

    if (!this.validateTitle(data.title)) {
      return { success: false, error: 'INVALID_TITLE' };
    }

    const isStream = data.isStream ?? false;
    // Streams have no meaningful length; anything given for them is dropped
    const durationMs = isStream ? 0 : data.durationMs ?? 0;
    if (!this.validateDuration(durationMs)) {
      return { success: false, error: 'INVALID_DURATION' };
    }

    const author = data.author?.trim();

    const track: Track = {
      identifier: data.identifier.trim(),
      title: data.title.trim(),
      author: author && author.length > 0 ? author : UNKNOWN_AUTHOR,
      durationMs,
      isStream,
      ...(data.uri && { uri: data.uri })
    };

    return { success: true, value: track };
  }
}
