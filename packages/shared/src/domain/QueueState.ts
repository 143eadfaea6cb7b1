/**
 * What the queue does when asked for the next entry
 */
export type RepeatMode = 'NONE' | 'SINGLE' | 'ALL';

export const REPEAT_MODES: readonly RepeatMode[] = ['NONE', 'SINGLE', 'ALL'];

export function isRepeatMode(value: unknown): value is RepeatMode {
  return typeof value === 'string' && REPEAT_MODES.some((mode) => mode === value);
}

/**
 * Rate limiting data structures
 */
export interface UserRateData {
  readonly userId: string;
  readonly requests: readonly RequestRecord[];
}

export interface RequestRecord {
  readonly timestamp: Date;
  readonly identifier: string;
  readonly weight: number;
}
