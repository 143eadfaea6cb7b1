import { nextEntryId } from '../utils/ids';
import { randomRank } from '../utils/rank';
import { Track } from './Track';

/**
 * Whoever asked for a track. `name` is only used in notices.
 */
export interface User {
  readonly id: string;
  readonly name: string;
}

/**
 * A resolved track plus the ownership and ordering data the queue needs.
 *
 * Entries are compared by identity: two entries wrapping the same track are
 * still different queue members. `rank` only matters while shuffle is on.
 */
export class QueueEntry {
  readonly entryId: number;
  readonly track: Track;
  readonly requester: User;
  readonly startPositionMs: number;
  isPriority: boolean;
  rank: number;

  constructor(track: Track, requester: User, isPriority = false, startPositionMs = 0) {
    this.entryId = nextEntryId();
    this.track = track;
    this.requester = requester;
    this.isPriority = isPriority;
    this.startPositionMs = Math.max(0, startPositionMs);
    this.rank = randomRank();
  }

  get ownerId(): string {
    return this.requester.id;
  }

  get isStream(): boolean {
    return this.track.isStream;
  }

  /**
   * Play time left once the start offset is skipped; zero for streams
   */
  get effectiveDurationMs(): number {
    if (this.track.isStream) {
      return 0;
    }
    return Math.max(0, this.track.durationMs - this.startPositionMs);
  }

  /**
   * Fresh entry for replaying the same track: new id, new rank, no priority,
   * playing from the beginning.
   */
  makeClone(): QueueEntry {
    return new QueueEntry(this.track, this.requester, false);
  }

  randomize(): void {
    this.rank = randomRank();
  }
}
