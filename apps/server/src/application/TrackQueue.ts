import { QueueEntry, RepeatMode, RANK_MAX, RANK_MIN, spreadRank, compareRanks } from '@trackline/shared';
import { ITrackQueue } from '../domain/queue';

/**
 * Fair track queue with a lazily cached shuffle order and repeat modes.
 *
 * Every method is synchronous, so each call runs to completion before any
 * other caller (resolver continuations included) can observe or mutate the
 * queue. The cached order is valid until the next structural change.
 */
export class TrackQueue implements ITrackQueue {
  repeatMode: RepeatMode = 'NONE';

  private entries: QueueEntry[] = [];
  private last: QueueEntry | null = null;
  private shuffleEnabled = false;
  private cachedOrder: readonly QueueEntry[] = [];
  private orderStale = true;

  get isShuffle(): boolean {
    return this.shuffleEnabled;
  }

  set isShuffle(shuffle: boolean) {
    this.shuffleEnabled = shuffle;
    if (shuffle) {
      // Priority is dropped whenever shuffle is switched on, even if it already was
      for (const entry of this.entries) {
        entry.isPriority = false;
      }
      this.orderStale = true;
    }
  }

  get lastTrack(): QueueEntry | null {
    return this.last;
  }

  get durationMillis(): number {
    let total = 0;
    for (const entry of this.entries) {
      if (!entry.isStream) {
        total += entry.effectiveDurationMs;
      }
    }
    return total;
  }

  /**
   * Insert using fairness: the entry goes before the first entry whose owner has
   * contributed more than its own requester so far.
   */
  add(entry: QueueEntry): void {
    this.addAll([entry]);
  }

  /**
   * Fair insertion of each entry in turn. Consecutive entries of one owner are
   * merged in a single pass over the queue.
   */
  addAll(entries: readonly QueueEntry[]): void {
    const queued = new Set(this.entries);
    let run: QueueEntry[] = [];

    for (const entry of entries) {
      if (queued.has(entry)) {
        continue;
      }
      queued.add(entry);
      if (run.length > 0 && run[0].ownerId !== entry.ownerId) {
        this.insertRun(run);
        run = [];
      }
      run.push(entry);
    }

    if (run.length > 0) {
      this.insertRun(run);
    }
  }

  addFirst(entry: QueueEntry): void {
    this.addAllFirst([entry]);
  }

  /**
   * Put entries at the head in the given order. Their ranks drop to the minimum
   * so they also lead the shuffled order.
   */
  addAllFirst(entries: readonly QueueEntry[]): void {
    const seen = new Set(this.entries);
    const admitted = entries.filter((entry) => {
      if (seen.has(entry)) {
        return false;
      }
      seen.add(entry);
      return true;
    });
    if (admitted.length === 0) {
      return;
    }
    for (const entry of admitted) {
      entry.rank = RANK_MIN;
    }
    this.entries.unshift(...admitted);
    this.orderStale = true;
  }

  remove(entry: QueueEntry): boolean {
    const index = this.entries.indexOf(entry);
    if (index === -1) {
      return false;
    }
    this.entries.splice(index, 1);
    this.orderStale = true;
    return true;
  }

  removeAll(entries: Iterable<QueueEntry>): void {
    const doomed = new Set(entries);
    this.retain((entry) => !doomed.has(entry));
  }

  removeAllById(entryIds: Iterable<number>): void {
    const doomed = new Set(entryIds);
    this.retain((entry) => !doomed.has(entry.entryId));
  }

  clear(): void {
    this.last = null;
    this.entries = [];
    this.orderStale = true;
  }

  getTrack(index: number): QueueEntry | null {
    return this.asListOrdered()[index] ?? null;
  }

  /**
   * Entries at presentation positions [min, max) of the two bounds
   */
  getTracksInRange(startIndex: number, endIndex: number): QueueEntry[] {
    const from = Math.max(0, Math.min(startIndex, endIndex));
    const to = Math.max(startIndex, endIndex);
    const result: QueueEntry[] = [];

    const ordered = this.asListOrdered();
    for (let i = from; i < to && i < ordered.length; i++) {
      result.push(ordered[i]);
    }

    if (result.length > 0) {
      this.orderStale = true;
    }
    return result;
  }

  asList(): QueueEntry[] {
    return [...this.entries];
  }

  /**
   * Presentation order: insertion order, or the cached shuffle order when
   * shuffle is on. Recomputing the shuffle order re-spreads every rank.
   */
  asListOrdered(): readonly QueueEntry[] {
    if (!this.shuffleEnabled) {
      return [...this.entries];
    }
    if (!this.orderStale) {
      return this.cachedOrder;
    }

    const sorted = [...this.entries].sort((a, b) =>
      a.isPriority === b.isPriority ? compareRanks(a.rank, b.rank) : a.isPriority ? -1 : 1
    );
    sorted.forEach((entry, index) => {
      entry.rank = entry.isPriority ? RANK_MIN : spreadRank(index, sorted.length);
    });

    this.cachedOrder = sorted;
    this.orderStale = false;
    return sorted;
  }

  peek(): QueueEntry | null {
    if (this.shuffleEnabled) {
      return this.asListOrdered()[0] ?? null;
    }
    return this.entries[0] ?? null;
  }

  provideNext(): QueueEntry | null {
    if (this.repeatMode === 'SINGLE' && this.last !== null) {
      return this.last.makeClone();
    }

    if (this.repeatMode === 'ALL' && this.last !== null) {
      const replay = this.last.makeClone();
      if (this.shuffleEnabled) {
        replay.rank = RANK_MAX;
      }
      this.entries.push(replay);
      this.orderStale = true;
    }

    const next = this.shuffleEnabled ? this.asListOrdered()[0] : this.entries[0];
    if (next === undefined) {
      this.last = null;
      return null;
    }

    this.entries.splice(this.entries.indexOf(next), 1);
    this.orderStale = true;
    this.last = next;
    return next;
  }

  setLastTrack(entry: QueueEntry): void {
    this.last = entry;
  }

  skipped(): void {
    this.last = null;
  }

  reshuffle(): void {
    for (const entry of this.entries) {
      entry.randomize();
      entry.isPriority = false;
    }
    this.orderStale = true;
  }

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  streamsCount(): number {
    return this.entries.filter((entry) => entry.isStream).length;
  }

  isUserTrackOwner(userId: string, entryIds: Iterable<number>): boolean {
    const ids = new Set(entryIds);
    return this.entries.every((entry) => !ids.has(entry.entryId) || entry.ownerId === userId);
  }

  /**
   * Merge entries of a single owner into the queue. Each one lands where a
   * lone fair insertion would put it after the ones before it: ahead of the
   * first entry whose owner, counting the playing entry, has contributed more.
   */
  private insertRun(run: readonly QueueEntry[]): void {
    const ownerId = run[0].ownerId;
    const counts = new Map<string, number>([[ownerId, 1]]);
    if (this.last !== null) {
      const playing = this.last.ownerId;
      counts.set(playing, (counts.get(playing) ?? 0) + 1);
    }

    const merged: QueueEntry[] = [];
    let placed = 0;
    for (const existing of this.entries) {
      const owner = existing.ownerId;
      const count = (counts.get(owner) ?? 0) + 1;
      while (placed < run.length && owner !== ownerId && count > (counts.get(ownerId) ?? 0)) {
        merged.push(run[placed]);
        placed++;
        counts.set(ownerId, (counts.get(ownerId) ?? 0) + 1);
      }
      counts.set(owner, count);
      merged.push(existing);
    }
    for (; placed < run.length; placed++) {
      merged.push(run[placed]);
    }

    this.entries = merged;
    this.orderStale = true;
  }

  private retain(keep: (entry: QueueEntry) => boolean): void {
    const kept = this.entries.filter(keep);
    if (kept.length !== this.entries.length) {
      this.entries = kept;
      this.orderStale = true;
    }
  }
}
