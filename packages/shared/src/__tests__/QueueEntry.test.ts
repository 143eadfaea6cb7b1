import * as fc from 'fast-check';
import {
  QueueEntry,
  RANK_MAX,
  RANK_MIN,
  randomRank,
  spreadRank,
  escapeAndDefuse,
  Track,
  User
} from '../index';

const track: Track = {
  identifier: 'https://example.com/a.mp3',
  title: 'A',
  author: 'Artist',
  durationMs: 200000,
  isStream: false
};
const user: User = { id: 'u1', name: 'User One' };

describe('QueueEntry', () => {
  it('hands out increasing ids', () => {
    const first = new QueueEntry(track, user);
    const second = new QueueEntry(track, user);

    expect(second.entryId).toBeGreaterThan(first.entryId);
  });

  it('clones into a new, non-priority entry of the same track', () => {
    const original = new QueueEntry(track, user, true, 5000);
    const clone = original.makeClone();

    expect(clone).not.toBe(original);
    expect(clone.entryId).not.toBe(original.entryId);
    expect(clone.track).toBe(track);
    expect(clone.requester).toBe(user);
    expect(clone.isPriority).toBe(false);
    expect(clone.startPositionMs).toBe(0);
  });

  it('reports no duration for streams', () => {
    const stream = new QueueEntry({ ...track, isStream: true, durationMs: 0 }, user);

    expect(stream.isStream).toBe(true);
    expect(stream.effectiveDurationMs).toBe(0);
  });

  it('never reports a negative duration past the end of a track', () => {
    const entry = new QueueEntry(track, user, false, 999999);

    expect(entry.effectiveDurationMs).toBe(0);
  });
});

describe('rank utilities', () => {
  test('random ranks stay inside the signed 32-bit range', () => {
    for (let i = 0; i < 1000; i++) {
      const rank = randomRank();
      expect(Number.isInteger(rank)).toBe(true);
      expect(rank).toBeGreaterThanOrEqual(RANK_MIN);
      expect(rank).toBeLessThanOrEqual(RANK_MAX);
    }
  });

  test('spread ranks are strictly increasing and strictly inside (0, RANK_MAX)', () => {
    fc.assert(fc.property(fc.integer({ min: 1, max: 500 }), (size) => {
      let previous = 0;
      for (let i = 0; i < size; i++) {
        const rank = spreadRank(i, size);
        if (rank <= previous || rank >= RANK_MAX) {
          return false;
        }
        previous = rank;
      }
      return true;
    }));
  });

  test('spread rank of the single entry of a one-entry queue is half the range', () => {
    expect(spreadRank(0, 1)).toBe(Math.trunc(0.5 * RANK_MAX));
  });
});

describe('escapeAndDefuse', () => {
  it('escapes markdown and breaks mass mentions', () => {
    expect(escapeAndDefuse('*bold* @everyone')).toBe('\\*bold\\* @\u200Beveryone');
  });

  it('leaves plain titles alone', () => {
    expect(escapeAndDefuse('Plain Title')).toBe('Plain Title');
  });
});
