/**
 * Property-based tests for TrackQueue
 */

import * as fc from 'fast-check';
import { QueueEntry, RANK_MAX, RANK_MIN } from '@trackline/shared';
import { TrackQueue } from '../TrackQueue';
import { makeEntry } from '../../__tests__/setup/fixtures';

type Operation =
  | { kind: 'add'; owner: string }
  | { kind: 'addFirst'; owner: string }
  | { kind: 'remove'; pick: number }
  | { kind: 'provideNext' };

const ownerArb = fc.constantFrom('alice', 'bob', 'carol', 'dave');

const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({ kind: fc.constant('add' as const), owner: ownerArb }),
  fc.record({ kind: fc.constant('addFirst' as const), owner: ownerArb }),
  fc.record({ kind: fc.constant('remove' as const), pick: fc.nat() }),
  fc.record({ kind: fc.constant('provideNext' as const) })
);

describe('TrackQueue Property Tests', () => {
  /**
   * Size always equals additions minus removals and pops, and no entry is
   * ever held twice.
   */
  test('queue holds exactly the entries that were added and not taken out', () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 60 }), fc.boolean(), (operations, shuffle) => {
        const queue = new TrackQueue();
        queue.isShuffle = shuffle;
        const expected = new Set<QueueEntry>();

        for (const op of operations) {
          switch (op.kind) {
            case 'add': {
              const entry = makeEntry(op.owner);
              queue.add(entry);
              expected.add(entry);
              break;
            }
            case 'addFirst': {
              const entry = makeEntry(op.owner, {}, true);
              queue.addFirst(entry);
              expected.add(entry);
              break;
            }
            case 'remove': {
              const current = queue.asList();
              if (current.length > 0) {
                const victim = current[op.pick % current.length];
                expect(queue.remove(victim)).toBe(true);
                expected.delete(victim);
              }
              break;
            }
            case 'provideNext': {
              const next = queue.provideNext();
              if (next !== null) {
                expected.delete(next);
              }
              break;
            }
          }

          const list = queue.asList();
          expect(new Set(list).size).toBe(list.length);
          expect(queue.size()).toBe(expected.size);
          expect(new Set(list)).toEqual(expected);
        }
      })
    );
  });

  test('adding a batch places entries as adding them one at a time would', () => {
    fc.assert(
      fc.property(
        fc.array(ownerArb, { maxLength: 30 }),
        fc.option(ownerArb, { nil: undefined }),
        fc.array(ownerArb, { minLength: 1, maxLength: 30 }),
        (queuedOwners, playingOwner, batchOwners) => {
          const batched = new TrackQueue();
          const single = new TrackQueue();
          for (const owner of queuedOwners) {
            const entry = makeEntry(owner);
            batched.add(entry);
            single.add(entry);
          }
          if (playingOwner !== undefined) {
            const playing = makeEntry(playingOwner);
            batched.setLastTrack(playing);
            single.setLastTrack(playing);
          }

          const batch = batchOwners.map((owner) => makeEntry(owner));
          batched.addAll([...batch, batch[0]]);
          for (const entry of batch) {
            single.add(entry);
          }

          const ids = (queue: TrackQueue) => queue.asList().map((entry) => entry.entryId);
          expect(ids(batched)).toEqual(ids(single));
        }
      )
    );
  });

  test('shuffled order spreads ranks strictly upward with priority entries first', () => {
    fc.assert(
      fc.property(
        fc.array(fc.record({ owner: ownerArb, priority: fc.boolean() }), { minLength: 1, maxLength: 40 }),
        (requests) => {
          const queue = new TrackQueue();
          queue.isShuffle = true;
          for (const request of requests) {
            const entry = makeEntry(request.owner, {}, request.priority);
            if (request.priority) {
              queue.addFirst(entry);
            } else {
              queue.add(entry);
            }
          }

          const ordered = queue.asListOrdered();
          const priorityCount = requests.filter((request) => request.priority).length;

          ordered.slice(0, priorityCount).forEach((entry) => {
            expect(entry.isPriority).toBe(true);
            expect(entry.rank).toBe(RANK_MIN);
          });

          const rest = ordered.slice(priorityCount);
          rest.forEach((entry, index) => {
            expect(entry.isPriority).toBe(false);
            expect(entry.rank).toBeGreaterThan(0);
            expect(entry.rank).toBeLessThan(RANK_MAX);
            if (index > 0) {
              expect(entry.rank).toBeGreaterThan(rest[index - 1].rank);
            }
          });

          expect(queue.asListOrdered()).toBe(ordered);
        }
      )
    );
  });

  test('range reads ignore the order of their bounds', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 20 }), fc.nat(25), fc.nat(25), (size, i, j) => {
        const queue = new TrackQueue();
        for (let n = 0; n < size; n++) {
          queue.add(makeEntry('alice'));
        }

        const forward = queue.getTracksInRange(i, j);
        const backward = queue.getTracksInRange(j, i);

        expect(backward).toEqual(forward);
        expect(forward.length).toBe(Math.max(0, Math.min(Math.max(i, j), size) - Math.min(i, j)));
      })
    );
  });
});
