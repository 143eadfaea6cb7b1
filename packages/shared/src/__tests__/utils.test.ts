import * as fc from 'fast-check';
import {
  RANK_MAX,
  RANK_MIN,
  compareRanks,
  defuseMentions,
  escapeAndDefuse,
  escapeMarkdown,
  nextEntryId,
  randomRank,
  spreadRank
} from '../index';

describe('rank arithmetic', () => {
  test('spreads ranks evenly between zero and the maximum', () => {
    expect(spreadRank(0, 1)).toBe(1073741823);
    expect(spreadRank(0, 3)).toBe(536870911);
    expect(spreadRank(1, 3)).toBe(1073741823);
  });

  test('spread ranks increase strictly and stay inside the range', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 100000 }), (size) => {
        const first = spreadRank(0, size);
        const last = spreadRank(size - 1, size);
        expect(first).toBeGreaterThan(0);
        expect(last).toBeLessThan(RANK_MAX);
        if (size > 1) {
          expect(spreadRank(1, size)).toBeGreaterThan(first);
        }
      })
    );
  });

  test('random ranks are signed 32-bit integers', () => {
    for (let i = 0; i < 1000; i++) {
      const rank = randomRank();
      expect(Number.isInteger(rank)).toBe(true);
      expect(rank).toBeGreaterThanOrEqual(RANK_MIN);
      expect(rank).toBeLessThanOrEqual(RANK_MAX);
    }
  });

  test('compares ranks', () => {
    expect(compareRanks(RANK_MIN, 0)).toBe(-1);
    expect(compareRanks(5, 5)).toBe(0);
    expect(compareRanks(RANK_MAX, 0)).toBe(1);
  });
});

describe('entry ids', () => {
  test('only ever grow', () => {
    const first = nextEntryId();
    expect(nextEntryId()).toBe(first + 1);
  });
});

describe('chat text', () => {
  test('escapes markdown specials', () => {
    expect(escapeMarkdown('a*b_c~d`e|f>g\\h')).toBe('a\\*b\\_c\\~d\\`e\\|f\\>g\\\\h');
  });

  test('defuses mass mentions', () => {
    expect(defuseMentions('hi @everyone and @here, not @bob')).toBe(
      'hi @\u200Beveryone and @\u200Bhere, not @bob'
    );
  });

  test('escapes before defusing', () => {
    expect(escapeAndDefuse('**@here**')).toBe('\\*\\*@\u200Bhere\\*\\*');
  });
});
