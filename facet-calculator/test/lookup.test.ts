
import { Box, Unbox } from 'facet-base-types';
import { Lookup } from '../src/functions/lookup-functions';
import { IsError, ErrorType } from '../src/function-error';

const Run = (x: unknown, table: unknown) => {
  const result = Lookup(Box(x), Box(table));
  if (IsError(result)) {
    return result;
  }
  return Unbox(result);
};

describe('interpolation', () => {

  test('midpoint', () => {
    expect(Run(5, [[0, 0], [10, 100]])).toBe(50);
    expect(Run(5, [[10, 100], [0, 0]])).toBe(50);
  });

  test('nearest keys in an unsorted table', () => {
    expect(Run(3, [[0, 2], [4, 10], [2, 6]])).toBe(8);
    expect(Run(7, [[10, 100], [0, 0], [5, 50]])).toBeCloseTo(70, 10);
  });

  test('exact keys return their value, in any order', () => {
    const table = [[0, 0], [5, 50], [10, 100]];
    const reversed = [...table].reverse();
    for (const [x, y] of table) {
      expect(Run(x, table)).toBe(y);
      expect(Run(x, reversed)).toBe(y);
    }
  });

  test('result lies between the bracketing values', () => {
    const tables = [
      [[0, 20], [10, 40], [-5, 0], [3, 30]],
      [[3, 30], [-5, 0], [10, 40], [0, 20]],
    ];
    for (const table of tables) {
      const result = Run(1.5, table);
      expect(typeof result).toBe('number');
      if (typeof result === 'number') {
        expect(result).toBeGreaterThan(20);
        expect(result).toBeLessThan(30);
        expect(result).toBeCloseTo(25, 10);
      }
    }
  });

});

describe('clamping', () => {

  test('below the table', () => {
    expect(Run(-5, [[0, 0], [10, 100]])).toBe(0);
    expect(Run(-5, [[10, 100], [0, 0]])).toBe(0);
    expect(Run(-5, [[5, 50], [0, 7], [10, 100]])).toBe(7);
  });

  test('above the table', () => {
    expect(Run(20, [[0, 0], [10, 100], [5, 50]])).toBe(100);
    expect(Run(20, [[10, 100], [0, 0]])).toBe(100);
  });

});

describe('malformed tables', () => {

  test('key must be a number', () => {
    expect(Run('x', [[0, 0], [10, 100]])).toEqual({ error: ErrorType.Type });
  });

  test('need at least two pairs', () => {
    expect(Run(1, [[0, 0]])).toEqual({ error: ErrorType.MalformedTable });
    expect(Run(1, [[0, 0], ['a', 1]])).toEqual({ error: ErrorType.MalformedTable });
    expect(Run(1, 'table')).toEqual({ error: ErrorType.MalformedTable });
  });

  test('first entry must be a pair', () => {
    expect(Run(1, [[0], [1, 1]])).toEqual({ error: ErrorType.MalformedTable });
    expect(Run(1, [[0, 1, 2], [1, 1]])).toEqual({ error: ErrorType.MalformedTable });
  });

  test('later malformed entries are skipped', () => {
    expect(Run(5, [[0, 0], 'junk', [1], [10, 100]])).toBe(50);
  });

});
