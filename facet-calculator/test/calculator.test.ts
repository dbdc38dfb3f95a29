
import { Box, Unbox, NumberValue, ValueType } from 'facet-base-types';
import type { UnionValue } from 'facet-base-types';
import { Calculator } from '../src/calculator';
import { CollectingDiagnostics } from '../src/diagnostics';
import { TypeError } from '../src/function-error';

let diagnostics = new CollectingDiagnostics();
let calculator = new Calculator({ diagnostics, random_seed: 1 });

const Run = (name: string, ...args: unknown[]) => {
  return Unbox(calculator.Call(name, args.map(arg => Box(arg))));
};

beforeEach(() => {
  diagnostics = new CollectingDiagnostics();
  calculator = new Calculator({ diagnostics, random_seed: 1 });
});

describe('calling functions', () => {

  test('names are case-insensitive', () => {
    expect(Run('search', 'a', 'abcdabcd')).toEqual([0]);
    expect(Run('SEARCH', 'a', 'abcdabcd')).toEqual([0]);
    expect(Run('Lookup', 5, [[0, 0], [10, 100]])).toBe(50);
  });

  test('unknown functions warn', () => {
    expect(Run('nope')).toBeUndefined();
    expect(diagnostics.messages).toEqual([`Ignoring unknown function 'nope'`]);
  });

  test('wrong argument count is undefined, no warning', () => {
    expect(Run('search', 'a')).toBeUndefined();
    expect(Run('search', 'a', 'a', 1, 0, 0)).toBeUndefined();
    expect(Run('lookup', 1)).toBeUndefined();
    expect(Run('abs')).toBeUndefined();
    expect(Run('abs', 1, 2)).toBeUndefined();
    expect(diagnostics.messages).toEqual([]);
  });

  test('errors become undefined', () => {
    expect(Run('lookup', 'x', [[0, 0], [10, 100]])).toBeUndefined();
    expect(Run('lookup', 1, [[0, 0]])).toBeUndefined();
    expect(calculator.Call('abs', [Box('x')])).toEqual({ type: ValueType.undefined });
  });

  test('supported functions', () => {
    const list = calculator.SupportedFunctions();
    expect(list).toContain('Search');
    expect(list).toContain('Lookup');
    expect(list).toContain('Version_Num');
    expect(list).toHaveLength(29);
  });

  test('register a library', () => {
    const map = {
      Twice: {
        arguments: [{ name: 'x' }],
        fn: (context: unknown, x: UnionValue) => x.type === ValueType.number ? NumberValue(x.value * 2) : TypeError(),
      },
    };
    expect(calculator.RegisterLibrary('extra', map)).toBeTruthy();
    expect(calculator.RegisterLibrary('extra', map)).toBeFalsy();
    expect(Run('twice', 4)).toBe(8);
    expect(Run('twice', 'x')).toBeUndefined();
  });

});

describe('search arguments', () => {

  test('returns per match', () => {
    expect(Run('search', 'a', 'abcdabcd', 0)).toEqual([[0, 4]]);
    expect(Run('search', 'a', 'aaa', 2.7)).toEqual([[0, 1]]);
  });

  test('column', () => {
    expect(Run('search', 3, [['a', 1], ['c', 3], ['e', 3]], 0, 1)).toEqual([1, 2]);
  });

  test('undefined arguments take the default', () => {
    expect(Run('search', 'a', 'abcdabcd', undefined, undefined)).toEqual([0]);
  });

  test('bad counts are a type error', () => {
    expect(Run('search', 'a', 'abc', 'x')).toBeUndefined();
    expect(Run('search', 'a', 'abc', -1)).toBeUndefined();
    expect(Run('search', 'a', [['a']], 1, 'x')).toBeUndefined();
    expect(diagnostics.messages).toEqual([]);
  });

  test('warnings reach the sink', () => {
    expect(Run('search', 'e', 'abcd')).toEqual([]);
    expect(diagnostics.messages).toEqual(['search term not found: "e"']);
  });

});

describe('math', () => {

  test('simple functions', () => {
    expect(Run('abs', -3)).toBe(3);
    expect(Run('sign', -2)).toBe(-1);
    expect(Run('sign', 0)).toBe(0);
    expect(Run('sign', 7)).toBe(1);
    expect(Run('pow', 2, 10)).toBe(1024);
    expect(Run('sqrt', 16)).toBe(4);
    expect(Run('floor', 2.7)).toBe(2);
    expect(Run('ceil', 2.1)).toBe(3);
    expect(Run('exp', 0)).toBe(1);
    expect(Run('ln', 1)).toBe(0);
  });

  test('round halves away from zero', () => {
    expect(Run('round', 2.5)).toBe(3);
    expect(Run('round', -2.5)).toBe(-3);
    expect(Run('round', -2.4)).toBe(-2);
  });

  test('log', () => {
    expect(Run('log', 1000)).toBeCloseTo(3, 10);
    expect(Run('log', 2, 8)).toBeCloseTo(3, 10);
    expect(Run('log', 2, 'x')).toBeUndefined();
  });

  test('trig in degrees', () => {
    expect(Run('sin', 30)).toBe(0.5);
    expect(Run('cos', 60)).toBe(0.5);
    expect(Run('tan', 45)).toBeCloseTo(1, 10);
    expect(Run('asin', 1)).toBeCloseTo(90, 10);
    expect(Run('acos', 0)).toBeCloseTo(90, 10);
    expect(Run('atan', 1)).toBeCloseTo(45, 10);
    expect(Run('atan2', 1, 1)).toBeCloseTo(45, 10);
  });

  test('type mismatch', () => {
    expect(Run('sin', 'x')).toBeUndefined();
    expect(Run('pow', 2, [1])).toBeUndefined();
  });

});

describe('vectors and strings', () => {

  test('len', () => {
    expect(Run('len', [1, 2])).toBe(2);
    expect(Run('len', 'a🂡Л')).toBe(3);
    expect(Run('len', 3)).toBeUndefined();
  });

  test('str', () => {
    expect(Run('str', 'a', 1, [1, 'b'])).toBe('a1[1, "b"]');
    expect(Run('str', 0.5, undefined)).toBe('0.5undef');
    expect(Run('str')).toBe('');
  });

  test('concat', () => {
    expect(Run('concat', [1, 2], 3, [[4]])).toEqual([1, 2, 3, [4]]);
    expect(Run('concat')).toEqual([]);
  });

  test('min/max', () => {
    expect(Run('min', 3, 1, 2)).toBe(1);
    expect(Run('max', 3, 1, 2)).toBe(3);
    expect(Run('min', [4, 2, 8])).toBe(2);
    expect(Run('max', [4, 2, 8])).toBe(8);
    expect(Run('min', 1, 'a')).toBeUndefined();
    expect(Run('min', [])).toBeUndefined();
    expect(Run('min')).toBeUndefined();
  });

  test('min/max skip NaN after the first argument', () => {
    expect(Run('min', 1, NaN)).toBe(1);
    expect(Run('max', 1, NaN, 3)).toBe(3);
    expect(Run('min', NaN, 1)).toBeNaN();
  });

  test('min/max of a vector keep non-numbers in place', () => {
    expect(Run('min', ['a', 1])).toBe('a');
  });

  test('norm', () => {
    expect(Run('norm', [3, 4])).toBe(5);
    expect(Run('norm', [])).toBe(0);
    expect(Run('norm', [3, 'a'])).toBeUndefined();
    expect(diagnostics.messages).toEqual(['Incorrect arguments to norm()']);
  });

  test('cross', () => {
    expect(Run('cross', [1, 0, 0], [0, 1, 0])).toEqual([0, 0, 1]);
    expect(Run('cross', [1, 2, 3], [4, 5, 6])).toEqual([-3, 6, -3]);
  });

  test('cross warnings', () => {
    expect(Run('cross', 1, [1, 2, 3])).toBeUndefined();
    expect(Run('cross', [1, 2], [1, 2, 3])).toBeUndefined();
    expect(Run('cross', [1, 'a', 0], [0, 1, 0])).toBeUndefined();
    expect(Run('cross', [1, NaN, 0], [0, 1, 0])).toBeUndefined();
    expect(Run('cross', [1, Infinity, 0], [0, 1, 0])).toBeUndefined();
    expect(diagnostics.messages).toEqual([
      'Invalid type of parameters for cross()',
      'Invalid vector size of parameter for cross()',
      'Invalid value in parameter vector for cross()',
      'Invalid value (NaN) in parameter vector for cross()',
      'Invalid value (INF) in parameter vector for cross()',
    ]);
  });

});

describe('version', () => {

  test('default', () => {
    expect(Run('version')).toEqual([2026, 10, 18]);
    expect(Run('version_num')).toBe(20261018);
  });

  test('configured', () => {
    calculator = new Calculator({ diagnostics, version: [2020, 1] });
    expect(Run('version')).toEqual([2020, 1]);
    expect(Run('version_num')).toBe(20200100);
  });

  test('explicit', () => {
    expect(Run('version_num', [2019, 5, 3])).toBe(20190503);
    expect(Run('version_num', [2019, 5])).toBe(20190500);
    expect(Run('version_num', 'x')).toBeUndefined();
  });

});
