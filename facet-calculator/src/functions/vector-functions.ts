/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2024 trebco, llc. 
 * info@treb.app
 * 
 */

import type { FunctionMap } from '../descriptors';
import type { FunctionResult } from '../function-error';
import { TypeError } from '../function-error';
import type { UnionValue } from 'facet-base-types';
import { ValueType, NumberValue, StringValue, VectorValue, UndefinedValue,
         ValueToString, ValueLessThan, ValueGreaterThan, CodepointLength } from 'facet-base-types';
import { NumberArguments } from './function-utilities';

/**
 * shared by min and max. a single non-empty vector argument is searched
 * with value ordering (which only orders numbers, so anything else
 * stays put); otherwise every argument must be a number.
 */
const Extreme = (
    args: UnionValue[],
    better: (a: UnionValue, b: UnionValue) => boolean): FunctionResult => {

  const [first] = args;
  let candidates = args;

  if (args.length === 1 && first.type === ValueType.vector && first.value.length) {
    candidates = first.value;
  }
  else if (!args.length || !NumberArguments(args)) {
    return TypeError();
  }

  // a NaN never compares better, so it only wins in first position

  let result = candidates[0];
  for (const entry of candidates.slice(1)) {
    if (better(entry, result)) {
      result = entry;
    }
  }
  return result;

};

export const VectorFunctionLibrary: FunctionMap = {

  Len: {
    description: 'Returns the number of elements in a vector, or characters in a string',
    arguments: [{ name: 'vector or string' }],
    category: ['Vector'],
    fn: (context, value: UnionValue): FunctionResult => {
      switch (value.type) {
        case ValueType.vector:
          return NumberValue(value.value.length);
        case ValueType.string:
          return NumberValue(CodepointLength(value.value));
      }
      return TypeError();
    },
  },

  Str: {
    description: 'Converts arguments to text and joins them',
    arguments: [],
    variadic: true,
    category: ['String'],
    fn: (context, ...args: UnionValue[]): FunctionResult => {
      return StringValue(args.map(arg => ValueToString(arg)).join(''));
    },
  },

  Concat: {
    description: 'Joins vectors. Arguments that are not vectors are added as single elements',
    arguments: [],
    variadic: true,
    category: ['Vector'],
    fn: (context, ...args: UnionValue[]): FunctionResult => {
      const result: UnionValue[] = [];
      for (const arg of args) {
        if (arg.type === ValueType.vector) {
          result.push(...arg.value);
        }
        else {
          result.push(arg);
        }
      }
      return VectorValue(result);
    },
  },

  Min: {
    description: 'Returns the smallest argument, or the smallest element of a vector',
    arguments: [{ name: 'value' }],
    variadic: true,
    category: ['Vector', 'Math'],
    fn: (context, ...args: UnionValue[]): FunctionResult => Extreme(args, ValueLessThan),
  },

  Max: {
    description: 'Returns the largest argument, or the largest element of a vector',
    arguments: [{ name: 'value' }],
    variadic: true,
    category: ['Vector', 'Math'],
    fn: (context, ...args: UnionValue[]): FunctionResult => Extreme(args, ValueGreaterThan),
  },

  Norm: {
    description: 'Returns the euclidean length of a vector',
    arguments: [{ name: 'vector' }],
    category: ['Vector'],
    fn: (context, value: UnionValue): FunctionResult => {

      if (value.type !== ValueType.vector) {
        return TypeError();
      }

      let sum = 0;
      for (const entry of value.value) {
        if (entry.type !== ValueType.number) {
          context.diagnostics.warn('Incorrect arguments to norm()');
          return UndefinedValue();
        }
        sum += entry.value * entry.value;
      }

      return NumberValue(Math.sqrt(sum));

    },
  },

  Cross: {
    description: 'Returns the cross product of two 3-vectors',
    arguments: [{ name: 'a' }, { name: 'b' }],
    category: ['Vector'],
    fn: (context, a: UnionValue, b: UnionValue): FunctionResult => {

      const warn = (message: string) => {
        context.diagnostics.warn(message);
        return UndefinedValue();
      };

      if (a.type !== ValueType.vector || b.type !== ValueType.vector) {
        return warn('Invalid type of parameters for cross()');
      }

      if (a.value.length !== 3 || b.value.length !== 3) {
        return warn('Invalid vector size of parameter for cross()');
      }

      const u = NumberArguments(a.value);
      const v = NumberArguments(b.value);

      if (!u || !v) {
        return warn('Invalid value in parameter vector for cross()');
      }

      for (const d of [...u, ...v]) {
        if (Number.isNaN(d)) {
          return warn('Invalid value (NaN) in parameter vector for cross()');
        }
        if (!Number.isFinite(d)) {
          return warn('Invalid value (INF) in parameter vector for cross()');
        }
      }

      return VectorValue([
        NumberValue(u[1] * v[2] - u[2] * v[1]),
        NumberValue(u[2] * v[0] - u[0] * v[2]),
        NumberValue(u[0] * v[1] - u[1] * v[0]),
      ]);

    },
  },

};
