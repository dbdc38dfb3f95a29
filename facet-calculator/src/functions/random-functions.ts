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
import { NumberValue, VectorValue } from 'facet-base-types';
import type { RandomSource } from '../random';
import { MersenneTwister } from '../random';
import { NumberArguments } from './function-utilities';

/**
 * count uniform values in [min, max). bounds may be given in either
 * order.
 */
export const UniformValues = (source: RandomSource, min: number, max: number, count: number): number[] => {

  if (max < min) {
    [min, max] = [max, min];
  }

  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(min === max ? min : min + source.Next() * (max - min));
  }

  return values;

};

export const RandomFunctionLibrary: FunctionMap = {

  Rands: {
    description: 'Returns a vector of random numbers',
    arguments: [
      { name: 'min' },
      { name: 'max' },
      { name: 'count' },
      { name: 'seed', optional: true, description: 'seeded calls always return the same values' },
    ],
    category: ['Math'],
    fn: (context, ...args: UnionValue[]): FunctionResult => {

      const numbers = NumberArguments(args);
      if (!numbers) {
        return TypeError();
      }

      const [min, max, count] = numbers;

      // a seed gets its own generator for this call only; the shared
      // generator is not touched.

      const source = numbers.length > 3 ?
        new MersenneTwister(Math.trunc(numbers[3])) : context.random;

      return VectorValue(UniformValues(source, min, max, Math.max(0, Math.trunc(count))).map(value => NumberValue(value)));

    },
  },

};
