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

import type { UnionValue } from 'facet-base-types';
import { ValueType } from 'facet-base-types';

/**
 * read an unsigned integer argument (counts, indexes). missing or
 * undefined arguments take the default; fractions are truncated.
 * returns false for anything else, including negative numbers.
 */
export const UnsignedArgument = (argument: UnionValue|undefined, default_value: number): number|false => {

  if (!argument) {
    return default_value;
  }

  switch (argument.type) {
    case ValueType.undefined:
      return default_value;

    case ValueType.number:
      if (!Number.isFinite(argument.value) || argument.value < 0) {
        return false;
      }
      return Math.trunc(argument.value);
  }

  return false;

};

/**
 * unwrap numeric arguments. returns false if any argument is not a
 * number.
 */
export const NumberArguments = (args: UnionValue[]): number[]|false => {
  const result: number[] = [];
  for (const arg of args) {
    if (arg.type !== ValueType.number) {
      return false;
    }
    result.push(arg.value);
  }
  return result;
};
