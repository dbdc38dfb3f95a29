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
import { TypeError, MalformedTableError } from '../function-error';
import type { UnionValue } from 'facet-base-types';
import { ValueType, NumberValue, GetVec2 } from 'facet-base-types';

interface Bracket {
  x: number;
  y: number;
}

/**
 * piecewise-linear interpolation over a list of [x, y] pairs. the table
 * does not need to be sorted: we make one pass, keeping the tightest
 * pair at or below x (low) and at or above x (high).
 *
 * outside the table we clamp. note that below the table we return the
 * high bracket's y, and above the table the low bracket's y; at that
 * point both brackets are the nearest key, but only the named one has
 * been updated.
 */
export const Lookup = (x: UnionValue, table: UnionValue): FunctionResult => {

  if (x.type !== ValueType.number) {
    return TypeError();
  }

  if (table.type !== ValueType.vector || table.value.length < 2) {
    return MalformedTableError();
  }

  const first = GetVec2(table.value[0]);
  if (!first) {
    return MalformedTableError();
  }

  const p = x.value;
  const low: Bracket = { x: first[0], y: first[1] };
  const high: Bracket = { ...low };

  let pairs = 1;

  for (const entry of table.value.slice(1)) {

    const pair = GetVec2(entry);
    if (!pair) {
      continue; // skip malformed rows
    }

    pairs++;
    const [this_x, this_y] = pair;

    if (this_x <= p && (this_x > low.x || low.x > p)) {
      low.x = this_x;
      low.y = this_y;
    }

    if (this_x >= p && (this_x < high.x || high.x < p)) {
      high.x = this_x;
      high.y = this_y;
    }

  }

  if (pairs < 2) {
    return MalformedTableError();
  }

  if (p <= low.x) {
    return NumberValue(high.y);
  }

  if (p >= high.x) {
    return NumberValue(low.y);
  }

  const f = (p - low.x) / (high.x - low.x);
  return NumberValue(high.y * f + low.y * (1 - f));

};

export const LookupFunctionLibrary: FunctionMap = {

  Lookup: {
    description: 'Interpolates a value from a table of [key, value] pairs',
    arguments: [
      { name: 'key', },
      { name: 'table', description: 'list of [key, value] pairs, in any order' },
    ],
    category: ['Search'],
    fn: (context, x: UnionValue, table: UnionValue): FunctionResult => Lookup(x, table),
  },

};
