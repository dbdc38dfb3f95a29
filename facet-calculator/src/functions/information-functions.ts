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
import { NumberValue, VectorValue, GetVec2, GetVec3 } from 'facet-base-types';

const VersionVector = (version: number[]) => VectorValue(version.map(part => NumberValue(part)));

export const InformationFunctionLibrary: FunctionMap = {

  Version: {
    description: 'Returns the version as [year, month, day]',
    arguments: [],
    category: ['Information'],
    fn: (context): FunctionResult => VersionVector(context.version),
  },

  Version_Num: {
    description: 'Returns a version vector as a single number, yyyymmdd',
    arguments: [
      { name: 'version', optional: true, description: 'defaults to the current version' },
    ],
    category: ['Information'],
    fn: (context, version?: UnionValue): FunctionResult => {

      const value = version || VersionVector(context.version);
      const parts = GetVec3(value) || GetVec2(value);

      if (!parts) {
        return TypeError();
      }

      const day = parts.length === 3 ? parts[2] : 0;
      return NumberValue(parts[0] * 10000 + parts[1] * 100 + day);

    },
  },

};
