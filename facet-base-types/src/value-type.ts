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

/**
 * list of value types, as strings, for anything that leaves the
 * library (diagnostics, serialized values).
 */
export const ValueTypeList = [
  'undefined',
  'number',
  'string',
  'vector',
] as const;

export type SerializedValueType = typeof ValueTypeList[number];

/**
 * value types. undefined is 0 so we can test it as falsy.
 *
 * DO NOT MODIFY EXISTING INDEXES; the serialized list above is
 * indexed by these values.
 */
export enum ValueType {
  undefined = 0,
  number = 1,
  string = 2,

  // nested, possibly heterogeneous, possibly empty
  vector = 3,
}

/**
 * map a plain JS value to the type it would box to. anything we can't
 * represent (booleans, objects, functions) maps to undefined.
 */
export const GetValueType = (value: unknown): ValueType => {

  switch (typeof value){

    case 'number':
      return ValueType.number;

    case 'string':
      return ValueType.string;

    case 'object':
      if (Array.isArray(value)) {
        return ValueType.vector;
      }
      return ValueType.undefined;

    default:
      return ValueType.undefined;

  }
};

export const SerializeValueType = (type: ValueType): SerializedValueType => {
  return ValueTypeList[type];
};
