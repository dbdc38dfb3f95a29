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

import { ValueType } from './value-type';

/** plain JS representation of a value, for boxing and unboxing */
export type PlainValue = undefined | number | string | PlainValue[];

export interface UndefinedUnion {
  type: ValueType.undefined;
  value?: undefined;
}

export interface NumberUnion {
  type: ValueType.number;
  value: number;
}

export interface StringUnion {
  type: ValueType.string;
  value: string;
}

/** potentially recursive structure */
export interface VectorUnion {
  type: ValueType.vector;
  value: UnionValue[];
}

/** discriminated union. implicit type guards! */
export type UnionValue
    = UndefinedUnion
    | NumberUnion
    | StringUnion
    | VectorUnion
    ;

/**
 * this is a factory instead of a constant value to prevent any
 * accidental pollution
 */
export const UndefinedValue = (): UndefinedUnion => {
  return { type: ValueType.undefined };
};

export const NumberValue = (value: number): NumberUnion => {
  return { type: ValueType.number, value };
};

export const StringValue = (value: string): StringUnion => {
  return { type: ValueType.string, value };
};

export const VectorValue = (value: UnionValue[] = []): VectorUnion => {
  return { type: ValueType.vector, value };
};

/**
 * box a plain value. arrays are boxed recursively; anything we can't
 * represent becomes undefined.
 */
export const Box = (value: unknown): UnionValue => {

  if (typeof value === 'number') {
    return NumberValue(value);
  }

  if (typeof value === 'string') {
    return StringValue(value);
  }

  if (Array.isArray(value)) {
    return VectorValue(value.map((entry: unknown) => Box(entry)));
  }

  return UndefinedValue();

};

/** inverse of Box */
export const Unbox = (value: UnionValue): PlainValue => {
  switch (value.type) {
    case ValueType.number:
    case ValueType.string:
      return value.value;
    case ValueType.vector:
      return value.value.map(entry => Unbox(entry));
    case ValueType.undefined:
      return undefined;
  }
};

