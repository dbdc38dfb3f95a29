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

import type { UnionValue } from './union';
import { ValueType } from './value-type';

/** significant digits when rendering numbers, same as printf %g */
const PRECISION = 6;

/**
 * equality is only defined between values of the same type. comparing
 * across types is always false (not an error).
 */
export const ValuesEqual = (a: UnionValue, b: UnionValue): boolean => {

  switch (a.type) {
    case ValueType.undefined:
      return b.type === ValueType.undefined;

    case ValueType.number:
      return b.type === ValueType.number && a.value === b.value;

    case ValueType.string:
      return b.type === ValueType.string && a.value === b.value;

    case ValueType.vector:
      if (b.type !== ValueType.vector || a.value.length !== b.value.length) {
        return false;
      }
      for (let i = 0; i < a.value.length; i++) {
        if (!ValuesEqual(a.value[i], b.value[i])) {
          return false;
        }
      }
      return true;
  }

};

/** ordering is defined for numbers only */
export const ValueLessThan = (a: UnionValue, b: UnionValue): boolean => {
  return a.type === ValueType.number && b.type === ValueType.number && a.value < b.value;
};

/** ordering is defined for numbers only */
export const ValueGreaterThan = (a: UnionValue, b: UnionValue): boolean => {
  return a.type === ValueType.number && b.type === ValueType.number && a.value > b.value;
};

/**
 * returns the number, or the default value if this isn't a number.
 */
export const ToNumber = (value: UnionValue, default_value = 0): number => {
  return value.type === ValueType.number ? value.value : default_value;
};

export const GetNumber = (value: UnionValue): number|undefined => {
  return value.type === ValueType.number ? value.value : undefined;
};

/**
 * returns the list for vectors, and an empty list for anything else
 */
export const ToVector = (value: UnionValue): UnionValue[] => {
  return value.type === ValueType.vector ? value.value : [];
};

/**
 * read a vector of exactly two numbers
 */
export const GetVec2 = (value: UnionValue): [number, number]|undefined => {
  if (value.type !== ValueType.vector || value.value.length !== 2) {
    return undefined;
  }
  const [a, b] = value.value;
  if (a.type === ValueType.number && b.type === ValueType.number) {
    return [a.value, b.value];
  }
  return undefined;
};

/**
 * read a vector of exactly three numbers
 */
export const GetVec3 = (value: UnionValue): [number, number, number]|undefined => {
  if (value.type !== ValueType.vector || value.value.length !== 3) {
    return undefined;
  }
  const [a, b, c] = value.value;
  if (a.type === ValueType.number && b.type === ValueType.number && c.type === ValueType.number) {
    return [a.value, b.value, c.value];
  }
  return undefined;
};

const TrimZeros = (text: string): string => {
  if (!text.includes('.')) {
    return text;
  }
  return text.replace(/0+$/, '').replace(/\.$/, '');
};

/**
 * render a number the way printf %g does (6 significant digits,
 * trailing zeros dropped, exponent form for very large/small values).
 */
export const FormatNumber = (value: number): string => {

  if (Number.isNaN(value)) {
    return 'nan';
  }

  if (!Number.isFinite(value)) {
    return value > 0 ? 'inf' : '-inf';
  }

  if (value === 0) {
    return Object.is(value, -0) ? '-0' : '0';
  }

  const [mantissa, exponent_text] = value.toExponential(PRECISION - 1).split('e');
  const exponent = Number(exponent_text);

  if (exponent < -4 || exponent >= PRECISION) {
    const sign = exponent < 0 ? '-' : '+';
    const digits = Math.abs(exponent).toString().padStart(2, '0');
    return `${TrimZeros(mantissa)}e${sign}${digits}`;
  }

  return TrimZeros(value.toFixed(PRECISION - 1 - exponent));

};

/**
 * text rendering. strings are raw at the top level and quoted
 * when nested in a vector.
 */
export const ValueToString = (value: UnionValue, quote_strings = false): string => {
  switch (value.type) {
    case ValueType.undefined:
      return 'undef';
    case ValueType.number:
      return FormatNumber(value.value);
    case ValueType.string:
      return quote_strings ? `"${value.value}"` : value.value;
    case ValueType.vector:
      return '[' + value.value.map(entry => ValueToString(entry, true)).join(', ') + ']';
  }
};
