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

import type { CompositeFunctionDescriptor, FunctionMap } from '../descriptors';
import type { FunctionResult } from '../function-error';
import { TypeError } from '../function-error';
import type { UnionValue } from 'facet-base-types';
import { ValueType, NumberValue } from 'facet-base-types';

// trig functions in the language work in degrees.

const DegreesToRadians = (x: number) => x * Math.PI / 180;
const RadiansToDegrees = (x: number) => x * 180 / Math.PI;

// assumes 26+26=52 bits mantissa. past this, reducing the angle mod 360
// loses all precision and the result would be meaningless.
const TRIG_HUGE_VAL = (2 ** 26) * 360 * (2 ** 26);

/**
 * reduce to [0, 360). returns NaN if the angle is too large to reduce.
 */
const ReduceDegrees = (x: number): number => {

  // use positive tests because of possible Inf/NaN

  if (x < 360 && x >= 0) {
    return x;
  }

  if (x < TRIG_HUGE_VAL && x > -TRIG_HUGE_VAL) {
    return x - 360 * Math.floor(x / 360);
  }

  return NaN;

};

/**
 * sin in degrees, exact at multiples of 30 and 45
 */
export const SinDegrees = (degrees: number): number => {

  let x = ReduceDegrees(degrees);
  if (Number.isNaN(x)) {
    return x;
  }

  const oppose = x >= 180;
  if (oppose) {
    x -= 180;
  }
  if (x > 90) {
    x = 180 - x;
  }

  if (x < 45) {
    x = (x === 30) ? 0.5 : Math.sin(DegreesToRadians(x));
  }
  else if (x === 45) {
    x = Math.SQRT1_2;
  }
  else {
    x = Math.cos(DegreesToRadians(90 - x));
  }

  return oppose ? -x : x;

};

/**
 * cos in degrees, exact at multiples of 45 and 60
 */
export const CosDegrees = (degrees: number): number => {

  let x = ReduceDegrees(degrees);
  if (Number.isNaN(x)) {
    return x;
  }

  let oppose = x >= 180;
  if (oppose) {
    x -= 180;
  }
  if (x > 90) {
    x = 180 - x;
    oppose = !oppose;
  }

  if (x > 45) {
    x = (x === 60) ? 0.5 : Math.sin(DegreesToRadians(90 - x));
  }
  else if (x === 45) {
    x = Math.SQRT1_2;
  }
  else {
    x = Math.cos(DegreesToRadians(x));
  }

  return oppose ? -x : x;

};

/** C-style round: halves go away from zero */
export const RoundHalfAway = (x: number): number => {
  return x < 0 ? -Math.round(-x) : Math.round(x);
};

/**
 * wrap a function of one number
 */
const Unary = (description: string, base: (x: number) => number): CompositeFunctionDescriptor => {
  return {
    description,
    arguments: [{ name: 'x' }],
    category: ['Math'],
    fn: (context, x: UnionValue): FunctionResult => {
      if (x.type !== ValueType.number) {
        return TypeError();
      }
      return NumberValue(base(x.value));
    },
  };
};

/**
 * wrap a function of two numbers
 */
const Binary = (description: string, names: [string, string], base: (a: number, b: number) => number): CompositeFunctionDescriptor => {
  return {
    description,
    arguments: [{ name: names[0] }, { name: names[1] }],
    category: ['Math'],
    fn: (context, a: UnionValue, b: UnionValue): FunctionResult => {
      if (a.type !== ValueType.number || b.type !== ValueType.number) {
        return TypeError();
      }
      return NumberValue(base(a.value, b.value));
    },
  };
};

export const MathFunctionLibrary: FunctionMap = {

  Abs: Unary('Returns the absolute value', Math.abs),

  Sign: Unary('Returns -1, 0 or 1 according to the sign of the argument',
    x => (x < 0) ? -1 : ((x > 0) ? 1 : 0)),

  Sin: Unary('Returns the sine of an angle in degrees', SinDegrees),
  Cos: Unary('Returns the cosine of an angle in degrees', CosDegrees),
  Tan: Unary('Returns the tangent of an angle in degrees', x => Math.tan(DegreesToRadians(x))),

  Asin: Unary('Returns the arcsine, in degrees', x => RadiansToDegrees(Math.asin(x))),
  Acos: Unary('Returns the arccosine, in degrees', x => RadiansToDegrees(Math.acos(x))),
  Atan: Unary('Returns the arctangent, in degrees', x => RadiansToDegrees(Math.atan(x))),

  Atan2: Binary('Returns the angle of the point (x, y), in degrees', ['y', 'x'],
    (y, x) => RadiansToDegrees(Math.atan2(y, x))),

  Pow: Binary('Returns base raised to the given power', ['base', 'exponent'], Math.pow),

  Round: Unary('Rounds to the nearest integer, halves away from zero', RoundHalfAway),
  Ceil: Unary('Rounds up to an integer', Math.ceil),
  Floor: Unary('Rounds down to an integer', Math.floor),

  Sqrt: Unary('Returns the square root of the argument', Math.sqrt),
  Exp: Unary('Returns e raised to the given power', Math.exp),
  Ln: Unary('Returns the natural logarithm', Math.log),

  Log: {
    description: 'Returns the logarithm of a number, base 10 unless a base is given',
    arguments: [
      { name: 'base or number', },
      { name: 'number', optional: true, },
    ],
    category: ['Math'],
    fn: (context, a: UnionValue, b?: UnionValue): FunctionResult => {
      if (a.type !== ValueType.number) {
        return TypeError();
      }
      if (!b) {
        return NumberValue(Math.log(a.value) / Math.log(10));
      }
      if (b.type !== ValueType.number) {
        return TypeError();
      }
      return NumberValue(Math.log(b.value) / Math.log(a.value));
    },
  },

};
