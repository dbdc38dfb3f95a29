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

export enum ErrorType {
  Arity =          'ARITY',
  Type =           'TYPE',
  MalformedTable = 'TABLE',
}

/**
 * functions return this instead of a value when the call is invalid.
 * it never reaches the evaluator; the calculator converts it to undefined.
 */
export interface FunctionError {
  error: ErrorType;
}

export type FunctionResult = UnionValue|FunctionError;

export const ArityError = (): FunctionError => {
  return { error: ErrorType.Arity };
};

export const TypeError = (): FunctionError => {
  return { error: ErrorType.Type };
};

export const MalformedTableError = (): FunctionError => {
  return { error: ErrorType.MalformedTable };
};

/** type guard function */
export const IsError = (test: FunctionResult): test is FunctionError => {
  return 'error' in test && (
    test.error === ErrorType.Arity ||
    test.error === ErrorType.Type ||
    test.error === ErrorType.MalformedTable
  );
};
