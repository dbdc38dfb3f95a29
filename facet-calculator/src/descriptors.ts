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
import type { FunctionResult } from './function-error';
import type { DiagnosticSink } from './diagnostics';
import type { RandomSource } from './random';

/**
 * everything a function may touch besides its arguments. functions
 * must not hold on to any of this between calls.
 */
export interface FunctionContext {

  /** warnings go here */
  diagnostics: DiagnosticSink;

  /**
   * the non-deterministic generator. seeded calls construct their own
   * generator instead of reseeding this one.
   */
  random: RandomSource;

  /** returned by version() */
  version: number[];

}

/**
 * descriptor for an individual argument
 */
export interface ArgumentDescriptor {

  name?: string;
  description?: string;

  /**
   * default value if the argument is omitted. an argument with a
   * default is optional for arity checks.
   */
  default?: number|string;

  /**
   * optional argument with no default (the function decides what to
   * do when it's missing).
   */
  optional?: boolean;

}

/**
 * merging the old function descriptor and decorated function types, since
 * there's a good deal of overlap and we spend a lot of effort keeping them
 * in sync.
 */
export interface CompositeFunctionDescriptor {

  /**
   * description for tooltips/documentation
   */
  description?: string;

  /**
   * list of arguments. also used for arity checks: arguments without a
   * default (and not optional) are required, and the function may not
   * be called with more arguments than are listed unless it's variadic.
   */
  arguments?: ArgumentDescriptor[];

  /**
   * accepts any number of arguments past the listed ones
   */
  variadic?: boolean;

  /**
   * for the future
   */
  category?: string[];

  /**
   * the actual function. arguments are already evaluated and boxed.
   */
  fn: (context: FunctionContext, ...args: UnionValue[]) => FunctionResult;

}

export interface FunctionMap {
  [index: string]: CompositeFunctionDescriptor;
}

/**
 * the stored function type has a canonical name. we use this to
 * normalize case in function names.
 */
export interface ExtendedFunctionDescriptor extends CompositeFunctionDescriptor {
  canonical_name: string;
}

export interface ExtendedFunctionMap {
  [index: string]: ExtendedFunctionDescriptor;
}
