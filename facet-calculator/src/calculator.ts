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
import { UndefinedValue } from 'facet-base-types';

import { FunctionLibrary } from './function-library';
import type { CompositeFunctionDescriptor, FunctionContext, FunctionMap } from './descriptors';
import type { DiagnosticSink } from './diagnostics';
import { ConsoleDiagnostics } from './diagnostics';
import type { FunctionResult } from './function-error';
import { ArityError, IsError } from './function-error';
import { MersenneTwister, TimeSeed } from './random';

import { SearchFunctionLibrary } from './functions/search-functions';
import { LookupFunctionLibrary } from './functions/lookup-functions';
import { MathFunctionLibrary } from './functions/math-functions';
import { VectorFunctionLibrary } from './functions/vector-functions';
import { RandomFunctionLibrary } from './functions/random-functions';
import { InformationFunctionLibrary } from './functions/information-functions';

export interface CalculatorOptions {

  /** warnings from functions. defaults to the console. */
  diagnostics: DiagnosticSink;

  /**
   * seed for the shared (non-deterministic) generator. if this is not
   * set we seed from the clock and process id.
   */
  random_seed?: number;

  /** returned by version(), as [year, month, day] */
  version: number[];

}

export const DefaultCalculatorOptions: CalculatorOptions = {
  diagnostics: new ConsoleDiagnostics(),
  version: [2026, 10, 18],
};

/** count of arguments that must be present */
const RequiredArguments = (descriptor: CompositeFunctionDescriptor): number => {
  return (descriptor.arguments || []).filter(argument =>
    !argument.optional && typeof argument.default === 'undefined').length;
};

/**
 * the call surface for the evaluator. functions are looked up by name
 * (icase), called with already-evaluated arguments, and always return
 * a value: any error from a function comes back as undefined.
 */
export class Calculator {

  protected readonly library = new FunctionLibrary();

  protected registered_libraries: Record<string, boolean> = {};

  protected options: CalculatorOptions;

  protected context: FunctionContext;

  constructor(calculator_options: Partial<CalculatorOptions> = {}) {

    this.options = {
      ...DefaultCalculatorOptions,
      ...calculator_options,
    };

    // one non-deterministic generator per calculator, seeded once.

    this.context = {
      diagnostics: this.options.diagnostics,
      random: new MersenneTwister(this.options.random_seed ?? TimeSeed()),
      version: [...this.options.version],
    };

    this.library.Register(
      SearchFunctionLibrary,
      LookupFunctionLibrary,
      MathFunctionLibrary,
      VectorFunctionLibrary,
      RandomFunctionLibrary,
      InformationFunctionLibrary,
    );

  }

  /**
   * register an additional library, once. returns false if a library
   * with this name has already been registered.
   */
  public RegisterLibrary(name: string, map: FunctionMap): boolean {
    if (this.registered_libraries[name]) {
      return false;
    }
    this.library.Register(map);
    this.registered_libraries[name] = true;
    return true;
  }

  /** returns a list of available function names, canonical case */
  public SupportedFunctions(): string[] {
    return Object.values(this.library.List()).map(descriptor => descriptor.canonical_name);
  }

  /**
   * call a function by name. unknown functions warn; arity and type
   * problems do not.
   */
  public Call(name: string, args: UnionValue[]): UnionValue {

    const descriptor = this.library.Get(name);

    if (!descriptor) {
      this.context.diagnostics.warn(`Ignoring unknown function '${name}'`);
      return UndefinedValue();
    }

    let result: FunctionResult;

    const count = (descriptor.arguments || []).length;
    if (args.length < RequiredArguments(descriptor) || (!descriptor.variadic && args.length > count)) {
      result = ArityError();
    }
    else {
      result = descriptor.fn(this.context, ...args);
    }

    if (IsError(result)) {
      return UndefinedValue();
    }

    return result;

  }

}
