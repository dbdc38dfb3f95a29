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

import type {
  ExtendedFunctionDescriptor, FunctionMap, ExtendedFunctionMap } from './descriptors';

/** longest name we accept */
const MAX_NAME_LENGTH = 255;

/**
 * names are identifiers in the language: a letter, then letters,
 * digits, dots or underscores. returns a reason if the name is no good.
 */
const NameProblem = (name: string): string|undefined => {
  if (!/^[a-zA-Z]/.test(name)) {
    return 'must start with a letter';
  }
  if (/[^a-zA-Z0-9._]/.test(name)) {
    return 'contains an invalid character';
  }
  if (name.length > MAX_NAME_LENGTH) {
    return `longer than ${MAX_NAME_LENGTH} characters`;
  }
  return undefined;
};

/**
 * function registry. names are case-insensitive; the call surface
 * (arity, errors) lives in the calculator.
 */
export class FunctionLibrary {

  /** keyed by lowercase name */
  protected functions: ExtendedFunctionMap = {};

  /**
   * add the functions in each map. map keys become canonical names,
   * which show up in listings. throws on a bad or duplicate name.
   */
  public Register(...maps: FunctionMap[]): void {
    for (const map of maps) {
      for (const [name, descriptor] of Object.entries(map)) {

        const problem = NameProblem(name);
        if (problem) {
          throw new Error(`can't register function "${name}": ${problem}`);
        }

        const key = name.toLowerCase();
        if (this.Get(key)) {
          throw new Error(`can't register function "${name}": ${key} is already registered`);
        }

        // copy, so the caller's map is left alone
        this.functions[key] = { ...descriptor, canonical_name: name };

      }
    }
  }

  /** lookup function (actual map is protected) */
  public Get(name: string): ExtendedFunctionDescriptor|undefined {
    const normalized = name.toLowerCase();
    return Object.prototype.hasOwnProperty.call(this.functions, normalized) ?
      this.functions[normalized] : undefined;
  }

  /** get a list, for documentation/AC services */
  public List(): ExtendedFunctionMap {
    return { ...this.functions };
  }

  /**
   * create an alias. we clone the descriptor and use the alias as the
   * canonical name, so should work better than just a pointer.
   */
  public Alias(name: string, reference: string): void {
    const ref = this.Get(reference);
    if (!ref) {
      throw new Error(`referenced function ${reference} does not exist`);
    }
    const { canonical_name: _, ...descriptor } = ref;
    this.Register({[name]: descriptor});
  }

}
