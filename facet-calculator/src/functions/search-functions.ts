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
import type { DiagnosticSink } from '../diagnostics';
import type { FunctionResult } from '../function-error';
import { TypeError } from '../function-error';
import type { UnionValue } from 'facet-base-types';
import { ValueType, NumberValue, VectorValue, UndefinedValue,
         ValuesEqual, ToVector, ValueToString, FormatNumber,
         Codepoints, FirstCodepoint } from 'facet-base-types';
import { UnsignedArgument } from './function-utilities';

/*
 * search(match_value | list_of_match_values, table, [returns_per_match], [column])
 *
 *   search("a", "abcdabcd")          => [0]
 *   search("a", "abcdabcd", 0)       => [[0, 4]]
 *   search("e", "abcdabcd")          => [] (and a warning)
 *   search("abc", rows, 1)           => [0, 1, 2]
 *   search("abce", rows, 2)          => [[0, 4], [1, 5], [2, 6], [8]]
 *
 * returns_per_match is 1 by default, meaning return the first match for
 * each term as a bare index. 0 means all matches and n > 1 means up to
 * n matches; either one nests the matches for each term.
 */

export interface SearchOptions {

  /** matches per term; 0 is unbounded, 1 returns flat indexes */
  returns_per_match: number;

  /** column to match in each table row */
  column: number;

}

export const DefaultSearchOptions: SearchOptions = {
  returns_per_match: 1,
  column: 0,
};

/**
 * format a term for warnings. strings are quoted; only numbers and
 * strings are reported.
 */
const FormatTerm = (term: UnionValue): string|undefined => {
  switch (term.type) {
    case ValueType.number:
      return FormatNumber(term.value);
    case ValueType.string:
      return `"${term.value}"`;
    default:
      return undefined;
  }
};

const NotFound = (diagnostics: DiagnosticSink, term: UnionValue) => {
  const text = FormatTerm(term);
  if (typeof text === 'string') {
    diagnostics.warn(`search term not found: ${text}`);
  }
};

/**
 * a row matches if it is the term (column 0 only), or if the row is a
 * vector with a matching entry at the column.
 */
const RowMatches = (term: UnionValue, row: UnionValue, column: number): boolean => {
  if (column === 0 && ValuesEqual(term, row)) {
    return true;
  }
  return row.type === ValueType.vector
    && column < row.value.length
    && ValuesEqual(term, row.value[column]);
};

/**
 * indexes of rows matching the term, in table order. stops at limit
 * unless limit is 0.
 */
const MatchRows = (term: UnionValue, rows: UnionValue[], column: number, limit: number): number[] => {
  const matches: number[] = [];
  for (const [index, row] of rows.entries()) {
    if (RowMatches(term, row, column)) {
      matches.push(index);
      if (limit && matches.length >= limit) {
        break;
      }
    }
  }
  return matches;
};

/**
 * same thing for codepoints. keys are the table's codepoints (or one
 * key per row), undefined keys never match.
 */
const MatchKeys = (codepoint: string, keys: Array<string|undefined>, limit: number): number[] => {
  const matches: number[] = [];
  for (const [index, key] of keys.entries()) {
    if (key === codepoint) {
      matches.push(index);
      if (limit && matches.length >= limit) {
        break;
      }
    }
  }
  return matches;
};

const IndexVector = (indexes: number[]) => VectorValue(indexes.map(index => NumberValue(index)));

/**
 * a number is matched against table rows; the result is a flat list of
 * row indexes. no warning if nothing matches.
 */
const SearchNumber = (query: UnionValue, table: UnionValue, options: SearchOptions): UnionValue => {
  return IndexVector(MatchRows(query, ToVector(table), options.column, options.returns_per_match));
};

/**
 * each codepoint in the query is a separate term. against a string
 * table we match every codepoint of the table; against anything else
 * we match the first codepoint of each row's column, as text.
 */
const SearchText = (query: string, table: UnionValue, options: SearchOptions, diagnostics: DiagnosticSink): UnionValue => {

  const { column, returns_per_match } = options;

  const keys: Array<string|undefined> = table.type === ValueType.string ?
    Codepoints(table.value) :
    ToVector(table).map(row => {
      if (row.type === ValueType.vector && column < row.value.length) {
        return FirstCodepoint(ValueToString(row.value[column]));
      }
      return undefined;
    });

  const result: UnionValue[] = [];

  for (const codepoint of Codepoints(query)) {

    const matches = MatchKeys(codepoint, keys, returns_per_match);

    if (!matches.length) {
      NotFound(diagnostics, { type: ValueType.string, value: codepoint });
    }

    if (returns_per_match === 1) {
      if (matches.length) {
        result.push(NumberValue(matches[0]));
      }
    }
    else {
      result.push(IndexVector(matches));
    }

  }

  return VectorValue(result);

};

/**
 * each entry in the query is a separate term, matched against table
 * rows. there's always one result slot per term: with one return per
 * match, a matched term is a bare index and an unmatched term is an
 * empty list.
 */
const SearchList = (query: UnionValue[], table: UnionValue, options: SearchOptions, diagnostics: DiagnosticSink): UnionValue => {

  const { column, returns_per_match } = options;
  const rows = ToVector(table);
  const result: UnionValue[] = [];

  for (const term of query) {

    const matches = MatchRows(term, rows, column, returns_per_match);

    if (!matches.length) {
      NotFound(diagnostics, term);
    }

    if (returns_per_match === 1 && matches.length) {
      result.push(NumberValue(matches[0]));
    }
    else {
      result.push(IndexVector(matches));
    }

  }

  return VectorValue(result);

};

/**
 * search entry point. this never fails: unmatched terms are reported
 * to diagnostics and show up as empty or missing slots, and a query we
 * can't search on returns undefined (with a warning).
 */
export const Search = (
    query: UnionValue,
    table: UnionValue,
    diagnostics: DiagnosticSink,
    options: Partial<SearchOptions> = {}): UnionValue => {

  const resolved: SearchOptions = { ...DefaultSearchOptions, ...options };

  switch (query.type) {
    case ValueType.number:
      return SearchNumber(query, table, resolved);

    case ValueType.string:
      return SearchText(query.value, table, resolved, diagnostics);

    case ValueType.vector:
      return SearchList(query.value, table, resolved, diagnostics);

    case ValueType.undefined:
      diagnostics.warn(`search: none performed on input ${ValueToString(query)}`);
      return UndefinedValue();
  }

};

export const SearchFunctionLibrary: FunctionMap = {

  Search: {
    description: 'Returns the indexes of matching entries in a string or table',
    arguments: [
      { name: 'match value', description: 'number, string, or list of values' },
      { name: 'table', description: 'string, or list of rows' },
      { name: 'returns per match', default: 1, description: '0 for all matches' },
      { name: 'column', default: 0, description: 'column to match in each row' },
    ],
    category: ['Search'],
    fn: (context, query: UnionValue, table: UnionValue, returns?: UnionValue, column?: UnionValue): FunctionResult => {

      const returns_per_match = UnsignedArgument(returns, DefaultSearchOptions.returns_per_match);
      const column_index = UnsignedArgument(column, DefaultSearchOptions.column);

      if (returns_per_match === false || column_index === false) {
        return TypeError();
      }

      return Search(query, table, context.diagnostics, {
        returns_per_match,
        column: column_index,
      });

    },
  },

};
