/**
 * This file is part of TREB.
 * Copyright 2022 trebco, llc.
 * info@treb.app
 */

export { Calculator, DefaultCalculatorOptions } from './calculator';
export type { CalculatorOptions } from './calculator';
export { FunctionLibrary } from './function-library';
export type * from './descriptors';
export * from './function-error';
export * from './diagnostics';
export * from './random';

export { Search, SearchFunctionLibrary, DefaultSearchOptions } from './functions/search-functions';
export type { SearchOptions } from './functions/search-functions';
export { Lookup, LookupFunctionLibrary } from './functions/lookup-functions';
export { MathFunctionLibrary, SinDegrees, CosDegrees, RoundHalfAway } from './functions/math-functions';
export { VectorFunctionLibrary } from './functions/vector-functions';
export { RandomFunctionLibrary, UniformValues } from './functions/random-functions';
export { InformationFunctionLibrary } from './functions/information-functions';
