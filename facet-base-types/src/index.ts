/**
 * This file is part of TREB.
 * Copyright 2022 trebco, llc.
 * info@treb.app
 */

export * from './value-type';
export * from './union';
export * from './value-utils';
export * from './codepoints';
