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

// string length and indexing in the language are by codepoint. JS
// strings index by UTF-16 unit, so anything outside the BMP (emoji,
// playing cards, etc) would count twice if we used .length.

/**
 * split text into codepoints. each entry is a single codepoint, which
 * may be one or two UTF-16 units.
 */
export const Codepoints = (text: string): string[] => {
  return Array.from(text);
};

export const CodepointLength = (text: string): number => {
  let count = 0;
  for (const _ of text) {
    count++;
  }
  return count;
};

/**
 * first codepoint, or undefined for the empty string
 */
export const FirstCodepoint = (text: string): string|undefined => {
  const cp = text.codePointAt(0);
  return typeof cp === 'number' ? String.fromCodePoint(cp) : undefined;
};
