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

/**
 * non-fatal warnings from functions (search terms not found, bad
 * arguments to norm/cross, and so on). the sink never changes a
 * function's result.
 */
export interface DiagnosticSink {
  warn(message: string): void;
}

/** default sink, writes to the console */
export class ConsoleDiagnostics implements DiagnosticSink {
  public warn(message: string): void {
    console.warn(`WARNING: ${message}`);
  }
}

/**
 * keeps messages in a list. embedding hosts that render their own
 * console can drain this after each evaluation.
 */
export class CollectingDiagnostics implements DiagnosticSink {

  public readonly messages: string[] = [];

  public warn(message: string): void {
    this.messages.push(message);
  }

  /** returns and clears the list */
  public Flush(): string[] {
    return this.messages.splice(0, this.messages.length);
  }

}
