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

export interface RandomSource {

  /** uniform in [0, 1) */
  Next(): number;

}

const N = 624;
const M = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;

/** default seed for MT19937 */
export const DEFAULT_SEED = 5489;

/**
 * MT19937. we need our own generator (rather than Math.random) so
 * that seeded calls are reproducible.
 */
export class MersenneTwister implements RandomSource {

  private state = new Uint32Array(N);
  private index = N;

  constructor(seed = DEFAULT_SEED) {
    this.Seed(seed);
  }

  public Seed(seed: number): void {
    this.state[0] = seed >>> 0;
    for (let i = 1; i < N; i++) {
      const prev = this.state[i - 1] ^ (this.state[i - 1] >>> 30);
      this.state[i] = (Math.imul(1812433253, prev) + i) >>> 0;
    }
    this.index = N;
  }

  public NextUint32(): number {

    if (this.index >= N) {
      this.Twist();
    }

    let y = this.state[this.index++];
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;

    return y >>> 0;
  }

  public Next(): number {
    return this.NextUint32() / 0x100000000;
  }

  private Twist(): void {
    for (let i = 0; i < N; i++) {
      const y = (this.state[i] & UPPER_MASK) | (this.state[(i + 1) % N] & LOWER_MASK);
      let next = this.state[(i + M) % N] ^ (y >>> 1);
      if (y & 1) {
        next ^= MATRIX_A;
      }
      this.state[i] = next;
    }
    this.index = 0;
  }

}

/**
 * seed for the non-deterministic generator: wall clock plus process
 * id, so two processes started in the same second still differ.
 */
export const TimeSeed = (): number => {
  return (Math.floor(Date.now() / 1000) + process.pid) >>> 0;
};
