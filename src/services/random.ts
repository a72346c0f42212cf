// Injectable randomness so selection logic can be driven deterministically in tests

import { randomInt } from "node:crypto";

export interface RandomSource {
  /** Uniform integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number;
}

export const cryptoRandom: RandomSource = {
  nextInt: (maxExclusive) => randomInt(maxExclusive),
};
