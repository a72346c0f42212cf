// Membership randomizer
// Picks "at least one, never all" subsets of candidate groups

import { LabError } from "../models/errors.ts";
import { cryptoRandom, type RandomSource } from "./random.ts";

export class MembershipRandomizer {
  private readonly random: RandomSource;

  constructor(random: RandomSource = cryptoRandom) {
    this.random = random;
  }

  /**
   * Random subset S with 1 <= |S| <= max(1, m - 1). A single candidate is always returned.
   * Members are drawn by rejection, which is fine for the tens of groups a lab config holds.
   */
  pickSubset(candidates: readonly string[]): Set<string> {
    const pool = [...new Set(candidates)];
    if (pool.length === 0) {
      throw new LabError("InvalidArgument", "Cannot pick a subset of an empty candidate list");
    }

    const size = 1 + this.random.nextInt(Math.max(1, pool.length - 1));
    const picked = new Set<string>();
    while (picked.size < size) {
      picked.add(pool[this.random.nextInt(pool.length)]);
    }
    return picked;
  }

  pickOne(candidates: readonly string[]): string {
    if (candidates.length === 0) {
      throw new LabError("InvalidArgument", "Cannot pick from an empty candidate list");
    }
    return candidates[this.random.nextInt(candidates.length)];
  }
}

export default MembershipRandomizer;
