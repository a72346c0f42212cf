// Name synthesizer
// Draws first/last names independently from the seed pool and derives collision-free account ids

import { LabError } from "../models/errors.ts";
import { ACCOUNT_BASE_MAX_LENGTH, type GeneratedIdentity, type NameSeed, sanitizeAccountName } from "../models/user.ts";
import { cryptoRandom, type RandomSource } from "./random.ts";

// Suffixes 1..MAX_SUFFIX are tried before the seed pool is declared exhausted
export const MAX_SUFFIX = 9;

export function baseAccountId(firstName: string, lastName: string): string {
  return sanitizeAccountName(firstName.trim().charAt(0) + lastName).slice(0, ACCOUNT_BASE_MAX_LENGTH);
}

export class NameSynthesizer {
  private readonly random: RandomSource;

  constructor(random: RandomSource = cryptoRandom) {
    this.random = random;
  }

  /**
   * Generate exactly `count` identities. Claimed ids are added to `reserved`, which the
   * orchestrator owns for the duration of a run.
   */
  generate(seedPool: readonly NameSeed[], count: number, reserved: Set<string> = new Set()): GeneratedIdentity[] {
    if (seedPool.length === 0) {
      throw new LabError("InvalidArgument", "Name seed pool is empty");
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new LabError("InvalidArgument", `Identity count must be a positive integer, got ${count}`);
    }

    const identities: GeneratedIdentity[] = [];
    for (let i = 0; i < count; i++) {
      const firstName = seedPool[this.random.nextInt(seedPool.length)].firstName;
      const lastName = seedPool[this.random.nextInt(seedPool.length)].lastName;
      const accountId = this.claim(baseAccountId(firstName, lastName), reserved, identities.length);
      identities.push({ firstName, lastName, accountId });
    }
    return identities;
  }

  private claim(base: string, reserved: Set<string>, generated: number): string {
    if (base === "") {
      throw new LabError("InvalidArgument", "Name seed produced an empty account name");
    }

    if (!reserved.has(base)) {
      reserved.add(base);
      return base;
    }
    for (let suffix = 1; suffix <= MAX_SUFFIX; suffix++) {
      const candidate = `${base}${suffix}`;
      if (!reserved.has(candidate)) {
        reserved.add(candidate);
        return candidate;
      }
    }

    throw new LabError(
      "ExhaustedNameSpace",
      `No unique account name left for "${base}" after suffixes 1-${MAX_SUFFIX}; the name seed pool is too small`,
      { base, generated },
    );
  }
}

export default NameSynthesizer;
