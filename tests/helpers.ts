// Shared fixtures for the test suite

import type { GroupSpec } from "../src/models/group.ts";
import type { NameSeed } from "../src/models/user.ts";
import type { LabConfigSource } from "../src/services/config_loader.ts";
import { createLogger, type StructuredLogger } from "../src/services/logger.ts";
import type { RandomSource } from "../src/services/random.ts";

/** Replays the given draws, each reduced modulo the requested bound; wraps around when exhausted */
export function scriptedRandom(draws: number[]): RandomSource & { calls: number[] } {
  let position = 0;
  const calls: number[] = [];
  return {
    calls,
    nextInt(maxExclusive: number): number {
      calls.push(maxExclusive);
      const value = draws[position % draws.length];
      position++;
      return value % maxExclusive;
    },
  };
}

/** Small deterministic LCG for runs that need many varied draws */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    nextInt(maxExclusive: number): number {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      // high bits; the low bits of an LCG cycle with short periods
      return Math.floor((state / 0x100000000) * maxExclusive);
    },
  };
}

export function quietLogger(): StructuredLogger {
  return createLogger("test", { enableConsole: false, enableFile: false }, {});
}

export class StaticConfigSource implements LabConfigSource {
  constructor(
    private readonly groups: GroupSpec[],
    private readonly seeds: NameSeed[],
  ) {}

  loadGroupSpecs(): Promise<GroupSpec[]> {
    return Promise.resolve([...this.groups]);
  }

  loadNameSeeds(): Promise<NameSeed[]> {
    return Promise.resolve([...this.seeds]);
  }
}
