// Config loader
// Parses the groups file (name,tier) and the name-seeds file (firstName,lastName)

import { readFile } from "node:fs/promises";
import { LabError } from "../models/errors.ts";
import { type GroupSpec, groupKey, parseGroupTier } from "../models/group.ts";
import { type NameSeed, sanitizeAccountName } from "../models/user.ts";
import type { ContextLogger } from "./logger.ts";

export interface LabConfigSource {
  loadGroupSpecs(): Promise<GroupSpec[]>;
  loadNameSeeds(): Promise<NameSeed[]>;
}

interface DataLine {
  lineNumber: number; // 1-based
  fields: string[];
}

// Yields the non-blank, non-comment lines split on commas
function* dataLines(text: string): Generator<DataLine> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "" || line.startsWith("#")) continue;
    yield { lineNumber: i + 1, fields: line.split(",").map((f) => f.trim()) };
  }
}

export function parseGroupSpecs(text: string, logger?: ContextLogger, source = "groups file"): GroupSpec[] {
  const specs: GroupSpec[] = [];
  const seen = new Set<string>();

  for (const { lineNumber, fields } of dataLines(text)) {
    const [groupName, rawTier] = fields;
    const tier = fields.length === 2 && groupName !== "" ? parseGroupTier(rawTier) : undefined;
    if (!tier) {
      logger?.warn("Skipping malformed group line", { source, line: lineNumber });
      continue;
    }

    const key = groupKey(groupName);
    if (seen.has(key)) {
      logger?.warn("Dropping duplicate group entry", { source, line: lineNumber, group: groupName });
      continue;
    }
    seen.add(key);
    specs.push({ groupName, tier });
  }

  return specs;
}

export function parseNameSeeds(text: string, logger?: ContextLogger, source = "names file"): NameSeed[] {
  const seeds: NameSeed[] = [];

  for (const { lineNumber, fields } of dataLines(text)) {
    const [firstName, lastName] = fields;
    if (fields.length !== 2) {
      logger?.warn("Skipping malformed name line", { source, line: lineNumber });
      continue;
    }
    if (sanitizeAccountName(firstName) === "" || sanitizeAccountName(lastName) === "") {
      logger?.warn("Skipping name line with no usable account characters", { source, line: lineNumber });
      continue;
    }
    seeds.push({ firstName, lastName });
  }

  return seeds;
}

export class FileConfigSource implements LabConfigSource {
  constructor(
    private readonly groupsPath: string,
    private readonly namesPath: string,
    private readonly logger?: ContextLogger,
  ) {}

  async loadGroupSpecs(): Promise<GroupSpec[]> {
    return parseGroupSpecs(await this.read(this.groupsPath), this.logger, this.groupsPath);
  }

  async loadNameSeeds(): Promise<NameSeed[]> {
    return parseNameSeeds(await this.read(this.namesPath), this.logger, this.namesPath);
  }

  private async read(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      throw new LabError("ConfigFileUnreadable", `Cannot read config file ${path}`, { path }, { cause: error });
    }
  }
}
