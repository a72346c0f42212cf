// Lab orchestrator
// Runs the population stages in order: validate, provision groups, wire roles, generate
// identities, provision and wire users, export credentials.

import { randomUUID } from "node:crypto";
import {
  type DirectoryAdaptor,
  type DirectoryResult,
  GroupScope,
  GroupType,
  MembershipOperation,
} from "../adaptors/types.ts";
import { LabError } from "../models/errors.ts";
import { type ClassifiedGroups, describeGroup, type GroupSpec, groupKey } from "../models/group.ts";
import {
  type OperatingMode,
  resolveOperatingMode,
  wiresRoleGroups,
  wiresUsersToAccessGroups,
} from "../models/operating_mode.ts";
import type { LabRunReport } from "../models/run_report.ts";
import { type Credential, displayNameOf, type GeneratedIdentity, type NameSeed } from "../models/user.ts";
import { childDN, defaultUserContainer, dnEquals, validateDN } from "../protocol/dn.ts";
import type { LabConfigSource } from "./config_loader.ts";
import { writeCredentialExport } from "./credential_export.ts";
import { MembershipRandomizer } from "./membership_randomizer.ts";
import { classifyGroups } from "./group_classifier.ts";
import { type ContextLogger, createLogger, type StructuredLogger } from "./logger.ts";
import { RunMetricsService } from "./metrics.ts";
import { NameSynthesizer } from "./name_synthesizer.ts";
import {
  DEFAULT_PASSWORD_LENGTH,
  generatePassword,
  MAX_PASSWORD_LENGTH,
  MIN_PASSWORD_LENGTH,
} from "./password_generator.ts";
import { cryptoRandom, type RandomSource } from "./random.ts";

export const MIN_USER_COUNT = 1;
export const MAX_USER_COUNT = 10000;
export const DEFAULT_USER_COUNT = 40;
export const MAX_CONCURRENCY = 16;

export interface LabRunRequest {
  domain: string; // DNS name, e.g. corp.example.com
  targetLocation?: string; // DN; defaults to the domain's Users container
  userCount: number;
  cleanRoles?: boolean;
  noRoles?: boolean;
  exportPasswords?: boolean;
  exportPath?: string;
  passwordLength?: number;
  concurrency?: number; // identities provisioned in parallel during user provisioning
}

export interface LabOrchestratorOptions {
  adaptor: DirectoryAdaptor;
  configSource: LabConfigSource;
  random?: RandomSource;
  passwordGenerator?: (length: number) => string;
  exportCredentials?: (credentials: readonly Credential[], path?: string) => Promise<string>;
  logger?: StructuredLogger;
}

// Run-scoped state threaded through the stages
interface LabRunContext {
  readonly runId: string;
  readonly mode: OperatingMode;
  readonly domain: string;
  readonly targetLocation: string;
  readonly groups: ClassifiedGroups;
  readonly specs: ReadonlyMap<string, GroupSpec>;
  readonly seeds: readonly NameSeed[];
  readonly reservedAccountIds: Set<string>;
  readonly credentials: Array<{ index: number; credential: Credential }>;
  readonly metrics: RunMetricsService;
  readonly logger: ContextLogger;
}

export class LabOrchestrator {
  private readonly adaptor: DirectoryAdaptor;
  private readonly configSource: LabConfigSource;
  private readonly synthesizer: NameSynthesizer;
  private readonly randomizer: MembershipRandomizer;
  private readonly passwordGenerator: (length: number) => string;
  private readonly exportCredentials: (credentials: readonly Credential[], path?: string) => Promise<string>;
  private readonly logger: StructuredLogger;
  private lastMetrics?: RunMetricsService;

  constructor(options: LabOrchestratorOptions) {
    const random = options.random ?? cryptoRandom;
    this.adaptor = options.adaptor;
    this.configSource = options.configSource;
    this.synthesizer = new NameSynthesizer(random);
    this.randomizer = new MembershipRandomizer(random);
    this.passwordGenerator = options.passwordGenerator ?? generatePassword;
    this.exportCredentials = options.exportCredentials ?? writeCredentialExport;
    this.logger = options.logger ?? createLogger("labseed");
  }

  /** Metrics of the most recent run, including one that ended in a fatal error */
  get metrics(): RunMetricsService | undefined {
    return this.lastMetrics;
  }

  async run(request: LabRunRequest): Promise<LabRunReport> {
    const startedAt = new Date().toISOString();
    const context = await this.loadAndValidate(request);
    this.lastMetrics = context.metrics;
    context.logger.info("Starting lab population", {
      mode: context.mode,
      domain: context.domain,
      targetLocation: context.targetLocation,
      userCount: request.userCount,
      accessGroups: context.groups.accessGroups.length,
      roleGroups: context.groups.roleGroups.length,
    });

    await this.provisionGroups(context);
    if (wiresRoleGroups(context.mode)) {
      await this.wireRoleGroups(context);
    }

    const identities = this.synthesizer.generate(context.seeds, request.userCount, context.reservedAccountIds);
    context.logger.debug("Generated identities", { count: identities.length });

    await this.provisionUsers(context, identities, request);

    const credentials = context.credentials
      .sort((a, b) => a.index - b.index)
      .map((c) => c.credential);
    let exportPath: string | undefined;
    if (request.exportPasswords) {
      exportPath = await this.exportCredentials(credentials, request.exportPath);
      context.logger.info("Exported passwords", { path: exportPath, accounts: credentials.length });
    }

    const snapshot = context.metrics.getSnapshot();
    const report: LabRunReport = {
      mode: context.mode,
      targetLocation: context.targetLocation,
      groupsCreated: snapshot.groupsCreated,
      groupsSkipped: snapshot.groupsSkipped,
      roleMembershipsAdded: snapshot.roleMembershipsAdded,
      roleMembershipsFailed: snapshot.roleMembershipsFailed,
      usersCreated: snapshot.usersCreated,
      usersFailed: snapshot.usersFailed,
      userMembershipsAdded: snapshot.userMembershipsAdded,
      userMembershipsFailed: snapshot.userMembershipsFailed,
      credentials: request.exportPasswords ? credentials : [],
      ...(exportPath ? { exportPath } : {}),
      startedAt,
      finishedAt: new Date().toISOString(),
    };
    context.logger.info("Lab population finished", {
      usersCreated: report.usersCreated,
      usersFailed: report.usersFailed,
      membershipsSkipped: report.roleMembershipsFailed + report.userMembershipsFailed,
    });
    return report;
  }

  // ---------- Stage 1: load & validate ----------

  private async loadAndValidate(request: LabRunRequest): Promise<LabRunContext> {
    const mode = resolveOperatingMode(request);

    if (!Number.isInteger(request.userCount) || request.userCount < MIN_USER_COUNT || request.userCount > MAX_USER_COUNT) {
      throw new LabError(
        "InvalidArgument",
        `User count must be between ${MIN_USER_COUNT} and ${MAX_USER_COUNT}, got ${request.userCount}`,
      );
    }
    const concurrency = request.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      throw new LabError("InvalidArgument", `Concurrency must be between 1 and ${MAX_CONCURRENCY}, got ${concurrency}`);
    }
    const passwordLength = request.passwordLength ?? DEFAULT_PASSWORD_LENGTH;
    if (!Number.isInteger(passwordLength) || passwordLength < MIN_PASSWORD_LENGTH || passwordLength > MAX_PASSWORD_LENGTH) {
      throw new LabError(
        "InvalidArgument",
        `Password length must be between ${MIN_PASSWORD_LENGTH} and ${MAX_PASSWORD_LENGTH}, got ${passwordLength}`,
      );
    }

    const targetLocation = request.targetLocation ?? defaultUserContainer(request.domain);
    if (!validateDN(targetLocation)) {
      throw new LabError("InvalidArgument", `Invalid target location: "${targetLocation}"`);
    }

    const runId = randomUUID();
    const logger = this.logger.child({ service: "orchestrator", runId });

    const specs = await this.configSource.loadGroupSpecs();
    const seeds = await this.configSource.loadNameSeeds();
    const groups = classifyGroups(specs, mode);
    if (seeds.length === 0) {
      throw new LabError("NoNameSeedsConfigured", "The names file defines no usable first,last name pairs");
    }

    return {
      runId,
      mode,
      domain: request.domain,
      targetLocation,
      groups,
      specs: new Map(specs.map((s) => [groupKey(s.groupName), s])),
      seeds,
      reservedAccountIds: new Set(),
      credentials: [],
      metrics: new RunMetricsService(),
      logger,
    };
  }

  // ---------- Stage 2: group provisioning ----------

  private async provisionGroups(context: LabRunContext): Promise<void> {
    const { accessGroups, roleGroups } = context.groups;

    for (const name of [...accessGroups, ...roleGroups]) {
      const expectedDN = childDN(name, context.targetLocation);
      const existing = await this.adaptor.queryObject("sAMAccountName", name, "group", context.domain);

      if (existing) {
        if (!dnEquals(existing.distinguishedName, expectedDN)) {
          throw new LabError(
            "GroupLocationConflict",
            `Group ${name} already exists at ${existing.distinguishedName}, expected ${expectedDN}`,
            { group: name, found: existing.distinguishedName, expected: expectedDN },
          );
        }
        context.logger.warn("Group already exists, skipping", { group: name, dn: expectedDN });
        context.metrics.recordGroupSkipped();
        continue;
      }

      const spec = context.specs.get(groupKey(name));
      const result = await this.adaptor.createGroup({
        name,
        description: spec ? describeGroup(spec) : `Lab group ${name}`,
        parentLocation: context.targetLocation,
        scope: GroupScope.Global,
        type: GroupType.Security,
      });
      if (!result.ok) {
        context.metrics.recordDirectoryError(result.error.kind);
        throw new LabError("GroupCreationFailed", `Creating group ${name} failed: ${result.error.message}`, {
          group: name,
          kind: result.error.kind,
        });
      }

      context.logger.info("Created group", { group: name, dn: expectedDN });
      context.metrics.recordGroupCreated();
    }
  }

  // ---------- Stage 3: role -> access wiring ----------

  private async wireRoleGroups(context: LabRunContext): Promise<void> {
    for (const role of context.groups.roleGroups) {
      const picked = this.randomizer.pickSubset(context.groups.accessGroups);
      const targets = context.groups.accessGroups.filter((g) => picked.has(g));
      const roleDN = childDN(role, context.targetLocation);

      for (const access of targets) {
        const result = await this.adaptor.modifyGroupMembership(
          childDN(access, context.targetLocation),
          roleDN,
          MembershipOperation.Add,
        );
        this.recordMembership(context, "role", result, { member: role, group: access });
      }
    }
  }

  // ---------- Stage 5: user provisioning & wiring ----------

  private async provisionUsers(
    context: LabRunContext,
    identities: readonly GeneratedIdentity[],
    request: LabRunRequest,
  ): Promise<void> {
    const passwordLength = request.passwordLength ?? DEFAULT_PASSWORD_LENGTH;
    const workers = Math.min(request.concurrency ?? 1, identities.length);
    let next = 0;

    // Each worker claims the next identity index; indexes are handed out synchronously
    const worker = async (): Promise<void> => {
      while (next < identities.length) {
        const index = next++;
        await this.provisionUser(context, identities[index], index, passwordLength);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));
  }

  private async provisionUser(
    context: LabRunContext,
    identity: GeneratedIdentity,
    index: number,
    passwordLength: number,
  ): Promise<void> {
    const password = this.passwordGenerator(passwordLength);
    const userDN = childDN(identity.accountId, context.targetLocation);

    const created = await this.adaptor.createUser({
      name: identity.accountId,
      samAccountName: identity.accountId,
      firstName: identity.firstName,
      lastName: identity.lastName,
      displayName: displayNameOf(identity),
      description: "Lab user",
      parentLocation: context.targetLocation,
      password,
      enabled: true,
      passwordNeverExpires: true,
    });

    if (!created.ok) {
      context.metrics.recordUser(false);
      context.metrics.recordDirectoryError(created.error.kind);
      context.logger.warn("Could not create user, skipping", {
        accountId: identity.accountId,
        kind: created.error.kind,
        reason: created.error.message,
      });
      return;
    }

    context.metrics.recordUser(true);
    context.credentials.push({ index, credential: { accountId: identity.accountId, clearPassword: password } });
    context.logger.debug("Created user", { accountId: identity.accountId, dn: userDN });

    if (wiresRoleGroups(context.mode)) {
      const role = this.randomizer.pickOne(context.groups.roleGroups);
      const result = await this.adaptor.modifyGroupMembership(
        childDN(role, context.targetLocation),
        userDN,
        MembershipOperation.Add,
      );
      this.recordMembership(context, "user", result, { member: identity.accountId, group: role });
    }

    if (wiresUsersToAccessGroups(context.mode)) {
      const picked = this.randomizer.pickSubset(context.groups.accessGroups);
      for (const access of context.groups.accessGroups.filter((g) => picked.has(g))) {
        const result = await this.adaptor.modifyGroupMembership(
          childDN(access, context.targetLocation),
          userDN,
          MembershipOperation.Add,
        );
        this.recordMembership(context, "user", result, { member: identity.accountId, group: access });
      }
    }
  }

  private recordMembership(
    context: LabRunContext,
    subject: "role" | "user",
    result: DirectoryResult,
    details: { member: string; group: string },
  ): void {
    context.metrics.recordMembership(subject, result.ok);
    if (result.ok) {
      context.logger.debug("Added group member", details);
      return;
    }
    context.metrics.recordDirectoryError(result.error.kind);
    context.logger.warn("Could not add group member, skipping", {
      ...details,
      kind: result.error.kind,
      reason: result.error.message,
    });
  }
}

export default LabOrchestrator;
