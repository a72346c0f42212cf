export type { Credential, GeneratedIdentity, NameSeed } from "./user.ts";
export { ACCOUNT_BASE_MAX_LENGTH, displayNameOf, sanitizeAccountName } from "./user.ts";
export type { ClassifiedGroups, GroupSpec, GroupTier } from "./group.ts";
export { describeGroup, groupKey, parseGroupTier } from "./group.ts";
export type { ModeRequest, OperatingMode } from "./operating_mode.ts";
export { resolveOperatingMode, wiresRoleGroups, wiresUsersToAccessGroups } from "./operating_mode.ts";
export type { LabErrorKind } from "./errors.ts";
export { isLabError, LabError } from "./errors.ts";
export type { LabRunReport } from "./run_report.ts";
