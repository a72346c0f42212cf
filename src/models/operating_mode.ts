import { LabError } from "./errors.ts";

export type OperatingMode = "Default" | "CleanRoles" | "NoRoles";

export interface ModeRequest {
  cleanRoles?: boolean;
  noRoles?: boolean;
}

export function resolveOperatingMode(request: ModeRequest): OperatingMode {
  if (request.cleanRoles && request.noRoles) {
    throw new LabError("InvalidModeCombination", "CleanRoles and NoRoles cannot be combined");
  }
  if (request.noRoles) return "NoRoles";
  if (request.cleanRoles) return "CleanRoles";
  return "Default";
}

/** Role groups are nested into access groups */
export function wiresRoleGroups(mode: OperatingMode): boolean {
  return mode !== "NoRoles";
}

/** Users are placed directly into access groups */
export function wiresUsersToAccessGroups(mode: OperatingMode): boolean {
  return mode !== "CleanRoles";
}
