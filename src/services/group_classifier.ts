// Group classifier
// Splits the configured groups into access and role tiers for the active operating mode

import { LabError } from "../models/errors.ts";
import type { ClassifiedGroups, GroupSpec } from "../models/group.ts";
import { type OperatingMode, wiresRoleGroups } from "../models/operating_mode.ts";

export function classifyGroups(groups: readonly GroupSpec[], mode: OperatingMode): ClassifiedGroups {
  const accessGroups = groups.filter((g) => g.tier === "Access").map((g) => g.groupName);
  const roleGroups = wiresRoleGroups(mode) ? groups.filter((g) => g.tier === "Role").map((g) => g.groupName) : [];

  if (accessGroups.length === 0) {
    throw new LabError("NoAccessGroupsConfigured", "The groups file defines no Access-tier groups");
  }
  if (wiresRoleGroups(mode) && roleGroups.length === 0) {
    throw new LabError(
      "NoRoleGroupsConfigured",
      `The groups file defines no Role-tier groups (required unless NoRoles is selected; mode=${mode})`,
    );
  }

  return { accessGroups, roleGroups };
}
