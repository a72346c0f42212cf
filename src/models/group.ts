export type GroupTier = "Access" | "Role";

export interface GroupSpec {
  readonly groupName: string; // cn and sAMAccountName
  readonly tier: GroupTier;
}

export interface ClassifiedGroups {
  readonly accessGroups: readonly string[];
  readonly roleGroups: readonly string[]; // empty under NoRoles
}

export function parseGroupTier(raw: string): GroupTier | undefined {
  switch (raw.trim().toLowerCase()) {
    case "access":
      return "Access";
    case "role":
      return "Role";
    default:
      return undefined;
  }
}

// Directory account names compare case-insensitively
export function groupKey(name: string): string {
  return name.trim().toLowerCase();
}

export function describeGroup(spec: GroupSpec): string {
  return spec.tier === "Access"
    ? `Lab access group ${spec.groupName}`
    : `Lab role group ${spec.groupName}`;
}
