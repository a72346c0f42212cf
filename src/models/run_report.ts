import type { Credential } from "./user.ts";
import type { OperatingMode } from "./operating_mode.ts";

export interface LabRunReport {
  mode: OperatingMode;
  targetLocation: string; // DN every group and user is created under
  groupsCreated: number;
  groupsSkipped: number; // already present at the target location
  roleMembershipsAdded: number;
  roleMembershipsFailed: number;
  usersCreated: number;
  usersFailed: number;
  userMembershipsAdded: number;
  userMembershipsFailed: number;
  credentials: Credential[]; // empty unless export was requested
  exportPath?: string;
  startedAt: string; // ISO timestamp
  finishedAt: string;
}
