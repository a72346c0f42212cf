// Run metrics
// Counts created, skipped and failed items across the stages of a lab run

import type { DirectoryErrorKind } from "../adaptors/types.ts";

export interface MetricsSnapshot {
  // Group provisioning
  groupsCreated: number;
  groupsSkipped: number;

  // Role -> access wiring
  roleMembershipsAdded: number;
  roleMembershipsFailed: number;

  // User provisioning
  usersCreated: number;
  usersFailed: number;
  userMembershipsAdded: number;
  userMembershipsFailed: number;

  directoryErrors: Partial<Record<DirectoryErrorKind, number>>;
}

export type MembershipSubject = "role" | "user";

export interface MetricsCollector {
  recordGroupCreated(): void;
  recordGroupSkipped(): void;
  recordMembership(subject: MembershipSubject, success: boolean): void;
  recordUser(success: boolean): void;
  recordDirectoryError(kind: DirectoryErrorKind): void;
}

export class RunMetricsService implements MetricsCollector {
  private groupsCreated = 0;
  private groupsSkipped = 0;
  private roleMembershipsAdded = 0;
  private roleMembershipsFailed = 0;
  private usersCreated = 0;
  private usersFailed = 0;
  private userMembershipsAdded = 0;
  private userMembershipsFailed = 0;
  private directoryErrors: Partial<Record<DirectoryErrorKind, number>> = {};

  recordGroupCreated(): void {
    this.groupsCreated++;
  }

  recordGroupSkipped(): void {
    this.groupsSkipped++;
  }

  recordMembership(subject: MembershipSubject, success: boolean): void {
    if (subject === "role") {
      if (success) this.roleMembershipsAdded++;
      else this.roleMembershipsFailed++;
    } else {
      if (success) this.userMembershipsAdded++;
      else this.userMembershipsFailed++;
    }
  }

  recordUser(success: boolean): void {
    if (success) this.usersCreated++;
    else this.usersFailed++;
  }

  recordDirectoryError(kind: DirectoryErrorKind): void {
    this.directoryErrors[kind] = (this.directoryErrors[kind] ?? 0) + 1;
  }

  getSnapshot(): MetricsSnapshot {
    return {
      groupsCreated: this.groupsCreated,
      groupsSkipped: this.groupsSkipped,
      roleMembershipsAdded: this.roleMembershipsAdded,
      roleMembershipsFailed: this.roleMembershipsFailed,
      usersCreated: this.usersCreated,
      usersFailed: this.usersFailed,
      userMembershipsAdded: this.userMembershipsAdded,
      userMembershipsFailed: this.userMembershipsFailed,
      directoryErrors: { ...this.directoryErrors },
    };
  }

  /** Human-readable end-of-run summary, one line per stage */
  formatSummary(): string {
    const s = this.getSnapshot();
    const lines = [
      `Groups:            ${s.groupsCreated} created, ${s.groupsSkipped} already present`,
      `Role memberships:  ${s.roleMembershipsAdded} added, ${s.roleMembershipsFailed} skipped`,
      `Users:             ${s.usersCreated} created, ${s.usersFailed} skipped`,
      `User memberships:  ${s.userMembershipsAdded} added, ${s.userMembershipsFailed} skipped`,
    ];
    const errors = Object.entries(s.directoryErrors);
    if (errors.length > 0) {
      lines.push(`Directory errors:  ${errors.map(([kind, count]) => `${kind}=${count}`).join(", ")}`);
    }
    return lines.join("\n");
  }
}

export default RunMetricsService;
