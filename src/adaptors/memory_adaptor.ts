// In-memory directory adaptor
// Backs --dry-run and the test suite with the same result semantics as the LDAP adaptor

import { childDN, domainToDN, isWithin, normalizeDN } from "../protocol/dn.ts";
import {
  type DirectoryAdaptor,
  directoryError,
  type DirectoryObjectType,
  type DirectoryResult,
  MembershipOperation,
  type NewGroup,
  type NewUser,
  type ObjectRecord,
  OK,
} from "./types.ts";

export interface StoredObject {
  distinguishedName: string;
  objectType: DirectoryObjectType;
  attributes: Record<string, string[]>; // lowercased attribute names
}

export class InMemoryDirectoryAdaptor implements DirectoryAdaptor {
  private readonly objects = new Map<string, StoredObject>(); // normalized DN -> object
  private readonly members = new Map<string, Set<string>>(); // normalized group DN -> normalized member DNs

  /** Seed a pre-existing object, e.g. a group left over from an earlier run */
  addObject(distinguishedName: string, objectType: DirectoryObjectType, attributes: Record<string, string[]> = {}): void {
    this.objects.set(normalizeDN(distinguishedName), {
      distinguishedName,
      objectType,
      attributes: lowercaseKeys(attributes),
    });
    if (objectType === "group") {
      this.members.set(normalizeDN(distinguishedName), new Set());
    }
  }

  queryObject(
    property: string,
    value: string,
    objectType: DirectoryObjectType,
    domain: string,
  ): Promise<ObjectRecord | undefined> {
    const base = domainToDN(domain);
    const attribute = property.toLowerCase();
    const wanted = value.toLowerCase();

    for (const object of this.objects.values()) {
      if (object.objectType !== objectType || !isWithin(object.distinguishedName, base)) continue;
      const values = object.attributes[attribute] ?? [];
      if (values.some((v) => v.toLowerCase() === wanted)) {
        return Promise.resolve({
          distinguishedName: object.distinguishedName,
          attributes: { ...object.attributes },
        });
      }
    }
    return Promise.resolve(undefined);
  }

  createGroup(group: NewGroup): Promise<DirectoryResult> {
    const dn = childDN(group.name, group.parentLocation);
    const conflict = this.checkCreate(dn, group.name);
    if (conflict) return Promise.resolve(conflict);

    this.addObject(dn, "group", {
      cn: [group.name],
      samaccountname: [group.name],
      description: [group.description],
      groupscope: [group.scope],
      grouptype: [group.type],
    });
    return Promise.resolve(OK);
  }

  createUser(user: NewUser): Promise<DirectoryResult> {
    const dn = childDN(user.name, user.parentLocation);
    const conflict = this.checkCreate(dn, user.samAccountName);
    if (conflict) return Promise.resolve(conflict);

    this.addObject(dn, "user", {
      cn: [user.name],
      samaccountname: [user.samAccountName],
      givenname: [user.firstName],
      sn: [user.lastName],
      displayname: [user.displayName],
      description: [user.description],
      enabled: [String(user.enabled)],
      passwordneverexpires: [String(user.passwordNeverExpires)],
    });
    return Promise.resolve(OK);
  }

  modifyGroupMembership(groupDN: string, memberDN: string, op: MembershipOperation): Promise<DirectoryResult> {
    const members = this.members.get(normalizeDN(groupDN));
    if (!members) {
      return Promise.resolve(directoryError("NoSuchObject", `No such group: ${groupDN}`));
    }
    const member = normalizeDN(memberDN);
    if (!this.objects.has(member)) {
      return Promise.resolve(directoryError("NoSuchObject", `No such member: ${memberDN}`));
    }

    if (op === MembershipOperation.Add) {
      if (members.has(member)) {
        return Promise.resolve(directoryError("InvalidOperation", `${memberDN} is already a member of ${groupDN}`));
      }
      members.add(member);
    } else {
      if (!members.has(member)) {
        return Promise.resolve(directoryError("InvalidOperation", `${memberDN} is not a member of ${groupDN}`));
      }
      members.delete(member);
    }
    return Promise.resolve(OK);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }

  // ---------- Inspection ----------

  getObject(distinguishedName: string): StoredObject | undefined {
    return this.objects.get(normalizeDN(distinguishedName));
  }

  listObjects(objectType: DirectoryObjectType): StoredObject[] {
    return [...this.objects.values()].filter((o) => o.objectType === objectType);
  }

  /** Display DNs of a group's direct members */
  listMembers(groupDN: string): string[] {
    const members = this.members.get(normalizeDN(groupDN)) ?? new Set<string>();
    return [...members].map((m) => this.objects.get(m)?.distinguishedName ?? m);
  }

  private checkCreate(dn: string, samAccountName: string): DirectoryResult | undefined {
    if (this.objects.has(normalizeDN(dn))) {
      return directoryError("AlreadyExists", `Object already exists: ${dn}`);
    }
    const wanted = samAccountName.toLowerCase();
    for (const object of this.objects.values()) {
      if ((object.attributes.samaccountname ?? []).some((v) => v.toLowerCase() === wanted)) {
        return directoryError("AlreadyExists", `sAMAccountName already in use: ${samAccountName}`);
      }
    }
    return undefined;
  }
}

function lowercaseKeys(attributes: Record<string, string[]>): Record<string, string[]> {
  return Object.fromEntries(Object.entries(attributes).map(([k, v]) => [k.toLowerCase(), [...v]]));
}

export default InMemoryDirectoryAdaptor;
