// Directory adaptor interface
// One typed method per directory mutation; all attribute-level detail stays behind the adaptor.

export enum GroupScope {
  Global = "Global",
  Universal = "Universal",
  DomainLocal = "DomainLocal",
}

export enum GroupType {
  Security = "Security",
  Distribution = "Distribution",
}

export enum MembershipOperation {
  Add = "Add",
  Remove = "Remove",
}

// objectClass used for existence lookups
export type DirectoryObjectType = "group" | "user";

export interface ObjectRecord {
  distinguishedName: string;
  attributes: Record<string, string[]>; // lowercased attribute names
}

export type DirectoryErrorKind =
  | "InvalidOperation" // membership already satisfied / unsatisfied
  | "AlreadyExists"
  | "NoSuchObject"
  | "AccessDenied"
  | "Unavailable"
  | "Other";

export interface DirectoryError {
  kind: DirectoryErrorKind;
  message: string;
  resultCode?: number; // LDAP result code when one was returned
}

export type DirectoryResult = { ok: true } | { ok: false; error: DirectoryError };

export interface NewGroup {
  name: string; // cn and sAMAccountName
  description: string;
  parentLocation: string; // DN of the container
  scope: GroupScope;
  type: GroupType;
}

export interface NewUser {
  name: string; // cn
  samAccountName: string;
  firstName: string;
  lastName: string;
  displayName: string;
  description: string;
  parentLocation: string;
  password: string;
  enabled: boolean;
  passwordNeverExpires: boolean;
}

export interface DirectoryAdaptor {
  /** Attribute lookup under the domain; undefined when nothing matches */
  queryObject(
    property: string,
    value: string,
    objectType: DirectoryObjectType,
    domain: string,
  ): Promise<ObjectRecord | undefined>;

  createGroup(group: NewGroup): Promise<DirectoryResult>;

  createUser(user: NewUser): Promise<DirectoryResult>;

  modifyGroupMembership(groupDN: string, memberDN: string, op: MembershipOperation): Promise<DirectoryResult>;

  /** Close any open connections or resources */
  close(): Promise<void>;
}

export const OK: DirectoryResult = { ok: true };

export function directoryError(kind: DirectoryErrorKind, message: string, resultCode?: number): DirectoryResult {
  return { ok: false, error: { kind, message, ...(resultCode !== undefined ? { resultCode } : {}) } };
}
