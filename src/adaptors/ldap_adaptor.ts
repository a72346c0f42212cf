// LDAP directory adaptor
// Maps the typed adaptor operations onto Active Directory LDAP add/modify/search requests

import { LabError } from "../models/errors.ts";
import { childDN, domainToDN } from "../protocol/dn.ts";
import {
  attributeValues,
  type EncodableAttribute,
  type Filter,
  FilterType,
  LDAPCodec,
  type LDAPResult,
  LDAPResultCode,
  ModifyOperation,
  SearchScope,
} from "../protocol/ldap.ts";
import { LDAPClient, type LDAPSession, type SearchOutcome } from "../services/ldap_client.ts";
import type { ContextLogger } from "../services/logger.ts";
import {
  type DirectoryAdaptor,
  directoryError,
  type DirectoryObjectType,
  type DirectoryResult,
  GroupScope,
  GroupType,
  MembershipOperation,
  type NewGroup,
  type NewUser,
  type ObjectRecord,
  OK,
} from "./types.ts";

// groupType flags
const GROUP_SCOPE_FLAGS: Record<GroupScope, number> = {
  [GroupScope.Global]: 0x2,
  [GroupScope.DomainLocal]: 0x4,
  [GroupScope.Universal]: 0x8,
};
const GROUP_TYPE_SECURITY_ENABLED = 0x80000000;

// userAccountControl flags
const UAC_ACCOUNTDISABLE = 0x2;
const UAC_NORMAL_ACCOUNT = 0x200;
const UAC_DONT_EXPIRE_PASSWORD = 0x10000;

const QUERY_ATTRIBUTES = ["distinguishedName", "sAMAccountName", "objectClass"];

type ResultContext = "create" | MembershipOperation;

/** groupType as AD stores it: a signed 32-bit integer */
export function groupTypeValue(scope: GroupScope, type: GroupType): number {
  const flags = GROUP_SCOPE_FLAGS[scope] | (type === GroupType.Security ? GROUP_TYPE_SECURITY_ENABLED : 0);
  return flags | 0;
}

export function userAccountControlValue(enabled: boolean, passwordNeverExpires: boolean): number {
  let flags = UAC_NORMAL_ACCOUNT;
  if (!enabled) flags |= UAC_ACCOUNTDISABLE;
  if (passwordNeverExpires) flags |= UAC_DONT_EXPIRE_PASSWORD;
  return flags;
}

/** unicodePwd takes the password in double quotes, UTF-16LE encoded */
export function encodeUnicodePwd(password: string): Uint8Array {
  return new Uint8Array(Buffer.from(`"${password}"`, "utf16le"));
}

export function mapLDAPResult(result: LDAPResult, context: ResultContext): DirectoryResult {
  const code = result.resultCode;
  const message = result.diagnosticMessage || LDAPResultCode[code] || `LDAP result ${code}`;

  switch (code) {
    case LDAPResultCode.Success:
      return OK;
    case LDAPResultCode.EntryAlreadyExists:
      // AD reports "already a member" as entryAlreadyExists on a member add
      return directoryError(context === MembershipOperation.Add ? "InvalidOperation" : "AlreadyExists", message, code);
    case LDAPResultCode.AttributeOrValueExists:
      return directoryError(context === MembershipOperation.Add ? "InvalidOperation" : "Other", message, code);
    case LDAPResultCode.UnwillingToPerform:
    case LDAPResultCode.NoSuchAttribute:
      // ...and "not a member" as unwillingToPerform on a member delete
      return directoryError(context === MembershipOperation.Remove ? "InvalidOperation" : "Other", message, code);
    case LDAPResultCode.NoSuchObject:
      return directoryError("NoSuchObject", message, code);
    case LDAPResultCode.InsufficientAccessRights:
      return directoryError("AccessDenied", message, code);
    case LDAPResultCode.Busy:
    case LDAPResultCode.Unavailable:
      return directoryError("Unavailable", message, code);
    default:
      return directoryError("Other", message, code);
  }
}

export interface LdapConnectOptions {
  url: string;
  bindDN: string;
  bindPassword: string;
  rejectUnauthorized?: boolean;
  timeoutMs?: number;
}

export class LdapDirectoryAdaptor implements DirectoryAdaptor {
  private readonly session: LDAPSession;
  private readonly domain: string;
  private readonly logger?: ContextLogger;

  constructor(session: LDAPSession, domain: string, logger?: ContextLogger) {
    this.session = session;
    this.domain = domain;
    this.logger = logger;
  }

  /** Open a connection, bind, and wrap it in an adaptor */
  static async connect(options: LdapConnectOptions, domain: string, logger?: ContextLogger): Promise<LdapDirectoryAdaptor> {
    const client = new LDAPClient({
      url: options.url,
      rejectUnauthorized: options.rejectUnauthorized,
      timeoutMs: options.timeoutMs,
      logger,
    });

    try {
      await client.connect();
    } catch (error) {
      throw new LabError("DirectoryUnavailable", `Cannot connect to ${options.url}`, { url: options.url }, {
        cause: error,
      });
    }

    let bound: LDAPResult;
    try {
      bound = await client.bind(options.bindDN, options.bindPassword);
    } catch (error) {
      client.destroy();
      throw new LabError("DirectoryUnavailable", `Bind as ${options.bindDN} failed`, { url: options.url }, {
        cause: error,
      });
    }
    if (bound.resultCode !== LDAPResultCode.Success) {
      await client.unbind();
      throw new LabError(
        "DirectoryUnavailable",
        `Bind as ${options.bindDN} failed: ${bound.diagnosticMessage || LDAPResultCode[bound.resultCode]}`,
        { resultCode: bound.resultCode },
      );
    }

    logger?.info("Bound to directory", { url: options.url, bindDN: options.bindDN });
    return new LdapDirectoryAdaptor(client, domain, logger);
  }

  async queryObject(
    property: string,
    value: string,
    objectType: DirectoryObjectType,
    domain: string,
  ): Promise<ObjectRecord | undefined> {
    const baseObject = domainToDN(domain);
    const filter: Filter = {
      type: FilterType.And,
      filters: [
        { type: FilterType.EqualityMatch, attributeDesc: "objectClass", assertionValue: objectType },
        { type: FilterType.EqualityMatch, attributeDesc: property, assertionValue: value },
      ],
    };
    this.logger?.debug("Searching directory", { baseObject, filter: LDAPCodec.formatFilter(filter) });

    let outcome: SearchOutcome;
    try {
      outcome = await this.session.search({
        baseObject,
        scope: SearchScope.WholeSubtree,
        filter,
        attributes: QUERY_ATTRIBUTES,
        sizeLimit: 1,
      });
    } catch (error) {
      throw new LabError("DirectoryUnavailable", `Lookup of ${property}=${value} failed`, { baseObject }, {
        cause: error,
      });
    }

    if (outcome.resultCode === LDAPResultCode.NoSuchObject) return undefined;
    if (
      outcome.resultCode !== LDAPResultCode.Success &&
      !(outcome.resultCode === LDAPResultCode.SizeLimitExceeded && outcome.entries.length > 0)
    ) {
      throw new LabError(
        "DirectoryUnavailable",
        `Lookup of ${property}=${value} failed: ${outcome.diagnosticMessage || LDAPResultCode[outcome.resultCode]}`,
        { baseObject, resultCode: outcome.resultCode },
      );
    }

    const entry = outcome.entries[0];
    if (!entry) return undefined;

    const attributes: Record<string, string[]> = {};
    for (const attr of entry.attributes) {
      attributes[attr.type.toLowerCase()] = attr.vals;
    }
    return {
      distinguishedName: attributeValues(entry, "distinguishedName")[0] ?? entry.objectName,
      attributes,
    };
  }

  async createGroup(group: NewGroup): Promise<DirectoryResult> {
    const dn = childDN(group.name, group.parentLocation);
    return await this.perform("create", dn, () =>
      this.session.add(dn, [
        { type: "objectClass", vals: ["top", "group"] },
        { type: "cn", vals: [group.name] },
        { type: "sAMAccountName", vals: [group.name] },
        { type: "description", vals: [group.description] },
        { type: "groupType", vals: [String(groupTypeValue(group.scope, group.type))] },
      ]));
  }

  async createUser(user: NewUser): Promise<DirectoryResult> {
    const dn = childDN(user.name, user.parentLocation);
    const attributes: EncodableAttribute[] = [
      { type: "objectClass", vals: ["top", "person", "organizationalPerson", "user"] },
      { type: "cn", vals: [user.name] },
      { type: "sAMAccountName", vals: [user.samAccountName] },
      { type: "userPrincipalName", vals: [`${user.samAccountName}@${this.domain}`] },
      { type: "givenName", vals: [user.firstName] },
      { type: "sn", vals: [user.lastName] },
      { type: "displayName", vals: [user.displayName] },
      { type: "description", vals: [user.description] },
      { type: "unicodePwd", vals: [encodeUnicodePwd(user.password)] },
      { type: "userAccountControl", vals: [String(userAccountControlValue(user.enabled, user.passwordNeverExpires))] },
    ];
    return await this.perform("create", dn, () => this.session.add(dn, attributes));
  }

  async modifyGroupMembership(groupDN: string, memberDN: string, op: MembershipOperation): Promise<DirectoryResult> {
    return await this.perform(op, groupDN, () =>
      this.session.modify(groupDN, [{
        operation: op === MembershipOperation.Add ? ModifyOperation.Add : ModifyOperation.Delete,
        modification: { type: "member", vals: [memberDN] },
      }]));
  }

  async close(): Promise<void> {
    await this.session.unbind();
  }

  // Transport failures become Unavailable results so that per-item callers can skip and continue
  private async perform(context: ResultContext, dn: string, send: () => Promise<LDAPResult>): Promise<DirectoryResult> {
    try {
      const result = mapLDAPResult(await send(), context);
      if (!result.ok) {
        this.logger?.debug("Directory operation rejected", { dn, context, ...result.error });
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.warn("Directory operation failed", { dn, context, reason: message });
      return directoryError("Unavailable", message);
    }
  }
}

export default LdapDirectoryAdaptor;
