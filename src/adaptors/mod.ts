export type {
  DirectoryAdaptor,
  DirectoryError,
  DirectoryErrorKind,
  DirectoryObjectType,
  DirectoryResult,
  NewGroup,
  NewUser,
  ObjectRecord,
} from "./types.ts";
export { directoryError, GroupScope, GroupType, MembershipOperation, OK } from "./types.ts";
export { LdapDirectoryAdaptor } from "./ldap_adaptor.ts";
export { InMemoryDirectoryAdaptor } from "./memory_adaptor.ts";
