export interface NameSeed {
  readonly firstName: string;
  readonly lastName: string;
}

export interface GeneratedIdentity {
  readonly firstName: string;
  readonly lastName: string;
  readonly accountId: string; // sAMAccountName, unique within the batch
}

// Lives only for the duration of a run; written out only by the credential exporter
export interface Credential {
  readonly accountId: string;
  readonly clearPassword: string;
}

export const ACCOUNT_BASE_MAX_LENGTH = 20;

export function sanitizeAccountName(raw: string): string {
  // Fold accented letters to their base letter, then keep what a pre-Windows 2000 logon name accepts
  return raw
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "")
    .replace(/[^a-z0-9._-]/g, "");
}

export function displayNameOf(identity: GeneratedIdentity): string {
  return `${identity.firstName} ${identity.lastName}`;
}
