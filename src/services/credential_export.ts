// Credential export
// Writes accountId:password lines; the only place clear-text passwords ever leave memory

import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Credential } from "../models/user.ts";

export const DEFAULT_EXPORT_FILE = "labseed_passwords.txt";

export function formatCredentials(credentials: readonly Credential[]): string {
  return credentials.map((c) => `${c.accountId}:${c.clearPassword}\n`).join("");
}

export async function writeCredentialExport(
  credentials: readonly Credential[],
  path: string = resolve(process.cwd(), DEFAULT_EXPORT_FILE),
): Promise<string> {
  await writeFile(path, formatCredentials(credentials), { mode: 0o600 });
  return path;
}
