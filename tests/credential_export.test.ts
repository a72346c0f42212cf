import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { formatCredentials, writeCredentialExport } from "../src/services/credential_export.ts";

const CREDENTIALS = [
  { accountId: "jsmith", clearPassword: "test-secret-1" },
  { accountId: "adoe", clearPassword: "test:secret" },
];

describe("formatCredentials", () => {
  it("writes one accountId:password line per credential", () => {
    expect(formatCredentials(CREDENTIALS)).toBe("jsmith:test-secret-1\nadoe:test:secret\n");
  });

  it("returns an empty string for no credentials", () => {
    expect(formatCredentials([])).toBe("");
  });
});

describe("writeCredentialExport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "labseed-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the file readable by its owner only", async () => {
    const path = await writeCredentialExport(CREDENTIALS, join(dir, "passwords.txt"));

    expect(path).toBe(join(dir, "passwords.txt"));
    expect(await readFile(path, "utf8")).toBe("jsmith:test-secret-1\nadoe:test:secret\n");
    if (process.platform !== "win32") {
      expect((await stat(path)).mode & 0o777).toBe(0o600);
    }
  });
});
