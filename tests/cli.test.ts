import { join, resolve } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { LabSeedMain, parseCommand } from "../src/cli/main.ts";
import { isLabError } from "../src/models/errors.ts";

function runConfig(args: string[], env: NodeJS.ProcessEnv = {}) {
  const command = parseCommand(args, env);
  if (command.kind !== "run") throw new Error("expected a run command");
  return command.config;
}

function argumentError(args: string[], env: NodeJS.ProcessEnv = {}): string | undefined {
  try {
    parseCommand(args, env);
  } catch (error) {
    return isLabError(error, "InvalidArgument") ? error.message : "other";
  }
  return undefined;
}

describe("parseCommand", () => {
  it("recognises help", () => {
    expect(parseCommand(["--help"], {})).toEqual({ kind: "help" });
    expect(parseCommand(["-h"], {})).toEqual({ kind: "help" });
  });

  it("fills in defaults for a dry run", () => {
    const config = runConfig(["--domain", "corp.example.com", "--dry-run"]);

    expect(config).toMatchObject({
      domain: "corp.example.com",
      targetLocation: undefined,
      userCount: 40,
      cleanRoles: false,
      noRoles: false,
      exportPasswords: false,
      exportFile: resolve("labseed_passwords.txt"),
      passwordLength: 16,
      ldapUrl: "ldaps://corp.example.com:636",
      insecureTls: false,
      dryRun: true,
      concurrency: 1,
      verbose: false,
    });
    expect(config.groupsFile.endsWith(join("data", "groups.txt"))).toBe(true);
    expect(config.namesFile.endsWith(join("data", "names.txt"))).toBe(true);
  });

  it("reads modes, counts and paths", () => {
    const config = runConfig([
      "--domain=corp.example.com",
      "--ou",
      "OU=Lab,DC=corp,DC=example,DC=com",
      "-n",
      "200",
      "--no-roles",
      "--export-passwords",
      "--export-file",
      "out/pw.txt",
      "--bind-dn",
      "admin@corp.example.com",
      "--bind-password",
      "test-secret",
      "--ldap-url",
      "ldap://dc01.corp.example.com",
      "--insecure-tls",
      "--concurrency",
      "8",
      "-v",
    ]);

    expect(config).toMatchObject({
      targetLocation: "OU=Lab,DC=corp,DC=example,DC=com",
      userCount: 200,
      cleanRoles: false,
      noRoles: true,
      exportPasswords: true,
      exportFile: resolve("out/pw.txt"),
      bindDN: "admin@corp.example.com",
      bindPassword: "test-secret",
      ldapUrl: "ldap://dc01.corp.example.com",
      insecureTls: true,
      concurrency: 8,
      verbose: true,
    });
    expect(runConfig(["--domain", "lab.local", "--dry-run", "--clean-roles"]).cleanRoles).toBe(true);
  });

  it("falls back to the environment", () => {
    const config = runConfig([], {
      LABSEED_DOMAIN: "lab.local",
      LABSEED_COUNT: "7",
      LABSEED_BIND_DN: "CN=admin,CN=Users,DC=lab,DC=local",
      LABSEED_BIND_PASSWORD: "test-secret",
      LABSEED_GROUPS_FILE: "/etc/lab/groups.txt",
      LABSEED_INSECURE_TLS: "true",
    });

    expect(config).toMatchObject({
      domain: "lab.local",
      userCount: 7,
      bindDN: "CN=admin,CN=Users,DC=lab,DC=local",
      groupsFile: "/etc/lab/groups.txt",
      insecureTls: true,
      dryRun: false,
    });
  });

  it("prefers flags over the environment", () => {
    expect(runConfig(["--domain", "corp.example.com", "--dry-run"], { LABSEED_DOMAIN: "lab.local" }).domain).toBe(
      "corp.example.com",
    );
  });

  it("rejects bad input", () => {
    expect(argumentError([])).toBe("--domain is required (or set LABSEED_DOMAIN)");
    expect(argumentError(["--domain", "corp.example.com"])).toBe(
      "--bind-dn and --bind-password are required unless --dry-run is given",
    );
    expect(argumentError(["--domain", "corp.example.com", "--dry-run", "-n", "abc"])).toBe(
      '--count must be an integer, got "abc"',
    );
    expect(argumentError(["--domain", "corp.example.com", "--dry-run", "-n", "0"])).toBe(
      "--count must be between 1 and 10000, got 0",
    );
    expect(argumentError(["--domain", "corp.example.com", "--dry-run", "--concurrency", "17"])).toBe(
      "--concurrency must be between 1 and 16, got 17",
    );
    expect(argumentError(["--domain", "corp.example.com", "--dry-run", "--ou", "Lab"])).toBe(
      '--ou is not a distinguished name: "Lab"',
    );
    expect(argumentError(["--domain", "corp.example.com", "--dry-run", "extra"])).toBe("Unexpected argument: extra");
    expect(argumentError(["--domain", "not a domain", "--dry-run"])).toBe('Invalid DNS domain name: "not a domain"');
  });
});

describe("LabSeedMain", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function silenceConsole() {
    for (const method of ["log", "info", "warn", "debug"] as const) {
      vi.spyOn(console, method).mockImplementation(() => {});
    }
    return vi.spyOn(console, "error").mockImplementation(() => {});
  }

  it("completes a dry run against the bundled data", async () => {
    silenceConsole();
    const log = vi.mocked(console.log);

    const code = await new LabSeedMain().run(["--domain", "corp.example.com", "--dry-run", "-n", "3"]);

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith("Lab population complete (dry run, mode Default)");
    expect(log).toHaveBeenCalledWith("  Target: CN=Users,DC=corp,DC=example,DC=com");
    expect(log).toHaveBeenCalledWith("  Groups:            16 created, 0 already present");
    expect(log).toHaveBeenCalledWith("  Users:             3 created, 0 skipped");
  });

  it("exits with 1 on conflicting modes", async () => {
    const error = silenceConsole();

    const code = await new LabSeedMain().run(["--domain", "corp.example.com", "--dry-run", "--clean-roles", "--no-roles"]);

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith("labseed: InvalidModeCombination: CleanRoles and NoRoles cannot be combined");
  });
});
