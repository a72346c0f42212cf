#!/usr/bin/env -S npx tsx
// Main CLI Entry Point
// Parses options, builds the directory adaptor and runs one lab population

import minimist from "minimist";
import { resolve } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { InMemoryDirectoryAdaptor } from "../adaptors/memory_adaptor.ts";
import { LdapDirectoryAdaptor } from "../adaptors/ldap_adaptor.ts";
import type { DirectoryAdaptor } from "../adaptors/types.ts";
import { isLabError, LabError } from "../models/errors.ts";
import { resolveOperatingMode } from "../models/operating_mode.ts";
import type { LabRunReport } from "../models/run_report.ts";
import { domainToDN, validateDN } from "../protocol/dn.ts";
import { FileConfigSource } from "../services/config_loader.ts";
import { DEFAULT_EXPORT_FILE } from "../services/credential_export.ts";
import {
  DEFAULT_USER_COUNT,
  LabOrchestrator,
  MAX_CONCURRENCY,
  MAX_USER_COUNT,
  MIN_USER_COUNT,
} from "../services/lab_orchestrator.ts";
import { createLogger, LogLevel, type StructuredLogger } from "../services/logger.ts";
import { DEFAULT_PASSWORD_LENGTH, MAX_PASSWORD_LENGTH, MIN_PASSWORD_LENGTH } from "../services/password_generator.ts";

export interface CLIConfig {
  // Target
  domain: string;
  targetLocation?: string; // DN; orchestrator defaults to CN=Users,<domain DN>
  userCount: number;

  // Operating mode
  cleanRoles: boolean;
  noRoles: boolean;

  // Inputs and outputs
  groupsFile: string;
  namesFile: string;
  exportPasswords: boolean;
  exportFile: string;
  passwordLength: number;

  // Directory connection
  ldapUrl: string;
  bindDN?: string;
  bindPassword?: string;
  insecureTls: boolean;
  dryRun: boolean;

  // General
  concurrency: number;
  verbose: boolean;
}

export type ParsedCommand = { kind: "help" } | { kind: "run"; config: CLIConfig };

const DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

function stringOption(parsed: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = parsed[name];
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  if (typeof value === "number") return String(value);
  return undefined;
}

function booleanOption(parsed: minimist.ParsedArgs, name: string): boolean {
  const value: unknown = parsed[name];
  return value === true;
}

function integerOption(raw: string | undefined, name: string, fallback: number, min: number, max: number): number {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new LabError("InvalidArgument", `--${name} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new LabError("InvalidArgument", `--${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

export function parseCommand(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedCommand {
  const parsed = minimist(args, {
    boolean: ["help", "verbose", "clean-roles", "export-passwords", "insecure-tls", "dry-run"],
    string: [
      "domain",
      "ou",
      "count",
      "groups-file",
      "names-file",
      "export-file",
      "password-length",
      "ldap-url",
      "bind-dn",
      "bind-password",
      "concurrency",
    ],
    alias: {
      h: "help",
      v: "verbose",
      n: "count",
    },
  });

  if (parsed.help) {
    return { kind: "help" };
  }

  const unexpected = parsed._.map(String);
  if (unexpected.length > 0) {
    throw new LabError("InvalidArgument", `Unexpected argument: ${unexpected[0]}`);
  }

  const domain = stringOption(parsed, "domain") ?? env.LABSEED_DOMAIN;
  if (!domain) {
    throw new LabError("InvalidArgument", "--domain is required (or set LABSEED_DOMAIN)");
  }
  domainToDN(domain);

  const targetLocation = stringOption(parsed, "ou") ?? env.LABSEED_OU;
  if (targetLocation !== undefined && !validateDN(targetLocation)) {
    throw new LabError("InvalidArgument", `--ou is not a distinguished name: "${targetLocation}"`);
  }

  const dryRun = booleanOption(parsed, "dry-run");
  const bindDN = stringOption(parsed, "bind-dn") ?? env.LABSEED_BIND_DN;
  const bindPassword = stringOption(parsed, "bind-password") ?? env.LABSEED_BIND_PASSWORD;
  if (!dryRun && (!bindDN || !bindPassword)) {
    throw new LabError("InvalidArgument", "--bind-dn and --bind-password are required unless --dry-run is given");
  }

  return {
    kind: "run",
    config: {
      domain,
      targetLocation,
      userCount: integerOption(
        stringOption(parsed, "count") ?? env.LABSEED_COUNT,
        "count",
        DEFAULT_USER_COUNT,
        MIN_USER_COUNT,
        MAX_USER_COUNT,
      ),
      cleanRoles: booleanOption(parsed, "clean-roles"),
      // minimist folds --no-roles into roles=false
      noRoles: parsed.roles === false,
      groupsFile: stringOption(parsed, "groups-file") ?? env.LABSEED_GROUPS_FILE ?? resolve(DATA_DIR, "groups.txt"),
      namesFile: stringOption(parsed, "names-file") ?? env.LABSEED_NAMES_FILE ?? resolve(DATA_DIR, "names.txt"),
      exportPasswords: booleanOption(parsed, "export-passwords"),
      exportFile: resolve(stringOption(parsed, "export-file") ?? DEFAULT_EXPORT_FILE),
      passwordLength: integerOption(
        stringOption(parsed, "password-length"),
        "password-length",
        DEFAULT_PASSWORD_LENGTH,
        MIN_PASSWORD_LENGTH,
        MAX_PASSWORD_LENGTH,
      ),
      ldapUrl: stringOption(parsed, "ldap-url") ?? env.LABSEED_LDAP_URL ?? `ldaps://${domain}:636`,
      bindDN,
      bindPassword,
      insecureTls: booleanOption(parsed, "insecure-tls") || env.LABSEED_INSECURE_TLS === "true",
      dryRun,
      concurrency: integerOption(stringOption(parsed, "concurrency"), "concurrency", 1, 1, MAX_CONCURRENCY),
      verbose: booleanOption(parsed, "verbose") || env.LABSEED_VERBOSE === "true",
    },
  };
}

export class LabSeedMain {
  async run(args: string[]): Promise<number> {
    let command: ParsedCommand;
    try {
      command = parseCommand(args);
    } catch (error) {
      console.error(`labseed: ${describeFailure(error)}`);
      console.error("Run with --help for usage.");
      return 1;
    }

    if (command.kind === "help") {
      this.printHelp();
      return 0;
    }

    const config = command.config;
    const logger = createLogger("labseed");
    if (config.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }

    let adaptor: DirectoryAdaptor | undefined;
    let orchestrator: LabOrchestrator | undefined;
    try {
      // Mode misuse must fail before any directory connection is attempted
      resolveOperatingMode(config);

      adaptor = await this.createAdaptor(config, logger);
      orchestrator = new LabOrchestrator({
        adaptor,
        configSource: new FileConfigSource(config.groupsFile, config.namesFile, logger.child({ service: "config" })),
        logger,
      });

      const report = await orchestrator.run({
        domain: config.domain,
        targetLocation: config.targetLocation,
        userCount: config.userCount,
        cleanRoles: config.cleanRoles,
        noRoles: config.noRoles,
        exportPasswords: config.exportPasswords,
        exportPath: config.exportFile,
        passwordLength: config.passwordLength,
        concurrency: config.concurrency,
      });

      this.printSummary(report, orchestrator, config);
      return 0;
    } catch (error) {
      logger.fatal("Lab population aborted", error);
      console.error(`labseed: ${describeFailure(error)}`);
      const partial = orchestrator?.metrics;
      if (partial) {
        console.error("Progress before the failure:");
        console.error(partial.formatSummary());
      }
      return 1;
    } finally {
      if (adaptor) {
        await adaptor.close();
      }
    }
  }

  private async createAdaptor(config: CLIConfig, logger: StructuredLogger): Promise<DirectoryAdaptor> {
    if (config.dryRun) {
      logger.info("Dry run: using an in-memory directory", { domain: config.domain });
      return new InMemoryDirectoryAdaptor();
    }

    // parseCommand guarantees both are present outside dry runs
    if (!config.bindDN || !config.bindPassword) {
      throw new LabError("InvalidArgument", "Bind credentials are required");
    }

    return await LdapDirectoryAdaptor.connect(
      {
        url: config.ldapUrl,
        bindDN: config.bindDN,
        bindPassword: config.bindPassword,
        rejectUnauthorized: !config.insecureTls,
      },
      config.domain,
      logger.child({ service: "ldap" }),
    );
  }

  private printSummary(report: LabRunReport, orchestrator: LabOrchestrator, config: CLIConfig): void {
    console.log(`Lab population complete (${config.dryRun ? "dry run, " : ""}mode ${report.mode})`);
    console.log(`  Target: ${report.targetLocation}`);
    const summary = orchestrator.metrics?.formatSummary() ?? "";
    for (const line of summary.split("\n")) {
      console.log(`  ${line}`);
    }
    if (report.exportPath) {
      console.log(`  Passwords written to ${report.exportPath}`);
    }
  }

  private printHelp(): void {
    console.log(`
labseed - Populate a lab directory with randomized users, role groups and access groups

USAGE:
    labseed --domain <DNS-DOMAIN> [OPTIONS]

OPTIONS:
    -h, --help                      Show this help message
    -v, --verbose                   Enable debug logging
    --domain <DOMAIN>               Target domain, e.g. corp.example.com (required)
    --ou <DN>                       Container for all new objects (default: CN=Users,<domain DN>)
    -n, --count <N>                 Number of users to create, ${MIN_USER_COUNT}-${MAX_USER_COUNT} (default: ${DEFAULT_USER_COUNT})

    --clean-roles                   Users join only their role group, never access groups directly
    --no-roles                      Ignore role groups; users join access groups only

    --groups-file <PATH>            Groups file of name,tier lines (default: bundled data/groups.txt)
    --names-file <PATH>             Name seeds file of first,last lines (default: bundled data/names.txt)
    --export-passwords              Write accountId:password lines for every created user
    --export-file <PATH>            Export file (default: ./${DEFAULT_EXPORT_FILE})
    --password-length <N>           Generated password length, ${MIN_PASSWORD_LENGTH}-${MAX_PASSWORD_LENGTH} (default: ${DEFAULT_PASSWORD_LENGTH})

    --ldap-url <URL>                Directory URL (default: ldaps://<domain>:636)
    --bind-dn <DN>                  Bind DN or UPN with rights to create objects
    --bind-password <PASSWORD>      Bind password
    --insecure-tls                  Skip TLS certificate verification (self-signed lab DCs)
    --dry-run                       Run against an in-memory directory; nothing is written
    --concurrency <N>               Users provisioned in parallel, 1-${MAX_CONCURRENCY} (default: 1)

ENVIRONMENT VARIABLES:
    LABSEED_DOMAIN                  Target domain
    LABSEED_OU                      Target container DN
    LABSEED_COUNT                   Number of users
    LABSEED_GROUPS_FILE             Groups file
    LABSEED_NAMES_FILE              Name seeds file
    LABSEED_LDAP_URL                Directory URL
    LABSEED_BIND_DN                 Bind DN
    LABSEED_BIND_PASSWORD           Bind password
    LABSEED_INSECURE_TLS            Skip TLS verification (true/false)
    LABSEED_LOG_LEVEL               DEBUG, INFO, WARN, ERROR or FATAL (default: INFO)
    LABSEED_LOG_FILE                Also append JSON log lines to this file
    LABSEED_VERBOSE                 Enable debug logging (true/false)

EXAMPLES:
    # Preview a run without touching a directory
    labseed --domain corp.example.com --count 25 --dry-run

    # 200 users, role-only membership, passwords exported
    LABSEED_BIND_PASSWORD=... \\
    labseed --domain corp.example.com --ou "OU=Lab,DC=corp,DC=example,DC=com" \\
        --bind-dn admin@corp.example.com -n 200 --clean-roles --export-passwords --insecure-tls
`);
  }
}

function describeFailure(error: unknown): string {
  if (isLabError(error)) return `${error.kind}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

// Main entry point
const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  process.exitCode = await new LabSeedMain().run(process.argv.slice(2));
}
