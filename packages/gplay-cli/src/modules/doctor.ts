/**
 * Auth doctor - diagnoses the config file, profiles and credential files.
 */

import { Command } from "commander";
import chalk from "chalk";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import type { Services } from "../lib/services.js";
import { action } from "../lib/command.js";
import {
  isStrictAuth,
  loadConfigFile,
  resolveConfigPath,
  resolveProfileName,
  saveConfigFile,
  findProfile,
  type ConfigFile,
  type Profile,
} from "../lib/config.js";
import { hasEnvCredentials, normalizeProfileType, readOAuthToken, readServiceAccountKey } from "../lib/credentials.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { errorMessage, ReportedError } from "../lib/errors/types.js";

export type CheckStatus = "pass" | "warn" | "fail";

export interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
}

export interface FixResult {
  name: string;
  status: "fixed" | "failed";
  message: string;
}

export interface AuthReport {
  errors: number;
  warnings: number;
  checks: CheckResult[];
  fixes?: FixResult[];
}

type DoctorOptions = {
  fix?: boolean;
  output: string;
  pretty?: boolean;
};

function checkProfile(profile: Profile): CheckResult {
  const name = `profile ${profile.name}`;
  const kind = normalizeProfileType(profile.type);
  try {
    if (kind === "service_account") {
      if (!profile.key_path) {
        return { name, status: "fail", message: "service account profile has no key_path" };
      }
      const key = readServiceAccountKey(profile.key_path);
      return { name, status: "pass", message: `service account ${key.client_email}` };
    }
    if (kind === "oauth") {
      if (!profile.token_path) {
        return { name, status: "fail", message: "oauth profile has no token_path" };
      }
      const token = readOAuthToken(profile.token_path);
      if (!token.refresh_token) {
        return { name, status: "warn", message: "OAuth token has no refresh_token; sign in again when it expires" };
      }
      return { name, status: "pass", message: `OAuth token ${profile.token_path}` };
    }
    return { name, status: "fail", message: `unknown profile type: ${profile.type}` };
  } catch (error) {
    return { name, status: "fail", message: errorMessage(error) };
  }
}

/**
 * Run every auth check against the config at `path`.
 */
export function buildAuthReport(path: string, env: NodeJS.ProcessEnv): AuthReport {
  const checks: CheckResult[] = [];

  checks.push(
    existsSync(dirname(path))
      ? { name: "config directory", status: "pass", message: dirname(path) }
      : { name: "config directory", status: "warn", message: `${dirname(path)} does not exist` }
  );

  let config: ConfigFile | undefined;
  try {
    config = loadConfigFile(path);
    checks.push(
      config
        ? { name: "config file", status: "pass", message: path }
        : { name: "config file", status: "warn", message: `${path} does not exist` }
    );
  } catch (error) {
    checks.push({ name: "config file", status: "fail", message: errorMessage(error) });
  }

  const profiles = config?.profiles ?? [];
  checks.push(
    profiles.length === 0
      ? { name: "profiles", status: "warn", message: "no profiles configured" }
      : { name: "profiles", status: "pass", message: `profiles configured: ${profiles.length}` }
  );
  checks.push(...profiles.map(checkProfile));

  const selected = resolveProfileName(config, env);
  if (selected === undefined) {
    if (profiles.length > 0) {
      checks.push({ name: "default profile", status: "warn", message: "no default profile selected" });
    }
  } else if (config && !findProfile(config, selected)) {
    checks.push({ name: "default profile", status: "fail", message: `profile not found: ${selected}` });
  } else if (config) {
    checks.push({ name: "default profile", status: "pass", message: selected });
  }

  const envPresent = hasEnvCredentials(env);
  if (envPresent) {
    checks.push({ name: "environment", status: "pass", message: "environment credentials detected" });
  }
  if (envPresent && selected !== undefined && isStrictAuth(env)) {
    checks.push({
      name: "strict auth",
      status: "fail",
      message: "profile selected but environment credentials also present",
    });
  }

  return {
    errors: checks.filter((c) => c.status === "fail").length,
    warnings: checks.filter((c) => c.status === "warn").length,
    checks,
  };
}

/**
 * Create a missing config directory and an empty config file.
 */
export function applyFixes(path: string): FixResult[] {
  const fixes: FixResult[] = [];
  const dir = dirname(path);
  if (!existsSync(dir)) {
    try {
      mkdirSync(dir, { recursive: true, mode: 0o755 });
      fixes.push({ name: "config directory", status: "fixed", message: `created ${dir}` });
    } catch (error) {
      fixes.push({ name: "config directory", status: "failed", message: errorMessage(error) });
      return fixes;
    }
  }
  if (!existsSync(path)) {
    try {
      saveConfigFile(path, {});
      fixes.push({ name: "config file", status: "fixed", message: `created ${path}` });
    } catch (error) {
      fixes.push({ name: "config file", status: "failed", message: errorMessage(error) });
    }
  }
  return fixes;
}

function printReport(report: AuthReport): void {
  console.log(chalk.bold.cyan("Auth Doctor"));
  console.log(chalk.dim("─".repeat(50)));

  for (const fix of report.fixes ?? []) {
    const icon = fix.status === "fixed" ? chalk.green("✓") : chalk.red("✗");
    console.log(`${icon} ${chalk.bold(`fix ${fix.name}`)}: ${fix.message}`);
  }
  for (const check of report.checks) {
    const icon =
      check.status === "pass" ? chalk.green("✓") : check.status === "warn" ? chalk.yellow("⚠") : chalk.red("✗");
    console.log(`${icon} ${chalk.bold(check.name)}: ${check.message}`);
  }

  console.log("");
  if (report.errors > 0) {
    console.log(chalk.red(`✗ Found ${report.warnings} warning(s) and ${report.errors} error(s)`));
  } else if (report.warnings > 0) {
    console.log(chalk.yellow(`⚠ Found ${report.warnings} warning(s)`));
  } else {
    console.log(chalk.green("✓ No issues found"));
  }
}

export function registerAuthDoctorCommand(auth: Command, services: Services): void {
  auth
    .command("doctor")
    .description("Diagnose credential and config problems")
    .option("--fix", "create a missing config directory and file")
    .option("--output <format>", "text or json", "text")
    .option("--pretty", "pretty-print JSON output")
    .action(
      action(async (options: DoctorOptions) => {
        const format = options.output.trim().toLowerCase();
        if (format !== "text" && format !== "json") {
          throw invalidFlag(`unsupported format: ${options.output}`, ["text", "json"]);
        }
        if (format !== "json" && options.pretty) {
          throw invalidFlag("--pretty is only valid with JSON output");
        }

        const path = resolveConfigPath(services.env);
        const fixes = options.fix ? applyFixes(path) : undefined;
        const report: AuthReport = { ...buildAuthReport(path, services.env), ...(fixes ? { fixes } : {}) };

        if (format === "json") {
          console.log(options.pretty ? JSON.stringify(report, null, 2) : JSON.stringify(report));
        } else {
          printReport(report);
        }
        if (report.errors > 0) {
          throw new ReportedError(`auth doctor: found ${report.errors} error(s)`);
        }
      })
    );
}
