import { Command } from "commander";
import { existsSync } from "fs";
import { homedir } from "os";
import { resolve } from "path";
import chalk from "chalk";
import type { Services } from "../lib/services.js";
import { action, printOutput, validateOutputOptions, withOutputOptions } from "../lib/command.js";
import type { OutputOptions } from "../lib/output/format.js";
import {
  ENV,
  formatDuration,
  globalConfigPath,
  loadConfigFile,
  localConfigPath,
  parseConfigDuration,
  parseDuration,
  parseSeconds,
  resolveConfigPath,
  resolveProfileName,
  type ConfigFile,
} from "../lib/config.js";
import { normalizeProfileType } from "../lib/credentials.js";
import { errorMessage, isCLIError, ReportedError } from "../lib/errors/types.js";

export interface Setting {
  name: string;
  value: string;
  source: string;
}

export interface ConfigDeps {
  home?: string;
  cwd?: string;
}

type Candidate = [source: string, ms: number | undefined];

function firstTimeout(name: string, candidates: Candidate[]): Setting {
  for (const [source, ms] of candidates) {
    if (ms !== undefined && ms > 0) {
      return { name, value: formatDuration(ms), source };
    }
  }
  return { name, value: "none", source: "default" };
}

function fromEnv(env: NodeJS.ProcessEnv, key: string, parse: (raw: string) => number | undefined): Candidate {
  const raw = env[key];
  return [key, raw ? parse(raw) : undefined];
}

/**
 * Effective settings and where each one comes from.
 */
export function describeSettings(config: ConfigFile | undefined, env: NodeJS.ProcessEnv): Setting[] {
  const settings: Setting[] = [];

  const profile = resolveProfileName(config, env);
  const profileSource = env[ENV.profile]?.trim()
    ? ENV.profile
    : config?.default_profile?.trim()
      ? "config default_profile"
      : profile
        ? "only profile in config"
        : "default";
  settings.push({ name: "profile", value: profile ?? "", source: profileSource });

  const packageFromEnv = env[ENV.packageName]?.trim();
  const packageFromConfig = config?.package_name?.trim();
  settings.push(
    packageFromEnv
      ? { name: "package", value: packageFromEnv, source: ENV.packageName }
      : packageFromConfig
        ? { name: "package", value: packageFromConfig, source: "config package_name" }
        : { name: "package", value: "", source: "default" }
  );

  settings.push(
    firstTimeout("timeout", [
      fromEnv(env, ENV.timeout, parseDuration),
      fromEnv(env, ENV.timeoutSeconds, parseSeconds),
      ["config timeout", parseConfigDuration(config?.timeout)],
      ["config timeout_seconds", parseConfigDuration(config?.timeout_seconds)],
    ]),
    firstTimeout("upload_timeout", [
      fromEnv(env, ENV.uploadTimeout, parseDuration),
      fromEnv(env, ENV.uploadTimeoutSeconds, parseSeconds),
      ["config upload_timeout", parseConfigDuration(config?.upload_timeout)],
      ["config upload_timeout_seconds", parseConfigDuration(config?.upload_timeout_seconds)],
    ])
  );

  const output = env[ENV.defaultOutput]?.trim();
  settings.push(
    output
      ? { name: "default_output", value: output, source: ENV.defaultOutput }
      : { name: "default_output", value: "json", source: "default" }
  );

  return settings;
}

const DURATION_KEYS = ["timeout", "timeout_seconds", "upload_timeout", "upload_timeout_seconds"] as const;

/**
 * Problems the schema does not catch: unparseable durations, unknown profile
 * types, profiles without their key or token file and a dangling default.
 */
export function findConfigIssues(config: ConfigFile): string[] {
  const issues: string[] = [];

  for (const key of DURATION_KEYS) {
    const value = config[key];
    if (value !== undefined && parseConfigDuration(value) === undefined) {
      issues.push(`${key}: invalid duration "${value}"`);
    }
  }

  const seen = new Set<string>();
  for (const profile of config.profiles ?? []) {
    if (seen.has(profile.name)) {
      issues.push(`profiles: duplicate profile "${profile.name}"`);
    }
    seen.add(profile.name);

    const kind = normalizeProfileType(profile.type);
    if (kind === "service_account" && !profile.key_path) {
      issues.push(`profile ${profile.name}: service account profile has no key_path`);
    } else if (kind === "oauth" && !profile.token_path) {
      issues.push(`profile ${profile.name}: oauth profile has no token_path`);
    } else if (kind === undefined) {
      issues.push(`profile ${profile.name}: unknown type "${profile.type}"`);
    }
  }

  const selected = config.default_profile?.trim();
  if (selected && !seen.has(selected)) {
    issues.push(`default_profile: profile not found: ${selected}`);
  }
  return issues;
}

export function registerConfigCommands(program: Command, services: Services, deps: ConfigDeps = {}): void {
  const { home = homedir(), cwd = process.cwd() } = deps;

  const config = program.command("config").description("Inspect gplay configuration");

  withOutputOptions(config.command("path").description("Show the config file locations")).action(
    action(async (options: OutputOptions) => {
      validateOutputOptions(options);
      const active = resolveConfigPath(services.env, cwd, home);
      const global = globalConfigPath(home);
      const local = localConfigPath(cwd);
      printOutput(
        {
          active: { path: active, exists: existsSync(active) },
          global: { path: global, exists: existsSync(global) },
          local: { path: local, exists: existsSync(local) },
        },
        options
      );
    })
  );

  withOutputOptions(
    config.command("show").description("Show effective settings and where each comes from")
  ).action(
    action(async (options: OutputOptions) => {
      validateOutputOptions(options);
      const loaded = services.config();
      printOutput(
        { config_path: loaded.path, settings: describeSettings(loaded.config, services.env) },
        options
      );
    })
  );

  config
    .command("validate")
    .description("Check a config file for errors")
    .option("-c, --config <path>", "file to validate (defaults to the active config)")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  gplay config validate                          ${chalk.gray("Check the active config")}
  gplay config validate -c ./.gplay/config.json  ${chalk.gray("Check a specific file")}
`
    )
    .action(
      action(async (options: { config?: string }) => {
        const path = options.config ? resolve(cwd, options.config) : resolveConfigPath(services.env, cwd, home);
        if (!existsSync(path)) {
          console.error(chalk.red(`✗ File not found: ${path}`));
          throw new ReportedError(`config not found: ${path}`);
        }

        let issues: string[];
        try {
          const parsed = loadConfigFile(path);
          issues = parsed ? findConfigIssues(parsed) : [];
        } catch (error) {
          issues =
            isCLIError(error) && error.details
              ? error.details.split("\n").map((line) => line.replace(/^• /, ""))
              : [errorMessage(error)];
        }

        if (issues.length > 0) {
          console.error(chalk.red(`✗ Invalid: ${path}`));
          for (const issue of issues) {
            console.error(chalk.red(`  • ${issue}`));
          }
          throw new ReportedError(`invalid config: ${path}`);
        }
        console.log(chalk.green(`✓ Valid: ${path}`));
      })
    );
}
