import { z } from "zod";
import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join, resolve } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import { parseBoolean } from "./cli-context.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CONFIG_DIR_NAME = ".gplay";
export const CONFIG_FILE_NAME = "config.json";

/** Environment variables read by the configuration layer */
export const ENV = {
  configPath: "GPLAY_CONFIG_PATH",
  profile: "GPLAY_PROFILE",
  packageName: "GPLAY_PACKAGE_NAME",
  strictAuth: "GPLAY_STRICT_AUTH",
  timeout: "GPLAY_TIMEOUT",
  timeoutSeconds: "GPLAY_TIMEOUT_SECONDS",
  uploadTimeout: "GPLAY_UPLOAD_TIMEOUT",
  uploadTimeoutSeconds: "GPLAY_UPLOAD_TIMEOUT_SECONDS",
  defaultOutput: "GPLAY_DEFAULT_OUTPUT",
  debug: "GPLAY_DEBUG",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const DurationSchema = z.union([z.string(), z.number().nonnegative()]).optional();

export const ProfileSchema = z
  .object({
    name: z.string().min(1, "profile name must not be empty"),
    type: z.string(),
    key_path: z.string().optional(),
    token_path: z.string().optional(),
    client_id: z.string().optional(),
    client_secret: z.string().optional(),
  })
  .passthrough();

/** Complete configuration file schema (unknown keys are kept on save) */
export const ConfigFileSchema = z
  .object({
    default_profile: z.string().optional(),
    profiles: z.array(ProfileSchema).optional(),
    package_name: z.string().optional(),
    timeout: DurationSchema,
    timeout_seconds: DurationSchema,
    upload_timeout: DurationSchema,
    upload_timeout_seconds: DurationSchema,
    debug: z.union([z.string(), z.boolean()]).optional(),
  })
  .passthrough();

export type Profile = z.infer<typeof ProfileSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadedConfig {
  /** Active config path, whether or not the file exists */
  path: string;
  /** Parsed config, undefined when the file does not exist */
  config?: ConfigFile;
}

export interface Timeouts {
  requestMs?: number;
  uploadMs?: number;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function globalConfigPath(home: string = homedir()): string {
  return join(home, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function localConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Active config path: GPLAY_CONFIG_PATH, then ./.gplay/config.json when it
 * exists, then ~/.gplay/config.json.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  home: string = homedir()
): string {
  const fromEnv = env[ENV.configPath]?.trim();
  if (fromEnv) {
    return resolve(cwd, fromEnv);
  }

  const local = localConfigPath(cwd);
  if (existsSync(local)) {
    return local;
  }

  return globalConfigPath(home);
}

/** Default location for OAuth tokens of a profile */
export function tokenPathFor(profile: string, home: string = homedir()): string {
  return join(home, CONFIG_DIR_NAME, "tokens", `${profile}.json`);
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a JSON config file from disk.
 * Returns undefined if the file doesn't exist.
 * Throws CONFIG_INVALID if the file exists but is unreadable or invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${errorMessage(err)}`]);
  }

  if (content.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid JSON: ${errorMessage(err)}`]);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Load the active configuration.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const path = resolveConfigPath(env);
  return { path, config: loadConfigFile(path) };
}

/**
 * Write configuration as 2-space JSON readable only by the owner.
 */
export function saveConfigFile(path: string, config: ConfigFile): void {
  mkdirSync(dirname(path), { recursive: true, mode: 0o755 });
  writeFileSync(path, `${JSON.stringify(config, null, 2)}\n`, { mode: 0o600 });
  chmodSync(path, 0o600);
}

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

export function findProfile(config: ConfigFile | undefined, name: string): Profile | undefined {
  return config?.profiles?.find((p) => p.name === name);
}

/**
 * Insert or replace a profile by name, keeping the order of existing ones.
 */
export function upsertProfile(config: ConfigFile, profile: Profile): ConfigFile {
  const profiles = config.profiles ?? [];
  const index = profiles.findIndex((p) => p.name === profile.name);
  const next =
    index === -1
      ? [...profiles, profile]
      : profiles.map((p, i) => (i === index ? profile : p));
  return { ...config, profiles: next };
}

export function removeProfile(config: ConfigFile, name: string): ConfigFile {
  const profiles = (config.profiles ?? []).filter((p) => p.name !== name);
  const next: ConfigFile = { ...config, profiles };
  if (config.default_profile === name) {
    next.default_profile = "";
  }
  return next;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Selected profile: GPLAY_PROFILE, then default_profile, then the only
 * profile when exactly one exists.
 */
export function resolveProfileName(
  config: ConfigFile | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const fromEnv = env[ENV.profile]?.trim();
  if (fromEnv) return fromEnv;

  const fromConfig = config?.default_profile?.trim();
  if (fromConfig) return fromConfig;

  if (config?.profiles?.length === 1) {
    return config.profiles[0].name;
  }
  return undefined;
}

/**
 * Package name: flag, then GPLAY_PACKAGE_NAME, then package_name.
 */
export function resolvePackageName(
  flagValue: string | undefined,
  config: ConfigFile | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const fromFlag = flagValue?.trim();
  if (fromFlag) return fromFlag;

  const fromEnv = env[ENV.packageName]?.trim();
  if (fromEnv) return fromEnv;

  const fromConfig = config?.package_name?.trim();
  return fromConfig || undefined;
}

export function isStrictAuth(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBoolean(env[ENV.strictAuth]) ?? false;
}

export function isDebugEnabled(
  config: ConfigFile | undefined,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (parseBoolean(env[ENV.debug])) return true;
  const value = config?.debug;
  if (typeof value === "boolean") return value;
  return parseBoolean(value) ?? false;
}

// ---------------------------------------------------------------------------
// Durations
// ---------------------------------------------------------------------------

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?(?:ms|h|m|s))+$/;
const DURATION_PART = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;

/**
 * Parse a unit duration such as "90s", "5m", "1h30m" or "250ms" into
 * milliseconds. Returns undefined for anything else.
 */
export function parseDuration(raw: string): number | undefined {
  const value = raw.trim();
  if (!DURATION_PATTERN.test(value)) return undefined;

  let total = 0;
  for (const match of value.matchAll(DURATION_PART)) {
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}

/** Parse a whole number of seconds into milliseconds. */
export function parseSeconds(raw: string): number | undefined {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) return undefined;
  return Number(value) * 1000;
}

/**
 * Config durations accept a unit duration, a string of seconds or a number
 * of seconds.
 */
export function parseConfigDuration(raw: string | number | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw === "number") return raw * 1000;
  return parseDuration(raw) ?? parseSeconds(raw);
}

function positive(ms: number | undefined): number | undefined {
  return ms !== undefined && ms > 0 ? ms : undefined;
}

function resolveTimeout(
  envDuration: string | undefined,
  envSeconds: string | undefined,
  configDuration: string | number | undefined,
  configSeconds: string | number | undefined
): number | undefined {
  return (
    positive(envDuration ? parseDuration(envDuration) : undefined) ??
    positive(envSeconds ? parseSeconds(envSeconds) : undefined) ??
    positive(parseConfigDuration(configDuration)) ??
    positive(parseConfigDuration(configSeconds))
  );
}

/**
 * Request and upload timeouts. Each follows env duration, env seconds,
 * config duration, config seconds; unset means no timeout.
 */
export function resolveTimeouts(
  config: ConfigFile | undefined,
  env: NodeJS.ProcessEnv = process.env
): Timeouts {
  return {
    requestMs: resolveTimeout(
      env[ENV.timeout],
      env[ENV.timeoutSeconds],
      config?.timeout,
      config?.timeout_seconds
    ),
    uploadMs: resolveTimeout(
      env[ENV.uploadTimeout],
      env[ENV.uploadTimeoutSeconds],
      config?.upload_timeout,
      config?.upload_timeout_seconds
    ),
  };
}

/** Render milliseconds the way durations are written in config files. */
export function formatDuration(ms: number): string {
  if (ms % 3_600_000 === 0) return `${ms / 3_600_000}h`;
  if (ms % 60_000 === 0) return `${ms / 60_000}m`;
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}
