import { Command } from "commander";
import { existsSync, mkdirSync, rmSync } from "fs";
import { homedir } from "os";
import { dirname, resolve } from "path";
import type { Credentials } from "google-auth-library";
import type { Services } from "../lib/services.js";
import type { PromptService } from "../lib/ports/prompt.js";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";
import {
  action,
  printOutput,
  requireConfirm,
  requireOption,
  validateOutputOptions,
  withOutputOptions,
} from "../lib/command.js";
import type { OutputOptions } from "../lib/output/format.js";
import {
  findProfile,
  globalConfigPath,
  loadConfigFile,
  localConfigPath,
  parseDuration,
  removeProfile,
  resolveProfileName,
  saveConfigFile,
  tokenPathFor,
  upsertProfile,
  type ConfigFile,
  type Profile,
} from "../lib/config.js";
import {
  CREDENTIAL_ENV,
  fromCredentials,
  hasEnvCredentials,
  readServiceAccountKey,
  SCOPES,
  writeOAuthToken,
} from "../lib/credentials.js";
import { runLoopbackLogin, type LoopbackLoginConfig } from "../lib/oauth-flow.js";
import { isNonInteractive } from "../lib/cli-context.js";
import { configExists, invalidFlag, missingFlag, profileNotFound } from "../lib/errors/catalog.js";
import { logProgress } from "../lib/spinner.js";
import { registerAuthDoctorCommand } from "./doctor.js";

type AuthOptions = OutputOptions & {
  force?: boolean;
  local?: boolean;
  profile?: string;
  serviceAccount?: string;
  clientId?: string;
  clientSecret?: string;
  setDefault: boolean;
  browser: boolean;
  timeout: string;
  confirm?: boolean;
};

/**
 * Dependencies for auth commands.
 * All have defaults for production use.
 */
export interface AuthDeps {
  promptService?: PromptService;
  login?: (config: LoopbackLoginConfig) => Promise<Credentials>;
  home?: string;
  cwd?: string;
}

export const LOGIN_SCOPES = [SCOPES.androidpublisher, SCOPES.reporting, SCOPES.storage];

function targetPath(services: Services, local: boolean | undefined, cwd: string): string {
  return local ? localConfigPath(cwd) : services.config().path;
}

function readConfig(path: string): ConfigFile {
  return loadConfigFile(path) ?? {};
}

async function resolveClientValue(
  flag: string,
  value: string | undefined,
  env: NodeJS.ProcessEnv,
  envKey: string,
  ask: () => Promise<string | undefined>
): Promise<string> {
  const fromFlag = value?.trim() || env[envKey]?.trim();
  if (fromFlag) return fromFlag;
  if (isNonInteractive()) {
    throw missingFlag(flag, "auth login");
  }
  const answer = await ask();
  if (!answer) {
    throw missingFlag(flag, "auth login");
  }
  return answer;
}

function parseLoginTimeout(value: string): number {
  const ms = parseDuration(value);
  if (ms === undefined || ms <= 0) {
    throw invalidFlag(`--timeout must be a duration such as 90s or 5m, got: ${value}`);
  }
  return ms;
}

export function registerAuthCommands(program: Command, services: Services, deps: AuthDeps = {}): void {
  const {
    promptService = interactivePrompts,
    login = (config: LoopbackLoginConfig) => runLoopbackLogin(config, { logger: services.logger }),
    home = homedir(),
    cwd = process.cwd(),
  } = deps;

  const auth = program.command("auth").description("Manage Google Play credentials and profiles");

  withOutputOptions(
    auth
      .command("init")
      .description("Create an empty config file")
      .option("--force", "overwrite an existing config")
      .option("--local", "write ./.gplay/config.json instead of the global config")
  ).action(
    action(async (options: AuthOptions) => {
      validateOutputOptions(options);
      const path = options.local ? localConfigPath(cwd) : globalConfigPath(home);
      if (existsSync(path) && !options.force) {
        throw configExists(path);
      }
      const config: ConfigFile = {};
      saveConfigFile(path, config);
      printOutput({ config_path: path, created: true, config }, options);
    })
  );

  withOutputOptions(
    auth
      .command("login")
      .description("Sign in with OAuth or register a service account key")
      .option("--profile <name>", "profile name", "default")
      .option("--service-account <path>", "service account JSON key file")
      .option("--client-id <id>", `OAuth client ID (or ${CREDENTIAL_ENV.oauthClientId})`)
      .option("--client-secret <secret>", `OAuth client secret (or ${CREDENTIAL_ENV.oauthClientSecret})`)
      .option("--no-set-default", "do not make this the default profile")
      .option("--local", "write ./.gplay/config.json instead of the active config")
      .option("--timeout <duration>", "how long to wait for the browser sign-in", "5m")
      .option("--no-browser", "print the sign-in URL without opening a browser")
  ).action(
    action(async (options: AuthOptions) => {
      validateOutputOptions(options);
      const name = requireOption(options.profile, "--profile");
      const path = targetPath(services, options.local, cwd);

      let profile: Profile;
      if (options.serviceAccount !== undefined) {
        const keyPath = resolve(cwd, requireOption(options.serviceAccount, "--service-account"));
        const key = readServiceAccountKey(keyPath);
        services.logger.debug("service account key verified", { clientEmail: key.client_email });
        profile = { name, type: "service_account", key_path: keyPath };
      } else {
        const timeoutMs = parseLoginTimeout(options.timeout);
        const clientId = await resolveClientValue(
          "--client-id",
          options.clientId,
          services.env,
          CREDENTIAL_ENV.oauthClientId,
          () => promptService.text("OAuth client ID")
        );
        const clientSecret = await resolveClientValue(
          "--client-secret",
          options.clientSecret,
          services.env,
          CREDENTIAL_ENV.oauthClientSecret,
          () => promptService.password("OAuth client secret")
        );
        const tokens = await login({
          clientId,
          clientSecret,
          scopes: LOGIN_SCOPES,
          timeoutMs,
          openBrowser: options.browser,
        });
        const tokenPath = tokenPathFor(name, home);
        mkdirSync(dirname(tokenPath), { recursive: true, mode: 0o700 });
        writeOAuthToken(tokenPath, fromCredentials(tokens));
        logProgress(`Saved OAuth token to ${tokenPath}`);
        profile = { name, type: "oauth", token_path: tokenPath, client_id: clientId, client_secret: clientSecret };
      }

      let config = upsertProfile(readConfig(path), profile);
      if (options.setDefault) {
        config = { ...config, default_profile: name };
      }
      saveConfigFile(path, config);
      printOutput({ config_path: path, profile: name }, options);
    })
  );

  withOutputOptions(
    auth
      .command("switch")
      .description("Make another profile the default")
      .option("--profile <name>", "profile to switch to")
      .option("--local", "use ./.gplay/config.json")
  ).action(
    action(async (options: AuthOptions) => {
      validateOutputOptions(options);
      const name = requireOption(options.profile, "--profile");
      const path = targetPath(services, options.local, cwd);
      const config = readConfig(path);
      if (!findProfile(config, name)) {
        throw profileNotFound(name);
      }
      saveConfigFile(path, { ...config, default_profile: name });
      printOutput({ config_path: path, default_profile: name }, options);
    })
  );

  withOutputOptions(
    auth
      .command("logout")
      .description("Remove a profile and its stored OAuth token")
      .option("--profile <name>", "profile to remove")
      .option("--local", "use ./.gplay/config.json")
      .option("--confirm", "confirm removal")
  ).action(
    action(async (options: AuthOptions) => {
      validateOutputOptions(options);
      const name = requireOption(options.profile, "--profile");
      requireConfirm(options.confirm, "remove a profile");
      const path = targetPath(services, options.local, cwd);
      const config = readConfig(path);
      const profile = findProfile(config, name);
      if (!profile) {
        throw profileNotFound(name);
      }
      if (profile.token_path && existsSync(profile.token_path)) {
        rmSync(profile.token_path, { force: true });
      }
      saveConfigFile(path, removeProfile(config, name));
      printOutput({ config_path: path, removed_profile: name }, options);
    })
  );

  withOutputOptions(auth.command("status").description("Show the active profile and known profiles")).action(
    action(async (options: AuthOptions) => {
      validateOutputOptions(options);
      const { path, config } = services.config();
      printOutput(
        {
          config_path: path,
          profile: resolveProfileName(config, services.env) ?? "",
          profiles: (config?.profiles ?? []).map((p) => ({ name: p.name, type: p.type })),
          env_present: hasEnvCredentials(services.env),
        },
        options
      );
    })
  );

  registerAuthDoctorCommand(auth, services);
}
