import { z } from "zod";
import { readFileSync, writeFileSync } from "fs";
import { JWT, OAuth2Client, type Credentials } from "google-auth-library";
import type { TokenProvider } from "./ports/token.js";
import type { ConfigFile } from "./config.js";
import { findProfile, isStrictAuth, resolveProfileName } from "./config.js";
import {
  invalidProfile,
  keyUnreadable,
  noCredentials,
  oauthEnvIncomplete,
  profileNotFound,
  strictAuthConflict,
  tokenUnreadable,
} from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const CREDENTIAL_ENV = {
  serviceAccount: "GPLAY_SERVICE_ACCOUNT_JSON",
  oauthTokenPath: "GPLAY_OAUTH_TOKEN_PATH",
  oauthClientId: "GPLAY_OAUTH_CLIENT_ID",
  oauthClientSecret: "GPLAY_OAUTH_CLIENT_SECRET",
  oauthRedirectUri: "GPLAY_OAUTH_REDIRECT_URI",
} as const;

export const DEFAULT_REDIRECT_URI = "urn:ietf:wg:oauth:2.0:oob";

export const SCOPES = {
  androidpublisher: "https://www.googleapis.com/auth/androidpublisher",
  reporting: "https://www.googleapis.com/auth/playdeveloperreporting",
  storage: "https://www.googleapis.com/auth/devstorage.read_only",
} as const;

export type CredentialOrigin = "profile" | "env";

export interface ServiceAccountSource {
  kind: "service_account";
  origin: CredentialOrigin;
  profile?: string;
  keyPath: string;
}

export interface OAuthSource {
  kind: "oauth";
  origin: CredentialOrigin;
  profile?: string;
  tokenPath: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export type CredentialSource = ServiceAccountSource | OAuthSource;

const ServiceAccountKeySchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export const OAuthTokenFileSchema = z
  .object({
    access_token: z.string().optional(),
    refresh_token: z.string().optional(),
    token_type: z.string().optional(),
    expiry_date: z.number().optional(),
    expiry: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type OAuthTokenFile = z.infer<typeof OAuthTokenFileSchema>;

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function hasEnvCredentials(env: NodeJS.ProcessEnv = process.env): boolean {
  return (
    envValue(env, CREDENTIAL_ENV.serviceAccount) !== undefined ||
    envValue(env, CREDENTIAL_ENV.oauthTokenPath) !== undefined
  );
}

export function normalizeProfileType(type: string): "service_account" | "oauth" | undefined {
  switch (type.trim().toLowerCase()) {
    case "service_account":
    case "service-account":
    case "serviceaccount":
      return "service_account";
    case "oauth":
      return "oauth";
    default:
      return undefined;
  }
}

/** GPLAY_OAUTH_REDIRECT_URI applies to profile and environment OAuth alike. */
function redirectUriFromEnv(env: NodeJS.ProcessEnv): string {
  return envValue(env, CREDENTIAL_ENV.oauthRedirectUri) ?? DEFAULT_REDIRECT_URI;
}

function fromProfile(config: ConfigFile, name: string, env: NodeJS.ProcessEnv): CredentialSource {
  const profile = findProfile(config, name);
  if (!profile) {
    throw profileNotFound(name);
  }

  const kind = normalizeProfileType(profile.type);
  let source: CredentialSource;

  if (kind === "service_account") {
    const keyPath = profile.key_path?.trim();
    if (!keyPath) {
      throw invalidProfile(
        "service account profile missing key_path",
        `Run \`gplay auth login --profile ${name} --service-account <key.json>\` to fix it.`
      );
    }
    source = { kind, origin: "profile", profile: name, keyPath };
  } else if (kind === "oauth") {
    const tokenPath = profile.token_path?.trim();
    if (!tokenPath) {
      throw invalidProfile(
        "oauth profile missing token_path",
        `Run \`gplay auth login --profile ${name}\` to sign in again.`
      );
    }
    const clientId = profile.client_id?.trim();
    const clientSecret = profile.client_secret?.trim();
    if (!clientId || !clientSecret) {
      throw invalidProfile(
        "oauth profile missing client_id or client_secret",
        `Run \`gplay auth login --profile ${name} --client-id <id> --client-secret <secret>\`.`
      );
    }
    source = {
      kind,
      origin: "profile",
      profile: name,
      tokenPath,
      clientId,
      clientSecret,
      redirectUri: redirectUriFromEnv(env),
    };
  } else {
    throw invalidProfile(
      `unknown profile type: ${profile.type}`,
      "Use type service_account or oauth."
    );
  }

  if (isStrictAuth(env) && hasEnvCredentials(env)) {
    throw strictAuthConflict();
  }

  return source;
}

function fromEnv(env: NodeJS.ProcessEnv): CredentialSource {
  const keyPath = envValue(env, CREDENTIAL_ENV.serviceAccount);
  if (keyPath) {
    return { kind: "service_account", origin: "env", keyPath };
  }

  const tokenPath = envValue(env, CREDENTIAL_ENV.oauthTokenPath);
  const clientId = envValue(env, CREDENTIAL_ENV.oauthClientId);
  const clientSecret = envValue(env, CREDENTIAL_ENV.oauthClientSecret);
  if (!tokenPath) {
    throw noCredentials();
  }
  if (!clientId || !clientSecret) {
    throw oauthEnvIncomplete();
  }

  return {
    kind: "oauth",
    origin: "env",
    tokenPath,
    clientId,
    clientSecret,
    redirectUri: redirectUriFromEnv(env),
  };
}

/**
 * Decide which credentials a command runs with.
 *
 * A selected profile (GPLAY_PROFILE, default_profile, or the only profile)
 * wins over environment credentials. With GPLAY_STRICT_AUTH set, having
 * both is an error instead. Without a usable profile the environment is
 * consulted, service account first.
 */
export function resolveCredentialSource(
  config: ConfigFile | undefined,
  env: NodeJS.ProcessEnv = process.env
): CredentialSource {
  const profileName = resolveProfileName(config, env);
  if (profileName && config) {
    return fromProfile(config, profileName, env);
  }

  if (hasEnvCredentials(env)) {
    return fromEnv(env);
  }

  throw noCredentials();
}

/** Short human description, used by `auth status` and `--debug`. */
export function describeCredentialSource(source: CredentialSource): string {
  const who = source.origin === "profile" ? `profile "${source.profile ?? ""}"` : "environment";
  return source.kind === "service_account"
    ? `service account key ${source.keyPath} (${who})`
    : `OAuth token ${source.tokenPath} (${who})`;
}

// ---------------------------------------------------------------------------
// Credential files
// ---------------------------------------------------------------------------

export function readServiceAccountKey(path: string): z.infer<typeof ServiceAccountKeySchema> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw keyUnreadable(path, errorMessage(err));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw keyUnreadable(path, `invalid JSON: ${errorMessage(err)}`);
  }

  const result = ServiceAccountKeySchema.safeParse(parsed);
  if (!result.success) {
    throw keyUnreadable(path, "key file is missing client_email or private_key");
  }
  return result.data;
}

export function readOAuthToken(path: string): OAuthTokenFile {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw tokenUnreadable(path, errorMessage(err));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw tokenUnreadable(path, `invalid JSON: ${errorMessage(err)}`);
  }

  const result = OAuthTokenFileSchema.safeParse(parsed);
  if (!result.success) {
    throw tokenUnreadable(path, "unexpected token file format");
  }
  return result.data;
}

export function writeOAuthToken(path: string, token: OAuthTokenFile): void {
  writeFileSync(path, `${JSON.stringify(token, null, 2)}\n`, { mode: 0o600 });
}

/** Map a token file to google-auth-library credentials. */
export function toCredentials(token: OAuthTokenFile): Credentials {
  let expiryDate = token.expiry_date;
  if (expiryDate === undefined && token.expiry) {
    const parsed = Date.parse(token.expiry);
    expiryDate = Number.isNaN(parsed) ? undefined : parsed;
  }
  return {
    access_token: token.access_token,
    refresh_token: token.refresh_token,
    token_type: token.token_type,
    expiry_date: expiryDate,
    scope: token.scope,
  };
}

/** Map google-auth-library credentials to the token file format. */
export function fromCredentials(tokens: Credentials): OAuthTokenFile {
  return {
    access_token: tokens.access_token ?? undefined,
    refresh_token: tokens.refresh_token ?? undefined,
    token_type: tokens.token_type ?? undefined,
    expiry_date: tokens.expiry_date ?? undefined,
    scope: tokens.scope ?? undefined,
  };
}

// ---------------------------------------------------------------------------
// Token providers
// ---------------------------------------------------------------------------

function requireToken(token: string | null | undefined, source: CredentialSource): string {
  if (!token) {
    throw new Error(`no access token returned for ${describeCredentialSource(source)}`);
  }
  return token;
}

function serviceAccountProvider(source: ServiceAccountSource, scopes: string[]): TokenProvider {
  let client: JWT | undefined;
  return {
    async getAccessToken() {
      if (!client) {
        const key = readServiceAccountKey(source.keyPath);
        client = new JWT({ email: key.client_email, key: key.private_key, scopes });
      }
      const { token } = await client.getAccessToken();
      return requireToken(token, source);
    },
  };
}

function oauthProvider(source: OAuthSource): TokenProvider {
  let client: OAuth2Client | undefined;
  return {
    async getAccessToken() {
      if (!client) {
        const stored = readOAuthToken(source.tokenPath);
        const oauth = new OAuth2Client({
          clientId: source.clientId,
          clientSecret: source.clientSecret,
          redirectUri: source.redirectUri,
        });
        oauth.setCredentials(toCredentials(stored));
        oauth.on("tokens", (tokens: Credentials) => {
          writeOAuthToken(source.tokenPath, {
            ...stored,
            access_token: tokens.access_token ?? stored.access_token,
            refresh_token: tokens.refresh_token ?? stored.refresh_token,
            token_type: tokens.token_type ?? stored.token_type,
            expiry_date: tokens.expiry_date ?? undefined,
            expiry: undefined,
          });
        });
        client = oauth;
      }
      const { token } = await client.getAccessToken();
      return requireToken(token, source);
    },
  };
}

/**
 * Build a token provider for a resolved credential source. Key and token
 * files are read on the first request, not when the provider is created.
 */
export function createTokenProvider(source: CredentialSource, scopes: string[]): TokenProvider {
  return source.kind === "service_account"
    ? serviceAccountProvider(source, scopes)
    : oauthProvider(source);
}

/**
 * Defer credential resolution until a request actually needs a token, so
 * commands that never call the API work without credentials.
 */
export function lazyTokenProvider(factory: () => TokenProvider): TokenProvider {
  let provider: TokenProvider | undefined;
  return {
    async getAccessToken() {
      provider ??= factory();
      return provider.getAccessToken();
    },
  };
}
