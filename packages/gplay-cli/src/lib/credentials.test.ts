import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  createTokenProvider,
  DEFAULT_REDIRECT_URI,
  hasEnvCredentials,
  lazyTokenProvider,
  readOAuthToken,
  readServiceAccountKey,
  resolveCredentialSource,
  toCredentials,
} from "./credentials.js";
import type { ConfigFile } from "./config.js";

const SA_PROFILE: ConfigFile = {
  default_profile: "ci",
  profiles: [{ name: "ci", type: "service_account", key_path: "/keys/ci.json" }],
};

const OAUTH_PROFILE: ConfigFile = {
  default_profile: "me",
  profiles: [
    {
      name: "me",
      type: "OAuth",
      token_path: "/tokens/me.json",
      client_id: "test-client",
      client_secret: "test-secret",
    },
  ],
};

describe("resolveCredentialSource", () => {
  describe("profiles", () => {
    it("resolves a service account profile", () => {
      expect(resolveCredentialSource(SA_PROFILE, {})).toEqual({
        kind: "service_account",
        origin: "profile",
        profile: "ci",
        keyPath: "/keys/ci.json",
      });
    });

    it("accepts type spellings case-insensitively", () => {
      for (const type of ["service-account", " ServiceAccount ", "SERVICE_ACCOUNT"]) {
        const config: ConfigFile = { profiles: [{ name: "x", type, key_path: "/k.json" }] };
        expect(resolveCredentialSource(config, {}).kind).toBe("service_account");
      }
    });

    it("resolves an oauth profile with the default redirect URI", () => {
      expect(resolveCredentialSource(OAUTH_PROFILE, {})).toEqual({
        kind: "oauth",
        origin: "profile",
        profile: "me",
        tokenPath: "/tokens/me.json",
        clientId: "test-client",
        clientSecret: "test-secret",
        redirectUri: DEFAULT_REDIRECT_URI,
      });
    });

    it("takes the redirect URI of an oauth profile from the environment", () => {
      const source = resolveCredentialSource(OAUTH_PROFILE, {
        GPLAY_OAUTH_REDIRECT_URI: "http://127.0.0.1:8085/callback",
      });
      expect(source).toMatchObject({
        origin: "profile",
        redirectUri: "http://127.0.0.1:8085/callback",
      });
    });

    it("wins over environment credentials when strict mode is off", () => {
      const source = resolveCredentialSource(SA_PROFILE, {
        GPLAY_SERVICE_ACCOUNT_JSON: "/env/key.json",
      });
      expect(source.origin).toBe("profile");
    });

    it("fails for an unknown profile name", () => {
      expect(() => resolveCredentialSource(SA_PROFILE, { GPLAY_PROFILE: "prod" })).toThrowError(
        expect.objectContaining({
          code: "AUTH_PROFILE_NOT_FOUND",
          message: "profile not found: prod",
        })
      );
    });

    it("fails for a service account profile without key_path", () => {
      const config: ConfigFile = { profiles: [{ name: "x", type: "service_account" }] };
      expect(() => resolveCredentialSource(config, {})).toThrowError(
        "service account profile missing key_path"
      );
    });

    it("fails for an oauth profile without token_path", () => {
      const config: ConfigFile = {
        profiles: [{ name: "x", type: "oauth", client_id: "a", client_secret: "b" }],
      };
      expect(() => resolveCredentialSource(config, {})).toThrowError(
        "oauth profile missing token_path"
      );
    });

    it("fails for an oauth profile without client credentials", () => {
      const config: ConfigFile = {
        profiles: [{ name: "x", type: "oauth", token_path: "/t.json", client_id: "a" }],
      };
      expect(() => resolveCredentialSource(config, {})).toThrowError(
        "oauth profile missing client_id or client_secret"
      );
    });

    it("fails for an unknown profile type", () => {
      const config: ConfigFile = { profiles: [{ name: "x", type: "apikey" }] };
      expect(() => resolveCredentialSource(config, {})).toThrowError(
        expect.objectContaining({
          code: "AUTH_INVALID_PROFILE",
          message: "unknown profile type: apikey",
          suggestion: "Use type service_account or oauth.",
        })
      );
    });
  });

  describe("strict mode", () => {
    it("rejects a profile when environment credentials are also set", () => {
      expect(() =>
        resolveCredentialSource(SA_PROFILE, {
          GPLAY_STRICT_AUTH: "true",
          GPLAY_OAUTH_TOKEN_PATH: "/env/token.json",
        })
      ).toThrowError(
        expect.objectContaining({
          code: "AUTH_STRICT_CONFLICT",
          message: "strict auth: profile selected but environment credentials also present",
        })
      );
    });

    it("reports profile shape problems before the conflict", () => {
      const config: ConfigFile = { profiles: [{ name: "x", type: "service_account" }] };
      expect(() =>
        resolveCredentialSource(config, {
          GPLAY_STRICT_AUTH: "1",
          GPLAY_SERVICE_ACCOUNT_JSON: "/env/key.json",
        })
      ).toThrowError("service account profile missing key_path");
    });

    it("allows environment credentials when no profile is selected", () => {
      const source = resolveCredentialSource(undefined, {
        GPLAY_STRICT_AUTH: "true",
        GPLAY_SERVICE_ACCOUNT_JSON: "/env/key.json",
      });
      expect(source).toEqual({ kind: "service_account", origin: "env", keyPath: "/env/key.json" });
    });
  });

  describe("environment", () => {
    it("prefers the service account over an oauth token", () => {
      const source = resolveCredentialSource(undefined, {
        GPLAY_SERVICE_ACCOUNT_JSON: " /env/key.json ",
        GPLAY_OAUTH_TOKEN_PATH: "/env/token.json",
      });
      expect(source.kind).toBe("service_account");
    });

    it("uses env credentials when GPLAY_PROFILE is set but no config exists", () => {
      const source = resolveCredentialSource(undefined, {
        GPLAY_PROFILE: "ci",
        GPLAY_SERVICE_ACCOUNT_JSON: "/env/key.json",
      });
      expect(source.origin).toBe("env");
    });

    it("builds an oauth source with a custom redirect URI", () => {
      const source = resolveCredentialSource(undefined, {
        GPLAY_OAUTH_TOKEN_PATH: "/env/token.json",
        GPLAY_OAUTH_CLIENT_ID: "test-client",
        GPLAY_OAUTH_CLIENT_SECRET: "test-secret",
        GPLAY_OAUTH_REDIRECT_URI: "http://127.0.0.1:8085/callback",
      });
      expect(source).toEqual({
        kind: "oauth",
        origin: "env",
        tokenPath: "/env/token.json",
        clientId: "test-client",
        clientSecret: "test-secret",
        redirectUri: "http://127.0.0.1:8085/callback",
      });
    });

    it("requires both oauth client variables", () => {
      expect(() =>
        resolveCredentialSource(undefined, {
          GPLAY_OAUTH_TOKEN_PATH: "/env/token.json",
          GPLAY_OAUTH_CLIENT_ID: "test-client",
        })
      ).toThrowError(
        "oauth env vars incomplete: missing GPLAY_OAUTH_CLIENT_ID or GPLAY_OAUTH_CLIENT_SECRET"
      );
    });

    it("fails with no credentials at all", () => {
      expect(() => resolveCredentialSource({}, { GPLAY_SERVICE_ACCOUNT_JSON: "  " })).toThrowError(
        expect.objectContaining({ code: "AUTH_NO_CREDENTIALS", message: "no credentials found" })
      );
    });
  });

  it("hasEnvCredentials ignores blank values", () => {
    expect(hasEnvCredentials({ GPLAY_OAUTH_TOKEN_PATH: "" })).toBe(false);
    expect(hasEnvCredentials({ GPLAY_OAUTH_TOKEN_PATH: "/t.json" })).toBe(true);
  });
});

describe("credential files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gplay-creds-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads a service account key", () => {
    const path = join(dir, "key.json");
    writeFileSync(
      path,
      JSON.stringify({ client_email: "ci@example.iam.gserviceaccount.com", private_key: "test-key" })
    );
    expect(readServiceAccountKey(path).client_email).toBe("ci@example.iam.gserviceaccount.com");
  });

  it("rejects a key without a private key", () => {
    const path = join(dir, "key.json");
    writeFileSync(path, JSON.stringify({ client_email: "ci@example.com" }));
    expect(() => readServiceAccountKey(path)).toThrowError(
      expect.objectContaining({
        code: "AUTH_KEY_UNREADABLE",
        message: "failed to read service account file: key file is missing client_email or private_key",
      })
    );
  });

  it("rejects a missing key file", () => {
    expect(() => readServiceAccountKey(join(dir, "nope.json"))).toThrowError(
      expect.objectContaining({ code: "AUTH_KEY_UNREADABLE" })
    );
  });

  it("reads an oauth token file and maps RFC 3339 expiry", () => {
    const path = join(dir, "token.json");
    writeFileSync(
      path,
      JSON.stringify({ access_token: "test-access", expiry: "2030-01-01T00:00:00Z" })
    );
    const credentials = toCredentials(readOAuthToken(path));
    expect(credentials.access_token).toBe("test-access");
    expect(credentials.expiry_date).toBe(Date.UTC(2030, 0, 1));
  });

  it("returns a stored oauth token that is not about to expire", async () => {
    const path = join(dir, "token.json");
    writeFileSync(
      path,
      JSON.stringify({
        access_token: "test-access",
        refresh_token: "test-refresh",
        expiry_date: Date.now() + 3_600_000,
      })
    );

    const provider = createTokenProvider(
      {
        kind: "oauth",
        origin: "env",
        tokenPath: path,
        clientId: "test-client",
        clientSecret: "test-secret",
        redirectUri: DEFAULT_REDIRECT_URI,
      },
      []
    );

    await expect(provider.getAccessToken()).resolves.toBe("test-access");
    expect(JSON.parse(readFileSync(path, "utf-8")).access_token).toBe("test-access");
  });

  it("rejects on first use when the key file cannot be read", async () => {
    const provider = createTokenProvider(
      { kind: "service_account", origin: "env", keyPath: join(dir, "missing.json") },
      []
    );
    await expect(provider.getAccessToken()).rejects.toMatchObject({ code: "AUTH_KEY_UNREADABLE" });
  });
});

describe("lazyTokenProvider", () => {
  it("creates the provider once, on the first request", async () => {
    let created = 0;
    const provider = lazyTokenProvider(() => {
      created += 1;
      return { getAccessToken: async () => "test-token" };
    });

    expect(created).toBe(0);
    await provider.getAccessToken();
    await provider.getAccessToken();
    expect(created).toBe(1);
  });

  it("turns resolution failures into rejections", async () => {
    const provider = lazyTokenProvider(() => resolveCredentialSourceProvider());
    await expect(provider.getAccessToken()).rejects.toMatchObject({ code: "AUTH_NO_CREDENTIALS" });
  });
});

function resolveCredentialSourceProvider() {
  return createTokenProvider(resolveCredentialSource(undefined, {}), []);
}
