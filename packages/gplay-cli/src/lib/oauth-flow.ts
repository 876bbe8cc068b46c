import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { randomBytes } from "crypto";
import chalk from "chalk";
import {
  CodeChallengeMethod,
  OAuth2Client,
  type Credentials,
  type GenerateAuthUrlOpts,
  type GetTokenOptions,
} from "google-auth-library";
import type { BrowserService } from "./ports/browser.js";
import type { TimerService } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import { systemBrowser } from "./adapters/system-browser.js";
import { realTimerService } from "./adapters/real-timers.js";
import { createSpinner, logProgress } from "./spinner.js";
import { loginFailed } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const CALLBACK_PATH = "/callback";
export const LOOPBACK_HOST = "127.0.0.1";

/** The parts of OAuth2Client the flow uses */
export interface OAuthClient {
  generateCodeVerifierAsync(): Promise<{ codeVerifier: string; codeChallenge?: string }>;
  generateAuthUrl(options: GenerateAuthUrlOpts): string;
  getToken(options: GetTokenOptions): Promise<{ tokens: Credentials }>;
}

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface LoopbackLoginConfig {
  clientId: string;
  clientSecret: string;
  scopes: string[];
  timeoutMs: number;
  openBrowser: boolean;
}

/**
 * Dependencies for the loopback login flow.
 * All have defaults for production use.
 */
export interface LoopbackLoginDeps {
  createClient?: (config: OAuthClientConfig) => OAuthClient;
  browserService?: BrowserService;
  timers?: TimerService;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const defaultClient = (config: OAuthClientConfig): OAuthClient => new OAuth2Client(config);

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, LOOPBACK_HOST, () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(loginFailed("could not start the local OAuth callback server"));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

function respond(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(message);
}

/**
 * Resolve with the authorization code from the first valid callback.
 */
function waitForCode(
  server: Server,
  state: string,
  timeoutMs: number,
  timers: TimerService
): Promise<string> {
  return new Promise((resolve, reject) => {
    const timer = timers.setTimeout(
      () => reject(loginFailed("timed out waiting for OAuth callback")),
      timeoutMs
    );
    const finish = (fn: () => void) => {
      timers.clearTimeout(timer);
      fn();
    };

    server.on("request", (req: IncomingMessage, res: ServerResponse) => {
      const url = new URL(req.url ?? "/", `http://${LOOPBACK_HOST}`);
      if (url.pathname !== CALLBACK_PATH) {
        respond(res, 404, "Not found");
        return;
      }

      const error = url.searchParams.get("error");
      if (error) {
        respond(res, 400, `Authorization failed: ${error}. You can close this window.`);
        finish(() => reject(loginFailed(`authorization failed: ${error}`)));
        return;
      }
      if (url.searchParams.get("state") !== state) {
        respond(res, 400, "Invalid state parameter.");
        finish(() => reject(loginFailed("OAuth state mismatch")));
        return;
      }
      const code = url.searchParams.get("code");
      if (!code) {
        respond(res, 400, "Missing authorization code.");
        finish(() => reject(loginFailed("no authorization code in OAuth callback")));
        return;
      }

      respond(res, 200, "Authorization complete. You can close this window and return to the terminal.");
      finish(() => resolve(code));
    });
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run an installed-app OAuth flow: listen on a loopback port, send the
 * user to Google's consent page with PKCE, and exchange the returned code.
 */
export async function runLoopbackLogin(
  config: LoopbackLoginConfig,
  deps: LoopbackLoginDeps = {}
): Promise<Credentials> {
  const {
    createClient = defaultClient,
    browserService = systemBrowser,
    timers = realTimerService,
    logger = createNoopLogger(),
  } = deps;

  const server = createServer();
  try {
    const port = await listen(server);
    const redirectUri = `http://${LOOPBACK_HOST}:${port}${CALLBACK_PATH}`;
    logger.debug("oauth callback server listening", { redirectUri });

    const client = createClient({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri,
    });
    const { codeVerifier, codeChallenge } = await client.generateCodeVerifierAsync();
    const state = randomBytes(16).toString("hex");
    const url = client.generateAuthUrl({
      access_type: "offline",
      prompt: "consent",
      scope: config.scopes,
      state,
      code_challenge_method: CodeChallengeMethod.S256,
      code_challenge: codeChallenge,
    });

    // The deadline can pass while the browser is still opening.
    const outcome = waitForCode(server, state, config.timeoutMs, timers).then(
      (code) => ({ ok: true as const, code }),
      (error: unknown) => ({ ok: false as const, error })
    );
    logProgress(`Open this URL to authorize gplay:\n${chalk.cyan(url)}`);
    if (config.openBrowser) {
      try {
        await browserService.open(url);
      } catch (error) {
        logger.warn("could not open a browser", { error: errorMessage(error) });
      }
    }

    const spinner = createSpinner("Waiting for authorization").start();
    const result = await outcome;
    if (!result.ok) {
      spinner.fail("Authorization failed");
      throw result.error;
    }
    spinner.succeed("Authorization received");

    const { tokens } = await client.getToken({ code: result.code, codeVerifier, redirect_uri: redirectUri });
    if (!tokens.refresh_token && !tokens.access_token) {
      throw loginFailed("token exchange returned no tokens");
    }
    return tokens;
  } finally {
    await close(server);
  }
}
