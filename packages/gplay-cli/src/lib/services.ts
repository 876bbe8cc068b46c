import type { ApiClient, FetchLike } from "./api-client.js";
import {
  createApiClient,
  PUBLISHER_BASE_URL,
  PUBLISHER_UPLOAD_BASE_URL,
  REPORTING_BASE_URL,
  STORAGE_BASE_URL,
} from "./api-client.js";
import type { LoadedConfig } from "./config.js";
import { loadConfig, resolveTimeouts } from "./config.js";
import {
  createTokenProvider,
  lazyTokenProvider,
  resolveCredentialSource,
  SCOPES,
} from "./credentials.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import type { DelayFn } from "./ports/timer.js";
import { realDelay } from "./adapters/real-timers.js";

/**
 * Everything a command needs from the outside world.
 */
export interface Services {
  /** Android Publisher v3 */
  publisher: ApiClient;
  /** Play Developer Reporting v1beta1 */
  reporting: ApiClient;
  /** Cloud Storage JSON API (financial and statistics reports) */
  storage: ApiClient;
  /** Active config, read on first use */
  config(): LoadedConfig;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  delay: DelayFn;
}

export interface ServicesOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fetchImpl?: FetchLike;
  userAgent?: string;
}

/**
 * Build the API clients. Config and credentials are resolved lazily so that
 * `--help`, `version` and local-only commands never touch them.
 */
export function createServices({
  env = process.env,
  logger = createNoopLogger(),
  fetchImpl,
  userAgent,
}: ServicesOptions = {}): Services {
  let loaded: LoadedConfig | undefined;
  const config = (): LoadedConfig => {
    loaded ??= loadConfig(env);
    return loaded;
  };

  const tokenProvider = (scopes: string[]) =>
    lazyTokenProvider(() => {
      const source = resolveCredentialSource(config().config, env);
      logger.debug("resolved credentials", { kind: source.kind, origin: source.origin });
      return createTokenProvider(source, scopes);
    });

  const client = (name: string, baseUrl: string, scopes: string[], uploadBaseUrl?: string) => {
    const clientLogger = logger.child({ client: name });
    let instance: ApiClient | undefined;
    const get = (): ApiClient => {
      if (!instance) {
        const timeouts = resolveTimeouts(config().config, env);
        instance = createApiClient({
          baseUrl,
          uploadBaseUrl,
          tokenProvider: tokenProvider(scopes),
          fetchImpl,
          timeoutMs: timeouts.requestMs,
          uploadTimeoutMs: timeouts.uploadMs,
          userAgent,
          logger: clientLogger,
        });
      }
      return instance;
    };
    const lazy: ApiClient = {
      get: (path, options) => get().get(path, options),
      post: (path, body, options) => get().post(path, body, options),
      put: (path, body, options) => get().put(path, body, options),
      patch: (path, body, options) => get().patch(path, body, options),
      delete: (path, options) => get().delete(path, options),
      upload: (path, file, options) => get().upload(path, file, options),
      download: (path, out, options) => get().download(path, out, options),
    };
    return lazy;
  };

  return {
    publisher: client(
      "publisher",
      PUBLISHER_BASE_URL,
      [SCOPES.androidpublisher],
      PUBLISHER_UPLOAD_BASE_URL
    ),
    reporting: client("reporting", REPORTING_BASE_URL, [SCOPES.androidpublisher, SCOPES.reporting]),
    storage: client("storage", STORAGE_BASE_URL, [SCOPES.storage]),
    config,
    env,
    logger,
    delay: realDelay,
  };
}
