/**
 * Version check utilities for `gplay update`
 */

import Conf from "conf";
import nodeFetch from "node-fetch";
import { readFileSync } from "fs";
import type { FetchLike } from "./api-client.js";

// Cache TTL: 24 hours
const CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export const PACKAGE_NAME = "gplay-cli";

const NPM_REGISTRY_URL = `https://registry.npmjs.org/${PACKAGE_NAME}/latest`;

export type InstallMethod = "npm" | "homebrew" | "unknown";

export interface VersionCache {
  latestVersion?: string;
  checkedAt?: number;
}

export interface UpdateInfo {
  currentVersion: string;
  latestVersion: string;
  updateAvailable: boolean;
  installMethod: InstallMethod;
  updateCommand: string;
}

/**
 * Store for caching version check results
 */
export class VersionCheckStore {
  private readonly conf: Conf<VersionCache>;

  constructor(cwd?: string) {
    this.conf = new Conf<VersionCache>({
      projectName: PACKAGE_NAME,
      configName: "version-cache",
      cwd,
    });
  }

  getCache(): VersionCache {
    return {
      latestVersion: this.conf.get("latestVersion"),
      checkedAt: this.conf.get("checkedAt"),
    };
  }

  setCache(version: string, now: number = Date.now()): void {
    this.conf.set("latestVersion", version);
    this.conf.set("checkedAt", now);
  }

  isStale(now: number = Date.now()): boolean {
    const checkedAt = this.conf.get("checkedAt");
    if (!checkedAt) return true;
    return now - checkedAt > CACHE_TTL_MS;
  }
}

/**
 * Detect how the CLI was installed
 */
export function detectInstallMethod(execPath: string = process.execPath): InstallMethod {
  const path = execPath.toLowerCase();
  if (
    path.includes("/opt/homebrew/") ||
    path.includes("/usr/local/cellar/") ||
    path.includes("/home/linuxbrew/")
  ) {
    return "homebrew";
  }
  if (path.endsWith("/node") || path.endsWith("node.exe")) {
    return "npm";
  }
  return "unknown";
}

export function getUpdateCommand(method: InstallMethod): string {
  switch (method) {
    case "homebrew":
      return "brew upgrade gplay";
    default:
      return `npm install -g ${PACKAGE_NAME}@latest`;
  }
}

let cachedVersion: string | undefined;

/**
 * Version from the package manifest next to the sources (or dist).
 */
export function getCurrentVersion(): string {
  if (cachedVersion === undefined) {
    const manifest = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
    ) as { version?: string };
    cachedVersion = manifest.version ?? "0.0.0";
  }
  return cachedVersion;
}

/**
 * Fetch latest version from npm registry
 */
export async function fetchLatestVersion(fetchImpl: FetchLike = nodeFetch): Promise<string> {
  const response = await fetchImpl(NPM_REGISTRY_URL, {
    method: "GET",
    headers: { Accept: "application/json" },
    signal: AbortSignal.timeout(5000),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }

  const data = JSON.parse(await response.text()) as { version?: unknown };
  if (typeof data.version !== "string") {
    throw new Error("registry response has no version");
  }
  return data.version;
}

/**
 * Compare semantic versions
 * Returns true if latestVersion is newer than currentVersion
 */
export function isNewerVersion(currentVersion: string, latestVersion: string): boolean {
  const current = currentVersion.split(".").map(Number);
  const latest = latestVersion.split(".").map(Number);

  for (let i = 0; i < 3; i++) {
    const c = current[i] || 0;
    const l = latest[i] || 0;
    if (l > c) return true;
    if (l < c) return false;
  }
  return false;
}

export interface CheckOptions {
  store?: VersionCheckStore;
  fetchImpl?: FetchLike;
  currentVersion?: string;
  /** Ignore a fresh cache entry */
  force?: boolean;
}

/**
 * Compare the running version with the latest published one, using the
 * cached result while it is fresh.
 */
export async function checkForUpdate({
  store = new VersionCheckStore(),
  fetchImpl,
  currentVersion = getCurrentVersion(),
  force = false,
}: CheckOptions = {}): Promise<UpdateInfo> {
  const cached = store.getCache().latestVersion;
  let latestVersion: string;
  if (!force && cached && !store.isStale()) {
    latestVersion = cached;
  } else {
    latestVersion = await fetchLatestVersion(fetchImpl);
    store.setCache(latestVersion);
  }

  const installMethod = detectInstallMethod();
  return {
    currentVersion,
    latestVersion,
    updateAvailable: isNewerVersion(currentVersion, latestVersion),
    installMethod,
    updateCommand: getUpdateCommand(installMethod),
  };
}
