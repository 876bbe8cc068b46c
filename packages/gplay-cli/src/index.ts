#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { initContext, updateContext } from "./lib/cli-context.js";
import { isDebugEnabled, loadConfig } from "./lib/config.js";
import { createServices } from "./lib/services.js";
import { createCliLogger } from "./lib/logger.js";
import { getCurrentVersion, PACKAGE_NAME } from "./lib/version-check.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { isCLIError } from "./lib/errors/types.js";

/**
 * `debug: true` in the config file. An unreadable config is left for the
 * command that reads it to report.
 */
function debugFromConfig(env: NodeJS.ProcessEnv): boolean {
  try {
    return isDebugEnabled(loadConfig(env).config, env);
  } catch (error) {
    if (isCLIError(error)) return false;
    throw error;
  }
}

export async function main(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const context = initContext(argv, env);
  const debug = context.debug || debugFromConfig(env);
  updateContext({ debug });

  const version = getCurrentVersion();
  const services = createServices({
    env,
    logger: createCliLogger(debug, env),
    userAgent: `${PACKAGE_NAME}/${version} node/${process.versions.node}`,
  });
  const program = buildProgram(services, version);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
