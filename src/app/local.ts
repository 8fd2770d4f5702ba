import path from "node:path";
import type { LocalConfig } from "../config/resolve-config";
import { resolveFunctionSettings } from "../deploy/declared";
import { ConfigError, LocalEnvironmentError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { ProcessLauncher } from "../lib/process-launcher";
import type { ApplicationDefinition } from "../types/app-schema";

export const FUNCTIONS_FRAMEWORK = "functions-framework";
export const DEFAULT_LOCAL_PORT = 8080;

export interface LocalOptions {
  /** Exported function to serve; defaults to the configured entry point. */
  target?: string;
  port?: number;
}

/**
 * Serves the function on this machine with the Functions Framework until
 * the process is stopped.
 */
export async function serveLocally(
  config: LocalConfig,
  app: ApplicationDefinition,
  options: LocalOptions,
  deps: { launcher: ProcessLauncher; logger: Logger }
): Promise<void> {
  if (!app.function) {
    throw new ConfigError(`"${app.name}" declares no function to serve.`);
  }

  const settings = resolveFunctionSettings(app.function, config.function);
  const target = options.target ?? settings.entryPoint;
  const port = options.port ?? DEFAULT_LOCAL_PORT;
  const source = path.resolve(config.rootDir, settings.source);

  deps.logger.info("Starting local function", { target, port, source });
  const result = await deps.launcher.run({
    command: FUNCTIONS_FRAMEWORK,
    args: [`--target=${target}`, `--source=${source}`, `--port=${port}`],
    cwd: config.rootDir,
    env: { ...settings.environmentVariables, ...(config.activeStage ? { STAGE: config.activeStage } : {}) },
    stdio: "inherit"
  });
  if (result.exitCode !== 0) {
    throw new LocalEnvironmentError(`${FUNCTIONS_FRAMEWORK} exited with code ${result.exitCode}.`);
  }
}
