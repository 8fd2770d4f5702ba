import { LocalEnvironmentError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { ProcessLauncher } from "../lib/process-launcher";

/**
 * Where the project comes from when neither a flag, the environment nor the
 * config file names one.
 */
export interface DefaultProjectSource {
  defaultProject(): Promise<string | undefined>;
}

/**
 * Reads the active gcloud configuration's project
 * (`gcloud config get-value project`).
 */
export class GcloudDefaultProject implements DefaultProjectSource {
  constructor(
    private readonly launcher: ProcessLauncher,
    private readonly logger?: Logger
  ) {}

  async defaultProject(): Promise<string | undefined> {
    try {
      const result = await this.launcher.run({
        command: "gcloud",
        args: ["config", "get-value", "project"]
      });
      const project = result.stdout.trim();
      if (result.exitCode !== 0 || !project || project === "(unset)") {
        return undefined;
      }
      return project;
    } catch (err: unknown) {
      if (err instanceof LocalEnvironmentError) {
        this.logger?.debug("gcloud not installed; no default project", { error: err.message });
        return undefined;
      }
      throw err;
    }
  }
}
