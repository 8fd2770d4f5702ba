import path from "node:path";
import { CONFIG_DIR } from "../config/config-file";
import type { LocalConfig } from "../config/resolve-config";
import { stageFunctionName } from "../config/stages";
import { resolveFunctionSettings } from "../deploy/declared";
import { ConfigError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { ArtifactPackager, PackagedArtifact } from "../lib/packager";
import type { ApplicationDefinition } from "../types/app-schema";

/** Writes the deployable archive to `.stageform/{functionName}.zip` without uploading it. */
export async function packageSource(
  config: LocalConfig,
  app: ApplicationDefinition,
  deps: { packager: ArtifactPackager; logger: Logger }
): Promise<PackagedArtifact> {
  if (!app.function) {
    throw new ConfigError(`"${app.name}" declares no function; there is nothing to package.`);
  }

  const settings = resolveFunctionSettings(app.function, config.function);
  const packaged = await deps.packager.package({
    sourceDir: path.resolve(config.rootDir, settings.source),
    outFile: path.join(config.rootDir, CONFIG_DIR, `${stageFunctionName(config, app.name)}.zip`)
  });
  deps.logger.info("Packaged source", { path: packaged.path, sha256: packaged.sha256 });
  return packaged;
}
