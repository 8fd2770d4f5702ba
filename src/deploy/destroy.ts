import type { Config } from "../config/resolve-config";
import { createHandlerRegistry } from "../handlers/registry";
import { errorMessage, ReconcileError, type DeleteFailure } from "../lib/errors";
import type { ApplicationDefinition } from "../types/app-schema";
import { resourceLabel, teardownOrder } from "../types/resources";
import { ArtifactStore } from "./artifacts";
import { declareResources } from "./declared";
import { discoverOwned, type ReconcileDependencies } from "./sync";

export interface DestroyOptions {
  /** Also delete the stored source archives of the stage. */
  all?: boolean;
  dryRun?: boolean;
}

export interface DestroyResult {
  dryRun: boolean;
  /** Labels (`kind:remoteName`) in teardown order. */
  deleted: string[];
  /** Archive object names removed (or that would be removed) by `all`. */
  purgedArtifacts: string[];
}

/**
 * Tears down everything the application owns in the active stage, in
 * reverse dependency order. A kind with failed deletions stops the teardown
 * before later kinds are touched; archives are only purged after a clean
 * teardown.
 */
export async function destroyStage(
  config: Config,
  app: ApplicationDefinition,
  options: DestroyOptions,
  deps: ReconcileDependencies
): Promise<DestroyResult> {
  const logger = deps.logger.child({ command: "destroy", stage: config.activeStage ?? "(none)" });
  const dryRun = options.dryRun ?? false;

  const registry = createHandlerRegistry({
    cloud: deps.cloud,
    project: config.project,
    location: config.location,
    appName: app.name,
    knownStages: Object.keys(config.stages),
    declared: declareResources(app, config),
    logger
  });
  const store = new ArtifactStore(deps.cloud, config, logger);

  const discovered = await discoverOwned(registry, config.activeStage);
  const deleted: string[] = [];

  for (const kind of teardownOrder()) {
    const failures: DeleteFailure[] = [];
    for (const owned of discovered[kind]) {
      const label = resourceLabel(kind, owned.remote.name);
      if (dryRun) {
        logger.info("Would delete", { resource: label });
        deleted.push(label);
        continue;
      }
      try {
        await owned.remove();
        deleted.push(label);
        logger.info("Deleted", { resource: label });
      } catch (err: unknown) {
        failures.push({ kind, remoteName: owned.remote.name, error: errorMessage(err) });
        logger.error("Failed to delete", { resource: label, error: errorMessage(err) });
      }
    }
    if (failures.length) {
      throw new ReconcileError("destroy", failures);
    }
  }

  let purgedArtifacts: string[] = [];
  if (options.all) {
    purgedArtifacts = dryRun
      ? await store.list(app.name, config.activeStage)
      : await store.purge(app.name, config.activeStage);
    logger.info(dryRun ? "Would purge source archives" : "Purged source archives", {
      count: purgedArtifacts.length
    });
  }

  if (!deleted.length && !purgedArtifacts.length) {
    logger.info("Nothing to destroy");
  }
  return { dryRun, deleted, purgedArtifacts };
}
