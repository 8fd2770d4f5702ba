import type { Config } from "../config/resolve-config";
import { createHandlerRegistry, handlerFor, type HandlerRegistry } from "../handlers/registry";
import type { ResourceHandler } from "../handlers/handler";
import type { CloudApi } from "../lib/cloud-api";
import { errorMessage, ReconcileError, type DeleteFailure } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { ApplicationDefinition } from "../types/app-schema";
import {
  RESOURCE_KINDS,
  resourceLabel,
  teardownOrder,
  type DeclaredResource,
  type RemoteResource,
  type ResourceKind
} from "../types/resources";
import { declareResources } from "./declared";

export interface ReconcileDependencies {
  cloud: CloudApi;
  logger: Logger;
}

/** A discovered remote resource and the way to delete it. */
export interface OwnedResource {
  remote: RemoteResource;
  remove: () => Promise<void>;
}

export type DiscoveredResources = Record<ResourceKind, OwnedResource[]>;

export interface SyncResult {
  dryRun: boolean;
  /** Labels (`kind:remoteName`) of the orphans, in deletion order. */
  orphans: string[];
  deleted: string[];
}

function declaredKey(kind: ResourceKind, baseName: string): string {
  return `${kind}:${baseName}`;
}

async function collect<K extends ResourceKind>(
  handler: ResourceHandler<K>,
  stage: string | undefined
): Promise<OwnedResource[]> {
  const out: OwnedResource[] = [];
  for await (const remote of handler.listRemote(stage)) {
    out.push({ remote, remove: () => handler.delete(remote) });
  }
  return out;
}

/**
 * Lists every resource the application owns in `stage`, all kinds at once.
 */
export async function discoverOwned(registry: HandlerRegistry, stage: string | undefined): Promise<DiscoveredResources> {
  const lists = await Promise.all(RESOURCE_KINDS.map((kind) => collect(handlerFor(registry, kind), stage)));

  const out: DiscoveredResources = { function: [], storage: [], route: [], topic: [], schedule: [], job: [] };
  RESOURCE_KINDS.forEach((kind, i) => {
    out[kind] = lists[i] ?? [];
  });
  return out;
}

/**
 * Remote resources that no declared resource accounts for, in teardown
 * order. Identity is `(kind, baseName)`.
 */
export function computeOrphans(
  discovered: DiscoveredResources,
  declared: readonly Pick<DeclaredResource, "kind" | "baseName">[]
): OwnedResource[] {
  const wanted = new Set(declared.map((d) => declaredKey(d.kind, d.baseName)));
  return teardownOrder().flatMap((kind) =>
    discovered[kind].filter((owned) => !wanted.has(declaredKey(kind, owned.remote.baseName)))
  );
}

/**
 * Deletes every resource of the active stage that follows this application's
 * naming convention but is no longer declared. Failures do not stop the
 * remaining deletions; they are reported together afterwards.
 */
export async function syncStage(
  config: Config,
  app: ApplicationDefinition,
  options: { dryRun?: boolean },
  deps: ReconcileDependencies
): Promise<SyncResult> {
  const logger = deps.logger.child({ command: "sync", stage: config.activeStage ?? "(none)" });
  const dryRun = options.dryRun ?? false;

  const declared = declareResources(app, config);
  const registry = createHandlerRegistry({
    cloud: deps.cloud,
    project: config.project,
    location: config.location,
    appName: app.name,
    knownStages: Object.keys(config.stages),
    declared,
    logger
  });

  const discovered = await discoverOwned(registry, config.activeStage);
  const orphans = computeOrphans(discovered, declared);
  const orphanLabels = orphans.map((o) => resourceLabel(o.remote.kind, o.remote.name));

  if (dryRun) {
    for (const label of orphanLabels) {
      logger.info("Would delete orphan", { resource: label });
    }
    return { dryRun, orphans: orphanLabels, deleted: [] };
  }

  const deleted: string[] = [];
  const failures: DeleteFailure[] = [];
  for (const orphan of orphans) {
    const label = resourceLabel(orphan.remote.kind, orphan.remote.name);
    try {
      await orphan.remove();
      deleted.push(label);
      logger.info("Deleted orphan", { resource: label });
    } catch (err: unknown) {
      failures.push({ kind: orphan.remote.kind, remoteName: orphan.remote.name, error: errorMessage(err) });
      logger.error("Failed to delete orphan", { resource: label, error: errorMessage(err) });
    }
  }

  if (failures.length) {
    throw new ReconcileError("sync", failures);
  }
  if (!orphans.length) {
    logger.info("Nothing to sync");
  }
  return { dryRun, orphans: orphanLabels, deleted };
}
