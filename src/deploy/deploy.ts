import path from "node:path";
import type { Config } from "../config/resolve-config";
import { CONFIG_DIR } from "../config/config-file";
import { stageFunctionName } from "../config/stages";
import { createHandlerRegistry, withHandler, type BoundResource } from "../handlers/registry";
import type { CreateContext } from "../handlers/handler";
import type { CloudApi } from "../lib/cloud-api";
import { ConfigError, ConflictError, PartialDeploymentError, type ResourceConflict } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { ArtifactPackager } from "../lib/packager";
import type { ApplicationDefinition } from "../types/app-schema";
import {
  compareDeployOrder,
  RESOURCE_KINDS,
  resourceLabel,
  type DeclaredResource,
  type PlanKind,
  type ResourceKind,
  type StagedArtifact
} from "../types/resources";
import { ArtifactStore, sourceArchiveUrl } from "./artifacts";
import { declareResources, resolveFunctionSettings } from "./declared";
import { isUpToDate } from "./diff";

export type DeployPhase = "INIT" | "VALIDATE" | "APPLY" | "DONE" | "FAILED";

export type PlanOperation = "create" | "update" | "delete";

export interface PlanEntry {
  kind: PlanKind;
  operation: PlanOperation;
  remoteName: string;
  /** Why a resource is recreated (force) or cannot be updated. */
  reasons?: string[];
}

export interface DeployScope {
  skip?: readonly ResourceKind[];
  only?: readonly ResourceKind[];
  skipFunction?: boolean;
  onlyFunction?: boolean;
}

export interface DeployOptions extends DeployScope {
  force?: boolean;
  dryRun?: boolean;
}

export interface DeployDependencies {
  cloud: CloudApi;
  packager: ArtifactPackager;
  logger: Logger;
}

export interface DeployResult {
  phase: "DONE";
  dryRun: boolean;
  /** Mutating steps, in the order they were (or would be) applied. */
  plan: PlanEntry[];
  /** Labels (`kind:remoteName`) of the steps that were applied. */
  applied: string[];
  /** Labels of declared resources already matching their remote state. */
  unchanged: string[];
}

interface PlannedStep {
  entry: PlanEntry;
  run: () => Promise<void>;
}

type ResourcePlan =
  | { status: "unchanged"; label: string }
  | { status: "changed"; steps: PlannedStep[]; conflict: ResourceConflict | undefined };

export function entryLabel(entry: PlanEntry): string {
  return resourceLabel(entry.kind, entry.remoteName);
}

/**
 * Kinds a deploy touches. `--skip-function`/`--only-function` are shorthands
 * for `--skip function`/`--only function`.
 */
export function resolveScope(scope: DeployScope): Set<ResourceKind> {
  if (scope.skipFunction && scope.onlyFunction) {
    throw new ConfigError("--skip-function and --only-function cannot be used together.");
  }

  const skip = new Set<ResourceKind>(scope.skip ?? []);
  const only = new Set<ResourceKind>(scope.only ?? []);
  if (scope.skipFunction) skip.add("function");
  if (scope.onlyFunction) only.add("function");

  for (const kind of skip) {
    if (only.has(kind)) {
      throw new ConfigError(`"${kind}" cannot be both skipped and selected.`);
    }
  }

  return new Set(RESOURCE_KINDS.filter((k) => !skip.has(k) && (only.size === 0 || only.has(k))));
}

async function planResource<K extends ResourceKind>(
  { declared, handler }: BoundResource<K>,
  ctx: CreateContext
): Promise<ResourcePlan> {
  const kind = declared.kind;
  const name = declared.remoteName;
  const create: PlannedStep = {
    entry: { kind, operation: "create", remoteName: name },
    run: () => handler.create(declared, ctx)
  };

  const remote = await handler.find(declared);
  if (!remote) {
    return { status: "changed", steps: [create], conflict: undefined };
  }

  const reasons = handler.conflicts(remote, declared);
  if (reasons.length) {
    const conflict: ResourceConflict = { kind, remoteName: name, reason: reasons.join("; ") };
    if (!ctx.force) {
      const update: PlannedStep = {
        entry: { kind, operation: "update", remoteName: name, reasons },
        run: () => handler.update(remote, declared, ctx)
      };
      return { status: "changed", steps: [update], conflict };
    }
    const recreate: PlannedStep = {
      entry: { kind, operation: "delete", remoteName: name, reasons },
      run: () => handler.delete(remote)
    };
    return { status: "changed", steps: [recreate, create], conflict: undefined };
  }

  if (isUpToDate(remote.state, handler.desiredState(declared, ctx))) {
    return { status: "unchanged", label: resourceLabel(kind, name) };
  }
  return {
    status: "changed",
    steps: [
      {
        entry: { kind, operation: "update", remoteName: name },
        run: () => handler.update(remote, declared, ctx)
      }
    ],
    conflict: undefined
  };
}

function usesArchive(d: DeclaredResource): boolean {
  return d.kind === "function" || d.kind === "storage";
}

/**
 * Deploys the application to the active stage.
 *
 * INIT packages the source and compares every declared resource with its
 * remote counterpart; VALIDATE aborts on conflicts before anything is
 * changed (unless `force`); APPLY runs the plan in dependency order and stops
 * at the first failure, leaving earlier steps in place.
 */
export async function deploy(
  config: Config,
  app: ApplicationDefinition,
  options: DeployOptions,
  deps: DeployDependencies
): Promise<DeployResult> {
  const logger = deps.logger.child({ command: "deploy", stage: config.activeStage ?? "(none)" });
  const force = options.force ?? false;
  const dryRun = options.dryRun ?? false;

  // INIT
  logger.info("Deploy phase", { phase: "INIT" satisfies DeployPhase });
  const scope = resolveScope(options);
  const allDeclared = declareResources(app, config);
  const declared = allDeclared
    .filter((d) => scope.has(d.kind))
    .sort((a, b) => compareDeployOrder(a.kind, b.kind));

  const store = new ArtifactStore(deps.cloud, config, logger);
  let artifact: StagedArtifact | undefined;
  let archive: Buffer | undefined;
  if (app.function && declared.some(usesArchive)) {
    const settings = resolveFunctionSettings(app.function, config.function);
    const packaged = await deps.packager.package({
      sourceDir: path.resolve(config.rootDir, settings.source),
      outFile: path.join(config.rootDir, CONFIG_DIR, `${stageFunctionName(config, app.name)}.zip`)
    });
    archive = packaged.archive;
    artifact = store.locate(app.name, config.activeStage, packaged.sha256);
    logger.debug("Packaged source", { path: packaged.path, sha256: packaged.sha256 });
  }

  const registry = createHandlerRegistry({
    cloud: deps.cloud,
    project: config.project,
    location: config.location,
    appName: app.name,
    knownStages: Object.keys(config.stages),
    declared: allDeclared,
    logger
  });
  const ctx: CreateContext = { artifact, force };

  const steps: PlannedStep[] = [];
  const unchanged: string[] = [];
  const conflicts: ResourceConflict[] = [];
  for (const d of declared) {
    const planned = await withHandler(registry, d, (bound) => planResource(bound, ctx));
    if (planned.status === "unchanged") {
      unchanged.push(planned.label);
      continue;
    }
    steps.push(...planned.steps);
    if (planned.conflict) conflicts.push(planned.conflict);
  }

  if (artifact && archive && steps.some((s) => s.entry.kind === "function" || s.entry.kind === "storage")) {
    const staged = artifact;
    const data = archive;
    steps.unshift({
      entry: { kind: "artifact", operation: "create", remoteName: staged.objectName },
      run: () => store.upload(staged, data)
    });
  }

  // VALIDATE
  logger.info("Deploy phase", { phase: "VALIDATE" satisfies DeployPhase, steps: steps.length });
  if (conflicts.length) {
    logger.error("Deploy phase", { phase: "FAILED" satisfies DeployPhase, conflicts: conflicts.length });
    throw new ConflictError(conflicts);
  }

  const plan = steps.map((s) => s.entry);
  for (const entry of plan) {
    logger.info(`${dryRun ? "Would " : ""}${entry.operation} ${entry.kind}`, {
      name: entry.remoteName,
      ...(entry.reasons ? { reasons: entry.reasons } : {})
    });
  }
  if (dryRun) {
    logger.info("Dry run; nothing applied", { planned: plan.length, unchanged: unchanged.length });
    return { phase: "DONE", dryRun, plan, applied: [], unchanged };
  }

  // APPLY
  logger.info("Deploy phase", { phase: "APPLY" satisfies DeployPhase });
  const applied: string[] = [];
  for (const step of steps) {
    const label = entryLabel(step.entry);
    try {
      await step.run();
    } catch (err: unknown) {
      logger.error("Deploy phase", { phase: "FAILED" satisfies DeployPhase, failed: label });
      throw new PartialDeploymentError(applied, label, err);
    }
    applied.push(label);
  }

  if (artifact) {
    logger.info("Function source", { url: sourceArchiveUrl(artifact) });
  }
  logger.info("Deploy phase", { phase: "DONE" satisfies DeployPhase, applied: applied.length });
  return { phase: "DONE", dryRun, plan, applied, unchanged };
}
