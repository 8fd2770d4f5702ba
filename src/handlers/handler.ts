import { isAlreadyExistsError, isNotFoundError } from "../lib/api-errors";
import type { CloudApi, Page } from "../lib/cloud-api";
import { ConflictError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { parseRemoteName, shortName, splitStageSuffix } from "../deploy/naming";
import type {
  DeclaredOf,
  DeclaredResource,
  RemoteResource,
  RemoteStateMap,
  ResourceKind,
  StagedArtifact
} from "../types/resources";

/** Per-run inputs a handler needs beyond the declared resource. */
export interface HandlerContext {
  /** Source archive for function-backed kinds; undefined when nothing is packaged. */
  artifact: StagedArtifact | undefined;
}

export interface CreateContext extends HandlerContext {
  /** On an already-existing resource, update it instead of failing. */
  force: boolean;
}

/** Shared by every handler of one invocation. */
export interface HandlerEnvironment {
  cloud: CloudApi;
  project: string;
  location: string;
  appName: string;
  knownStages: readonly string[];
  declared: readonly DeclaredResource[];
  logger: Logger;
}

/**
 * Lifecycle operations for one resource kind.
 *
 * `listRemote` only yields resources this application owns for the requested
 * stage; everything else under the provider is skipped.
 */
export interface ResourceHandler<K extends ResourceKind> {
  readonly kind: K;
  desiredSpec(): DeclaredOf<K>[];
  listRemote(stage: string | undefined): AsyncIterable<RemoteResource<K>>;
  find(declared: DeclaredOf<K>): Promise<RemoteResource<K> | undefined>;
  desiredState(declared: DeclaredOf<K>, ctx: HandlerContext): RemoteStateMap[K];
  /** Immutable-field mismatches that an update cannot fix. */
  conflicts(remote: RemoteResource<K>, declared: DeclaredOf<K>): string[];
  create(declared: DeclaredOf<K>, ctx: CreateContext): Promise<void>;
  update(remote: RemoteResource<K>, declared: DeclaredOf<K>, ctx: HandlerContext): Promise<void>;
  /** Not-found counts as deleted. */
  delete(remote: RemoteResource<K>): Promise<void>;
}

export abstract class BaseHandler<K extends ResourceKind> implements ResourceHandler<K> {
  abstract readonly kind: K;
  protected readonly cloud: CloudApi;
  protected readonly logger: Logger;

  constructor(protected readonly env: HandlerEnvironment) {
    this.cloud = env.cloud;
    this.logger = env.logger;
  }

  /** One page of provider objects; ownership is filtered afterwards. */
  protected abstract listPage(pageToken?: string): Promise<Page<RemoteStateMap[K]>>;
  protected abstract fetch(declared: DeclaredOf<K>): Promise<RemoteStateMap[K] | undefined>;
  /** Full provider resource path of a listed object. */
  protected abstract idOf(state: RemoteStateMap[K]): string | undefined;
  protected abstract owns(baseName: string): boolean;
  protected abstract insert(declared: DeclaredOf<K>, ctx: HandlerContext): Promise<void>;
  protected abstract remove(remote: RemoteResource<K>): Promise<void>;

  abstract desiredState(declared: DeclaredOf<K>, ctx: HandlerContext): RemoteStateMap[K];
  abstract update(remote: RemoteResource<K>, declared: DeclaredOf<K>, ctx: HandlerContext): Promise<void>;

  desiredSpec(): DeclaredOf<K>[] {
    return this.env.declared.filter((d): d is DeclaredOf<K> => d.kind === this.kind);
  }

  conflicts(_remote: RemoteResource<K>, _declared: DeclaredOf<K>): string[] {
    return [];
  }

  async *listRemote(stage: string | undefined): AsyncIterable<RemoteResource<K>> {
    let pageToken: string | undefined;
    do {
      const page = await this.listPage(pageToken);
      for (const state of page.items) {
        const remote = this.toRemote(state);
        if (!remote) continue;
        if (remote.stage !== stage) {
          this.logger.debug("Skipping resource of another stage", {
            kind: this.kind,
            name: remote.name,
            stage: remote.stage ?? "(none)"
          });
          continue;
        }
        if (stage === undefined && this.belongsToUnknownStage(remote)) {
          this.logger.warn("Skipping resource that looks like it belongs to an unconfigured stage", {
            kind: this.kind,
            name: remote.name
          });
          continue;
        }
        yield remote;
      }
      pageToken = page.nextPageToken;
    } while (pageToken);
  }

  async find(declared: DeclaredOf<K>): Promise<RemoteResource<K> | undefined> {
    const state = await this.fetch(declared);
    return state ? this.toRemote(state) : undefined;
  }

  async create(declared: DeclaredOf<K>, ctx: CreateContext): Promise<void> {
    try {
      await this.insert(declared, ctx);
    } catch (err: unknown) {
      if (!isAlreadyExistsError(err)) {
        throw err;
      }
      const remote = await this.find(declared);
      if (!ctx.force || !remote) {
        throw new ConflictError([{ kind: this.kind, remoteName: declared.remoteName, reason: "already exists" }]);
      }
      this.logger.warn("Resource already exists; updating it (--force)", {
        kind: this.kind,
        name: declared.remoteName
      });
      await this.update(remote, declared, ctx);
    }
  }

  async delete(remote: RemoteResource<K>): Promise<void> {
    try {
      await this.remove(remote);
    } catch (err: unknown) {
      if (!isNotFoundError(err)) {
        throw err;
      }
      this.logger.debug("Resource already gone", { kind: this.kind, name: remote.name });
    }
  }

  /**
   * An unstaged name of the form `{owned base}-{stage}` may be a stage that was
   * dropped from the config file. It is only claimed when declared as is.
   */
  private belongsToUnknownStage(remote: RemoteResource<K>): boolean {
    const split = splitStageSuffix(remote.name);
    if (!split || !this.owns(split.baseName)) return false;
    return !this.desiredSpec().some((d) => d.baseName === remote.baseName);
  }

  protected toRemote(state: RemoteStateMap[K]): RemoteResource<K> | undefined {
    const id = this.idOf(state);
    if (!id) return undefined;

    const name = shortName(id);
    const parsed = parseRemoteName(name, this.env.knownStages);
    if (!this.owns(parsed.baseName)) {
      this.logger.debug("Skipping resource not owned by this app", { kind: this.kind, name });
      return undefined;
    }
    return { kind: this.kind, id, name, baseName: parsed.baseName, stage: parsed.stage, state };
  }
}

/** Runs `fn`, treating a provider not-found as done. */
export async function ignoreNotFound(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    if (!isNotFoundError(err)) {
      throw err;
    }
  }
}
