import type { cloudfunctions_v1 } from "googleapis";
import { locationPath, type Page } from "../lib/cloud-api";
import { sourceArchiveUrl } from "../deploy/artifacts";
import { shortDigest } from "../deploy/hash";
import type { DeclaredOf, FunctionSpec, RemoteResource } from "../types/resources";
import { BaseHandler, type HandlerContext } from "./handler";

export const SOURCE_LABEL = "stageform-source";

type CloudFunction = cloudfunctions_v1.Schema$CloudFunction;

/**
 * Request body shared by HTTP and storage-triggered functions. The trigger
 * is added by the caller.
 */
export function cloudFunctionBody(
  project: string,
  location: string,
  remoteName: string,
  spec: Readonly<FunctionSpec>,
  ctx: HandlerContext
): CloudFunction {
  const labels: Record<string, string> = { ...spec.labels };
  if (ctx.artifact) {
    labels[SOURCE_LABEL] = shortDigest(ctx.artifact.sha256);
  }

  return {
    name: `${locationPath(project, location)}/functions/${remoteName}`,
    runtime: spec.runtime,
    entryPoint: spec.entryPoint,
    availableMemoryMb: spec.memoryMb,
    timeout: `${spec.timeoutSeconds}s`,
    environmentVariables: { ...spec.environmentVariables },
    labels,
    serviceAccountEmail: spec.serviceAccount,
    sourceArchiveUrl: ctx.artifact ? sourceArchiveUrl(ctx.artifact) : undefined
  };
}

/** Cloud Functions share one list; subclasses pick their own names out of it. */
export abstract class CloudFunctionHandler<K extends "function" | "storage"> extends BaseHandler<K> {
  protected listPage(pageToken?: string): Promise<Page<CloudFunction>> {
    return this.cloud.listFunctions(locationPath(this.env.project, this.env.location), pageToken);
  }

  protected fetch(declared: DeclaredOf<"function" | "storage">): Promise<CloudFunction | undefined> {
    return this.cloud.getFunction(this.functionPath(declared.remoteName));
  }

  protected idOf(state: CloudFunction): string | undefined {
    return state.name ?? undefined;
  }

  protected async insert(declared: DeclaredOf<K>, ctx: HandlerContext): Promise<void> {
    await this.cloud.createFunction(
      locationPath(this.env.project, this.env.location),
      this.desiredState(declared, ctx)
    );
  }

  async update(remote: RemoteResource<K>, declared: DeclaredOf<K>, ctx: HandlerContext): Promise<void> {
    await this.cloud.updateFunction(remote.id, this.desiredState(declared, ctx));
  }

  protected async remove(remote: RemoteResource<K>): Promise<void> {
    await this.cloud.deleteFunction(remote.id);
  }

  protected functionPath(name: string): string {
    return `${locationPath(this.env.project, this.env.location)}/functions/${name}`;
  }
}

/** The application's HTTP function, `{app}[-{stage}]`. */
export class FunctionHandler extends CloudFunctionHandler<"function"> {
  readonly kind = "function" as const;

  protected owns(baseName: string): boolean {
    return baseName === this.env.appName;
  }

  desiredState(declared: DeclaredOf<"function">, ctx: HandlerContext): CloudFunction {
    return {
      ...cloudFunctionBody(this.env.project, this.env.location, declared.remoteName, declared.spec, ctx),
      httpsTrigger: {}
    };
  }

  conflicts(remote: RemoteResource<"function">): string[] {
    return remote.state.eventTrigger
      ? ["deployed with an event trigger; the trigger type of a function cannot change"]
      : [];
  }
}
