import type { ApplicationDefinition, FunctionSettings } from "../types/app-schema";
import type { DeclaredResource, FunctionSpec } from "../types/resources";
import { stageFunctionName } from "../config/stages";
import { assertUnambiguousNames, remoteName } from "./naming";

/** What declaring resources needs from the resolved configuration. */
export interface DeclareContext {
  project: string;
  location: string;
  activeStage: string | undefined;
  stages: Readonly<Record<string, { functionName: string }>>;
  /** Config-file overrides merged over the definition's `function` section. */
  function: Readonly<Partial<FunctionSettings>>;
}

/** HTTPS trigger URL of a first-generation Cloud Function. */
export function functionUrl(project: string, location: string, name: string): string {
  return `https://${location}-${project}.cloudfunctions.net/${name}`;
}

export function storageBaseName(appName: string, triggerName: string, event: string): string {
  return `${appName}-storage-${triggerName}-${event.toLowerCase()}`;
}

export function prefixedBaseName(appName: string, name: string): string {
  return `${appName}-${name}`;
}

export function topicPath(project: string, topic: string): string {
  return topic.startsWith("projects/") ? topic : `projects/${project}/topics/${topic}`;
}

export function resolveFunctionSettings(
  base: FunctionSettings,
  overrides: Readonly<Partial<FunctionSettings>>
): FunctionSettings {
  return {
    runtime: overrides.runtime ?? base.runtime,
    entryPoint: overrides.entryPoint ?? base.entryPoint,
    memoryMb: overrides.memoryMb ?? base.memoryMb,
    timeoutSeconds: overrides.timeoutSeconds ?? base.timeoutSeconds,
    environmentVariables: { ...base.environmentVariables, ...(overrides.environmentVariables ?? {}) },
    labels: { ...base.labels, ...(overrides.labels ?? {}) },
    serviceAccount: overrides.serviceAccount ?? base.serviceAccount,
    source: overrides.source ?? base.source
  };
}

function toFunctionSpec(settings: FunctionSettings): FunctionSpec {
  return {
    runtime: settings.runtime,
    entryPoint: settings.entryPoint,
    memoryMb: settings.memoryMb,
    timeoutSeconds: settings.timeoutSeconds,
    environmentVariables: settings.environmentVariables,
    labels: settings.labels,
    serviceAccount: settings.serviceAccount
  };
}

/**
 * Expands the application definition into every resource it declares for
 * the active stage, with stage-suffixed remote names.
 *
 * Throws a NamingConflictError when a name could not be parsed back from
 * its remote form.
 */
export function declareResources(app: ApplicationDefinition, ctx: DeclareContext): DeclaredResource[] {
  const stage = ctx.activeStage;
  const name = (baseName: string) => ({ baseName, remoteName: remoteName(baseName, stage) });
  const out: DeclaredResource[] = [];

  if (app.function) {
    const settings = resolveFunctionSettings(app.function, ctx.function);
    const fnName = stageFunctionName(ctx, app.name);
    const url = functionUrl(ctx.project, ctx.location, fnName);

    out.push({ kind: "function", ...name(app.name), spec: toFunctionSpec(settings) });

    for (const trigger of app.storage) {
      out.push({
        kind: "storage",
        ...name(storageBaseName(app.name, trigger.name, trigger.event)),
        spec: {
          ...toFunctionSpec(settings),
          entryPoint: trigger.entryPoint ?? settings.entryPoint,
          bucket: trigger.bucket,
          event: trigger.event
        }
      });
    }

    if (app.routes.length) {
      out.push({
        kind: "route",
        ...name(app.name),
        spec: { title: app.name, routes: app.routes, backendAddress: url }
      });
    }

    for (const sub of app.topics) {
      out.push({
        kind: "topic",
        ...name(prefixedBaseName(app.name, sub.name)),
        spec: {
          topic: topicPath(ctx.project, sub.topic),
          pushEndpoint: url,
          ackDeadlineSeconds: sub.ackDeadlineSeconds,
          filter: sub.filter
        }
      });
    }

    for (const schedule of app.schedules) {
      const { name: scheduleName, ...rest } = schedule;
      out.push({
        kind: "schedule",
        ...name(prefixedBaseName(app.name, scheduleName)),
        spec: { ...rest, scheduleName, targetUri: url, serviceAccount: settings.serviceAccount }
      });
    }
  }

  for (const job of app.jobs) {
    const { name: jobName, ...spec } = job;
    out.push({ kind: "job", ...name(prefixedBaseName(app.name, jobName)), spec });
  }

  assertUnambiguousNames(out, Object.keys(ctx.stages), stage);
  return out;
}
