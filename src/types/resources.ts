import type { apigateway_v1, cloudfunctions_v1, cloudscheduler_v1, pubsub_v1, run_v2 } from "googleapis";
import type { JobDefinition, RouteDefinition, ScheduleDefinition, StorageEvent } from "./app-schema";

export const RESOURCE_KINDS = ["function", "storage", "route", "topic", "schedule", "job"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * Plan steps: the resource kinds plus staging of the source archive, which
 * every function-backed kind depends on.
 */
export type PlanKind = "artifact" | ResourceKind;

/**
 * Static dependency order for deploy. Lower ranks are applied first; destroy
 * and sync tear down in the reverse order. Adding a kind without ranking it is
 * a compile error.
 */
export const DEPLOY_ORDER = {
  artifact: 0,
  function: 1,
  storage: 2,
  route: 3,
  topic: 4,
  schedule: 5,
  job: 6
} as const satisfies Record<PlanKind, number>;

export function compareDeployOrder(a: PlanKind, b: PlanKind): number {
  return DEPLOY_ORDER[a] - DEPLOY_ORDER[b];
}

export function deployOrder(): ResourceKind[] {
  return [...RESOURCE_KINDS].sort(compareDeployOrder);
}

export function teardownOrder(): ResourceKind[] {
  return deployOrder().reverse();
}

/** Source archive staged in the artifact bucket. */
export interface StagedArtifact {
  bucket: string;
  objectName: string;
  sha256: string;
}

export interface FunctionSpec {
  runtime: string;
  entryPoint: string;
  memoryMb: number;
  timeoutSeconds: number;
  environmentVariables: Record<string, string>;
  labels: Record<string, string>;
  serviceAccount: string | undefined;
}

export interface StorageTriggerSpec extends FunctionSpec {
  bucket: string;
  event: StorageEvent;
}

export interface RouteSpec {
  title: string;
  routes: RouteDefinition[];
  backendAddress: string;
}

export interface TopicSpec {
  topic: string;
  pushEndpoint: string;
  ackDeadlineSeconds: number;
  filter: string | undefined;
}

export interface ScheduleSpec extends Omit<ScheduleDefinition, "name"> {
  targetUri: string;
  scheduleName: string;
  serviceAccount: string | undefined;
}

export type JobSpec = Omit<JobDefinition, "name">;

interface Declared<K extends ResourceKind, S> {
  readonly kind: K;
  /** Name before stage suffixing. */
  readonly baseName: string;
  /** Name after stage suffixing; the last segment of the provider resource path. */
  readonly remoteName: string;
  readonly spec: Readonly<S>;
}

export type DeclaredResource =
  | Declared<"function", FunctionSpec>
  | Declared<"storage", StorageTriggerSpec>
  | Declared<"route", RouteSpec>
  | Declared<"topic", TopicSpec>
  | Declared<"schedule", ScheduleSpec>
  | Declared<"job", JobSpec>;

export type DeclaredOf<K extends ResourceKind> = Extract<DeclaredResource, { kind: K }>;

/** Raw provider object behind each kind. */
export interface RemoteStateMap {
  function: cloudfunctions_v1.Schema$CloudFunction;
  storage: cloudfunctions_v1.Schema$CloudFunction;
  route: apigateway_v1.Schema$ApigatewayGateway;
  topic: pubsub_v1.Schema$Subscription;
  schedule: cloudscheduler_v1.Schema$Job;
  job: run_v2.Schema$GoogleCloudRunV2Job;
}

export interface RemoteResource<K extends ResourceKind = ResourceKind> {
  kind: K;
  /** Full provider resource path. */
  id: string;
  /** Short remote name (last path segment). */
  name: string;
  baseName: string;
  stage: string | undefined;
  state: RemoteStateMap[K];
}

export function resourceLabel(kind: PlanKind, name: string): string {
  return `${kind}:${name}`;
}
