import type {
  apigateway_v1,
  cloudfunctions_v1,
  cloudscheduler_v1,
  pubsub_v1,
  run_v2,
  storage_v1
} from "googleapis";

export interface Page<T> {
  items: T[];
  nextPageToken?: string | undefined;
}

/**
 * The provider operations the handlers need.
 *
 * `get*` resolve to `undefined` when the resource does not exist; every other
 * call rejects with a {@link RemoteApiError} carrying the HTTP status, so
 * callers can treat 404 on delete as success and 409 on create as a conflict.
 * Mutations resolve once the provider reports the change as done.
 */
export interface CloudApi {
  // Cloud Functions (v1)
  listFunctions(parent: string, pageToken?: string): Promise<Page<cloudfunctions_v1.Schema$CloudFunction>>;
  getFunction(name: string): Promise<cloudfunctions_v1.Schema$CloudFunction | undefined>;
  createFunction(parent: string, fn: cloudfunctions_v1.Schema$CloudFunction): Promise<void>;
  updateFunction(name: string, fn: cloudfunctions_v1.Schema$CloudFunction): Promise<void>;
  deleteFunction(name: string): Promise<void>;

  // API Gateway (v1)
  getApi(name: string): Promise<apigateway_v1.Schema$ApigatewayApi | undefined>;
  createApi(parent: string, apiId: string, api: apigateway_v1.Schema$ApigatewayApi): Promise<void>;
  deleteApi(name: string): Promise<void>;
  listApiConfigs(apiName: string): Promise<apigateway_v1.Schema$ApigatewayApiConfig[]>;
  createApiConfig(apiName: string, configId: string, config: apigateway_v1.Schema$ApigatewayApiConfig): Promise<void>;
  deleteApiConfig(name: string): Promise<void>;
  listGateways(parent: string, pageToken?: string): Promise<Page<apigateway_v1.Schema$ApigatewayGateway>>;
  getGateway(name: string): Promise<apigateway_v1.Schema$ApigatewayGateway | undefined>;
  createGateway(parent: string, gatewayId: string, gateway: apigateway_v1.Schema$ApigatewayGateway): Promise<void>;
  updateGateway(name: string, gateway: apigateway_v1.Schema$ApigatewayGateway): Promise<void>;
  deleteGateway(name: string): Promise<void>;

  // Pub/Sub (v1)
  listSubscriptions(project: string, pageToken?: string): Promise<Page<pubsub_v1.Schema$Subscription>>;
  getSubscription(name: string): Promise<pubsub_v1.Schema$Subscription | undefined>;
  createSubscription(name: string, subscription: pubsub_v1.Schema$Subscription): Promise<void>;
  updateSubscription(name: string, subscription: pubsub_v1.Schema$Subscription): Promise<void>;
  deleteSubscription(name: string): Promise<void>;

  // Cloud Scheduler (v1)
  listSchedulerJobs(parent: string, pageToken?: string): Promise<Page<cloudscheduler_v1.Schema$Job>>;
  getSchedulerJob(name: string): Promise<cloudscheduler_v1.Schema$Job | undefined>;
  createSchedulerJob(parent: string, job: cloudscheduler_v1.Schema$Job): Promise<void>;
  updateSchedulerJob(name: string, job: cloudscheduler_v1.Schema$Job): Promise<void>;
  deleteSchedulerJob(name: string): Promise<void>;

  // Cloud Run (v2)
  listRunJobs(parent: string, pageToken?: string): Promise<Page<run_v2.Schema$GoogleCloudRunV2Job>>;
  getRunJob(name: string): Promise<run_v2.Schema$GoogleCloudRunV2Job | undefined>;
  createRunJob(parent: string, jobId: string, job: run_v2.Schema$GoogleCloudRunV2Job): Promise<void>;
  updateRunJob(name: string, job: run_v2.Schema$GoogleCloudRunV2Job): Promise<void>;
  deleteRunJob(name: string): Promise<void>;

  // Cloud Storage (v1)
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(project: string, bucket: string, location: string): Promise<void>;
  uploadObject(bucket: string, objectName: string, data: Buffer, contentType: string): Promise<void>;
  listObjects(bucket: string, prefix: string, pageToken?: string): Promise<Page<storage_v1.Schema$Object>>;
  deleteObject(bucket: string, objectName: string): Promise<void>;
}

export function projectPath(project: string): string {
  return `projects/${project}`;
}

export function locationPath(project: string, location: string): string {
  return `projects/${project}/locations/${location}`;
}
