import { Readable } from "node:stream";
import {
  google,
  type apigateway_v1,
  type cloudfunctions_v1,
  type cloudscheduler_v1,
  type pubsub_v1,
  type run_v2,
  type storage_v1
} from "googleapis";
import type { GoogleAuth } from "google-auth-library";
import { apiStatusOf, formatApiError, isNotFoundError } from "./api-errors";
import type { CloudApi, Page } from "./cloud-api";
import { RemoteApiError } from "./errors";
import type { Logger } from "./logger";
import { isRetryableGoogleApiError, withRetry, type OperationKind, type RetryOptions } from "./retry";
import { sleep } from "./sleep";

const READ_RETRIES = 4;
const WRITE_RETRIES = 2;
const RETRY_BASE_DELAY_MS = 250;
const RETRY_MAX_DELAY_MS = 8_000;
const OPERATION_POLL_INTERVAL_MS = 2_000;
const OPERATION_TIMEOUT_MS = 15 * 60_000;

/**
 * Shape shared by the long-running operation types of Cloud Functions,
 * API Gateway and Cloud Run.
 */
export interface LongRunningOperation {
  name?: string | null;
  done?: boolean | null;
  error?: { code?: number | null; message?: string | null } | null;
}

// google.rpc.Code → HTTP status, for the codes callers branch on.
const RPC_TO_HTTP_STATUS: Record<number, number> = {
  3: 400,
  5: 404,
  6: 409,
  7: 403,
  8: 429,
  9: 400,
  10: 409,
  14: 503
};

export interface GoogleCloudClientOptions {
  logger?: Logger;
  pollIntervalMs?: number;
  operationTimeoutMs?: number;
}

/**
 * Builds the `updateMask` for a PATCH from the top-level fields being written.
 */
export function updateMaskOf(body: object): string {
  return Object.entries(body)
    .filter(([key, value]) => key !== "name" && value !== undefined)
    .map(([key]) => key)
    .sort((a, b) => a.localeCompare(b))
    .join(",");
}

/**
 * Polls a long-running operation until it is done, then surfaces its error (if any)
 * as a {@link RemoteApiError}.
 */
export async function waitForOperation(
  context: string,
  operation: LongRunningOperation,
  poll: (name: string) => Promise<LongRunningOperation>,
  options: { pollIntervalMs: number; timeoutMs: number }
): Promise<void> {
  let current = operation;
  const deadline = Date.now() + options.timeoutMs;

  while (!current.done) {
    const name = current.name;
    if (!name) {
      throw new RemoteApiError(context, undefined, "operation response missing name");
    }
    if (Date.now() > deadline) {
      throw new RemoteApiError(context, undefined, `operation ${name} did not finish within ${options.timeoutMs}ms`);
    }
    await sleep(options.pollIntervalMs);
    current = await poll(name);
  }

  if (current.error) {
    const code = current.error.code ?? undefined;
    const status = code !== undefined ? RPC_TO_HTTP_STATUS[code] : undefined;
    throw new RemoteApiError(
      context,
      status,
      `status=${status ?? "unknown"}; message=${current.error.message ?? "operation failed"}`
    );
  }
}

export class GoogleCloudClient implements CloudApi {
  private readonly functions: cloudfunctions_v1.Cloudfunctions;
  private readonly gateway: apigateway_v1.Apigateway;
  private readonly pubsub: pubsub_v1.Pubsub;
  private readonly scheduler: cloudscheduler_v1.Cloudscheduler;
  private readonly run: run_v2.Run;
  private readonly storage: storage_v1.Storage;
  private readonly logger: Logger | undefined;
  private readonly pollIntervalMs: number;
  private readonly operationTimeoutMs: number;

  constructor(auth: GoogleAuth, options: GoogleCloudClientOptions = {}) {
    this.functions = google.cloudfunctions({ version: "v1", auth });
    this.gateway = google.apigateway({ version: "v1", auth });
    this.pubsub = google.pubsub({ version: "v1", auth });
    this.scheduler = google.cloudscheduler({ version: "v1", auth });
    this.run = google.run({ version: "v2", auth });
    this.storage = google.storage({ version: "v1", auth });
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs ?? OPERATION_POLL_INTERVAL_MS;
    this.operationTimeoutMs = options.operationTimeoutMs ?? OPERATION_TIMEOUT_MS;
  }

  private async request<T>(context: string, fn: () => Promise<{ data: T }>): Promise<T> {
    return await this.requestWithRetry(context, fn, "read");
  }

  private async requestWithRetry<T>(
    context: string,
    fn: () => Promise<{ data: T }>,
    operationKind: OperationKind
  ): Promise<T> {
    try {
      const retries = operationKind === "read" ? READ_RETRIES : WRITE_RETRIES;
      const retryOptions: RetryOptions = {
        retries,
        baseDelayMs: RETRY_BASE_DELAY_MS,
        maxDelayMs: RETRY_MAX_DELAY_MS,
        jitter: true,
        shouldRetry: isRetryableGoogleApiError
      };

      const logger = this.logger;
      if (logger) {
        retryOptions.onRetry = ({ attempt, delayMs, err }) => {
          logger.warn(`${context} retrying`, {
            attempt,
            delayMs,
            error: formatApiError(err)
          });
        };
      }

      return await withRetry(async () => {
        const res = await fn();
        return res.data;
      }, retryOptions);
    } catch (err: unknown) {
      throw new RemoteApiError(context, apiStatusOf(err), formatApiError(err), err);
    }
  }

  private async getOrUndefined<T>(context: string, fn: () => Promise<{ data: T }>): Promise<T | undefined> {
    try {
      return await this.request(context, fn);
    } catch (err: unknown) {
      if (isNotFoundError(err)) {
        return undefined;
      }
      throw err;
    }
  }

  private async mutate(
    context: string,
    fn: () => Promise<{ data: LongRunningOperation }>,
    poll: (name: string) => Promise<{ data: LongRunningOperation }>
  ): Promise<void> {
    const operation = await this.requestWithRetry(context, fn, "write");
    this.logger?.debug(`${context} started`, { operation: operation.name ?? undefined });
    await waitForOperation(context, operation, (name) => this.request(`${context} (poll)`, () => poll(name)), {
      pollIntervalMs: this.pollIntervalMs,
      timeoutMs: this.operationTimeoutMs
    });
  }

  private async listAllPages<T>(
    fetchPage: (pageToken?: string) => Promise<Page<T>>
  ): Promise<T[]> {
    const out: T[] = [];
    let pageToken: string | undefined;

    do {
      const page = await fetchPage(pageToken);
      out.push(...page.items);
      pageToken = page.nextPageToken;
    } while (pageToken);

    return out;
  }

  // ----------------------------
  // Cloud Functions
  // ----------------------------
  private pollFunctionOperation = (name: string) => this.functions.operations.get({ name });

  async listFunctions(parent: string, pageToken?: string): Promise<Page<cloudfunctions_v1.Schema$CloudFunction>> {
    const data = await this.request("Cloud Functions functions.list", () =>
      this.functions.projects.locations.functions.list({ parent, pageToken })
    );
    return { items: data.functions ?? [], nextPageToken: data.nextPageToken ?? undefined };
  }

  async getFunction(name: string): Promise<cloudfunctions_v1.Schema$CloudFunction | undefined> {
    return await this.getOrUndefined("Cloud Functions functions.get", () =>
      this.functions.projects.locations.functions.get({ name })
    );
  }

  async createFunction(parent: string, fn: cloudfunctions_v1.Schema$CloudFunction): Promise<void> {
    await this.mutate(
      `Cloud Functions functions.create (${fn.name ?? "?"})`,
      () => this.functions.projects.locations.functions.create({ location: parent, requestBody: fn }),
      this.pollFunctionOperation
    );
  }

  async updateFunction(name: string, fn: cloudfunctions_v1.Schema$CloudFunction): Promise<void> {
    await this.mutate(
      `Cloud Functions functions.patch (${name})`,
      () =>
        this.functions.projects.locations.functions.patch({
          name,
          updateMask: updateMaskOf(fn),
          requestBody: fn
        }),
      this.pollFunctionOperation
    );
  }

  async deleteFunction(name: string): Promise<void> {
    await this.mutate(
      `Cloud Functions functions.delete (${name})`,
      () => this.functions.projects.locations.functions.delete({ name }),
      this.pollFunctionOperation
    );
  }

  // ----------------------------
  // API Gateway
  // ----------------------------
  private pollGatewayOperation = (name: string) => this.gateway.projects.locations.operations.get({ name });

  async getApi(name: string): Promise<apigateway_v1.Schema$ApigatewayApi | undefined> {
    return await this.getOrUndefined("API Gateway apis.get", () => this.gateway.projects.locations.apis.get({ name }));
  }

  async createApi(parent: string, apiId: string, api: apigateway_v1.Schema$ApigatewayApi): Promise<void> {
    await this.mutate(
      `API Gateway apis.create (${apiId})`,
      () => this.gateway.projects.locations.apis.create({ parent, apiId, requestBody: api }),
      this.pollGatewayOperation
    );
  }

  async deleteApi(name: string): Promise<void> {
    await this.mutate(
      `API Gateway apis.delete (${name})`,
      () => this.gateway.projects.locations.apis.delete({ name }),
      this.pollGatewayOperation
    );
  }

  async listApiConfigs(apiName: string): Promise<apigateway_v1.Schema$ApigatewayApiConfig[]> {
    return await this.listAllPages(async (pageToken) => {
      const data = await this.request("API Gateway apis.configs.list", () =>
        this.gateway.projects.locations.apis.configs.list({ parent: apiName, pageToken })
      );
      return { items: data.apiConfigs ?? [], nextPageToken: data.nextPageToken ?? undefined };
    });
  }

  async createApiConfig(
    apiName: string,
    configId: string,
    config: apigateway_v1.Schema$ApigatewayApiConfig
  ): Promise<void> {
    await this.mutate(
      `API Gateway apis.configs.create (${configId})`,
      () =>
        this.gateway.projects.locations.apis.configs.create({
          parent: apiName,
          apiConfigId: configId,
          requestBody: config
        }),
      this.pollGatewayOperation
    );
  }

  async deleteApiConfig(name: string): Promise<void> {
    await this.mutate(
      `API Gateway apis.configs.delete (${name})`,
      () => this.gateway.projects.locations.apis.configs.delete({ name }),
      this.pollGatewayOperation
    );
  }

  async listGateways(parent: string, pageToken?: string): Promise<Page<apigateway_v1.Schema$ApigatewayGateway>> {
    const data = await this.request("API Gateway gateways.list", () =>
      this.gateway.projects.locations.gateways.list({ parent, pageToken })
    );
    return { items: data.gateways ?? [], nextPageToken: data.nextPageToken ?? undefined };
  }

  async getGateway(name: string): Promise<apigateway_v1.Schema$ApigatewayGateway | undefined> {
    return await this.getOrUndefined("API Gateway gateways.get", () =>
      this.gateway.projects.locations.gateways.get({ name })
    );
  }

  async createGateway(
    parent: string,
    gatewayId: string,
    gateway: apigateway_v1.Schema$ApigatewayGateway
  ): Promise<void> {
    await this.mutate(
      `API Gateway gateways.create (${gatewayId})`,
      () => this.gateway.projects.locations.gateways.create({ parent, gatewayId, requestBody: gateway }),
      this.pollGatewayOperation
    );
  }

  async updateGateway(name: string, gateway: apigateway_v1.Schema$ApigatewayGateway): Promise<void> {
    await this.mutate(
      `API Gateway gateways.patch (${name})`,
      () =>
        this.gateway.projects.locations.gateways.patch({
          name,
          updateMask: updateMaskOf(gateway),
          requestBody: gateway
        }),
      this.pollGatewayOperation
    );
  }

  async deleteGateway(name: string): Promise<void> {
    await this.mutate(
      `API Gateway gateways.delete (${name})`,
      () => this.gateway.projects.locations.gateways.delete({ name }),
      this.pollGatewayOperation
    );
  }

  // ----------------------------
  // Pub/Sub
  // ----------------------------
  async listSubscriptions(project: string, pageToken?: string): Promise<Page<pubsub_v1.Schema$Subscription>> {
    const data = await this.request("Pub/Sub subscriptions.list", () =>
      this.pubsub.projects.subscriptions.list({ project, pageToken })
    );
    return { items: data.subscriptions ?? [], nextPageToken: data.nextPageToken ?? undefined };
  }

  async getSubscription(name: string): Promise<pubsub_v1.Schema$Subscription | undefined> {
    return await this.getOrUndefined("Pub/Sub subscriptions.get", () =>
      this.pubsub.projects.subscriptions.get({ subscription: name })
    );
  }

  async createSubscription(name: string, subscription: pubsub_v1.Schema$Subscription): Promise<void> {
    await this.requestWithRetry(
      `Pub/Sub subscriptions.create (${name})`,
      () => this.pubsub.projects.subscriptions.create({ name, requestBody: subscription }),
      "write"
    );
  }

  async updateSubscription(name: string, subscription: pubsub_v1.Schema$Subscription): Promise<void> {
    await this.requestWithRetry(
      `Pub/Sub subscriptions.patch (${name})`,
      () =>
        this.pubsub.projects.subscriptions.patch({
          name,
          requestBody: { subscription, updateMask: updateMaskOf(subscription) }
        }),
      "write"
    );
  }

  async deleteSubscription(name: string): Promise<void> {
    await this.requestWithRetry(
      `Pub/Sub subscriptions.delete (${name})`,
      () => this.pubsub.projects.subscriptions.delete({ subscription: name }),
      "write"
    );
  }

  // ----------------------------
  // Cloud Scheduler
  // ----------------------------
  async listSchedulerJobs(parent: string, pageToken?: string): Promise<Page<cloudscheduler_v1.Schema$Job>> {
    const data = await this.request("Cloud Scheduler jobs.list", () =>
      this.scheduler.projects.locations.jobs.list({ parent, pageToken })
    );
    return { items: data.jobs ?? [], nextPageToken: data.nextPageToken ?? undefined };
  }

  async getSchedulerJob(name: string): Promise<cloudscheduler_v1.Schema$Job | undefined> {
    return await this.getOrUndefined("Cloud Scheduler jobs.get", () =>
      this.scheduler.projects.locations.jobs.get({ name })
    );
  }

  async createSchedulerJob(parent: string, job: cloudscheduler_v1.Schema$Job): Promise<void> {
    await this.requestWithRetry(
      `Cloud Scheduler jobs.create (${job.name ?? "?"})`,
      () => this.scheduler.projects.locations.jobs.create({ parent, requestBody: job }),
      "write"
    );
  }

  async updateSchedulerJob(name: string, job: cloudscheduler_v1.Schema$Job): Promise<void> {
    await this.requestWithRetry(
      `Cloud Scheduler jobs.patch (${name})`,
      () => this.scheduler.projects.locations.jobs.patch({ name, updateMask: updateMaskOf(job), requestBody: job }),
      "write"
    );
  }

  async deleteSchedulerJob(name: string): Promise<void> {
    await this.requestWithRetry(
      `Cloud Scheduler jobs.delete (${name})`,
      () => this.scheduler.projects.locations.jobs.delete({ name }),
      "write"
    );
  }

  // ----------------------------
  // Cloud Run jobs
  // ----------------------------
  private pollRunOperation = (name: string) => this.run.projects.locations.operations.get({ name });

  async listRunJobs(parent: string, pageToken?: string): Promise<Page<run_v2.Schema$GoogleCloudRunV2Job>> {
    const data = await this.request("Cloud Run jobs.list", () =>
      this.run.projects.locations.jobs.list({ parent, pageToken })
    );
    return { items: data.jobs ?? [], nextPageToken: data.nextPageToken ?? undefined };
  }

  async getRunJob(name: string): Promise<run_v2.Schema$GoogleCloudRunV2Job | undefined> {
    return await this.getOrUndefined("Cloud Run jobs.get", () => this.run.projects.locations.jobs.get({ name }));
  }

  async createRunJob(parent: string, jobId: string, job: run_v2.Schema$GoogleCloudRunV2Job): Promise<void> {
    await this.mutate(
      `Cloud Run jobs.create (${jobId})`,
      () => this.run.projects.locations.jobs.create({ parent, jobId, requestBody: job }),
      this.pollRunOperation
    );
  }

  async updateRunJob(name: string, job: run_v2.Schema$GoogleCloudRunV2Job): Promise<void> {
    await this.mutate(
      `Cloud Run jobs.patch (${name})`,
      () => this.run.projects.locations.jobs.patch({ name, requestBody: job }),
      this.pollRunOperation
    );
  }

  async deleteRunJob(name: string): Promise<void> {
    await this.mutate(
      `Cloud Run jobs.delete (${name})`,
      () => this.run.projects.locations.jobs.delete({ name }),
      this.pollRunOperation
    );
  }

  // ----------------------------
  // Cloud Storage
  // ----------------------------
  async bucketExists(bucket: string): Promise<boolean> {
    const found = await this.getOrUndefined("Cloud Storage buckets.get", () => this.storage.buckets.get({ bucket }));
    return found !== undefined;
  }

  async createBucket(project: string, bucket: string, location: string): Promise<void> {
    await this.requestWithRetry(
      `Cloud Storage buckets.insert (${bucket})`,
      () => this.storage.buckets.insert({ project, requestBody: { name: bucket, location } }),
      "write"
    );
  }

  async uploadObject(bucket: string, objectName: string, data: Buffer, contentType: string): Promise<void> {
    await this.requestWithRetry(
      `Cloud Storage objects.insert (gs://${bucket}/${objectName})`,
      () =>
        this.storage.objects.insert({
          bucket,
          name: objectName,
          requestBody: { name: objectName, contentType },
          media: { mimeType: contentType, body: Readable.from(data) }
        }),
      "write"
    );
  }

  async listObjects(bucket: string, prefix: string, pageToken?: string): Promise<Page<storage_v1.Schema$Object>> {
    const data = await this.request("Cloud Storage objects.list", () =>
      this.storage.objects.list({ bucket, prefix, pageToken })
    );
    return { items: data.items ?? [], nextPageToken: data.nextPageToken ?? undefined };
  }

  async deleteObject(bucket: string, objectName: string): Promise<void> {
    await this.requestWithRetry(
      `Cloud Storage objects.delete (gs://${bucket}/${objectName})`,
      () => this.storage.objects.delete({ bucket, object: objectName }),
      "write"
    );
  }
}
