import assert from "node:assert/strict";
import test from "node:test";
import { declareResources } from "../deploy/declared";
import { bucketResource, storageEventType } from "../handlers/storage-handler";
import { TRIGGER_NAME_HEADER, TRIGGER_TYPE_HEADER } from "../handlers/schedule-handler";
import { runJobTemplate } from "../handlers/job-handler";
import { createHandlerRegistry, handlerFor, withHandler } from "../handlers/registry";
import { ConflictError } from "../lib/errors";
import { silentLogger } from "../lib/logger";
import type { DeclaredOf, RemoteResource, ResourceKind } from "../types/resources";
import { FUNCTIONS_PARENT, LOCATION, PROJECT, shopApp, testConfig } from "./helpers/fixtures";
import { InMemoryCloud } from "./helpers/in-memory-cloud";

const ARTIFACT = { bucket: "test-bucket", objectName: "stageform/shop-dev/abc.zip", sha256: "abcdef0123456789" };

function setup(app = shopApp()) {
  const cloud = new InMemoryCloud();
  const declared = declareResources(app, testConfig());
  const registry = createHandlerRegistry({
    cloud,
    project: PROJECT,
    location: LOCATION,
    appName: "shop",
    knownStages: ["dev", "prod"],
    declared,
    logger: silentLogger
  });
  return { cloud, registry };
}

function declaredOf<K extends ResourceKind>(registry: ReturnType<typeof setup>["registry"], kind: K): DeclaredOf<K> {
  const first = handlerFor(registry, kind).desiredSpec()[0];
  assert.ok(first, `no declared ${kind}`);
  return first;
}

async function collect<K extends ResourceKind>(iter: AsyncIterable<RemoteResource<K>>): Promise<string[]> {
  const names: string[] = [];
  for await (const r of iter) names.push(r.name);
  return names;
}

test("FunctionHandler: HTTP function body with the source archive", () => {
  const { registry } = setup();
  const handler = handlerFor(registry, "function");
  const state = handler.desiredState(declaredOf(registry, "function"), { artifact: ARTIFACT });

  assert.deepEqual(state, {
    name: `${FUNCTIONS_PARENT}/functions/shop-dev`,
    runtime: "nodejs20",
    entryPoint: "handler",
    availableMemoryMb: 256,
    timeout: "60s",
    environmentVariables: {},
    labels: { "stageform-source": "abcdef012345" },
    serviceAccountEmail: undefined,
    sourceArchiveUrl: "gs://test-bucket/stageform/shop-dev/abc.zip",
    httpsTrigger: {}
  });
});

test("FunctionHandler: only the app's own function is listed", async () => {
  const { cloud, registry } = setup();
  for (const name of ["shop-dev", "shop-prod", "shop-storage-uploads-finalize-dev", "billing-dev", "shop"]) {
    cloud.functions.set(`${FUNCTIONS_PARENT}/functions/${name}`, { name: `${FUNCTIONS_PARENT}/functions/${name}` });
  }

  assert.deepEqual(await collect(handlerFor(registry, "function").listRemote("dev")), ["shop-dev"]);
  assert.deepEqual(await collect(handlerFor(registry, "function").listRemote(undefined)), ["shop"]);
  assert.deepEqual(await collect(handlerFor(registry, "storage").listRemote("dev")), [
    "shop-storage-uploads-finalize-dev"
  ]);
});

test("listRemote without a stage skips names carrying an unconfigured stage suffix", async () => {
  const { cloud, registry } = setup();
  for (const name of ["shop-storage-uploads-finalize", "shop-storage-uploads-finalize-qa"]) {
    cloud.functions.set(`${FUNCTIONS_PARENT}/functions/${name}`, { name: `${FUNCTIONS_PARENT}/functions/${name}` });
  }
  for (const name of ["shop-orders", "shop-orders-qa"]) {
    const path = `projects/${PROJECT}/subscriptions/${name}`;
    cloud.subscriptions.set(path, { name: path, topic: "t" });
  }

  assert.deepEqual(await collect(handlerFor(registry, "storage").listRemote(undefined)), [
    "shop-storage-uploads-finalize"
  ]);
  assert.deepEqual(await collect(handlerFor(registry, "topic").listRemote(undefined)), ["shop-orders"]);
  assert.deepEqual(await collect(handlerFor(registry, "topic").listRemote("dev")), []);
});

test("StorageHandler: event trigger and trigger conflicts", async () => {
  const { cloud, registry } = setup();
  const handler = handlerFor(registry, "storage");
  const declared = declaredOf(registry, "storage");

  assert.deepEqual(handler.desiredState(declared, { artifact: undefined }).eventTrigger, {
    eventType: "google.storage.object.finalize",
    resource: "projects/_/buckets/shop-uploads"
  });

  const id = `${FUNCTIONS_PARENT}/functions/${declared.remoteName}`;
  cloud.functions.set(id, {
    name: id,
    eventTrigger: { eventType: storageEventType("finalize"), resource: bucketResource("old-uploads") }
  });
  const remote = await handler.find(declared);
  assert.ok(remote);
  assert.deepEqual(handler.conflicts(remote, declared), [
    'triggered by "projects/_/buckets/old-uploads", declared "projects/_/buckets/shop-uploads"'
  ]);

  cloud.functions.set(id, { name: id, httpsTrigger: {} });
  const http = await handler.find(declared);
  assert.ok(http);
  assert.deepEqual(handler.conflicts(http, declared), [
    "deployed as an HTTP function; the trigger type of a function cannot change"
  ]);
});

test("BaseHandler.create: an existing resource is a conflict unless forced", async () => {
  const { cloud, registry } = setup();
  const handler = handlerFor(registry, "function");
  const declared = declaredOf(registry, "function");
  const id = `${FUNCTIONS_PARENT}/functions/shop-dev`;
  cloud.functions.set(id, { name: id, runtime: "nodejs18", httpsTrigger: {} });

  await assert.rejects(
    handler.create(declared, { artifact: undefined, force: false }),
    (err: unknown) => err instanceof ConflictError && err.conflicts[0]?.reason === "already exists"
  );

  await handler.create(declared, { artifact: undefined, force: true });
  assert.equal(cloud.functions.get(id)?.runtime, "nodejs20");
  assert.deepEqual(cloud.methods(), ["updateFunction"]);
});

test("BaseHandler.delete: an already deleted resource counts as deleted", async () => {
  const { cloud, registry } = setup();
  const handler = handlerFor(registry, "topic");
  const remote: RemoteResource<"topic"> = {
    kind: "topic",
    id: `projects/${PROJECT}/subscriptions/shop-orders-dev`,
    name: "shop-orders-dev",
    baseName: "shop-orders",
    stage: "dev",
    state: {}
  };

  await handler.delete(remote);
  assert.deepEqual(cloud.mutations, []);
});

test("BaseHandler.delete: other failures propagate", async () => {
  const { cloud, registry } = setup();
  const id = `projects/${PROJECT}/subscriptions/shop-orders-dev`;
  cloud.subscriptions.set(id, { name: id });
  cloud.failOn("deleteSubscription", id, 403);

  const remote = await handlerFor(registry, "topic").find(declaredOf(registry, "topic"));
  assert.ok(remote);
  await assert.rejects(handlerFor(registry, "topic").delete(remote), /status=403/);
});

test("TopicHandler: immutable topic and filter", async () => {
  const { cloud, registry } = setup();
  const handler = handlerFor(registry, "topic");
  const declared = declaredOf(registry, "topic");
  const id = `projects/${PROJECT}/subscriptions/shop-orders-dev`;
  cloud.subscriptions.set(id, { name: id, topic: `projects/${PROJECT}/topics/legacy-events`, filter: 'attributes.type = "x"' });

  const remote = await handler.find(declared);
  assert.ok(remote);
  assert.deepEqual(handler.conflicts(remote, declared), [
    `subscribed to "projects/${PROJECT}/topics/legacy-events", declared "projects/${PROJECT}/topics/order-events"`,
    "the subscription filter cannot change"
  ]);
});

test("TopicHandler.update: patches only mutable fields", async () => {
  const { cloud, registry } = setup();
  const handler = handlerFor(registry, "topic");
  const declared = declaredOf(registry, "topic");
  const id = `projects/${PROJECT}/subscriptions/shop-orders-dev`;
  cloud.subscriptions.set(id, {
    name: id,
    topic: `projects/${PROJECT}/topics/order-events`,
    ackDeadlineSeconds: 30,
    pushConfig: { pushEndpoint: "https://old.example.com" }
  });

  const remote = await handler.find(declared);
  assert.ok(remote);
  await handler.update(remote, declared, { artifact: undefined });
  assert.deepEqual(cloud.subscriptions.get(id), {
    name: id,
    topic: `projects/${PROJECT}/topics/order-events`,
    ackDeadlineSeconds: 10,
    pushConfig: { pushEndpoint: `https://${LOCATION}-${PROJECT}.cloudfunctions.net/shop-dev` }
  });
});

test("ScheduleHandler: HTTP target tagged with the trigger headers", () => {
  const app = shopApp({
    schedules: [{ name: "report", schedule: "*/5 * * * *", httpMethod: "POST", body: "{}", headers: { "X-Env": "dev" } }],
    function: { serviceAccount: "runner@test-project.iam.gserviceaccount.com" }
  });
  const { registry } = setup(app);
  const state = handlerFor(registry, "schedule").desiredState(declaredOf(registry, "schedule"), { artifact: undefined });
  const url = `https://${LOCATION}-${PROJECT}.cloudfunctions.net/shop-dev`;

  assert.equal(state.name, `${FUNCTIONS_PARENT}/jobs/shop-report-dev`);
  assert.equal(state.timeZone, "UTC");
  assert.deepEqual(state.httpTarget, {
    uri: url,
    httpMethod: "POST",
    headers: { "X-Env": "dev", [TRIGGER_TYPE_HEADER]: "schedule", [TRIGGER_NAME_HEADER]: "report" },
    body: Buffer.from("{}").toString("base64"),
    oidcToken: { serviceAccountEmail: "runner@test-project.iam.gserviceaccount.com", audience: url }
  });
});

test("JobHandler: template with sorted environment", () => {
  const template = runJobTemplate({
    image: "gcr.io/test-project/migrate:1",
    command: ["node"],
    args: ["migrate.js"],
    env: { ZONE: "b", APP: "a" },
    taskCount: 3,
    maxRetries: 1,
    timeoutSeconds: 900
  });
  assert.deepEqual(template, {
    taskCount: 3,
    template: {
      maxRetries: 1,
      timeout: "900s",
      containers: [
        {
          image: "gcr.io/test-project/migrate:1",
          command: ["node"],
          args: ["migrate.js"],
          env: [
            { name: "APP", value: "a" },
            { name: "ZONE", value: "b" }
          ]
        }
      ]
    }
  });
});

test("RouteHandler: an update switches the gateway and drops stale configs", async () => {
  const { cloud, registry } = setup();
  const handler = handlerFor(registry, "route");
  const declared = declaredOf(registry, "route");
  await handler.create(declared, { artifact: undefined, force: false });
  const firstConfigs = [...cloud.apiConfigs.keys()];

  const changed = { ...declared, spec: { ...declared.spec, routes: [{ path: "/health", methods: ["GET" as const] }] } };
  const remote = await handler.find(changed);
  assert.ok(remote);
  await handler.update(remote, changed, { artifact: undefined });

  const configs = [...cloud.apiConfigs.keys()];
  assert.equal(configs.length, 1);
  assert.notDeepEqual(configs, firstConfigs);
  assert.equal(cloud.gateways.get(remote.id)?.apiConfig, configs[0]);
});

test("withHandler: dispatches each declared resource to its kind's handler", () => {
  const { registry } = setup();
  const kinds = declareResources(shopApp(), testConfig()).map((d) =>
    withHandler(registry, d, ({ declared, handler }) => `${handler.kind}:${declared.remoteName}`)
  );
  assert.deepEqual(kinds, [
    "function:shop-dev",
    "storage:shop-storage-uploads-finalize-dev",
    "route:shop-dev",
    "topic:shop-orders-dev",
    "schedule:shop-nightly-dev",
    "job:shop-migrate-dev"
  ]);
});
