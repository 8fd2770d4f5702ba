import assert from "node:assert/strict";
import test from "node:test";
import { deploy } from "../deploy/deploy";
import { destroyStage } from "../deploy/destroy";
import { sha256HexFromBuffer } from "../deploy/hash";
import { ReconcileError } from "../lib/errors";
import { silentLogger } from "../lib/logger";
import { FUNCTIONS_PARENT, PROJECT, shopApp, testConfig } from "./helpers/fixtures";
import { InMemoryCloud } from "./helpers/in-memory-cloud";
import { FakePackager } from "./helpers/local-fakes";

const ARCHIVE = `stageform/shop-dev/${sha256HexFromBuffer(Buffer.from("source-v1"))}.zip`;

async function deployed(stage: "dev" | "prod" = "dev", cloud = new InMemoryCloud()) {
  await deploy(testConfig({ activeStage: stage }), shopApp(), {}, {
    cloud,
    packager: new FakePackager(),
    logger: silentLogger
  });
  return cloud;
}

test("destroyStage: tears down every owned resource in reverse dependency order", async () => {
  const cloud = await deployed();

  const res = await destroyStage(testConfig(), shopApp(), {}, { cloud, logger: silentLogger });
  assert.deepEqual(res.deleted, [
    "job:shop-migrate-dev",
    "schedule:shop-nightly-dev",
    "topic:shop-orders-dev",
    "route:shop-dev",
    "storage:shop-storage-uploads-finalize-dev",
    "function:shop-dev"
  ]);
  assert.deepEqual(res.purgedArtifacts, []);
  assert.equal(cloud.functions.size, 0);
  assert.equal(cloud.gateways.size, 0);
  assert.equal(cloud.apiConfigs.size, 0);
  assert.equal(cloud.apis.size, 0);
  assert.equal(cloud.objects.size, 1);
});

test("destroyStage: resources no longer declared are destroyed too", async () => {
  const cloud = await deployed();

  const res = await destroyStage(testConfig(), shopApp({ jobs: [] }), {}, { cloud, logger: silentLogger });
  assert.equal(res.deleted[0], "job:shop-migrate-dev");
  assert.equal(cloud.runJobs.size, 0);
});

test("destroyStage: other stages survive", async () => {
  const cloud = await deployed("prod", await deployed("dev"));

  await destroyStage(testConfig(), shopApp(), { all: true }, { cloud, logger: silentLogger });
  assert.deepEqual(
    [...cloud.functions.keys()],
    [`${FUNCTIONS_PARENT}/functions/shop-prod`, `${FUNCTIONS_PARENT}/functions/shop-storage-uploads-finalize-prod`]
  );
  assert.deepEqual(
    [...cloud.objects.keys()],
    [`gs://${PROJECT}-stageform-artifacts/stageform/shop-prod/${sha256HexFromBuffer(Buffer.from("source-v1"))}.zip`]
  );
});

test("destroyStage: --all purges the stage's source archives", async () => {
  const cloud = await deployed();

  const res = await destroyStage(testConfig(), shopApp(), { all: true }, { cloud, logger: silentLogger });
  assert.deepEqual(res.purgedArtifacts, [ARCHIVE]);
  assert.equal(cloud.objects.size, 0);
});

test("destroyStage: dry run lists everything and deletes nothing", async () => {
  const cloud = await deployed();
  const before = cloud.mutations.length;

  const res = await destroyStage(testConfig(), shopApp(), { all: true, dryRun: true }, { cloud, logger: silentLogger });
  assert.equal(res.deleted.length, 6);
  assert.deepEqual(res.purgedArtifacts, [ARCHIVE]);
  assert.equal(cloud.mutations.length, before);
});

test("destroyStage: a failed kind stops the teardown before later kinds", async () => {
  const cloud = await deployed();
  cloud.failOn("deleteSchedulerJob", `${FUNCTIONS_PARENT}/jobs/shop-nightly-dev`);

  await assert.rejects(
    destroyStage(testConfig(), shopApp(), { all: true }, { cloud, logger: silentLogger }),
    (err: unknown) => err instanceof ReconcileError && err.failures[0]?.remoteName === "shop-nightly-dev"
  );
  assert.equal(cloud.runJobs.size, 0);
  assert.equal(cloud.subscriptions.size, 1);
  assert.equal(cloud.functions.size, 2);
  assert.equal(cloud.objects.size, 1);
});

test("destroyStage: an empty stage is a no-op", async () => {
  const cloud = new InMemoryCloud();
  const res = await destroyStage(testConfig(), shopApp(), { all: true }, { cloud, logger: silentLogger });
  assert.deepEqual(res, { dryRun: false, deleted: [], purgedArtifacts: [] });
  assert.deepEqual(cloud.mutations, []);
});

const QA_STAGES = { ...testConfig().stages, qa: { functionName: "shop-qa" } };

async function deployedTo(cloud: InMemoryCloud, activeStage: string | undefined) {
  await deploy(testConfig({ activeStage, stages: QA_STAGES }), shopApp(), {}, {
    cloud,
    packager: new FakePackager(),
    logger: silentLogger
  });
}

test("destroyStage: without a stage, a stage dropped from the config is left alone", async () => {
  const cloud = new InMemoryCloud();
  await deployedTo(cloud, "qa");

  const res = await destroyStage(testConfig({ activeStage: undefined }), shopApp(), {}, { cloud, logger: silentLogger });
  assert.deepEqual(res.deleted, []);
  assert.equal(cloud.functions.size, 2);
  assert.equal(cloud.gateways.size, 1);
  assert.equal(cloud.subscriptions.size, 1);
  assert.equal(cloud.schedulerJobs.size, 1);
  assert.equal(cloud.runJobs.size, 1);
});

test("destroyStage: without a stage, only the unstaged deployment is torn down", async () => {
  const cloud = new InMemoryCloud();
  await deployedTo(cloud, "qa");
  await deployedTo(cloud, undefined);

  const res = await destroyStage(testConfig({ activeStage: undefined }), shopApp(), {}, { cloud, logger: silentLogger });
  assert.deepEqual(res.deleted, [
    "job:shop-migrate",
    "schedule:shop-nightly",
    "topic:shop-orders",
    "route:shop",
    "storage:shop-storage-uploads-finalize",
    "function:shop"
  ]);
  assert.deepEqual(
    [...cloud.functions.keys()].sort(),
    [`${FUNCTIONS_PARENT}/functions/shop-qa`, `${FUNCTIONS_PARENT}/functions/shop-storage-uploads-finalize-qa`]
  );
  assert.equal(cloud.runJobs.size, 1);
});
