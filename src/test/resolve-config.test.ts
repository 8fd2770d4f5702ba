import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import type { ConfigFile } from "../config/config-file";
import type { DefaultProjectSource } from "../config/default-project";
import { GcloudDefaultProject } from "../config/default-project";
import { deepMerge, resolveConfig, resolveLocalConfig } from "../config/resolve-config";
import { LocalEnvironmentError, MissingConfigError, UnknownStageError } from "../lib/errors";
import { FakeLauncher } from "./helpers/local-fakes";

const ROOT = "/workspace/shop";

const FILE: ConfigFile = {
  project: "file-project",
  location: "europe-west1",
  function: { memoryMb: 256, labels: { team: "shop" } },
  stages: {
    dev: { functionName: "shop-dev", project: "dev-project", function: { labels: { tier: "dev" } } },
    prod: { functionName: "shop-prod", artifactBucket: "shop-prod-artifacts" }
  }
};

function fixedProject(project: string | undefined): DefaultProjectSource {
  return { defaultProject: async () => project };
}

test("resolveConfig: the stage override beats the file root", async () => {
  const config = await resolveConfig({ rootDir: ROOT, flags: { stage: "dev" }, env: {}, configFile: FILE });
  assert.equal(config.project, "dev-project");
  assert.equal(config.location, "europe-west1");
  assert.equal(config.activeStage, "dev");
  assert.equal(config.function.memoryMb, 256);
  assert.deepEqual(config.function.labels, { team: "shop", tier: "dev" });
});

test("resolveConfig: environment beats the file, flags beat the environment", async () => {
  const env = { GOOGLE_PROJECT: "env-project", GOOGLE_LOCATION: "us-east1", STAGE: "prod" };

  const fromEnv = await resolveConfig({ rootDir: ROOT, env, configFile: FILE });
  assert.equal(fromEnv.project, "env-project");
  assert.equal(fromEnv.location, "us-east1");
  assert.equal(fromEnv.activeStage, "prod");
  assert.equal(fromEnv.artifactBucket, "shop-prod-artifacts");

  const fromFlags = await resolveConfig({
    rootDir: ROOT,
    flags: { project: "flag-project", location: "asia-east1", stage: "dev" },
    env,
    configFile: FILE
  });
  assert.equal(fromFlags.project, "flag-project");
  assert.equal(fromFlags.location, "asia-east1");
  assert.equal(fromFlags.activeStage, "dev");
});

test("resolveConfig: empty environment values are ignored", async () => {
  const config = await resolveConfig({
    rootDir: ROOT,
    env: { GOOGLE_PROJECT: "", GOOGLE_LOCATION: "  " },
    configFile: FILE
  });
  assert.equal(config.project, "file-project");
  assert.equal(config.location, "europe-west1");
  assert.equal(config.activeStage, undefined);
});

test("resolveConfig: --config overlays the file layer but not flags", async () => {
  const config = await resolveConfig({
    rootDir: ROOT,
    flags: {
      stage: "dev",
      project: "flag-project",
      config: '{"project":"json-project","location":"asia-east1","function":{"memoryMb":1024}}'
    },
    env: {},
    configFile: FILE
  });
  assert.equal(config.project, "flag-project");
  assert.equal(config.location, "asia-east1");
  assert.equal(config.function.memoryMb, 1024);
  assert.deepEqual(config.function.labels, { team: "shop", tier: "dev" });
});

test("resolveConfig: falls back to the gcloud default project", async () => {
  const config = await resolveConfig({
    rootDir: ROOT,
    flags: { location: "us-central1" },
    env: {},
    configFile: { stages: {} },
    defaultProject: fixedProject("gcloud-project")
  });
  assert.equal(config.project, "gcloud-project");
});

test("resolveConfig: missing project fails before anything else", async () => {
  await assert.rejects(
    resolveConfig({
      rootDir: ROOT,
      flags: { location: "us-central1" },
      env: {},
      configFile: { stages: {} },
      defaultProject: fixedProject(undefined)
    }),
    (err: unknown) => err instanceof MissingConfigError && err.field === "project"
  );
});

test("resolveConfig: missing location", async () => {
  await assert.rejects(
    resolveConfig({ rootDir: ROOT, flags: { project: "p" }, env: {}, configFile: { stages: {} } }),
    (err: unknown) => err instanceof MissingConfigError && err.field === "location"
  );
});

test("resolveLocalConfig: project and location may stay unknown", async () => {
  const config = await resolveLocalConfig({ rootDir: ROOT, env: {}, configFile: { stages: {} } });
  assert.equal(config.project, undefined);
  assert.equal(config.location, undefined);
  assert.equal(config.entryFile, path.join(ROOT, "app.yaml"));
});

test("resolveLocalConfig: unknown stage lists the known ones", async () => {
  await assert.rejects(
    resolveLocalConfig({ rootDir: ROOT, env: { STAGE: "qa" }, configFile: FILE }),
    (err: unknown) =>
      err instanceof UnknownStageError &&
      err.message === 'Unknown stage "qa" (known stages: dev, prod). Create it with: stageform stage create qa'
  );
});

test("resolveLocalConfig: a malformed --stage is rejected before the stage lookup", async () => {
  await assert.rejects(
    resolveLocalConfig({ rootDir: ROOT, flags: { stage: "a-b" }, env: {}, configFile: FILE }),
    (err: unknown) =>
      !(err instanceof UnknownStageError) &&
      err instanceof Error &&
      err.message.startsWith('Invalid stage name "a-b": ')
  );
});

test("resolveLocalConfig: main names the application definition", async () => {
  const config = await resolveLocalConfig({
    rootDir: ROOT,
    env: {},
    configFile: { main: "service.json", stages: {} }
  });
  assert.equal(config.entryFile, path.join(ROOT, "service.json"));
});

test("resolveConfig: the result is deeply frozen", async () => {
  const config = await resolveConfig({ rootDir: ROOT, flags: { stage: "dev" }, env: {}, configFile: FILE });
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.stages), true);
  assert.equal(Object.isFrozen(config.stages.dev), true);
  assert.equal(Object.isFrozen(config.function), true);
});

test("deepMerge: objects merge, arrays and scalars replace", () => {
  assert.deepEqual(deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] }), {
    a: { x: 1, y: 3 },
    list: [9]
  });
  assert.deepEqual(deepMerge({ a: 1 }, { a: undefined }), { a: 1 });
});

test("GcloudDefaultProject: reads the configured project", async () => {
  const launcher = new FakeLauncher(() => ({ exitCode: 0, stdout: "gcloud-project\n", stderr: "" }));
  assert.equal(await new GcloudDefaultProject(launcher).defaultProject(), "gcloud-project");
  assert.deepEqual(launcher.requests[0]?.args, ["config", "get-value", "project"]);
});

test("GcloudDefaultProject: unset or failing gcloud yields no project", async () => {
  const unset = new FakeLauncher(() => ({ exitCode: 0, stdout: "(unset)\n", stderr: "" }));
  assert.equal(await new GcloudDefaultProject(unset).defaultProject(), undefined);

  const failing = new FakeLauncher(() => ({ exitCode: 1, stdout: "", stderr: "error" }));
  assert.equal(await new GcloudDefaultProject(failing).defaultProject(), undefined);

  const missing = new FakeLauncher(() => {
    throw new LocalEnvironmentError('Command not found: "gcloud".');
  });
  assert.equal(await new GcloudDefaultProject(missing).defaultProject(), undefined);
});
