import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import test from "node:test";
import { loadApplicationDefinition } from "../app/load-app";
import { ConfigError, LocalEnvironmentError } from "../lib/errors";
import { makeTempDir } from "./helpers/fixtures";

async function projectWith(fileName: string, contents: string): Promise<string> {
  const rootDir = await makeTempDir();
  await fs.writeFile(path.join(rootDir, fileName), contents, "utf-8");
  return rootDir;
}

test("loadApplicationDefinition: YAML with defaults applied", async () => {
  const rootDir = await projectWith(
    "app.yaml",
    [
      "name: shop",
      "function:",
      "  entryPoint: api",
      "routes:",
      "  - path: /orders",
      "topics:",
      "  - name: orders",
      "    topic: order-events",
      ""
    ].join("\n")
  );

  const app = await loadApplicationDefinition(rootDir, "app.yaml");
  assert.equal(app.name, "shop");
  assert.equal(app.function?.runtime, "nodejs20");
  assert.equal(app.function?.entryPoint, "api");
  assert.equal(app.function?.timeoutSeconds, 60);
  assert.deepEqual(app.routes, [{ path: "/orders", methods: ["GET"] }]);
  assert.equal(app.topics[0]?.ackDeadlineSeconds, 10);
  assert.deepEqual(app.jobs, []);
});

test("loadApplicationDefinition: JSON works too", async () => {
  const rootDir = await projectWith(
    "app.json",
    JSON.stringify({ name: "worker", jobs: [{ name: "reindex", image: "gcr.io/p/reindex", command: ["reindex"] }] })
  );

  const app = await loadApplicationDefinition(rootDir, "app.json");
  assert.equal(app.function, undefined);
  assert.equal(app.jobs[0]?.taskCount, 1);
  assert.equal(app.jobs[0]?.maxRetries, 3);
});

test("loadApplicationDefinition: a missing file says where to look", async () => {
  const rootDir = await makeTempDir();
  await assert.rejects(loadApplicationDefinition(rootDir, "app.yaml"), (err: unknown) => {
    assert.ok(err instanceof LocalEnvironmentError);
    assert.equal(err.message, "Missing app.yaml. Make sure you are in the correct directory and this file exists.");
    return true;
  });
});

test("loadApplicationDefinition: paths outside the project are rejected", async () => {
  const rootDir = await makeTempDir();
  await assert.rejects(loadApplicationDefinition(rootDir, "../app.yaml"), /must be within the project root/);
});

test("loadApplicationDefinition: duplicate YAML keys are an error", async () => {
  const rootDir = await projectWith("app.yaml", "name: shop\nname: store\n");
  await assert.rejects(loadApplicationDefinition(rootDir, "app.yaml"), (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.match(err.message, /^Invalid YAML in /);
    return true;
  });
});

test("loadApplicationDefinition: triggers without a function are rejected", async () => {
  const rootDir = await projectWith("app.yaml", "name: shop\nroutes:\n  - path: /\n");
  await assert.rejects(
    loadApplicationDefinition(rootDir, "app.yaml"),
    /\(root\): routes, topics, schedules and storage triggers require a `function` section\./
  );
});

test("loadApplicationDefinition: invalid names point at the field", async () => {
  const rootDir = await projectWith("app.yaml", "name: Shop\n");
  await assert.rejects(
    loadApplicationDefinition(rootDir, "app.yaml"),
    /name: Use lowercase letters, digits and hyphens; start with a letter\./
  );
});

test("loadApplicationDefinition: unknown fields are rejected", async () => {
  const rootDir = await projectWith("app.yaml", "name: shop\nregion: us-central1\n");
  await assert.rejects(loadApplicationDefinition(rootDir, "app.yaml"), /Unrecognized key\(s\) in object: 'region'/);
});
