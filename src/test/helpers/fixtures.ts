import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Config } from "../../config/resolve-config";
import { zApplicationDefinition, type ApplicationDefinition } from "../../types/app-schema";

export const PROJECT = "test-project";
export const LOCATION = "us-central1";
export const FUNCTIONS_PARENT = `projects/${PROJECT}/locations/${LOCATION}`;

export function testConfig(overrides: Partial<Config> = {}): Config {
  const rootDir = overrides.rootDir ?? "/workspace/shop";
  return {
    rootDir,
    project: PROJECT,
    location: LOCATION,
    activeStage: "dev",
    entryFile: path.join(rootDir, "app.yaml"),
    stages: {
      dev: { functionName: "shop-dev" },
      prod: { functionName: "shop-prod" }
    },
    function: {},
    artifactBucket: undefined,
    ...overrides
  };
}

/** An application declaring one resource of every kind. */
export function shopApp(overrides: Record<string, unknown> = {}): ApplicationDefinition {
  return zApplicationDefinition.parse({
    name: "shop",
    function: { runtime: "nodejs20", entryPoint: "handler" },
    routes: [
      { path: "/orders", methods: ["GET", "POST"] },
      { path: "/orders/{id}", methods: ["GET"] }
    ],
    topics: [{ name: "orders", topic: "order-events" }],
    schedules: [{ name: "nightly", schedule: "0 3 * * *" }],
    storage: [{ name: "uploads", bucket: "shop-uploads" }],
    jobs: [{ name: "migrate", image: "gcr.io/test-project/migrate:1", command: ["node", "migrate.js"] }],
    ...overrides
  });
}

export async function makeTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "stageform-test-"));
}
