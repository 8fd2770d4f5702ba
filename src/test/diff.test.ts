import assert from "node:assert/strict";
import test from "node:test";
import { isUpToDate, matchesDesiredSubset } from "../deploy/diff";
import { normalizeForDiff } from "../deploy/normalize";

test("matchesDesiredSubset: env array order does not matter after normalize", () => {
  const current = normalizeForDiff({
    template: {
      containers: [
        {
          image: "gcr.io/p/migrate:1",
          env: [
            { name: "MODE", value: "full" },
            { name: "DB", value: "orders" }
          ]
        }
      ]
    }
  });

  const desired = normalizeForDiff({
    template: {
      containers: [
        {
          image: "gcr.io/p/migrate:1",
          env: [
            { name: "DB", value: "orders" },
            { name: "MODE", value: "full" }
          ]
        }
      ]
    }
  });

  assert.equal(matchesDesiredSubset(current, desired), true);
});

test("matchesDesiredSubset: desired subset matches current superset", () => {
  const current = normalizeForDiff({
    name: "projects/p/locations/l/functions/shop-dev",
    runtime: "nodejs20",
    entryPoint: "handler",
    labels: { team: "shop", "stageform-source": "abc" },
    httpsTrigger: { url: "https://l-p.cloudfunctions.net/shop-dev" }
  });

  const desired = normalizeForDiff({
    runtime: "nodejs20",
    labels: { team: "shop" },
    httpsTrigger: {}
  });

  assert.equal(matchesDesiredSubset(current, desired), true);
});

test("matchesDesiredSubset: positional arrays keep their order", () => {
  const current = normalizeForDiff({ command: ["node", "migrate.js"] });
  const desired = normalizeForDiff({ command: ["migrate.js", "node"] });
  assert.equal(matchesDesiredSubset(current, desired), false);
});

test("matchesDesiredSubset: absent provider maps satisfy empty desired ones", () => {
  assert.equal(matchesDesiredSubset({ runtime: "nodejs20" }, { runtime: "nodejs20", environmentVariables: {} }), true);
  assert.equal(matchesDesiredSubset({}, { args: [] }), true);
  assert.equal(matchesDesiredSubset({}, { args: ["--all"] }), false);
});

test("matchesDesiredSubset: undefined desired fields are ignored", () => {
  assert.equal(matchesDesiredSubset({ schedule: "0 3 * * *" }, { schedule: "0 3 * * *", body: undefined }), true);
});

test("isUpToDate: server-managed fields do not count as drift", () => {
  const current = {
    name: "projects/p/locations/l/jobs/shop-nightly-dev",
    schedule: "0 3 * * *",
    state: "ENABLED",
    userUpdateTime: "2026-01-01T00:00:00Z"
  };
  assert.equal(isUpToDate(current, { name: current.name, schedule: "0 3 * * *" }), true);
  assert.equal(isUpToDate(current, { name: current.name, schedule: "0 4 * * *" }), false);
});
