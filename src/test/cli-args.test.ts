import assert from "node:assert/strict";
import test from "node:test";
import { configFlagsFor, getListFlag, getStringFlag, isFlagSet, parseCli } from "../lib/cli-args";

test("parseCli: command, long and short flags, positionals", () => {
  assert.deepEqual(parseCli(["deploy", "--stage", "dev", "-p", "test-project", "--force", "extra"]), {
    command: "deploy",
    flags: { stage: "dev", project: "test-project", force: true },
    positionals: ["extra"]
  });
});

test("parseCli: --flag=value and subcommand positionals", () => {
  assert.deepEqual(parseCli(["job", "run", "migrate", "--task-id=2", "--dry-run"]), {
    command: "job",
    flags: { "task-id": "2", "dry-run": true },
    positionals: ["run", "migrate"]
  });
});

test("parseCli: boolean flags never swallow the next token", () => {
  assert.deepEqual(parseCli(["destroy", "--all", "now"]).positionals, ["now"]);
  assert.deepEqual(parseCli(["deploy", "--only", "--force"]).flags, { only: true, force: true });
});

test("parseCli: --help without a command", () => {
  assert.deepEqual(parseCli(["--help"]), { flags: { help: true }, positionals: [] });
  assert.deepEqual(parseCli([]), { flags: {}, positionals: [] });
});

test("flag helpers", () => {
  assert.deepEqual(getListFlag({ skip: " topic, schedule ,," }, "skip"), ["topic", "schedule"]);
  assert.deepEqual(getListFlag({ skip: true }, "skip"), []);
  assert.equal(getStringFlag({ stage: "" }, "stage"), undefined);
  assert.equal(isFlagSet({ dryrun: true }, "dry-run", "dryrun"), true);
  assert.equal(isFlagSet({ force: "yes" }, "force"), false);
});

test("configFlagsFor: only deploy takes the --config overlay", () => {
  const flags = parseCli(["sync", "--stage", "dev", "--config", '{"function":{"memory":512}}']).flags;
  assert.deepEqual(configFlagsFor("deploy", flags), {
    project: undefined,
    location: undefined,
    stage: "dev",
    config: '{"function":{"memory":512}}'
  });
  for (const command of ["sync", "destroy", "openapi", "local"]) {
    assert.deepEqual(configFlagsFor(command, flags), { project: undefined, location: undefined, stage: "dev" });
  }
});
