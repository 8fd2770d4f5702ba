import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { initProject } from "./app/init";
import { loadApplicationDefinition } from "./app/load-app";
import { serveLocally } from "./app/local";
import { writeOpenApiSpec } from "./app/openapi";
import { packageSource } from "./app/package-source";
import { runJobLocally } from "./app/run-job";
import { createGoogleAuth } from "./config/auth";
import { GcloudDefaultProject } from "./config/default-project";
import { resolveConfig, resolveLocalConfig } from "./config/resolve-config";
import { createStage, listStages } from "./config/stages";
import { deploy } from "./deploy/deploy";
import { destroyStage } from "./deploy/destroy";
import { syncStage } from "./deploy/sync";
import { configFlagsFor, getListFlag, getStringFlag, isFlagSet, parseCli, type FlagValue } from "./lib/cli-args";
import { errorMessage } from "./lib/errors";
import { SwaggerConverter } from "./lib/format-converter";
import { GoogleCloudClient } from "./lib/google-cloud-client";
import { createLoggerFromEnv, type Logger } from "./lib/logger";
import { ZipPackager } from "./lib/packager";
import { NodeProcessLauncher } from "./lib/process-launcher";
import { RESOURCE_KINDS } from "./types/resources";

function printHelp(): void {
  console.log(`
stageform: deploy serverless Google Cloud apps to named stages

Usage:
  stageform <command> [--flags]

Global flags:
  -p, --project <id>     Google Cloud project (or GOOGLE_PROJECT)
  -l, --location <name>  Region, e.g. us-central1 (or GOOGLE_LOCATION)
  -s, --stage <name>     Stage to target (or STAGE)
  --json                 Print JSON output

Commands:
  deploy [--skip-function|--only-function] [--skip <kinds>] [--only <kinds>] [--force] [--dryrun] [--config <json>]
  destroy [--all] [--dryrun]
  sync [--dryrun]
  stage list
  stage create <name>
  job run <name> [<task_id>]
  openapi [--version 3]
  local [<target>] [--port <n>]
  package
  init <name>
  version
  help

Kinds: ${RESOURCE_KINDS.join(", ")}

Examples:
  stageform init shop
  stageform stage create dev
  stageform deploy -p my-project -l us-central1 -s dev --dryrun
  stageform sync -s dev
  stageform destroy -s dev --all
`);
}

function printResult(asJson: boolean, value: unknown, lines: string[]): void {
  if (asJson) {
    console.log(JSON.stringify(value, null, 2));
    return;
  }
  for (const line of lines) {
    console.log(line);
  }
}

function readVersion(): string {
  const raw = fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf-8");
  return z.object({ version: z.string() }).parse(JSON.parse(raw)).version;
}

async function loadRemoteContext(command: string, flags: Record<string, FlagValue>, logger: Logger) {
  const launcher = new NodeProcessLauncher();
  const config = await resolveConfig({
    rootDir: process.cwd(),
    flags: configFlagsFor(command, flags),
    env: process.env,
    defaultProject: new GcloudDefaultProject(launcher, logger)
  });
  const app = await loadApplicationDefinition(config.rootDir, config.entryFile);
  const cloud = new GoogleCloudClient(createGoogleAuth(), { logger });
  logger.debug("Resolved config", { project: config.project, location: config.location, stage: config.activeStage });
  return { config, app, cloud, launcher };
}

async function loadLocalContext(command: string, flags: Record<string, FlagValue>, env: NodeJS.ProcessEnv = process.env) {
  const config = await resolveLocalConfig({ rootDir: process.cwd(), flags: configFlagsFor(command, flags), env });
  const app = await loadApplicationDefinition(config.rootDir, config.entryFile);
  return { config, app };
}

const zKinds = z.array(z.enum(RESOURCE_KINDS));

async function main(): Promise<void> {
  const parsed = parseCli(process.argv.slice(2));
  if (!parsed.command || parsed.command === "help" || parsed.flags.help === true) {
    printHelp();
    return;
  }

  const logger = createLoggerFromEnv(process.env);
  const asJson = isFlagSet(parsed.flags, "json");
  const dryRun = isFlagSet(parsed.flags, "dryrun", "dry-run");
  const [sub, ...args] = parsed.positionals;

  switch (parsed.command) {
    case "version": {
      console.log(readVersion());
      return;
    }
    case "init": {
      const { name } = z.object({ name: z.string().min(1) }).parse({ name: sub });
      const res = await initProject(process.cwd(), name, logger);
      printResult(asJson, res, [...res.created.map((f) => `created ${f}`), ...res.skipped.map((f) => `skipped ${f}`)]);
      return;
    }
    case "stage": {
      if (sub === "list") {
        const stages = await listStages(process.cwd());
        printResult(asJson, stages, stages.length ? stages : ["no stages found"]);
        return;
      }
      if (sub === "create") {
        const { name } = z.object({ name: z.string().min(1) }).parse({ name: args[0] });
        // The stage being created is not known yet, so no stage is selected.
        const { app } = await loadLocalContext("stage", {}, {});
        const res = await createStage(process.cwd(), name, app.name, logger);
        printResult(asJson, res, [
          res.status === "created"
            ? `stage ${res.stage} created with function name ${res.functionName}`
            : `stage ${res.stage} already exists`
        ]);
        return;
      }
      throw new Error(`Unknown stage subcommand: ${sub ?? "(none)"}. Use "stage list" or "stage create <name>".`);
    }
    case "job": {
      if (sub !== "run") {
        throw new Error(`Unknown job subcommand: ${sub ?? "(none)"}. Use "job run <name> [<task_id>]".`);
      }
      const jobArgs = z
        .object({ jobName: z.string().min(1), taskId: z.string().min(1).optional() })
        .parse({ jobName: args[0], taskId: args[1] });
      const { config, app } = await loadLocalContext("job", parsed.flags);
      await runJobLocally(config, app, { ...jobArgs, env: process.env }, { launcher: new NodeProcessLauncher(), logger });
      return;
    }
    case "local": {
      const port = z.coerce.number().int().positive().optional().parse(getStringFlag(parsed.flags, "port"));
      const { config, app } = await loadLocalContext("local", parsed.flags);
      await serveLocally(config, app, { target: sub, port }, { launcher: new NodeProcessLauncher(), logger });
      return;
    }
    case "package": {
      const { config, app } = await loadLocalContext("package", parsed.flags);
      const packaged = await packageSource(config, app, { packager: new ZipPackager(new NodeProcessLauncher()), logger });
      printResult(asJson, { path: packaged.path, sha256: packaged.sha256 }, [`${packaged.path}\t${packaged.sha256}`]);
      return;
    }
    case "openapi": {
      const version = z.literal("3").optional().parse(getStringFlag(parsed.flags, "version"));
      const launcher = new NodeProcessLauncher();
      const config = await resolveConfig({
        rootDir: process.cwd(),
        flags: configFlagsFor("openapi", parsed.flags),
        env: process.env,
        defaultProject: new GcloudDefaultProject(launcher, logger)
      });
      const app = await loadApplicationDefinition(config.rootDir, config.entryFile);
      const written = await writeOpenApiSpec(config, app, { version }, { converter: new SwaggerConverter({ logger }), logger });
      printResult(asJson, written, written.map((f) => `wrote ${f}`));
      return;
    }
    case "deploy": {
      const { config, app, cloud, launcher } = await loadRemoteContext("deploy", parsed.flags, logger);
      const res = await deploy(
        config,
        app,
        {
          skip: zKinds.parse(getListFlag(parsed.flags, "skip")),
          only: zKinds.parse(getListFlag(parsed.flags, "only")),
          skipFunction: isFlagSet(parsed.flags, "skip-function"),
          onlyFunction: isFlagSet(parsed.flags, "only-function"),
          force: isFlagSet(parsed.flags, "force"),
          dryRun
        },
        { cloud, packager: new ZipPackager(launcher), logger }
      );
      printResult(asJson, res, [
        ...res.plan.map((e) => `${dryRun ? "would " : ""}${e.operation} ${e.kind} ${e.remoteName}`),
        ...res.unchanged.map((label) => `unchanged ${label}`)
      ]);
      return;
    }
    case "sync": {
      const { config, app, cloud } = await loadRemoteContext("sync", parsed.flags, logger);
      const res = await syncStage(config, app, { dryRun }, { cloud, logger });
      printResult(
        asJson,
        res,
        res.orphans.length ? res.orphans.map((label) => `${dryRun ? "would delete" : "deleted"} ${label}`) : ["nothing to sync"]
      );
      return;
    }
    case "destroy": {
      const { config, app, cloud } = await loadRemoteContext("destroy", parsed.flags, logger);
      const res = await destroyStage(config, app, { all: isFlagSet(parsed.flags, "all"), dryRun }, { cloud, logger });
      printResult(asJson, res, [
        ...res.deleted.map((label) => `${dryRun ? "would delete" : "deleted"} ${label}`),
        ...res.purgedArtifacts.map((name) => `${dryRun ? "would purge" : "purged"} ${name}`)
      ]);
      return;
    }
    default: {
      printHelp();
      throw new Error(`Unknown command: ${parsed.command}`);
    }
  }
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${errorMessage(err)}`);
  process.exitCode = 1;
});
