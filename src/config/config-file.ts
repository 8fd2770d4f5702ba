import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { zFunctionOverrides } from "../types/app-schema";
import { STAGE_NAME_PATTERN, STAGE_NAME_RULE } from "../deploy/naming";
import { ConfigError, errorMessage } from "../lib/errors";

export const CONFIG_DIR = ".stageform";
export const CONFIG_FILE = "config.json";

/** Settings a stage may override on top of the root of the config file. */
const zConfigLayer = z.object({
  project: z.string().trim().min(1).optional(),
  location: z.string().trim().min(1).optional(),
  artifactBucket: z.string().trim().min(3).optional(),
  function: zFunctionOverrides.optional()
});

export const zStageOverride = zConfigLayer
  .extend({
    functionName: z.string().trim().min(1)
  })
  .strict();

export type StageOverride = z.infer<typeof zStageOverride>;

export const zConfigFile = zConfigLayer
  .extend({
    /** Application definition file, relative to the project root. */
    main: z.string().trim().min(1).optional(),
    stages: z.record(z.string().regex(STAGE_NAME_PATTERN, `Invalid stage name: ${STAGE_NAME_RULE}`), zStageOverride).default({})
  })
  .strict();

export type ConfigFile = z.infer<typeof zConfigFile>;

/** The part of the config file a `--config` JSON string may replace. */
export const zConfigOverlay = zConfigLayer.strict();

export type ConfigOverlay = z.infer<typeof zConfigOverlay>;

export function configDirPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_DIR);
}

export function configFilePath(rootDir: string): string {
  return path.join(configDirPath(rootDir), CONFIG_FILE);
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Reads `.stageform/config.json` under `rootDir`. A missing file is an empty
 * config; a malformed one is a {@link ConfigError}.
 */
export async function loadConfigFile(rootDir: string): Promise<ConfigFile> {
  const file = configFilePath(rootDir);

  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { stages: {} };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Invalid JSON in "${file}": ${errorMessage(err)}`);
  }

  const result = zConfigFile.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config in "${file}": ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

export async function writeConfigFile(rootDir: string, config: ConfigFile): Promise<void> {
  await fs.mkdir(configDirPath(rootDir), { recursive: true });
  await fs.writeFile(configFilePath(rootDir), `${JSON.stringify(config, null, 2)}\n`, "utf-8");
}

/** Parses the `--config` JSON string given to deploy. */
export function parseConfigOverlay(json: string): ConfigOverlay {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err: unknown) {
    throw new ConfigError(`Invalid --config JSON: ${errorMessage(err)}`);
  }

  const result = zConfigOverlay.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid --config: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}
