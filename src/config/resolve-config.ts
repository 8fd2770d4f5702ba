import path from "node:path";
import { z } from "zod";
import { assertValidStageName } from "../deploy/naming";
import type { FunctionOverrides } from "../types/app-schema";
import { MissingConfigError, UnknownStageError } from "../lib/errors";
import {
  loadConfigFile,
  parseConfigOverlay,
  zConfigOverlay,
  type ConfigFile,
  type ConfigOverlay,
  type StageOverride
} from "./config-file";
import type { DefaultProjectSource } from "./default-project";

export const DEFAULT_ENTRY_FILE = "app.yaml";

/**
 * Configuration for commands that never reach the provider. Project and
 * location may still be unknown.
 */
export interface LocalConfig {
  readonly rootDir: string;
  readonly project: string | undefined;
  readonly location: string | undefined;
  readonly activeStage: string | undefined;
  /** Absolute path of the application definition. */
  readonly entryFile: string;
  readonly stages: Readonly<Record<string, StageOverride>>;
  /** Function settings from the config file, merged over the application definition. */
  readonly function: Readonly<FunctionOverrides>;
  readonly artifactBucket: string | undefined;
}

/** Fully resolved, deeply frozen configuration for one invocation. */
export interface Config extends LocalConfig {
  readonly project: string;
  readonly location: string;
}

export interface ConfigFlags {
  project?: string;
  location?: string;
  stage?: string;
  /** `--config` JSON string; merged over the file and stage layers. */
  config?: string;
}

export interface ResolveConfigOptions {
  rootDir: string;
  flags?: ConfigFlags;
  env?: NodeJS.ProcessEnv;
  defaultProject?: DefaultProjectSource;
  /** Already loaded config file; read from `rootDir` when omitted. */
  configFile?: ConfigFile;
}

const optionalEnv = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const zConfigEnv = z.object({
  GOOGLE_PROJECT: optionalEnv,
  GOOGLE_LOCATION: optionalEnv,
  STAGE: optionalEnv
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars from the overlay replace. */
export function deepMerge(current: unknown, overlay: unknown): unknown {
  if (overlay === undefined) return current;
  if (Array.isArray(overlay)) return overlay;
  if (!isRecord(current) || !isRecord(overlay)) return overlay;

  const out: Record<string, unknown> = { ...current };
  for (const [k, v] of Object.entries(overlay)) {
    if (v === undefined) continue;
    const existing = out[k];
    out[k] = isRecord(v) && isRecord(existing) ? deepMerge(existing, v) : v;
  }
  return out;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const v of Object.values(value)) {
      deepFreeze(v);
    }
    Object.freeze(value);
  }
  return value;
}

function pickLayer(layer: ConfigOverlay): ConfigOverlay {
  return {
    project: layer.project,
    location: layer.location,
    artifactBucket: layer.artifactBucket,
    function: layer.function
  };
}

/**
 * Resolves everything that can be known without the provider.
 *
 * Precedence, highest first: flags, environment (`GOOGLE_PROJECT`,
 * `GOOGLE_LOCATION`, `STAGE`), the `--config` JSON, the active stage's
 * override, the root of `.stageform/config.json`.
 */
export async function resolveLocalConfig(options: ResolveConfigOptions): Promise<LocalConfig> {
  const rootDir = path.resolve(options.rootDir);
  const flags = options.flags ?? {};
  const env = zConfigEnv.parse({
    GOOGLE_PROJECT: options.env?.GOOGLE_PROJECT,
    GOOGLE_LOCATION: options.env?.GOOGLE_LOCATION,
    STAGE: options.env?.STAGE
  });
  const file = options.configFile ?? (await loadConfigFile(rootDir));

  const activeStage = flags.stage ?? env.STAGE;
  let stageOverride: StageOverride | undefined;
  if (activeStage !== undefined) {
    assertValidStageName(activeStage);
    stageOverride = file.stages[activeStage];
    if (!stageOverride) {
      throw new UnknownStageError(activeStage, Object.keys(file.stages));
    }
  }

  let merged: unknown = pickLayer(file);
  if (stageOverride) merged = deepMerge(merged, pickLayer(stageOverride));
  if (flags.config) merged = deepMerge(merged, parseConfigOverlay(flags.config));
  const layer = zConfigOverlay.parse(merged);

  return deepFreeze({
    rootDir,
    project: flags.project ?? env.GOOGLE_PROJECT ?? layer.project,
    location: flags.location ?? env.GOOGLE_LOCATION ?? layer.location,
    activeStage,
    entryFile: path.resolve(rootDir, file.main ?? DEFAULT_ENTRY_FILE),
    stages: file.stages,
    function: layer.function ?? {},
    artifactBucket: layer.artifactBucket
  });
}

/**
 * Resolves the configuration remote commands need. Falls back to the local
 * gcloud project, then fails fast on a missing project or location.
 */
export async function resolveConfig(options: ResolveConfigOptions): Promise<Config> {
  const local = await resolveLocalConfig(options);

  const project = local.project ?? (await options.defaultProject?.defaultProject());
  if (!project) {
    throw new MissingConfigError(
      "project",
      'Pass --project, set GOOGLE_PROJECT, add "project" to .stageform/config.json, or run: gcloud config set project PROJECT'
    );
  }
  if (!local.location) {
    throw new MissingConfigError(
      "location",
      'Pass --location, set GOOGLE_LOCATION, or add "location" to .stageform/config.json.'
    );
  }

  return deepFreeze({ ...local, project, location: local.location });
}
