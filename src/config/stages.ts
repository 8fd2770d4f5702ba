import { remoteName, assertValidStageName } from "../deploy/naming";
import { ConfigError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { loadConfigFile, writeConfigFile } from "./config-file";

/**
 * Name of the stage's function. The deployed name is always derived from the
 * application name; a `functionName` recorded in the config file must match it.
 */
export function stageFunctionName(
  config: { stages: Readonly<Record<string, { functionName: string }>>; activeStage: string | undefined },
  appName: string
): string {
  const stage = config.activeStage;
  const derived = remoteName(appName, stage);
  const recorded = stage ? config.stages[stage]?.functionName : undefined;
  if (recorded !== undefined && recorded !== derived) {
    throw new ConfigError(
      `Stage "${stage}" records functionName "${recorded}" but deploys "${derived}". Fix .stageform/config.json.`
    );
  }
  return derived;
}

export async function listStages(rootDir: string): Promise<string[]> {
  const file = await loadConfigFile(rootDir);
  return Object.keys(file.stages).sort((a, b) => a.localeCompare(b));
}

export type CreateStageResult =
  | { status: "created"; stage: string; functionName: string }
  | { status: "exists"; stage: string; functionName: string };

/**
 * Adds a stage to `.stageform/config.json`. An existing stage is reported and
 * left untouched.
 */
export async function createStage(
  rootDir: string,
  stage: string,
  appName: string,
  logger?: Logger
): Promise<CreateStageResult> {
  assertValidStageName(stage);

  const file = await loadConfigFile(rootDir);
  const existing = file.stages[stage];
  if (existing) {
    logger?.warn("Stage already exists", { stage, functionName: existing.functionName });
    return { status: "exists", stage, functionName: existing.functionName };
  }

  const functionName = remoteName(appName, stage);
  await writeConfigFile(rootDir, {
    ...file,
    stages: { ...file.stages, [stage]: { functionName } }
  });
  logger?.info("Stage created", { stage, functionName });
  return { status: "created", stage, functionName };
}
