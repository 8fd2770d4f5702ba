import { z } from "zod";
import type { LocalConfig } from "../config/resolve-config";
import { prefixedBaseName } from "../deploy/declared";
import { remoteName } from "../deploy/naming";
import { ConfigError, LocalEnvironmentError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { LaunchResult, ProcessLauncher } from "../lib/process-launcher";
import type { ApplicationDefinition, JobDefinition } from "../types/app-schema";

export interface RunJobOptions {
  jobName: string;
  /** Task index; falls back to `CLOUD_RUN_TASK_INDEX`, then 0. */
  taskId?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunJobDependencies {
  launcher: ProcessLauncher;
  logger: Logger;
}

const zTaskIndex = z.coerce.number().int().min(0);

/**
 * Variables Cloud Run sets for every task, so job code behaves the same
 * locally as remotely.
 */
export function jobTaskEnvironment(
  job: JobDefinition,
  jobRemoteName: string,
  taskIndex: number
): Record<string, string> {
  return {
    ...job.env,
    CLOUD_RUN_JOB: jobRemoteName,
    CLOUD_RUN_TASK_INDEX: String(taskIndex),
    CLOUD_RUN_TASK_COUNT: String(job.taskCount)
  };
}

/** Runs one task of a declared job on this machine. */
export async function runJobLocally(
  config: LocalConfig,
  app: ApplicationDefinition,
  options: RunJobOptions,
  deps: RunJobDependencies
): Promise<LaunchResult> {
  const job = app.jobs.find((j) => j.name === options.jobName);
  if (!job) {
    const known = app.jobs.map((j) => j.name);
    throw new ConfigError(
      `Unknown job "${options.jobName}" (declared jobs: ${known.length ? known.join(", ") : "none"}).`
    );
  }

  const rawIndex = options.taskId ?? options.env?.CLOUD_RUN_TASK_INDEX ?? "0";
  const parsed = zTaskIndex.safeParse(rawIndex);
  if (!parsed.success) {
    throw new ConfigError(`Invalid task id "${rawIndex}": expected a non-negative integer.`);
  }
  const taskIndex = parsed.data;
  if (taskIndex >= job.taskCount) {
    throw new ConfigError(`Task id ${taskIndex} is out of range; job "${job.name}" has ${job.taskCount} task(s).`);
  }

  const [command, ...commandArgs] = job.command;
  if (!command) {
    throw new ConfigError(`Job "${job.name}" has an empty command.`);
  }

  const jobRemoteName = remoteName(prefixedBaseName(app.name, job.name), config.activeStage);
  deps.logger.info("Running job task locally", { job: jobRemoteName, task: taskIndex });

  const result = await deps.launcher.run({
    command,
    args: [...commandArgs, ...job.args],
    cwd: config.rootDir,
    env: jobTaskEnvironment(job, jobRemoteName, taskIndex),
    stdio: "inherit"
  });
  if (result.exitCode !== 0) {
    throw new LocalEnvironmentError(`Job "${job.name}" task ${taskIndex} exited with code ${result.exitCode}.`);
  }
  return result;
}
