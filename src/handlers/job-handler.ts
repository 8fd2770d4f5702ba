import type { run_v2 } from "googleapis";
import { locationPath, type Page } from "../lib/cloud-api";
import type { DeclaredOf, JobSpec, RemoteResource } from "../types/resources";
import { BaseHandler } from "./handler";

type RunJob = run_v2.Schema$GoogleCloudRunV2Job;

export function runJobTemplate(spec: Readonly<JobSpec>): run_v2.Schema$GoogleCloudRunV2ExecutionTemplate {
  return {
    taskCount: spec.taskCount,
    template: {
      maxRetries: spec.maxRetries,
      timeout: `${spec.timeoutSeconds}s`,
      containers: [
        {
          image: spec.image,
          command: [...spec.command],
          args: [...spec.args],
          env: Object.entries(spec.env)
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([name, value]) => ({ name, value }))
        }
      ]
    }
  };
}

/** Cloud Run jobs, `{app}-{name}[-{stage}]`. */
export class JobHandler extends BaseHandler<"job"> {
  readonly kind = "job" as const;

  protected listPage(pageToken?: string): Promise<Page<RunJob>> {
    return this.cloud.listRunJobs(this.parent(), pageToken);
  }

  protected fetch(declared: DeclaredOf<"job">): Promise<RunJob | undefined> {
    return this.cloud.getRunJob(this.jobPath(declared.remoteName));
  }

  protected idOf(state: RunJob): string | undefined {
    return state.name ?? undefined;
  }

  protected owns(baseName: string): boolean {
    return baseName.startsWith(`${this.env.appName}-`);
  }

  // Cloud Run takes the job id as a parameter; the body carries no name.
  desiredState(declared: DeclaredOf<"job">): RunJob {
    return { template: runJobTemplate(declared.spec) };
  }

  protected async insert(declared: DeclaredOf<"job">): Promise<void> {
    await this.cloud.createRunJob(this.parent(), declared.remoteName, this.desiredState(declared));
  }

  async update(remote: RemoteResource<"job">, declared: DeclaredOf<"job">): Promise<void> {
    await this.cloud.updateRunJob(remote.id, this.desiredState(declared));
  }

  protected async remove(remote: RemoteResource<"job">): Promise<void> {
    await this.cloud.deleteRunJob(remote.id);
  }

  private parent(): string {
    return locationPath(this.env.project, this.env.location);
  }

  private jobPath(name: string): string {
    return `${this.parent()}/jobs/${name}`;
  }
}
