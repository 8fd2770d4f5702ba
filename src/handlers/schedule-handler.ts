import type { cloudscheduler_v1 } from "googleapis";
import { locationPath, type Page } from "../lib/cloud-api";
import type { DeclaredOf, RemoteResource } from "../types/resources";
import { BaseHandler } from "./handler";

type SchedulerJob = cloudscheduler_v1.Schema$Job;

/** Headers that tell the function which trigger invoked it. */
export const TRIGGER_TYPE_HEADER = "X-Stageform-Type";
export const TRIGGER_NAME_HEADER = "X-Stageform-Name";

/** Cloud Scheduler jobs calling the function over HTTP, `{app}-{name}[-{stage}]`. */
export class ScheduleHandler extends BaseHandler<"schedule"> {
  readonly kind = "schedule" as const;

  protected listPage(pageToken?: string): Promise<Page<SchedulerJob>> {
    return this.cloud.listSchedulerJobs(this.parent(), pageToken);
  }

  protected fetch(declared: DeclaredOf<"schedule">): Promise<SchedulerJob | undefined> {
    return this.cloud.getSchedulerJob(this.jobPath(declared.remoteName));
  }

  protected idOf(state: SchedulerJob): string | undefined {
    return state.name ?? undefined;
  }

  protected owns(baseName: string): boolean {
    return baseName.startsWith(`${this.env.appName}-`);
  }

  desiredState(declared: DeclaredOf<"schedule">): SchedulerJob {
    const spec = declared.spec;
    return {
      name: this.jobPath(declared.remoteName),
      description: spec.description,
      schedule: spec.schedule,
      timeZone: spec.timezone,
      httpTarget: {
        uri: spec.targetUri,
        httpMethod: spec.httpMethod,
        headers: {
          ...spec.headers,
          [TRIGGER_TYPE_HEADER]: "schedule",
          [TRIGGER_NAME_HEADER]: spec.scheduleName
        },
        body: spec.body !== undefined ? Buffer.from(spec.body, "utf-8").toString("base64") : undefined,
        oidcToken: spec.serviceAccount
          ? { serviceAccountEmail: spec.serviceAccount, audience: spec.targetUri }
          : undefined
      }
    };
  }

  protected async insert(declared: DeclaredOf<"schedule">): Promise<void> {
    await this.cloud.createSchedulerJob(this.parent(), this.desiredState(declared));
  }

  async update(remote: RemoteResource<"schedule">, declared: DeclaredOf<"schedule">): Promise<void> {
    await this.cloud.updateSchedulerJob(remote.id, this.desiredState(declared));
  }

  protected async remove(remote: RemoteResource<"schedule">): Promise<void> {
    await this.cloud.deleteSchedulerJob(remote.id);
  }

  private parent(): string {
    return locationPath(this.env.project, this.env.location);
  }

  private jobPath(name: string): string {
    return `${this.parent()}/jobs/${name}`;
  }
}
