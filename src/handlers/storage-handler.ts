import type { cloudfunctions_v1 } from "googleapis";
import type { DeclaredOf, RemoteResource } from "../types/resources";
import type { HandlerContext } from "./handler";
import { CloudFunctionHandler, cloudFunctionBody } from "./function-handler";

export function storageEventType(event: string): string {
  return `google.storage.object.${event}`;
}

export function bucketResource(bucket: string): string {
  return `projects/_/buckets/${bucket}`;
}

/** Functions triggered by Cloud Storage events, `{app}-storage-{trigger}-{event}[-{stage}]`. */
export class StorageHandler extends CloudFunctionHandler<"storage"> {
  readonly kind = "storage" as const;

  protected owns(baseName: string): boolean {
    return baseName.startsWith(`${this.env.appName}-storage-`);
  }

  desiredState(declared: DeclaredOf<"storage">, ctx: HandlerContext): cloudfunctions_v1.Schema$CloudFunction {
    return {
      ...cloudFunctionBody(this.env.project, this.env.location, declared.remoteName, declared.spec, ctx),
      eventTrigger: {
        eventType: storageEventType(declared.spec.event),
        resource: bucketResource(declared.spec.bucket)
      }
    };
  }

  conflicts(remote: RemoteResource<"storage">, declared: DeclaredOf<"storage">): string[] {
    const trigger = remote.state.eventTrigger;
    if (!trigger) {
      return ["deployed as an HTTP function; the trigger type of a function cannot change"];
    }

    const out: string[] = [];
    const bucket = bucketResource(declared.spec.bucket);
    if (trigger.resource && trigger.resource !== bucket) {
      out.push(`triggered by "${trigger.resource}", declared "${bucket}"`);
    }
    const eventType = storageEventType(declared.spec.event);
    if (trigger.eventType && trigger.eventType !== eventType) {
      out.push(`event type "${trigger.eventType}", declared "${eventType}"`);
    }
    return out;
  }
}
