import type { pubsub_v1 } from "googleapis";
import { projectPath, type Page } from "../lib/cloud-api";
import type { DeclaredOf, RemoteResource } from "../types/resources";
import { BaseHandler } from "./handler";

type Subscription = pubsub_v1.Schema$Subscription;

/** Pub/Sub push subscriptions delivering a topic to the function, `{app}-{name}[-{stage}]`. */
export class TopicHandler extends BaseHandler<"topic"> {
  readonly kind = "topic" as const;

  protected listPage(pageToken?: string): Promise<Page<Subscription>> {
    return this.cloud.listSubscriptions(projectPath(this.env.project), pageToken);
  }

  protected fetch(declared: DeclaredOf<"topic">): Promise<Subscription | undefined> {
    return this.cloud.getSubscription(this.subscriptionPath(declared.remoteName));
  }

  protected idOf(state: Subscription): string | undefined {
    return state.name ?? undefined;
  }

  protected owns(baseName: string): boolean {
    return baseName.startsWith(`${this.env.appName}-`);
  }

  desiredState(declared: DeclaredOf<"topic">): Subscription {
    return {
      name: this.subscriptionPath(declared.remoteName),
      topic: declared.spec.topic,
      pushConfig: { pushEndpoint: declared.spec.pushEndpoint },
      ackDeadlineSeconds: declared.spec.ackDeadlineSeconds,
      filter: declared.spec.filter
    };
  }

  conflicts(remote: RemoteResource<"topic">, declared: DeclaredOf<"topic">): string[] {
    const out: string[] = [];
    if (remote.state.topic && remote.state.topic !== declared.spec.topic) {
      out.push(`subscribed to "${remote.state.topic}", declared "${declared.spec.topic}"`);
    }
    if ((remote.state.filter ?? "") !== (declared.spec.filter ?? "")) {
      out.push("the subscription filter cannot change");
    }
    return out;
  }

  protected async insert(declared: DeclaredOf<"topic">): Promise<void> {
    const body = this.desiredState(declared);
    await this.cloud.createSubscription(this.subscriptionPath(declared.remoteName), body);
  }

  async update(remote: RemoteResource<"topic">, declared: DeclaredOf<"topic">): Promise<void> {
    const desired = this.desiredState(declared);
    // Only the mutable fields go into the patch.
    await this.cloud.updateSubscription(remote.id, {
      name: remote.id,
      pushConfig: desired.pushConfig,
      ackDeadlineSeconds: desired.ackDeadlineSeconds
    });
  }

  protected async remove(remote: RemoteResource<"topic">): Promise<void> {
    await this.cloud.deleteSubscription(remote.id);
  }

  private subscriptionPath(name: string): string {
    return `${projectPath(this.env.project)}/subscriptions/${name}`;
  }
}
