import type { DeclaredOf, DeclaredResource, ResourceKind } from "../types/resources";
import { FunctionHandler } from "./function-handler";
import type { HandlerEnvironment, ResourceHandler } from "./handler";
import { JobHandler } from "./job-handler";
import { RouteHandler } from "./route-handler";
import { ScheduleHandler } from "./schedule-handler";
import { StorageHandler } from "./storage-handler";
import { TopicHandler } from "./topic-handler";

export type HandlerRegistry = { [K in ResourceKind]: ResourceHandler<K> };

export function createHandlerRegistry(env: HandlerEnvironment): HandlerRegistry {
  return {
    function: new FunctionHandler(env),
    storage: new StorageHandler(env),
    route: new RouteHandler(env),
    topic: new TopicHandler(env),
    schedule: new ScheduleHandler(env),
    job: new JobHandler(env)
  };
}

export function handlerFor<K extends ResourceKind>(registry: HandlerRegistry, kind: K): ResourceHandler<K> {
  return registry[kind];
}

/** A declared resource together with the handler that manages it. */
export interface BoundResource<K extends ResourceKind = ResourceKind> {
  declared: DeclaredOf<K>;
  handler: ResourceHandler<K>;
}

/**
 * Calls `visit` with the declared resource and the handler of its kind.
 * Adding a kind without a case here is a compile error.
 */
export function withHandler<R>(
  registry: HandlerRegistry,
  declared: DeclaredResource,
  visit: <K extends ResourceKind>(bound: BoundResource<K>) => R
): R {
  switch (declared.kind) {
    case "function":
      return visit({ declared, handler: registry.function });
    case "storage":
      return visit({ declared, handler: registry.storage });
    case "route":
      return visit({ declared, handler: registry.route });
    case "topic":
      return visit({ declared, handler: registry.topic });
    case "schedule":
      return visit({ declared, handler: registry.schedule });
    case "job":
      return visit({ declared, handler: registry.job });
    default: {
      const unreachable: never = declared;
      throw new Error(`Unhandled resource kind: ${JSON.stringify(unreachable)}`);
    }
  }
}
