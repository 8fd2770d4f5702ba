import { z } from "zod";

/**
 * Names that end up inside remote resource identifiers.
 *
 * Cloud Functions, API Gateway, Cloud Scheduler and Cloud Run all accept
 * lowercase letters, digits and hyphens; a leading letter is required.
 */
export const zResourceName = z
  .string()
  .trim()
  .regex(/^[a-z][a-z0-9-]*[a-z0-9]$|^[a-z]$/, "Use lowercase letters, digits and hyphens; start with a letter.");

export const zFunctionSettings = z
  .object({
    runtime: z.string().trim().min(1).default("nodejs20"),
    entryPoint: z.string().trim().min(1).default("handler"),
    memoryMb: z.number().int().positive().default(256),
    timeoutSeconds: z.number().int().min(1).max(540).default(60),
    environmentVariables: z.record(z.string().min(1), z.string()).default({}),
    labels: z.record(z.string().min(1), z.string()).default({}),
    serviceAccount: z.string().trim().min(1).optional(),
    source: z.string().trim().min(1).default(".")
  })
  .strict();

export type FunctionSettings = z.infer<typeof zFunctionSettings>;

/**
 * Function settings as they appear in config-file and stage overlays: every
 * field optional, merged over the application definition.
 */
export const zFunctionOverrides = zFunctionSettings.partial().strict();

export type FunctionOverrides = z.infer<typeof zFunctionOverrides>;

export const zHttpMethod = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS", "HEAD"]);

export type HttpMethod = z.infer<typeof zHttpMethod>;

export const zRouteDefinition = z
  .object({
    path: z.string().trim().startsWith("/"),
    methods: z.array(zHttpMethod).min(1).default(["GET"]),
    operationId: z.string().trim().min(1).optional(),
    description: z.string().trim().min(1).optional()
  })
  .strict();

export type RouteDefinition = z.infer<typeof zRouteDefinition>;

export const zTopicSubscription = z
  .object({
    name: zResourceName,
    topic: z.string().trim().min(1),
    ackDeadlineSeconds: z.number().int().min(10).max(600).default(10),
    filter: z.string().trim().min(1).optional()
  })
  .strict();

export type TopicSubscription = z.infer<typeof zTopicSubscription>;

export const zScheduleDefinition = z
  .object({
    name: zResourceName,
    schedule: z.string().trim().min(1),
    timezone: z.string().trim().min(1).default("UTC"),
    httpMethod: zHttpMethod.default("GET"),
    headers: z.record(z.string().min(1), z.string()).default({}),
    body: z.string().optional(),
    description: z.string().trim().min(1).optional()
  })
  .strict();

export type ScheduleDefinition = z.infer<typeof zScheduleDefinition>;

export const zStorageEvent = z.enum(["finalize", "delete", "archive", "metadataUpdate"]);

export type StorageEvent = z.infer<typeof zStorageEvent>;

export const zStorageTrigger = z
  .object({
    name: zResourceName,
    bucket: z.string().trim().min(3),
    event: zStorageEvent.default("finalize"),
    entryPoint: z.string().trim().min(1).optional()
  })
  .strict();

export type StorageTrigger = z.infer<typeof zStorageTrigger>;

export const zJobDefinition = z
  .object({
    name: zResourceName,
    image: z.string().trim().min(1),
    command: z.array(z.string().min(1)).min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string().min(1), z.string()).default({}),
    taskCount: z.number().int().min(1).default(1),
    maxRetries: z.number().int().min(0).default(3),
    timeoutSeconds: z.number().int().min(1).default(600)
  })
  .strict();

export type JobDefinition = z.infer<typeof zJobDefinition>;

/**
 * Declarative application definition (the entry-point file, `app.yaml` by default).
 *
 * `name` is the base every remote name is derived from. Routes, topics,
 * schedules and storage triggers all call into the function, so they require
 * one.
 */
export const zApplicationDefinition = z
  .object({
    name: zResourceName,
    function: zFunctionSettings.optional(),
    routes: z.array(zRouteDefinition).default([]),
    topics: z.array(zTopicSubscription).default([]),
    schedules: z.array(zScheduleDefinition).default([]),
    storage: z.array(zStorageTrigger).default([]),
    jobs: z.array(zJobDefinition).default([])
  })
  .strict()
  .refine(
    (app) =>
      Boolean(app.function) ||
      (app.routes.length === 0 && app.topics.length === 0 && app.schedules.length === 0 && app.storage.length === 0),
    { message: "routes, topics, schedules and storage triggers require a `function` section." }
  );

export type ApplicationDefinition = z.infer<typeof zApplicationDefinition>;
