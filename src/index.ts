export { deploy, resolveScope, entryLabel } from "./deploy/deploy";
export type { DeployDependencies, DeployOptions, DeployPhase, DeployResult, DeployScope, PlanEntry } from "./deploy/deploy";
export { syncStage, computeOrphans, discoverOwned } from "./deploy/sync";
export type { ReconcileDependencies, SyncResult } from "./deploy/sync";
export { destroyStage } from "./deploy/destroy";
export type { DestroyOptions, DestroyResult } from "./deploy/destroy";
export { declareResources } from "./deploy/declared";

export { resolveConfig, resolveLocalConfig } from "./config/resolve-config";
export type { Config, ConfigFlags, LocalConfig, ResolveConfigOptions } from "./config/resolve-config";
export { loadConfigFile, writeConfigFile } from "./config/config-file";
export type { ConfigFile } from "./config/config-file";
export { createStage, listStages, stageFunctionName } from "./config/stages";
export { GcloudDefaultProject } from "./config/default-project";
export { createGoogleAuth } from "./config/auth";

export { loadApplicationDefinition } from "./app/load-app";
export { runJobLocally } from "./app/run-job";
export { writeOpenApiSpec } from "./app/openapi";
export { serveLocally } from "./app/local";
export { packageSource } from "./app/package-source";
export { initProject } from "./app/init";

export { createHandlerRegistry, handlerFor } from "./handlers/registry";
export type { HandlerRegistry } from "./handlers/registry";
export { GoogleCloudClient } from "./lib/google-cloud-client";
export type { CloudApi } from "./lib/cloud-api";
export { createLogger, createLoggerFromEnv, silentLogger } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";
export * from "./lib/errors";

export type { ApplicationDefinition } from "./types/app-schema";
export { RESOURCE_KINDS } from "./types/resources";
export type { DeclaredResource, RemoteResource, ResourceKind } from "./types/resources";
