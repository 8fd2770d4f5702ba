import fs from "node:fs/promises";
import path from "node:path";
import { configDirPath } from "../config/config-file";
import type { Config } from "../config/resolve-config";
import { stageFunctionName } from "../config/stages";
import { declareResources } from "../deploy/declared";
import { buildSwaggerDocument, renderSwaggerYaml } from "../deploy/openapi-document";
import { ConfigError } from "../lib/errors";
import type { FormatConverter, OpenApiTargetVersion } from "../lib/format-converter";
import type { Logger } from "../lib/logger";
import type { ApplicationDefinition } from "../types/app-schema";

export interface OpenApiOptions {
  /** Also write an OpenAPI 3 conversion of the document. */
  version?: OpenApiTargetVersion;
}

export interface OpenApiDependencies {
  converter: FormatConverter;
  logger: Logger;
}

/**
 * Writes the Swagger 2.0 document API Gateway is configured with to
 * `.stageform/{functionName}_openapi_spec.yml`, plus an OpenAPI 3 copy when
 * asked. Returns the written paths.
 */
export async function writeOpenApiSpec(
  config: Config,
  app: ApplicationDefinition,
  options: OpenApiOptions,
  deps: OpenApiDependencies
): Promise<string[]> {
  const route = declareResources(app, config).find((d) => d.kind === "route");
  if (!route || route.kind !== "route") {
    throw new ConfigError(`"${app.name}" declares no routes; there is no API to describe.`);
  }

  const yaml = renderSwaggerYaml(buildSwaggerDocument(route.spec));
  const functionName = stageFunctionName(config, app.name);
  const dir = configDirPath(config.rootDir);
  await fs.mkdir(dir, { recursive: true });

  const written: string[] = [];
  const v2Path = path.join(dir, `${functionName}_openapi_spec.yml`);
  await fs.writeFile(v2Path, yaml, "utf-8");
  written.push(v2Path);
  deps.logger.info("Wrote OpenAPI document", { path: v2Path });

  if (options.version === "3") {
    const converted = await deps.converter.convert(yaml, "3");
    const v3Path = path.join(dir, `${functionName}_openapi_spec_3.yml`);
    await fs.writeFile(v3Path, converted, "utf-8");
    written.push(v3Path);
    deps.logger.info("Wrote OpenAPI 3 document", { path: v3Path });
  }

  return written;
}
