import type { apigateway_v1 } from "googleapis";
import { isAlreadyExistsError } from "../lib/api-errors";
import { locationPath, type Page } from "../lib/cloud-api";
import { sha256HexFromString, shortDigest } from "../deploy/hash";
import { buildSwaggerDocument, renderSwaggerYaml } from "../deploy/openapi-document";
import type { DeclaredOf, RemoteResource } from "../types/resources";
import { BaseHandler, ignoreNotFound } from "./handler";

export const CONFIG_LABEL = "stageform-config";

const MAX_ID_LENGTH = 63;
const CONFIG_DIGEST_LENGTH = 8;

type Gateway = apigateway_v1.Schema$ApigatewayGateway;

/**
 * Config ids are immutable snapshots of the document: a new document gets a
 * new id, the same document always maps to the same one.
 */
export function apiConfigId(remoteName: string, documentYaml: string): string {
  const digest = shortDigest(sha256HexFromString(documentYaml), CONFIG_DIGEST_LENGTH);
  const base = remoteName.slice(0, MAX_ID_LENGTH - CONFIG_DIGEST_LENGTH - 1).replace(/-+$/, "");
  return `${base}-${digest}`;
}

/**
 * API Gateway routes. One declared route set becomes an API (global), an API
 * config holding the Swagger document, and a regional gateway serving it,
 * all named `{app}[-{stage}]`.
 */
export class RouteHandler extends BaseHandler<"route"> {
  readonly kind = "route" as const;

  protected listPage(pageToken?: string): Promise<Page<Gateway>> {
    return this.cloud.listGateways(this.gatewayParent(), pageToken);
  }

  protected fetch(declared: DeclaredOf<"route">): Promise<Gateway | undefined> {
    return this.cloud.getGateway(this.gatewayPath(declared.remoteName));
  }

  protected idOf(state: Gateway): string | undefined {
    return state.name ?? undefined;
  }

  protected owns(baseName: string): boolean {
    return baseName === this.env.appName;
  }

  desiredState(declared: DeclaredOf<"route">): Gateway {
    const configId = apiConfigId(declared.remoteName, this.documentYaml(declared));
    return {
      displayName: declared.remoteName,
      apiConfig: `${this.apiPath(declared.remoteName)}/configs/${configId}`,
      labels: { [CONFIG_LABEL]: configId }
    };
  }

  protected async insert(declared: DeclaredOf<"route">): Promise<void> {
    const apiPath = this.apiPath(declared.remoteName);
    if (!(await this.cloud.getApi(apiPath))) {
      await this.cloud.createApi(locationPath(this.env.project, "global"), declared.remoteName, {
        displayName: declared.remoteName
      });
    }
    await this.ensureApiConfig(declared);
    await this.cloud.createGateway(this.gatewayParent(), declared.remoteName, this.desiredState(declared));
  }

  async update(remote: RemoteResource<"route">, declared: DeclaredOf<"route">): Promise<void> {
    const configName = await this.ensureApiConfig(declared);
    await this.cloud.updateGateway(remote.id, this.desiredState(declared));
    await this.deleteStaleConfigs(this.apiPath(declared.remoteName), configName);
  }

  protected async remove(remote: RemoteResource<"route">): Promise<void> {
    const apiPath = this.apiPath(remote.name);
    await ignoreNotFound(() => this.cloud.deleteGateway(remote.id));
    await this.deleteStaleConfigs(apiPath, undefined);
    await ignoreNotFound(() => this.cloud.deleteApi(apiPath));
  }

  private documentYaml(declared: DeclaredOf<"route">): string {
    return renderSwaggerYaml(buildSwaggerDocument(declared.spec));
  }

  /** Creates the config for the current document unless it already exists. */
  private async ensureApiConfig(declared: DeclaredOf<"route">): Promise<string> {
    const yaml = this.documentYaml(declared);
    const configId = apiConfigId(declared.remoteName, yaml);
    const apiPath = this.apiPath(declared.remoteName);

    try {
      await this.cloud.createApiConfig(apiPath, configId, {
        displayName: configId,
        openapiDocuments: [
          {
            document: {
              path: "openapi.yaml",
              contents: Buffer.from(yaml, "utf-8").toString("base64")
            }
          }
        ]
      });
    } catch (err: unknown) {
      if (!isAlreadyExistsError(err)) {
        throw err;
      }
      this.logger.debug("API config already exists", { config: configId });
    }
    return `${apiPath}/configs/${configId}`;
  }

  private async deleteStaleConfigs(apiPath: string, keep: string | undefined): Promise<void> {
    const configs = await this.cloud.listApiConfigs(apiPath);
    for (const config of configs) {
      const name = config.name;
      if (!name || name === keep) continue;
      await ignoreNotFound(() => this.cloud.deleteApiConfig(name));
      this.logger.debug("Deleted API config", { config: name });
    }
  }

  private apiPath(name: string): string {
    return `${locationPath(this.env.project, "global")}/apis/${name}`;
  }

  private gatewayParent(): string {
    return locationPath(this.env.project, this.env.location);
  }

  private gatewayPath(name: string): string {
    return `${this.gatewayParent()}/gateways/${name}`;
  }
}
