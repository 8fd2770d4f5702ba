import { RemoteApiError } from "./errors";
import type { Logger } from "./logger";
import { isRetryableGoogleApiError, withRetry } from "./retry";

export type OpenApiTargetVersion = "3";

/**
 * Converts an API description document to another schema version.
 */
export interface FormatConverter {
  convert(document: string, targetVersion: OpenApiTargetVersion): Promise<string>;
}

const SWAGGER_CONVERTER_URL = "https://converter.swagger.io/api/convert";

/**
 * Converts Swagger 2.0 YAML to OpenAPI 3 through the public swagger.io
 * converter service.
 */
export class SwaggerConverter implements FormatConverter {
  private readonly endpoint: string;
  private readonly logger: Logger | undefined;

  constructor(options: { endpoint?: string; logger?: Logger } = {}) {
    this.endpoint = options.endpoint ?? SWAGGER_CONVERTER_URL;
    this.logger = options.logger;
  }

  async convert(document: string, targetVersion: OpenApiTargetVersion): Promise<string> {
    const context = `OpenAPI ${targetVersion} conversion`;
    this.logger?.debug(`${context} request`, { endpoint: this.endpoint });

    return await withRetry(
      async () => {
        const res = await fetch(this.endpoint, {
          method: "POST",
          headers: {
            accept: "application/yaml",
            "content-type": "application/yaml"
          },
          body: document
        });
        const text = await res.text();
        if (!res.ok) {
          throw new RemoteApiError(context, res.status, `status=${res.status}; message=${text.slice(0, 200)}`);
        }
        return text;
      },
      {
        retries: 2,
        baseDelayMs: 250,
        maxDelayMs: 2_000,
        jitter: true,
        shouldRetry: isRetryableGoogleApiError
      }
    );
  }
}
