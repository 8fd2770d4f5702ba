import fs from "node:fs";
import path from "node:path";
import { GoogleAuth } from "google-auth-library";
import { z } from "zod";
import { ConfigError } from "../lib/errors";

/**
 * Scopes needed to manage Cloud Functions, API Gateway, Pub/Sub, Cloud
 * Scheduler, Cloud Run and Cloud Storage. Every one of those APIs accepts the
 * broad cloud-platform scope.
 */
export const CLOUD_SCOPES: readonly string[] = ["https://www.googleapis.com/auth/cloud-platform"];

const EnvSchema = z.object({
  STAGEFORM_CREDENTIALS_PATH: z.string().trim().min(1).optional(),
  // Optional override for scopes (comma/space-separated).
  STAGEFORM_SCOPES: z.string().trim().min(1).optional(),
  // Standard Google env var supported by google-auth-library.
  GOOGLE_APPLICATION_CREDENTIALS: z.string().trim().min(1).optional()
});

export interface CreateGoogleAuthOptions {
  /**
   * OAuth scopes to request.
   * Defaults to {@link CLOUD_SCOPES}.
   */
  scopes?: readonly string[];

  /**
   * Optional absolute path to a service-account JSON key file.
   * When omitted, Application Default Credentials (ADC) are used.
   */
  keyFilePath?: string;

  env?: NodeJS.ProcessEnv;
}

/**
 * Creates a GoogleAuth client for the Cloud APIs stageform drives.
 *
 * The key file comes from `keyFilePath`, `STAGEFORM_CREDENTIALS_PATH` or
 * `GOOGLE_APPLICATION_CREDENTIALS`, in that order. If none is set, this falls
 * back to Application Default Credentials (ADC).
 */
export function createGoogleAuth(options: CreateGoogleAuthOptions = {}): GoogleAuth {
  const source = options.env ?? process.env;
  const env = EnvSchema.parse({
    STAGEFORM_CREDENTIALS_PATH: source.STAGEFORM_CREDENTIALS_PATH,
    STAGEFORM_SCOPES: source.STAGEFORM_SCOPES,
    GOOGLE_APPLICATION_CREDENTIALS: source.GOOGLE_APPLICATION_CREDENTIALS
  });

  const scopesFromEnv = env.STAGEFORM_SCOPES
    ? env.STAGEFORM_SCOPES
        .split(/[,\s]+/g)
        .map((s) => s.trim())
        .filter(Boolean)
    : undefined;

  const scopes = options.scopes ?? scopesFromEnv ?? CLOUD_SCOPES;
  const keyFilePath = options.keyFilePath ?? env.STAGEFORM_CREDENTIALS_PATH ?? env.GOOGLE_APPLICATION_CREDENTIALS;

  if (!keyFilePath) {
    return new GoogleAuth({ scopes: [...scopes] });
  }

  if (!path.isAbsolute(keyFilePath)) {
    throw new ConfigError(
      `Service account key path must be absolute: "${keyFilePath}". ` +
        `Set STAGEFORM_CREDENTIALS_PATH (or GOOGLE_APPLICATION_CREDENTIALS) to an absolute path.`
    );
  }

  const stat = fs.statSync(keyFilePath, { throwIfNoEntry: false });
  if (!stat) {
    throw new ConfigError(`Service account key file not found at "${keyFilePath}".`);
  }
  if (!stat.isFile()) {
    throw new ConfigError(`Service account key path is not a file: "${keyFilePath}".`);
  }

  return new GoogleAuth({
    keyFile: keyFilePath,
    scopes: [...scopes]
  });
}
