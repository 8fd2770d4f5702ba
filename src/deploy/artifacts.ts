import type { CloudApi } from "../lib/cloud-api";
import type { Logger } from "../lib/logger";
import type { StagedArtifact } from "../types/resources";
import { remoteName } from "./naming";

const ARTIFACT_ROOT = "stageform";
const ARCHIVE_CONTENT_TYPE = "application/zip";

export interface ArtifactStoreConfig {
  project: string;
  location: string;
  artifactBucket: string | undefined;
}

export function artifactBucketName(config: ArtifactStoreConfig): string {
  return config.artifactBucket ?? `${config.project}-stageform-artifacts`;
}

/** Every archive of one application stage lives under this object prefix. */
export function artifactPrefix(appName: string, stage: string | undefined): string {
  return `${ARTIFACT_ROOT}/${remoteName(appName, stage)}/`;
}

export function sourceArchiveUrl(artifact: StagedArtifact): string {
  return `gs://${artifact.bucket}/${artifact.objectName}`;
}

/**
 * Stores content-addressed source archives in Cloud Storage. Functions read
 * their code from these objects, so an unchanged archive never moves.
 */
export class ArtifactStore {
  constructor(
    private readonly cloud: CloudApi,
    private readonly config: ArtifactStoreConfig,
    private readonly logger: Logger
  ) {}

  locate(appName: string, stage: string | undefined, sha256: string): StagedArtifact {
    return {
      bucket: artifactBucketName(this.config),
      objectName: `${artifactPrefix(appName, stage)}${sha256}.zip`,
      sha256
    };
  }

  async upload(artifact: StagedArtifact, archive: Buffer): Promise<void> {
    if (!(await this.cloud.bucketExists(artifact.bucket))) {
      this.logger.info("Creating artifact bucket", { bucket: artifact.bucket, location: this.config.location });
      await this.cloud.createBucket(this.config.project, artifact.bucket, this.config.location);
    }
    await this.cloud.uploadObject(artifact.bucket, artifact.objectName, archive, ARCHIVE_CONTENT_TYPE);
    this.logger.info("Uploaded source archive", { url: sourceArchiveUrl(artifact) });
  }

  async list(appName: string, stage: string | undefined): Promise<string[]> {
    const bucket = artifactBucketName(this.config);
    if (!(await this.cloud.bucketExists(bucket))) {
      return [];
    }

    const prefix = artifactPrefix(appName, stage);
    const names: string[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.cloud.listObjects(bucket, prefix, pageToken);
      for (const obj of page.items) {
        if (obj.name) names.push(obj.name);
      }
      pageToken = page.nextPageToken;
    } while (pageToken);
    return names;
  }

  /** Deletes every stored archive of the stage and returns the object names. */
  async purge(appName: string, stage: string | undefined): Promise<string[]> {
    const bucket = artifactBucketName(this.config);
    const names = await this.list(appName, stage);
    for (const name of names) {
      await this.cloud.deleteObject(bucket, name);
      this.logger.debug("Deleted source archive", { url: `gs://${bucket}/${name}` });
    }
    return names;
  }
}
