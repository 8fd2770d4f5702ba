import fs from "node:fs/promises";
import path from "node:path";
import { sha256HexFromBuffer } from "../deploy/hash";
import { LocalEnvironmentError } from "./errors";
import type { ProcessLauncher } from "./process-launcher";

export interface PackageRequest {
  /** Directory whose contents become the archive root. */
  sourceDir: string;
  /** Where the archive is written. */
  outFile: string;
}

export interface PackagedArtifact {
  path: string;
  archive: Buffer;
  sha256: string;
}

/**
 * Produces the deployable source archive for the function-backed kinds.
 */
export interface ArtifactPackager {
  package(request: PackageRequest): Promise<PackagedArtifact>;
}

const DEFAULT_EXCLUDES = [".stageform/*", ".git/*", "node_modules/*", "*.zip", ".env"];

/**
 * Zips the source directory with the `zip` executable.
 */
export class ZipPackager implements ArtifactPackager {
  constructor(
    private readonly launcher: ProcessLauncher,
    private readonly excludes: readonly string[] = DEFAULT_EXCLUDES
  ) {}

  async package(request: PackageRequest): Promise<PackagedArtifact> {
    const sourceDir = path.resolve(request.sourceDir);
    const stat = await fs.stat(sourceDir).catch(() => undefined);
    if (!stat?.isDirectory()) {
      throw new LocalEnvironmentError(`Missing source directory "${sourceDir}".`);
    }

    await fs.mkdir(path.dirname(request.outFile), { recursive: true });
    await fs.rm(request.outFile, { force: true });

    const result = await this.launcher.run({
      command: "zip",
      args: ["-r", "-q", "-X", request.outFile, ".", "-x", ...this.excludes],
      cwd: sourceDir
    });
    if (result.exitCode !== 0) {
      throw new LocalEnvironmentError(
        `zip exited with code ${result.exitCode} while packaging "${sourceDir}": ${result.stderr.trim()}`
      );
    }

    const archive = await fs.readFile(request.outFile);
    return { path: request.outFile, archive, sha256: sha256HexFromBuffer(archive) };
  }
}
