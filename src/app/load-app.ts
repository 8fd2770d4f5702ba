import fs from "node:fs/promises";
import path from "node:path";
import { parseDocument } from "yaml";
import { zApplicationDefinition, type ApplicationDefinition } from "../types/app-schema";
import { ConfigError, LocalEnvironmentError, errorMessage } from "../lib/errors";

function resolvePathWithinRoot(rootDir: string, inputPath: string): string {
  const root = path.resolve(rootDir);
  const rootWithSep = root.endsWith(path.sep) ? root : `${root}${path.sep}`;

  const candidate = inputPath.trim();
  if (!candidate || candidate.includes("\0") || candidate.includes("\n") || candidate.includes("\r")) {
    throw new ConfigError(`Invalid application definition path: "${inputPath}"`);
  }

  const resolved = path.normalize(path.resolve(root, candidate));
  if (resolved !== root && !resolved.startsWith(rootWithSep)) {
    throw new ConfigError(`Application definition must be within the project root: "${inputPath}"`);
  }
  return resolved;
}

function parseDefinition(resolved: string, raw: string): unknown {
  const ext = path.extname(resolved).toLowerCase();

  if (ext === ".yaml" || ext === ".yml") {
    const doc = parseDocument(raw, { uniqueKeys: true });
    if (doc.errors.length > 0) {
      const details = doc.errors.map((e) => e.message).join("; ");
      throw new ConfigError(`Invalid YAML in "${resolved}": ${details}`);
    }
    return doc.toJS();
  }

  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Invalid JSON in "${resolved}": ${errorMessage(err)}`);
  }
}

/**
 * Loads and validates the application definition.
 *
 * Supported formats: JSON (.json) and YAML (.yml/.yaml).
 */
export async function loadApplicationDefinition(rootDir: string, entryFile: string): Promise<ApplicationDefinition> {
  const resolved = resolvePathWithinRoot(rootDir, entryFile);

  let raw: string;
  try {
    raw = await fs.readFile(resolved, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new LocalEnvironmentError(
        `Missing ${path.relative(path.resolve(rootDir), resolved) || resolved}. ` +
          `Make sure you are in the correct directory and this file exists.`
      );
    }
    throw err;
  }

  const result = zApplicationDefinition.safeParse(parseDefinition(resolved, raw));
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid application definition in "${resolved}": ${details}`);
  }
  return result.data;
}
