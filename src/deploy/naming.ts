import { ConfigError, NamingConflictError } from "../lib/errors";

export const STAGE_SEPARATOR = "-";

const MAX_REMOTE_NAME_LENGTH = 63;
const REMOTE_NAME_PATTERN = /^[a-z]([a-z0-9-]*[a-z0-9])?$/;
export const STAGE_NAME_PATTERN = /^[a-z][a-z0-9]{0,19}$/;
export const STAGE_NAME_RULE = `use 1-20 lowercase letters or digits, starting with a letter (no "${STAGE_SEPARATOR}")`;

/**
 * Maps a declared base name to the remote identifier for a stage.
 *
 * This is the only record of ownership: sync and destroy rediscover what an
 * application owns by parsing remote names back with {@link parseRemoteName}.
 */
export function remoteName(baseName: string, stage?: string): string {
  return stage ? `${baseName}${STAGE_SEPARATOR}${stage}` : baseName;
}

export interface ParsedRemoteName {
  baseName: string;
  stage: string | undefined;
}

/**
 * Inverse of {@link remoteName}.
 *
 * A name ending in `-{stage}` for one of `knownStages` belongs to that stage
 * (the longest matching stage wins); anything else is unstaged.
 */
export function parseRemoteName(name: string, knownStages: readonly string[]): ParsedRemoteName {
  const candidates = [...knownStages].sort((a, b) => b.length - a.length);
  for (const stage of candidates) {
    const suffix = `${STAGE_SEPARATOR}${stage}`;
    if (name.length > suffix.length && name.endsWith(suffix)) {
      return { baseName: name.slice(0, -suffix.length), stage };
    }
  }
  return { baseName: name, stage: undefined };
}

/**
 * Splits a trailing `-{stage}` off `name` when the suffix is shaped like a
 * stage name, whether or not that stage is configured.
 */
export function splitStageSuffix(name: string): ParsedRemoteName | undefined {
  const idx = name.lastIndexOf(STAGE_SEPARATOR);
  if (idx <= 0) return undefined;
  const stage = name.slice(idx + 1);
  return STAGE_NAME_PATTERN.test(stage) ? { baseName: name.slice(0, idx), stage } : undefined;
}

/**
 * Last segment of a provider resource path, e.g.
 * `projects/p/locations/l/functions/shop-dev` → `shop-dev`.
 */
export function shortName(resourcePath: string): string {
  const trimmed = resourcePath.replace(/\/+$/, "");
  const idx = trimmed.lastIndexOf("/");
  return idx >= 0 ? trimmed.slice(idx + 1) : trimmed;
}

export function isValidRemoteName(name: string): boolean {
  return name.length <= MAX_REMOTE_NAME_LENGTH && REMOTE_NAME_PATTERN.test(name);
}

export function assertValidStageName(stage: string): void {
  if (!STAGE_NAME_PATTERN.test(stage)) {
    throw new ConfigError(`Invalid stage name "${stage}": ${STAGE_NAME_RULE}.`);
  }
}

/**
 * Rejects declared names that could not be parsed back to the same base name
 * and stage, and remote names the provider would refuse.
 */
export function assertUnambiguousNames(
  declared: ReadonlyArray<{ kind: string; baseName: string; remoteName: string }>,
  knownStages: readonly string[],
  activeStage: string | undefined
): void {
  const seen = new Set<string>();
  for (const d of declared) {
    const parsed = parseRemoteName(d.baseName, knownStages);
    if (parsed.stage !== undefined) {
      throw new NamingConflictError(
        `${d.kind} base name "${d.baseName}" ends with "${STAGE_SEPARATOR}${parsed.stage}", which is a stage suffix; rename it.`
      );
    }

    const roundTrip = parseRemoteName(d.remoteName, knownStages);
    if (roundTrip.baseName !== d.baseName || roundTrip.stage !== activeStage) {
      throw new NamingConflictError(
        `${d.kind} remote name "${d.remoteName}" reads back as base name "${roundTrip.baseName}" in stage "${roundTrip.stage ?? "(none)"}"; rename it.`
      );
    }

    if (!isValidRemoteName(d.remoteName)) {
      throw new NamingConflictError(
        `${d.kind} remote name "${d.remoteName}" is invalid: at most ${MAX_REMOTE_NAME_LENGTH} lowercase letters, digits or hyphens, starting with a letter.`
      );
    }

    const key = `${d.kind}:${d.remoteName}`;
    if (seen.has(key)) {
      throw new NamingConflictError(`Duplicate ${d.kind} remote name "${d.remoteName}".`);
    }
    seen.add(key);
  }
}
