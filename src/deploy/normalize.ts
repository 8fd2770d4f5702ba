const DYNAMIC_KEYS = new Set<string>([
  // Server-managed fields returned by Cloud Functions, API Gateway, Pub/Sub,
  // Cloud Scheduler and Cloud Run.
  "createTime",
  "updateTime",
  "deleteTime",
  "etag",
  "uid",
  "generation",
  "observedGeneration",
  "reconciling",
  "status",
  "state",
  "buildId",
  "versionId",
  "updateMask",
  "defaultHostname",
  "latestCreatedExecution",
  "executionCount",
  "terminalCondition",
  "conditions",
  "creator",
  "lastModifier",
  "scheduleTime",
  "lastAttemptTime",
  "userUpdateTime"
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Removes server-managed keys from a provider API object so live state can
 * be compared with the state a handler would write.
 */
export function stripDynamicFieldsDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripDynamicFieldsDeep);
  }
  if (!isRecord(value)) {
    return value;
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (DYNAMIC_KEYS.has(k)) continue;
    out[k] = stripDynamicFieldsDeep(v);
  }
  return out;
}

/**
 * Canonicalizes a value into a deterministic representation for stable diffs.
 *
 * - object keys are sorted
 * - arrays of objects are sorted by `name` or `key` when present
 *
 * Arrays of primitives keep their order: container commands and arguments
 * are positional.
 */
export function canonicalizeDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    const canonicalItems = value.map(canonicalizeDeep);

    // Sort arrays of objects by name/key where possible (env vars, headers).
    const items = canonicalItems.filter(isRecord);
    if (items.length === canonicalItems.length && items.length > 0) {
      const identity = items.every((v) => typeof v.name === "string")
        ? "name"
        : items.every((v) => typeof v.key === "string")
          ? "key"
          : undefined;
      if (identity) {
        return [...items].sort((a, b) =>
          String(a[identity]).toLowerCase().localeCompare(String(b[identity]).toLowerCase())
        );
      }
    }

    return canonicalItems;
  }

  if (!isRecord(value)) {
    return value;
  }

  const out: Record<string, unknown> = {};
  const keys = Object.keys(value).sort((a, b) => a.localeCompare(b));
  for (const k of keys) {
    out[k] = canonicalizeDeep(value[k]);
  }
  return out;
}

/**
 * Normalizes a resource (desired/current) for comparison:
 * - strips dynamic/server-managed fields
 * - canonicalizes keys + common arrays to avoid order-only drift
 */
export function normalizeForDiff(value: unknown): unknown {
  return canonicalizeDeep(stripDynamicFieldsDeep(value));
}

