import { normalizeForDiff } from "./normalize";

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isPrimitiveComparable(value: unknown): boolean {
  return value === null || ["string", "number", "boolean"].includes(typeof value);
}

function matchesPrimitiveArray(current: unknown[], desired: unknown[]): boolean {
  return current.length === desired.length && desired.every((dv, i) => Object.is(current[i], dv));
}

function resolveIdentityKey(items: unknown[]): "name" | "key" | undefined {
  const hasName = items.every((v) => isRecord(v) && typeof v.name === "string");
  if (hasName) {
    return "name";
  }
  const hasKey = items.every((v) => isRecord(v) && typeof v.key === "string");
  return hasKey ? "key" : undefined;
}

function buildIdentityIndex(items: unknown[], identityKey: "name" | "key"): Map<string, unknown> {
  const out = new Map<string, unknown>();
  for (const item of items) {
    if (!isRecord(item)) {
      continue;
    }
    const id = item[identityKey];
    if (typeof id === "string" && id.trim().length) {
      out.set(id.toLowerCase(), item);
    }
  }
  return out;
}

function matchesNamedOrKeyedArray(current: unknown[], desired: unknown[], identityKey: "name" | "key"): boolean {
  if (current.length !== desired.length) {
    return false;
  }
  const currentIndex = buildIdentityIndex(current, identityKey);
  for (const desiredItem of desired) {
    if (!isRecord(desiredItem)) {
      return false;
    }
    const id = desiredItem[identityKey];
    if (typeof id !== "string") {
      return false;
    }
    const currentItem = currentIndex.get(id.toLowerCase());
    if (!currentItem || !matchesDesiredSubset(currentItem, desiredItem)) {
      return false;
    }
  }
  return true;
}

function matchesOrderedArray(current: unknown[], desired: unknown[]): boolean {
  if (current.length !== desired.length) {
    return false;
  }
  return desired.every((dv, i) => matchesDesiredSubset(current[i], dv));
}

function matchesDesiredArray(current: unknown, desired: unknown[]): boolean {
  if (current === undefined || current === null) {
    return desired.length === 0;
  }
  if (!Array.isArray(current)) {
    return false;
  }
  if (desired.every(isPrimitiveComparable)) {
    return matchesPrimitiveArray(current, desired);
  }

  const identityKey = resolveIdentityKey(desired);
  if (identityKey) {
    return matchesNamedOrKeyedArray(current, desired, identityKey);
  }
  return matchesOrderedArray(current, desired);
}

function matchesDesiredObject(current: unknown, desired: Record<string, unknown>): boolean {
  if (current === undefined || current === null) {
    return Object.values(desired).every((v) => v === undefined);
  }
  if (!isRecord(current)) {
    return false;
  }
  for (const [key, desiredValue] of Object.entries(desired)) {
    if (desiredValue === undefined) {
      continue;
    }
    if (!matchesDesiredSubset(current[key], desiredValue)) {
      return false;
    }
  }
  return true;
}

/**
 * Checks whether `current` satisfies all fields specified by `desired`.
 *
 * Extra object fields present in `current` are ignored; arrays must match in
 * length. Providers omit empty maps and lists, so an absent field satisfies
 * an empty desired one.
 */
export function matchesDesiredSubset(current: unknown, desired: unknown): boolean {
  if (desired === null || typeof desired !== "object") {
    return Object.is(current, desired);
  }

  if (Array.isArray(desired)) {
    return matchesDesiredArray(current, desired);
  }

  if (!isRecord(desired)) {
    return false;
  }
  return matchesDesiredObject(current, desired);
}

/**
 * Compares live provider state with the state a handler would write, after
 * stripping server-managed fields from both.
 */
export function isUpToDate(current: unknown, desired: unknown): boolean {
  return matchesDesiredSubset(normalizeForDiff(current), normalizeForDiff(desired));
}
