import crypto from "node:crypto";

/**
 * Computes a SHA-256 hex digest of a string.
 */
export function sha256HexFromString(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}

export function sha256HexFromBuffer(input: Buffer): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

/**
 * Short digest for use inside resource names and label values (both capped
 * at 63 characters by the providers).
 */
export function shortDigest(hex: string, length = 12): string {
  return hex.slice(0, length);
}
