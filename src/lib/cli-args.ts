import type { ConfigFlags } from "../config/resolve-config";

export type FlagValue = string | boolean;

export interface ParsedCli {
  command?: string;
  flags: Record<string, FlagValue>;
  positionals: string[];
}

const SHORT_FLAGS: Record<string, string> = {
  p: "project",
  l: "location",
  s: "stage",
  h: "help"
};

/** Flags that never take a value, so the next token stays a positional. */
const BOOLEAN_FLAGS = new Set([
  "all",
  "dryrun",
  "dry-run",
  "force",
  "help",
  "json",
  "only-function",
  "skip-function"
]);

/**
 * Splits argv into a command, `--flag value` / `--flag=value` / `-p value`
 * flags and positionals.
 */
export function parseCli(argv: readonly string[]): ParsedCli {
  const [command, ...rest] = argv;
  const flags: Record<string, FlagValue> = {};
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (token === undefined) continue;

    let key: string | undefined;
    if (token.startsWith("--")) {
      key = token.slice(2);
    } else if (/^-[a-z]$/.test(token)) {
      key = SHORT_FLAGS[token.slice(1)] ?? token.slice(1);
    }

    if (key === undefined) {
      positionals.push(token);
      continue;
    }

    const eqIdx = key.indexOf("=");
    if (eqIdx >= 0) {
      flags[key.slice(0, eqIdx)] = key.slice(eqIdx + 1);
      continue;
    }

    const next = rest[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith("-")) {
      flags[key] = next;
      i += 1;
      continue;
    }
    flags[key] = true;
  }

  const parsed: ParsedCli = { flags, positionals };
  if (command === "-h" || command === "--help") {
    parsed.flags.help = true;
  } else if (command) {
    parsed.command = command;
  }
  return parsed;
}

export function getStringFlag(flags: Record<string, FlagValue>, key: string): string | undefined {
  const v = flags[key];
  return typeof v === "string" && v.length ? v : undefined;
}

export function isFlagSet(flags: Record<string, FlagValue>, ...keys: string[]): boolean {
  return keys.some((k) => flags[k] === true);
}

/** Comma-separated list flag, e.g. `--skip topic,schedule`. */
export function getListFlag(flags: Record<string, FlagValue>, key: string): string[] {
  const v = getStringFlag(flags, key);
  return v
    ? v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    : [];
}

/** Only deploy merges a `--config` overlay; other commands resolve without it. */
const CONFIG_OVERLAY_COMMANDS = new Set(["deploy"]);

export function configFlagsFor(command: string, flags: Record<string, FlagValue>): ConfigFlags {
  return {
    project: getStringFlag(flags, "project"),
    location: getStringFlag(flags, "location"),
    stage: getStringFlag(flags, "stage"),
    ...(CONFIG_OVERLAY_COMMANDS.has(command) ? { config: getStringFlag(flags, "config") } : {})
  };
}
