/**
 * Error hierarchy for stageform.
 *
 * Every abort path throws a subclass of {@link StageformError} so callers can
 * branch on `instanceof` (or on `code`) and the CLI can print one line that
 * names the resource, stage or field at fault.
 */
export class StageformError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StageformError";
    this.code = code;
  }
}

/** Invalid or incomplete configuration. Raised before any remote call. */
export class ConfigError extends StageformError {
  constructor(message: string, code = "CONFIG_ERROR") {
    super(code, message);
    this.name = "ConfigError";
  }
}

export class MissingConfigError extends ConfigError {
  readonly field: string;

  constructor(field: string, hint: string) {
    super(`Missing required config "${field}". ${hint}`, "MISSING_CONFIG");
    this.name = "MissingConfigError";
    this.field = field;
  }
}

export class UnknownStageError extends ConfigError {
  readonly stage: string;

  constructor(stage: string, knownStages: readonly string[]) {
    const known = knownStages.length ? knownStages.join(", ") : "none";
    super(
      `Unknown stage "${stage}" (known stages: ${known}). Create it with: stageform stage create ${stage}`,
      "UNKNOWN_STAGE"
    );
    this.name = "UnknownStageError";
    this.stage = stage;
  }
}

/** A declared name cannot be mapped to a remote name and back without ambiguity. */
export class NamingConflictError extends ConfigError {
  constructor(message: string) {
    super(message, "NAMING_CONFLICT");
    this.name = "NamingConflictError";
  }
}

export interface ResourceConflict {
  kind: string;
  remoteName: string;
  reason: string;
}

/** A remote resource already exists in a shape the deploy would have to overwrite. */
export class ConflictError extends StageformError {
  readonly conflicts: ResourceConflict[];

  constructor(conflicts: ResourceConflict[]) {
    const details = conflicts.map((c) => `${c.kind} "${c.remoteName}": ${c.reason}`).join("; ");
    super("CONFLICT", `Conflicting remote resources (re-run with --force to overwrite): ${details}`);
    this.name = "ConflictError";
    this.conflicts = conflicts;
  }
}

/** Some plan entries were applied before one failed. Nothing is rolled back. */
export class PartialDeploymentError extends StageformError {
  readonly succeeded: string[];
  readonly failed: string;

  constructor(succeeded: string[], failed: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const done = succeeded.length ? succeeded.join(", ") : "none";
    super("PARTIAL_DEPLOYMENT", `Deployment stopped at ${failed}: ${reason}. Applied before failure: [${done}]`, {
      cause
    });
    this.name = "PartialDeploymentError";
    this.succeeded = succeeded;
    this.failed = failed;
  }
}

/** A provider call failed after retries were exhausted (or was not retryable). */
export class RemoteApiError extends StageformError {
  readonly context: string;
  readonly status: number | undefined;

  constructor(context: string, status: number | undefined, detail: string, cause?: unknown) {
    super("REMOTE_API", `${context} failed: ${detail}`, { cause });
    this.name = "RemoteApiError";
    this.context = context;
    this.status = status;
  }
}

export interface DeleteFailure {
  kind: string;
  remoteName: string;
  error: string;
}

/** One or more deletions failed during sync or destroy; the rest were still attempted. */
export class ReconcileError extends StageformError {
  readonly failures: DeleteFailure[];

  constructor(operation: "sync" | "destroy", failures: DeleteFailure[]) {
    const details = failures.map((f) => `${f.kind} "${f.remoteName}": ${f.error}`).join("; ");
    super("RECONCILE", `${operation} failed to delete ${failures.length} resource(s): ${details}`);
    this.name = "ReconcileError";
    this.failures = failures;
  }
}

/** Something missing on the local machine: an entry-point file or an executable. */
export class LocalEnvironmentError extends StageformError {
  constructor(message: string) {
    super("LOCAL_ENVIRONMENT", message);
    this.name = "LocalEnvironmentError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
