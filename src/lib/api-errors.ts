import { RemoteApiError } from "./errors";

function toStatusCode(value: unknown): number | undefined {
  if (typeof value === "string" && /^\d{3}$/.test(value)) {
    return toStatusCode(Number(value));
  }
  return typeof value === "number" && Number.isInteger(value) && value >= 100 && value <= 599 ? value : undefined;
}

function parseStatusCodeFromMessage(msg: string): number | undefined {
  const m = msg.match(/status=(\d{3})/);
  if (!m) return undefined;
  return toStatusCode(Number(m[1]));
}

/**
 * Extracts an HTTP status from a gaxios-style error, a {@link RemoteApiError},
 * or an error whose `cause` is one of those.
 */
export function apiStatusOf(err: unknown): number | undefined {
  if (err instanceof RemoteApiError && err.status !== undefined) {
    return err.status;
  }

  if (err && typeof err === "object") {
    const direct = err as {
      status?: unknown;
      code?: unknown;
      response?: { status?: unknown };
      cause?: unknown;
    };
    const directStatus =
      toStatusCode(direct.response?.status) ?? toStatusCode(direct.status) ?? toStatusCode(direct.code);
    if (directStatus !== undefined) {
      return directStatus;
    }

    const cause = direct.cause;
    if (cause && typeof cause === "object") {
      const causeStatus = apiStatusOf(cause);
      if (causeStatus !== undefined) {
        return causeStatus;
      }
    }
  }

  if (err instanceof Error) {
    return parseStatusCodeFromMessage(err.message);
  }

  return undefined;
}

interface GoogleErrorPayload {
  error?: {
    message?: unknown;
    status?: unknown;
    errors?: Array<{ message?: unknown; reason?: unknown; domain?: unknown }>;
  };
}

function payloadOf(err: unknown): GoogleErrorPayload | undefined {
  if (!err || typeof err !== "object") return undefined;
  const data = (err as { response?: { data?: unknown } }).response?.data;
  return data && typeof data === "object" ? (data as GoogleErrorPayload) : undefined;
}

/**
 * Returns the `reason` values of a Google API error payload, if any.
 */
export function apiErrorReasons(err: unknown): string[] {
  const errors = payloadOf(err)?.error?.errors;
  if (!Array.isArray(errors)) return [];
  return errors
    .map((e) => (typeof e.reason === "string" ? e.reason : undefined))
    .filter((r): r is string => Boolean(r));
}

export function isNotFoundError(err: unknown): boolean {
  return apiStatusOf(err) === 404;
}

export function isAlreadyExistsError(err: unknown): boolean {
  return apiStatusOf(err) === 409;
}

/**
 * One-line summary of a Google API error: status, API message and reasons.
 */
export function formatApiError(err: unknown): string {
  if (!err || typeof err !== "object") {
    return String(err);
  }

  const anyErr = err as { message?: unknown; response?: { statusText?: unknown } };
  const message = typeof anyErr.message === "string" ? anyErr.message : "Unknown error";
  const status = apiStatusOf(err);
  const statusText = anyErr.response?.statusText;

  const data = payloadOf(err);
  const apiMessage = typeof data?.error?.message === "string" ? data.error.message : undefined;
  const apiErrors = Array.isArray(data?.error?.errors) ? data?.error?.errors : undefined;

  const apiErrorsSummary = apiErrors?.length
    ? `; details=[${apiErrors
        .map((e) => {
          const parts = [
            typeof e.reason === "string" ? `reason=${e.reason}` : undefined,
            typeof e.domain === "string" ? `domain=${e.domain}` : undefined,
            typeof e.message === "string" ? `message=${e.message}` : undefined
          ].filter(Boolean);
          return `{${parts.join(",")}}`;
        })
        .join(", ")}]`
    : "";

  const statusSummary =
    status !== undefined
      ? `status=${String(status)}${typeof statusText === "string" ? ` ${statusText}` : ""}`
      : "status=unknown";

  return `${statusSummary}; message=${apiMessage ?? message}${apiErrorsSummary}`;
}
