import {
  QuotaExceededError,
  TransientProviderError,
  errorMessage,
  type ProviderError,
} from "../../../errors";

const QUOTA_PATTERN = /quota|resource[ _]exhausted|billing/i;
const RATE_LIMIT_PATTERN = /rate[ _-]?limit|too many requests/i;
const NETWORK_PATTERN =
  /timed? ?out|timeout|ETIMEDOUT|ECONNRESET|ECONNREFUSED|EAI_AGAIN|socket hang up|connection error|network/i;

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

const readProperty = (error: unknown, key: string): unknown =>
  typeof error === "object" && error !== null && key in error
    ? Reflect.get(error, key)
    : undefined;

function readStatus(error: unknown): number | null {
  const status = readProperty(error, "status");
  return typeof status === "number" ? status : null;
}

function readCode(error: unknown): string | null {
  const code = readProperty(error, "code");
  return typeof code === "string" ? code : null;
}

function readRetryAfterMs(error: unknown): number | null {
  const headers = readProperty(error, "headers");
  const raw =
    headers instanceof Headers
      ? headers.get("retry-after")
      : readProperty(headers, "retry-after");
  if (typeof raw !== "string" && typeof raw !== "number") return null;
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

/**
 * Maps a thrown provider error to a recoverable kind, or null when retrying cannot help
 * (bad request, authentication, unknown model).
 */
export function classifyProviderError(error: unknown): ProviderError | null {
  const message = errorMessage(error);
  const status = readStatus(error);
  const code = readCode(error);

  if (code === "insufficient_quota" || QUOTA_PATTERN.test(message)) {
    return new QuotaExceededError(message, readRetryAfterMs(error), { cause: error });
  }
  if (status !== null && (TRANSIENT_STATUSES.has(status) || status >= 500)) {
    return new TransientProviderError(message, status, { cause: error });
  }
  if (status === null && (RATE_LIMIT_PATTERN.test(message) || NETWORK_PATTERN.test(message))) {
    return new TransientProviderError(message, null, { cause: error });
  }
  return null;
}
