import * as path from "path";
import axios, { AxiosError, AxiosInstance } from "axios";

/**
 * Create a configured axios instance for JSON APIs.
 * @param timeout - Request timeout in milliseconds
 * @param userAgent - Sent on every request; Reddit rejects generic agents
 */
export function createHttpClient(
  timeout: number,
  userAgent?: string
): AxiosInstance {
  const client = axios.create({
    timeout,
    headers: {
      Accept: "application/json",
      "Accept-Encoding": "gzip, deflate, br",
    },
    maxRedirects: 5,
  });

  client.interceptors.request.use((config) => {
    if (userAgent) config.headers["User-Agent"] = userAgent;
    return config;
  });

  return client;
}

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Pick the first free variant of a file path.
 * Returns `desired` when it is unused, otherwise `<stem>_<n><ext>` for the
 * lowest n ≥ 1 that `exists` reports as free.
 * @param desired - Preferred path, e.g. "output.xlsx"
 * @param exists - Predicate telling whether a path is taken
 */
export function resolveUniquePath(
  desired: string,
  exists: (candidate: string) => boolean
): string {
  if (!exists(desired)) return desired;

  const ext = path.extname(desired);
  const stem = desired.slice(0, desired.length - ext.length);

  let counter = 1;
  while (exists(`${stem}_${counter}${ext}`)) {
    counter++;
  }
  return `${stem}_${counter}${ext}`;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response?.status === 429) return "HTTP 429: rate limited by Reddit";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Extract the HTTP status code from an error, if available.
 * @param err - The caught error
 */
export function getErrorStatus(err: unknown): number | null {
  if (err instanceof AxiosError && err.response) {
    return err.response.status;
  }
  return null;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
