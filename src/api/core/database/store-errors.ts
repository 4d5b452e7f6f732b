import { AppError, StoreUnavailableError } from "../errors/app-error";

const UNAVAILABLE_SQLSTATES = new Set([
  "57P01", // admin_shutdown
  "57P02", // crash_shutdown
  "57P03", // cannot_connect_now
  "53300", // too_many_connections
  "57014", // query_canceled (statement_timeout)
]);

const UNAVAILABLE_SOCKET_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

// Raised by pg itself, without a code
const UNAVAILABLE_MESSAGES = [
  "Connection terminated",
  "timeout exceeded when trying to connect",
  "Query read timeout",
];

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * True when the failure says the store cannot be reached, as opposed to
 * a problem with the statement itself.
 */
export function isConnectivityError(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined) {
    if (code.startsWith("08")) return true;
    if (UNAVAILABLE_SQLSTATES.has(code) || UNAVAILABLE_SOCKET_CODES.has(code)) return true;
  }

  if (error instanceof Error) {
    return UNAVAILABLE_MESSAGES.some((fragment) => error.message.includes(fragment));
  }
  return false;
}

/**
 * Maps a driver failure to what the caller should see. Application errors
 * pass through untouched; anything else unrelated to connectivity
 * propagates as-is and ends up a 500.
 */
export function toStoreError(error: unknown): unknown {
  if (error instanceof AppError) return error;
  if (isConnectivityError(error)) {
    return new StoreUnavailableError("Catalog store is unavailable, try again shortly", error);
  }
  return error;
}
