import { TransportFault } from "../errors.js";
import { abortReason, isAbortError } from "../abort.js";

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes whatever a backend threw into a TransportFault. Faults the
 * backend already classified pass through untouched.
 */
export function toTransportFault(
  err: unknown,
  operation: string,
  signal?: AbortSignal,
): TransportFault {
  if (err instanceof TransportFault) return err;

  if (signal?.aborted && (isAbortError(err) || err === signal.reason)) {
    return new TransportFault("aborted", operation, `${operation} aborted: ${abortReason(signal)}`, {
      cause: err,
    });
  }

  const message = errorMessage(err);
  const name = err instanceof Error ? err.name : "";
  const code = errorCode(err) ?? (err instanceof Error ? errorCode(err.cause) : undefined);

  if (name === "TimeoutError" || /timed? ?out|timeout/i.test(message)) {
    return new TransportFault("timeout", operation, message, { cause: err });
  }
  if (isAbortError(err)) {
    return new TransportFault("aborted", operation, message, { cause: err });
  }
  if ((code && CONNECTION_CODES.has(code)) || /fetch failed|ECONNREFUSED|socket hang up/i.test(message)) {
    return new TransportFault("connection", operation, code ? `${message} (${code})` : message, {
      cause: err,
    });
  }
  if (/no (element|node)|element not found|not found for selector|could not find/i.test(message)) {
    return new TransportFault("element-not-found", operation, message, { cause: err });
  }
  return new TransportFault("unknown", operation, message, { cause: err });
}
