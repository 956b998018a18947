/**
 * Classification of transport failures into the bridge error taxonomy.
 *
 * Node's fetch rejects with a `TypeError("fetch failed")` whose `cause` carries
 * the socket error code; an `AbortSignal.timeout` rejects with a
 * `TimeoutError` DOMException.
 */

import { BridgeError, errorMessage } from "@cadbridge/core";

const UNREACHABLE_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ECONNRESET",
  "EAI_AGAIN",
]);

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const TIMEOUT_NAMES: ReadonlySet<string> = new Set(["TimeoutError", "AbortError"]);

export const CONNECTION_ERROR_MESSAGE =
  "Cannot connect to the CAD bridge add-in. Ask the user to check that the add-in is running.";

export const RESPONSE_PARSE_ERROR_MESSAGE =
  "Received an invalid response from the CAD bridge add-in. Ask the user to check that the add-in and this client are up to date.";

export function timeoutErrorMessage(timeoutMs: number): string {
  return (
    `The host did not respond within ${timeoutMs} ms. It may be busy or the operation too large; ` +
    "break it into smaller steps."
  );
}

/** Error codes found on `err`, its `cause` chain and any aggregated errors. */
export function errorCodes(err: unknown): string[] {
  if (typeof err !== "object" || err === null) return [];
  const codes: string[] = [];
  if ("code" in err && typeof err.code === "string") codes.push(err.code);
  if ("errors" in err && Array.isArray(err.errors)) {
    const inner: unknown[] = err.errors;
    for (const item of inner) codes.push(...errorCodes(item));
  }
  if ("cause" in err) codes.push(...errorCodes(err.cause));
  return codes;
}

function hasTimeoutName(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("name" in err && typeof err.name === "string" && TIMEOUT_NAMES.has(err.name)) return true;
  return "cause" in err ? hasTimeoutName(err.cause) : false;
}

/** `fetch failed (connect ECONNREFUSED 127.0.0.1:3600)` */
function describe(err: unknown): string {
  const message = errorMessage(err);
  if (typeof err === "object" && err !== null && "cause" in err && err.cause !== undefined) {
    return `${message} (${errorMessage(err.cause)})`;
  }
  return message;
}

/**
 * Map a rejection from `fetch` (or from reading the body) to a BridgeError.
 *
 *   timeout / abort                 → TimeoutError
 *   refused / unreachable socket    → ConnectionError
 *   any other fetch TypeError       → RequestError
 *   anything else                   → UnknownError
 */
export function classifyTransportError(err: unknown, context: { timeoutMs: number }): BridgeError {
  const codes = errorCodes(err);

  if (hasTimeoutName(err) || codes.some((code) => TIMEOUT_CODES.has(code))) {
    return new BridgeError({ kind: "TimeoutError", message: timeoutErrorMessage(context.timeoutMs), cause: err });
  }
  if (codes.some((code) => UNREACHABLE_CODES.has(code))) {
    return new BridgeError({ kind: "ConnectionError", message: CONNECTION_ERROR_MESSAGE, cause: err });
  }
  if (err instanceof TypeError) {
    return new BridgeError({
      kind: "RequestError",
      message: `Network error while communicating with the CAD bridge add-in: ${describe(err)}`,
      cause: err,
    });
  }
  return new BridgeError({
    kind: "UnknownError",
    message: `An unexpected error occurred in the bridge client. Details: ${describe(err)}`,
    cause: err,
  });
}
