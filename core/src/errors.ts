/**
 * Bridge error taxonomy (shared by add-in and client).
 *
 * The set of kinds is closed. Each kind maps to a stable wire `type` tag so the
 * remote caller can branch on `error.type` without knowing host-side exception
 * types.
 */

import { types } from "node:util";

// ── Error Kinds ─────────────────────────────────────────────────────

export type BridgeErrorKind =
  | "InvalidUserInput"
  | "ExecutionError"
  | "ConnectionError"
  | "TimeoutError"
  | "ResponseParseError"
  | "RequestError"
  | "InternalServerError"
  | "UnknownError";

export const BRIDGE_ERROR_KINDS: readonly BridgeErrorKind[] = [
  "InvalidUserInput",
  "ExecutionError",
  "ConnectionError",
  "TimeoutError",
  "ResponseParseError",
  "RequestError",
  "InternalServerError",
  "UnknownError",
];

/** Wire `type` tag for each kind. */
export const ERROR_TYPE_TAGS = {
  InvalidUserInput: "InvalidUserInput",
  ExecutionError: "FusionExecutionError",
  ConnectionError: "FusionServerConnectionError",
  TimeoutError: "FusionServerTimeoutError",
  ResponseParseError: "FusionServerResponseError",
  RequestError: "FusionServerRequestError",
  InternalServerError: "InternalServerError",
  UnknownError: "UnknownError",
} as const satisfies Record<BridgeErrorKind, string>;

export type ErrorTypeTag = (typeof ERROR_TYPE_TAGS)[BridgeErrorKind];

/** Wire shape of an error inside the response envelope. */
export interface ErrorBody {
  type: string;
  message: string;
}

// ── BridgeError ─────────────────────────────────────────────────────

/**
 * Structured error for bridge calls.
 */
export class BridgeError extends Error {
  public readonly kind: BridgeErrorKind;
  public readonly type: ErrorTypeTag;
  public readonly actionName?: string;

  constructor(args: {
    kind: BridgeErrorKind;
    message: string;
    actionName?: string;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "BridgeError";
    this.kind = args.kind;
    this.type = ERROR_TYPE_TAGS[args.kind];
    this.actionName = args.actionName;
  }

  toBody(): ErrorBody {
    return { type: this.type, message: this.message };
  }
}

// ── Factories ───────────────────────────────────────────────────────

export function invalidUserInput(message: string): BridgeError {
  return new BridgeError({ kind: "InvalidUserInput", message });
}

/**
 * Host-side execution failure. The message is prefixed with the action name.
 */
export function executionError(actionName: string, message: string, cause?: unknown): BridgeError {
  return new BridgeError({
    kind: "ExecutionError",
    message: `Error executing action '${actionName}': ${message}`,
    actionName,
    cause,
  });
}

// ── Helpers ─────────────────────────────────────────────────────────

export function isBridgeError(err: unknown): err is BridgeError {
  return err instanceof BridgeError;
}

/**
 * Best-effort message extraction from any thrown value. Errors raised inside a
 * `vm` context fail `instanceof Error`, hence the native-error check.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (types.isNativeError(err)) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

/**
 * Normalize a thrown value. BridgeErrors pass through; anything else is wrapped
 * as `fallbackKind` keeping the original as `cause`.
 */
export function toBridgeError(err: unknown, fallbackKind: BridgeErrorKind = "UnknownError"): BridgeError {
  if (isBridgeError(err)) return err;
  return new BridgeError({ kind: fallbackKind, message: errorMessage(err), cause: err });
}

export function toErrorBody(err: unknown): ErrorBody {
  return toBridgeError(err).toBody();
}

/** Map a wire tag back to its kind. Unrecognized tags are `UnknownError`. */
export function kindFromType(type: string): BridgeErrorKind {
  return BRIDGE_ERROR_KINDS.find((kind) => ERROR_TYPE_TAGS[kind] === type) ?? "UnknownError";
}

/** HTTP status the add-in server answers with for a failed call of this kind. */
export function httpStatusFor(kind: BridgeErrorKind): 400 | 500 {
  return kind === "InvalidUserInput" ? 400 : 500;
}
