/**
 * Request/response envelope types shared between the add-in server and the
 * bridge client.
 *
 * Wire format:
 *   POST /{action_name}   body: JSON object of params (or empty)
 *   200 | 400 | 500       body: ResponseEnvelope
 */

import { BridgeError, type ErrorBody } from "./errors.js";

// ── Request ─────────────────────────────────────────────────────────

/** Parameters of one action call, unmarshalled from the JSON body. */
export type ActionParams = Record<string, unknown>;

export interface RequestEnvelope {
  /** Taken from the URL path */
  actionName: string;
  params: ActionParams;
}

// ── Response ────────────────────────────────────────────────────────

export type SuccessEnvelope<T = unknown> = {
  success: true;
  result: T;
};

export type ErrorEnvelope = {
  success: false;
  error: ErrorBody;
};

/** Exactly one of `result` / `error` is present, gated by `success`. */
export type ResponseEnvelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

export function successEnvelope<T>(result: T): SuccessEnvelope<T | null> {
  return { success: true, result: result === undefined ? null : result };
}

export function errorEnvelope(type: string, message: string): ErrorEnvelope {
  return { success: false, error: { type, message } };
}

// ── In-process result ───────────────────────────────────────────────

/**
 * Result passed between layers instead of throwing.
 * Mirrors the envelope but keeps the structured error.
 */
export type BridgeResult<T = unknown> =
  | { ok: true; data: T }
  | { ok: false; error: BridgeError };

export function ok<T>(data: T): BridgeResult<T> {
  return { ok: true, data };
}

export function fail<T = never>(error: BridgeError): BridgeResult<T> {
  return { ok: false, error };
}

/** Convert an in-process result into the wire envelope. */
export function toEnvelope<T>(result: BridgeResult<T>): ResponseEnvelope<T | null> {
  if (result.ok) return successEnvelope(result.data);
  return { success: false, error: result.error.toBody() };
}
