/**
 * Bridge client: posts action calls to the add-in and normalizes every outcome,
 * including transport failures, into a ResponseEnvelope. It never throws.
 */

import { z } from "zod";
import {
  type ActionParams,
  type Logger,
  type LoggerFactory,
  type ResponseEnvelope,
  ERROR_TYPE_TAGS,
  ResponseEnvelopeSchema,
  errorEnvelope,
  errorMessage,
  resolveLogger,
} from "@cadbridge/core";
import { RESPONSE_PARSE_ERROR_MESSAGE, classifyTransportError } from "./classify.js";
import { type BridgeClientConfig, defaultClientConfig } from "./config.js";

const LOG_PREFIX = "cadbridge-client:client";

/** Defaults for an error envelope whose fields are missing. */
const DEFAULT_LOGICAL_ERROR_TYPE = "FusionServerError";
const DEFAULT_LOGICAL_ERROR_MESSAGE = "An unknown error occurred";
const DEFAULT_HTTP_ERROR_TYPE = "ServerError";
const DEFAULT_HTTP_ERROR_MESSAGE = "The CAD bridge add-in returned an error";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface BridgeClientParams {
  config?: Partial<BridgeClientConfig>;
  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;
  loggerFactory?: LoggerFactory;
}

// Non-2xx bodies only need to be JSON; the error field is read leniently.
const HttpErrorBodySchema = z.object({
  error: z
    .object({
      type: z.string().optional(),
      message: z.string().optional(),
    })
    .optional()
    .catch(undefined),
});

export class BridgeClient {
  readonly config: BridgeClientConfig;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(params: BridgeClientParams = {}) {
    this.config = { ...defaultClientConfig, ...params.config };
    this.fetchImpl = params.fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  }

  get baseUrl(): string {
    return `http://${this.config.host}:${this.config.port}`;
  }

  /**
   * POST `params` to `/{actionName}`.
   * - 2xx + success      → the envelope as received
   * - 2xx + !success     → the embedded error
   * - non-2xx            → the embedded error with the status appended
   * - transport failures → classified error envelope
   */
  async callAction(actionName: string, params: ActionParams = {}): Promise<ResponseEnvelope> {
    const url = `${this.baseUrl}/${actionName}`;
    this.log.info?.({ actionName, url }, `${LOG_PREFIX}:callAction - Calling action`);

    let body: string;
    try {
      body = JSON.stringify(params);
    } catch (err) {
      this.log.error?.({ actionName, url, error: errorMessage(err) }, `${LOG_PREFIX}:callAction - Params not serializable`);
      return errorEnvelope(
        ERROR_TYPE_TAGS.InvalidUserInput,
        `Parameters for action '${actionName}' are not JSON-serializable: ${errorMessage(err)}`,
      );
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      text = await response.text();
    } catch (err) {
      const error = classifyTransportError(err, { timeoutMs: this.config.timeoutMs });
      this.log.error?.(
        { actionName, url, type: error.type, error: errorMessage(err) },
        `${LOG_PREFIX}:callAction - Request failed`,
      );
      return errorEnvelope(error.type, error.message);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      this.log.error?.(
        { actionName, url, status: response.status, error: errorMessage(err), body: text.slice(0, 500) },
        `${LOG_PREFIX}:callAction - Response is not JSON`,
      );
      return this.parseError();
    }

    return response.ok
      ? this.handleOk(actionName, url, data)
      : this.handleHttpError(actionName, url, response.status, data);
  }

  // ── Convenience wrappers ─────────────────────────────────────────

  executeCode(code: string, transactionName?: string): Promise<ResponseEnvelope> {
    return this.callAction(
      "execute_code",
      transactionName === undefined ? { code } : { code, transaction_name: transactionName },
    );
  }

  getViewportScreenshot(filepath: string): Promise<ResponseEnvelope> {
    return this.callAction("get_viewport_screenshot", { filepath });
  }

  getUserParameters(): Promise<ResponseEnvelope> {
    return this.callAction("get_user_parameters");
  }

  setParameter(paramName: string, expression: string): Promise<ResponseEnvelope> {
    return this.callAction("set_parameter", { param_name: paramName, expression });
  }

  // ── Response handling ────────────────────────────────────────────

  private handleOk(actionName: string, url: string, data: unknown): ResponseEnvelope {
    const parsed = ResponseEnvelopeSchema.safeParse(data);
    if (!parsed.success) {
      this.log.error?.(
        { actionName, url, issues: parsed.error.issues.length },
        `${LOG_PREFIX}:handleOk - Response does not match the envelope`,
      );
      return this.parseError();
    }

    const envelope = parsed.data;
    if (envelope.success) {
      return { success: true, result: envelope.result ?? null };
    }

    const type = envelope.error?.type ?? DEFAULT_LOGICAL_ERROR_TYPE;
    const message = envelope.error?.message ?? DEFAULT_LOGICAL_ERROR_MESSAGE;
    this.log.error?.({ actionName, url, type, error: message }, `${LOG_PREFIX}:handleOk - Action failed`);
    return errorEnvelope(type, message);
  }

  private handleHttpError(actionName: string, url: string, status: number, data: unknown): ResponseEnvelope {
    const parsed = HttpErrorBodySchema.safeParse(data);
    if (!parsed.success) {
      this.log.error?.({ actionName, url, status }, `${LOG_PREFIX}:handleHttpError - Error body is not an object`);
      return this.parseError();
    }

    const type = parsed.data.error?.type ?? DEFAULT_HTTP_ERROR_TYPE;
    const message = `${parsed.data.error?.message ?? DEFAULT_HTTP_ERROR_MESSAGE} (HTTP ${status})`;
    this.log.error?.({ actionName, url, status, type, error: message }, `${LOG_PREFIX}:handleHttpError - Action failed`);
    return errorEnvelope(type, message);
  }

  private parseError(): ResponseEnvelope {
    return errorEnvelope(ERROR_TYPE_TAGS.ResponseParseError, RESPONSE_PARSE_ERROR_MESSAGE);
  }
}
