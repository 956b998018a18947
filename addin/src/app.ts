/**
 * HTTP surface of the bridge.
 *
 *   POST /{action_name}   body: JSON object (or empty)
 *
 * Every response, whatever its status, carries the response envelope:
 *   200  dispatch succeeded
 *   400  InvalidUserInput, malformed JSON body, non-object body
 *   405  any method other than POST
 *   500  every other error kind, or anything uncaught
 */

import { Hono } from "hono";
import {
  type ActionParams,
  type LoggerFactory,
  ActionParamsSchema,
  ERROR_TYPE_TAGS,
  errorEnvelope,
  errorMessage,
  httpStatusFor,
  resolveLogger,
  successEnvelope,
  toEnvelope,
} from "@cadbridge/core";
import type { Dispatcher } from "./dispatcher.js";

const SERVICE_NAME = "cadbridge-addin:app";

/** `/execute_code/` → `execute_code` */
export function actionNameFromPath(path: string): string {
  return path.replace(/^\/+|\/+$/g, "");
}

export function createApp(deps: {
  dispatcher: Pick<Dispatcher, "dispatch">;
  loggerFactory?: LoggerFactory;
}) {
  const log = resolveLogger(deps.loggerFactory, SERVICE_NAME);
  const app = new Hono();

  app.post("*", async (c) => {
    const actionName = actionNameFromPath(c.req.path);
    const body = await c.req.text();

    let params: ActionParams = {};
    if (body.length > 0) {
      let raw: unknown;
      try {
        raw = JSON.parse(body);
      } catch (err) {
        log.warn?.({ actionName, error: errorMessage(err) }, `${SERVICE_NAME}:post - Invalid JSON in request`);
        return c.json(
          errorEnvelope(ERROR_TYPE_TAGS.InvalidUserInput, `Invalid JSON format: ${errorMessage(err)}`),
          400,
        );
      }
      const parsed = ActionParamsSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn?.({ actionName }, `${SERVICE_NAME}:post - Request body is not a JSON object`);
        return c.json(errorEnvelope(ERROR_TYPE_TAGS.InvalidUserInput, "Request body must be a JSON object"), 400);
      }
      params = parsed.data;
    }

    const result = await deps.dispatcher.dispatch(actionName, params);
    if (result.ok) {
      return c.json(successEnvelope(result.data), 200);
    }

    log.error?.(
      { actionName, type: result.error.type, error: result.error.message },
      `${SERVICE_NAME}:post - Action failed`,
    );
    return c.json(toEnvelope(result), httpStatusFor(result.error.kind));
  });

  app.all("*", (c) =>
    c.json(errorEnvelope(ERROR_TYPE_TAGS.InvalidUserInput, `Method ${c.req.method} not allowed`), 405),
  );

  app.onError((err, c) => {
    log.error?.({ path: c.req.path, error: err.message }, `${SERVICE_NAME}:onError - Unexpected error processing request`);
    return c.json(
      errorEnvelope(ERROR_TYPE_TAGS.InternalServerError, `An unexpected internal error occurred: ${err.message}`),
      500,
    );
  });

  return app;
}

export type BridgeApp = ReturnType<typeof createApp>;
