/**
 * Dispatcher: resolves an action by name, invokes it, and classifies whatever
 * comes back into the error taxonomy. Nothing thrown by a handler escapes.
 */

import {
  type ActionParams,
  type BridgeResult,
  type Logger,
  type LoggerFactory,
  errorMessage,
  executionError,
  fail,
  invalidUserInput,
  isBridgeError,
  resolveLogger,
} from "@cadbridge/core";
import type { ActionRegistry } from "./action-registry.js";

const SERVICE_NAME = "cadbridge-addin:dispatcher";

export interface DispatcherParams {
  registry: ActionRegistry;
  loggerFactory?: LoggerFactory;
}

export class Dispatcher {
  private readonly registry: ActionRegistry;
  private readonly log: Logger;

  constructor(params: DispatcherParams) {
    this.registry = params.registry;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /**
   * Run `actionName` with `params`.
   * - unknown action → InvalidUserInput
   * - handler error result or thrown BridgeError → passed through
   * - any other throw → ExecutionError for the action
   */
  async dispatch(actionName: string, params: ActionParams): Promise<BridgeResult<unknown>> {
    const action = this.registry.get(actionName);
    if (!action) {
      this.log.warn?.({ actionName }, `${SERVICE_NAME}:dispatch - Unknown action`);
      return fail(invalidUserInput(`Action '${actionName}' not found.`));
    }

    this.log.info?.({ actionName }, `${SERVICE_NAME}:dispatch - Invocation received`);

    try {
      const result = await action.invoke(params);
      if (!result.ok) {
        this.log.warn?.(
          { actionName, type: result.error.type, error: result.error.message },
          `${SERVICE_NAME}:dispatch - Action failed`,
        );
      }
      return result;
    } catch (err) {
      if (isBridgeError(err)) {
        this.log.warn?.({ actionName, type: err.type, error: err.message }, `${SERVICE_NAME}:dispatch - Action failed`);
        return fail(err);
      }
      this.log.error?.({ actionName, error: errorMessage(err) }, `${SERVICE_NAME}:dispatch - Handler threw`);
      return fail(
        executionError(
          actionName,
          `An error occurred during execution in the host application: ${errorMessage(err)}`,
          err,
        ),
      );
    }
  }
}
