import type { RegisteredAction } from "../action-registry.js";
import type { TransactionalExecutor } from "../executor/transactional-executor.js";
import { createExecuteCodeAction } from "./execute-code.js";
import { createGetUserParametersAction, createSetParameterAction } from "./parameters.js";
import { createScreenshotAction } from "./screenshot.js";

export { EXECUTE_CODE, ExecuteCodeParamsSchema, type ExecuteCodeParams } from "./execute-code.js";
export { GET_VIEWPORT_SCREENSHOT, ScreenshotParamsSchema } from "./screenshot.js";
export {
  GET_USER_PARAMETERS,
  SET_PARAMETER,
  toParameterInfo,
  type ParameterInfo,
} from "./parameters.js";
export {
  createExecuteCodeAction,
  createScreenshotAction,
  createGetUserParametersAction,
  createSetParameterAction,
};

/** The fixed action set the bridge exposes. */
export function createDefaultActions(deps: {
  executor: Pick<TransactionalExecutor, "executeInTransaction" | "runOnHost">;
}): RegisteredAction[] {
  return [
    createExecuteCodeAction(deps),
    createScreenshotAction(deps),
    createGetUserParametersAction(deps),
    createSetParameterAction(deps),
  ];
}
