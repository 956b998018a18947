import { z } from "zod";
import {
  type BridgeResult,
  errorMessage,
  executionError,
  fail,
  invalidUserInput,
  ok,
} from "@cadbridge/core";
import { defineAction, type RegisteredAction } from "../action-registry.js";
import type { TransactionalExecutor } from "../executor/transactional-executor.js";
import type { HostApplication, HostDesign, HostParameter } from "../host/types.js";

export const GET_USER_PARAMETERS = "get_user_parameters";
export const SET_PARAMETER = "set_parameter";

/** Wire shape of a design parameter. */
export interface ParameterInfo {
  name: string;
  value: number;
  unit: string;
  expression: string;
  comment: string;
}

export function toParameterInfo(param: HostParameter): ParameterInfo {
  return {
    name: param.name,
    value: param.value,
    unit: param.unit,
    expression: param.expression,
    comment: param.comment ?? "",
  };
}

function activeDesign(host: HostApplication, actionName: string): BridgeResult<HostDesign> {
  const design = host.activeDesign;
  if (!design) {
    return fail(executionError(actionName, "No active design found"));
  }
  return ok(design);
}

export const GetUserParametersSchema = z.object({});

export const SetParameterSchema = z.object({
  param_name: z.string().optional(),
  expression: z.string().optional(),
});

type ExecutorDeps = { executor: Pick<TransactionalExecutor, "runOnHost"> };

/** `get_user_parameters`: list the active design's user parameters. */
export function createGetUserParametersAction(deps: ExecutorDeps): RegisteredAction {
  return defineAction({
    name: GET_USER_PARAMETERS,
    description: "List the user parameters of the active design",
    input: GetUserParametersSchema,
    handler: async () =>
      deps.executor.runOnHost({
        actionName: GET_USER_PARAMETERS,
        label: "Read User Parameters",
        fn: (host) => {
          const design = activeDesign(host, GET_USER_PARAMETERS);
          if (!design.ok) return design;
          return ok(design.data.userParameters.asArray().map(toParameterInfo));
        },
      }),
  });
}

/**
 * `set_parameter`: assign a new expression (e.g. "10 mm") to a user or model
 * parameter and return its re-evaluated state.
 */
export function createSetParameterAction(deps: ExecutorDeps): RegisteredAction {
  return defineAction({
    name: SET_PARAMETER,
    description: "Set the expression of a design parameter",
    input: SetParameterSchema,
    handler: async ({ param_name, expression }) => {
      if (!param_name) {
        return fail(invalidUserInput("Parameter 'param_name' cannot be empty"));
      }
      if (!expression) {
        return fail(invalidUserInput("Parameter 'expression' cannot be empty"));
      }
      const name: string = param_name;
      const nextExpression: string = expression;

      return deps.executor.runOnHost({
        actionName: SET_PARAMETER,
        label: `Set Parameter ${name}`,
        fn: (host) => {
          const design = activeDesign(host, SET_PARAMETER);
          if (!design.ok) return design;

          const parameter = design.data.allParameters.itemByName(name);
          if (!parameter) {
            return fail(executionError(SET_PARAMETER, `Parameter '${name}' not found`));
          }

          try {
            parameter.expression = nextExpression;
          } catch (err) {
            return fail(
              executionError(SET_PARAMETER, `Failed to set parameter '${name}': ${errorMessage(err)}`, err),
            );
          }
          return ok(toParameterInfo(parameter));
        },
      });
    },
  });
}
