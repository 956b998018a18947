import { z } from "zod";
import { fail, invalidUserInput } from "@cadbridge/core";
import { defineAction, type RegisteredAction } from "../action-registry.js";
import { DEFAULT_TRANSACTION_LABEL, type TransactionalExecutor } from "../executor/transactional-executor.js";

export const EXECUTE_CODE = "execute_code";

export const ExecuteCodeParamsSchema = z.object({
  code: z.string(),
  transaction_name: z.string().optional(),
});

export type ExecuteCodeParams = z.infer<typeof ExecuteCodeParamsSchema>;

/**
 * `execute_code`: run a script as one host transaction and return everything
 * it printed. A script that throws still succeeds; its trace is in the output.
 */
export function createExecuteCodeAction(deps: {
  executor: Pick<TransactionalExecutor, "executeInTransaction">;
}): RegisteredAction {
  return defineAction({
    name: EXECUTE_CODE,
    description: "Run a script inside the host as a single undoable transaction",
    input: ExecuteCodeParamsSchema,
    handler: async ({ code, transaction_name }) => {
      if (!code.trim()) {
        return fail(invalidUserInput(`Parameter 'code' cannot be empty for action '${EXECUTE_CODE}'`));
      }
      return deps.executor.executeInTransaction(code, transaction_name || DEFAULT_TRANSACTION_LABEL);
    },
  });
}
