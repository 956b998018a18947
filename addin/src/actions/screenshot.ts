import { z } from "zod";
import { executionError, fail, invalidUserInput, ok } from "@cadbridge/core";
import { defineAction, type RegisteredAction } from "../action-registry.js";
import type { TransactionalExecutor } from "../executor/transactional-executor.js";

export const GET_VIEWPORT_SCREENSHOT = "get_viewport_screenshot";

export const ScreenshotParamsSchema = z.object({
  filepath: z.string().optional(),
});

/**
 * `get_viewport_screenshot`: save the active viewport to `filepath` at the
 * viewport's current size.
 */
export function createScreenshotAction(deps: {
  executor: Pick<TransactionalExecutor, "runOnHost">;
}): RegisteredAction {
  return defineAction({
    name: GET_VIEWPORT_SCREENSHOT,
    description: "Save an image of the active viewport to a file",
    input: ScreenshotParamsSchema,
    handler: async ({ filepath }) => {
      if (!filepath) {
        return fail(invalidUserInput("Parameter 'filepath' cannot be empty"));
      }
      const target: string = filepath;

      return deps.executor.runOnHost({
        actionName: GET_VIEWPORT_SCREENSHOT,
        label: "Viewport Screenshot",
        fn: (host) => {
          const viewport = host.activeViewport;
          if (!viewport) {
            return fail(executionError(GET_VIEWPORT_SCREENSHOT, "No active viewport found. Cannot take screenshot."));
          }
          // 0, 0 = current on-screen size
          if (!viewport.saveAsImageFile(target, 0, 0)) {
            return fail(executionError(GET_VIEWPORT_SCREENSHOT, `Failed to save screenshot to ${target}`));
          }
          return ok({ filepath: target });
        },
      });
    },
  });
}
