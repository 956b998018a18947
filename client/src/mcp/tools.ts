/**
 * MCP tools backed by the bridge client. Each tool is one action call; the
 * envelope is rendered as a single text block, errors as `<type>: <message>`.
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ResponseEnvelope } from "@cadbridge/core";
import type { BridgeClient } from "../client.js";

export type ToolClient = Pick<
  BridgeClient,
  "executeCode" | "getViewportScreenshot" | "getUserParameters" | "setParameter"
>;

export const MAX_CODE_LENGTH = 20_000;
export const MAX_DESCRIPTION_LENGTH = 1_000;

export const executeCodeShape = {
  code: z
    .string()
    .min(1)
    .max(MAX_CODE_LENGTH)
    .describe(
      "JavaScript to run inside the CAD host. `app`, `design` and `rootComp` are in scope; " +
        "use print() or console.log() to return output.",
    ),
  description: z
    .string()
    .max(MAX_DESCRIPTION_LENGTH)
    .optional()
    .describe("Short description of what the code does; shown as the undo entry in the host"),
};

export const screenshotShape = {
  filepath: z.string().min(1).describe("Path of the PNG file to write"),
};

export const setParameterShape = {
  param_name: z.string().min(1).describe("Name of the user or model parameter"),
  expression: z.string().min(1).describe("New expression, e.g. '25 mm'"),
};

/** Render an envelope as tool output. */
export function toToolResult(envelope: ResponseEnvelope): CallToolResult {
  if (!envelope.success) {
    return {
      content: [{ type: "text", text: `${envelope.error.type}: ${envelope.error.message}` }],
      isError: true,
    };
  }
  const { result } = envelope;
  const text = typeof result === "string" ? result : JSON.stringify(result, null, 2);
  return { content: [{ type: "text", text }] };
}

export function createToolHandlers(client: ToolClient) {
  return {
    executeCode: async (args: { code: string; description?: string }): Promise<CallToolResult> =>
      toToolResult(await client.executeCode(args.code, args.description)),

    getViewportScreenshot: async (args: { filepath: string }): Promise<CallToolResult> =>
      toToolResult(await client.getViewportScreenshot(args.filepath)),

    getUserParameters: async (): Promise<CallToolResult> => toToolResult(await client.getUserParameters()),

    setParameter: async (args: { param_name: string; expression: string }): Promise<CallToolResult> =>
      toToolResult(await client.setParameter(args.param_name, args.expression)),
  };
}

export function registerTools(server: McpServer, client: ToolClient): void {
  const handlers = createToolHandlers(client);

  server.tool(
    "execute_code",
    "Execute JavaScript inside the CAD host as a single undoable transaction. " +
      "Output written with print() is returned; if the script throws, the output is followed by " +
      "'--- TRACEBACK ---' and the stack trace.",
    executeCodeShape,
    (args) => handlers.executeCode(args),
  );

  server.tool(
    "get_viewport_screenshot",
    "Save an image of the active viewport to a file and return its path",
    screenshotShape,
    (args) => handlers.getViewportScreenshot(args),
  );

  server.tool(
    "get_user_parameters",
    "List the user parameters of the active design with their values, units and expressions",
    () => handlers.getUserParameters(),
  );

  server.tool(
    "set_parameter",
    "Set the expression of a design parameter and return its updated value",
    setParameterShape,
    (args) => handlers.setParameter(args),
  );
}
