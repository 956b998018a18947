/**
 * MCP tool tests: handlers against a stub client, and the registered tools
 * through an in-memory MCP client/server pair.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { ResponseEnvelope } from "@cadbridge/core";
import { createMcpServer } from "./server.js";
import { createToolHandlers, toToolResult, type ToolClient } from "./tools.js";

function stubClient(envelope: ResponseEnvelope) {
  return {
    executeCode: vi.fn<ToolClient["executeCode"]>().mockResolvedValue(envelope),
    getViewportScreenshot: vi.fn<ToolClient["getViewportScreenshot"]>().mockResolvedValue(envelope),
    getUserParameters: vi.fn<ToolClient["getUserParameters"]>().mockResolvedValue(envelope),
    setParameter: vi.fn<ToolClient["setParameter"]>().mockResolvedValue(envelope),
  };
}

describe("toToolResult", () => {
  it("should return string results as is", () => {
    expect(toToolResult({ success: true, result: "2\n" })).toEqual({ content: [{ type: "text", text: "2\n" }] });
  });

  it("should JSON-encode other results", () => {
    expect(toToolResult({ success: true, result: { filepath: "/tmp/a.png" } })).toEqual({
      content: [{ type: "text", text: '{\n  "filepath": "/tmp/a.png"\n}' }],
    });
  });

  it("should flag errors", () => {
    const result = toToolResult({
      success: false,
      error: { type: "FusionServerConnectionError", message: "Cannot connect" },
    });
    expect(result).toEqual({
      content: [{ type: "text", text: "FusionServerConnectionError: Cannot connect" }],
      isError: true,
    });
  });
});

describe("createToolHandlers", () => {
  it("should pass the description as the transaction name", async () => {
    const client = stubClient({ success: true, result: "" });
    await createToolHandlers(client).executeCode({ code: "print(1)", description: "Drill holes" });
    expect(client.executeCode).toHaveBeenCalledWith("print(1)", "Drill holes");
  });

  it("should map set_parameter arguments", async () => {
    const client = stubClient({ success: true, result: null });
    await createToolHandlers(client).setParameter({ param_name: "width", expression: "12 mm" });
    expect(client.setParameter).toHaveBeenCalledWith("width", "12 mm");
  });
});

describe("MCP server", () => {
  const open: Array<{ close(): Promise<void> }> = [];

  afterEach(async () => {
    await Promise.all(open.splice(0).map((closable) => closable.close()));
  });

  async function connect(toolClient: ToolClient) {
    const server = createMcpServer({ client: toolClient });
    const client = new Client({ name: "test-client", version: "0.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    open.push(client, server);
    return client;
  }

  it("should list the bridge tools", async () => {
    const client = await connect(stubClient({ success: true, result: "" }));
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "execute_code",
      "get_user_parameters",
      "get_viewport_screenshot",
      "set_parameter",
    ]);
  });

  it("should call through to the bridge client", async () => {
    const stub = stubClient({ success: true, result: "2\n" });
    const client = await connect(stub);
    const result = await client.callTool({ name: "execute_code", arguments: { code: "print(1+1)" } });
    expect(result.content).toEqual([{ type: "text", text: "2\n" }]);
    expect(stub.executeCode).toHaveBeenCalledWith("print(1+1)", undefined);
  });

  it("should surface bridge errors as tool errors", async () => {
    const stub = stubClient({
      success: false,
      error: { type: "InvalidUserInput", message: "Parameter 'filepath' cannot be empty" },
    });
    const client = await connect(stub);
    const result = await client.callTool({ name: "get_viewport_screenshot", arguments: { filepath: "/tmp/x.png" } });
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: "text", text: "InvalidUserInput: Parameter 'filepath' cannot be empty" }]);
  });
});
