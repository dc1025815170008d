/**
 * Tests for the MCP server wiring.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import { createConfig } from "./config.js";
import { createServer, toCallToolResult } from "./mcp.js";
import type { PaperFileSystem } from "./workspace.js";

const noFiles: PaperFileSystem = {
  async readFile(path) {
    throw new Error(`ENOENT: ${path}`);
  },
  async writeFile() {
    throw new Error("read-only");
  },
};

describe("toCallToolResult", () => {
  it("prefers the user-facing body", () => {
    expect(toCallToolResult({ isError: false, forModel: "short", forUser: "long" })).toEqual({
      content: [{ type: "text", text: "long" }],
      isError: false,
    });
  });
});

describe("createServer", () => {
  const clients: Client[] = [];

  afterEach(async () => {
    await Promise.all(clients.map((c) => c.close()));
    clients.length = 0;
  });

  async function connect(): Promise<Client> {
    const server = createServer(createConfig(), noFiles);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
    clients.push(client);
    return client;
  }

  it("registers the three academic tools", async () => {
    const client = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "academic_extract_citations",
      "academic_fetch_paper",
      "academic_search",
    ]);
  });

  it("returns tool errors as MCP error results", async () => {
    const client = await connect();
    const result = await client.callTool({
      name: "academic_extract_citations",
      arguments: { file_path: "missing.pdf" },
    });
    expect(result).toMatchObject({
      isError: true,
      content: [{ type: "text", text: "failed to read file: ENOENT: missing.pdf" }],
    });
  });
});
