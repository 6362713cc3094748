import { vi } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";
import type { Logger } from "@stepwise/core";

export function mockLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    success: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

/**
 * Transport that accepts everything and never answers
 */
export class SilentTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: Transport["onmessage"];
  closed = false;

  async start(): Promise<void> {}

  async send(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
    this.onclose?.();
  }
}

/**
 * Hold back `transport.start()` until `release()` is called, keeping a handshake in flight
 */
export function holdStart(transport: Transport): { release: () => void } {
  const start = transport.start.bind(transport);
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  transport.start = async () => {
    await gate;
    await start();
  };
  return { release: () => release() };
}

export type TestServer = {
  server: McpServer;
  clientTransport: Transport;
  /** Highest number of `slow` calls seen running at once */
  maxConcurrent: () => number;
};

/**
 * An in-process tool server with `echo`, `slow`, `broken`, `hang` and `picture` tools
 */
export async function startTestServer(): Promise<TestServer> {
  const server = new McpServer({ name: "test-server", version: "1.0.0" });
  let active = 0;
  let peak = 0;

  server.tool("echo", "Echo the text back", { text: z.string() }, async ({ text }) => ({
    content: [{ type: "text", text }],
  }));

  server.tool("slow", "Answer after a short pause", { id: z.string() }, async ({ id }) => {
    active++;
    peak = Math.max(peak, active);
    await new Promise((resolve) => setTimeout(resolve, 20));
    active--;
    return { content: [{ type: "text", text: id }] };
  });

  server.tool("broken", "Always reports an error", async () => ({
    content: [{ type: "text", text: "disk full" }],
    isError: true,
  }));

  server.tool("hang", "Never answers unless the call is cancelled", async (extra) => {
    await new Promise<void>((resolve) => {
      extra.signal.addEventListener("abort", () => resolve());
    });
    return { content: [] };
  });

  server.tool("picture", "Return text and an image", async () => ({
    content: [
      { type: "text", text: "line one" },
      { type: "text", text: "line two" },
      { type: "image", data: "aGk=", mimeType: "image/png" },
    ],
  }));

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  return { server, clientTransport, maxConcurrent: () => peak };
}
