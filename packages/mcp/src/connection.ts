/**
 * One connection to an external tool server over the Model Context Protocol
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import {
  StdioClientTransport,
  getDefaultEnvironment,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  createLogger,
  fail,
  isRecord,
  ok,
  sanitizeError,
  withTimeout,
  type JsonSchema,
  type Logger,
  type ToolResult,
} from "@stepwise/core";
import type { ServerConfig } from "./config.js";
import { resolveTimeouts, type TimeoutConfig } from "./timeouts.js";

export type ConnectionState = "disconnected" | "connecting" | "connected" | "failed";

/**
 * Builds the transport for a server; replaceable for tests
 */
export type TransportFactory = (config: ServerConfig, logger: Logger) => Transport;

export type ConnectionOptions = {
  logger?: Logger;
  createTransport?: TransportFactory;
};

/**
 * A tool as advertised by a remote server
 */
export type RemoteToolInfo = {
  name: string;
  description: string;
  parameters: JsonSchema;
};

const CLIENT_INFO = { name: "stepwise", version: "0.1.0" };

export const defaultTransportFactory: TransportFactory = (config, logger) => {
  switch (config.kind) {
    case "stdio": {
      const transport = new StdioClientTransport({
        command: config.command,
        args: config.args,
        env: { ...getDefaultEnvironment(), ...config.env },
        stderr: "pipe",
      });
      transport.stderr?.on("data", (chunk: Buffer) => {
        logger.debug(`[${config.name}] ${chunk.toString().trimEnd()}`);
      });
      return transport;
    }
    case "sse":
      return new SSEClientTransport(new URL(config.url), {
        requestInit: { headers: config.headers },
      });
    case "http":
    case "streamable_http":
      return new StreamableHTTPClientTransport(new URL(config.url), {
        requestInit: { headers: config.headers },
      });
  }
};

function toJsonSchema(input: Record<string, unknown>): JsonSchema {
  const { properties, required, ...rest } = input;
  const schema: JsonSchema = {
    ...rest,
    type: "object",
    properties: isRecord(properties) ? properties : {},
  };
  if (Array.isArray(required)) {
    schema.required = required.filter((field): field is string => typeof field === "string");
  }
  return schema;
}

function renderItem(item: unknown): string {
  if (isRecord(item) && item.type === "text" && typeof item.text === "string") {
    return item.text;
  }
  return JSON.stringify(item);
}

/**
 * Flatten a tools/call result: text items joined by newlines, anything else
 * (images, audio, embedded resources) as JSON.
 */
export function toToolResult(result: unknown): ToolResult {
  if (!isRecord(result)) {
    return fail("Malformed tool result");
  }
  let content = "";
  if (Array.isArray(result.content)) {
    content = result.content.map(renderItem).join("\n");
  } else if ("toolResult" in result) {
    content = JSON.stringify(result.toolResult);
  }
  if (result.isError === true) {
    return fail(content || "Remote tool reported an error", content);
  }
  return ok(content);
}

export class ToolServerConnection {
  readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly createTransport: TransportFactory;
  private client?: Client;
  private currentState: ConnectionState = "disconnected";
  private queue: Promise<void> = Promise.resolve();
  /** Bumped by disconnect() so a handshake still in flight knows it was abandoned */
  private generation = 0;

  constructor(config: ServerConfig, options: ConnectionOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? createLogger();
    this.createTransport = options.createTransport ?? defaultTransportFactory;
  }

  get name(): string {
    return this.config.name;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /**
   * Handshake bounded by the connect timeout. Resolves false on any failure.
   */
  async connect(): Promise<boolean> {
    if (this.currentState === "connected") {
      return true;
    }
    const { connect: connectMs } = resolveTimeouts(this.config.timeouts);
    const generation = this.generation;
    this.currentState = "connecting";

    let transport: Transport;
    try {
      transport = this.createTransport(this.config, this.logger);
    } catch (error) {
      this.currentState = "failed";
      this.logger.warn(`${this.name}: could not create transport: ${sanitizeError(error)}`);
      return false;
    }

    const client = new Client(CLIENT_INFO);
    client.onclose = () => this.handleClose(client);

    try {
      await withTimeout(
        client.connect(transport, { timeout: connectMs }),
        connectMs,
        `Connecting to '${this.name}' timed out after ${connectMs}ms`
      );
    } catch (error) {
      if (generation === this.generation) {
        this.currentState = "failed";
        this.logger.warn(`${this.name}: connection failed: ${sanitizeError(error)}`);
      }
      await this.close(client);
      return false;
    }

    if (generation !== this.generation) {
      this.logger.debug(`${this.name}: disconnected during handshake`);
      await this.close(client);
      return false;
    }

    this.client = client;
    this.currentState = "connected";
    this.logger.debug(`${this.name}: connected over ${this.config.kind}`);
    return true;
  }

  async listTools(): Promise<RemoteToolInfo[]> {
    const client = this.client;
    if (this.currentState !== "connected" || !client) {
      throw new Error(`Server '${this.name}' is not connected`);
    }
    const { tools } = await client.listTools(undefined, this.requestOptions(resolveTimeouts(this.config.timeouts)));
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? "",
      parameters: toJsonSchema(tool.inputSchema),
    }));
  }

  /**
   * Call a remote tool. Calls on one connection run one at a time, in arrival order.
   */
  execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    const timeouts = resolveTimeouts(this.config.timeouts);
    return this.enqueue(async () => {
      const client = this.client;
      if (this.currentState !== "connected" || !client) {
        return fail(`Server '${this.name}' is not connected`);
      }
      try {
        const result = await client.callTool(
          { name: toolName, arguments: args },
          undefined,
          this.requestOptions(timeouts)
        );
        return toToolResult(result);
      } catch (error) {
        return fail(`${toolName} on '${this.name}' failed: ${sanitizeError(error)}`);
      }
    });
  }

  /**
   * Release the subprocess or session. Safe to call in any state, any number of times.
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    this.generation++;
    this.currentState = "disconnected";
    if (client) {
      await this.close(client);
    }
  }

  private requestOptions(timeouts: TimeoutConfig): RequestOptions {
    if (this.config.kind === "stdio") {
      return { timeout: timeouts.execute };
    }
    return {
      timeout: timeouts.execute,
      resetTimeoutOnProgress: true,
      maxTotalTimeout: timeouts.read,
      onprogress: (progress) => {
        this.logger.debug(`${this.name}: progress ${progress.progress}`);
      },
    };
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller observes the outcome through `run`; the chain only orders calls
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private handleClose(client: Client): void {
    if (this.client !== client) {
      return;
    }
    this.client = undefined;
    this.currentState = "failed";
    this.logger.warn(`${this.name}: transport closed unexpectedly`);
  }

  private async close(client: Client): Promise<void> {
    try {
      await client.close();
    } catch (error) {
      this.logger.debug(`${this.name}: error while closing: ${sanitizeError(error)}`);
    }
  }
}
