/**
 * Loads tool servers from an mcp.json-style config and owns their connections
 */

import { readFile } from "node:fs/promises";
import { createLogger, isRecord, sanitizeError, type Logger, type Tool } from "@stepwise/core";
import { isDisabled, parseServerEntry } from "./config.js";
import { ToolServerConnection, type TransportFactory } from "./connection.js";
import { createRemoteTool } from "./remote-tool.js";

export type ToolRegistryOptions = {
  logger?: Logger;
  /** Expose tools as `mcp_<server>_<tool>` */
  prefixToolNames?: boolean;
  createTransport?: TransportFactory;
};

/** A path to a JSON file, or the parsed config itself */
export type ToolConfigSource = string | Record<string, unknown>;

export type ToolRegistry = {
  /** Connect every enabled server in `source`; resolves to the tools they added */
  load: (source: ToolConfigSource) => Promise<Tool[]>;
  /** Every tool loaded so far */
  tools: () => Tool[];
  connection: (name: string) => ToolServerConnection | undefined;
  connections: () => ToolServerConnection[];
  /** Disconnect every owned connection; safe to repeat */
  cleanup: () => Promise<void>;
};

async function readSource(source: ToolConfigSource, logger: Logger): Promise<Record<string, unknown>> {
  if (typeof source !== "string") {
    return source;
  }

  let text: string;
  try {
    text = await readFile(source, "utf8");
  } catch (error) {
    logger.warn(`Tool server config not found at ${source}: ${sanitizeError(error)}`);
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) {
      return parsed;
    }
    logger.warn(`Tool server config ${source} is not a JSON object`);
  } catch (error) {
    logger.warn(`Tool server config ${source} is not valid JSON: ${sanitizeError(error)}`);
  }
  return {};
}

/**
 * Accepts `{ "mcpServers": { ... } }` or the bare name-to-entry mapping
 */
function serverEntries(config: Record<string, unknown>): [string, unknown][] {
  const servers = "mcpServers" in config ? config.mcpServers : config;
  return isRecord(servers) ? Object.entries(servers) : [];
}

const sanitizeName = (name: string) => name.replace(/[^a-zA-Z0-9_-]/g, "_");

export function createToolRegistry(options: ToolRegistryOptions = {}): ToolRegistry {
  const logger = options.logger ?? createLogger();
  const owned = new Map<string, ToolServerConnection>();
  const loaded: Tool[] = [];
  // Bumped by cleanup(); loads started before it add nothing afterwards
  let generation = 0;

  async function loadServer(name: string, raw: unknown, started: number): Promise<Tool[]> {
    if (isDisabled(raw)) {
      logger.debug(`Skipping disabled tool server '${name}'`);
      return [];
    }
    const parsed = parseServerEntry(name, raw);
    if (!parsed.ok) {
      logger.warn(parsed.reason);
      return [];
    }
    if (owned.has(name)) {
      logger.warn(`Tool server '${name}' is already loaded`);
      return [];
    }

    const connection = new ToolServerConnection(parsed.config, {
      logger,
      createTransport: options.createTransport,
    });
    owned.set(name, connection);

    const connected = await connection.connect();
    if (started !== generation) {
      await connection.disconnect();
      return [];
    }
    if (!connected) {
      logger.warn(`Skipping tool server '${name}': could not connect`);
      return [];
    }

    try {
      const remote = await connection.listTools();
      if (started !== generation) {
        await connection.disconnect();
        return [];
      }
      logger.info(`Connected to '${name}' (${remote.length} tools)`);
      return remote.map((info) =>
        createRemoteTool(
          connection,
          info,
          options.prefixToolNames ? `mcp_${sanitizeName(name)}_${info.name}` : info.name
        )
      );
    } catch (error) {
      if (started === generation) {
        logger.warn(`Could not list tools of '${name}': ${sanitizeError(error)}`);
      }
      return [];
    }
  }

  return {
    async load(source) {
      const started = generation;
      const config = await readSource(source, logger);
      if (started !== generation) {
        return [];
      }
      const perServer = await Promise.all(
        serverEntries(config).map(([name, raw]) => loadServer(name, raw, started))
      );
      if (started !== generation) {
        return [];
      }
      const tools = perServer.flat();
      loaded.push(...tools);
      return tools;
    },

    tools: () => [...loaded],

    connection: (name) => owned.get(name),

    connections: () => Array.from(owned.values()),

    async cleanup() {
      generation++;
      const connections = Array.from(owned.values());
      owned.clear();
      loaded.length = 0;
      await Promise.all(connections.map((connection) => connection.disconnect()));
    },
  };
}
