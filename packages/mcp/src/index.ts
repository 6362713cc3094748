/**
 * @stepwise/mcp
 *
 * Connections to Model Context Protocol tool servers and a registry that
 * turns their tools into ordinary Stepwise tools.
 *
 * @example
 * ```typescript
 * const registry = createToolRegistry();
 * await registry.load("./mcp.json");
 * const assistant = agent().toolRegistry(registry) ... .build();
 * // ...
 * await registry.cleanup();
 * ```
 */

export {
  TRANSPORT_KINDS,
  ServerEntrySchema,
  determineTransport,
  parseServerEntry,
  isDisabled,
  type TransportKind,
  type ServerEntry,
  type ServerConfig,
  type StdioServerConfig,
  type UrlServerConfig,
  type ParseResult,
} from "./config.js";
export {
  DEFAULT_TIMEOUTS,
  getTimeoutDefaults,
  setTimeoutDefaults,
  resetTimeoutDefaults,
  resolveTimeouts,
  type TimeoutConfig,
} from "./timeouts.js";
export {
  ToolServerConnection,
  defaultTransportFactory,
  toToolResult,
  type ConnectionState,
  type ConnectionOptions,
  type RemoteToolInfo,
  type TransportFactory,
} from "./connection.js";
export { createRemoteTool } from "./remote-tool.js";
export {
  createToolRegistry,
  type ToolRegistry,
  type ToolRegistryOptions,
  type ToolConfigSource,
} from "./registry.js";
