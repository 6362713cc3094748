/**
 * Local proxy for a tool that lives on a remote server
 */

import type { Tool } from "@stepwise/core";
import type { RemoteToolInfo, ToolServerConnection } from "./connection.js";

/**
 * Wrap a remote tool. The proxy does not own the connection; `exposedName`
 * lets the registry rename it without changing the name sent to the server.
 */
export function createRemoteTool(
  connection: ToolServerConnection,
  info: RemoteToolInfo,
  exposedName: string = info.name
): Tool {
  return {
    name: exposedName,
    description: info.description,
    parameters: info.parameters,
    execute: (params) => connection.execute(info.name, params),
  };
}
