/**
 * stepwise mcp list - Connect to configured tool servers and show their tools
 */

import { Command } from "commander";
import ora from "ora";
import chalk from "chalk";
import { createLogger, sanitizeError } from "@stepwise/core";
import { createToolRegistry } from "@stepwise/mcp";
import { output } from "../utils/output.js";

const listCommand = new Command("list")
  .description("List tool servers and the tools they provide")
  .argument("[file]", "Tool server config", "mcp.json")
  .option("--verbose", "Debug logging")
  .action(async (file: string, options: { verbose?: boolean }) => {
    const logger = createLogger({ level: options.verbose ? "debug" : undefined });
    const registry = createToolRegistry({ logger });
    const spinner = ora(`Connecting tool servers from ${chalk.cyan(file)}...`).start();

    try {
      const tools = await registry.load(file);
      spinner.stop();

      const connections = registry.connections();
      if (connections.length === 0) {
        logger.warn(`No enabled tool servers in ${file}`);
        return;
      }

      for (const connection of connections) {
        const connected = connection.state === "connected";
        const state = connected ? chalk.green(connection.state) : chalk.red(connection.state);
        output.heading(`${connection.name} (${connection.config.kind})`);
        output.dim(`state: ${state}`);
        if (!connected) {
          continue;
        }
        try {
          for (const tool of await connection.listTools()) {
            output.step(`${chalk.cyan(tool.name)} ${chalk.dim(tool.description)}`);
          }
        } catch (error) {
          logger.warn(`${connection.name}: ${sanitizeError(error)}`);
        }
      }
      output.blank();
      logger.success(`${tools.length} tools from ${connections.length} servers`);
    } finally {
      spinner.stop();
      await registry.cleanup();
    }
  });

export const mcpCommand = new Command("mcp")
  .description("Inspect tool servers")
  .addCommand(listCommand);
