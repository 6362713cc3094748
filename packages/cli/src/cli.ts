/**
 * Stepwise CLI - Main program setup
 */

import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { mcpCommand } from "./commands/mcp.js";

const VERSION = "0.1.0";

export const cli = new Command()
  .name("stepwise")
  .description("Run a tool-calling agent from the command line")
  .version(VERSION, "-v, --version", "Display version number")
  .addCommand(runCommand)
  .addCommand(mcpCommand);
