/**
 * stepwise run - Send one prompt to an agent and print the answer
 */

import { Command, InvalidArgumentError } from "commander";
import { config as loadEnv } from "dotenv";
import ora from "ora";
import chalk from "chalk";
import { agent, createLogger, type Tool } from "@stepwise/core";
import { createToolRegistry, setTimeoutDefaults } from "@stepwise/mcp";
import { createFileTools, createNoteTools, createShellTool } from "@stepwise/tools";
import { ConfigError, loadSettings, type Settings } from "../config.js";
import { createProvider } from "../provider.js";
import { exitCodeFor, formatUsage, output } from "../utils/output.js";

type RunOptions = {
  config?: string;
  env?: string;
  provider?: string;
  model?: string;
  mcp?: string;
  notes?: string;
  workspace?: string;
  fileTools?: boolean;
  bash?: boolean;
  maxSteps?: number;
  quiet?: boolean;
  json?: boolean;
  verbose?: boolean;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Built-in tools the settings switch on
 */
export function builtinTools(settings: Settings): Tool[] {
  const workspaceDir = settings.workspaceDir;
  const tools: Tool[] = [];
  if (settings.fileTools) {
    tools.push(...createFileTools({ workspaceDir }));
  }
  if (settings.bashTool) {
    tools.push(createShellTool({ workspaceDir }));
  }
  if (settings.notesFile) {
    tools.push(...createNoteTools({ file: settings.notesFile }));
  }
  return tools;
}

const toMs = (seconds: number | undefined) =>
  seconds === undefined ? undefined : Math.round(seconds * 1000);

function applyTimeouts(timeouts: Settings["timeouts"]): void {
  setTimeoutDefaults({
    connect: toMs(timeouts.connect),
    execute: toMs(timeouts.execute),
    read: toMs(timeouts.read),
  });
}

export const runCommand = new Command("run")
  .description("Run the agent on a prompt")
  .argument("<prompt...>", "Prompt text")
  .option("-c, --config <path>", "JSON settings file")
  .option("-e, --env <path>", "Path to .env file")
  .option("-p, --provider <name>", "Model provider (anthropic or openai)")
  .option("-m, --model <model>", "Model name")
  .option("--mcp <path>", "Tool server config (mcp.json)")
  .option("--notes <path>", "Enable note tools backed by this file")
  .option("-w, --workspace <dir>", "Directory for the file and bash tools")
  .option("--no-file-tools", "Disable read_file, write_file and edit_file")
  .option("--no-bash", "Disable the bash tool")
  .option("--max-steps <n>", "Maximum model calls", parsePositiveInt)
  .option("-q, --quiet", "Minimal output")
  .option("--json", "Output result as JSON")
  .option("--verbose", "Debug logging")
  .action(async (words: string[], options: RunOptions) => {
    if (options.env) {
      loadEnv({ path: options.env });
    }

    const logger = createLogger({ level: options.verbose ? "debug" : undefined });
    const spinner = ora({ isSilent: options.quiet || options.json });

    let settings: Settings;
    try {
      settings = await loadSettings({
        file: options.config,
        overrides: {
          provider: options.provider,
          model: options.model,
          mcpConfig: options.mcp,
          notesFile: options.notes,
          workspaceDir: options.workspace,
          // Only an explicit --no-* flag overrides the settings file
          fileTools: options.fileTools === false ? false : undefined,
          bashTool: options.bash === false ? false : undefined,
          maxSteps: options.maxSteps,
        },
      });
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error(error.message);
        process.exitCode = 1;
        return;
      }
      throw error;
    }

    applyTimeouts(settings.timeouts);
    const registry = createToolRegistry({ logger, prefixToolNames: settings.prefixToolNames });

    try {
      if (settings.mcpConfig) {
        spinner.start(`Connecting tool servers from ${chalk.cyan(settings.mcpConfig)}...`);
        const remote = await registry.load(settings.mcpConfig);
        spinner.succeed(`Loaded ${remote.length} remote tools`);
      }

      const tools = builtinTools(settings);

      const assistant = agent()
        .name("stepwise")
        .systemPrompt(settings.systemPrompt)
        .provider(createProvider(settings, logger))
        .tools(tools)
        .toolRegistry(registry)
        .maxSteps(settings.maxSteps)
        .logger(logger)
        .onBeforeGenerate((ctx) => {
          spinner.text = `Thinking (step ${ctx.state.step + 1})...`;
        })
        .onBeforeToolCall((_ctx, toolCall) => {
          spinner.text = `Running ${chalk.cyan(toolCall.name)}...`;
        })
        .build();

      const session = assistant.createSession();
      session.addUserMessage(words.join(" "));

      const onInterrupt = () => {
        session.cancel();
        spinner.text = "Cancelling after the current step...";
      };
      process.once("SIGINT", onInterrupt);

      const startTime = Date.now();
      spinner.start("Thinking...");
      const result = await session.run().finally(() => {
        process.off("SIGINT", onInterrupt);
      });
      const duration = Date.now() - startTime;

      switch (result.status) {
        case "completed":
          spinner.succeed(`Completed in ${chalk.cyan(`${duration}ms`)} (${result.steps} steps)`);
          break;
        case "max_steps":
          spinner.warn(`Stopped at the step limit (${result.steps} steps)`);
          break;
        case "cancelled":
          spinner.warn("Cancelled");
          break;
        case "error":
          spinner.fail(result.error?.message ?? "Run failed");
          break;
      }

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              status: result.status,
              response: result.response,
              steps: result.steps,
              usage: result.usage,
              duration,
            },
            null,
            2
          )
        );
      } else if (result.response) {
        if (!options.quiet) {
          output.heading("Response");
        }
        console.log(result.response);
        if (!options.quiet) {
          output.blank();
          output.dim(formatUsage(result.usage));
        }
      }

      process.exitCode = exitCodeFor(result.status);
    } finally {
      await registry.cleanup();
    }
  });
