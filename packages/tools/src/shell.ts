/**
 * bash: run one shell command in the workspace directory
 */

import { execFile } from "node:child_process";
import { defineTool, fail, ok, type Tool } from "@stepwise/core";

export type CommandOutput = {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
};

export type CommandRunner = (
  command: string,
  options: { cwd: string; timeout: number }
) => Promise<CommandOutput>;

export type ShellToolOptions = {
  workspaceDir?: string;
  /** Default per-command limit in ms (default: 120000) */
  timeout?: number;
  /** Replaceable for tests */
  run?: CommandRunner;
};

type BashParams = { command: string; timeout?: number };

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

/** Variables never passed on to commands the model runs */
const SECRET_VARIABLES = [/_API_KEY$/i, /_SECRET$/i, /_TOKEN$/i, /_PASSWORD$/i];

function commandEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return Object.fromEntries(
    Object.entries(env).filter(([key]) => !SECRET_VARIABLES.some((pattern) => pattern.test(key)))
  );
}

export const runCommand: CommandRunner = (command, { cwd, timeout }) =>
  new Promise<CommandOutput>((resolve) => {
    execFile(
      "bash",
      ["-c", command],
      { cwd, timeout, maxBuffer: MAX_OUTPUT_BYTES, env: commandEnv(process.env) },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0, timedOut: false });
          return;
        }
        resolve({
          stdout,
          stderr: stderr || error.message,
          exitCode: typeof error.code === "number" ? error.code : 1,
          timedOut: error.killed === true,
        });
      }
    );
  });

/**
 * stdout, then stderr under its own heading
 */
export function formatCommandOutput({ stdout, stderr }: Pick<CommandOutput, "stdout" | "stderr">): string {
  const parts = [stdout.trimEnd()];
  if (stderr.trim()) {
    parts.push(`[stderr]\n${stderr.trimEnd()}`);
  }
  return parts.filter(Boolean).join("\n") || "(no output)";
}

export function createShellTool(options: ShellToolOptions = {}): Tool {
  const cwd = options.workspaceDir ?? process.cwd();
  const defaultTimeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const run = options.run ?? runCommand;

  return defineTool<BashParams>({
    name: "bash",
    description:
      "Run a bash command in the workspace directory and return its output. Use it for listing files, git, builds and tests.",
    parameters: {
      type: "object",
      properties: {
        command: { type: "string", minLength: 1, description: "The command line to run" },
        timeout: {
          type: "number",
          minimum: 1,
          maximum: 600,
          description: `Time limit in seconds (default: ${defaultTimeout / 1000})`,
        },
      },
      required: ["command"],
    },
    execute: async ({ command, timeout }) => {
      const limit = timeout === undefined ? defaultTimeout : Math.round(timeout * 1000);
      const result = await run(command, { cwd, timeout: limit });
      const text = formatCommandOutput(result);

      if (result.timedOut) {
        return fail(`Command timed out after ${limit}ms`, text);
      }
      if (result.exitCode !== 0) {
        return fail(`Command exited with code ${result.exitCode}`, text);
      }
      return ok(text);
    },
  });
}
