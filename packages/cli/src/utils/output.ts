/**
 * Terminal output helpers for command results
 */

import chalk from "chalk";
import figures from "figures";
import type { AgentResult, TokenUsage } from "@stepwise/core";

export const output = {
  step: (message: string) => {
    console.log(chalk.cyan(figures.pointer), message);
  },

  dim: (message: string) => {
    console.log(chalk.dim(message));
  },

  blank: () => {
    console.log();
  },

  heading: (message: string) => {
    console.log();
    console.log(chalk.bold(message));
    console.log(chalk.dim("─".repeat(message.length)));
  },
};

export function formatUsage(usage: TokenUsage): string {
  return `Tokens: ${usage.promptTokens} prompt | ${usage.completionTokens} completion | ${usage.totalTokens} total`;
}

/**
 * Process exit code for a finished run
 */
export function exitCodeFor(status: AgentResult["status"]): number {
  switch (status) {
    case "completed":
    case "max_steps":
      return 0;
    case "cancelled":
      return 130;
    case "error":
      return 1;
  }
}
