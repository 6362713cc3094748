/**
 * Agent with Tool Servers Example
 *
 * Loads tool servers from an mcp.json file, runs one prompt and releases
 * the connections afterwards.
 *
 *   {
 *     "mcpServers": {
 *       "filesystem": { "command": "npx", "args": ["-y", "@modelcontextprotocol/server-filesystem", "."] },
 *       "search": { "url": "https://tools.example.test/mcp", "headers": { "Authorization": "Bearer <token>" } }
 *     }
 *   }
 *
 * Run with: npx tsx examples/agent-with-mcp.ts ./mcp.json
 */

import { agent, createLogger } from "@stepwise/core";
import { anthropic } from "@stepwise/anthropic";
import { createToolRegistry, setTimeoutDefaults } from "@stepwise/mcp";

const logger = createLogger({ level: "debug" });

async function main() {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error("Set ANTHROPIC_API_KEY to run this example");
  }

  setTimeoutDefaults({ connect: 15_000 });
  const registry = createToolRegistry({ logger, prefixToolNames: true });

  try {
    const tools = await registry.load(process.argv[2] ?? "mcp.json");
    logger.info(`Loaded ${tools.length} tools: ${tools.map((tool) => tool.name).join(", ")}`);

    const explorer = agent()
      .name("explorer")
      .systemPrompt("You explore the current project with the tools you have and report briefly.")
      .provider(anthropic({ apiKey, logger }))
      .toolRegistry(registry)
      .toolTimeout(90_000)
      .logger(logger)
      .build();

    const result = await explorer.run("List the top-level files and say what kind of project this is.");
    console.log(`\n${result.response}`);
    logger.success(`${result.status} after ${result.steps} steps`);
  } finally {
    await registry.cleanup();
  }
}

main().catch(console.error);
