/**
 * Simple Agent Example
 *
 * The most basic usage of Stepwise: one agent, one prompt, no tools.
 *
 * Run with: npx tsx examples/simple-agent.ts
 */

import { agent } from "@stepwise/core";
import { anthropic } from "@stepwise/anthropic";

const apiKey = process.env.ANTHROPIC_API_KEY;
if (!apiKey) {
  throw new Error("Set ANTHROPIC_API_KEY to run this example");
}

const assistant = agent()
  .name("assistant")
  .systemPrompt("You are a friendly assistant. Keep answers short.")
  .provider(anthropic({ apiKey }))
  .build();

async function main() {
  console.log("Stepwise - Simple Agent Example\n");

  const result = await assistant.run("Explain what a tool-calling agent loop is in two sentences.");

  console.log(result.response);
  console.log(`\n[${result.status}] ${result.steps} step(s), ${result.usage.totalTokens} tokens`);
}

main().catch(console.error);
