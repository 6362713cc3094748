/**
 * Agent with Tools Example
 *
 * Local tools, note tools that persist between runs, and lifecycle hooks
 * that log what the agent is doing.
 *
 * Run with: npx tsx examples/agent-with-tools.ts
 */

import { agent, defineTool, fail, ok } from "@stepwise/core";
import { openai } from "@stepwise/openai";
import { createNoteTools } from "@stepwise/tools";

const apiKey = process.env.OPENAI_API_KEY;
if (!apiKey) {
  throw new Error("Set OPENAI_API_KEY to run this example");
}

const calculate = defineTool<{ expression: string }>({
  name: "calculate",
  description: "Performs basic arithmetic on two numbers, e.g. '250 * 0.15'",
  parameters: {
    type: "object",
    properties: {
      expression: {
        type: "string",
        description: "Two numbers joined by +, -, * or /",
      },
    },
    required: ["expression"],
  },
  execute: ({ expression }) => {
    const match = /^\s*(-?\d+(?:\.\d+)?)\s*([+\-*/])\s*(-?\d+(?:\.\d+)?)\s*$/.exec(expression);
    if (!match) {
      return fail(`Could not evaluate '${expression}'`);
    }
    const [, left, operator, right] = match;
    const a = Number(left);
    const b = Number(right);
    switch (operator) {
      case "+":
        return ok(String(a + b));
      case "-":
        return ok(String(a - b));
      case "*":
        return ok(String(a * b));
      default:
        return b === 0 ? fail("Division by zero") : ok(String(a / b));
    }
  },
});

let startTime = 0;

const helper = agent()
  .name("helper")
  .description("An assistant that calculates and remembers")
  .systemPrompt(`You are a helpful assistant with a calculator and a notebook.
Use calculate for arithmetic. Record facts about the user with record_note
and check recall_notes before answering questions about them.`)
  .provider(openai({ apiKey }))
  .tools([calculate, ...createNoteTools({ file: ".stepwise/notes.json" })])
  .maxSteps(8)
  .onBeforeGenerate((ctx) => {
    startTime = Date.now();
    console.log(`\n[step ${ctx.state.step + 1}] Generating response...`);
  })
  .onAfterGenerate((_ctx, message) => {
    const duration = Date.now() - startTime;
    const count = message.toolCalls?.length ?? 0;
    console.log(
      count > 0
        ? `[${duration}ms] Model wants to use ${count} tool(s)`
        : `[${duration}ms] Model generated final response`
    );
  })
  .onBeforeToolCall((_ctx, toolCall) => {
    console.log(`  -> ${toolCall.name} ${JSON.stringify(toolCall.arguments)}`);
  })
  .onAfterToolCall((_ctx, toolCall, result) => {
    console.log(`  <- ${toolCall.name}: ${result.success ? result.content : `error: ${result.error}`}`);
  })
  .build();

async function main() {
  console.log("Stepwise - Agent with Tools Example");

  const first = await helper.run("My budget is 250 euros. What is 15% of it? Please remember my budget.");
  console.log("\nAssistant:", first.response);

  const second = await helper.run("What was my budget again?");
  console.log("\nAssistant:", second.response);
}

main().catch(console.error);
