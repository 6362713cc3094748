/**
 * Agent implementation
 */

import type {
  Agent,
  AgentConfig,
  AgentContext,
  AgentHooks,
  AgentResult,
  AgentSession,
  AgentState,
  AgentStatus,
  AssistantMessage,
  Message,
  RunOptions,
  TokenUsage,
  Tool,
  ToolCall,
  ToolMessage,
  ToolResult,
} from "./types/index.js";
import { fail, formatToolResult } from "./types/tool.js";
import { toolMessage } from "./types/message.js";
import { sanitizeError, validateToolArguments } from "./validation.js";
import { silentLogger, type Logger } from "./logger.js";
import { withTimeout } from "./timeout.js";

const DEFAULT_MAX_STEPS = 50;

/**
 * Create an agent with the given configuration
 */
export function createAgent(config: AgentConfig, hooks?: AgentHooks): Agent {
  const createSession = (): AgentSession => createAgentSession(config, hooks);

  async function run(input: string, options?: RunOptions): Promise<AgentResult> {
    const session = createSession();
    session.addUserMessage(input);
    return session.run(options);
  }

  return {
    config,
    hooks,
    createSession,
    run,
  };
}

function createAgentSession(config: AgentConfig, hooks?: AgentHooks): AgentSession {
  const maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;
  const logger = config.logger ?? silentLogger;

  const state: AgentState = {
    messages: [{ role: "system", content: config.systemPrompt }],
    step: 0,
    cancelled: false,
  };
  const ctx: AgentContext = { config, state };

  async function run(options?: RunOptions): Promise<AgentResult> {
    const usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
    const isCancelled = () => state.cancelled || options?.signal?.aborted === true;
    const finish = (status: AgentStatus, error?: Error): AgentResult => ({
      status,
      response: lastAssistantContent(state.messages),
      messages: state.messages,
      steps: state.step,
      usage,
      ...(error && { error }),
    });

    // Each run gets its own step budget
    state.step = 0;

    while (state.step < maxSteps) {
      if (isCancelled()) {
        logger.info(`${config.name}: cancelled after ${state.step} steps`);
        return finish("cancelled");
      }

      await callHook(logger, "onBeforeGenerate", () => hooks?.onBeforeGenerate?.(ctx));

      let message: AssistantMessage;
      try {
        const response = await config.provider.generate({
          messages: state.messages,
          tools: availableTools(config),
          model: config.model,
          temperature: config.temperature,
          maxTokens: config.maxTokens,
        });

        if (response.usage) {
          usage.promptTokens += response.usage.promptTokens;
          usage.completionTokens += response.usage.completionTokens;
          usage.totalTokens += response.usage.totalTokens;
        }
        message = response.message;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.error(`${config.name}: generation failed: ${err.message}`);
        await callHook(logger, "onError", () => hooks?.onError?.(ctx, err));
        return finish("error", err);
      }

      state.messages.push(message);
      state.step++;

      const generated = message;
      await callHook(logger, "onAfterGenerate", () => hooks?.onAfterGenerate?.(ctx, generated));

      const toolCalls = message.toolCalls ?? [];
      if (toolCalls.length === 0) {
        return finish("completed");
      }

      const results = await dispatchToolCalls(ctx, toolCalls, hooks);
      state.messages.push(...results);
    }

    logger.warn(`${config.name}: task could not be completed within ${maxSteps} steps`);
    return finish("max_steps");
  }

  return {
    get messages() {
      return state.messages;
    },
    get steps() {
      return state.step;
    },
    get cancelled() {
      return state.cancelled;
    },
    addUserMessage(content: string) {
      state.messages.push({ role: "user", content });
    },
    cancel() {
      state.cancelled = true;
    },
    run,
  };
}

/**
 * Local tools first, then tools discovered through the registry
 */
function availableTools(config: AgentConfig): Tool[] {
  return [...(config.tools ?? []), ...(config.toolRegistry?.tools() ?? [])];
}

function lastAssistantContent(messages: Message[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === "assistant" && message.content) {
      return message.content;
    }
  }
  return "";
}

/**
 * Run every tool call of one step. Result messages keep the order of `toolCalls`.
 */
async function dispatchToolCalls(
  ctx: AgentContext,
  toolCalls: ToolCall[],
  hooks?: AgentHooks
): Promise<ToolMessage[]> {
  const tools = new Map<string, Tool>();
  for (const tool of availableTools(ctx.config)) {
    if (!tools.has(tool.name)) {
      tools.set(tool.name, tool);
    }
  }

  const runOne = async (toolCall: ToolCall): Promise<ToolMessage> => {
    const result = await executeToolCall(ctx, tools.get(toolCall.name), toolCall, hooks);
    return toolMessage(toolCall.id, formatToolResult(result), toolCall.name);
  };

  if (ctx.config.toolExecution === "sequential") {
    const messages: ToolMessage[] = [];
    for (const toolCall of toolCalls) {
      messages.push(await runOne(toolCall));
    }
    return messages;
  }

  return Promise.all(toolCalls.map(runOne));
}

/**
 * Execute a single tool call; every failure becomes a failed ToolResult
 */
async function executeToolCall(
  ctx: AgentContext,
  tool: Tool | undefined,
  toolCall: ToolCall,
  hooks?: AgentHooks
): Promise<ToolResult> {
  if (!tool) {
    return fail(`Unknown tool: ${toolCall.name}`);
  }

  const problems = validateToolArguments(toolCall.arguments, tool.parameters);
  if (problems.length > 0) {
    return fail(`Invalid arguments for ${toolCall.name}: ${problems.join("; ")}`);
  }

  let result: ToolResult;
  try {
    await hooks?.onBeforeToolCall?.(ctx, toolCall);
    result = await withTimeout(
      Promise.resolve(tool.execute(toolCall.arguments)),
      ctx.config.toolTimeout,
      `Tool '${toolCall.name}' timed out after ${ctx.config.toolTimeout}ms`
    );
  } catch (error) {
    result = fail(sanitizeError(error));
  }

  const finished = result;
  await callHook(ctx.config.logger ?? silentLogger, "onAfterToolCall", () =>
    hooks?.onAfterToolCall?.(ctx, toolCall, finished)
  );
  return finished;
}

/**
 * Run a lifecycle hook; a throwing hook is logged and never ends the run
 */
async function callHook(
  logger: Logger,
  name: string,
  hook: () => void | Promise<void> | undefined
): Promise<void> {
  try {
    await hook();
  } catch (error) {
    logger.warn(`${name} hook failed: ${sanitizeError(error)}`);
  }
}

/**
 * Builder pattern for creating agents
 */
export class AgentBuilder {
  private config: Partial<AgentConfig> = {};
  private agentHooks: AgentHooks = {};

  name(name: string): this {
    this.config.name = name;
    return this;
  }

  description(description: string): this {
    this.config.description = description;
    return this;
  }

  systemPrompt(prompt: string): this {
    this.config.systemPrompt = prompt;
    return this;
  }

  provider(provider: AgentConfig["provider"]): this {
    this.config.provider = provider;
    return this;
  }

  model(model: string): this {
    this.config.model = model;
    return this;
  }

  tools(tools: AgentConfig["tools"]): this {
    this.config.tools = tools;
    return this;
  }

  toolRegistry(registry: AgentConfig["toolRegistry"]): this {
    this.config.toolRegistry = registry;
    return this;
  }

  temperature(temp: number): this {
    this.config.temperature = temp;
    return this;
  }

  maxTokens(tokens: number): this {
    this.config.maxTokens = tokens;
    return this;
  }

  maxSteps(steps: number): this {
    this.config.maxSteps = steps;
    return this;
  }

  toolTimeout(ms: number): this {
    this.config.toolTimeout = ms;
    return this;
  }

  toolExecution(mode: NonNullable<AgentConfig["toolExecution"]>): this {
    this.config.toolExecution = mode;
    return this;
  }

  logger(logger: AgentConfig["logger"]): this {
    this.config.logger = logger;
    return this;
  }

  onBeforeGenerate(hook: AgentHooks["onBeforeGenerate"]): this {
    this.agentHooks.onBeforeGenerate = hook;
    return this;
  }

  onAfterGenerate(hook: AgentHooks["onAfterGenerate"]): this {
    this.agentHooks.onAfterGenerate = hook;
    return this;
  }

  onBeforeToolCall(hook: AgentHooks["onBeforeToolCall"]): this {
    this.agentHooks.onBeforeToolCall = hook;
    return this;
  }

  onAfterToolCall(hook: AgentHooks["onAfterToolCall"]): this {
    this.agentHooks.onAfterToolCall = hook;
    return this;
  }

  onError(hook: AgentHooks["onError"]): this {
    this.agentHooks.onError = hook;
    return this;
  }

  build(): Agent {
    const { name, systemPrompt, provider } = this.config;
    if (!name) {
      throw new Error("Agent name is required");
    }
    if (!systemPrompt) {
      throw new Error("System prompt is required");
    }
    if (!provider) {
      throw new Error("Provider is required");
    }

    return createAgent({ ...this.config, name, systemPrompt, provider }, this.agentHooks);
  }
}

/**
 * Start building an agent
 */
export function agent(): AgentBuilder {
  return new AgentBuilder();
}
