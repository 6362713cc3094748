/**
 * Agent definition and configuration types
 */

import type { Message, AssistantMessage, ToolCall } from "./message.js";
import type { Tool, ToolResult } from "./tool.js";
import type { Provider, TokenUsage } from "./provider.js";
import type { Logger } from "../logger.js";

/**
 * Anything that can contribute tools discovered at run time
 */
export type ToolSource = {
  tools: () => Tool[];
};

/**
 * Agent configuration
 */
export type AgentConfig = {
  /** Unique name for the agent */
  name: string;
  /** Description of the agent's role and capabilities */
  description?: string;
  /** System prompt that defines the agent's behavior */
  systemPrompt: string;
  /** LLM provider to use */
  provider: Provider;
  /** Model to use (provider-specific) */
  model?: string;
  /** Local tools available to this agent */
  tools?: Tool[];
  /** Registry whose tools are offered alongside the local ones */
  toolRegistry?: ToolSource;
  /** Temperature for generation */
  temperature?: number;
  /** Maximum tokens per response */
  maxTokens?: number;
  /** Maximum model calls per run (default: 50) */
  maxSteps?: number;
  /** Per-call timeout for tool execution in milliseconds (default: none) */
  toolTimeout?: number;
  /** How the tool calls of one step are dispatched (default: "parallel") */
  toolExecution?: "parallel" | "sequential";
  logger?: Logger;
};

/**
 * How a run ended
 * - completed: the model answered without requesting tools
 * - max_steps: the step budget ran out; `response` holds the last assistant text
 * - cancelled: cancellation was observed between steps
 * - error: the provider failed (retries included)
 */
export type AgentStatus = "completed" | "max_steps" | "cancelled" | "error";

/**
 * Agent state during execution
 */
export type AgentState = {
  /** Conversation history */
  messages: Message[];
  /** Model calls made so far */
  step: number;
  cancelled: boolean;
};

/**
 * Result of running an agent
 */
export type AgentResult = {
  status: AgentStatus;
  /** Final (or best partial) response from the agent */
  response: string;
  /** Full message history */
  messages: Message[];
  /** Number of steps taken */
  steps: number;
  /** Total token usage */
  usage: TokenUsage;
  /** Provider error when status is "error" */
  error?: Error;
};

/**
 * Agent execution context
 */
export type AgentContext = {
  /** Agent configuration */
  config: AgentConfig;
  /** Current state */
  state: AgentState;
};

/**
 * Hooks for agent lifecycle events
 */
export type AgentHooks = {
  /** Called before each generation */
  onBeforeGenerate?: (ctx: AgentContext) => void | Promise<void>;
  /** Called after each generation */
  onAfterGenerate?: (ctx: AgentContext, response: AssistantMessage) => void | Promise<void>;
  /** Called before tool execution */
  onBeforeToolCall?: (ctx: AgentContext, toolCall: ToolCall) => void | Promise<void>;
  /** Called after tool execution */
  onAfterToolCall?: (ctx: AgentContext, toolCall: ToolCall, result: ToolResult) => void | Promise<void>;
  /** Called on error */
  onError?: (ctx: AgentContext, error: Error) => void | Promise<void>;
};

export type RunOptions = {
  /** Aborting is treated as a cancellation request, honoured between steps */
  signal?: AbortSignal;
};

/**
 * One conversation with an agent
 */
export type AgentSession = {
  readonly messages: readonly Message[];
  readonly steps: number;
  readonly cancelled: boolean;
  addUserMessage: (content: string) => void;
  /** Request cancellation; observed before the next model call */
  cancel: () => void;
  run: (options?: RunOptions) => Promise<AgentResult>;
};

/**
 * Full agent definition
 */
export type Agent = {
  /** Agent configuration */
  config: AgentConfig;
  /** Lifecycle hooks */
  hooks?: AgentHooks;
  /** Start a conversation seeded with the system prompt */
  createSession: () => AgentSession;
  /** Run a fresh session with a single user message */
  run: (input: string, options?: RunOptions) => Promise<AgentResult>;
};
