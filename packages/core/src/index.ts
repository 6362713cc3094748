/**
 * @stepwise/core
 *
 * Tool-calling agent step-loop with a pluggable, LLM-agnostic provider contract
 *
 * @example
 * ```typescript
 * import { agent, defineTool, ok } from "@stepwise/core";
 *
 * const myAgent = agent()
 *   .name("assistant")
 *   .systemPrompt("You are a helpful assistant.")
 *   .provider(myProvider)
 *   .tools([searchTool, calculatorTool])
 *   .maxSteps(20)
 *   .build();
 *
 * const result = await myAgent.run("What is 2 + 2?");
 * console.log(result.status, result.response);
 * ```
 */

// Type exports
export type {
  // Messages
  Message,
  MessageRole,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ThinkingBlock,
  ToolMessage,
  ToolCall,
  // Tools
  Tool,
  ToolResult,
  ToolSchema,
  FunctionToolSchema,
  JsonSchema,
  // Provider
  Provider,
  ProviderFactory,
  ProviderOptions,
  GenerateConfig,
  GenerateResponse,
  FinishReason,
  TokenUsage,
  // Agent
  Agent,
  AgentConfig,
  AgentState,
  AgentStatus,
  AgentResult,
  AgentContext,
  AgentHooks,
  AgentSession,
  RunOptions,
  ToolSource,
} from "./types/index.js";

// Function exports
export { system, user, assistant, toolMessage } from "./types/message.js";
export {
  defineTool,
  ok,
  fail,
  toToolSchema,
  toFunctionSchema,
  formatToolResult,
} from "./types/tool.js";
export { createAgent, agent, AgentBuilder } from "./agent.js";

// Sessions
export {
  createSessionManager,
  type SessionManager,
  type SessionInfo,
  type PromptResult,
  type StopReason,
} from "./session-manager.js";

// Retry
export {
  withRetry,
  createRetryConfig,
  calculateDelay,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type RetryOptions,
} from "./retry.js";

// Logging
export {
  createLogger,
  silentLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";

// Validation utilities
export { validateToolArguments, sanitizeError, isRecord } from "./validation.js";
export { withTimeout, TimeoutError } from "./timeout.js";
