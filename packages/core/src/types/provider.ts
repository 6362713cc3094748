/**
 * LLM Provider abstraction
 * Every backend satisfies this contract; callers never branch on which one is active
 */

import type { AssistantMessage, Message } from "./message.js";
import type { Tool } from "./tool.js";
import type { RetryConfig } from "../retry.js";
import type { Logger } from "../logger.js";

/**
 * Configuration for a generation request
 */
export type GenerateConfig = {
  /** Messages to send to the LLM */
  messages: Message[];
  /** Available tools for the LLM to use */
  tools?: Tool[];
  /** Model identifier (provider-specific) */
  model?: string;
  /** Temperature for randomness (0-1) */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Stop sequences */
  stop?: string[];
};

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type FinishReason = "stop" | "tool_calls" | "length" | "refusal" | "error";

/**
 * Response from an LLM generation.
 * `message.toolCalls` is non-empty exactly when `finishReason` is "tool_calls".
 */
export type GenerateResponse = {
  /** The generated message */
  message: AssistantMessage;
  /** Token usage information */
  usage?: TokenUsage;
  finishReason: FinishReason;
};

/**
 * LLM Provider interface
 * Implement this to add support for a new LLM
 */
export type Provider = {
  /** Provider name (e.g., "openai", "anthropic") */
  name: string;

  /** Generate a response */
  generate: (config: GenerateConfig) => Promise<GenerateResponse>;
};

/**
 * Settings shared by the bundled provider factories
 */
export type ProviderOptions = {
  /** API key */
  apiKey: string;
  /** Default model to use */
  defaultModel?: string;
  /** Base URL for API (for proxies or compatible APIs) */
  baseURL?: string;
  /** Retry policy applied around each request */
  retry?: Partial<RetryConfig>;
  /** Observer called before each retry with the error and the retry number */
  onRetry?: (error: unknown, attempt: number) => void;
  logger?: Logger;
};

/**
 * Provider factory function type
 */
export type ProviderFactory<TConfig = ProviderOptions> = (config: TConfig) => Provider;
