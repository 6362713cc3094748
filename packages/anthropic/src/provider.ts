/**
 * Anthropic Claude provider for Stepwise
 */

import Anthropic from "@anthropic-ai/sdk";
import type {
  ContentBlock,
  ContentBlockParam,
  MessageParam,
  Tool as AnthropicTool,
} from "@anthropic-ai/sdk/resources/messages";
import {
  createRetryConfig,
  isRecord,
  toToolSchema,
  withRetry,
  type AssistantMessage,
  type GenerateConfig,
  type GenerateResponse,
  type Message,
  type ProviderFactory,
  type ThinkingBlock,
  type ProviderOptions,
  type Tool,
  type ToolCall,
} from "@stepwise/core";

/**
 * Configuration for the Anthropic provider
 */
export type AnthropicConfig = ProviderOptions & {
  /** Token budget for extended thinking; thinking is off when unset */
  thinkingBudget?: number;
};

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-20250514";

/**
 * Transform Stepwise messages to Anthropic message format
 * Anthropic has different requirements:
 * - System messages go in a separate parameter
 * - Tool results are user messages with tool_result content blocks
 * - Assistant tool calls use tool_use content blocks
 */
export function toAnthropicMessages(
  messages: Message[]
): { messages: MessageParam[]; system?: string } {
  let system: string | undefined;
  const result: MessageParam[] = [];

  for (const message of messages) {
    if (message.role === "system") {
      system = message.content;
    } else if (message.role === "user") {
      result.push({
        role: "user",
        content: message.content,
      });
    } else if (message.role === "assistant") {
      // Signed reasoning has to lead the turn it came from
      const content: ContentBlockParam[] = [...(message.thinkingBlocks ?? [])];

      if (message.content) {
        content.push({
          type: "text",
          text: message.content,
        });
      }

      for (const toolCall of message.toolCalls ?? []) {
        content.push({
          type: "tool_use",
          id: toolCall.id,
          name: toolCall.name,
          input: toolCall.arguments,
        });
      }

      if (content.length > 0) {
        result.push({
          role: "assistant",
          content,
        });
      }
    } else {
      const block: ContentBlockParam = {
        type: "tool_result",
        tool_use_id: message.toolCallId,
        content: message.content,
      };
      // Consecutive tool results belong in one user turn
      const previous = result[result.length - 1];
      if (previous?.role === "user" && Array.isArray(previous.content)) {
        previous.content.push(block);
      } else {
        result.push({ role: "user", content: [block] });
      }
    }
  }

  return { messages: result, system };
}

/**
 * Transform Stepwise tools to Anthropic tool format
 */
export function toAnthropicTools(tools: Tool[]): AnthropicTool[] {
  return tools.map((tool) => {
    const schema = toToolSchema(tool);
    return {
      name: schema.name,
      description: schema.description,
      input_schema: schema.input_schema,
    };
  });
}

/**
 * Parse Anthropic response content blocks to Stepwise format
 */
export function parseResponseContent(content: ContentBlock[]): {
  textContent: string | null;
  thinking?: string;
  thinkingBlocks: ThinkingBlock[];
  toolCalls: ToolCall[];
} {
  let textContent: string | null = null;
  let thinking: string | undefined;
  const thinkingBlocks: ThinkingBlock[] = [];
  const toolCalls: ToolCall[] = [];

  for (const block of content) {
    if (block.type === "text") {
      textContent = (textContent ?? "") + block.text;
    } else if (block.type === "thinking") {
      thinking = (thinking ?? "") + block.thinking;
      thinkingBlocks.push({ type: "thinking", thinking: block.thinking, signature: block.signature });
    } else if (block.type === "redacted_thinking") {
      thinkingBlocks.push({ type: "redacted_thinking", data: block.data });
    } else if (block.type === "tool_use") {
      toolCalls.push({
        id: block.id,
        name: block.name,
        arguments: isRecord(block.input) ? block.input : {},
      });
    }
  }

  return { textContent, thinking, thinkingBlocks, toolCalls };
}

/**
 * Map Anthropic stop reason to Stepwise format
 */
export function mapStopReason(
  reason: string | null | undefined
): GenerateResponse["finishReason"] {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
      return "stop";
    case "tool_use":
      return "tool_calls";
    case "max_tokens":
      return "length";
    case "refusal":
      return "refusal";
    default:
      return "stop";
  }
}

/**
 * Create an Anthropic provider
 */
export const createAnthropicProvider: ProviderFactory<AnthropicConfig> = (config) => {
  const client = new Anthropic({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    // Retries are handled by the retry policy below
    maxRetries: 0,
  });
  const defaultModel = config.defaultModel ?? DEFAULT_ANTHROPIC_MODEL;
  const retry = createRetryConfig(config.retry);

  const generate = async (generateConfig: GenerateConfig): Promise<GenerateResponse> => {
    const model = generateConfig.model ?? defaultModel;
    const { messages, system } = toAnthropicMessages(generateConfig.messages);

    // Build request options - Anthropic requires max_tokens
    const requestOptions: Anthropic.MessageCreateParamsNonStreaming = {
      model,
      messages,
      max_tokens: generateConfig.maxTokens ?? 4096,
    };

    if (system) {
      requestOptions.system = system;
    }
    if (generateConfig.temperature !== undefined) {
      requestOptions.temperature = generateConfig.temperature;
    }
    if (generateConfig.stop?.length) {
      requestOptions.stop_sequences = generateConfig.stop;
    }
    if (generateConfig.tools?.length) {
      requestOptions.tools = toAnthropicTools(generateConfig.tools);
    }
    if (config.thinkingBudget !== undefined) {
      requestOptions.thinking = { type: "enabled", budget_tokens: config.thinkingBudget };
    }

    const response = await withRetry(
      () => client.messages.create(requestOptions),
      retry,
      { onRetry: config.onRetry, logger: config.logger, label: "anthropic.messages.create" }
    );

    const { textContent, thinking, thinkingBlocks, toolCalls } = parseResponseContent(
      response.content
    );

    const message: AssistantMessage = {
      role: "assistant",
      content: textContent,
      ...(thinking !== undefined && { thinking }),
      ...(thinkingBlocks.length > 0 && { thinkingBlocks }),
      ...(toolCalls.length > 0 && { toolCalls }),
    };

    const finishReason = toolCalls.length
      ? "tool_calls"
      : mapStopReason(response.stop_reason);

    const usage = {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    return {
      message,
      usage,
      finishReason,
    };
  };

  return {
    name: "anthropic",
    generate,
  };
};

/**
 * Convenience alias
 */
export const anthropic = createAnthropicProvider;
