/**
 * OpenAI chat completions provider for Stepwise
 */

import OpenAI from "openai";
import type {
  ChatCompletionAssistantMessageParam,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import {
  createRetryConfig,
  isRecord,
  toFunctionSchema,
  withRetry,
  type AssistantMessage,
  type GenerateConfig,
  type GenerateResponse,
  type Message,
  type ProviderFactory,
  type ProviderOptions,
  type Tool,
  type ToolCall,
} from "@stepwise/core";

/**
 * Configuration for the OpenAI provider
 */
export type OpenAIConfig = ProviderOptions & {
  /** Organization ID */
  organization?: string;
};

export const DEFAULT_OPENAI_MODEL = "gpt-4o";

/**
 * Transform Stepwise messages to OpenAI chat completion format
 */
export function toOpenAIMessages(messages: Message[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "user":
        return { role: "user", content: message.content };
      case "tool":
        return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
      case "assistant": {
        const result: ChatCompletionAssistantMessageParam = {
          role: "assistant",
          content: message.content,
        };
        if (message.toolCalls?.length) {
          result.tool_calls = message.toolCalls.map((tc) => ({
            id: tc.id,
            type: "function",
            function: {
              name: tc.name,
              arguments: JSON.stringify(tc.arguments),
            },
          }));
        }
        return result;
      }
    }
  });
}

/**
 * Transform Stepwise tools to OpenAI tool format
 */
export function toOpenAITools(tools: Tool[]): ChatCompletionTool[] {
  return tools.map((tool) => toFunctionSchema(tool));
}

/**
 * Parse tool call arguments; malformed JSON yields an empty object
 */
function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function parseToolCalls(toolCalls: ChatCompletionMessageToolCall[]): ToolCall[] {
  return toolCalls.map((tc) => ({
    id: tc.id,
    name: tc.function.name,
    arguments: parseArguments(tc.function.arguments),
  }));
}

/**
 * Reasoning text some compatible endpoints attach to the message
 */
function reasoningOf(message: ChatCompletionMessage): string | undefined {
  if ("reasoning_content" in message && typeof message.reasoning_content === "string") {
    return message.reasoning_content || undefined;
  }
  return undefined;
}

/**
 * Map OpenAI finish reason to Stepwise format
 */
export function mapFinishReason(
  reason: string | null | undefined
): GenerateResponse["finishReason"] {
  switch (reason) {
    case "stop":
      return "stop";
    case "tool_calls":
    case "function_call":
      return "tool_calls";
    case "length":
      return "length";
    case "content_filter":
      return "refusal";
    default:
      return "stop";
  }
}

/**
 * Create an OpenAI provider
 */
export const createOpenAIProvider: ProviderFactory<OpenAIConfig> = (config) => {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    organization: config.organization,
    // Retries are handled by the retry policy below
    maxRetries: 0,
  });
  const defaultModel = config.defaultModel ?? DEFAULT_OPENAI_MODEL;
  const retry = createRetryConfig(config.retry);

  const generate = async (generateConfig: GenerateConfig): Promise<GenerateResponse> => {
    const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: generateConfig.model ?? defaultModel,
      messages: toOpenAIMessages(generateConfig.messages),
    };

    if (generateConfig.temperature !== undefined) {
      requestOptions.temperature = generateConfig.temperature;
    }
    if (generateConfig.maxTokens !== undefined) {
      requestOptions.max_tokens = generateConfig.maxTokens;
    }
    if (generateConfig.stop?.length) {
      requestOptions.stop = generateConfig.stop;
    }
    if (generateConfig.tools?.length) {
      requestOptions.tools = toOpenAITools(generateConfig.tools);
    }

    const response = await withRetry(
      () => client.chat.completions.create(requestOptions),
      retry,
      { onRetry: config.onRetry, logger: config.logger, label: "openai.chat.completions.create" }
    );

    const choice = response.choices[0];
    if (!choice?.message) {
      throw new Error("No response message from OpenAI");
    }

    const toolCalls = choice.message.tool_calls?.length
      ? parseToolCalls(choice.message.tool_calls)
      : [];
    const thinking = reasoningOf(choice.message);

    const message: AssistantMessage = {
      role: "assistant",
      content: choice.message.content,
      ...(thinking !== undefined && { thinking }),
      ...(toolCalls.length > 0 && { toolCalls }),
    };

    let finishReason = mapFinishReason(choice.finish_reason);
    if (toolCalls.length > 0) {
      finishReason = "tool_calls";
    } else if (choice.message.refusal) {
      finishReason = "refusal";
    } else if (finishReason === "tool_calls") {
      // tool_calls without any calls to run
      finishReason = "stop";
    }

    const usage = response.usage
      ? {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens,
        }
      : undefined;

    return {
      message,
      usage,
      finishReason,
    };
  };

  return {
    name: "openai",
    generate,
  };
};

/**
 * Convenience alias
 */
export const openai = createOpenAIProvider;
