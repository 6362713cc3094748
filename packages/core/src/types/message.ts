/**
 * Message types for agent conversations
 */

export type MessageRole = "system" | "user" | "assistant" | "tool";

export type BaseMessage = {
  id?: string;
  timestamp?: number;
};

export type SystemMessage = BaseMessage & {
  role: "system";
  content: string;
};

export type UserMessage = BaseMessage & {
  role: "user";
  content: string;
};

/**
 * Reasoning as the provider returned it, signature included. Providers that
 * verify earlier reasoning need these sent back unchanged on later turns.
 */
export type ThinkingBlock =
  | { type: "thinking"; thinking: string; signature: string }
  | { type: "redacted_thinking"; data: string };

export type AssistantMessage = BaseMessage & {
  role: "assistant";
  content: string | null;
  /** Reasoning text returned alongside the answer, when the model exposes it */
  thinking?: string;
  thinkingBlocks?: ThinkingBlock[];
  toolCalls?: ToolCall[];
};

export type ToolMessage = BaseMessage & {
  role: "tool";
  /** Id of the assistant tool call this message answers */
  toolCallId: string;
  /** Name of the tool that produced the result */
  name?: string;
  content: string;
};

export type ToolCall = {
  /** Unique within the response that requested it */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
};

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/**
 * Create a system message
 */
export function system(content: string): SystemMessage {
  return { role: "system", content };
}

/**
 * Create a user message
 */
export function user(content: string): UserMessage {
  return { role: "user", content };
}

/**
 * Create an assistant message
 */
export function assistant(
  content: string | null,
  extras?: Pick<AssistantMessage, "thinking" | "toolCalls">
): AssistantMessage {
  return {
    role: "assistant",
    content,
    ...(extras?.thinking ? { thinking: extras.thinking } : {}),
    ...(extras?.toolCalls && extras.toolCalls.length > 0 && { toolCalls: extras.toolCalls }),
  };
}

/**
 * Create a tool result message answering a tool call
 */
export function toolMessage(
  toolCallId: string,
  content: string,
  name?: string
): ToolMessage {
  return {
    role: "tool",
    toolCallId,
    content,
    ...(name ? { name } : {}),
  };
}
