/**
 * Tool definition and execution types
 */

/**
 * JSON Schema representation for tool parameters
 */
export type JsonSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
  [keyword: string]: unknown;
};

/**
 * Outcome of one tool execution. Failures are values, not exceptions.
 */
export type ToolResult = {
  success: boolean;
  content: string;
  error?: string;
};

/**
 * A named capability the model can invoke
 */
export type Tool<TParams = Record<string, unknown>> = {
  /** Unique name for the tool */
  name: string;
  /** Description of what the tool does (used by LLM) */
  description: string;
  /** JSON Schema for parameters */
  parameters: JsonSchema;
  /** Execute the tool with given parameters */
  execute(params: TParams): Promise<ToolResult> | ToolResult;
};

/**
 * Tool schema in the Anthropic messages shape
 */
export type ToolSchema = {
  name: string;
  description: string;
  input_schema: JsonSchema;
};

/**
 * Tool schema in the OpenAI function-calling shape
 */
export type FunctionToolSchema = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JsonSchema;
  };
};

/**
 * Create a tool definition
 */
export function defineTool<TParams = Record<string, unknown>>(
  input: Tool<TParams>
): Tool<TParams> {
  return {
    name: input.name,
    description: input.description,
    parameters: input.parameters,
    execute: (params) => input.execute(params),
  };
}

export function ok(content: string): ToolResult {
  return { success: true, content };
}

export function fail(error: string, content = ""): ToolResult {
  return { success: false, content, error };
}

export function toToolSchema(tool: Tool): ToolSchema {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters,
  };
}

export function toFunctionSchema(tool: Tool): FunctionToolSchema {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

/**
 * Text fed back to the model for a tool result
 */
export function formatToolResult(result: ToolResult): string {
  if (result.success) {
    return result.content;
  }
  return `Error: ${result.error ?? "Tool execution failed"}`;
}
