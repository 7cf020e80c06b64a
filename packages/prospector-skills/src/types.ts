/** Arguments sent by the agent with a tool call */
export type JsonObject = Record<string, unknown>;

/** Tool parameter schema (JSON Schema subset accepted by OpenAI function calling) */
export type ToolParameterSchema = {
  type: "object";
  properties: Record<string, {
    type: "string" | "number" | "boolean" | "array" | "object";
    description: string;
    enum?: string[];
    items?: { type: string };
  }>;
  required?: string[];
};

/** Tool definition (sent to the model) */
export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
};

export type ToolCallRequest = {
  id: string;
  name: string;
  arguments: JsonObject;
};

export type ToolCallResult = {
  id: string;
  name: string;
  success: boolean;
  /** Adapter response serialized as JSON */
  output: string;
  error?: string;
  durationMs: number;
};

/** Logger accepted by adapters and the executor; core child loggers satisfy it */
export type ToolLogger = {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug?(message: string, data?: unknown): void;
};

export type ToolContext = {
  conversationId: string;
  logger?: ToolLogger;
};

export interface Tool {
  definition: ToolDefinition;
  execute(args: JsonObject, context: ToolContext): Promise<ToolCallResult>;
}

export type ToolAuditLog = {
  timestamp: string;
  conversationId: string;
  toolName: string;
  arguments: JsonObject;
  success: boolean;
  output?: string;
  error?: string;
  durationMs: number;
};

/** Minimal fetch signature so tests can inject a stub */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
