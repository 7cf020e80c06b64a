import type {
  JsonObject,
  Tool,
  ToolAuditLog,
  ToolCallRequest,
  ToolCallResult,
  ToolContext,
  ToolLogger,
} from "./types.js";
import { truncateText } from "./builtin/truncate.js";

const AUDIT_OUTPUT_LIMIT = 200;

export type ToolExecutorOptions = {
  tools: Tool[];
  auditLogger?: (log: ToolAuditLog) => void;
  /** Injected into ToolContext for the tools to use */
  logger?: ToolLogger;
};

export type OpenAIToolDefinition = {
  type: "function";
  function: { name: string; description: string; parameters: object };
};

export class ToolExecutor {
  private readonly tools: Map<string, Tool>;
  private readonly auditLogger?: (log: ToolAuditLog) => void;
  private readonly logger?: ToolLogger;

  constructor(options: ToolExecutorOptions) {
    this.tools = new Map(options.tools.map(t => [t.definition.name, t]));
    this.auditLogger = options.auditLogger;
    this.logger = options.logger;
  }

  /** Tool definitions in function-calling shape (sent to the model) */
  getDefinitions(): OpenAIToolDefinition[] {
    return Array.from(this.tools.values()).map(t => ({
      type: "function" as const,
      function: {
        name: t.definition.name,
        description: t.definition.description,
        parameters: t.definition.parameters,
      },
    }));
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  registerTool(tool: Tool): void {
    if (this.tools.has(tool.definition.name)) {
      (this.logger?.warn ?? console.warn)(`[ToolExecutor] tool "${tool.definition.name}" already registered, overwriting`);
    }
    this.tools.set(tool.definition.name, tool);
  }

  unregisterTool(name: string): boolean {
    return this.tools.delete(name);
  }

  getToolCount(): number {
    return this.tools.size;
  }

  async execute(request: ToolCallRequest, conversationId: string): Promise<ToolCallResult> {
    const start = Date.now();
    const tool = this.tools.get(request.name);

    if (!tool) {
      const result: ToolCallResult = {
        id: request.id,
        name: request.name,
        success: false,
        output: "",
        error: `Unknown tool: ${request.name}`,
        durationMs: Date.now() - start,
      };
      this.audit(result, conversationId, request.arguments);
      return result;
    }

    const context: ToolContext = { conversationId, logger: this.logger };

    try {
      const result = await tool.execute(request.arguments, context);
      // the tool does not know the call id
      result.id = request.id;
      result.durationMs = Date.now() - start;
      this.audit(result, conversationId, request.arguments);
      return result;
    } catch (err) {
      const result: ToolCallResult = {
        id: request.id,
        name: request.name,
        success: false,
        output: "",
        error: err instanceof Error ? err.message : String(err),
        durationMs: Date.now() - start,
      };
      this.audit(result, conversationId, request.arguments);
      return result;
    }
  }

  /** Runs the calls in parallel */
  async executeAll(requests: ToolCallRequest[], conversationId: string): Promise<ToolCallResult[]> {
    return Promise.all(requests.map(req => this.execute(req, conversationId)));
  }

  private audit(result: ToolCallResult, conversationId: string, args: JsonObject): void {
    if (!this.auditLogger) return;

    this.auditLogger({
      timestamp: new Date().toISOString(),
      conversationId,
      toolName: result.name,
      arguments: sanitizeArgs(args),
      success: result.success,
      output: truncateText(result.output, AUDIT_OUTPUT_LIMIT),
      error: result.error,
      durationMs: result.durationMs,
    });
  }
}

/** Redact argument values whose key looks like a credential */
export function sanitizeArgs(args: JsonObject): JsonObject {
  const sensitiveKeys = ["password", "token", "key", "secret", "api_key", "apikey"];
  const result: JsonObject = {};

  for (const [k, v] of Object.entries(args)) {
    if (sensitiveKeys.some(s => k.toLowerCase().includes(s))) {
      result[k] = "[REDACTED]";
    } else {
      result[k] = v;
    }
  }

  return result;
}
