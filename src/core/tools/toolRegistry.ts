/**
 * Register, validate, and run the sidekick's tool definitions.
 */
import { z } from 'zod';
import { CHARS_PER_TOKEN } from '../context/tokenEstimate';
import { renderToolError } from './toolText';

const DEFAULT_MAX_ARGS_CHARS = 2 * 1024 * 1024;
const ARGS_HEADROOM_CHARS = 64 * 1024;
// JSON escaping grows a string by at most six times (`\u0000`).
const JSON_ESCAPE_FACTOR = 6;

/**
 * Largest serialized argument payload that still lets a context of
 * `maxContextTokens` reach the store.
 */
export function toolArgsLimit(maxContextTokens: number): number {
  const maxContextChars = (maxContextTokens + 1) * CHARS_PER_TOKEN;
  return Math.max(DEFAULT_MAX_ARGS_CHARS, maxContextChars * JSON_ESCAPE_FACTOR + ARGS_HEADROOM_CHARS);
}

export interface ToolRegistryOptions {
  /** Host and port shown when a tool fails to reach the backend. */
  backendLabel: string;
  /** Cap on the JSON-serialized arguments, in UTF-16 code units. */
  maxArgsChars?: number;
}

/** Carry immutable context passed into every tool execution. */
export interface ToolExecutionContext {
  /** Rate-limit key of the caller; the gateway default applies when absent. */
  clientId?: string;
}

export type ToolArgs<TShape extends z.ZodRawShape> = z.objectOutputType<TShape, z.ZodTypeAny, 'strip'>;

/** Define one tool with an input shape and an async, text-returning body. */
export interface ToolDefinition<TShape extends z.ZodRawShape = z.ZodRawShape> {
  name: string;
  title: string;
  description: string;
  inputShape: TShape;
  execute(args: ToolArgs<TShape>, ctx: ToolExecutionContext): Promise<string>;
}

/** Type-erased tool as stored by the registry. */
export interface RegisteredTool {
  name: string;
  title: string;
  description: string;
  inputShape: z.ZodRawShape;
  run: (args: unknown, ctx: ToolExecutionContext) => Promise<string>;
}

/** Return shape for validating tool calls before execution. */
export type ToolValidationResult<TArgs = unknown> = { success: true; args: TArgs } | { success: false; error: string };

export function defineTool<TShape extends z.ZodRawShape>(tool: ToolDefinition<TShape>): ToolDefinition<TShape> {
  return tool;
}

/**
 * Validate untrusted arguments against a tool's input shape.
 */
export function validateToolArgs<TShape extends z.ZodRawShape>(
  tool: Pick<ToolDefinition<TShape>, 'name' | 'inputShape'>,
  args: unknown,
  maxArgsChars = DEFAULT_MAX_ARGS_CHARS,
): ToolValidationResult<ToolArgs<TShape>> {
  let argsJson: string | undefined;
  try {
    argsJson = JSON.stringify(args ?? {});
  } catch {
    return { success: false, error: `Tool arguments for "${tool.name}" must be JSON-serializable` };
  }

  if (argsJson.length > maxArgsChars) {
    return {
      success: false,
      error: `Tool arguments exceed maximum size (${argsJson.length} > ${maxArgsChars} characters)`,
    };
  }

  const parseResult = z.object(tool.inputShape).safeParse(args ?? {});
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return { success: false, error: `Invalid arguments for "${tool.name}": ${issues}` };
  }
  return { success: true, args: parseResult.data };
}

/**
 * Provide a registry for tool definitions.
 *
 * `execute` never throws: validation failures and errors raised by a tool body
 * come back as rendered text.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly backendLabel: string;
  private readonly maxArgsChars: number;

  constructor(options: ToolRegistryOptions) {
    this.backendLabel = options.backendLabel;
    this.maxArgsChars = options.maxArgsChars ?? DEFAULT_MAX_ARGS_CHARS;
  }

  /**
   * Register a tool definition.
   *
   * @throws Error when a duplicate tool name is registered.
   */
  register<TShape extends z.ZodRawShape>(tool: ToolDefinition<TShape>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, {
      name: tool.name,
      title: tool.title,
      description: tool.description,
      inputShape: tool.inputShape,
      run: async (args, ctx) => {
        const validation = validateToolArgs(tool, args, this.maxArgsChars);
        if (!validation.success) {
          return `❌ ${validation.error}`;
        }
        return tool.execute(validation.args, ctx);
      },
    });
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  list(): RegisteredTool[] {
    return Array.from(this.tools.values());
  }

  async execute(name: string, args: unknown, ctx: ToolExecutionContext = {}): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `❌ Unknown tool: "${name}". Allowed tools: ${this.listNames().join(', ') || 'none'}`;
    }
    try {
      return await tool.run(args, ctx);
    } catch (error) {
      return renderToolError(error, this.backendLabel);
    }
  }
}
