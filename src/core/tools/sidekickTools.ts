/**
 * The sidekick's tool surface. Each tool returns human-readable text; typed
 * errors from the services below are rendered here and never escape.
 */
import { z } from 'zod';
import { AppError, isAppError } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import type { BatchResult, ChunkResult } from '../batch/batchDispatcher';
import type { DeriveResult } from '../context/contextStore';
import { categorizeModels, isModelType, MODEL_TYPE_KEYWORDS } from '../llm/model-catalog';
import type { SidekickServices } from '../runtime/sidekickServices';
import { collectStats, formatUptime } from '../stats/sidekickStats';
import { runMenialTask } from '../tasks/menialTasks';
import { defineTool, type ToolDefinition, ToolRegistry, toolArgsLimit } from './toolRegistry';
import { renderToolError, SYMBOL_FAIL, SYMBOL_OK, SYMBOL_WARN } from './toolText';

const logger = childLogger({ module: 'sidekick-tools' });

const CONTEXT_OPERATIONS = ['store', 'retrieve', 'summarize', 'analyze'] as const;
type ContextOperation = (typeof CONTEXT_OPERATIONS)[number];

function isContextOperation(value: string): value is ContextOperation {
  return CONTEXT_OPERATIONS.some((operation) => operation === value);
}

function statusOf(error: AppError): number | undefined {
  const status = error.details?.status;
  return typeof status === 'number' ? status : undefined;
}

function formatNumber(value: number): string {
  return value.toLocaleString('en-US');
}

export function renderModelListing(ids: readonly string[], backendLabel: string, isRecommended: (id: string) => boolean): string {
  if (ids.length === 0) {
    return `No models found in LM Studio at ${backendLabel}.`;
  }

  const { coding, general, specialized } = categorizeModels(ids);
  let result = `🤖 Available models in LM Studio (${backendLabel}):\n\n`;

  if (coding.length > 0) {
    result += '💻 **Coding Models** (Great for sidekick tasks):\n';
    for (const id of coding) {
      result += isRecommended(id) ? `  - ${id} ⭐ RECOMMENDED\n` : `  - ${id}\n`;
    }
    result += '\n';
  }

  if (general.length > 0) {
    result += '🌐 **General Models**:\n';
    for (const id of general) {
      result += `  - ${id}\n`;
    }
    result += '\n';
  }

  if (specialized.length > 0) {
    result += '🔧 **Specialized Models**:\n';
    for (const id of specialized) {
      result += `  - ${id}\n`;
    }
  }

  return result;
}

export function describeLoadedModel(model: string, backendLabel: string): string {
  let result = `🎯 Currently loaded model at ${backendLabel}: ${model}\n\n`;
  const lower = model.toLowerCase();
  if (lower.includes('coder')) {
    result += '💡 This is a coding model - perfect for:\n';
    result += '  • Code generation and refactoring\n';
    result += '  • Debugging and optimization\n';
    result += '  • Documentation tasks\n';
  } else if (lower.includes('instruct')) {
    result += '💡 This is an instruction-following model - great for:\n';
    result += '  • General Q&A and explanations\n';
    result += '  • Task automation\n';
    result += '  • Content generation\n';
  }
  return result;
}

function renderDerive(result: DeriveResult): string {
  if (result.operation === 'analyze') {
    return `🔍 Analysis:\n\n${result.text}`;
  }
  let text = `📝 Summary created:\n\n${result.text}`;
  if (result.savedAs) {
    text += `\n\n(Saved as '${result.savedAs}')`;
  } else if (result.saveError) {
    text += `\n\n${SYMBOL_WARN} Summary not saved: ${result.saveError.message}`;
  }
  return text;
}

function chunkText(chunk: ChunkResult, backendLabel: string): string {
  return chunk.ok ? chunk.output : renderToolError(chunk.error, backendLabel);
}

export function renderBatchResult(result: BatchResult, combine: boolean, backendLabel: string): string {
  if (combine) {
    const segments = result.chunks.map(
      (chunk) => `**Batch ${chunk.index}/${result.totalChunks}:**\n${chunkText(chunk, backendLabel)}`,
    );
    if (result.rateLimitedAt !== undefined) {
      segments.push(
        `${SYMBOL_WARN} Rate limit hit at batch ${result.rateLimitedAt}. Processed ${result.processedItems} items.`,
      );
    }
    return segments.join('\n\n---\n\n');
  }

  const structured: Record<string, unknown> = {
    total_items: result.totalItems,
    processed_items: result.processedItems,
    results: result.chunks.map((chunk) => chunkText(chunk, backendLabel)),
  };
  if (result.rateLimitedAt !== undefined) {
    structured.rate_limited_at_batch = result.rateLimitedAt;
  }
  return JSON.stringify(structured, null, 2);
}

export function createSidekickTools(services: SidekickServices): ToolDefinition[] {
  const { backendLabel, gateway, contextStore, batchDispatcher, modelCatalog, rateLimiter } = services;

  const healthCheck = defineTool({
    name: 'health_check',
    title: 'Health Check',
    description: 'Check if the LM Studio API is accessible and report its status and configuration.',
    inputShape: {},
    execute: async () => {
      logger.info({ backend: backendLabel }, 'Checking LM Studio');
      try {
        const models = await modelCatalog.refresh();
        let status = `${SYMBOL_OK} LM Studio API is running and accessible at ${backendLabel}\n`;
        status += `📊 ${models.length} models available\n`;
        status += modelCatalog.hasRecommended(models)
          ? `✨ Recommended model '${modelCatalog.recommendedModel}' is available!`
          : `ℹ️ Recommended model '${modelCatalog.recommendedModel}' not found. Consider loading it for optimal performance.`;
        return status;
      } catch (error) {
        if (isAppError(error, 'BACKEND_BAD_STATUS')) {
          return `${SYMBOL_WARN} LM Studio API at ${backendLabel} returned status code ${statusOf(error) ?? 'unknown'}.`;
        }
        if (isAppError(error, 'BACKEND_UNREACHABLE')) {
          return `${SYMBOL_FAIL} Cannot connect to LM Studio at ${backendLabel}. Make sure LM Studio is running and the server is started.`;
        }
        throw error;
      }
    },
  });

  const listModels = defineTool({
    name: 'list_models',
    title: 'List Models',
    description: 'List all models available in LM Studio, grouped by category, with sidekick recommendations.',
    inputShape: {},
    execute: async () => {
      const models = await modelCatalog.refresh();
      return renderModelListing(models, backendLabel, (id) => modelCatalog.isRecommended(id));
    },
  });

  const getCurrentModel = defineTool({
    name: 'get_current_model',
    title: 'Current Model',
    description: 'Identify the model currently loaded in LM Studio and what it is good at.',
    inputShape: {},
    execute: async (_args, ctx) => {
      try {
        const probe = await gateway.probeCurrentModel(ctx.clientId);
        return describeLoadedModel(probe.model, backendLabel);
      } catch (error) {
        if (isAppError(error, 'BACKEND_BAD_STATUS')) {
          return `${SYMBOL_FAIL} No model currently loaded at ${backendLabel}. Status code: ${statusOf(error) ?? 'unknown'}`;
        }
        throw error;
      }
    },
  });

  const chatCompletion = defineTool({
    name: 'chat_completion',
    title: 'Chat Completion',
    description: 'Generate a completion from the current LM Studio model.',
    inputShape: {
      prompt: z.string().describe("The user's prompt to send to the model"),
      system_prompt: z.string().optional().default('').describe('Optional system instructions for the model'),
      temperature: z.number().optional().default(0.7).describe('Controls randomness (0.0 to 1.0)'),
      max_tokens: z.number().int().optional().default(1024).describe('Maximum number of tokens to generate'),
      model_type: z
        .string()
        .optional()
        .default('general')
        .describe("Type of task ('coding', 'database', 'os', 'general'); picks a matching model when one is listed"),
    },
    execute: async (args, ctx) => {
      if (!isModelType(args.model_type)) {
        throw new AppError(
          'UNKNOWN_OPERATION',
          `Unknown model type: ${args.model_type}. Use ${Object.keys(MODEL_TYPE_KEYWORDS)
            .map((type) => `'${type}'`)
            .join(', ')}.`,
        );
      }
      const modelType = args.model_type;
      return gateway.complete({
        prompt: args.prompt,
        systemPrompt: args.system_prompt,
        temperature: args.temperature,
        maxTokens: args.max_tokens,
        clientId: ctx.clientId,
        resolveModel: () => modelCatalog.selectModel(modelType),
      });
    },
  });

  const offloadContext = defineTool({
    name: 'offload_context',
    title: 'Offload Context',
    description:
      'Offload conversation context to the sidekick: store it, retrieve it, or have the sidekick summarize or analyze a stored context.',
    inputShape: {
      context_id: z.string().describe('Unique identifier for this context'),
      context_data: z.string().optional().default('').describe("The context data to store (used by 'store')"),
      operation: z
        .string()
        .optional()
        .default('store')
        .describe("What to do with the context ('store', 'retrieve', 'summarize', 'analyze')"),
    },
    execute: async (args, ctx) => {
      if (!isContextOperation(args.operation)) {
        throw new AppError(
          'UNKNOWN_OPERATION',
          `Unknown operation: ${args.operation}. Use 'store', 'retrieve', 'summarize', or 'analyze'.`,
        );
      }

      switch (args.operation) {
        case 'store': {
          const tokens = contextStore.store(args.context_id, args.context_data);
          return `${SYMBOL_OK} Context stored successfully. ID: ${args.context_id} (${tokens} tokens)`;
        }
        case 'retrieve': {
          const entry = contextStore.retrieve(args.context_id);
          return `📋 Context retrieved:\n\n${entry.data}\n\n(Stored: ${entry.createdAt.toISOString()}, ${entry.tokenCount} tokens)`;
        }
        case 'summarize':
        case 'analyze':
          return renderDerive(await contextStore.derive(args.context_id, args.operation, ctx.clientId));
      }
    },
  });

  const automateMenialTask = defineTool({
    name: 'automate_menial_task',
    title: 'Automate Menial Task',
    description:
      'Automate repetitive work such as formatting, data extraction, simple transformations, validation and generation.',
    inputShape: {
      task_type: z.string().describe("Type of task ('format', 'extract', 'transform', 'validate', 'generate')"),
      task_data: z.string().describe('The data to process'),
      output_format: z
        .string()
        .optional()
        .default('text')
        .describe("Desired output format ('text', 'json', 'markdown', 'code')"),
    },
    execute: (args, ctx) =>
      runMenialTask(gateway, {
        taskType: args.task_type,
        taskData: args.task_data,
        outputFormat: args.output_format,
        clientId: ctx.clientId,
      }),
  });

  const batchProcess = defineTool({
    name: 'batch_process',
    title: 'Batch Process',
    description: 'Process many items in paced batches without overwhelming the model or hitting rate limits.',
    inputShape: {
      items: z.array(z.string()).describe('List of items to process'),
      operation: z.string().describe('The operation to perform on each item'),
      batch_size: z.number().int().optional().default(5).describe('Number of items to process at once (default: 5)'),
      combine_results: z.boolean().optional().default(true).describe('Whether to combine results into one response'),
    },
    execute: async (args, ctx) => {
      const result = await batchDispatcher.process({
        items: args.items,
        operation: args.operation,
        batchSize: args.batch_size,
        clientId: ctx.clientId,
      });
      return renderBatchResult(result, args.combine_results, backendLabel);
    },
  });

  const getSidekickStats = defineTool({
    name: 'get_sidekick_stats',
    title: 'Sidekick Statistics',
    description: 'Report request counts, rate limit settings, context storage usage and uptime.',
    inputShape: {},
    execute: async () => {
      const stats = collectStats({ startedAt: services.startedAt, now: services.now(), rateLimiter, contextStore });

      let text = '📊 **LM Studio Sidekick Statistics**\n\n';
      text += `🏠 **Connection**: ${backendLabel}\n`;
      text += `⏰ **Uptime**: ${formatUptime(stats.uptimeMs)}\n\n`;

      text += '📈 **Usage Metrics**:\n';
      text += `  • Total Requests: ${stats.totalRequests}\n`;
      text += `  • Recent Requests (last ${stats.rateLimitWindowSec}s): ${stats.recentRequests}\n`;
      text += `  • Rate Limit: ${stats.rateLimitMax} per ${stats.rateLimitWindowSec}s\n\n`;

      text += '💾 **Context Storage**:\n';
      text += `  • Stored Contexts: ${stats.storedContexts}\n`;
      text += `  • Total Tokens: ${formatNumber(stats.totalContextTokens)}\n`;
      text += `  • Max Context Size: ${formatNumber(stats.maxContextTokens)} tokens\n\n`;

      if (stats.storedContexts > 0) {
        text += '📝 **Stored Contexts**:\n';
        for (const entry of stats.recentContexts) {
          text += `  • ${entry.id}: ${entry.tokens} tokens (stored: ${entry.storedAt})\n`;
        }
        if (stats.storedContexts > stats.recentContexts.length) {
          text += `  • ... and ${stats.storedContexts - stats.recentContexts.length} more\n`;
        }
      }
      return text;
    },
  });

  const clearContexts = defineTool({
    name: 'clear_contexts',
    title: 'Clear Contexts',
    description: "Clear stored contexts to free memory. '*' clears everything; any other pattern matches id substrings.",
    inputShape: {
      context_pattern: z
        .string()
        .optional()
        .default('*')
        .describe("Pattern to match context IDs ('*' for all, or a substring)"),
    },
    execute: async (args) => {
      const count = contextStore.clear(args.context_pattern);
      return args.context_pattern === '*'
        ? `🧹 Cleared all ${count} stored contexts.`
        : `🧹 Cleared ${count} contexts matching '${args.context_pattern}'.`;
    },
  });

  const loadModel = defineTool({
    name: 'load_model',
    title: 'Load Model',
    description: 'Attempt to load a specific model in LM Studio. Not every LM Studio version supports remote loading.',
    inputShape: {
      model_name: z.string().describe('Name or path of the model to load'),
    },
    execute: async (args) => {
      try {
        const outcome = await gateway.loadModel(args.model_name);
        if (outcome === 'unsupported') {
          return `${SYMBOL_WARN} Model loading not supported in this LM Studio version. Please load '${args.model_name}' manually through the LM Studio UI.`;
        }
        return `${SYMBOL_OK} Model '${args.model_name}' loaded successfully at ${backendLabel}!`;
      } catch (error) {
        if (isAppError(error, 'BACKEND_BAD_STATUS')) {
          return `${SYMBOL_FAIL} Failed to load model. Status: ${statusOf(error) ?? 'unknown'}`;
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.warn({ model: args.model_name, error: message }, 'Model load failed');
        return `${SYMBOL_FAIL} Model loading failed: ${message}\n\nPlease load the model manually through LM Studio.`;
      }
    },
  });

  return [
    healthCheck,
    listModels,
    getCurrentModel,
    chatCompletion,
    offloadContext,
    automateMenialTask,
    batchProcess,
    getSidekickStats,
    clearContexts,
    loadModel,
  ];
}

/**
 * Registry holding every sidekick tool. Its argument cap follows the context
 * store limit so any storable context fits through `offload_context`.
 */
export function createSidekickRegistry(services: SidekickServices): ToolRegistry {
  const registry = new ToolRegistry({
    backendLabel: services.backendLabel,
    maxArgsChars: toolArgsLimit(services.contextStore.maxContextTokens),
  });
  for (const tool of createSidekickTools(services)) {
    registry.register(tool);
  }
  logger.info({ tools: registry.listNames() }, 'Sidekick tools registered');
  return registry;
}
