import { AppError, isAppError, toErrorWithCode } from '../../shared/errors/app-error';
import { sleep as defaultSleep, type Sleeper } from '../../shared/async/resilience';
import { childLogger } from '../../shared/logging/logger';
import type { CompletionGateway } from '../llm/completion-gateway';

const logger = childLogger({ module: 'batch-dispatcher' });

export const BATCH_SYSTEM_PROMPT =
  'You are a batch processing assistant. Process each item according to the specified operation. Be consistent across all items.';
const BATCH_TEMPERATURE = 0.3;
const BATCH_MAX_TOKENS = 1024;

export interface BatchRequest {
  items: string[];
  operation: string;
  batchSize: number;
  clientId?: string;
}

interface ChunkBase {
  /** 1-based position of the chunk. */
  index: number;
  itemCount: number;
}

export type ChunkResult = (ChunkBase & { ok: true; output: string }) | (ChunkBase & { ok: false; error: AppError });

export interface BatchResult {
  totalItems: number;
  totalChunks: number;
  /** Items in chunks the backend answered successfully. */
  processedItems: number;
  chunks: ChunkResult[];
  /** Index of the chunk refused by the rate limiter; no later chunk was sent. */
  rateLimitedAt?: number;
}

export interface BatchDispatcherOptions {
  gateway: CompletionGateway;
  pacingMs: number;
  sleep?: Sleeper;
}

/**
 * Split `items` into consecutive chunks of `size`, preserving order.
 * Every chunk holds exactly `size` items except possibly the last.
 */
export function chunkItems<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError('size must be a positive integer');
  }
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

export function buildBatchPrompt(chunk: readonly string[], operation: string): string {
  const lines = chunk.map((item, idx) => `${idx + 1}. ${item}`);
  return `Process these ${chunk.length} items with operation: ${operation}\n\n${lines.join('\n')}\n`;
}

/**
 * Sends a list of small jobs to the backend one chunk at a time.
 *
 * Chunks go out strictly in order with a pause between them. A rate-limit
 * refusal ends the batch early with a partial result; any other failed chunk
 * is recorded and the batch moves on.
 */
export class BatchDispatcher {
  private readonly gateway: CompletionGateway;
  private readonly pacingMs: number;
  private readonly sleep: Sleeper;

  constructor(options: BatchDispatcherOptions) {
    this.gateway = options.gateway;
    this.pacingMs = options.pacingMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async process(request: BatchRequest): Promise<BatchResult> {
    if (request.items.length === 0) {
      throw new AppError('EMPTY_INPUT', 'No items provided for batch processing.');
    }
    if (!Number.isInteger(request.batchSize) || request.batchSize < 1) {
      throw new AppError('INVALID_ARGUMENT', `Batch size must be a positive integer, got ${request.batchSize}.`, undefined, {
        batchSize: request.batchSize,
      });
    }

    const chunks = chunkItems(request.items, request.batchSize);
    const result: BatchResult = {
      totalItems: request.items.length,
      totalChunks: chunks.length,
      processedItems: 0,
      chunks: [],
    };

    logger.info(
      { totalItems: result.totalItems, batchSize: request.batchSize, totalChunks: result.totalChunks },
      'Starting batch processing',
    );

    for (const [position, chunk] of chunks.entries()) {
      const index = position + 1;

      try {
        const output = await this.gateway.complete({
          prompt: buildBatchPrompt(chunk, request.operation),
          systemPrompt: BATCH_SYSTEM_PROMPT,
          temperature: BATCH_TEMPERATURE,
          maxTokens: BATCH_MAX_TOKENS,
          clientId: request.clientId,
        });
        result.chunks.push({ index, itemCount: chunk.length, ok: true, output });
        result.processedItems += chunk.length;
      } catch (error) {
        if (isAppError(error, 'RATE_LIMITED')) {
          result.rateLimitedAt = index;
          logger.warn({ chunk: index, processedItems: result.processedItems }, 'Batch stopped by rate limit');
          break;
        }
        const appError = toErrorWithCode(error, 'INTERNAL_ERROR');
        logger.warn({ chunk: index, code: appError.code, error: appError.message }, 'Batch chunk failed');
        result.chunks.push({ index, itemCount: chunk.length, ok: false, error: appError });
      }

      if (index < chunks.length) {
        await this.sleep(this.pacingMs);
      }
    }

    logger.info(
      { processedItems: result.processedItems, totalItems: result.totalItems, rateLimitedAt: result.rateLimitedAt },
      'Batch processing finished',
    );
    return result;
  }
}
