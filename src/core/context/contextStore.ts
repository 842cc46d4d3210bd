/**
 * Token-bounded, in-memory store for context offloaded by the caller.
 *
 * Entries never expire; they leave only through `clear`. Writes are
 * synchronous, so size check and insert happen as one step on the event loop.
 * `derive` awaits the backend between reading the source and persisting a
 * summary; a `clear` that lands in between can be undone by that persist.
 */
import { AppError, isAppError } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import type { CompletionGateway } from '../llm/completion-gateway';
import { estimateTokens } from './tokenEstimate';

const logger = childLogger({ module: 'context-store' });

export interface ContextEntry {
  id: string;
  data: string;
  createdAt: Date;
  tokenCount: number;
}

export type DeriveOperation = 'summarize' | 'analyze';

export interface DeriveResult {
  operation: DeriveOperation;
  text: string;
  /** Id the summary was saved under; absent for analyze or when it could not be saved. */
  savedAs?: string;
  /** Why a summary was not saved. */
  saveError?: AppError;
}

interface DeriveProfile {
  systemPrompt: string;
  promptPrefix: string;
  maxTokens: number;
}

const DERIVE_TEMPERATURE = 0.3;

const DERIVE_PROFILES: Record<DeriveOperation, DeriveProfile> = {
  summarize: {
    systemPrompt:
      'You are a helpful assistant that creates concise summaries. Summarize the following context, preserving key information.',
    promptPrefix: 'Please summarize this context:',
    maxTokens: 500,
  },
  analyze: {
    systemPrompt:
      'You are an analytical assistant. Extract key points, entities, and actionable items from the context.',
    promptPrefix: 'Analyze this context and extract key information:',
    maxTokens: 800,
  },
};

export const SUMMARY_SUFFIX = '_summary';

export interface ContextStoreOptions {
  maxContextTokens: number;
  gateway: CompletionGateway;
  now?: () => Date;
}

export class ContextStore {
  readonly maxContextTokens: number;
  private readonly gateway: CompletionGateway;
  private readonly now: () => Date;
  private readonly entries = new Map<string, ContextEntry>();

  constructor(options: ContextStoreOptions) {
    this.maxContextTokens = options.maxContextTokens;
    this.gateway = options.gateway;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Insert or overwrite an entry.
   *
   * @returns Estimated token count of `data`.
   * @throws AppError CONTEXT_TOO_LARGE, leaving the store untouched.
   */
  store(id: string, data: string): number {
    const tokens = estimateTokens(data);
    if (tokens > this.maxContextTokens) {
      throw new AppError(
        'CONTEXT_TOO_LARGE',
        `Context too large (${tokens} tokens). Maximum is ${this.maxContextTokens} tokens.`,
        undefined,
        { id, tokens, maxTokens: this.maxContextTokens },
      );
    }

    // Re-inserting keeps map order equal to write recency.
    this.entries.delete(id);
    this.entries.set(id, { id, data, createdAt: this.now(), tokenCount: tokens });
    logger.info({ id, tokens }, 'Context stored');
    return tokens;
  }

  /** Returns a copy; the stored entry changes only through `store`. */
  retrieve(id: string): ContextEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new AppError('CONTEXT_NOT_FOUND', `Context ID '${id}' not found.`, undefined, { id });
    }
    return { ...entry };
  }

  async derive(id: string, operation: DeriveOperation, clientId?: string): Promise<DeriveResult> {
    const source = this.retrieve(id);
    const profile = DERIVE_PROFILES[operation];

    const text = await this.gateway.complete({
      prompt: `${profile.promptPrefix}\n\n${source.data}`,
      systemPrompt: profile.systemPrompt,
      temperature: DERIVE_TEMPERATURE,
      maxTokens: profile.maxTokens,
      clientId,
    });

    if (operation !== 'summarize') {
      return { operation, text };
    }

    const summaryId = `${id}${SUMMARY_SUFFIX}`;
    try {
      this.store(summaryId, text);
      return { operation, text, savedAs: summaryId };
    } catch (error) {
      if (!isAppError(error, 'CONTEXT_TOO_LARGE')) throw error;
      logger.warn({ id, summaryId, details: error.details }, 'Summary exceeds the context size limit; not saved');
      return { operation, text, saveError: error };
    }
  }

  /**
   * Remove entries by id.
   *
   * @param pattern `*` clears everything; any other value removes ids that
   * contain it as a plain substring.
   * @returns Number of entries removed.
   */
  clear(pattern: string): number {
    if (pattern === '*') {
      const count = this.entries.size;
      this.entries.clear();
      logger.info({ count }, 'Cleared all contexts');
      return count;
    }

    let count = 0;
    for (const id of Array.from(this.entries.keys())) {
      if (id.includes(pattern)) {
        this.entries.delete(id);
        count += 1;
      }
    }
    logger.info({ pattern, count }, 'Cleared matching contexts');
    return count;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  /** Entries, most recently written first. */
  list(): ContextEntry[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry })).reverse();
  }

  get size(): number {
    return this.entries.size;
  }

  get totalTokens(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.tokenCount;
    }
    return total;
  }
}
