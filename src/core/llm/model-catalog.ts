import { childLogger } from '../../shared/logging/logger';
import type { CompletionGateway } from './completion-gateway';

const logger = childLogger({ module: 'model-catalog' });

export type ModelType = 'coding' | 'database' | 'os' | 'general';

export const MODEL_TYPE_KEYWORDS: Record<ModelType, readonly string[]> = {
  coding: ['code', 'coder', 'program'],
  database: ['db', 'sql', 'database'],
  os: ['os', 'system', 'admin'],
  general: ['chat', 'instruct', 'general'],
};

const SPECIALIZED_MARKERS = ['db', 'os', 'math', 'embedding'];

export interface CategorizedModels {
  coding: string[];
  general: string[];
  specialized: string[];
}

export function isModelType(value: string): value is ModelType {
  return Object.prototype.hasOwnProperty.call(MODEL_TYPE_KEYWORDS, value);
}

export function categorizeModels(ids: readonly string[]): CategorizedModels {
  const result: CategorizedModels = { coding: [], general: [], specialized: [] };
  for (const id of ids) {
    const lower = id.toLowerCase();
    if (lower.includes('code') || lower.includes('coder')) {
      result.coding.push(id);
    } else if (SPECIALIZED_MARKERS.some((marker) => lower.includes(marker))) {
      result.specialized.push(id);
    } else {
      result.general.push(id);
    }
  }
  return result;
}

/** First listed model whose id carries one of the type's keywords. */
export function resolveModelForType(ids: readonly string[], type: ModelType): string | undefined {
  const keywords = MODEL_TYPE_KEYWORDS[type];
  return ids.find((id) => {
    const lower = id.toLowerCase();
    return keywords.some((keyword) => lower.includes(keyword));
  });
}

export interface ModelCatalogOptions {
  gateway: CompletionGateway;
  recommendedModel: string;
  ttlMs: number;
  now?: () => number;
}

/**
 * Caches the backend's model listing so per-request model selection does not
 * cost a listing call every time.
 */
export class ModelCatalog {
  readonly recommendedModel: string;
  private readonly gateway: CompletionGateway;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private cached: { ids: string[]; fetchedAt: number } | null = null;

  constructor(options: ModelCatalogOptions) {
    this.gateway = options.gateway;
    this.recommendedModel = options.recommendedModel;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /** Fetch a fresh listing and remember it. */
  async refresh(): Promise<string[]> {
    const ids = await this.gateway.listModels();
    this.cached = { ids, fetchedAt: this.now() };
    return ids;
  }

  async getModels(): Promise<string[]> {
    if (this.cached && this.now() - this.cached.fetchedAt < this.ttlMs) {
      return this.cached.ids;
    }
    return this.refresh();
  }

  isRecommended(id: string): boolean {
    return id.includes(this.recommendedModel);
  }

  hasRecommended(ids: readonly string[]): boolean {
    return ids.some((id) => this.isRecommended(id));
  }

  /**
   * Pick a model for a task type. `general` keeps whatever the backend has
   * loaded; so does a failed listing, since selection is only a hint.
   */
  async selectModel(type: ModelType): Promise<string | undefined> {
    if (type === 'general') return undefined;
    try {
      const model = resolveModelForType(await this.getModels(), type);
      logger.debug({ type, model }, 'Resolved model for task type');
      return model;
    } catch (error) {
      logger.warn({ type, error }, 'Model listing failed; using the loaded model');
      return undefined;
    }
  }
}
