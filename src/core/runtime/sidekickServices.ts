import type { AppConfig } from '../../shared/config/env';
import type { Sleeper } from '../../shared/async/resilience';
import { BatchDispatcher } from '../batch/batchDispatcher';
import { ContextStore } from '../context/contextStore';
import { CompletionGateway } from '../llm/completion-gateway';
import type { BackendClient } from '../llm/llm-types';
import { LMStudioClient } from '../llm/lmstudio-client';
import { ModelCatalog } from '../llm/model-catalog';
import { RateLimiter } from '../rate-limiter';

export type SidekickConfig = Pick<
  AppConfig,
  | 'backendBaseUrl'
  | 'backendLabel'
  | 'RATE_LIMIT_WINDOW'
  | 'RATE_LIMIT_MAX_REQUESTS'
  | 'MAX_CONTEXT_SIZE'
  | 'BATCH_PACING_MS'
  | 'TIMEOUT_HEALTH_MS'
  | 'TIMEOUT_PROBE_MS'
  | 'TIMEOUT_CHAT_MS'
  | 'TIMEOUT_LOAD_MS'
  | 'MODEL_CACHE_TTL_SEC'
  | 'RECOMMENDED_MODEL'
  | 'SIDEKICK_CLIENT_ID'
>;

/** Process-lifetime state shared by every tool invocation. */
export interface SidekickServices {
  backendLabel: string;
  /** Millisecond clock shared by every component. */
  now: () => number;
  startedAt: number;
  rateLimiter: RateLimiter;
  gateway: CompletionGateway;
  contextStore: ContextStore;
  batchDispatcher: BatchDispatcher;
  modelCatalog: ModelCatalog;
}

export interface SidekickServiceOverrides {
  client?: BackendClient;
  sleep?: Sleeper;
  /** Millisecond clock shared by the rate limiter, catalog and uptime. */
  now?: () => number;
}

export function createSidekickServices(
  config: SidekickConfig,
  overrides: SidekickServiceOverrides = {},
): SidekickServices {
  const now = overrides.now ?? Date.now;
  const rateLimiter = new RateLimiter({
    windowSec: config.RATE_LIMIT_WINDOW,
    maxRequests: config.RATE_LIMIT_MAX_REQUESTS,
    now,
  });
  const gateway = new CompletionGateway({
    client: overrides.client ?? new LMStudioClient({ baseUrl: config.backendBaseUrl }),
    rateLimiter,
    defaultClientId: config.SIDEKICK_CLIENT_ID,
    timeouts: {
      healthMs: config.TIMEOUT_HEALTH_MS,
      probeMs: config.TIMEOUT_PROBE_MS,
      chatMs: config.TIMEOUT_CHAT_MS,
      loadMs: config.TIMEOUT_LOAD_MS,
    },
  });

  return {
    backendLabel: config.backendLabel,
    now,
    startedAt: now(),
    rateLimiter,
    gateway,
    contextStore: new ContextStore({
      maxContextTokens: config.MAX_CONTEXT_SIZE,
      gateway,
      now: () => new Date(now()),
    }),
    batchDispatcher: new BatchDispatcher({ gateway, pacingMs: config.BATCH_PACING_MS, sleep: overrides.sleep }),
    modelCatalog: new ModelCatalog({
      gateway,
      recommendedModel: config.RECOMMENDED_MODEL,
      ttlMs: config.MODEL_CACHE_TTL_SEC * 1000,
      now,
    }),
  };
}
