import type { ContextStore } from '../context/contextStore';
import type { RateLimiter } from '../rate-limiter';

export const STATS_CONTEXT_PREVIEW = 5;

export interface ContextPreview {
  id: string;
  tokens: number;
  storedAt: string;
}

export interface SidekickStatsSnapshot {
  uptimeMs: number;
  totalRequests: number;
  recentRequests: number;
  rateLimitMax: number;
  rateLimitWindowSec: number;
  storedContexts: number;
  totalContextTokens: number;
  maxContextTokens: number;
  recentContexts: ContextPreview[];
}

export function collectStats(params: {
  startedAt: number;
  now: number;
  rateLimiter: RateLimiter;
  contextStore: ContextStore;
}): SidekickStatsSnapshot {
  const { rateLimiter, contextStore } = params;
  return {
    uptimeMs: Math.max(0, params.now - params.startedAt),
    totalRequests: rateLimiter.totalAdmitted,
    recentRequests: rateLimiter.recentCount(),
    rateLimitMax: rateLimiter.maxRequests,
    rateLimitWindowSec: rateLimiter.windowSec,
    storedContexts: contextStore.size,
    totalContextTokens: contextStore.totalTokens,
    maxContextTokens: contextStore.maxContextTokens,
    recentContexts: contextStore
      .list()
      .slice(0, STATS_CONTEXT_PREVIEW)
      .map((entry) => ({ id: entry.id, tokens: entry.tokenCount, storedAt: entry.createdAt.toISOString() })),
  };
}

/** Render a duration as `H:MM:SS`, prefixed with `N day(s), ` past 24 hours. */
export function formatUptime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
  if (days === 0) return clock;
  return `${days} day${days === 1 ? '' : 's'}, ${clock}`;
}
