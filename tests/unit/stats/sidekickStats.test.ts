import { describe, expect, it } from 'vitest';
import { createSidekickServices } from '../../../src/core/runtime/sidekickServices';
import { collectStats, formatUptime } from '../../../src/core/stats/sidekickStats';
import { FakeBackend, manualClock, testSidekickConfig } from '../../helpers/fakeBackend';

describe('formatUptime', () => {
  it('renders hours, minutes and seconds', () => {
    expect(formatUptime(0)).toBe('0:00:00');
    expect(formatUptime(3_723_000)).toBe('1:02:03');
    expect(formatUptime(3_723_999)).toBe('1:02:03');
  });

  it('prefixes whole days', () => {
    expect(formatUptime(86_400_000 + 61_000)).toBe('1 day, 0:01:01');
    expect(formatUptime(2 * 86_400_000)).toBe('2 days, 0:00:00');
  });
});

describe('collectStats', () => {
  it('reports usage, storage and the most recent contexts', async () => {
    const clock = manualClock(Date.UTC(2024, 0, 1));
    const services = createSidekickServices(testSidekickConfig, { client: new FakeBackend(), now: clock.now });

    await services.gateway.complete({ prompt: 'a', temperature: 0.7, maxTokens: 10 });
    await services.gateway.complete({ prompt: 'b', temperature: 0.7, maxTokens: 10, clientId: 'other' });
    for (let i = 1; i <= 7; i += 1) {
      clock.advance(1000);
      services.contextStore.store(`ctx-${i}`, 'x'.repeat(4 * i));
    }

    const stats = collectStats({
      startedAt: services.startedAt,
      now: clock.now(),
      rateLimiter: services.rateLimiter,
      contextStore: services.contextStore,
    });

    expect(stats.uptimeMs).toBe(7000);
    expect(stats.totalRequests).toBe(2);
    expect(stats.recentRequests).toBe(2);
    expect(stats.rateLimitMax).toBe(30);
    expect(stats.rateLimitWindowSec).toBe(60);
    expect(stats.storedContexts).toBe(7);
    expect(stats.totalContextTokens).toBe(28);
    expect(stats.maxContextTokens).toBe(32000);
    expect(stats.recentContexts.map((entry) => entry.id)).toEqual(['ctx-7', 'ctx-6', 'ctx-5', 'ctx-4', 'ctx-3']);
    expect(stats.recentContexts[0]).toEqual({ id: 'ctx-7', tokens: 7, storedAt: '2024-01-01T00:00:07.000Z' });
  });
});
