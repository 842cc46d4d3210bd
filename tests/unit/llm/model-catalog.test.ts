import { describe, expect, it } from 'vitest';
import { CompletionGateway } from '../../../src/core/llm/completion-gateway';
import {
  ModelCatalog,
  categorizeModels,
  isModelType,
  resolveModelForType,
} from '../../../src/core/llm/model-catalog';
import { RateLimiter } from '../../../src/core/rate-limiter';
import { AppError } from '../../../src/shared/errors/app-error';
import { FakeBackend, manualClock } from '../../helpers/fakeBackend';

function createCatalog(ttlMs = 60_000) {
  const backend = new FakeBackend();
  const clock = manualClock();
  const gateway = new CompletionGateway({
    client: backend,
    rateLimiter: new RateLimiter({ windowSec: 60, maxRequests: 30 }),
    defaultClientId: 'default',
    timeouts: { healthMs: 5000, probeMs: 10000, chatMs: 30000, loadMs: 30000 },
  });
  const catalog = new ModelCatalog({
    gateway,
    recommendedModel: 'qwen2.5-coder-32b',
    ttlMs,
    now: clock.now,
  });
  return { backend, clock, catalog };
}

describe('categorizeModels', () => {
  it('groups ids into coding, general and specialized', () => {
    expect(
      categorizeModels(['qwen2.5-coder-7b', 'mistral-7b-instruct', 'deepseek-math-7b', 'nomic-embedding', 'codellama-13b']),
    ).toEqual({
      coding: ['qwen2.5-coder-7b', 'codellama-13b'],
      general: ['mistral-7b-instruct'],
      specialized: ['deepseek-math-7b', 'nomic-embedding'],
    });
  });
});

describe('resolveModelForType', () => {
  it('returns the first id carrying a keyword of the type', () => {
    const ids = ['mistral-7b-instruct', 'sqlcoder-7b', 'qwen2.5-coder-7b'];
    expect(resolveModelForType(ids, 'database')).toBe('sqlcoder-7b');
    expect(resolveModelForType(ids, 'coding')).toBe('sqlcoder-7b');
    expect(resolveModelForType(['mistral-7b-instruct'], 'os')).toBeUndefined();
  });
});

describe('isModelType', () => {
  it('accepts only the known task types', () => {
    expect(isModelType('coding')).toBe(true);
    expect(isModelType('general')).toBe(true);
    expect(isModelType('vision')).toBe(false);
    expect(isModelType('toString')).toBe(false);
  });
});

describe('ModelCatalog', () => {
  it('serves the cached listing until the TTL passes', async () => {
    const { backend, clock, catalog } = createCatalog(1000);
    backend.models = ['a'];

    await catalog.getModels();
    clock.advance(999);
    await catalog.getModels();
    expect(backend.listCalls).toBe(1);

    clock.advance(1);
    await catalog.getModels();
    expect(backend.listCalls).toBe(2);
  });

  it('selects no model for general requests without listing', async () => {
    const { backend, catalog } = createCatalog();

    await expect(catalog.selectModel('general')).resolves.toBeUndefined();
    expect(backend.listCalls).toBe(0);
  });

  it('selects a listed model for a specific type', async () => {
    const { backend, catalog } = createCatalog();
    backend.models = ['mistral-7b-instruct', 'qwen2.5-coder-7b'];

    await expect(catalog.selectModel('coding')).resolves.toBe('qwen2.5-coder-7b');
  });

  it('falls back to the loaded model when listing fails', async () => {
    const { backend, catalog } = createCatalog();
    backend.listError = new AppError('BACKEND_UNREACHABLE', 'Cannot connect');

    await expect(catalog.selectModel('coding')).resolves.toBeUndefined();
  });

  it('matches the recommended model as a substring of listed ids', () => {
    const { catalog } = createCatalog();

    expect(catalog.isRecommended('qwen2.5-coder-32b-instruct-q4_k_m')).toBe(true);
    expect(catalog.hasRecommended(['qwen2.5-coder-7b'])).toBe(false);
  });
});
