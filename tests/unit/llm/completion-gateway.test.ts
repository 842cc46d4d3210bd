import { describe, expect, it } from 'vitest';
import { CompletionGateway } from '../../../src/core/llm/completion-gateway';
import { RateLimiter } from '../../../src/core/rate-limiter';
import { AppError } from '../../../src/shared/errors/app-error';
import { FakeBackend } from '../../helpers/fakeBackend';

function createGateway(maxRequests = 30) {
  const backend = new FakeBackend();
  const rateLimiter = new RateLimiter({ windowSec: 60, maxRequests, now: () => 0 });
  const gateway = new CompletionGateway({
    client: backend,
    rateLimiter,
    defaultClientId: 'default',
    timeouts: { healthMs: 5000, probeMs: 10000, chatMs: 30000, loadMs: 45000 },
  });
  return { backend, rateLimiter, gateway };
}

describe('CompletionGateway', () => {
  it('sends the system prompt ahead of the user prompt', async () => {
    const { backend, gateway } = createGateway();
    backend.queueReply('answer');

    const text = await gateway.complete({ prompt: 'question', systemPrompt: 'be brief', temperature: 0.7, maxTokens: 100 });

    expect(text).toBe('answer');
    expect(backend.chatRequests[0]).toEqual({
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'question' },
      ],
      temperature: 0.7,
      maxTokens: 100,
      model: undefined,
      timeoutMs: 30000,
    });
  });

  it('omits an empty system prompt', async () => {
    const { backend, gateway } = createGateway();

    await gateway.complete({ prompt: 'question', systemPrompt: '', temperature: 0.7, maxTokens: 100 });

    expect(backend.chatRequests[0]?.messages).toEqual([{ role: 'user', content: 'question' }]);
  });

  it('spends the admission even when the backend call fails', async () => {
    const { backend, gateway } = createGateway(1);
    backend.queueReply(new AppError('BACKEND_BAD_STATUS', 'Backend returned status code 500'));

    await expect(gateway.complete({ prompt: 'a', temperature: 0.7, maxTokens: 10 })).rejects.toMatchObject({
      code: 'BACKEND_BAD_STATUS',
    });
    await expect(gateway.complete({ prompt: 'b', temperature: 0.7, maxTokens: 10 })).rejects.toMatchObject({
      code: 'RATE_LIMITED',
      message: 'Rate limit exceeded. Please wait a moment before trying again.',
    });
    expect(backend.chatRequests).toHaveLength(1);
  });

  it('resolves the model only after the call is admitted', async () => {
    const { backend, gateway } = createGateway(1);
    const picked: string[] = [];
    const resolveModel = async () => {
      picked.push('coder');
      return 'coder';
    };

    await gateway.complete({ prompt: 'a', temperature: 0.7, maxTokens: 10, resolveModel });
    await expect(gateway.complete({ prompt: 'b', temperature: 0.7, maxTokens: 10, resolveModel })).rejects.toMatchObject({
      code: 'RATE_LIMITED',
    });

    expect(picked).toEqual(['coder']);
    expect(backend.chatRequests[0]?.model).toBe('coder');
  });

  it('charges the default client id unless the caller names one', async () => {
    const { gateway, rateLimiter } = createGateway();

    await gateway.complete({ prompt: 'a', temperature: 0.7, maxTokens: 10 });
    await gateway.complete({ prompt: 'b', temperature: 0.7, maxTokens: 10, clientId: 'session-1' });

    expect(rateLimiter.recentCount('default')).toBe(1);
    expect(rateLimiter.recentCount('session-1')).toBe(1);
  });

  it('probes the loaded model with a minimal request', async () => {
    const { backend, gateway } = createGateway();
    backend.queueReply({ content: 'Hello', model: 'qwen2.5-coder-7b' });

    await expect(gateway.probeCurrentModel()).resolves.toEqual({ model: 'qwen2.5-coder-7b' });
    expect(backend.chatRequests[0]).toMatchObject({ maxTokens: 5, temperature: 0.1, timeoutMs: 10000 });
  });

  it('reports Unknown when the backend names no model', async () => {
    const { backend, gateway } = createGateway();
    backend.queueReply({ content: 'Hello' });

    await expect(gateway.probeCurrentModel()).resolves.toEqual({ model: 'Unknown' });
  });

  it('does not rate limit model listing or loading', async () => {
    const { backend, gateway, rateLimiter } = createGateway(1);
    backend.models = ['a'];

    await gateway.listModels();
    await gateway.listModels();
    await expect(gateway.loadModel('a')).resolves.toBe('loaded');

    expect(rateLimiter.totalAdmitted).toBe(0);
    expect(backend.loadRequests).toEqual(['a']);
  });
});
