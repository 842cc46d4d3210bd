import { AppError } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import type { RateLimiter } from '../rate-limiter';
import type { BackendClient, ChatMessage, LoadModelOutcome } from './llm-types';

const logger = childLogger({ module: 'completion-gateway' });

export interface GatewayTimeouts {
  healthMs: number;
  probeMs: number;
  chatMs: number;
  loadMs: number;
}

export interface CompletionGatewayOptions {
  client: BackendClient;
  rateLimiter: RateLimiter;
  timeouts: GatewayTimeouts;
  /** Rate-limit key used when a call does not name its caller. */
  defaultClientId: string;
}

export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  temperature: number;
  maxTokens: number;
  clientId?: string;
  model?: string;
  /** Picks the model after admission; ignored when `model` is set. */
  resolveModel?: () => Promise<string | undefined>;
}

export interface CurrentModelProbe {
  model: string;
}

/**
 * The only path from the sidekick to the backend.
 *
 * Every completion is admitted through the rate limiter before it is issued.
 * The admission is spent on the attempt: a call that later fails still counts
 * against the caller's window.
 */
export class CompletionGateway {
  private readonly client: BackendClient;
  private readonly rateLimiter: RateLimiter;
  private readonly timeouts: GatewayTimeouts;
  private readonly defaultClientId: string;

  constructor(options: CompletionGatewayOptions) {
    this.client = options.client;
    this.rateLimiter = options.rateLimiter;
    this.timeouts = options.timeouts;
    this.defaultClientId = options.defaultClientId;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.admit(request.clientId);
    const model = request.model ?? (await request.resolveModel?.());

    const messages: ChatMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    const result = await this.client.chat({
      messages,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
      model,
      timeoutMs: this.timeouts.chatMs,
    });
    return result.content;
  }

  /** Ask the backend which model answers a minimal completion. */
  async probeCurrentModel(clientId?: string): Promise<CurrentModelProbe> {
    this.admit(clientId);

    const result = await this.client.chat({
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.1,
      maxTokens: 5,
      timeoutMs: this.timeouts.probeMs,
    });
    return { model: result.model ?? 'Unknown' };
  }

  /** Model listing is metadata, not generation, and is not rate limited. */
  listModels(): Promise<string[]> {
    return this.client.listModels(this.timeouts.healthMs);
  }

  loadModel(model: string): Promise<LoadModelOutcome> {
    return this.client.loadModel(model, this.timeouts.loadMs);
  }

  private admit(clientId: string | undefined): void {
    const key = clientId ?? this.defaultClientId;
    if (!this.rateLimiter.admit(key)) {
      logger.warn(
        { clientId: key, maxRequests: this.rateLimiter.maxRequests, windowSec: this.rateLimiter.windowSec },
        'Rate limit exceeded',
      );
      throw new AppError('RATE_LIMITED', 'Rate limit exceeded. Please wait a moment before trying again.', undefined, {
        clientId: key,
      });
    }
  }
}
