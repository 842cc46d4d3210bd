import { AppError } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import {
  type BackendClient,
  type ChatCompletionPayload,
  type ChatRequest,
  type ChatResult,
  type LoadModelOutcome,
  chatCompletionResponseSchema,
  modelListResponseSchema,
} from './llm-types';

const logger = childLogger({ module: 'lmstudio-client' });

interface LMStudioClientConfig {
  /** Base URL including the /v1 prefix, e.g. http://localhost:1234/v1 */
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

interface RawResponse {
  status: number;
  ok: boolean;
  text: string;
}

function normalizeBaseUrl(rawBaseUrl: string): string {
  const trimmed = rawBaseUrl.trim().replace(/\/+$/, '').replace(/\/chat\/completions$/, '');
  const parsed = new URL(trimmed);
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error('Backend base URL must use HTTP(S).');
  }
  return parsed.toString().replace(/\/$/, '');
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    if (error.cause instanceof Error && error.cause.message) {
      return `${error.message} (${error.cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * HTTP transport for an OpenAI-compatible server such as LM Studio.
 *
 * Every call is bounded by an abort timeout. Failures surface as AppError:
 * connection problems and timeouts as BACKEND_UNREACHABLE, non-2xx statuses
 * and unparseable bodies as BACKEND_BAD_STATUS, and a completion without text
 * as EMPTY_COMPLETION. No call is retried here.
 */
export class LMStudioClient implements BackendClient {
  readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: LMStudioClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async listModels(timeoutMs: number): Promise<string[]> {
    const response = await this.request('/models', { method: 'GET' }, timeoutMs);
    this.assertOk(response, '/models');

    const parsed = modelListResponseSchema.safeParse(this.parseJson(response, '/models'));
    if (!parsed.success) {
      throw new AppError('BACKEND_BAD_STATUS', 'Backend returned an unexpected model listing', parsed.error, {
        status: response.status,
      });
    }
    return parsed.data.data.map((model) => model.id);
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const payload: ChatCompletionPayload = {
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };
    if (request.model) {
      payload.model = request.model;
    }

    logger.debug(
      { messageCount: payload.messages.length, model: payload.model, timeoutMs: request.timeoutMs },
      'Sending chat completion',
    );

    const response = await this.request(
      '/chat/completions',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
      request.timeoutMs,
    );
    this.assertOk(response, '/chat/completions');

    const parsed = chatCompletionResponseSchema.safeParse(this.parseJson(response, '/chat/completions'));
    if (!parsed.success) {
      throw new AppError('EMPTY_COMPLETION', 'Backend returned no usable completion', parsed.error);
    }

    const choice = parsed.data.choices[0];
    if (!choice) {
      throw new AppError('EMPTY_COMPLETION', 'No response generated');
    }
    const content = choice.message?.content ?? '';
    if (!content) {
      throw new AppError('EMPTY_COMPLETION', 'Empty response from model');
    }

    logger.debug({ model: parsed.data.model, chars: content.length }, 'Received chat completion');
    return { content, model: parsed.data.model };
  }

  async loadModel(model: string, timeoutMs: number): Promise<LoadModelOutcome> {
    const response = await this.request(
      '/models/load',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model }),
      },
      timeoutMs,
    );

    if (response.ok) return 'loaded';
    if (response.status === 404) return 'unsupported';
    throw this.badStatus(response, '/models/load');
  }

  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<RawResponse> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const text = await response.text();
      return { status: response.status, ok: response.ok, text };
    } catch (error) {
      if (isAbortError(error) || controller.signal.aborted) {
        throw new AppError('BACKEND_UNREACHABLE', `Request to ${path} timed out after ${timeoutMs}ms`, error, {
          timeoutMs,
        });
      }
      throw new AppError('BACKEND_UNREACHABLE', `Cannot connect to ${this.baseUrl}: ${describeCause(error)}`, error);
    } finally {
      clearTimeout(id);
    }
  }

  private assertOk(response: RawResponse, path: string): void {
    if (!response.ok) throw this.badStatus(response, path);
  }

  private badStatus(response: RawResponse, path: string): AppError {
    logger.warn({ status: response.status, path, body: response.text.slice(0, 200) }, 'Backend returned an error status');
    return new AppError('BACKEND_BAD_STATUS', `Backend returned status code ${response.status}`, undefined, {
      status: response.status,
    });
  }

  private parseJson(response: RawResponse, path: string): unknown {
    try {
      return JSON.parse(response.text);
    } catch (error) {
      logger.warn({ status: response.status, path }, 'Backend returned a body that is not JSON');
      throw new AppError('BACKEND_BAD_STATUS', `Backend returned a malformed body for ${path}`, error, {
        status: response.status,
      });
    }
  }
}
