/**
 * Request and response shapes of the OpenAI-compatible backend API.
 *
 * Response bodies are parsed with zod; anything that does not match is treated
 * as a backend fault instead of flowing further as an untyped value.
 */
import { z } from 'zod';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionPayload {
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  model?: string;
}

export const modelListResponseSchema = z.object({
  data: z.array(z.object({ id: z.string() }).passthrough()).default([]),
});

export const chatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
          })
          .passthrough()
          .optional(),
      }),
    )
    .default([]),
});

export interface ChatRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  model?: string;
  timeoutMs: number;
}

export interface ChatResult {
  content: string;
  /** Model id reported by the backend, when it sends one. */
  model?: string;
}

export type LoadModelOutcome = 'loaded' | 'unsupported';

/** Transport to the backend. The gateway is its only caller. */
export interface BackendClient {
  readonly baseUrl: string;
  listModels(timeoutMs: number): Promise<string[]>;
  chat(request: ChatRequest): Promise<ChatResult>;
  loadModel(model: string, timeoutMs: number): Promise<LoadModelOutcome>;
}
