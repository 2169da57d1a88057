// packages/playlist-backend/src/infrastructure/chat-client.ts
//
// OpenAI-compatible chat-completions client (Perplexity `sonar` by default).
// Used by the interpret, retrieve and curate stages.

import { z } from 'zod';

import { PermanentError } from '@vibelist/contracts';

import { fetchJson } from './upstream-http.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatClient {
  /** Returns the trimmed content of the first choice. */
  complete(request: ChatCompletionRequest): Promise<string>;
}

export interface HttpChatClientOptions {
  baseUrl: string;
  apiKey?: string;
  fetchImplementation?: typeof fetch;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

export class HttpChatClient implements ChatClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpChatClientOptions) {
    if (!options.baseUrl) {
      throw new Error('HttpChatClient requires a baseUrl.');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;
  }

  async complete(request: ChatCompletionRequest): Promise<string> {
    if (!this.apiKey) {
      throw new PermanentError('LLM_API_KEY is not configured');
    }

    const data = await fetchJson(
      this.fetchImpl,
      'LLM',
      {
        url: `${this.baseUrl}/chat/completions`,
        method: 'POST',
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          'content-type': 'application/json',
          accept: 'application/json',
        },
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          temperature: request.temperature ?? 0.2,
        }),
        signal: request.signal,
      },
      completionSchema,
    );

    return (data.choices[0]?.message.content ?? '').trim();
  }
}
