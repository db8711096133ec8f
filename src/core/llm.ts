import { fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { LlmConfig } from '../config/llm.js';
import { CIRCUIT_BREAKER_CONFIG } from '../config/resilience.js';
import { CircuitBreaker, CircuitBreakerError } from './circuit-breaker.js';
import { LLMUnavailableError } from './errors.js';
import type { ConversationEntry } from './session_store.js';

export interface CompleteOptions {
  signal?: AbortSignal;
}

/**
 * The model behind chat-intent messages. Implementations either return the
 * assistant text or reject with `LLMUnavailableError`.
 */
export interface ChatModel {
  complete(history: readonly ConversationEntry[], userText: string, opts?: CompleteOptions): Promise<string>;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string; signal?: AbortSignal },
) => Promise<FetchResponseLike>;

export interface OpenAIChatModelDeps {
  fetch?: FetchLike;
  breaker?: CircuitBreaker;
  log?: Logger;
}

type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

// Approximate, for logs only.
function countTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function buildChatMessages(
  systemPrompt: string,
  history: readonly ConversationEntry[],
  userText: string,
): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    ...history.map((entry): ChatMessage => ({ role: entry.role, content: entry.text })),
    { role: 'user', content: userText },
  ];
}

/**
 * Client for any OpenAI-compatible `/chat/completions` endpoint.
 */
export class OpenAIChatModel implements ChatModel {
  private readonly fetchImpl: FetchLike;
  private readonly breaker: CircuitBreaker;
  private readonly log?: Logger;

  constructor(private readonly config: LlmConfig, deps: OpenAIChatModelDeps = {}) {
    this.fetchImpl = deps.fetch ?? undiciFetch;
    this.breaker = deps.breaker ?? new CircuitBreaker(CIRCUIT_BREAKER_CONFIG, 'llm');
    this.log = deps.log;
  }

  async complete(
    history: readonly ConversationEntry[],
    userText: string,
    opts: CompleteOptions = {},
  ): Promise<string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new LLMUnavailableError('not_configured', 'LLM API key is not configured');
    }

    const messages = buildChatMessages(this.config.systemPrompt, history, userText);
    const inputTokens = messages.reduce((sum, m) => sum + countTokens(m.content), 0);
    this.log?.debug({ model: this.config.model, turns: messages.length, inputTokens }, 'llm_request');

    try {
      return await this.breaker.execute(() => this.request(apiKey, messages, opts.signal));
    } catch (error) {
      if (error instanceof CircuitBreakerError) {
        throw new LLMUnavailableError('circuit_open', error.message);
      }
      throw error;
    }
  }

  private async request(apiKey: string, messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`;
    const body = {
      model: this.config.model,
      messages,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };

    let res: FetchResponseLike;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new LLMUnavailableError('timeout', 'LLM request aborted');
      }
      throw new LLMUnavailableError('network', `LLM request failed: ${String(error)}`);
    }

    if (!res.ok) {
      const errorText = await res.text().catch(() => '');
      this.log?.debug({ status: res.status, body: errorText.slice(0, 200) }, 'llm_http_error');
      throw new LLMUnavailableError('http', `LLM responded with HTTP ${res.status}`, res.status);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (error) {
      throw new LLMUnavailableError('malformed_response', `LLM response is not JSON: ${String(error)}`);
    }

    const parsed = ChatCompletionResponse.safeParse(payload);
    if (!parsed.success) {
      throw new LLMUnavailableError('malformed_response', 'LLM response has no choices');
    }

    const content = parsed.data.choices[0].message.content?.trim() ?? '';
    if (!content) {
      throw new LLMUnavailableError('empty_response', 'LLM returned no text');
    }

    this.log?.debug({ outputTokens: countTokens(content) }, 'llm_response');
    return content;
  }
}
