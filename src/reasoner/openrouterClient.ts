import OpenAI from 'openai';
import {
  RateLimitedError,
  ReasonerRequestError,
  ReasonerTimeoutError,
  ReasonerTransportError
} from '../errors.js';
import type { ChatMessage } from '../types.js';
import type { Reasoner, ReasonerReply, ReasonerRequest } from './gateway.js';

export interface OpenRouterOptions {
  apiKey: string | undefined;
  baseURL: string;
  timeoutMs: number;
}

function retryAfterMs(headers: Record<string, string | null | undefined> | undefined): number | null {
  const value = headers?.['retry-after'];
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(value);
  return Number.isNaN(at) ? null : Math.max(0, at - Date.now());
}

function toParam(m: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (m.role) {
    case 'system': return { role: 'system', content: m.content };
    case 'assistant': return { role: 'assistant', content: m.content };
    case 'user': return { role: 'user', content: m.content };
  }
}

/**
 * OpenRouter's OpenAI-compatible chat completions. SDK retries are off: the
 * gateway owns retry and fallback, so every SDK failure is mapped onto the
 * gateway's failure kinds here.
 */
export class OpenRouterReasoner implements Reasoner {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenRouterOptions) {}

  private getClient(): OpenAI {
    if (this.client) return this.client;
    const key = this.options.apiKey;
    if (!key) throw new Error('Missing OPENROUTER_API_KEY. Add it to your .env and restart.');
    this.client = new OpenAI({ apiKey: key, baseURL: this.options.baseURL, maxRetries: 0, timeout: this.options.timeoutMs });
    return this.client;
  }

  async complete({ model, messages, temperature, maxTokens, signal }: ReasonerRequest): Promise<ReasonerReply> {
    const openai = this.getClient();
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await openai.chat.completions.create(
        { model, messages: messages.map(toParam), temperature, max_tokens: maxTokens },
        { signal }
      );
    } catch (err) {
      if (err instanceof OpenAI.APIUserAbortError) throw err;
      if (err instanceof OpenAI.APIConnectionTimeoutError) throw new ReasonerTimeoutError(model, this.options.timeoutMs);
      if (err instanceof OpenAI.APIConnectionError) throw new ReasonerTransportError(model, err.message, { cause: err });
      if (err instanceof OpenAI.APIError) {
        const status = err.status ?? 0;
        if (status === 429) throw new RateLimitedError(model, retryAfterMs(err.headers));
        if (status === 408) throw new ReasonerTimeoutError(model, this.options.timeoutMs);
        if (status >= 400 && status < 500) throw new ReasonerRequestError(model, status, err.message);
        throw new ReasonerTransportError(model, err.message, { cause: err });
      }
      throw err;
    }

    const text = completion.choices[0]?.message?.content;
    if (!text) throw new ReasonerTransportError(model, 'reply carried no message content');
    return {
      text,
      usage: completion.usage
        ? { promptTokens: completion.usage.prompt_tokens, completionTokens: completion.usage.completion_tokens }
        : undefined
    };
  }
}
