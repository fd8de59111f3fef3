/**
 * OpenAIChatClient — streaming chat against any OpenAI-compatible
 * `/v1/chat/completions` endpoint.
 *
 * Uses native fetch() with SSE parsing. The conversation id travels in the
 * `user` field so gateways that keep history server-side can key on it.
 */

import type { ChatReply, ChatRequestOptions, ChatStreamOptions, StreamingChatClient } from '../core/types';
import { ChatClientError } from '../core/errors';
import { isRecord, tryParseJson } from '../utils/json';
import { createLogger } from '../utils/logger';

const log = createLogger('OpenAIChat');

export interface OpenAIChatClientOptions {
  /** Base URL of the gateway (e.g. 'http://localhost:18789') */
  baseUrl: string;
  /** Bearer token */
  token?: string;
  /** Model identifier (default: 'default') */
  model?: string;
  /** Prepended as a system message on every request */
  systemPrompt?: string;
  /** Time allowed until response headers arrive (default: 30000ms) */
  timeoutMs?: number;
}

/** Text delta carried by one SSE `data:` payload, if any. */
function deltaContent(payload: unknown): string | undefined {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return undefined;
  const choice: unknown = payload.choices[0];
  if (!isRecord(choice) || !isRecord(choice.delta)) return undefined;
  const content = choice.delta.content;
  return typeof content === 'string' && content ? content : undefined;
}

export class OpenAIChatClient implements StreamingChatClient {
  private readonly endpoint: string;
  private readonly token: string | undefined;
  private readonly model: string;
  private readonly systemPrompt: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: OpenAIChatClientOptions) {
    if (!options.baseUrl) {
      throw new Error('OpenAIChatClient requires a baseUrl');
    }
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/v1/chat/completions`;
    this.token = options.token;
    this.model = options.model ?? 'default';
    this.systemPrompt = options.systemPrompt;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  /** Collects the whole stream; an empty reply is an error. */
  async chat(text: string, options: ChatRequestOptions): Promise<ChatReply> {
    let full = '';
    for await (const chunk of this.chatStream(text, options)) {
      full += chunk;
    }
    if (!full) {
      throw new ChatClientError('Empty response from chat backend');
    }
    return { text: full };
  }

  async *chatStream(text: string, options: ChatStreamOptions): AsyncGenerator<string> {
    const messages: Array<{ role: string; content: string }> = [];
    if (this.systemPrompt) {
      messages.push({ role: 'system', content: this.systemPrompt });
    }
    messages.push({ role: 'user', content: text });

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'text/event-stream',
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    log.debug(`Chat request: model=${this.model}, user=${options.sessionId}`);

    // Caller's signal aborts the whole exchange; the timeout only covers connect
    const controller = new AbortController();
    const signal = options.signal;
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => {
      controller.abort(new ChatClientError(`Chat request timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(this.endpoint, {
          method: 'POST',
          headers,
          body: JSON.stringify({
            model: this.model,
            messages,
            user: options.sessionId,
            stream: true,
          }),
          signal: controller.signal,
        });
      } finally {
        clearTimeout(timer);
      }

      if (!response.ok) {
        const errorText = await response.text();
        throw new ChatClientError(`Chat backend error ${response.status}: ${errorText}`);
      }

      if (!response.body) {
        throw new ChatClientError('Chat response has no body');
      }

      // Parse SSE stream
      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = '';

      try {
        while (true) {
          if (controller.signal.aborted) break;

          const { done, value } = await reader.read();
          if (done) break;

          buffer += decoder.decode(value, { stream: true });
          const lines = buffer.split('\n');
          buffer = lines.pop() ?? '';

          for (const line of lines) {
            const trimmed = line.trim();
            if (!trimmed.startsWith('data: ')) continue;

            const data = trimmed.slice(6);
            if (data === '[DONE]') return;

            // Malformed chunks are skipped
            const content = deltaContent(tryParseJson(data));
            if (content) yield content;
          }
        }
      } finally {
        // Stop the body download when the consumer bails out early
        if (!controller.signal.aborted) {
          await reader.cancel().catch((err: unknown) => log.debug('Stream cancel failed:', err));
        }
        reader.releaseLock();
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
