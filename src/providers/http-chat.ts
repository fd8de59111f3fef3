/**
 * HttpChatClient — whole-reply chat over a plain JSON endpoint.
 *
 * Protocol:
 * - POST {baseUrl}/chat with {"message", "conversation_id", "debug"}
 * - Auth: optional `Authorization: Bearer <token>`
 * - Reply text is read from the first shape that matches:
 *   data.response | reply | message.content | choices[0].message.content
 * - A replacement conversation id may arrive as data.conversation_id or
 *   message.conversation_id
 */

import type { ChatClient, ChatReply, ChatRequestOptions } from '../core/types';
import { ChatClientError, errorMessage } from '../core/errors';
import { isRecord, stringField, tryParseJson } from '../utils/json';
import { createLogger } from '../utils/logger';

const log = createLogger('HttpChat');

export interface HttpChatClientOptions {
  /** Base URL of the chat service (e.g. 'http://localhost:8000') */
  baseUrl: string;
  /** Bearer token, if the service requires one */
  token?: string;
  /** Per-request timeout (default: 10000ms) */
  timeoutMs?: number;
}

/** Pull the assistant text out of any of the supported reply shapes. */
export function extractReplyText(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;

  const fromData = stringField(payload.data, 'response');
  if (fromData !== undefined) return fromData;

  if (typeof payload.reply === 'string') return payload.reply;

  const fromMessage = stringField(payload.message, 'content');
  if (fromMessage !== undefined) return fromMessage;

  if (Array.isArray(payload.choices)) {
    for (const choice of payload.choices) {
      const content = isRecord(choice) ? stringField(choice.message, 'content') : undefined;
      if (content !== undefined) return content;
    }
  }
  return undefined;
}

export function extractConversationId(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  return stringField(payload.data, 'conversation_id') ?? stringField(payload.message, 'conversation_id');
}

export class HttpChatClient implements ChatClient {
  private readonly endpoint: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: HttpChatClientOptions) {
    if (!options.baseUrl) {
      throw new Error('HttpChatClient requires a baseUrl');
    }
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async chat(text: string, options: ChatRequestOptions): Promise<ChatReply> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    log.debug(`POST ${this.endpoint} (conversation ${options.sessionId})`);

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          message: text,
          conversation_id: options.sessionId,
          debug: options.debug,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ChatClientError(`Chat request could not reach the server: ${errorMessage(err)}`, { cause: err });
    }

    const body = await response.text();
    if (!response.ok) {
      throw new ChatClientError(`Chat request failed (${response.status}): ${body}`);
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('application/json')) {
      throw new ChatClientError(`Unexpected content type: ${contentType || 'none'}`);
    }

    const payload = tryParseJson(body);
    if (payload === undefined) {
      throw new ChatClientError('Chat response was not valid JSON');
    }

    const reply = extractReplyText(payload);
    if (reply === undefined) {
      throw new ChatClientError('Chat response did not contain assistant content');
    }

    log.debug(`Received reply (${body.length} bytes)`);
    return { text: reply, sessionId: extractConversationId(payload) };
  }
}
