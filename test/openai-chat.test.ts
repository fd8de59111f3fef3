import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIChatClient } from '../src/providers/openai-chat';
import { ChatClientError } from '../src/core/errors';

vi.mock('../src/utils/logger', () => ({
  createLogger: () => ({
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  }),
}));

const encoder = new TextEncoder();

function delta(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`;
}

/** SSE response delivering `parts` as separate network chunks. */
function sseResponse(parts: string[], close = true): Response {
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part));
      if (close) controller.close();
    },
  });
  return new Response(stream, { headers: { 'content-type': 'text/event-stream' } });
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of stream) out.push(chunk);
  return out;
}

const options = { sessionId: 'test-session', debug: false };

describe('OpenAIChatClient', () => {
  const fetchMock = vi.fn<(url: string | URL | Request, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends an OpenAI-style streaming request', async () => {
    fetchMock.mockResolvedValue(sseResponse([delta('ok'), 'data: [DONE]\n\n']));
    const client = new OpenAIChatClient({
      baseUrl: 'http://gateway:18789/',
      token: 'test-secret',
      model: 'assistant-main',
      systemPrompt: 'Be brief.',
    });

    await collect(client.chatStream('Hello', options));

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://gateway:18789/v1/chat/completions');
    expect(init?.headers).toMatchObject({
      Authorization: 'Bearer test-secret',
      Accept: 'text/event-stream',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'assistant-main',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hello' },
      ],
      user: 'test-session',
      stream: true,
    });
  });

  it('yields content deltas until [DONE]', async () => {
    fetchMock.mockResolvedValue(sseResponse([
      delta('Hel') + 'data: {not json\n\n',
      'data: {"choices":[{"delta":{"con',
      'tent":"lo"}}]}\n\n: keep-alive\n\n',
      'data: {"choices":[{"delta":{"role":"assistant"}}]}\n\n',
      'data: [DONE]\n\n',
      delta('ignored'),
    ]));
    const client = new OpenAIChatClient({ baseUrl: 'http://gateway:18789' });

    expect(await collect(client.chatStream('Hello', options))).toEqual(['Hel', 'lo']);
  });

  it('chat() joins the stream into one reply', async () => {
    fetchMock.mockResolvedValue(sseResponse([delta('Hello'), delta(' world'), 'data: [DONE]\n\n']));
    const client = new OpenAIChatClient({ baseUrl: 'http://gateway:18789' });

    expect(await client.chat('Hi', options)).toEqual({ text: 'Hello world' });
  });

  it('chat() rejects an empty stream', async () => {
    fetchMock.mockResolvedValue(sseResponse(['data: [DONE]\n\n']));
    const client = new OpenAIChatClient({ baseUrl: 'http://gateway:18789' });

    await expect(client.chat('Hi', options)).rejects.toThrow('Empty response from chat backend');
  });

  it('reports an error status', async () => {
    fetchMock.mockResolvedValue(new Response('model overloaded', { status: 500 }));
    const client = new OpenAIChatClient({ baseUrl: 'http://gateway:18789' });

    const err = await collect(client.chatStream('Hi', options)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ChatClientError);
    expect(err).toHaveProperty('message', 'Chat backend error 500: model overloaded');
  });

  it('aborts the request when the caller cancels', async () => {
    fetchMock.mockResolvedValue(sseResponse([delta('one')], false));
    const client = new OpenAIChatClient({ baseUrl: 'http://gateway:18789' });
    const caller = new AbortController();
    const received: string[] = [];

    for await (const chunk of client.chatStream('Hi', { ...options, signal: caller.signal })) {
      received.push(chunk);
      caller.abort();
      break;
    }

    expect(received).toEqual(['one']);
    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it('times out while waiting for the response headers', async () => {
    fetchMock.mockImplementation((_url, init) => new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) return;
      signal.addEventListener('abort', () => reject(signal.reason));
    }));
    const client = new OpenAIChatClient({ baseUrl: 'http://gateway:18789', timeoutMs: 20 });

    await expect(collect(client.chatStream('Hi', options))).rejects.toThrow('Chat request timed out after 20ms');
  });
});
