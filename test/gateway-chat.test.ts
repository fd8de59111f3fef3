import { describe, it, expect, vi, afterEach } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { GatewayChatClient } from '../src/providers/gateway-chat';
import { ChatClientError } from '../src/core/errors';

vi.mock('../src/utils/logger', () => ({
  createLogger: () => ({
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  }),
}));

interface RequestFrame {
  type: string;
  id: string;
  method: string;
  params: Record<string, unknown>;
}

type Handler = (req: RequestFrame, socket: WebSocket) => void;

function send(socket: WebSocket, frame: unknown): void {
  socket.send(JSON.stringify(frame));
}

function ok(socket: WebSocket, req: RequestFrame, payload: Record<string, unknown> = {}): void {
  send(socket, { type: 'res', id: req.id, ok: true, payload });
}

function chatEvent(socket: WebSocket, payload: Record<string, unknown>): void {
  send(socket, { type: 'event', event: 'chat', payload });
}

/** Accepts the handshake and answers chat.send with `onChat`. */
function gatewayScript(onChat: Handler): Handler {
  return (req, socket) => {
    if (req.method === 'connect') ok(socket, req);
    else if (req.method === 'chat.send') onChat(req, socket);
  };
}

function runIdOf(req: RequestFrame): string {
  const runId = req.params.runId;
  return typeof runId === 'string' ? runId : '';
}

const streamReply = gatewayScript((req, socket) => {
  const runId = runIdOf(req);
  ok(socket, req, { runId });
  chatEvent(socket, { runId, delta: { text: 'Hello' } });
  chatEvent(socket, { runId, delta: { text: ' there.' } });
  chatEvent(socket, { runId, status: 'done' });
});

class FakeGateway {
  readonly requests: RequestFrame[] = [];
  connections = 0;
  handler: Handler = streamReply;

  private constructor(private readonly server: WebSocketServer, readonly url: string) {
    server.on('connection', (socket) => {
      this.connections++;
      socket.on('message', (data) => {
        const req: RequestFrame = JSON.parse(data.toString());
        this.requests.push(req);
        this.handler(req, socket);
      });
    });
  }

  static async start(): Promise<FakeGateway> {
    const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    const port = typeof address === 'string' ? 0 : address.port;
    return new FakeGateway(server, `ws://127.0.0.1:${port}`);
  }

  methods(): string[] {
    return this.requests.map((r) => r.method);
  }

  async stop(): Promise<void> {
    for (const client of this.server.clients) client.terminate();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of stream) out.push(chunk);
  return out;
}

const options = { sessionId: 'test-session', debug: false };

describe('GatewayChatClient', () => {
  let gateway: FakeGateway | null = null;
  let client: GatewayChatClient | null = null;

  async function connect(extra: { timeoutMs?: number; password?: string; token?: string } = {}) {
    gateway = await FakeGateway.start();
    client = new GatewayChatClient({ url: gateway.url, token: 'test-secret', ...extra });
    return { gateway, client };
  }

  afterEach(async () => {
    client?.close();
    await gateway?.stop();
    client = null;
    gateway = null;
  });

  it('authenticates and streams the deltas of a run', async () => {
    const { gateway, client } = await connect();

    expect(await collect(client.chatStream('Hi', options))).toEqual(['Hello', ' there.']);

    expect(gateway.methods()).toEqual(['connect', 'chat.send']);
    const [hello, send] = gateway.requests;
    expect(hello.params).toMatchObject({
      minProtocol: 3,
      maxProtocol: 3,
      client: { id: 'wakeline', mode: 'cli' },
      role: 'operator',
      auth: { token: 'test-secret' },
    });
    expect(send.params).toMatchObject({ sessionKey: 'test-session', text: 'Hi', thinking: false });
    expect(client.connected).toBe(true);
  });

  it('falls back to password auth without a token', async () => {
    const { gateway, client } = await connect({ token: undefined, password: 'test-password' });

    await collect(client.chatStream('Hi', options));

    expect(gateway.requests[0].params.auth).toEqual({ password: 'test-password' });
  });

  it('reuses one connection across turns', async () => {
    const { gateway, client } = await connect();

    await collect(client.chatStream('One', options));
    await collect(client.chatStream('Two', options));

    expect(gateway.connections).toBe(1);
    expect(gateway.methods()).toEqual(['connect', 'chat.send', 'chat.send']);
  });

  it('follows a run id assigned by the gateway', async () => {
    const { gateway, client } = await connect();
    gateway.handler = gatewayScript((req, socket) => {
      ok(socket, req, { runId: 'server-run' });
      // Give the client a moment to switch over to the new id
      setTimeout(() => {
        chatEvent(socket, { runId: runIdOf(req), delta: { text: 'stale' } });
        chatEvent(socket, { runId: 'server-run', delta: { text: 'fresh' }, status: 'completed' });
      }, 20);
    });

    expect(await collect(client.chatStream('Hi', options))).toEqual(['fresh']);
  });

  it('uses the agent completion text when no deltas arrived', async () => {
    const { gateway, client } = await connect();
    gateway.handler = gatewayScript((req, socket) => {
      const runId = runIdOf(req);
      ok(socket, req, { runId });
      send(socket, { type: 'event', event: 'agent', payload: { runId, status: 'done', text: 'Full reply.' } });
    });

    expect(await client.chat('Hi', options)).toEqual({ text: 'Full reply.' });
  });

  it('ignores the agent completion text after deltas', async () => {
    const { gateway, client } = await connect();
    gateway.handler = gatewayScript((req, socket) => {
      const runId = runIdOf(req);
      ok(socket, req, { runId });
      chatEvent(socket, { runId, delta: { text: 'Streamed.' } });
      send(socket, { type: 'event', event: 'agent', payload: { runId, status: 'ok', text: 'Streamed.' } });
    });

    expect(await collect(client.chatStream('Hi', options))).toEqual(['Streamed.']);
  });

  it('reports a failed run', async () => {
    const { gateway, client } = await connect();
    gateway.handler = gatewayScript((req, socket) => {
      const runId = runIdOf(req);
      ok(socket, req, { runId });
      chatEvent(socket, { runId, status: 'error', error: { message: 'model crashed' } });
    });

    const err = await collect(client.chatStream('Hi', options)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ChatClientError);
    expect(err).toHaveProperty('message', 'Chat failed: model crashed');
  });

  it('reports a rejected chat.send', async () => {
    const { gateway, client } = await connect();
    gateway.handler = gatewayScript((req, socket) => {
      ok(socket, req, { status: 'error', error: { message: 'quota exceeded' } });
    });

    await expect(collect(client.chatStream('Hi', options))).rejects.toThrow('Chat request rejected: quota exceeded');
  });

  it('reports a failed handshake', async () => {
    const { gateway, client } = await connect();
    gateway.handler = (req, socket) => {
      send(socket, { type: 'res', id: req.id, ok: false, error: { message: 'bad token', code: 'AUTH' } });
    };

    await expect(collect(client.chatStream('Hi', options))).rejects.toThrow('Gateway request failed: bad token');
    expect(client.connected).toBe(false);
  });

  it('fails the run when the gateway hangs up', async () => {
    const { gateway, client } = await connect();
    gateway.handler = gatewayScript((req, socket) => {
      ok(socket, req, { runId: runIdOf(req) });
      socket.close(4001, 'restarting');
    });

    await expect(collect(client.chatStream('Hi', options))).rejects.toThrow('Gateway connection closed (4001)');
    expect(client.connected).toBe(false);
  });

  it('times out when the run goes quiet', async () => {
    const { gateway, client } = await connect({ timeoutMs: 200 });
    gateway.handler = gatewayScript((req, socket) => ok(socket, req, { runId: runIdOf(req) }));

    await expect(collect(client.chatStream('Hi', options))).rejects.toThrow('Timeout waiting for chat completion');
  });

  it('ends the stream quietly when the caller aborts', async () => {
    const { gateway, client } = await connect();
    gateway.handler = gatewayScript((req, socket) => {
      const runId = runIdOf(req);
      ok(socket, req, { runId });
      chatEvent(socket, { runId, delta: { text: 'Partial' } });
    });
    const caller = new AbortController();

    const received: string[] = [];
    for await (const chunk of client.chatStream('Hi', { ...options, signal: caller.signal })) {
      received.push(chunk);
      caller.abort();
    }

    expect(received).toEqual(['Partial']);
  });

  it('does not connect for an already-aborted request', async () => {
    const { gateway, client } = await connect();
    const caller = new AbortController();
    caller.abort();

    expect(await collect(client.chatStream('Hi', { ...options, signal: caller.signal }))).toEqual([]);
    expect(gateway.connections).toBe(0);
  });
});
