/**
 * GatewayChatClient — streaming chat over an agent gateway WebSocket.
 *
 * Protocol (JSON text frames):
 * - Request:  {"type":"req","id","method","params"}
 * - Response: {"type":"res","id","ok","payload"?,"error"?:{"message","code"}}
 * - Event:    {"type":"event","event","payload"}
 *
 * Flow:
 * 1. Connect, then send `connect` with the token or password
 * 2. `chat.send` with {sessionKey, text, runId, idempotencyKey, thinking}
 * 3. Receive `chat` events for that runId: payload.delta.text chunks until
 *    payload.status is done/completed/ok, or "error"
 *
 * Uses a persistent WebSocket so follow-up turns skip the handshake.
 * The conversation id is sent as the sessionKey.
 */

import { randomUUID } from 'crypto';
import WebSocket from 'ws';
import type { ChatReply, ChatRequestOptions, ChatStreamOptions, StreamingChatClient } from '../core/types';
import { ChatClientError, errorMessage, toError } from '../core/errors';
import { isRecord, stringField, tryParseJson, type JsonRecord } from '../utils/json';
import { createLogger } from '../utils/logger';

const log = createLogger('GatewayChat');

const PROTOCOL_VERSION = 3;
const FINISHED_STATUSES = new Set(['done', 'completed', 'ok']);

export interface GatewayChatClientOptions {
  /** WebSocket URL of the gateway (e.g. 'ws://localhost:18789') */
  url: string;
  /** Gateway token (preferred) */
  token?: string;
  /** Gateway password, used when no token is given */
  password?: string;
  /** Max silence while waiting for a response or the next chunk (default: 60000ms) */
  timeoutMs?: number;
  /** Client version reported in the handshake */
  clientVersion?: string;
}

interface PendingRequest {
  resolve: (payload: JsonRecord) => void;
  reject: (err: Error) => void;
}

/** Per-run state for an in-flight chat.send. */
interface RunState {
  chunks: string[];
  /** Any delta text seen for this run */
  received: boolean;
  done: boolean;
  error: Error | null;
  wake: (() => void) | null;
}

function frameError(frame: JsonRecord, fallback: string): string {
  return stringField(frame.error, 'message') ?? fallback;
}

export class GatewayChatClient implements StreamingChatClient {
  private readonly url: string;
  private readonly token: string | undefined;
  private readonly password: string | undefined;
  private readonly timeoutMs: number;
  private readonly clientVersion: string;

  private ws: WebSocket | null = null;
  private _connected = false;
  private connectPromise: Promise<void> | null = null;
  private pending = new Map<string, PendingRequest>();
  /** Active runs keyed by runId */
  private runs = new Map<string, RunState>();

  constructor(options: GatewayChatClientOptions) {
    if (!options.url) {
      throw new Error('GatewayChatClient requires a url');
    }
    this.url = options.url.replace(/\/+$/, '');
    this.token = options.token;
    this.password = options.password;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.clientVersion = options.clientVersion ?? '0.1.0';
  }

  get connected(): boolean {
    return this._connected;
  }

  async chat(text: string, options: ChatRequestOptions): Promise<ChatReply> {
    let full = '';
    for await (const chunk of this.chatStream(text, options)) {
      full += chunk;
    }
    if (!full) {
      throw new ChatClientError('Empty response from agent');
    }
    return { text: full };
  }

  async *chatStream(text: string, options: ChatStreamOptions): AsyncGenerator<string> {
    const signal = options.signal;
    if (signal?.aborted) return;

    await this.ensureConnection();

    let runId: string = randomUUID();
    const run: RunState = { chunks: [], received: false, done: false, error: null, wake: null };
    this.runs.set(runId, run);

    const onAbort = () => {
      run.done = true;
      run.wake?.();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const ack = await this.request('chat.send', {
        sessionKey: options.sessionId,
        text,
        runId,
        idempotencyKey: randomUUID(),
        thinking: options.debug,
      });

      if (ack.status === 'error') {
        throw new ChatClientError(`Chat request rejected: ${frameError(ack, 'Unknown error')}`);
      }

      // The gateway may assign its own run id
      const assigned = stringField(ack, 'runId');
      if (assigned && assigned !== runId) {
        this.runs.delete(runId);
        runId = assigned;
        this.runs.set(runId, run);
      }

      log.debug(`Streaming run ${runId}`);

      while (true) {
        if (signal?.aborted) break;
        if (run.error) throw run.error;

        const chunk = run.chunks.shift();
        if (chunk !== undefined) {
          yield chunk;
          continue;
        }

        if (run.done) break;
        await this.waitForRun(run);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.runs.delete(runId);
    }
  }

  /** Close the WebSocket connection to allow clean process exit. */
  close(): void {
    if (this.ws) {
      log.debug('Closing gateway WebSocket');
      this.ws.close();
      this.ws = null;
    }
    this._connected = false;
    this.connectPromise = null;
  }

  private waitForRun(run: RunState): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        run.error = new ChatClientError('Timeout waiting for chat completion');
        run.wake = null;
        resolve();
      }, this.timeoutMs);
      run.wake = () => {
        clearTimeout(timer);
        run.wake = null;
        resolve();
      };
    });
  }

  /** Ensure the persistent WebSocket is connected and authenticated. */
  private ensureConnection(): Promise<void> {
    if (this._connected && this.ws?.readyState === WebSocket.OPEN) {
      return Promise.resolve();
    }

    // Deduplicate concurrent connection attempts
    if (this.connectPromise) return this.connectPromise;

    this.connectPromise = this.openSocket()
      .then(() => this.handshake())
      .then(() => {
        this._connected = true;
        this.connectPromise = null;
        log.info('Connected to gateway');
      })
      .catch((err: unknown) => {
        this.connectPromise = null;
        this.close();
        throw err instanceof ChatClientError
          ? err
          : new ChatClientError(`Gateway connection failed: ${errorMessage(err)}`, { cause: err });
      });

    return this.connectPromise;
  }

  private openSocket(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      log.debug(`Connecting to ${this.url}...`);
      const ws = new WebSocket(this.url, { handshakeTimeout: this.timeoutMs });
      this.ws = ws;

      ws.on('open', () => resolve());

      ws.on('message', (data) => {
        const frame = tryParseJson(data.toString());
        if (!isRecord(frame)) {
          log.warn('Ignoring malformed gateway frame');
          return;
        }
        this.handleFrame(frame);
      });

      ws.on('error', (err) => {
        const error = toError(err);
        log.error('Gateway WebSocket error:', error);
        this.failAll(new ChatClientError(`Gateway connection error: ${error.message}`, { cause: error }));
        reject(error);
      });

      ws.on('close', (code, reason) => {
        log.debug(`Gateway WebSocket closed: ${code} ${reason.toString()}`);
        if (this.ws === ws) {
          this.ws = null;
          this._connected = false;
        }
        this.failAll(new ChatClientError(`Gateway connection closed (${code})`));
      });
    });
  }

  private async handshake(): Promise<void> {
    const auth: Record<string, string> = {};
    if (this.token) {
      auth.token = this.token;
    } else if (this.password) {
      auth.password = this.password;
    }

    await this.request('connect', {
      minProtocol: PROTOCOL_VERSION,
      maxProtocol: PROTOCOL_VERSION,
      client: {
        id: 'wakeline',
        version: this.clientVersion,
        platform: process.platform,
        mode: 'cli',
      },
      role: 'operator',
      scopes: ['operator.read', 'operator.write'],
      auth,
      locale: 'en-US',
    });
  }

  private request(method: string, params: JsonRecord): Promise<JsonRecord> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ChatClientError('WebSocket is not connected'));
    }

    const id = randomUUID();
    return new Promise<JsonRecord>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new ChatClientError(`Timeout waiting for response to ${method}`));
      }, this.timeoutMs);

      this.pending.set(id, {
        resolve: (payload) => {
          clearTimeout(timer);
          resolve(payload);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      });

      log.debug(`Sending request: ${method}`);
      ws.send(JSON.stringify({ type: 'req', id, method, params }));
    });
  }

  private handleFrame(frame: JsonRecord): void {
    if (frame.type === 'res') {
      const id = stringField(frame, 'id');
      const pending = id ? this.pending.get(id) : undefined;
      if (!id || !pending) return; // Stale or unknown request
      this.pending.delete(id);

      if (frame.ok === true) {
        pending.resolve(isRecord(frame.payload) ? frame.payload : {});
      } else {
        pending.reject(new ChatClientError(`Gateway request failed: ${frameError(frame, 'Unknown error')}`));
      }
      return;
    }

    if (frame.type === 'event') {
      const payload = frame.payload;
      if (!isRecord(payload)) return;
      const runId = stringField(payload, 'runId');
      const run = runId ? this.runs.get(runId) : undefined;
      if (!run) return;

      if (frame.event === 'chat') {
        this.handleChatEvent(run, payload);
      } else if (frame.event === 'agent') {
        this.handleAgentEvent(run, payload);
      } else {
        log.debug(`Ignoring event: ${String(frame.event)}`);
      }
    }
  }

  private handleChatEvent(run: RunState, payload: JsonRecord): void {
    const delta = stringField(payload.delta, 'text');
    if (delta) {
      run.chunks.push(delta);
      run.received = true;
    }

    const status = stringField(payload, 'status');
    if (status === 'error') {
      run.error = new ChatClientError(`Chat failed: ${frameError(payload, 'Unknown error')}`);
    } else if (status && FINISHED_STATUSES.has(status)) {
      run.done = true;
    }
    run.wake?.();
  }

  /** Agent-level completion; carries the full text when no deltas were sent. */
  private handleAgentEvent(run: RunState, payload: JsonRecord): void {
    const status = stringField(payload, 'status');
    if (!status || !FINISHED_STATUSES.has(status)) return;

    const text = stringField(payload, 'text') ?? stringField(payload, 'content');
    if (text && !run.received && !run.done) {
      run.chunks.push(text);
      run.received = true;
    }
    run.done = true;
    run.wake?.();
  }

  private failAll(error: ChatClientError): void {
    for (const pending of this.pending.values()) {
      pending.reject(error);
    }
    this.pending.clear();
    for (const run of this.runs.values()) {
      if (!run.done) run.error = error;
      run.wake?.();
    }
  }
}
