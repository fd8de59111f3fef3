/**
 * Wyoming protocol client — the event stream spoken by Rhasspy/Home
 * Assistant speech services over TCP.
 *
 * Every event is one JSON header line, optionally followed by extra JSON
 * data and a binary payload:
 *
 *   {"type":"audio-chunk","version":"1.5.0","data_length":N,"payload_length":M}\n
 *   <N bytes of JSON data><M bytes of payload>
 *
 * Older peers put `data` inline in the header; both forms are read.
 */

import { createConnection, type Socket } from 'net';
import { Channel } from '../utils/channel';
import { toError } from '../core/errors';
import { isRecord, tryParseJson, type JsonRecord } from '../utils/json';
import { createLogger } from '../utils/logger';

const log = createLogger('Wyoming');

export const WYOMING_VERSION = '1.5.0';

export interface WyomingEvent {
  type: string;
  data: JsonRecord;
  payload: Buffer | null;
}

export function encodeEvent(type: string, data: JsonRecord = {}, payload?: Uint8Array): Buffer {
  const header: JsonRecord = { type, version: WYOMING_VERSION };
  const dataBytes = Object.keys(data).length > 0 ? Buffer.from(JSON.stringify(data), 'utf8') : null;
  if (dataBytes) header.data_length = dataBytes.length;
  if (payload && payload.length > 0) header.payload_length = payload.length;

  const parts: Buffer[] = [Buffer.from(`${JSON.stringify(header)}\n`, 'utf8')];
  if (dataBytes) parts.push(dataBytes);
  if (payload && payload.length > 0) parts.push(Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength));
  return Buffer.concat(parts);
}

interface PendingHeader {
  type: string;
  data: JsonRecord;
  dataLength: number;
  payloadLength: number;
}

function byteLength(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : 0;
}

function parseHeader(line: string): PendingHeader {
  const header = tryParseJson(line);
  if (!isRecord(header) || typeof header.type !== 'string') {
    throw new Error(`Malformed Wyoming event header: ${line.slice(0, 80)}`);
  }
  return {
    type: header.type,
    data: isRecord(header.data) ? header.data : {},
    dataLength: byteLength(header.data_length),
    payloadLength: byteLength(header.payload_length),
  };
}

/** Incremental parser; feed it socket chunks as they arrive. */
export class WyomingDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private header: PendingHeader | null = null;

  push(chunk: Buffer): WyomingEvent[] {
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : chunk;
    const events: WyomingEvent[] = [];

    while (true) {
      if (!this.header) {
        const eol = this.buffer.indexOf(0x0a);
        if (eol < 0) break;
        const line = this.buffer.subarray(0, eol).toString('utf8').trim();
        this.buffer = this.buffer.subarray(eol + 1);
        if (!line) continue;
        this.header = parseHeader(line);
      }

      const { type, dataLength, payloadLength } = this.header;
      if (this.buffer.length < dataLength + payloadLength) break;

      let data = this.header.data;
      if (dataLength > 0) {
        const extra = tryParseJson(this.buffer.subarray(0, dataLength).toString('utf8'));
        if (!isRecord(extra)) {
          throw new Error(`Malformed Wyoming data for "${type}"`);
        }
        data = { ...data, ...extra };
      }
      const payload = payloadLength > 0
        ? Buffer.from(this.buffer.subarray(dataLength, dataLength + payloadLength))
        : null;

      this.buffer = this.buffer.subarray(dataLength + payloadLength);
      this.header = null;
      events.push({ type, data, payload });
    }

    return events;
  }
}

/** One TCP conversation with a Wyoming service. Not reused across requests. */
export class WyomingConnection {
  private readonly decoder = new WyomingDecoder();
  private readonly events = new Channel<WyomingEvent>();
  private error: Error | null = null;

  private constructor(private readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      let events: WyomingEvent[];
      try {
        events = this.decoder.push(chunk);
      } catch (err) {
        this.fail(toError(err));
        return;
      }
      for (const event of events) {
        log.debug(`<- ${event.type}`);
        this.events.push(event);
      }
    });
    socket.on('error', (err) => this.fail(err));
    socket.on('close', () => this.events.close());
  }

  static connect(host: string, port: number, timeoutMs: number): Promise<WyomingConnection> {
    return new Promise<WyomingConnection>((resolve, reject) => {
      log.debug(`Connecting to ${host}:${port}...`);
      const socket = createConnection({ host, port });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Connection to ${host}:${port} timed out`));
      }, timeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(err);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(new WyomingConnection(socket));
      });
    });
  }

  get closed(): boolean {
    return this.events.closed;
  }

  write(type: string, data?: JsonRecord, payload?: Uint8Array): void {
    log.debug(`-> ${type}`);
    this.socket.write(encodeEvent(type, data, payload));
  }

  /**
   * Next event from the service. Resolves null once the service hung up;
   * rejects on a socket error or when nothing arrives within `timeoutMs`.
   */
  async nextEvent(timeoutMs: number): Promise<WyomingEvent | null> {
    const event = await this.events.next(timeoutMs);
    if (event) return event;
    if (this.error) throw this.error;
    if (this.events.closed) return null;
    throw new Error(`No response within ${timeoutMs}ms`);
  }

  close(): void {
    this.socket.destroy();
    this.events.close();
  }

  private fail(err: Error): void {
    log.debug('Connection failed:', err.message);
    if (!this.error) this.error = err;
    this.socket.destroy();
    this.events.close();
  }
}
