import { createInterface } from 'node:readline';
import { PassThrough } from 'node:stream';

import type { DuplexChannel } from '../bridge/channel.js';
import type { JsonSchema } from '../types/tools.js';

/**
 * A tool the in-process backend exposes.
 */
export interface BackendTool {
  name: string;
  description?: string;
  inputSchema?: JsonSchema;

  /** Produces the `tools/call` result. Defaults to a single text block. */
  handler?: (args: Record<string, unknown>) => unknown;
}

/**
 * One JSON-RPC message the backend received from the client.
 */
export interface ReceivedMessage {
  id?: number | string;
  method: string;
  params: Record<string, unknown>;
}

/**
 * How the backend answers one request.
 */
export type BackendReply =
  | { result: unknown; id?: number | string | null; delayMs?: number }
  | { error: { code?: number; message: string; data?: unknown }; id?: number | string | null; delayMs?: number }
  | { raw: string; delayMs?: number }
  | { close: true }
  | { silent: true };

export interface InProcessBackendOptions {
  tools?: BackendTool[];

  /** Override per request; `undefined` falls through to the default behavior. */
  respond?: (message: ReceivedMessage) => BackendReply | undefined;

  /** Makes every channel's `ready` reject with this error. */
  failToStart?: Error;

  serverName?: string;
}

/**
 * Tool backend speaking line-delimited JSON-RPC over in-memory streams.
 *
 * Hand `() => backend.createChannel()` to the stdio bridge as its channel factory.
 */
export class InProcessBackend {
  readonly received: ReceivedMessage[] = [];

  /** Responses the client sent back (to server-initiated requests). */
  readonly clientReplies: Record<string, unknown>[] = [];
  channelsCreated = 0;

  private readonly options: InProcessBackendOptions;
  private current: InProcessChannel | null = null;

  constructor(options: InProcessBackendOptions = {}) {
    this.options = options;
  }

  get tools(): BackendTool[] {
    return this.options.tools ?? [];
  }

  /** Requests received, notifications excluded. */
  get requests(): ReceivedMessage[] {
    return this.received.filter((m) => m.id !== undefined);
  }

  createChannel(): DuplexChannel {
    this.channelsCreated += 1;
    const channel = new InProcessChannel(this, this.options.failToStart);
    this.current = channel;
    return channel;
  }

  /** Write a raw line to the client on the current channel. */
  push(line: string): void {
    this.current?.emitLine(line);
  }

  /** Simulate the backend dying. */
  crash(reason = new Error('backend crashed')): void {
    this.current?.terminate(reason);
  }

  /** @internal */
  handle(channel: InProcessChannel, message: ReceivedMessage): void {
    this.received.push(message);
    if (message.id === undefined) return;

    const reply = this.options.respond?.(message) ?? this.defaultReply(message);
    if ('silent' in reply) return;
    if ('close' in reply) {
      channel.terminate(new Error('backend closed the channel'));
      return;
    }

    const line =
      'raw' in reply
        ? reply.raw
        : JSON.stringify(
            'error' in reply
              ? { jsonrpc: '2.0', id: reply.id === undefined ? message.id : reply.id, error: reply.error }
              : { jsonrpc: '2.0', id: reply.id === undefined ? message.id : reply.id, result: reply.result },
          );

    channel.emitLine(line, reply.delayMs);
  }

  private defaultReply(message: ReceivedMessage): BackendReply {
    switch (message.method) {
      case 'initialize':
        return {
          result: {
            protocolVersion: message.params.protocolVersion,
            capabilities: { tools: {} },
            serverInfo: { name: this.options.serverName ?? 'in-process-backend', version: '0.0.0' },
          },
        };
      case 'tools/list':
        return {
          result: {
            tools: this.tools.map((t) => ({
              name: t.name,
              description: t.description ?? `${t.name} tool`,
              inputSchema: t.inputSchema ?? { type: 'object', properties: {} },
            })),
          },
        };
      case 'tools/call': {
        const name = message.params.name;
        const tool = this.tools.find((t) => t.name === name);
        if (!tool) {
          return { error: { code: -32602, message: `Unknown tool: ${String(name)}` } };
        }
        const args = isRecord(message.params.arguments) ? message.params.arguments : {};
        return {
          result: tool.handler
            ? tool.handler(args)
            : { content: [{ type: 'text', text: `${tool.name} ok` }] },
        };
      }
      default:
        return { error: { code: -32601, message: `Method not found: ${message.method}` } };
    }
  }
}

export class InProcessChannel implements DuplexChannel {
  readonly writable = new PassThrough();
  readonly readable = new PassThrough();
  readonly ready: Promise<void>;

  private readonly listeners = new Set<(reason?: Error) => void>();
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private closed = false;

  constructor(backend: InProcessBackend, failToStart: Error | undefined) {
    this.ready = failToStart ? Promise.reject(failToStart) : Promise.resolve();

    const lines = createInterface({ input: this.writable, crlfDelay: Infinity });
    lines.on('line', (line) => {
      const value = parseLine(line);
      if (value === null) return;
      if (typeof value.method === 'string') backend.handle(this, toReceived(value, value.method));
      else backend.clientReplies.push(value);
    });
  }

  onClose(listener: (reason?: Error) => void): void {
    this.listeners.add(listener);
  }

  async close(): Promise<void> {
    this.listeners.clear();
    this.shutdown();
  }

  emitLine(line: string, delayMs?: number): void {
    if (this.closed) return;
    if (delayMs === undefined) {
      this.readable.write(`${line}\n`);
      return;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (!this.closed) this.readable.write(`${line}\n`);
    }, delayMs);
    this.timers.add(timer);
  }

  terminate(reason: Error): void {
    if (this.closed) return;
    for (const listener of this.listeners) listener(reason);
    this.listeners.clear();
    this.shutdown();
  }

  private shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.readable.end();
    this.writable.end();
  }
}

function parseLine(line: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(line);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

function toReceived(value: Record<string, unknown>, method: string): ReceivedMessage {
  const id = typeof value.id === 'number' || typeof value.id === 'string' ? value.id : undefined;
  return { id, method, params: isRecord(value.params) ? value.params : {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
