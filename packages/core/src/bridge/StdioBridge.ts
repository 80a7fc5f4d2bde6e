import { createInterface, type Interface } from 'node:readline';

import { ConnectionError, ProtocolError, TimeoutError, errorMessage } from '../errors.js';
import { type Logger, silentLogger } from '../logging/logger.js';
import type { BridgeMethod, ProtocolBridge, StdioBridgeConfig } from '../types/bridge.js';
import { withTimeout } from '../utils/timeout.js';

import { type DuplexChannel, spawnProcessChannel } from './channel.js';
import {
  DEFAULT_CLIENT_INFO,
  DEFAULT_PROTOCOL_VERSION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_STARTUP_TIMEOUT_MS,
  DEFAULT_STDIO_ARGS,
  DEFAULT_STDIO_COMMAND,
} from './defaults.js';
import {
  JSONRPC_VERSION,
  type IncomingMessage,
  decodeMessage,
  describeRemoteError,
  encodeMessage,
} from './envelope.js';

/** JSON-RPC "method not found". */
const METHOD_NOT_FOUND = -32601;

export interface StdioBridgeOptions {
  logger?: Logger;

  /** Replaces process spawning, e.g. with an in-process backend. */
  channelFactory?: (config: StdioBridgeConfig) => DuplexChannel;
}

interface PendingRequest {
  id: number;
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

type BridgeState = 'closed' | 'opening' | 'open';

/**
 * Line-delimited JSON-RPC 2.0 over a spawned backend's stdin/stdout.
 *
 * - one request in flight; a concurrent `send` is rejected
 * - responses are correlated by id; a mismatch is a `ProtocolError`
 * - a response that arrives after its request timed out is dropped
 */
export class StdioBridge implements ProtocolBridge {
  readonly transport = 'stdio' as const;

  private readonly config: StdioBridgeConfig;
  private readonly logger: Logger;
  private readonly channelFactory: (config: StdioBridgeConfig) => DuplexChannel;

  private state: BridgeState = 'closed';
  private channel: DuplexChannel | null = null;
  private lines: Interface | null = null;
  private opening: Promise<void> | null = null;
  private pending: PendingRequest | null = null;
  private readonly abandoned = new Set<number>();
  private nextId = 1;
  private openCount = 0;

  constructor(config: StdioBridgeConfig, options: StdioBridgeOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? silentLogger;
    this.channelFactory =
      options.channelFactory ??
      ((cfg) =>
        spawnProcessChannel({
          command: cfg.command ?? DEFAULT_STDIO_COMMAND,
          args: cfg.args ?? DEFAULT_STDIO_ARGS,
          env: cfg.env,
          cwd: cfg.cwd,
        }));
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get generation(): number {
    return this.openCount;
  }

  async open(): Promise<void> {
    if (this.state === 'open') return;
    if (this.opening) return await this.opening;

    this.opening = this.establish().finally(() => {
      this.opening = null;
    });
    return await this.opening;
  }

  async send(method: BridgeMethod, params: Record<string, unknown> = {}): Promise<unknown> {
    if (this.state !== 'open') {
      throw new ProtocolError(`Cannot send "${method}": bridge is not open`);
    }
    return await this.request(method, params, this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
  }

  async close(): Promise<void> {
    const channel = this.channel;
    this.channel = null;
    this.state = 'closed';

    this.failPending(new ProtocolError('Bridge closed while a request was in flight'));
    this.abandoned.clear();
    this.lines?.close();
    this.lines = null;

    if (!channel) return;

    try {
      await channel.close();
    } catch (error) {
      this.logger.warn('Failed to close tool backend channel', { error: errorMessage(error) });
    }
  }

  private async establish(): Promise<void> {
    const startupTimeoutMs = this.config.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    const deadline = Date.now() + startupTimeoutMs;

    // A channel that ended on its own is still held until released here.
    if (this.channel) await this.close();
    this.state = 'opening';

    try {
      const channel = this.channelFactory(this.config);
      this.attach(channel);

      await withTimeout(
        channel.ready,
        startupTimeoutMs,
        () => new ConnectionError(`Tool backend did not start within ${startupTimeoutMs}ms`),
      );

      const result = await this.request(
        'initialize',
        {
          protocolVersion: this.config.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: this.config.clientInfo ?? DEFAULT_CLIENT_INFO,
        },
        Math.max(1, deadline - Date.now()),
      );

      channel.writable.write(
        encodeMessage({ jsonrpc: JSONRPC_VERSION, method: 'notifications/initialized' }),
      );

      this.state = 'open';
      this.openCount += 1;
      this.logger.debug('Tool backend initialized', {
        generation: this.openCount,
        server: serverName(result),
      });
    } catch (error) {
      await this.close();
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`Failed to open tool backend: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private attach(channel: DuplexChannel): void {
    this.channel = channel;

    const lines = createInterface({ input: channel.readable, crlfDelay: Infinity });
    lines.on('line', (line) => this.handleLine(channel, line));
    lines.on('close', () => this.handleChannelClosed(channel));
    this.lines = lines;

    channel.onClose((reason) => this.handleChannelClosed(channel, reason));
    channel.writable.on('error', (error) => this.handleChannelClosed(channel, error));

    if (channel.stderr) {
      const diagnostics = createInterface({ input: channel.stderr, crlfDelay: Infinity });
      diagnostics.on('line', (line) => {
        if (line.trim()) this.logger.debug('backend stderr', { line });
      });
    }
  }

  private request(method: string, params: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    const channel = this.channel;
    if (!channel) {
      return Promise.reject(new ProtocolError(`Cannot send "${method}": channel is not established`));
    }
    if (this.pending) {
      return Promise.reject(
        new ProtocolError(
          `Cannot send "${method}": request ${this.pending.id} (${this.pending.method}) is still in flight`,
        ),
      );
    }

    const id = this.nextId++;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending?.id !== id) return;
        this.pending = null;
        this.abandoned.add(id);
        reject(new TimeoutError(`Request ${id} (${method})`, timeoutMs));
      }, timeoutMs);

      this.pending = {
        id,
        method,
        resolve: (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };

      this.logger.debug('-> request', { id, method });
      channel.writable.write(
        encodeMessage({ jsonrpc: JSONRPC_VERSION, id, method, params }),
        (error) => {
          if (error && this.pending?.id === id) {
            this.failPending(
              new ProtocolError(`Failed to write request ${id} (${method})`, { cause: error }),
            );
          }
        },
      );
    });
  }

  private handleLine(channel: DuplexChannel, line: string): void {
    if (channel !== this.channel || line.trim().length === 0) return;

    let message: IncomingMessage;
    try {
      message = decodeMessage(line);
    } catch (error) {
      if (this.pending) {
        this.failPending(error instanceof Error ? error : new ProtocolError(errorMessage(error)));
      } else {
        this.logger.warn('Ignoring malformed message with no request in flight', {
          error: errorMessage(error),
        });
      }
      return;
    }

    switch (message.kind) {
      case 'notification':
        this.logger.debug('<- notification', { method: message.method });
        return;
      case 'request':
        // Server-initiated requests are not supported by this client.
        channel.writable.write(
          `${JSON.stringify({
            jsonrpc: JSONRPC_VERSION,
            id: message.id,
            error: { code: METHOD_NOT_FOUND, message: `Method not supported: ${message.method}` },
          })}\n`,
        );
        return;
      case 'response':
      case 'error':
        this.handleResponse(message);
        return;
    }
  }

  private handleResponse(message: Extract<IncomingMessage, { kind: 'response' | 'error' }>): void {
    if (typeof message.id === 'number' && this.abandoned.delete(message.id)) {
      this.logger.warn('Dropping late response for a timed-out request', { id: message.id });
      return;
    }

    const pending = this.pending;
    if (!pending) {
      this.logger.warn('Ignoring response with no request in flight', { id: message.id });
      return;
    }

    if (message.id !== pending.id) {
      this.failPending(
        new ProtocolError(
          `Correlation id mismatch: expected ${pending.id}, received ${String(message.id)}`,
        ),
      );
      return;
    }

    this.pending = null;
    if (message.kind === 'error') {
      pending.reject(
        new ProtocolError(`Backend rejected "${pending.method}": ${describeRemoteError(message.error)}`, {
          remote: message.error,
        }),
      );
      return;
    }

    this.logger.debug('<- response', { id: pending.id });
    pending.resolve(message.result);
  }

  private handleChannelClosed(channel: DuplexChannel, reason?: Error): void {
    if (channel !== this.channel) return;

    this.state = 'closed';
    this.failPending(
      new ProtocolError('Tool backend channel closed unexpectedly', reason ? { cause: reason } : undefined),
    );
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.reject(error);
  }
}

function serverName(result: unknown): string | undefined {
  if (typeof result !== 'object' || result === null || !('serverInfo' in result)) return undefined;
  const info = result.serverInfo;
  if (typeof info !== 'object' || info === null || !('name' in info)) return undefined;
  return typeof info.name === 'string' ? info.name : undefined;
}
