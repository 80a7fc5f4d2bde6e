import { z } from 'zod';

import {
  ConnectionError,
  ProtocolError,
  TimeoutError,
  ToolExecutionError,
  errorMessage,
} from '../errors.js';
import { type Logger, silentLogger } from '../logging/logger.js';
import type { BridgeMethod, HttpBridgeConfig, ProtocolBridge } from '../types/bridge.js';

import {
  DEFAULT_HEALTH_PATH,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_STARTUP_TIMEOUT_MS,
  DEFAULT_TOOLS_PATH,
} from './defaults.js';

export interface HttpBridgeOptions {
  logger?: Logger;

  /** Injected for tests. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

interface HttpExchange {
  status: number;
  ok: boolean;
  body: unknown;
  text: string;
}

const healthSchema = z.object({ status: z.string().optional() }).passthrough();

const toolCallResponseSchema = z.object({
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().nullable().optional(),
});

/**
 * The bridge contract realized over a long-lived HTTP tool service.
 *
 * `initialize` maps to the health probe, `tools/list` to `GET {toolsPath}`, and
 * `tools/call` to `POST {toolsPath}/{name}` with `{"arguments": {...}}`.
 */
export class HttpBridge implements ProtocolBridge {
  readonly transport = 'http' as const;

  private readonly config: HttpBridgeConfig;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  private opened = false;
  private openCount = 0;
  private requestCounter = 0;
  private inFlight: AbortController | null = null;

  constructor(config: HttpBridgeConfig, options: HttpBridgeOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  get generation(): number {
    return this.openCount;
  }

  async open(): Promise<void> {
    if (this.opened) return;

    try {
      await this.checkHealth(this.config.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS);
    } catch (error) {
      throw new ConnectionError(
        `Tool service at ${this.config.serviceUrl} is unavailable: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.opened = true;
    this.openCount += 1;
    this.logger.debug('Tool service healthy', { url: this.config.serviceUrl, generation: this.openCount });
  }

  async send(method: BridgeMethod, params: Record<string, unknown> = {}): Promise<unknown> {
    if (!this.opened) {
      throw new ProtocolError(`Cannot send "${method}": bridge is not open`);
    }
    if (this.inFlight) {
      throw new ProtocolError(`Cannot send "${method}": another request is still in flight`);
    }

    const timeoutMs = this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    switch (method) {
      case 'initialize':
        return await this.checkHealth(timeoutMs);
      case 'tools/list':
        return await this.listTools(timeoutMs);
      case 'tools/call':
        return await this.callTool(params, timeoutMs);
    }
  }

  async close(): Promise<void> {
    this.opened = false;
    this.inFlight?.abort(new ProtocolError('Bridge closed while a request was in flight'));
  }

  private async checkHealth(timeoutMs: number): Promise<unknown> {
    const exchange = await this.exchange('GET', this.config.healthPath ?? DEFAULT_HEALTH_PATH, undefined, timeoutMs);
    if (!exchange.ok) {
      throw new ProtocolError(`Health check failed with HTTP ${exchange.status}`);
    }

    const parsed = healthSchema.safeParse(exchange.body ?? {});
    if (!parsed.success) {
      throw new ProtocolError('Health check returned an unexpected body');
    }
    if (parsed.data.status !== undefined && parsed.data.status !== 'healthy') {
      throw new ProtocolError(`Tool service reports status "${parsed.data.status}"`);
    }
    return parsed.data;
  }

  private async listTools(timeoutMs: number): Promise<unknown> {
    const exchange = await this.exchange('GET', this.toolsPath(), undefined, timeoutMs);
    if (!exchange.ok) {
      throw new ProtocolError(`Listing tools failed with HTTP ${exchange.status}`);
    }

    const body = exchange.body;
    if (Array.isArray(body)) return { tools: body };
    if (typeof body === 'object' && body !== null && 'tools' in body) return { tools: body.tools };

    throw new ProtocolError('Listing tools returned an unexpected body');
  }

  private async callTool(params: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    const name = params.name;
    if (typeof name !== 'string' || name.length === 0) {
      throw new ProtocolError('tools/call requires a tool name');
    }

    const exchange = await this.exchange(
      'POST',
      `${this.toolsPath()}/${encodeURIComponent(name)}`,
      { arguments: params.arguments ?? {} },
      timeoutMs,
    );

    const parsed = toolCallResponseSchema.safeParse(exchange.body);

    if (!exchange.ok) {
      const detail = parsed.success && parsed.data.error ? parsed.data.error : exchange.text.slice(0, 200);
      throw new ToolExecutionError(name, `Tool "${name}" failed with HTTP ${exchange.status}: ${detail}`);
    }
    if (!parsed.success) {
      throw new ProtocolError(`Tool "${name}" returned an unexpected body`, { cause: parsed.error });
    }
    if (!parsed.data.success) {
      throw new ToolExecutionError(name, parsed.data.error ?? `Tool "${name}" failed`);
    }
    return parsed.data.result ?? null;
  }

  private async exchange(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    timeoutMs: number,
  ): Promise<HttpExchange> {
    const requestId = ++this.requestCounter;
    const controller = new AbortController();
    this.inFlight = controller;

    const operation = `${method} ${path}`;
    const timer = setTimeout(() => controller.abort(new TimeoutError(operation, timeoutMs)), timeoutMs);

    try {
      this.logger.debug('-> http', { id: requestId, operation });
      const response = await this.fetchImpl(this.resolveUrl(path), {
        method,
        headers: {
          accept: 'application/json',
          ...(body === undefined ? {} : { 'content-type': 'application/json' }),
          'x-request-id': String(requestId),
          ...this.config.headers,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      const text = await response.text();
      this.logger.debug('<- http', { id: requestId, status: response.status });

      return { status: response.status, ok: response.ok, body: parseBody(text, response.ok, operation), text };
    } catch (error) {
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && reason instanceof ProtocolError) throw reason;
      if (error instanceof ProtocolError) throw error;
      throw new ProtocolError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      if (this.inFlight === controller) this.inFlight = null;
    }
  }

  private toolsPath(): string {
    return this.config.toolsPath ?? DEFAULT_TOOLS_PATH;
  }

  private resolveUrl(path: string): string {
    const base = this.config.serviceUrl.replace(/\/+$/, '');
    return `${base}${path.startsWith('/') ? path : `/${path}`}`;
  }
}

function parseBody(text: string, ok: boolean, operation: string): unknown {
  if (text.trim().length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    // Error pages are often HTML; only a successful response must be JSON.
    if (!ok) return undefined;
    throw new ProtocolError(`${operation} returned a non-JSON body`, { cause: error });
  }
}
