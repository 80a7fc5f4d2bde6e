export type BridgeTransport = 'stdio' | 'http';

/**
 * Methods the client issues against a tool backend.
 */
export type BridgeMethod = 'initialize' | 'tools/list' | 'tools/call';

export interface ClientInfo {
  name: string;
  version: string;
}

interface BridgeTimeouts {
  /** Upper bound for establishing the channel and completing the handshake. Defaults to 30s. */
  startupTimeoutMs?: number;

  /** Upper bound for one request/response exchange. Defaults to 60s. */
  requestTimeoutMs?: number;
}

/**
 * Spawn the backend as a child process and speak line-delimited JSON-RPC over
 * its stdin/stdout.
 */
export interface StdioBridgeConfig extends BridgeTimeouts {
  transport: 'stdio';

  /** Executable to spawn. Defaults to `npx`. */
  command?: string;

  /** Arguments. Defaults to `-y chrome-devtools-mcp@latest --headless=true --isolated=true`. */
  args?: string[];

  /** Extra environment variables merged over `process.env`. */
  env?: Record<string, string>;

  /** Working directory for the child process. */
  cwd?: string;

  /** Protocol version declared during the handshake. Defaults to `2024-11-05`. */
  protocolVersion?: string;

  /** Client identity declared during the handshake. */
  clientInfo?: ClientInfo;
}

/**
 * Talk to a long-lived tool service over HTTP.
 */
export interface HttpBridgeConfig extends BridgeTimeouts {
  transport: 'http';

  /** Base URL of the service, e.g. `http://localhost:3001`. */
  serviceUrl: string;

  /** Path listing tools; `POST {toolsPath}/{name}` invokes one. Defaults to `/mcp/tools`. */
  toolsPath?: string;

  /** Health probe path. Defaults to `/health`. */
  healthPath?: string;

  /** Extra headers sent with every request. */
  headers?: Record<string, string>;
}

export type BridgeConfig = StdioBridgeConfig | HttpBridgeConfig;

/**
 * One duplex request/response channel to a tool backend.
 *
 * At most one request is outstanding at a time. Instances are never shared
 * across concurrent runs.
 */
export interface ProtocolBridge {
  readonly transport: BridgeTransport;

  /** True between a successful `open()` and the channel closing. */
  readonly isOpen: boolean;

  /** Incremented by every successful `open()`. Caches keyed on it are invalidated by a reopen. */
  readonly generation: number;

  /** Establish the channel and perform the handshake. No-op when already open. */
  open(): Promise<void>;

  /** Issue one request and wait for its matching response. */
  send(method: BridgeMethod, params?: Record<string, unknown>): Promise<unknown>;

  /** Terminate the channel. Idempotent, safe after a failed `open()`. */
  close(): Promise<void>;
}
