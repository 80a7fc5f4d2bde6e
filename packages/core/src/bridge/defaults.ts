import type { ClientInfo } from '../types/bridge.js';

export const DEFAULT_STARTUP_TIMEOUT_MS = 30_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export const DEFAULT_STDIO_COMMAND = 'npx';
export const DEFAULT_STDIO_ARGS = [
  '-y',
  'chrome-devtools-mcp@latest',
  '--headless=true',
  '--isolated=true',
] as const;
export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';
export const DEFAULT_CLIENT_INFO: ClientInfo = { name: 'siteaudit', version: '0.1.0' };

export const DEFAULT_TOOLS_PATH = '/mcp/tools';
export const DEFAULT_HEALTH_PATH = '/health';
