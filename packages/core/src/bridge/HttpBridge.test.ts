import { describe, expect, it } from 'vitest';

import { ConnectionError, ProtocolError, TimeoutError, ToolExecutionError } from '../errors.js';
import type { HttpBridgeConfig } from '../types/bridge.js';

import { HttpBridge } from './HttpBridge.js';

interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

type Route = (request: RecordedRequest, signal: AbortSignal | undefined) => Response | Promise<Response>;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function setup(routes: Record<string, Route>, config: Partial<HttpBridgeConfig> = {}) {
  const requests: RecordedRequest[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const headers = new Headers(init?.headers);
    const request: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers: Object.fromEntries(headers.entries()),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);

    const key = `${request.method} ${new URL(url).pathname}`;
    const route = routes[key];
    if (!route) return new Response('not found', { status: 404 });
    return await route(request, init?.signal ?? undefined);
  };

  const bridge = new HttpBridge(
    { transport: 'http', serviceUrl: 'http://tools.test:3001/', requestTimeoutMs: 1_000, ...config },
    { fetch: fetchImpl },
  );
  return { bridge, requests };
}

const healthy: Route = () => json({ status: 'healthy', chrome_devtools_ready: true });

/** Never answers until aborted. */
const hang: Route = (_request, signal) =>
  new Promise<Response>((_, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

describe('HttpBridge', () => {
  it('opens after a healthy probe', async () => {
    const { bridge, requests } = setup({ 'GET /health': healthy });

    await bridge.open();

    expect(bridge.isOpen).toBe(true);
    expect(bridge.generation).toBe(1);
    expect(requests.map((r) => r.url)).toEqual(['http://tools.test:3001/health']);
  });

  it('accepts a health body without a status field', async () => {
    const { bridge } = setup({ 'GET /health': () => json({}) });
    await expect(bridge.open()).resolves.toBeUndefined();
  });

  it('refuses to open when the service reports a degraded status', async () => {
    const { bridge } = setup({ 'GET /health': () => json({ status: 'starting' }) });

    const error = await bridge.open().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      message: 'Tool service at http://tools.test:3001/ is unavailable: Tool service reports status "starting"',
    });
    expect(bridge.isOpen).toBe(false);
  });

  it('refuses to open when the probe fails', async () => {
    const { bridge } = setup({ 'GET /health': () => new Response('down', { status: 503 }) });

    await expect(bridge.open()).rejects.toThrow(
      'Tool service at http://tools.test:3001/ is unavailable: Health check failed with HTTP 503',
    );
  });

  it('wraps network failures', async () => {
    const { bridge } = setup({
      'GET /health': () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(bridge.open()).rejects.toThrow(
      'Tool service at http://tools.test:3001/ is unavailable: GET /health failed: fetch failed',
    );
  });

  it('lists tools from either an object or a bare array', async () => {
    const tools = [{ name: 'navigate_page', description: 'Navigate', inputSchema: { type: 'object' } }];

    const wrapped = setup({ 'GET /health': healthy, 'GET /mcp/tools': () => json({ tools }) });
    await wrapped.bridge.open();
    await expect(wrapped.bridge.send('tools/list')).resolves.toEqual({ tools });

    const bare = setup({ 'GET /health': healthy, 'GET /mcp/tools': () => json(tools) });
    await bare.bridge.open();
    await expect(bare.bridge.send('tools/list')).resolves.toEqual({ tools });
  });

  it('honors custom paths and headers', async () => {
    const { bridge, requests } = setup(
      { 'GET /ready': healthy, 'GET /api/tools': () => json({ tools: [] }) },
      { healthPath: '/ready', toolsPath: '/api/tools', headers: { authorization: 'Bearer test-secret' } },
    );

    await bridge.open();
    await bridge.send('tools/list');

    expect(requests.map((r) => r.url)).toEqual(['http://tools.test:3001/ready', 'http://tools.test:3001/api/tools']);
    expect(requests[1]?.headers).toMatchObject({ authorization: 'Bearer test-secret', 'x-request-id': '2' });
  });

  it('invokes a tool with its arguments', async () => {
    const { bridge, requests } = setup({
      'GET /health': healthy,
      'POST /mcp/tools/navigate_page': () =>
        json({ success: true, result: { content: [{ type: 'text', text: 'navigated' }] }, error: null }),
    });
    await bridge.open();

    const result = await bridge.send('tools/call', {
      name: 'navigate_page',
      arguments: { url: 'https://example.com' },
    });

    expect(result).toEqual({ content: [{ type: 'text', text: 'navigated' }] });
    expect(requests[1]).toMatchObject({
      url: 'http://tools.test:3001/mcp/tools/navigate_page',
      method: 'POST',
      body: { arguments: { url: 'https://example.com' } },
      headers: { 'content-type': 'application/json' },
    });
  });

  it('sends empty arguments when none are given', async () => {
    const { bridge, requests } = setup({
      'GET /health': healthy,
      'POST /mcp/tools/take_snapshot': () => json({ success: true, result: 'snapshot' }),
    });
    await bridge.open();

    await expect(bridge.send('tools/call', { name: 'take_snapshot' })).resolves.toBe('snapshot');
    expect(requests[1]?.body).toEqual({ arguments: {} });
  });

  it('reports an in-band tool failure as ToolExecutionError', async () => {
    const { bridge } = setup({
      'GET /health': healthy,
      'POST /mcp/tools/evaluate_script': () => json({ success: false, result: null, error: 'Script threw' }),
    });
    await bridge.open();

    const error = await bridge.send('tools/call', { name: 'evaluate_script' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({ message: 'Script threw', toolName: 'evaluate_script' });
  });

  it('reports an HTTP failure of a tool as ToolExecutionError', async () => {
    const { bridge } = setup({
      'GET /health': healthy,
      'POST /mcp/tools/take_screenshot': () => json({ detail: 'Browser crashed' }, 500),
    });
    await bridge.open();

    await expect(bridge.send('tools/call', { name: 'take_screenshot' })).rejects.toThrow(
      'Tool "take_screenshot" failed with HTTP 500: {"detail":"Browser crashed"}',
    );
  });

  it('rejects an unexpected tool response body', async () => {
    const { bridge } = setup({
      'GET /health': healthy,
      'POST /mcp/tools/take_snapshot': () => json({ ok: true }),
    });
    await bridge.open();

    const error = await bridge.send('tools/call', { name: 'take_snapshot' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ message: 'Tool "take_snapshot" returned an unexpected body' });
  });

  it('rejects a successful response that is not JSON', async () => {
    const { bridge } = setup({
      'GET /health': healthy,
      'GET /mcp/tools': () => new Response('<html>oops</html>', { status: 200 }),
    });
    await bridge.open();

    await expect(bridge.send('tools/list')).rejects.toThrow('GET /mcp/tools returned a non-JSON body');
  });

  it('times out a slow request', async () => {
    const { bridge } = setup({ 'GET /health': healthy, 'GET /mcp/tools': hang }, { requestTimeoutMs: 20 });
    await bridge.open();

    const error = await bridge.send('tools/list').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'GET /mcp/tools timed out after 20ms' });
  });

  it('rejects a second request while one is in flight', async () => {
    const { bridge } = setup({ 'GET /health': healthy, 'GET /mcp/tools': hang });
    await bridge.open();

    const first = bridge.send('tools/list').catch((e: unknown) => e);
    await expect(bridge.send('tools/list')).rejects.toThrow(
      'Cannot send "tools/list": another request is still in flight',
    );

    await bridge.close();
    await expect(first).resolves.toMatchObject({ message: 'Bridge closed while a request was in flight' });
  });

  it('refuses to send before open and after close', async () => {
    const { bridge } = setup({ 'GET /health': healthy });

    await expect(bridge.send('tools/list')).rejects.toThrow('bridge is not open');
    await bridge.open();
    await bridge.close();
    await expect(bridge.send('tools/list')).rejects.toThrow('bridge is not open');
    expect(bridge.isOpen).toBe(false);
  });
});
