import { describe, expect, it } from 'vitest';

import { ConnectionError, ProtocolError, TimeoutError, ToolExecutionError } from '../errors.js';
import { FakeBridge } from '../testing/fakeBridge.js';
import type { ToolDefinition } from '../types/tools.js';

import { ToolExecutor, reportedToolError } from './ToolExecutor.js';

function tool(name: string): ToolDefinition {
  return { name, description: '', inputSchema: { type: 'object' } };
}

function clock(...ticks: number[]): () => number {
  let i = 0;
  return () => ticks[Math.min(i++, ticks.length - 1)] ?? 0;
}

describe('ToolExecutor', () => {
  it('dispatches registered tools through tools/call', async () => {
    const bridge = new FakeBridge(() => ({ content: [{ type: 'text', text: 'ok' }] }));
    const executor = new ToolExecutor(bridge, { now: clock(100, 142) });
    executor.register([tool('navigate_page')]);

    const result = await executor.execute({ name: 'navigate_page', arguments: { url: 'https://example.com' } });

    expect(result).toEqual({
      name: 'navigate_page',
      status: 'success',
      output: { content: [{ type: 'text', text: 'ok' }] },
      durationMs: 42,
    });
    expect(bridge.sent).toEqual([
      { method: 'tools/call', params: { name: 'navigate_page', arguments: { url: 'https://example.com' } } },
    ]);
  });

  it('reports unregistered tools as unavailable without touching the bridge', async () => {
    const bridge = new FakeBridge(() => null);
    const executor = new ToolExecutor(bridge);
    executor.register([tool('navigate_page')]);

    const result = await executor.execute({ name: 'click', arguments: {} });

    expect(result).toEqual({
      name: 'click',
      status: 'error',
      error: { kind: 'unavailable', message: 'Tool "click" is not available' },
      durationMs: 0,
    });
    expect(bridge.sent).toHaveLength(0);
  });

  it('records an in-band tool error', async () => {
    const bridge = new FakeBridge(() => ({
      isError: true,
      content: [{ type: 'text', text: 'Navigation timeout' }],
    }));
    const executor = new ToolExecutor(bridge, { now: clock(0, 5) });
    executor.register([tool('navigate_page')]);

    const result = await executor.execute({ name: 'navigate_page', arguments: {} });

    expect(result).toEqual({
      name: 'navigate_page',
      status: 'error',
      error: { kind: 'tool', message: 'Navigation timeout' },
      durationMs: 5,
    });
  });

  it.each([
    [new TimeoutError('Request 4 (tools/call)', 50), 'timeout', 'Request 4 (tools/call) timed out after 50ms'],
    [new ProtocolError('Correlation id mismatch: expected 4, received 3'), 'protocol', 'Correlation id mismatch: expected 4, received 3'],
    [new ConnectionError('Tool backend channel closed'), 'connection', 'Tool backend channel closed'],
    [new ToolExecutionError('take_screenshot', 'Browser crashed'), 'tool', 'Browser crashed'],
    [new RangeError('unexpected'), 'unknown', 'unexpected'],
  ])('contains %s as an error result', async (thrown, kind, message) => {
    const bridge = new FakeBridge(() => {
      throw thrown;
    });
    const executor = new ToolExecutor(bridge, { now: clock(10, 30) });
    executor.register([tool('take_screenshot')]);

    const result = await executor.execute({ name: 'take_screenshot', arguments: {} });

    expect(result).toEqual({ name: 'take_screenshot', status: 'error', error: { kind, message }, durationMs: 20 });
  });

  it('lists registered tools', () => {
    const executor = new ToolExecutor(new FakeBridge(() => null));
    executor.register([tool('navigate_page'), tool('take_snapshot')]);

    expect(executor.has('take_snapshot')).toBe(true);
    expect(executor.has('click')).toBe(false);
    expect(executor.registeredTools()).toEqual(['navigate_page', 'take_snapshot']);
  });
});

describe('reportedToolError', () => {
  it('ignores outputs that are not flagged', () => {
    expect(reportedToolError({ content: [] })).toBeNull();
    expect(reportedToolError({ isError: false })).toBeNull();
    expect(reportedToolError('text')).toBeNull();
  });

  it('joins text blocks and falls back to a generic message', () => {
    expect(
      reportedToolError({
        isError: true,
        content: [{ type: 'text', text: 'first' }, { type: 'image', data: 'AAAA' }, { type: 'text', text: 'second' }],
      }),
    ).toBe('first\nsecond');
    expect(reportedToolError({ isError: true })).toBe('Tool reported an error');
  });
});
