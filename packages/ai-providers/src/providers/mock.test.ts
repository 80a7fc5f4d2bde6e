import { buildToolSelectionPrompt, executiveSummarySchema, technicalReportSchema } from '@siteaudit/core';
import type { ToolDefinition } from '@siteaudit/core/types';
import { describe, expect, it } from 'vitest';

import { MockAnalysisEngine } from './mock.js';

function tool(name: string): ToolDefinition {
  return { name, description: name, inputSchema: { type: 'object' } };
}

describe('MockAnalysisEngine', () => {
  it('follows the audit plan, restricted to the offered tools', async () => {
    const engine = new MockAnalysisEngine();

    const result = await engine.selectTools({
      systemPrompt: 'sys',
      prompt: buildToolSelectionPrompt('https://example.com'),
      tools: [tool('take_screenshot'), tool('navigate_page'), tool('list_console_messages')],
    });

    expect(engine.provider).toBe('mock');
    expect(engine.model).toBe('mock-1');
    expect(result.calls).toEqual([
      { name: 'navigate_page', arguments: { url: 'https://example.com' } },
      { name: 'list_console_messages', arguments: {} },
      { name: 'take_screenshot', arguments: { fullPage: true } },
    ]);
  });

  it('produces a schema-valid technical report', async () => {
    const engine = new MockAnalysisEngine();

    const result = await engine.generateStructured({
      name: 'technical_report',
      schema: technicalReportSchema,
      systemPrompt: 'sys',
      prompt: 'Analyze http://plain.test/ using the tool results below.',
    });

    expect(result.data.security.httpsEnabled).toBe(false);
    expect(result.data.security.riskLevel).toBe('high');
    expect(result.data.security.vulnerabilities?.[0]).toMatchObject({ type: 'Insecure Protocol', severity: 'high' });
    expect(result.data.recommendations?.[0]).toEqual({
      title: 'Serve the site over HTTPS and redirect HTTP traffic.',
      priority: 'high',
      category: 'security',
    });
  });

  it('answers the same prompt the same way', async () => {
    const engine = new MockAnalysisEngine();
    const request = {
      name: 'executive_summary',
      schema: executiveSummarySchema,
      systemPrompt: 'sys',
      prompt: 'Summarize the audit of https://example.com',
    };

    const first = await engine.generateStructured(request);
    const second = await engine.generateStructured(request);

    expect(second.data).toEqual(first.data);
    expect(first.data.overview).toMatch(/^Mock executive summary \d+ for a deterministic dry run\.$/);
  });
});
