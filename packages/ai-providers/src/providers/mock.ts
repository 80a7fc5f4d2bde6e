import { highestRisk } from '@siteaudit/core';
import type { AnalysisProviderConfig, Severity } from '@siteaudit/core/types';

import {
  BaseAnalysisEngine,
  type StructuredCompletion,
  type StructuredCompletionRequest,
  type ToolSelectionCompletion,
  type ToolSelectionCompletionRequest,
} from '../base.js';

function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Fixed audit plan, in execution order. Tools that are not offered are skipped.
 */
const AUDIT_PLAN: ReadonlyArray<{ name: string; arguments: (url: string) => Record<string, unknown> }> = [
  { name: 'navigate_page', arguments: (url) => ({ url }) },
  { name: 'take_snapshot', arguments: () => ({}) },
  { name: 'performance_start_trace', arguments: () => ({ reload: true, autoStop: true }) },
  { name: 'performance_stop_trace', arguments: () => ({}) },
  { name: 'list_network_requests', arguments: () => ({}) },
  { name: 'evaluate_script', arguments: () => ({ function: '() => location.protocol' }) },
  { name: 'list_console_messages', arguments: () => ({}) },
  { name: 'take_screenshot', arguments: () => ({ fullPage: true }) },
];

function firstUrl(text: string): string {
  const match = text.match(/https?:\/\/[^\s"'`]+/);
  return match ? match[0].replace(/[.,;:)]+$/, '') : 'about:blank';
}

/**
 * Deterministic offline engine.
 *
 * Intended for tests and dry runs: no network calls, and the same prompt
 * always yields the same output.
 */
export class MockAnalysisEngine extends BaseAnalysisEngine {
  readonly provider = 'mock';

  constructor(config: AnalysisProviderConfig = { provider: 'mock' }) {
    super(config, 'mock-1');
  }

  protected async completeToolSelection(request: ToolSelectionCompletionRequest): Promise<ToolSelectionCompletion> {
    const offered = new Set(request.tools.map((t) => t.name));
    const url = firstUrl(request.prompt);

    return {
      calls: AUDIT_PLAN.filter((step) => offered.has(step.name)).map((step) => ({
        name: step.name,
        arguments: step.arguments(url),
      })),
    };
  }

  protected async completeStructured(request: StructuredCompletionRequest): Promise<StructuredCompletion> {
    switch (request.name) {
      case 'technical_report':
        return { content: JSON.stringify(mockTechnicalReport(request.prompt)) };
      case 'executive_summary':
        return { content: JSON.stringify(mockExecutiveSummary(request.prompt)) };
      default:
        return { content: '{}' };
    }
  }
}

function mockTechnicalReport(prompt: string): Record<string, unknown> {
  const hash = fnv1a32(prompt);
  const https = firstUrl(prompt).startsWith('https:');

  const vulnerabilities: Array<{ type: string; severity: Severity; description: string; recommendation: string }> = [];
  if (!https) {
    vulnerabilities.push({
      type: 'Insecure Protocol',
      severity: 'high',
      description: 'The page is served over plain HTTP.',
      recommendation: 'Serve the site over HTTPS and redirect HTTP traffic.',
    });
  }
  if (hash % 2 === 0) {
    vulnerabilities.push({
      type: 'Content Security Policy Missing',
      severity: 'medium',
      description: 'No Content-Security-Policy header or meta tag was found.',
      recommendation: 'Add a Content-Security-Policy header.',
    });
  }

  return {
    performance: {
      coreWebVitals: {
        lcpMs: 1_200 + (hash % 3_000),
        fidMs: 40 + (hash % 200),
        cls: (hash % 30) / 100,
      },
      loadTimeMs: 1_500 + (hash % 4_000),
      totalRequests: 20 + (hash % 80),
    },
    security: {
      httpsEnabled: https,
      riskLevel: highestRisk(vulnerabilities.map((v) => v.severity)),
      securityHeaders: { csp: hash % 2 !== 0, hsts: https },
      vulnerabilities,
      consoleErrors: hash % 4,
    },
    recommendations: vulnerabilities.map((v) => ({
      title: v.recommendation,
      priority: v.severity === 'high' ? 'high' : 'medium',
      category: 'security',
    })),
  };
}

function mockExecutiveSummary(prompt: string): Record<string, unknown> {
  const hash = fnv1a32(prompt);
  return {
    overview: `Mock executive summary ${hash % 1000} for a deterministic dry run.`,
    businessImpact: 'This is a deterministic mock assessment.',
    keyRisks: ['Mock risk'],
    investmentPriority: (['immediate', 'quarterly', 'annual'] as const)[hash % 3],
    actionTimeline: [{ timeframe: 'Week 1', actions: ['Review the mock findings'] }],
  };
}
