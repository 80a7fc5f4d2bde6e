import type { AuditRecord } from '../types/record.js';

/**
 * A completed record with plausible values. Override any top-level section.
 */
export function sampleAuditRecord(overrides: Partial<AuditRecord> = {}): AuditRecord {
  return {
    auditId: 'audit-1',
    url: 'https://example.com/',
    timestamp: '2026-05-01T12:00:00.000Z',
    status: 'completed',
    performance: {
      coreWebVitals: { lcpMs: 2_100, fidMs: 80, cls: 0.05, fcpMs: 900, ttfbMs: 120, grade: 'A' },
      lighthouseScore: 82,
      loadTimeMs: 2_400,
      totalRequests: 42,
      issues: [],
    },
    security: {
      httpsEnabled: true,
      riskLevel: 'medium',
      securityHeaders: { csp: false, hsts: true },
      vulnerabilities: [
        { type: 'Content Security Policy Missing', severity: 'medium', description: 'No CSP header' },
      ],
      consoleErrors: 0,
    },
    recommendations: [
      {
        title: 'Add a CSP header',
        description: 'Start with a report-only policy.',
        priority: 'high',
        category: 'security',
        impact: null,
      },
    ],
    overallScore: 89,
    grade: 'B',
    executiveSummary: {
      overview: 'Fast site with one header gap.',
      businessImpact: '',
      keyRisks: [],
      investmentPriority: 'quarterly',
      roiEstimate: null,
      actionTimeline: [],
    },
    toolResults: {
      navigate_page: { name: 'navigate_page', status: 'success', output: 'loaded', durationMs: 15 },
    },
    metadata: {
      schemaVersion: '1.0',
      runId: 'run-1',
      startedAt: '2026-05-01T11:59:55.000Z',
      completedAt: '2026-05-01T12:00:00.000Z',
      durationMs: 5_000,
      analysisProvider: 'scripted',
      model: 'scripted-1',
      transport: 'stdio',
      toolsSelected: ['navigate_page'],
      toolsFailed: [],
    },
    ...overrides,
  };
}
