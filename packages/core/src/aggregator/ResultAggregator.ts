import { randomUUID } from 'node:crypto';

import { PipelineStateError } from '../errors.js';
import type { ExecutiveSummary, TechnicalReport } from '../schemas/report.js';
import { AuditScorer, gradeWebVitals, toGrade } from '../scoring/AuditScorer.js';
import type { PipelineState } from '../types/pipeline.js';
import type {
  AuditRecord,
  ExecutiveSummarySection,
  PerformanceSection,
  Recommendation,
  SecuritySection,
} from '../types/record.js';

export interface ResultAggregatorOptions {
  now?: () => Date;
  generateId?: () => string;
  scorer?: AuditScorer;
}

/**
 * Builds the immutable `AuditRecord` from a completed run.
 *
 * The engine's structured output may omit optional fields even when it
 * matches the schema; every section is normalized here.
 */
export class ResultAggregator {
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly scorer: AuditScorer;

  constructor(options: ResultAggregatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.scorer = options.scorer ?? new AuditScorer();
  }

  build(state: PipelineState): AuditRecord {
    if (state.phase !== 'Done') {
      throw new PipelineStateError(`Cannot aggregate a run in phase ${state.phase}; the run must be Done`);
    }

    const report = state.technicalReport;
    const summary = state.executiveSummary;
    if (report === undefined || summary === undefined) {
      throw new PipelineStateError('Run reached Done without a technical report and executive summary');
    }

    const completed = this.now();
    const performance = normalizePerformance(report);
    const security = normalizeSecurity(report, state.url);
    const fallback = this.scorer.score({ performance, security });

    const overallScore = report.overallScore ?? fallback.score;
    const toolsFailed = Object.values(state.toolResults)
      .filter((r) => r.status === 'error')
      .map((r) => r.name);

    const record: AuditRecord = {
      auditId: nonEmpty(report.auditId) ?? this.generateId(),
      url: state.url,
      timestamp: nonEmpty(report.timestamp) ?? completed.toISOString(),
      status: 'completed',
      performance,
      security,
      recommendations: normalizeRecommendations(report),
      overallScore,
      grade: report.grade ?? toGrade(overallScore),
      executiveSummary: normalizeSummary(summary),
      toolResults: { ...state.toolResults },
      metadata: {
        schemaVersion: '1.0',
        runId: state.runId,
        startedAt: new Date(state.startedAt).toISOString(),
        completedAt: completed.toISOString(),
        durationMs: Math.max(0, completed.getTime() - state.startedAt),
        analysisProvider: state.analysis.provider,
        model: state.analysis.model,
        transport: state.transport,
        toolsSelected: state.toolCalls.map((c) => c.name),
        toolsFailed,
      },
    };

    return deepFreeze(record);
  }
}

function normalizePerformance(report: TechnicalReport): PerformanceSection {
  const source = report.performance;
  const vitals: NonNullable<TechnicalReport['performance']['coreWebVitals']> =
    source.coreWebVitals ?? {};

  const coreWebVitals: PerformanceSection['coreWebVitals'] = {
    lcpMs: vitals.lcpMs ?? null,
    fidMs: vitals.fidMs ?? null,
    cls: vitals.cls ?? null,
    fcpMs: vitals.fcpMs ?? null,
    ttfbMs: vitals.ttfbMs ?? null,
    grade: vitals.grade ?? null,
  };
  coreWebVitals.grade ??= gradeWebVitals(coreWebVitals);

  return {
    coreWebVitals,
    lighthouseScore: source.lighthouseScore ?? null,
    loadTimeMs: source.loadTimeMs ?? null,
    totalRequests: source.totalRequests ?? null,
    issues: [...(source.issues ?? [])],
  };
}

function normalizeSecurity(report: TechnicalReport, url: string): SecuritySection {
  const source = report.security;
  return {
    httpsEnabled: source.httpsEnabled ?? new URL(url).protocol === 'https:',
    riskLevel: source.riskLevel ?? 'unknown',
    securityHeaders: { ...(source.securityHeaders ?? {}) },
    vulnerabilities: (source.vulnerabilities ?? []).map((v) => ({ ...v })),
    consoleErrors: source.consoleErrors ?? 0,
  };
}

function normalizeRecommendations(report: TechnicalReport): Recommendation[] {
  return (report.recommendations ?? []).map((r) => ({
    title: r.title,
    description: r.description ?? '',
    priority: r.priority ?? 'medium',
    category: r.category ?? 'general',
    impact: r.impact ?? null,
  }));
}

function normalizeSummary(summary: ExecutiveSummary): ExecutiveSummarySection {
  return {
    overview: summary.overview,
    businessImpact: summary.businessImpact ?? '',
    keyRisks: [...(summary.keyRisks ?? [])],
    investmentPriority: summary.investmentPriority ?? 'quarterly',
    roiEstimate: summary.roiEstimate ?? null,
    actionTimeline: (summary.actionTimeline ?? []).map((step) => ({
      timeframe: step.timeframe,
      actions: [...step.actions],
    })),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
  if (typeof value !== 'object' || value === null || seen.has(value)) return value;
  seen.add(value);
  for (const child of Object.values(value)) deepFreeze(child, seen);
  Object.freeze(value);
  return value;
}
