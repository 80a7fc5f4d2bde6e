import { EventEmitter } from 'node:events';

import { AuditFailedError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { AuditPipeline, type AuditPipelineOptions } from '../pipeline/AuditPipeline.js';
import { SEVERITY_RANK } from '../reporting/severity.js';
import type { Severity } from '../schemas/report.js';
import type { BatchAuditResult, BatchAuditSummary, BatchPageResult } from '../types/batch.js';
import type { AuditConfig } from '../types/config.js';

import { runWithConcurrency } from './queue.js';

const DEFAULT_CONCURRENCY = 2;

/**
 * Target input for a batch audit.
 */
export type BatchTarget =
  | string
  | {
      url: string;
      /** Higher numbers run earlier (useful for "important pages first"). */
      priority?: number;
    };

export interface BatchAuditOptions {
  signal?: AbortSignal;
}

/**
 * Runs several audits with a concurrency limit.
 *
 * Every page gets its own pipeline run and therefore its own bridge; the
 * analysis engine is shared. A failed page is recorded and never stops the batch.
 *
 * Events: `page:start`, `page:complete`, `page:error`, `progress`.
 */
export class BatchAuditor extends EventEmitter {
  private readonly config: AuditConfig;
  private readonly pipeline: AuditPipeline;
  private readonly logger: Logger | undefined;

  constructor(config: AuditConfig, options: AuditPipelineOptions) {
    super();
    this.config = config;
    this.pipeline = new AuditPipeline(config, options);
    this.logger = options.logger;
  }

  async audit(targets: readonly BatchTarget[], options: BatchAuditOptions = {}): Promise<BatchAuditResult> {
    const startedAt = new Date().toISOString();

    const normalized = targets
      .map((t, idx) =>
        typeof t === 'string' ? { url: t, priority: 0, idx } : { url: t.url, priority: t.priority ?? 0, idx },
      )
      .sort((a, b) => (b.priority !== a.priority ? b.priority - a.priority : a.idx - b.idx));

    const pages = await runWithConcurrency({
      items: normalized,
      concurrency: this.config.concurrency ?? DEFAULT_CONCURRENCY,
      worker: async (item): Promise<BatchPageResult> => {
        const started = Date.now();
        this.emit('page:start', { target: item.url });

        try {
          const record = await this.pipeline.run(item.url, { signal: options.signal });
          this.emit('page:complete', { target: item.url, score: record.overallScore });
          return { target: item.url, url: record.url, record, durationMs: Date.now() - started };
        } catch (error) {
          const phase = error instanceof AuditFailedError ? error.phase : undefined;
          this.logger?.warn('Batch page failed', { target: item.url, phase, error: errorMessage(error) });
          this.emit('page:error', { target: item.url, error });
          return {
            target: item.url,
            error: { message: errorMessage(error), phase },
            durationMs: Date.now() - started,
          };
        }
      },
      onProgress: (info) => {
        this.emit('progress', {
          completed: info.completed,
          total: info.total,
          percent: info.total ? info.completed / info.total : 1,
        });
      },
    });

    return {
      startedAt,
      completedAt: new Date().toISOString(),
      pages,
      summary: summarizeBatch(pages),
    };
  }
}

export function summarizeBatch(pages: readonly BatchPageResult[]): BatchAuditSummary {
  const successful = pages.flatMap((p) => (p.record ? [{ target: p.target, record: p.record }] : []));

  const scores = successful.map((p) => p.record.overallScore);
  const averageScore = scores.length ? Math.round(scores.reduce((a, b) => a + b, 0) / scores.length) : 0;

  const worstPages = successful
    .map((p) => ({ target: p.target, score: p.record.overallScore, grade: p.record.grade }))
    .sort((a, b) => a.score - b.score)
    .slice(0, 5);

  const failuresByPhase: BatchAuditSummary['failuresByPhase'] = {};
  for (const page of pages) {
    if (!page.error) continue;
    const key = page.error.phase ?? 'Setup';
    failuresByPhase[key] = (failuresByPhase[key] ?? 0) + 1;
  }

  return {
    totalPages: pages.length,
    succeeded: successful.length,
    failed: pages.length - successful.length,
    averageScore,
    worstPages,
    mostCommonVulnerabilities: vulnerabilityStats(successful.map((p) => p.record.security.vulnerabilities)),
    failuresByPhase,
  };
}

function vulnerabilityStats(
  perPage: ReadonlyArray<ReadonlyArray<{ type: string; severity: Severity }>>,
): BatchAuditSummary['mostCommonVulnerabilities'] {
  const stats = new Map<string, { countPages: number; countTotal: number; highestSeverity: Severity }>();

  for (const vulnerabilities of perPage) {
    const seenThisPage = new Set<string>();
    for (const v of vulnerabilities) {
      const entry = stats.get(v.type) ?? { countPages: 0, countTotal: 0, highestSeverity: v.severity };
      entry.countTotal += 1;
      if (!seenThisPage.has(v.type)) {
        entry.countPages += 1;
        seenThisPage.add(v.type);
      }
      if (SEVERITY_RANK[v.severity] > SEVERITY_RANK[entry.highestSeverity]) entry.highestSeverity = v.severity;
      stats.set(v.type, entry);
    }
  }

  return [...stats.entries()]
    .map(([type, s]) => ({ type, ...s }))
    .sort((a, b) => b.countPages - a.countPages || b.countTotal - a.countTotal)
    .slice(0, 10);
}
