import type { Severity } from '../schemas/report.js';

import type { PipelinePhase } from './pipeline.js';
import type { AuditRecord } from './record.js';

export interface BatchPageResult {
  /** Target as given to the batch. */
  target: string;

  /** Audited URL; absent when the run failed. */
  url?: string;
  record?: AuditRecord;
  error?: {
    message: string;

    /** Phase the run failed in, when it got as far as starting. */
    phase?: PipelinePhase;
  };
  durationMs: number;
}

export interface BatchAuditSummary {
  totalPages: number;
  succeeded: number;
  failed: number;
  averageScore: number;
  worstPages: Array<{ target: string; score: number; grade: AuditRecord['grade'] }>;
  mostCommonVulnerabilities: Array<{
    type: string;
    countPages: number;
    countTotal: number;
    highestSeverity: Severity;
  }>;
  failuresByPhase: Partial<Record<PipelinePhase | 'Setup', number>>;
}

export interface BatchAuditResult {
  startedAt: string;
  completedAt: string;
  pages: BatchPageResult[];
  summary: BatchAuditSummary;
}
