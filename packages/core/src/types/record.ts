import type {
  Grade,
  InvestmentPriority,
  RecommendationPriority,
  RiskLevel,
  Vulnerability,
} from '../schemas/report.js';

import type { BridgeTransport } from './bridge.js';
import type { ToolResult } from './tools.js';

export interface CoreWebVitals {
  lcpMs: number | null;
  fidMs: number | null;
  cls: number | null;
  fcpMs: number | null;
  ttfbMs: number | null;
  grade: Grade | null;
}

export interface PerformanceSection {
  coreWebVitals: CoreWebVitals;
  lighthouseScore: number | null;
  loadTimeMs: number | null;
  totalRequests: number | null;
  issues: string[];
}

export interface SecuritySection {
  httpsEnabled: boolean;
  riskLevel: RiskLevel;
  securityHeaders: Record<string, boolean>;
  vulnerabilities: Vulnerability[];
  consoleErrors: number;
}

export interface Recommendation {
  title: string;
  description: string;
  priority: RecommendationPriority;
  category: string;
  impact: string | null;
}

export interface ExecutiveSummarySection {
  overview: string;
  businessImpact: string;
  keyRisks: string[];
  investmentPriority: InvestmentPriority;
  roiEstimate: string | null;
  actionTimeline: Array<{ timeframe: string; actions: string[] }>;
}

export interface AuditMetadata {
  schemaVersion: '1.0';
  runId: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  analysisProvider: string;
  model: string;
  transport: BridgeTransport;

  /** Tool names in the order the engine selected them (repeats included). */
  toolsSelected: string[];

  /** Tools whose recorded result is an error. */
  toolsFailed: string[];
}

/**
 * Final output of a completed run. Deep-frozen by the aggregator.
 */
export interface AuditRecord {
  readonly auditId: string;
  readonly url: string;
  readonly timestamp: string;
  readonly status: 'completed';
  readonly performance: PerformanceSection;
  readonly security: SecuritySection;
  readonly recommendations: Recommendation[];
  readonly overallScore: number;
  readonly grade: Grade;
  readonly executiveSummary: ExecutiveSummarySection;
  readonly toolResults: Record<string, ToolResult>;
  readonly metadata: AuditMetadata;
}
