export * from './types/index.js';
export * from './errors.js';
export {
  createConsoleLogger,
  isLogLevel,
  silentLogger,
  type ConsoleLoggerOptions,
  type LogFields,
  type LogLevel,
  type Logger,
} from './logging/logger.js';

export {
  executiveSummarySchema,
  technicalReportSchema,
  gradeSchema,
  severitySchema,
  riskLevelSchema,
  vulnerabilitySchema,
  recommendationSchema,
  coreWebVitalsSchema,
} from './schemas/report.js';

export { createBridge, type CreateBridgeOptions } from './bridge/factory.js';
export { StdioBridge, type StdioBridgeOptions } from './bridge/StdioBridge.js';
export { HttpBridge, type HttpBridgeOptions } from './bridge/HttpBridge.js';
export { spawnProcessChannel, type DuplexChannel, type ProcessChannelOptions } from './bridge/channel.js';
export * from './bridge/defaults.js';

export {
  DEFAULT_ESSENTIAL_TOOLS,
  ToolCatalog,
  filterEssentialTools,
  parseToolList,
} from './catalog/ToolCatalog.js';
export { ToolExecutor, reportedToolError, type ToolInvoker } from './executor/ToolExecutor.js';

export { PipelineRun, isTerminalPhase } from './pipeline/state.js';
export {
  AuditPipeline,
  DEFAULT_OVERALL_TIMEOUT_MS,
  PIPELINE_EVENTS,
  type AuditPipelineOptions,
  type RunOptions,
} from './pipeline/AuditPipeline.js';
export { ResultAggregator, type ResultAggregatorOptions } from './aggregator/ResultAggregator.js';
export { AuditScorer, gradeWebVitals, toGrade, type ScoreBreakdown, type ScoreInput } from './scoring/AuditScorer.js';

export * from './prompts/auditPrompts.js';
export { DEFAULT_MAX_TOOL_OUTPUT_CHARS, compactToolOutput, truncate } from './prompts/compact.js';

export { ReportGenerator } from './reporting/ReportGenerator.js';
export type { Reporter, JsonReportOptions, ConsoleReportOptions } from './reporting/ReportGenerator.js';
export { SEVERITY_RANK, highestRisk } from './reporting/severity.js';

export { withTimeout } from './utils/timeout.js';

export { runAudit, toAuditConfig, validateAuditUrl, type AuditOptions } from './api.js';
export { SiteAuditBuilder, siteAudit } from './builder.js';

export { BatchAuditor, summarizeBatch } from './batch/BatchAuditor.js';
export type { BatchAuditOptions, BatchTarget } from './batch/BatchAuditor.js';
export { runWithConcurrency, type ConcurrencyOptions } from './batch/queue.js';
