export type * from './batch.js';
export type * from './bridge.js';
export type * from './config.js';
export type * from './engine.js';
export type * from './pipeline.js';
export type * from './record.js';
export type * from './tools.js';
export type {
  ExecutiveSummary,
  Grade,
  InvestmentPriority,
  RecommendationPriority,
  RiskLevel,
  Severity,
  TechnicalReport,
  Vulnerability,
} from '../schemas/report.js';
