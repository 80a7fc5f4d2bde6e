import { z } from 'zod';

export const gradeSchema = z.enum(['A', 'B', 'C', 'D', 'F']);
export const severitySchema = z.enum(['critical', 'high', 'medium', 'low']);
export const riskLevelSchema = z.enum(['critical', 'high', 'medium', 'low', 'unknown']);
export const prioritySchema = z.enum(['high', 'medium', 'low']);
export const investmentPrioritySchema = z.enum(['immediate', 'quarterly', 'annual']);

const metric = z.number().nonnegative().nullable().optional();

export const coreWebVitalsSchema = z.object({
  lcpMs: metric.describe('Largest Contentful Paint in milliseconds'),
  fidMs: metric.describe('First Input Delay (or INP) in milliseconds'),
  cls: metric.describe('Cumulative Layout Shift'),
  fcpMs: metric.describe('First Contentful Paint in milliseconds'),
  ttfbMs: metric.describe('Time to First Byte in milliseconds'),
  grade: gradeSchema.optional(),
});

export const vulnerabilitySchema = z.object({
  type: z.string().min(1),
  severity: severitySchema,
  description: z.string(),
  recommendation: z.string().optional(),
  evidence: z.string().optional(),
});

export const recommendationSchema = z.object({
  title: z.string().min(1),
  description: z.string().optional(),
  priority: prioritySchema.optional(),
  category: z.string().optional(),
  impact: z.string().optional(),
});

/**
 * Output contract for the technical report phase.
 *
 * Everything below the top-level sections is optional: the aggregator fills
 * defaults for whatever the engine leaves out.
 */
export const technicalReportSchema = z.object({
  auditId: z.string().optional(),
  timestamp: z.string().optional(),
  performance: z
    .object({
      coreWebVitals: coreWebVitalsSchema.optional(),
      lighthouseScore: z.number().min(0).max(100).nullable().optional(),
      loadTimeMs: metric,
      totalRequests: z.number().int().nonnegative().nullable().optional(),
      issues: z.array(z.string()).optional(),
    })
    .default({}),
  security: z
    .object({
      httpsEnabled: z.boolean().optional(),
      riskLevel: riskLevelSchema.optional(),
      securityHeaders: z.record(z.string(), z.boolean()).optional(),
      vulnerabilities: z.array(vulnerabilitySchema).optional(),
      consoleErrors: z.number().int().nonnegative().optional(),
    })
    .default({}),
  recommendations: z.array(recommendationSchema).optional(),
  overallScore: z.number().min(0).max(100).optional(),
  grade: gradeSchema.optional(),
});

/**
 * Output contract for the executive summary phase.
 */
export const executiveSummarySchema = z.object({
  overview: z.string().min(1),
  businessImpact: z.string().optional(),
  keyRisks: z.array(z.string()).optional(),
  investmentPriority: investmentPrioritySchema.optional(),
  roiEstimate: z.string().optional(),
  actionTimeline: z
    .array(
      z.object({
        timeframe: z.string(),
        actions: z.array(z.string()),
      }),
    )
    .optional(),
});

export type Grade = z.infer<typeof gradeSchema>;
export type Severity = z.infer<typeof severitySchema>;
export type RiskLevel = z.infer<typeof riskLevelSchema>;
export type RecommendationPriority = z.infer<typeof prioritySchema>;
export type InvestmentPriority = z.infer<typeof investmentPrioritySchema>;
export type Vulnerability = z.infer<typeof vulnerabilitySchema>;
export type TechnicalReport = z.infer<typeof technicalReportSchema>;
export type ExecutiveSummary = z.infer<typeof executiveSummarySchema>;
