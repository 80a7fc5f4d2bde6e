import type { Grade, Severity, Vulnerability } from '../schemas/report.js';
import type { CoreWebVitals } from '../types/record.js';

/**
 * Input to the scoring engine. Sections are already normalized by the aggregator.
 */
export interface ScoreInput {
  performance: {
    coreWebVitals: CoreWebVitals;
    lighthouseScore: number | null;
  };
  security: {
    httpsEnabled: boolean;
    vulnerabilities: readonly Vulnerability[];
  };
}

export interface ScoreBreakdown {
  score: number;
  grade: Grade;
  performanceScore: number | null;
  securityScore: number;
}

const severityPenalty: Record<Severity, number> = {
  critical: 20,
  high: 10,
  medium: 5,
  low: 2,
};

const HTTPS_PENALTY = 25;

interface Threshold {
  good: number;
  needsImprovement: number;
}

const thresholds = {
  lcpMs: { good: 2_500, needsImprovement: 4_000 },
  fidMs: { good: 100, needsImprovement: 300 },
  cls: { good: 0.1, needsImprovement: 0.25 },
} satisfies Record<string, Threshold>;

type Rating = 'good' | 'needs-improvement' | 'poor';

/**
 * Fallback scoring used when the analysis engine leaves out a score.
 *
 * Deterministic and explainable:
 * - performance: the lighthouse score, else web-vital ratings (good 100, needs improvement 60, poor 30)
 * - security: 100 minus severity penalties, minus 25 without HTTPS
 * - overall: mean of the available sub-scores
 */
export class AuditScorer {
  score(input: ScoreInput): ScoreBreakdown {
    const performanceScore = this.performanceScore(input.performance);
    const securityScore = this.securityScore(input.security);

    const parts = performanceScore === null ? [securityScore] : [performanceScore, securityScore];
    const score = clamp0to100(Math.round(parts.reduce((a, b) => a + b, 0) / parts.length));

    return { score, grade: toGrade(score), performanceScore, securityScore };
  }

  performanceScore(performance: ScoreInput['performance']): number | null {
    if (performance.lighthouseScore !== null) {
      return clamp0to100(Math.round(performance.lighthouseScore));
    }

    const ratings = rateWebVitals(performance.coreWebVitals);
    if (ratings.length === 0) return null;

    const points = ratings.map((r) => (r === 'good' ? 100 : r === 'needs-improvement' ? 60 : 30));
    return Math.round(points.reduce((a, b) => a + b, 0) / points.length);
  }

  securityScore(security: ScoreInput['security']): number {
    let penalty = 0;
    security.vulnerabilities.forEach((v, index) => {
      penalty += severityPenalty[v.severity] * diminishingFactor(index + 1);
    });
    if (!security.httpsEnabled) penalty += HTTPS_PENALTY;

    return clamp0to100(Math.round(100 - penalty));
  }
}

/**
 * Letter grade for a set of web vitals; null when none was measured.
 */
export function gradeWebVitals(vitals: CoreWebVitals): Grade | null {
  const ratings = rateWebVitals(vitals);
  if (ratings.length === 0) return null;

  const poor = ratings.filter((r) => r === 'poor').length;
  const needsImprovement = ratings.filter((r) => r === 'needs-improvement').length;

  if (poor === 0 && needsImprovement === 0) return 'A';
  if (poor === 0) return 'B';
  if (poor === 1) return 'C';
  if (poor === 2) return 'D';
  return 'F';
}

export function toGrade(score: number): Grade {
  if (score >= 90) return 'A';
  if (score >= 80) return 'B';
  if (score >= 70) return 'C';
  if (score >= 60) return 'D';
  return 'F';
}

function rateWebVitals(vitals: CoreWebVitals): Rating[] {
  const ratings: Rating[] = [];
  for (const key of ['lcpMs', 'fidMs', 'cls'] as const) {
    const value = vitals[key];
    if (value === null) continue;
    ratings.push(rate(value, thresholds[key]));
  }
  return ratings;
}

function rate(value: number, threshold: Threshold): Rating {
  if (value <= threshold.good) return 'good';
  if (value <= threshold.needsImprovement) return 'needs-improvement';
  return 'poor';
}

function clamp0to100(value: number): number {
  if (value < 0) return 0;
  if (value > 100) return 100;
  return value;
}

/**
 * First 9 findings count fully, later ones at half weight.
 */
function diminishingFactor(count: number): number {
  return count <= 9 ? 1 : 0.5;
}
