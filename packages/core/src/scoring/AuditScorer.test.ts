import { describe, expect, it } from 'vitest';

import type { Vulnerability } from '../schemas/report.js';
import type { CoreWebVitals } from '../types/record.js';

import { AuditScorer, gradeWebVitals, toGrade } from './AuditScorer.js';

function vitals(partial: Partial<CoreWebVitals> = {}): CoreWebVitals {
  return { lcpMs: null, fidMs: null, cls: null, fcpMs: null, ttfbMs: null, grade: null, ...partial };
}

function vulns(...severities: Vulnerability['severity'][]): Vulnerability[] {
  return severities.map((severity, i) => ({ type: `finding-${i}`, severity, description: 'x' }));
}

describe('AuditScorer', () => {
  const scorer = new AuditScorer();

  it('prefers the lighthouse score for performance', () => {
    expect(scorer.performanceScore({ coreWebVitals: vitals({ lcpMs: 9_000 }), lighthouseScore: 87.6 })).toBe(88);
  });

  it('rates web vitals against the thresholds', () => {
    // good, needs improvement, poor
    const performance = { coreWebVitals: vitals({ lcpMs: 2_000, fidMs: 250, cls: 0.4 }), lighthouseScore: null };
    expect(scorer.performanceScore(performance)).toBe(63);
  });

  it('treats threshold values as the better rating', () => {
    const performance = { coreWebVitals: vitals({ lcpMs: 2_500, fidMs: 100, cls: 0.1 }), lighthouseScore: null };
    expect(scorer.performanceScore(performance)).toBe(100);
  });

  it('has no performance score without data', () => {
    expect(scorer.performanceScore({ coreWebVitals: vitals(), lighthouseScore: null })).toBeNull();
  });

  it('subtracts severity penalties and the https penalty', () => {
    expect(scorer.securityScore({ httpsEnabled: true, vulnerabilities: vulns('critical', 'high', 'medium', 'low') })).toBe(63);
    expect(scorer.securityScore({ httpsEnabled: false, vulnerabilities: vulns('high') })).toBe(65);
  });

  it('halves the weight of the tenth and later findings', () => {
    const eleven = vulns(...Array.from({ length: 11 }, () => 'low' as const));
    // 9 * 2 + 2 * 1
    expect(scorer.securityScore({ httpsEnabled: true, vulnerabilities: eleven })).toBe(80);
  });

  it('never goes below zero', () => {
    const many = vulns(...Array.from({ length: 12 }, () => 'critical' as const));
    expect(scorer.securityScore({ httpsEnabled: false, vulnerabilities: many })).toBe(0);
  });

  it('averages the available sub-scores', () => {
    const result = scorer.score({
      performance: { coreWebVitals: vitals(), lighthouseScore: 70 },
      security: { httpsEnabled: true, vulnerabilities: vulns('medium', 'medium') },
    });
    expect(result).toEqual({ score: 80, grade: 'B', performanceScore: 70, securityScore: 90 });
  });

  it('falls back to the security score alone', () => {
    const result = scorer.score({
      performance: { coreWebVitals: vitals(), lighthouseScore: null },
      security: { httpsEnabled: true, vulnerabilities: [] },
    });
    expect(result).toEqual({ score: 100, grade: 'A', performanceScore: null, securityScore: 100 });
  });
});

describe('gradeWebVitals', () => {
  it('grades by the count of poor ratings', () => {
    expect(gradeWebVitals(vitals({ lcpMs: 1_000, fidMs: 50, cls: 0.05 }))).toBe('A');
    expect(gradeWebVitals(vitals({ lcpMs: 3_000, fidMs: 50, cls: 0.05 }))).toBe('B');
    expect(gradeWebVitals(vitals({ lcpMs: 5_000, fidMs: 50, cls: 0.05 }))).toBe('C');
    expect(gradeWebVitals(vitals({ lcpMs: 5_000, fidMs: 500, cls: 0.05 }))).toBe('D');
    expect(gradeWebVitals(vitals({ lcpMs: 5_000, fidMs: 500, cls: 0.5 }))).toBe('F');
  });

  it('ignores unmeasured vitals', () => {
    expect(gradeWebVitals(vitals({ cls: 0.02 }))).toBe('A');
    expect(gradeWebVitals(vitals({ fcpMs: 800, ttfbMs: 100 }))).toBeNull();
  });
});

describe('toGrade', () => {
  it('maps scores to letters at 90/80/70/60', () => {
    expect([95, 90, 89, 80, 79, 70, 69, 60, 59, 0].map(toGrade)).toEqual([
      'A', 'A', 'B', 'B', 'C', 'C', 'D', 'D', 'F', 'F',
    ]);
  });
});
