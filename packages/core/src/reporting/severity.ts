import type { RiskLevel, Severity } from '../schemas/report.js';

export const SEVERITY_RANK: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

/**
 * Highest severity among `severities`, or `low` when there are none.
 */
export function highestRisk(severities: Iterable<Severity>): Exclude<RiskLevel, 'unknown'> {
  let highest: Severity = 'low';
  for (const severity of severities) {
    if (SEVERITY_RANK[severity] > SEVERITY_RANK[highest]) highest = severity;
  }
  return highest;
}
