import type { Severity } from '../schemas/report.js';
import type { AuditRecord } from '../types/record.js';

/**
 * Minimal assertion helpers for test suites and CI checks.
 *
 * No test-runner globals; each assertion throws on failure.
 */
export function expectAudit(record: AuditRecord) {
  return {
    toMeetScore(options: { min?: number } = {}) {
      const min = options.min ?? 70;
      if (record.overallScore < min) {
        throw new Error(
          `Audit score ${record.overallScore} is below threshold ${min}. Vulnerabilities: ${record.security.vulnerabilities.length}`,
        );
      }
    },

    toHaveNoVulnerabilities(severity?: Severity) {
      const list = severity
        ? record.security.vulnerabilities.filter((v) => v.severity === severity)
        : record.security.vulnerabilities;
      if (list.length > 0) {
        const top = list
          .slice(0, 5)
          .map((v) => `${v.severity} ${v.type}: ${v.description}`)
          .join('\n');
        throw new Error(
          `Expected no vulnerabilities${severity ? ` of severity ${severity}` : ''}, but found ${list.length}.\n${top}`,
        );
      }
    },

    toHaveNoFailedTools() {
      const failed = Object.values(record.toolResults).flatMap((r) =>
        r.status === 'error' ? [`${r.name} (${r.error.kind}): ${r.error.message}`] : [],
      );
      if (failed.length > 0) {
        throw new Error(`Expected every tool to succeed, but ${failed.length} failed.\n${failed.join('\n')}`);
      }
    },
  };
}
