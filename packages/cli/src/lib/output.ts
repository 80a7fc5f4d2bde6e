import { ReportGenerator } from '@siteaudit/core';
import type { AuditRecord, BatchAuditResult } from '@siteaudit/core/types';

import type { OutputFormat } from './config.js';

export function renderAudit(
  record: AuditRecord,
  format: OutputFormat,
  options: { noColor?: boolean; includeToolOutputs?: boolean } = {},
): string {
  const reporter = new ReportGenerator();
  switch (format) {
    case 'json':
      return reporter.generateJSON(record, { includeToolOutputs: options.includeToolOutputs });
    case 'md':
      return reporter.generateMarkdown(record);
    case 'console':
      return reporter.generateConsole(record, { noColor: options.noColor });
  }
}

export function renderBatch(result: BatchAuditResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(
        {
          ...result,
          pages: result.pages.map(({ record, ...page }) =>
            record ? { ...page, score: record.overallScore, grade: record.grade } : page,
          ),
        },
        null,
        2,
      );
    case 'md':
      return generateBatchMarkdown(result);
    case 'console':
      return generateBatchConsole(result);
  }
}

export function generateBatchMarkdown(result: BatchAuditResult): string {
  const { summary } = result;
  const lines: string[] = [];
  lines.push('# siteaudit batch report');
  lines.push('');
  lines.push(`- Pages: **${summary.totalPages}** (ok: ${summary.succeeded}, failed: ${summary.failed})`);
  lines.push(`- Average score: **${summary.averageScore}**`);
  lines.push('');

  if (summary.mostCommonVulnerabilities.length > 0) {
    lines.push('## Most common vulnerabilities');
    lines.push('');
    for (const v of summary.mostCommonVulnerabilities) {
      lines.push(`- \`${v.type}\` (${v.highestSeverity}): on ${v.countPages} pages, ${v.countTotal} total`);
    }
    lines.push('');
  }

  if (summary.worstPages.length > 0) {
    lines.push('## Worst pages');
    lines.push('');
    for (const p of summary.worstPages) {
      lines.push(`- ${p.score} (${p.grade}): ${p.target}`);
    }
    lines.push('');
  }

  const failures = result.pages.filter((p) => p.error);
  if (failures.length > 0) {
    lines.push('## Failures');
    lines.push('');
    for (const p of failures) {
      lines.push(`- ${p.target} [${p.error?.phase ?? 'Setup'}]: ${p.error?.message ?? ''}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

function generateBatchConsole(result: BatchAuditResult): string {
  const { summary } = result;
  const lines = result.pages.map((p) =>
    p.record
      ? `${String(p.record.overallScore).padStart(3)} ${p.record.grade}  ${p.target}`
      : `  - !  ${p.target} (${p.error?.message ?? 'failed'})`,
  );
  lines.push('');
  lines.push(`Average score: ${summary.averageScore} (${summary.succeeded}/${summary.totalPages} succeeded)`);
  return lines.join('\n');
}

/**
 * One URL per line; blank lines and `#` comments are skipped.
 */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/g)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith('#'));
}
