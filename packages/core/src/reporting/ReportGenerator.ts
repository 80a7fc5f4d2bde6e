import type { Severity } from '../schemas/report.js';
import type { AuditRecord } from '../types/record.js';

import { SEVERITY_RANK } from './severity.js';

/**
 * Reporter interface for custom report formats.
 */
export interface Reporter {
  /** Format identifier (e.g., `json`, `md`, `console`). */
  format: string;
  generate(record: AuditRecord): string;
}

/**
 * Options for JSON report generation.
 */
export interface JsonReportOptions {
  /** Pretty-print output. Defaults to true. */
  pretty?: boolean;

  /** Keep raw tool outputs in the report. Defaults to false (status and duration only). */
  includeToolOutputs?: boolean;
}

/**
 * Options for console report generation.
 */
export interface ConsoleReportOptions {
  /** Disable ANSI colors. Defaults to false. */
  noColor?: boolean;
}

/**
 * Report generator for common output formats.
 */
export class ReportGenerator {
  generateJSON(record: AuditRecord, options: JsonReportOptions = {}): string {
    const pretty = options.pretty !== false;
    const toolResults = options.includeToolOutputs
      ? record.toolResults
      : Object.fromEntries(
          Object.entries(record.toolResults).map(([name, r]) => [
            name,
            r.status === 'success'
              ? { name: r.name, status: r.status, durationMs: r.durationMs }
              : r,
          ]),
        );

    return JSON.stringify({ ...record, toolResults }, null, pretty ? 2 : 0);
  }

  generateMarkdown(record: AuditRecord): string {
    const { performance, security, executiveSummary } = record;
    const vitals = performance.coreWebVitals;

    const lines: string[] = [];
    lines.push(`# Site audit report`);
    lines.push('');
    lines.push(`- URL: \`${record.url}\``);
    lines.push(`- Score: **${record.overallScore}** (${record.grade})`);
    lines.push(`- Risk level: **${security.riskLevel}**`);
    lines.push(`- Audited: ${record.timestamp}`);
    lines.push('');

    lines.push(`## Executive summary`);
    lines.push('');
    lines.push(executiveSummary.overview);
    lines.push('');
    if (executiveSummary.businessImpact) {
      lines.push(`**Business impact:** ${executiveSummary.businessImpact}`);
      lines.push('');
    }
    lines.push(`**Investment priority:** ${executiveSummary.investmentPriority}`);
    if (executiveSummary.roiEstimate) lines.push(`**ROI estimate:** ${executiveSummary.roiEstimate}`);
    lines.push('');
    if (executiveSummary.keyRisks.length > 0) {
      lines.push(`### Key risks`);
      lines.push('');
      for (const risk of executiveSummary.keyRisks) lines.push(`- ${risk}`);
      lines.push('');
    }
    for (const step of executiveSummary.actionTimeline) {
      lines.push(`### ${step.timeframe}`);
      lines.push('');
      for (const action of step.actions) lines.push(`- ${action}`);
      lines.push('');
    }

    lines.push(`## Performance`);
    lines.push('');
    lines.push(`| LCP | FID | CLS | FCP | TTFB | Grade |`);
    lines.push(`| --- | --- | --- | --- | --- | --- |`);
    lines.push(
      `| ${ms(vitals.lcpMs)} | ${ms(vitals.fidMs)} | ${vitals.cls ?? 'n/a'} | ${ms(vitals.fcpMs)} | ${ms(vitals.ttfbMs)} | ${vitals.grade ?? 'n/a'} |`,
    );
    lines.push('');
    if (performance.lighthouseScore !== null) lines.push(`- Lighthouse score: ${performance.lighthouseScore}`);
    if (performance.loadTimeMs !== null) lines.push(`- Load time: ${ms(performance.loadTimeMs)}`);
    if (performance.totalRequests !== null) lines.push(`- Requests: ${performance.totalRequests}`);
    for (const issue of performance.issues) lines.push(`- ${issue}`);
    lines.push('');

    lines.push(`## Security`);
    lines.push('');
    lines.push(`- HTTPS: ${security.httpsEnabled ? 'yes' : 'no'}`);
    lines.push(`- Console errors: ${security.consoleErrors}`);
    for (const [header, present] of Object.entries(security.securityHeaders)) {
      lines.push(`- ${header}: ${present ? 'present' : 'missing'}`);
    }
    lines.push('');
    if (security.vulnerabilities.length > 0) {
      lines.push(`| Severity | Type | Description |`);
      lines.push(`| --- | --- | --- |`);
      for (const v of sortBySeverity(security.vulnerabilities)) {
        lines.push(`| ${v.severity} | ${v.type} | ${v.description} |`);
      }
      lines.push('');
    }

    if (record.recommendations.length > 0) {
      lines.push(`## Recommendations`);
      lines.push('');
      record.recommendations.forEach((r, idx) => {
        lines.push(`${idx + 1}. **${r.title}** (${r.priority}, ${r.category})`);
        if (r.description) lines.push(`   ${r.description}`);
      });
      lines.push('');
    }

    lines.push(`## Tools`);
    lines.push('');
    lines.push(`| Tool | Status | Duration |`);
    lines.push(`| --- | --- | --- |`);
    for (const r of Object.values(record.toolResults)) {
      const status = r.status === 'success' ? 'ok' : `${r.error.kind}: ${r.error.message}`;
      lines.push(`| ${r.name} | ${status} | ${r.durationMs}ms |`);
    }

    return lines.join('\n');
  }

  generateConsole(record: AuditRecord, options: ConsoleReportOptions = {}): string {
    const color = options.noColor ? noColorize : colorize;
    const scoreColor = record.overallScore >= 80 ? 'green' : record.overallScore >= 70 ? 'yellow' : 'red';
    const vitals = record.performance.coreWebVitals;

    const lines: string[] = [];
    lines.push(`${color(scoreColor, `Score: ${record.overallScore} (${record.grade})`)}  URL: ${record.url}`);
    lines.push(
      `Web vitals: LCP=${ms(vitals.lcpMs)} FID=${ms(vitals.fidMs)} CLS=${vitals.cls ?? 'n/a'} grade=${vitals.grade ?? 'n/a'}`,
    );
    lines.push(
      `Security: https=${record.security.httpsEnabled ? 'yes' : 'no'} risk=${record.security.riskLevel} vulnerabilities=${record.security.vulnerabilities.length}`,
    );

    for (const v of sortBySeverity(record.security.vulnerabilities)) {
      lines.push(`- ${color(severityColor(v.severity), v.severity.toUpperCase())} ${v.type}: ${v.description}`);
    }

    const failed = record.metadata.toolsFailed;
    if (failed.length > 0) lines.push(color('yellow', `Tools failed: ${failed.join(', ')}`));

    lines.push(`Summary: ${record.executiveSummary.overview}`);
    return lines.join('\n');
  }
}

function ms(value: number | null): string {
  return value === null ? 'n/a' : `${Math.round(value)}ms`;
}

function sortBySeverity<T extends { severity: Severity }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]);
}

type ColorName = 'red' | 'yellow' | 'green' | 'blue';

function severityColor(severity: Severity): ColorName {
  if (severity === 'critical' || severity === 'high') return 'red';
  if (severity === 'medium') return 'yellow';
  return 'blue';
}

function colorize(color: ColorName, text: string): string {
  const code = color === 'red' ? 31 : color === 'yellow' ? 33 : color === 'green' ? 32 : 34;
  return `\u001b[${code}m${text}\u001b[0m`;
}

function noColorize(_color: ColorName, text: string): string {
  return text;
}
