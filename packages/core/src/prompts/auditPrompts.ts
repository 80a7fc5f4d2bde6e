import type { TechnicalReport } from '../schemas/report.js';
import type { ToolResult } from '../types/tools.js';

import { DEFAULT_MAX_TOOL_OUTPUT_CHARS, compactToolOutput } from './compact.js';

/**
 * Shared prompt fragments.
 */
export const PROMPT_FRAGMENTS = {
  auditorPersona: `You are a senior web performance and security auditor.
You measure Core Web Vitals (LCP, FID/INP, CLS), review HTTPS and security headers (CSP, HSTS, X-Frame-Options),
look for OWASP Top 10 exposure, and turn findings into concrete, prioritized recommendations.`,
  toolWorkflow: `Tool usage:
- navigate_page comes first; every other tool depends on the loaded page
- take_snapshot captures the DOM for analysis
- performance_start_trace (reload, autoStop) then performance_stop_trace measure Core Web Vitals
- emulate_network is optional, for slow-network checks
- list_network_requests shows resource loading
- evaluate_script checks HTTPS, security meta tags, mixed content and CSRF tokens
- list_console_messages surfaces runtime and security errors
- take_screenshot documents the page last`,
  gradeThresholds: `Core Web Vitals grade:
- A: LCP < 2.5s, FID < 100ms, CLS < 0.1
- B: LCP < 4s, FID < 300ms, CLS < 0.25
- C or below: anything slower`,
  vulnerabilityRules: `Vulnerability rules:
- no Content-Security-Policy: "Content Security Policy Missing", medium
- no HSTS: "HTTP Strict Transport Security Missing", medium
- served over http: "Insecure Protocol", high
- http resources on an https page: "Mixed Content", medium
- eval/innerHTML script injection risk: "Cross-Site Scripting (XSS)", high
- no CSRF token on forms: "Cross-Site Request Forgery", medium
- security-related console errors: categorize by what they show
riskLevel is the highest severity found, or "low" when nothing was found.`,
  jsonOnly: `Return only JSON matching the requested schema. No prose outside the JSON.`,
};

const SECURITY_PROBE = `() => ({
  https: location.protocol === 'https:',
  csp: !!document.querySelector('meta[http-equiv="Content-Security-Policy"]'),
  mixedContent: [...document.querySelectorAll('img[src], script[src], link[href]')]
    .some((el) => (el.src || el.href || '').startsWith('http:')),
  csrfToken: !!document.querySelector('meta[name="csrf-token"], input[name*="csrf" i]'),
  inlineHandlers: document.querySelectorAll('[onclick], [onerror], [onload]').length,
})`;

export const TOOL_SELECTION_SYSTEM_PROMPT = `${PROMPT_FRAGMENTS.auditorPersona}\n\n${PROMPT_FRAGMENTS.toolWorkflow}`;

export const REPORT_SYSTEM_PROMPT = `${PROMPT_FRAGMENTS.auditorPersona}\n\n${PROMPT_FRAGMENTS.jsonOnly}`;

export const SUMMARY_SYSTEM_PROMPT = `You are a digital strategy consultant writing for executive leadership.
Translate technical audit findings into business terms: revenue, customer experience, brand and compliance risk.

${PROMPT_FRAGMENTS.jsonOnly}`;

export function buildToolSelectionPrompt(url: string): string {
  return `Audit ${url} for performance and security.

Call the tools you need, in execution order:
1. navigate_page with url "${url}"
2. take_snapshot
3. performance_start_trace with reload true and autoStop true, then performance_stop_trace
4. list_network_requests
5. evaluate_script with this function:
${SECURITY_PROBE}
6. list_console_messages
7. take_screenshot with fullPage true

Every call runs in the order you return it.`;
}

export interface ReportPromptOptions {
  maxToolOutputChars?: number;
}

export function buildTechnicalReportPrompt(
  url: string,
  toolResults: Readonly<Record<string, ToolResult>>,
  options: ReportPromptOptions = {},
): string {
  const maxChars = options.maxToolOutputChars ?? DEFAULT_MAX_TOOL_OUTPUT_CHARS;
  const sections = Object.values(toolResults).map((result) => formatToolResult(result, maxChars));

  return `Write the technical audit report for ${url}.

Tool results:
${sections.length > 0 ? sections.join('\n\n') : '(no tools were executed)'}

Performance: take LCP, FID and CLS from the trace results, a 0-100 lighthouseScore when the data supports one,
and a coreWebVitals grade.
${PROMPT_FRAGMENTS.gradeThresholds}

Security: httpsEnabled and securityHeaders from evaluate_script, vulnerabilities from evaluate_script and console messages.
${PROMPT_FRAGMENTS.vulnerabilityRules}

Recommendations: specific, implementable, each with a priority (high/medium/low) and a category.
Tools that failed are missing data, not findings; do not invent their results.`;
}

export function buildExecutiveSummaryPrompt(url: string, report: TechnicalReport): string {
  return `Write the executive summary of the audit of ${url}.

Technical report:
${JSON.stringify(report, null, 2)}

Provide:
- overview: two or three sentences on the site's overall state
- businessImpact: the business implications
- keyRisks: the top three risks in business terms
- investmentPriority: "immediate", "quarterly" or "annual"
- roiEstimate: expected return and timeframe
- actionTimeline: implementation phases, each with a timeframe and actions`;
}

function formatToolResult(result: ToolResult, maxChars: number): string {
  if (result.status === 'error') {
    return `### ${result.name} (failed: ${result.error.kind}, ${result.durationMs}ms)\n${result.error.message}`;
  }
  return `### ${result.name} (ok, ${result.durationMs}ms)\n${compactToolOutput(result.output, maxChars)}`;
}
