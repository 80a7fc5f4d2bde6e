import type { BridgeConfig } from './bridge.js';
import type { AnalysisHandler } from './engine.js';

/**
 * Pipeline configuration for one or more audit runs.
 */
export interface AuditConfig {
  /** Which backend transport to use, and how to reach it. */
  bridge: BridgeConfig;

  /** Tool names exposed to the analysis engine. Defaults to `DEFAULT_ESSENTIAL_TOOLS`. */
  essentialTools?: readonly string[];

  /** Upper bound for a whole run, including every phase. Defaults to 5 minutes. */
  overallTimeoutMs?: number;

  /** Per-tool output budget (characters) in the report prompt. Defaults to 8000. */
  maxToolOutputChars?: number;

  /** Temperature for tool selection. Defaults to 0.1. */
  selectionTemperature?: number;

  /** Temperature for the technical report. Defaults to 0.1. */
  reportTemperature?: number;

  /** Temperature for the executive summary. Defaults to 0.3. */
  summaryTemperature?: number;

  /** Parallel runs for `BatchAuditor`. Each run still gets its own bridge. Defaults to 2. */
  concurrency?: number;
}

export type AnalysisProviderName = 'openai' | 'anthropic' | 'mock' | 'custom';

/**
 * Configuration for `createAnalysisEngine(...)`.
 */
export interface AnalysisProviderConfig {
  provider: AnalysisProviderName;
  apiKey?: string;
  model?: string;

  /** Base URL override (proxies, compatible gateways). */
  baseUrl?: string;

  /** Per-request timeout. Defaults to 120s. */
  timeoutMs?: number;

  /** Attempts per request, including the first. Defaults to 3. */
  maxRetries?: number;

  /** Default sampling temperature when a request sets none. */
  temperature?: number;

  maxTokens?: number;

  /** How the engine may pick tools. Defaults to `auto`. */
  toolChoice?: 'auto' | 'required';

  /** Required when `provider` is `custom`. */
  customHandler?: AnalysisHandler;
}
