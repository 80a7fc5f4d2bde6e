import type { ExecutiveSummary, TechnicalReport } from '../schemas/report.js';

import type { BridgeTransport } from './bridge.js';
import type { ToolCall, ToolResult } from './tools.js';

export type PipelinePhase =
  | 'SelectingTools'
  | 'ExecutingTools'
  | 'SynthesizingReport'
  | 'SynthesizingSummary'
  | 'Done'
  | 'Failed';

export interface PhaseTransition {
  from: PipelinePhase;
  to: PipelinePhase;
  at: string;
}

export interface PipelineFailure {
  /** Phase that was active when the run failed. */
  phase: PipelinePhase;
  error: Error;
}

/**
 * Read-only view of one run's state.
 */
export interface PipelineState {
  readonly runId: string;
  readonly url: string;
  readonly startedAt: number;
  readonly transport: BridgeTransport;
  readonly analysis: { readonly provider: string; readonly model: string };
  readonly phase: PipelinePhase;
  readonly toolCalls: readonly ToolCall[];
  readonly toolResults: Readonly<Record<string, ToolResult>>;
  readonly technicalReport: TechnicalReport | undefined;
  readonly executiveSummary: ExecutiveSummary | undefined;
  readonly transitions: readonly PhaseTransition[];
  readonly failure: PipelineFailure | undefined;
}
