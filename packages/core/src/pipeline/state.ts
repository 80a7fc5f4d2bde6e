import { PipelineStateError } from '../errors.js';
import type { ExecutiveSummary, TechnicalReport } from '../schemas/report.js';
import type { BridgeTransport } from '../types/bridge.js';
import type {
  PhaseTransition,
  PipelineFailure,
  PipelinePhase,
  PipelineState,
} from '../types/pipeline.js';
import type { ToolCall, ToolResult } from '../types/tools.js';

const TRANSITIONS: Record<PipelinePhase, readonly PipelinePhase[]> = {
  SelectingTools: ['ExecutingTools', 'Failed'],
  ExecutingTools: ['SynthesizingReport', 'Failed'],
  SynthesizingReport: ['SynthesizingSummary', 'Failed'],
  SynthesizingSummary: ['Done', 'Failed'],
  Done: [],
  Failed: [],
};

export function isTerminalPhase(phase: PipelinePhase): boolean {
  return phase === 'Done' || phase === 'Failed';
}

export interface PipelineRunInit {
  runId: string;
  url: string;
  startedAt: number;
  transport: BridgeTransport;
  analysis: { provider: string; model: string };
  now?: () => Date;
}

/**
 * Mutable state of exactly one run, owned by the orchestrator.
 *
 * Phases only move forward, tool results are written only while executing,
 * and the report and summary are each written once.
 */
export class PipelineRun {
  readonly runId: string;
  readonly url: string;
  readonly startedAt: number;

  private readonly transport: BridgeTransport;
  private readonly analysis: { provider: string; model: string };
  private readonly now: () => Date;

  private currentPhase: PipelinePhase = 'SelectingTools';
  private toolCalls: ToolCall[] = [];
  private readonly toolResults = new Map<string, ToolResult>();
  private technicalReport: TechnicalReport | undefined;
  private executiveSummary: ExecutiveSummary | undefined;
  private readonly transitions: PhaseTransition[] = [];
  private failure: PipelineFailure | undefined;

  constructor(init: PipelineRunInit) {
    this.runId = init.runId;
    this.url = init.url;
    this.startedAt = init.startedAt;
    this.transport = init.transport;
    this.analysis = { ...init.analysis };
    this.now = init.now ?? (() => new Date());
  }

  get phase(): PipelinePhase {
    return this.currentPhase;
  }

  get isTerminal(): boolean {
    return isTerminalPhase(this.currentPhase);
  }

  advance(to: Exclude<PipelinePhase, 'Failed'>): PhaseTransition {
    return this.transition(to);
  }

  fail(error: Error): PhaseTransition {
    const phase = this.currentPhase;
    const transition = this.transition('Failed');
    this.failure = { phase, error };
    return transition;
  }

  setToolCalls(calls: readonly ToolCall[]): void {
    this.expectPhase('SelectingTools', 'record tool selection');
    this.toolCalls = calls.map((call) => ({ name: call.name, arguments: { ...call.arguments } }));
  }

  recordToolResult(result: ToolResult): void {
    this.expectPhase('ExecutingTools', 'record a tool result');
    this.toolResults.set(result.name, result);
  }

  setTechnicalReport(report: TechnicalReport): void {
    this.expectPhase('SynthesizingReport', 'store the technical report');
    if (this.technicalReport !== undefined) {
      throw new PipelineStateError('Technical report has already been written');
    }
    this.technicalReport = report;
  }

  setExecutiveSummary(summary: ExecutiveSummary): void {
    this.expectPhase('SynthesizingSummary', 'store the executive summary');
    if (this.executiveSummary !== undefined) {
      throw new PipelineStateError('Executive summary has already been written');
    }
    this.executiveSummary = summary;
  }

  /**
   * Frozen copy of the current state.
   */
  snapshot(): PipelineState {
    return Object.freeze({
      runId: this.runId,
      url: this.url,
      startedAt: this.startedAt,
      transport: this.transport,
      analysis: Object.freeze({ ...this.analysis }),
      phase: this.currentPhase,
      toolCalls: Object.freeze([...this.toolCalls]),
      toolResults: Object.freeze(Object.fromEntries(this.toolResults)),
      technicalReport: this.technicalReport,
      executiveSummary: this.executiveSummary,
      transitions: Object.freeze([...this.transitions]),
      failure: this.failure,
    });
  }

  private transition(to: PipelinePhase): PhaseTransition {
    const from = this.currentPhase;
    if (!TRANSITIONS[from].includes(to)) {
      throw new PipelineStateError(`Illegal phase transition ${from} -> ${to}`);
    }

    const transition: PhaseTransition = { from, to, at: this.now().toISOString() };
    this.currentPhase = to;
    this.transitions.push(transition);
    return transition;
  }

  private expectPhase(phase: PipelinePhase, action: string): void {
    if (this.currentPhase !== phase) {
      throw new PipelineStateError(`Cannot ${action} in phase ${this.currentPhase}`);
    }
  }
}
