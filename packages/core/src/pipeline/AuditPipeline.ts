import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import { ResultAggregator } from '../aggregator/ResultAggregator.js';
import { createBridge as defaultCreateBridge } from '../bridge/factory.js';
import { DEFAULT_ESSENTIAL_TOOLS, ToolCatalog } from '../catalog/ToolCatalog.js';
import {
  AuditCancelledError,
  AuditFailedError,
  AuditTimeoutError,
  SiteAuditError,
  UpstreamAnalysisError,
  errorMessage,
  toError,
} from '../errors.js';
import { ToolExecutor } from '../executor/ToolExecutor.js';
import { type Logger, silentLogger } from '../logging/logger.js';
import {
  REPORT_SYSTEM_PROMPT,
  SUMMARY_SYSTEM_PROMPT,
  TOOL_SELECTION_SYSTEM_PROMPT,
  buildExecutiveSummaryPrompt,
  buildTechnicalReportPrompt,
  buildToolSelectionPrompt,
} from '../prompts/auditPrompts.js';
import { executiveSummarySchema, technicalReportSchema } from '../schemas/report.js';
import type { BridgeConfig, ProtocolBridge } from '../types/bridge.js';
import type { AuditConfig } from '../types/config.js';
import type { AnalysisEngine } from '../types/engine.js';
import type { PhaseTransition } from '../types/pipeline.js';
import type { AuditRecord } from '../types/record.js';
import { validateAuditUrl } from '../utils/url.js';

import { PipelineRun } from './state.js';

export const DEFAULT_OVERALL_TIMEOUT_MS = 5 * 60_000;

export const PIPELINE_EVENTS = ['start', 'phase', 'tool:start', 'tool:complete', 'complete', 'failed'] as const;

const DEFAULT_SELECTION_TEMPERATURE = 0.1;
const DEFAULT_REPORT_TEMPERATURE = 0.1;
const DEFAULT_SUMMARY_TEMPERATURE = 0.3;

export interface AuditPipelineOptions {
  engine: AnalysisEngine;

  /** Builds the per-run bridge. Defaults to the transport factory. */
  createBridge?: (config: BridgeConfig, logger: Logger) => ProtocolBridge;

  logger?: Logger;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;

  /** Defaults to a random UUID. */
  runId?: string;
}

/**
 * Everything one run needs, passed down explicitly.
 */
interface RunContext {
  run: PipelineRun;
  bridge: ProtocolBridge;
  logger: Logger;
  signal: AbortSignal;
}

/**
 * Four-phase audit orchestrator.
 *
 * Each `run()` owns a fresh bridge for its whole duration and closes it on
 * every exit path. Runs are independent; one pipeline can serve several
 * concurrent runs.
 *
 * Events:
 * - `start` ({ runId, url })
 * - `phase` (PhaseTransition)
 * - `tool:start` (ToolCall), `tool:complete` (ToolResult)
 * - `complete` (AuditRecord)
 * - `failed` (AuditFailedError)
 */
export class AuditPipeline extends EventEmitter {
  private readonly config: AuditConfig;
  private readonly engine: AnalysisEngine;
  private readonly bridgeFactory: (config: BridgeConfig, logger: Logger) => ProtocolBridge;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly aggregator: ResultAggregator;

  constructor(config: AuditConfig, options: AuditPipelineOptions) {
    super();
    this.config = config;
    this.engine = options.engine;
    this.bridgeFactory =
      options.createBridge ?? ((bridgeConfig, logger) => defaultCreateBridge(bridgeConfig, { logger }));
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.aggregator = new ResultAggregator({ now: this.now });
  }

  /**
   * Audit `url`, an absolute http(s) URL. A malformed target throws
   * `ValidationError` before any bridge is created; the record keeps the
   * caller's trimmed string.
   */
  async run(target: string, options: RunOptions = {}): Promise<AuditRecord> {
    validateAuditUrl(target);
    const url = target.trim();
    const runId = options.runId ?? randomUUID();
    const logger = this.logger.child({ runId });
    const run = new PipelineRun({
      runId,
      url,
      startedAt: this.now().getTime(),
      transport: this.config.bridge.transport,
      analysis: { provider: this.engine.provider, model: this.engine.model },
      now: this.now,
    });

    const bridge = this.bridgeFactory(this.config.bridge, logger);
    const abort = this.createAbort(options.signal);
    const onAbort = () => {
      logger.debug('Run aborted, closing bridge', { reason: errorMessage(abort.signal.reason) });
      bridge.close().catch((error: unknown) => {
        logger.warn('Bridge close after abort failed', { error: errorMessage(error) });
      });
    };
    abort.signal.addEventListener('abort', onAbort, { once: true });

    const ctx: RunContext = { run, bridge, logger, signal: abort.signal };

    this.emit('start', { runId, url });
    logger.info('Audit started', { url, transport: bridge.transport });

    try {
      const record = await Promise.race([this.execute(ctx), abort.aborted]);
      this.emit('complete', record);
      logger.info('Audit completed', { score: record.overallScore, grade: record.grade });
      return record;
    } catch (error) {
      const cause = abort.signal.aborted ? toError(abort.signal.reason) : toError(error);
      const phase = run.phase;
      if (!run.isTerminal) this.emitPhase(run.fail(cause));

      const failed = new AuditFailedError(phase, run.snapshot(), cause);
      logger.error('Audit failed', { phase: failed.phase, error: cause.message });
      this.emit('failed', failed);
      throw failed;
    } finally {
      abort.signal.removeEventListener('abort', onAbort);
      abort.dispose();
      await bridge.close().catch((error: unknown) => {
        logger.warn('Bridge close failed', { error: errorMessage(error) });
      });
    }
  }

  private async execute(ctx: RunContext): Promise<AuditRecord> {
    const { run, logger, signal } = ctx;

    // Phase 1: tool selection
    signal.throwIfAborted();
    await ctx.bridge.open();
    const catalog = new ToolCatalog(ctx.bridge, { logger });
    const executor = new ToolExecutor(ctx.bridge, { logger });
    const tools = await catalog.essentialSubset(this.config.essentialTools ?? DEFAULT_ESSENTIAL_TOOLS);
    executor.register(tools);
    signal.throwIfAborted();

    const selection = await analysisStep(() =>
      this.engine.selectTools({
        systemPrompt: TOOL_SELECTION_SYSTEM_PROMPT,
        prompt: buildToolSelectionPrompt(run.url),
        tools,
        temperature: this.config.selectionTemperature ?? DEFAULT_SELECTION_TEMPERATURE,
        signal,
      }),
    );
    run.setToolCalls(selection.calls);
    logger.info('Tools selected', {
      offered: tools.length,
      selected: selection.calls.map((c) => c.name).join(',') || 'none',
    });
    this.advance(run, 'ExecutingTools');

    // Phase 2: tool execution, strictly in engine order
    for (const call of selection.calls) {
      signal.throwIfAborted();
      this.emit('tool:start', call);
      const result = await executor.execute(call);
      run.recordToolResult(result);
      this.emit('tool:complete', result);
    }
    signal.throwIfAborted();
    this.advance(run, 'SynthesizingReport');

    // Phase 3: technical report
    const state = run.snapshot();
    const report = await analysisStep(() =>
      this.engine.generateStructured({
        name: 'technical_report',
        description: 'Technical performance and security audit report',
        schema: technicalReportSchema,
        systemPrompt: REPORT_SYSTEM_PROMPT,
        prompt: buildTechnicalReportPrompt(run.url, state.toolResults, {
          maxToolOutputChars: this.config.maxToolOutputChars,
        }),
        temperature: this.config.reportTemperature ?? DEFAULT_REPORT_TEMPERATURE,
        signal,
      }),
    );
    run.setTechnicalReport(report.data);
    signal.throwIfAborted();
    this.advance(run, 'SynthesizingSummary');

    // Phase 4: executive summary
    const summary = await analysisStep(() =>
      this.engine.generateStructured({
        name: 'executive_summary',
        description: 'Executive summary of the audit for business stakeholders',
        schema: executiveSummarySchema,
        systemPrompt: SUMMARY_SYSTEM_PROMPT,
        prompt: buildExecutiveSummaryPrompt(run.url, report.data),
        temperature: this.config.summaryTemperature ?? DEFAULT_SUMMARY_TEMPERATURE,
        signal,
      }),
    );
    run.setExecutiveSummary(summary.data);
    signal.throwIfAborted();
    this.advance(run, 'Done');

    return this.aggregator.build(run.snapshot());
  }

  private advance(run: PipelineRun, to: Exclude<PhaseTransition['to'], 'SelectingTools' | 'Failed'>): void {
    this.emitPhase(run.advance(to));
  }

  private emitPhase(transition: PhaseTransition): void {
    this.emit('phase', transition);
  }

  /**
   * Combine the caller's signal with the overall timeout. `aborted` rejects with
   * the abort reason and never resolves.
   */
  private createAbort(external: AbortSignal | undefined): {
    signal: AbortSignal;
    aborted: Promise<never>;
    dispose: () => void;
  } {
    const controller = new AbortController();
    const timeoutMs = this.config.overallTimeoutMs ?? DEFAULT_OVERALL_TIMEOUT_MS;
    const timer = setTimeout(() => controller.abort(new AuditTimeoutError(timeoutMs)), timeoutMs);

    const forward = () => {
      const reason: unknown = external?.reason;
      controller.abort(reason instanceof Error ? reason : new AuditCancelledError());
    };
    if (external?.aborted) forward();
    else external?.addEventListener('abort', forward, { once: true });

    const aborted = new Promise<never>((_, reject) => {
      if (controller.signal.aborted) reject(toError(controller.signal.reason));
      else {
        controller.signal.addEventListener('abort', () => reject(toError(controller.signal.reason)), {
          once: true,
        });
      }
    });

    return {
      signal: controller.signal,
      aborted,
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', forward);
      },
    };
  }
}

/**
 * Engine failures surface as `UpstreamAnalysisError`; bridge failures keep
 * their own class.
 */
async function analysisStep<T>(step: () => Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (error) {
    if (error instanceof SiteAuditError) throw error;
    throw new UpstreamAnalysisError(`Analysis engine failed: ${errorMessage(error)}`, { cause: error });
  }
}
