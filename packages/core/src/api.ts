import type { Logger } from './logging/logger.js';
import { AuditPipeline, type AuditPipelineOptions } from './pipeline/AuditPipeline.js';
import type { BridgeConfig } from './types/bridge.js';
import type { AuditConfig } from './types/config.js';
import type { AnalysisEngine } from './types/engine.js';
import type { AuditRecord } from './types/record.js';

export { validateAuditUrl } from './utils/url.js';

/**
 * Options accepted by the `runAudit` convenience function.
 */
export interface AuditOptions extends Partial<Omit<AuditConfig, 'bridge'>> {
  /** Defaults to a stdio backend with the built-in launch command. */
  bridge?: BridgeConfig;

  engine: AnalysisEngine;
  logger?: Logger;
  signal?: AbortSignal;
  createBridge?: AuditPipelineOptions['createBridge'];
}

/**
 * Convert convenience options into the pipeline's `AuditConfig`.
 */
export function toAuditConfig(options: Omit<AuditOptions, 'engine'>): AuditConfig {
  return {
    bridge: options.bridge ?? { transport: 'stdio' },
    essentialTools: options.essentialTools,
    overallTimeoutMs: options.overallTimeoutMs,
    maxToolOutputChars: options.maxToolOutputChars,
    selectionTemperature: options.selectionTemperature,
    reportTemperature: options.reportTemperature,
    summaryTemperature: options.summaryTemperature,
    concurrency: options.concurrency,
  };
}

/**
 * One-liner audit.
 */
export async function runAudit(url: string, options: AuditOptions): Promise<AuditRecord> {
  const pipeline = new AuditPipeline(toAuditConfig(options), {
    engine: options.engine,
    logger: options.logger,
    createBridge: options.createBridge,
  });
  return await pipeline.run(url, { signal: options.signal });
}
