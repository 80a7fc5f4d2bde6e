import { EventEmitter } from 'node:events';

import { toAuditConfig, type AuditOptions } from './api.js';
import { ValidationError } from './errors.js';
import type { Logger } from './logging/logger.js';
import { AuditPipeline, PIPELINE_EVENTS } from './pipeline/AuditPipeline.js';
import type { BridgeConfig } from './types/bridge.js';
import type { AnalysisEngine } from './types/engine.js';
import type { AuditRecord } from './types/record.js';

/**
 * Builder-style API for configuring and running an audit.
 *
 * Example:
 *   const record = await siteAudit()
 *     .url('https://example.com')
 *     .engine(createAnalysisEngine({ provider: 'openai', apiKey }))
 *     .bridge({ transport: 'http', serviceUrl: 'http://localhost:3001' })
 *     .on('tool:complete', console.log)
 *     .run();
 */
export function siteAudit(): SiteAuditBuilder {
  return new SiteAuditBuilder();
}

export class SiteAuditBuilder extends EventEmitter {
  private target: string | undefined;
  private analysisEngine: AnalysisEngine | undefined;
  private options: Omit<AuditOptions, 'engine'> = {};

  url(url: string): this {
    this.target = url;
    return this;
  }

  engine(engine: AnalysisEngine): this {
    this.analysisEngine = engine;
    return this;
  }

  bridge(config: BridgeConfig): this {
    this.options.bridge = config;
    return this;
  }

  essentialTools(names: readonly string[]): this {
    this.options.essentialTools = [...names];
    return this;
  }

  timeout(ms: number): this {
    this.options.overallTimeoutMs = ms;
    return this;
  }

  /** Replace the transport factory, e.g. to route the bridge to an in-process backend. */
  bridgeFactory(factory: NonNullable<AuditOptions['createBridge']>): this {
    this.options.createBridge = factory;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  signal(signal: AbortSignal): this {
    this.options.signal = signal;
    return this;
  }

  async run(): Promise<AuditRecord> {
    if (this.target === undefined) {
      throw new ValidationError('No target configured. Call .url(...) before .run().', { field: 'url' });
    }
    if (!this.analysisEngine) {
      throw new ValidationError('No analysis engine configured. Call .engine(...) before .run().', {
        field: 'engine',
      });
    }

    const pipeline = new AuditPipeline(toAuditConfig(this.options), {
      engine: this.analysisEngine,
      logger: this.options.logger,
      createBridge: this.options.createBridge,
    });
    for (const event of PIPELINE_EVENTS) {
      pipeline.on(event, (...args: unknown[]) => this.emit(event, ...args));
    }

    return await pipeline.run(this.target, { signal: this.options.signal });
  }
}
