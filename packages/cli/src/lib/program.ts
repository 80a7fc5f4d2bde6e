import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { createAnalysisEngine } from '@siteaudit/ai-providers';
import {
  AuditPipeline,
  BatchAuditor,
  DEFAULT_ESSENTIAL_TOOLS,
  ToolCatalog,
  ValidationError,
  createBridge,
  createConsoleLogger,
  errorMessage,
  validateAuditUrl,
  type AuditPipelineOptions,
} from '@siteaudit/core';
import type { AnalysisEngine, AnalysisProviderConfig, PhaseTransition, ToolCall } from '@siteaudit/core/types';
import { Command } from 'commander';
import ora, { type Ora } from 'ora';
import { z } from 'zod';

import {
  CONFIG_TEMPLATE,
  type CliConfig,
  cliConfigSchema,
  effectiveLogLevel,
  resolveConfig,
  toBridgeConfig,
  toPipelineConfig,
  toProviderConfig,
} from './config.js';
import { parseUrlList, renderAudit, renderBatch } from './output.js';
import { TOOL_DOC_FORMATS, renderToolCatalog } from './toolDocs.js';

const DEFAULT_THRESHOLD = 70;

export interface CliDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;

  /** Receives the process exit code of the finished command. */
  setExitCode: (code: number) => void;

  /** Show a progress spinner on stderr. */
  interactive?: boolean;
  signal?: AbortSignal;
  createEngine?: (config: AnalysisProviderConfig) => AnalysisEngine;
  createBridge?: AuditPipelineOptions['createBridge'];
}

const commonOptionsSchema = cliConfigSchema.extend({
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

const auditOptionsSchema = commonOptionsSchema.extend({
  color: z.boolean().default(true),
  includeToolOutputs: z.boolean().default(false),
});

const toolsOptionsSchema = commonOptionsSchema.omit({ format: true }).extend({
  format: z.enum(TOOL_DOC_FORMATS).default('table'),
  essentialOnly: z.boolean().default(false),
});

function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `--${kebab(i.path.join('.'))}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid options: ${issues}`);
  }
  return parsed.data;
}

function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

function toNumber(value: string): number {
  return Number(value);
}

function addConnectionOptions(command: Command): Command {
  return command
    .option('--config <file>', 'Config file (defaults to the nearest .siteauditrc.json)')
    .option('--transport <transport>', 'Tool backend transport: stdio|http')
    .option('--service-url <url>', 'Tool service URL for the http transport')
    .option('--command <command>', 'Backend launch command for the stdio transport')
    .option('--startup-timeout-ms <ms>', 'Backend startup timeout', toNumber)
    .option('--request-timeout-ms <ms>', 'Per-request timeout', toNumber)
    .option('--log-level <level>', 'debug|info|warn|error|silent')
    .option('--verbose', 'Verbose logging (same as --log-level debug)');
}

function addAnalysisOptions(command: Command): Command {
  return command
    .option('--provider <provider>', 'Analysis provider: openai|anthropic|mock')
    .option('--model <model>', 'Model name')
    .option('--api-key <key>', 'Provider API key')
    .option('--base-url <url>', 'Provider base URL')
    .option('--overall-timeout-ms <ms>', 'Upper bound for one audit', toNumber)
    .option('--format <format>', 'Output format: console|json|md')
    .option('--output <file>', 'Write the report to a file instead of stdout')
    .option('--threshold <n>', 'Exit with 1 below this score', toNumber);
}

/**
 * Separate the command-only options from the config layer they contribute.
 */
function splitFlags<T extends { config?: string; verbose: boolean }>(options: T): {
  configPath: string | undefined;
  verbose: boolean;
  flags: CliConfig;
} {
  const { config: configPath, verbose, ...rest } = options;
  return { configPath, verbose, flags: cliConfigSchema.parse(rest) };
}

/**
 * Build the `siteaudit` program. Every side effect goes through `deps`.
 */
export function createProgram(deps: CliDeps): Command {
  const makeEngine = deps.createEngine ?? createAnalysisEngine;
  const makeBridge: NonNullable<AuditPipelineOptions['createBridge']> =
    deps.createBridge ?? ((config, logger) => createBridge(config, { logger }));

  const setup = (configPath: string | undefined, flags: CliConfig, verbose: boolean) => {
    const { config } = resolveConfig({ cwd: deps.cwd, env: deps.env, flags, configPath });
    const logger = createConsoleLogger({
      level: effectiveLogLevel(config, verbose),
      write: (line) => deps.stderr(`${line}\n`),
    });
    return { config, logger };
  };

  const spin = (text: string): Ora | null =>
    deps.interactive ? ora({ text, stream: process.stderr }).start() : null;

  const emit = (config: CliConfig, output: string) => {
    if (config.output) {
      const target = path.resolve(deps.cwd, config.output);
      writeFileSync(target, `${output}\n`, 'utf8');
      deps.stderr(`Wrote ${target}\n`);
    } else {
      deps.stdout(`${output}\n`);
    }
  };

  const program = new Command();
  program
    .name('siteaudit')
    .description('Performance and security audits driven by browser tools')
    .version('0.1.0')
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr });

  addAnalysisOptions(addConnectionOptions(program.command('audit')))
    .description('Audit a single URL')
    .argument('<url>', 'Page to audit')
    .option('--no-color', 'Disable colors in console output')
    .option('--include-tool-outputs', 'Keep raw tool outputs in JSON output')
    .action(async (url: string, raw: Record<string, unknown>) => {
      const { color, includeToolOutputs, ...common } = parseOptions(auditOptionsSchema, raw);
      const { configPath, verbose, flags } = splitFlags(common);
      const { config, logger } = setup(configPath, flags, verbose);
      const target = validateAuditUrl(url);

      const pipeline = new AuditPipeline(toPipelineConfig(config), {
        engine: makeEngine(toProviderConfig(config, deps.env)),
        logger,
        createBridge: makeBridge,
      });

      const spinner = spin(`Auditing ${target}...`);
      pipeline.on('phase', (t: PhaseTransition) => {
        if (spinner) spinner.text = `${t.to}...`;
      });
      pipeline.on('tool:start', (call: ToolCall) => {
        if (spinner) spinner.text = `Running ${call.name}...`;
      });

      try {
        const record = await pipeline.run(target, { signal: deps.signal });
        spinner?.succeed(`Audit complete. Score: ${record.overallScore} (${record.grade})`);

        emit(config, renderAudit(record, config.format ?? 'console', { noColor: !color, includeToolOutputs }));
        deps.setExitCode(record.overallScore >= (config.threshold ?? DEFAULT_THRESHOLD) ? 0 : 1);
      } catch (error) {
        spinner?.fail(errorMessage(error));
        throw error;
      }
    });

  addAnalysisOptions(addConnectionOptions(program.command('batch')))
    .description('Audit every URL listed in a file (one per line)')
    .argument('<file>', 'URL list')
    .option('--concurrency <n>', 'Parallel audits', toNumber)
    .action(async (file: string, raw: Record<string, unknown>) => {
      const { configPath, verbose, flags } = splitFlags(parseOptions(commonOptionsSchema, raw));
      const { config, logger } = setup(configPath, flags, verbose);

      const urls = parseUrlList(readFileSync(path.resolve(deps.cwd, file), 'utf8')).map((line) => {
        try {
          return validateAuditUrl(line);
        } catch (error) {
          throw new ValidationError(`Invalid URL in ${file}: ${line}`, { field: 'url', cause: error });
        }
      });
      if (urls.length === 0) throw new ValidationError(`No URLs found in ${file}`);

      const batch = new BatchAuditor(toPipelineConfig(config), {
        engine: makeEngine(toProviderConfig(config, deps.env)),
        logger,
        createBridge: makeBridge,
      });

      const spinner = spin(`Auditing ${urls.length} pages...`);
      batch.on('progress', (p: { completed: number; total: number }) => {
        if (spinner) spinner.text = `Auditing pages... (${p.completed}/${p.total})`;
      });

      const result = await batch.audit(urls, { signal: deps.signal });
      const { summary } = result;
      spinner?.succeed(
        `Batch audit complete. Avg score: ${summary.averageScore} (${summary.succeeded}/${summary.totalPages} succeeded)`,
      );

      emit(config, renderBatch(result, config.format ?? 'console'));
      const passed = summary.failed === 0 && summary.averageScore >= (config.threshold ?? DEFAULT_THRESHOLD);
      deps.setExitCode(passed ? 0 : 1);
    });

  addConnectionOptions(program.command('tools'))
    .description('List the tool catalog of the backend')
    .option('--format <format>', 'table|md|json', 'table')
    .option('--essential-only', 'Only the essential subset offered to the analysis engine')
    .option('--output <file>', 'Write to a file instead of stdout')
    .action(async (raw: Record<string, unknown>) => {
      const { format, essentialOnly, ...common } = parseOptions(toolsOptionsSchema, raw);
      const { configPath, verbose, flags } = splitFlags(common);
      const { config, logger } = setup(configPath, flags, verbose);

      const essential = config.essentialTools ?? DEFAULT_ESSENTIAL_TOOLS;
      const bridge = makeBridge(toBridgeConfig(config), logger);
      try {
        const catalog = new ToolCatalog(bridge, { logger });
        const tools = essentialOnly ? await catalog.essentialSubset(essential) : await catalog.listTools();
        emit(config, renderToolCatalog(tools, format, { essential }));
        deps.setExitCode(0);
      } finally {
        await bridge.close();
      }
    });

  program
    .command('health')
    .description('Probe an HTTP tool service')
    .argument('[serviceUrl]', 'Service URL (defaults to the configured serviceUrl)')
    .option('--config <file>', 'Config file (defaults to the nearest .siteauditrc.json)')
    .option('--request-timeout-ms <ms>', 'Probe timeout', toNumber)
    .option('--verbose', 'Verbose logging')
    .action(async (serviceUrl: string | undefined, raw: Record<string, unknown>) => {
      const { configPath, verbose, flags } = splitFlags(parseOptions(commonOptionsSchema, { ...raw, serviceUrl }));
      const { config, logger } = setup(configPath, { ...flags, transport: 'http' }, verbose);

      const bridge = makeBridge({ ...toBridgeConfig(config), startupTimeoutMs: config.requestTimeoutMs }, logger);
      try {
        await bridge.open();
        const body = await bridge.send('initialize');
        deps.stdout(`healthy ${config.serviceUrl ?? ''} ${JSON.stringify(body)}\n`);
        deps.setExitCode(0);
      } catch (error) {
        deps.stderr(`unhealthy: ${errorMessage(error)}\n`);
        deps.setExitCode(1);
      } finally {
        await bridge.close();
      }
    });

  program
    .command('init')
    .description('Write a starter .siteauditrc.json')
    .option('--path <file>', 'Where to write config', '.siteauditrc.json')
    .option('--force', 'Overwrite an existing file')
    .action((raw: Record<string, unknown>) => {
      const options = parseOptions(
        z.object({ path: z.string().min(1), force: z.boolean().default(false) }),
        raw,
      );
      const outPath = path.resolve(deps.cwd, options.path);
      if (existsSync(outPath) && !options.force) {
        throw new ValidationError(`${outPath} already exists (use --force to overwrite)`);
      }
      writeFileSync(outPath, `${JSON.stringify(CONFIG_TEMPLATE, null, 2)}\n`, 'utf8');
      deps.stdout(`Wrote ${outPath}\n`);
      deps.setExitCode(0);
    });

  return program;
}
