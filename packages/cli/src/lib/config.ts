import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { type LogLevel, ValidationError, toAuditConfig } from '@siteaudit/core';
import type { AnalysisProviderConfig, AuditConfig, BridgeConfig } from '@siteaudit/core/types';
import { z } from 'zod';

/**
 * CLI configuration file names (searched upwards from cwd).
 */
export const CONFIG_FILES = ['.siteauditrc.json'] as const;

export const OUTPUT_FORMATS = ['console', 'json', 'md'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const positiveInt = z.number().int().positive();

export const cliConfigSchema = z.object({
  /** Analysis provider (`openai`, `anthropic`, `mock`). */
  provider: z.enum(['openai', 'anthropic', 'mock']).optional(),

  /** Provider API key (or use env vars like `OPENAI_API_KEY`). */
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),

  transport: z.enum(['stdio', 'http']).optional(),

  /** Tool service URL for the `http` transport. */
  serviceUrl: z.string().url().optional(),

  /** Backend launch command for the `stdio` transport. */
  command: z.string().min(1).optional(),
  args: z.array(z.string()).optional(),

  startupTimeoutMs: positiveInt.optional(),
  requestTimeoutMs: positiveInt.optional(),
  overallTimeoutMs: positiveInt.optional(),
  essentialTools: z.array(z.string().min(1)).optional(),
  concurrency: positiveInt.optional(),

  format: z.enum(OUTPUT_FORMATS).optional(),

  /** Output file path (defaults to stdout when omitted). */
  output: z.string().min(1).optional(),

  /** Minimum passing score for CI-style runs. */
  threshold: z.number().min(0).max(100).optional(),

  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

/**
 * Find a config file by walking up from the starting directory.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    for (const name of CONFIG_FILES) {
      const full = path.join(dir, name);
      if (existsSync(full)) return full;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function loadConfigFile(filePath: string): CliConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ValidationError(`Could not read config file ${filePath}`, { cause: error });
  }
  return parseConfig(raw, filePath);
}

function parseConfig(raw: unknown, source: string): CliConfig {
  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid configuration in ${source}: ${issues}`);
  }
  return parsed.data;
}

const ENV_KEYS = {
  provider: 'SITEAUDIT_PROVIDER',
  model: 'SITEAUDIT_MODEL',
  apiKey: 'SITEAUDIT_API_KEY',
  transport: 'SITEAUDIT_TRANSPORT',
  serviceUrl: 'SITEAUDIT_SERVICE_URL',
  command: 'SITEAUDIT_MCP_COMMAND',
  startupTimeoutMs: 'SITEAUDIT_STARTUP_TIMEOUT_MS',
  requestTimeoutMs: 'SITEAUDIT_REQUEST_TIMEOUT_MS',
  logLevel: 'SITEAUDIT_LOG_LEVEL',
} as const;

const NUMERIC_ENV_KEYS = new Set<string>(['startupTimeoutMs', 'requestTimeoutMs']);

/**
 * Read the `SITEAUDIT_*` variables. Unset and empty variables are skipped.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): CliConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]?.trim();
    if (!value) continue;
    raw[key] = NUMERIC_ENV_KEYS.has(key) ? Number(value) : value;
  }
  return parseConfig(raw, 'environment');
}

/**
 * Merge config layers; later layers win and `undefined` never overrides.
 */
export function mergeConfig(...layers: CliConfig[]): CliConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return cliConfigSchema.parse(merged);
}

/**
 * Engine config. Without a configured key, the provider's own variable
 * (`OPENAI_API_KEY`, `ANTHROPIC_API_KEY`) is used.
 */
export function toProviderConfig(config: CliConfig, env: NodeJS.ProcessEnv): AnalysisProviderConfig {
  const provider = config.provider ?? 'openai';
  const fallbackKey =
    provider === 'openai' ? env.OPENAI_API_KEY : provider === 'anthropic' ? env.ANTHROPIC_API_KEY : undefined;

  return {
    provider,
    apiKey: config.apiKey ?? (fallbackKey?.trim() || undefined),
    model: config.model,
    baseUrl: config.baseUrl,
  };
}

export function toBridgeConfig(config: CliConfig): BridgeConfig {
  const timeouts = { startupTimeoutMs: config.startupTimeoutMs, requestTimeoutMs: config.requestTimeoutMs };

  if (config.transport === 'http') {
    if (!config.serviceUrl) {
      throw new ValidationError('serviceUrl is required when transport is "http"', { field: 'serviceUrl' });
    }
    return { transport: 'http', serviceUrl: config.serviceUrl, ...timeouts };
  }

  return { transport: 'stdio', command: config.command, args: config.args, ...timeouts };
}

export function toPipelineConfig(config: CliConfig): AuditConfig {
  return toAuditConfig({
    bridge: toBridgeConfig(config),
    essentialTools: config.essentialTools,
    overallTimeoutMs: config.overallTimeoutMs,
    concurrency: config.concurrency,
  });
}

export interface ResolveConfigOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;

  /** Values given on the command line. */
  flags?: CliConfig;

  /** Explicit config file; skips the upward search. */
  configPath?: string;
}

/**
 * Resolve the effective configuration: file < environment < flags.
 */
export function resolveConfig(options: ResolveConfigOptions): { config: CliConfig; configPath: string | null } {
  const configPath = options.configPath ? path.resolve(options.cwd, options.configPath) : findConfigFile(options.cwd);
  const fileConfig = configPath ? loadConfigFile(configPath) : {};

  return {
    config: mergeConfig(fileConfig, configFromEnv(options.env), options.flags ?? {}),
    configPath,
  };
}

export function effectiveLogLevel(config: CliConfig, verbose: boolean): LogLevel {
  if (verbose) return 'debug';
  return config.logLevel ?? 'warn';
}

/**
 * Starter `.siteauditrc.json` written by `siteaudit init`.
 */
export const CONFIG_TEMPLATE: CliConfig = {
  provider: 'openai',
  model: 'gpt-4o-mini',
  transport: 'stdio',
  format: 'console',
  threshold: 70,
  concurrency: 2,
  logLevel: 'warn',
};
