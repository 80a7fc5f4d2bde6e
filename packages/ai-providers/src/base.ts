import { UpstreamAnalysisError, errorMessage, withTimeout } from '@siteaudit/core';
import type {
  AnalysisEngine,
  AnalysisProviderConfig,
  JsonSchema,
  StructuredRequest,
  StructuredResult,
  TokenUsage,
  ToolDefinition,
  ToolSelectionRequest,
  ToolSelectionResult,
} from '@siteaudit/core/types';
import type { ZodType } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { AnalysisParseError, AnalysisProviderError, AnalysisRefusalError, AnalysisTimeoutError } from './errors.js';

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_RETRIES = 3;

/**
 * One tool-selection request as handed to a concrete adapter.
 */
export interface ToolSelectionCompletionRequest {
  systemPrompt: string;
  prompt: string;
  tools: readonly ToolDefinition[];
  temperature: number | undefined;
  signal: AbortSignal | undefined;
}

/**
 * What the provider answered to a tool-selection request.
 *
 * `arguments` may be an object or JSON text; the base class normalizes it.
 */
export interface ToolSelectionCompletion {
  calls: Array<{ name: string; arguments?: unknown }>;
  refusal?: string;
  usage?: TokenUsage;
}

export interface StructuredCompletionRequest {
  name: string;
  description: string | undefined;
  jsonSchema: JsonSchema;
  systemPrompt: string;
  prompt: string;
  temperature: number | undefined;
  signal: AbortSignal | undefined;
}

export interface StructuredCompletion {
  /** JSON text, possibly wrapped in a Markdown fence. */
  content: string;
  refusal?: string;
  usage?: TokenUsage;
}

export function extractJsonMaybe(text: string): string {
  const trimmed = text.trim();

  // ```json ... ```
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch?.[1]) return fenceMatch[1].trim();

  return trimmed;
}

function safeJsonParse(text: string): unknown {
  const candidate = extractJsonMaybe(text);
  try {
    return JSON.parse(candidate);
  } catch (error) {
    throw new AnalysisParseError(`Failed to parse provider JSON response. Raw output: ${text.slice(0, 500)}`, {
      cause: error,
    });
  }
}

/**
 * JSON Schema for a Zod schema, inlined (no `$ref`s).
 */
export function toJsonSchema(schema: ZodType<unknown>): JsonSchema {
  const converted: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  if (!isRecord(converted)) {
    throw new AnalysisProviderError('Could not convert the output schema to JSON Schema');
  }
  const { $schema: _ignored, ...rest } = converted;
  return rest;
}

/**
 * Keep calls naming an offered tool, with arguments as a plain object.
 */
export function normalizeToolCalls(
  calls: ToolSelectionCompletion['calls'],
  offered: ReadonlySet<string>,
): ToolSelectionResult['calls'] {
  return calls
    .filter((call) => offered.has(call.name))
    .map((call) => ({ name: call.name, arguments: normalizeArguments(call.name, call.arguments) }));
}

function normalizeArguments(name: string, raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null || raw === '') return {};

  const value: unknown = typeof raw === 'string' ? safeJsonParse(raw) : raw;
  if (!isRecord(value)) {
    throw new AnalysisParseError(`Arguments for tool "${name}" are not a JSON object`);
  }
  return { ...value };
}

function backoffDelayMs(attempt: number): number {
  const base = 200;
  const factor = 2 ** Math.max(0, attempt - 1);
  const jitter = Math.floor(Math.random() * 50);
  return base * factor + jitter;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Base implementation shared by all engines.
 *
 * - Retry: up to `maxRetries` attempts with exponential backoff; refusals are final
 * - Timeout: per attempt via `timeoutMs` (default 120s)
 * - Parsing: JSON extraction and Zod validation of structured output
 * - Tool selection: calls outside the offered set are dropped
 */
export abstract class BaseAnalysisEngine implements AnalysisEngine {
  abstract readonly provider: string;
  readonly model: string;

  protected readonly config: AnalysisProviderConfig;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(config: AnalysisProviderConfig, defaultModel: string) {
    this.config = config;
    this.model = config.model ?? defaultModel;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, config.maxRetries ?? DEFAULT_MAX_RETRIES);
  }

  /**
   * One raw tool-selection request. The base class wraps it in retry/timeout logic.
   */
  protected abstract completeToolSelection(request: ToolSelectionCompletionRequest): Promise<ToolSelectionCompletion>;

  /**
   * One raw structured-output request. The base class wraps it in retry/timeout logic.
   */
  protected abstract completeStructured(request: StructuredCompletionRequest): Promise<StructuredCompletion>;

  async selectTools(request: ToolSelectionRequest): Promise<ToolSelectionResult> {
    if (request.tools.length === 0) return { calls: [], latencyMs: 0, attempts: 0 };

    const offered = new Set(request.tools.map((t) => t.name));
    const { value, attempts, latencyMs } = await this.runWithRetries(async () => {
      const completion = await this.completeToolSelection({
        systemPrompt: request.systemPrompt,
        prompt: request.prompt,
        tools: request.tools,
        temperature: request.temperature ?? this.config.temperature,
        signal: request.signal,
      });
      if (completion.refusal) throw new AnalysisRefusalError(completion.refusal);
      return { calls: normalizeToolCalls(completion.calls, offered), usage: completion.usage };
    }, request.signal);

    return { calls: value.calls, latencyMs, attempts, usage: value.usage };
  }

  async generateStructured<T>(request: StructuredRequest<T>): Promise<StructuredResult<T>> {
    const jsonSchema = toJsonSchema(request.schema);

    const { value, attempts, latencyMs } = await this.runWithRetries(async () => {
      const completion = await this.completeStructured({
        name: request.name,
        description: request.description,
        jsonSchema,
        systemPrompt: request.systemPrompt,
        prompt: request.prompt,
        temperature: request.temperature ?? this.config.temperature,
        signal: request.signal,
      });
      if (completion.refusal) throw new AnalysisRefusalError(completion.refusal);

      const parsed = request.schema.safeParse(safeJsonParse(completion.content));
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new AnalysisParseError(`Output for "${request.name}" does not match the schema: ${issues}`, {
          cause: parsed.error,
        });
      }
      return { data: parsed.data, raw: completion.content, usage: completion.usage };
    }, request.signal);

    return { data: value.data, raw: value.raw, latencyMs, attempts, usage: value.usage };
  }

  /**
   * Shared retry/timeout wrapper. Everything it throws is an `UpstreamAnalysisError`.
   */
  protected async runWithRetries<T>(
    attempt: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<{ value: T; attempts: number; latencyMs: number }> {
    const startedAt = Date.now();
    let lastError: unknown;

    for (let n = 1; n <= this.maxRetries; n++) {
      try {
        signal?.throwIfAborted();
        const value = await withTimeout(attempt(), this.timeoutMs, () => new AnalysisTimeoutError(this.timeoutMs));
        return { value, attempts: n, latencyMs: Date.now() - startedAt };
      } catch (error) {
        lastError = error;
        if (error instanceof AnalysisRefusalError || signal?.aborted || n >= this.maxRetries) break;
        await sleep(backoffDelayMs(n));
      }
    }

    if (lastError instanceof UpstreamAnalysisError) throw lastError;
    throw new AnalysisProviderError(`${this.provider} request failed: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }
}
