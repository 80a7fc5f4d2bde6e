import type { ZodType, ZodTypeDef } from 'zod';

import type { JsonSchema, ToolCall, ToolDefinition } from './tools.js';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface ToolSelectionRequest {
  systemPrompt: string;
  prompt: string;

  /** Tools the engine may choose from. Calls naming anything else are dropped. */
  tools: readonly ToolDefinition[];

  temperature?: number;
  signal?: AbortSignal;
}

export interface ToolSelectionResult {
  /** Calls in the order the engine wants them executed. */
  calls: ToolCall[];
  latencyMs: number;
  attempts: number;
  usage?: TokenUsage;
}

export interface StructuredRequest<T> {
  /** Schema name sent to the provider, e.g. `technical_report`. */
  name: string;
  description?: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  systemPrompt: string;
  prompt: string;
  temperature?: number;
  signal?: AbortSignal;
}

export interface StructuredResult<T> {
  data: T;
  raw: string;
  latencyMs: number;
  attempts: number;
  usage?: TokenUsage;
}

/**
 * The analysis capability the pipeline depends on.
 *
 * Implementations live in `@siteaudit/ai-providers`; tests use scripted fakes.
 */
export interface AnalysisEngine {
  readonly provider: string;
  readonly model: string;

  /** Pick zero or more tool calls from `request.tools`. */
  selectTools(request: ToolSelectionRequest): Promise<ToolSelectionResult>;

  /** Produce output validated against `request.schema`. Refusals and mismatches reject. */
  generateStructured<T>(request: StructuredRequest<T>): Promise<StructuredResult<T>>;
}

/**
 * Request handed to a user-supplied analysis handler.
 */
export type AnalysisHandlerRequest =
  | {
      kind: 'select_tools';
      systemPrompt: string;
      prompt: string;
      tools: readonly ToolDefinition[];
    }
  | {
      kind: 'structured';
      name: string;
      systemPrompt: string;
      prompt: string;
      jsonSchema: JsonSchema;
    };

export interface AnalysisHandlerResponse {
  /** JSON text for `structured` requests. */
  content?: string;

  /** Selected calls for `select_tools` requests. `arguments` may be an object or JSON text. */
  toolCalls?: Array<{ name: string; arguments?: unknown }>;

  /** Set when the model declined to answer. */
  refusal?: string;

  usage?: TokenUsage;
}

export type AnalysisHandler = (request: AnalysisHandlerRequest) => Promise<AnalysisHandlerResponse>;
