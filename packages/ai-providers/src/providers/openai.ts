import type { AnalysisProviderConfig } from '@siteaudit/core/types';
import OpenAI from 'openai';

import {
  BaseAnalysisEngine,
  type StructuredCompletion,
  type StructuredCompletionRequest,
  type ToolSelectionCompletion,
  type ToolSelectionCompletionRequest,
} from '../base.js';
import { AnalysisProviderError } from '../errors.js';

/**
 * OpenAI engine adapter.
 *
 * Notes:
 * - Defaults to `gpt-4o-mini` unless `config.model` is provided.
 * - Tool selection uses function calling; `tool_choice` follows `config.toolChoice`.
 * - Structured output uses `response_format: json_schema` built from the Zod schema.
 * - The SDK's own retries are disabled; the base class retries.
 */
export class OpenAIEngine extends BaseAnalysisEngine {
  readonly provider = 'openai';
  private readonly client: OpenAI;

  constructor(config: AnalysisProviderConfig) {
    super(config, 'gpt-4o-mini');
    if (!config.apiKey) throw new AnalysisProviderError('OpenAI apiKey is required');
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
  }

  protected async completeToolSelection(request: ToolSelectionCompletionRequest): Promise<ToolSelectionCompletion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.prompt },
        ],
        tools: request.tools.map((tool) => ({
          type: 'function' as const,
          function: { name: tool.name, description: tool.description, parameters: tool.inputSchema },
        })),
        tool_choice: this.config.toolChoice ?? 'auto',
        temperature: request.temperature,
        max_tokens: this.config.maxTokens,
      },
      { signal: request.signal },
    );

    const message = response.choices[0]?.message;
    if (!message) throw new AnalysisProviderError('OpenAI returned no choices');

    return {
      calls: (message.tool_calls ?? []).map((call) => ({
        name: call.function.name,
        arguments: call.function.arguments,
      })),
      refusal: message.refusal ?? undefined,
      usage: response.usage
        ? { promptTokens: response.usage.prompt_tokens, completionTokens: response.usage.completion_tokens }
        : undefined,
    };
  }

  protected async completeStructured(request: StructuredCompletionRequest): Promise<StructuredCompletion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.prompt },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: {
            name: request.name,
            description: request.description,
            schema: request.jsonSchema,
            // Optional fields in the schema rule out strict mode.
            strict: false,
          },
        },
        temperature: request.temperature,
        max_tokens: this.config.maxTokens,
      },
      { signal: request.signal },
    );

    const message = response.choices[0]?.message;
    if (!message) throw new AnalysisProviderError('OpenAI returned no choices');
    if (message.refusal) return { content: '', refusal: message.refusal };

    const content = message.content;
    if (typeof content !== 'string' || content.trim().length === 0) {
      throw new AnalysisProviderError('OpenAI returned an empty response');
    }

    return {
      content,
      usage: response.usage
        ? { promptTokens: response.usage.prompt_tokens, completionTokens: response.usage.completion_tokens }
        : undefined,
    };
  }
}
