import type { AnalysisProviderConfig, JsonSchema } from '@siteaudit/core/types';
import Anthropic from '@anthropic-ai/sdk';

import {
  BaseAnalysisEngine,
  type StructuredCompletion,
  type StructuredCompletionRequest,
  type ToolSelectionCompletion,
  type ToolSelectionCompletionRequest,
} from '../base.js';
import { AnalysisProviderError } from '../errors.js';

const DEFAULT_MAX_TOKENS = 4_096;

/**
 * Anthropic's `input_schema` must be an object schema.
 */
function toInputSchema(schema: JsonSchema): { type: 'object'; [key: string]: unknown } {
  return { ...schema, type: 'object' };
}

/**
 * Anthropic engine adapter.
 *
 * Notes:
 * - Defaults to `claude-sonnet-4-20250514` unless `config.model` is provided.
 * - Tool selection offers the tools with `input_schema`; `toolChoice: 'required'` maps to `any`.
 * - Structured output is forced through a single tool whose input is the schema.
 */
export class AnthropicEngine extends BaseAnalysisEngine {
  readonly provider = 'anthropic';
  private readonly client: Anthropic;

  constructor(config: AnalysisProviderConfig) {
    super(config, 'claude-sonnet-4-20250514');
    if (!config.apiKey) throw new AnalysisProviderError('Anthropic apiKey is required');
    this.client = new Anthropic({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
  }

  protected async completeToolSelection(request: ToolSelectionCompletionRequest): Promise<ToolSelectionCompletion> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.prompt }],
        tools: request.tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          input_schema: toInputSchema(tool.inputSchema),
        })),
        tool_choice: this.config.toolChoice === 'required' ? { type: 'any' } : { type: 'auto' },
        temperature: request.temperature,
      },
      { signal: request.signal },
    );

    const calls: ToolSelectionCompletion['calls'] = [];
    for (const block of response.content) {
      if (block.type === 'tool_use') calls.push({ name: block.name, arguments: block.input });
    }

    return {
      calls,
      usage: { promptTokens: response.usage.input_tokens, completionTokens: response.usage.output_tokens },
    };
  }

  protected async completeStructured(request: StructuredCompletionRequest): Promise<StructuredCompletion> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.prompt }],
        tools: [
          {
            name: request.name,
            description: request.description ?? `Return the ${request.name}`,
            input_schema: toInputSchema(request.jsonSchema),
          },
        ],
        tool_choice: { type: 'tool', name: request.name },
        temperature: request.temperature,
      },
      { signal: request.signal },
    );

    const usage = { promptTokens: response.usage.input_tokens, completionTokens: response.usage.output_tokens };
    let text = '';
    for (const block of response.content) {
      if (block.type === 'tool_use' && block.name === request.name) {
        return { content: JSON.stringify(block.input), usage };
      }
      if (block.type === 'text') text += block.text;
    }

    // No tool call despite the forced choice: the model answered in prose instead.
    return { content: '', refusal: text.trim() || `no ${request.name} was produced`, usage };
  }
}
