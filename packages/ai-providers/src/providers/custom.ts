import type { AnalysisHandler, AnalysisProviderConfig } from '@siteaudit/core/types';

import {
  BaseAnalysisEngine,
  type StructuredCompletion,
  type StructuredCompletionRequest,
  type ToolSelectionCompletion,
  type ToolSelectionCompletionRequest,
} from '../base.js';
import { AnalysisProviderError } from '../errors.js';

/**
 * Adapter that wraps a user-supplied `AnalysisHandler` into the engine interface.
 *
 * Retries, JSON extraction and schema validation still apply.
 */
export class CustomAnalysisEngine extends BaseAnalysisEngine {
  readonly provider = 'custom';
  private readonly handler: AnalysisHandler;

  constructor(config: AnalysisProviderConfig) {
    super(config, 'custom');
    if (!config.customHandler) {
      throw new AnalysisProviderError('customHandler is required when provider is "custom"');
    }
    this.handler = config.customHandler;
  }

  protected async completeToolSelection(request: ToolSelectionCompletionRequest): Promise<ToolSelectionCompletion> {
    const response = await this.handler({
      kind: 'select_tools',
      systemPrompt: request.systemPrompt,
      prompt: request.prompt,
      tools: request.tools,
    });
    return { calls: response.toolCalls ?? [], refusal: response.refusal, usage: response.usage };
  }

  protected async completeStructured(request: StructuredCompletionRequest): Promise<StructuredCompletion> {
    const response = await this.handler({
      kind: 'structured',
      name: request.name,
      systemPrompt: request.systemPrompt,
      prompt: request.prompt,
      jsonSchema: request.jsonSchema,
    });
    return { content: response.content ?? '', refusal: response.refusal, usage: response.usage };
  }
}
