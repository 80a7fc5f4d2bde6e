import type { AnalysisEngine, AnalysisProviderConfig } from '@siteaudit/core/types';

import { AnthropicEngine } from './providers/anthropic.js';
import { CustomAnalysisEngine } from './providers/custom.js';
import { MockAnalysisEngine } from './providers/mock.js';
import { OpenAIEngine } from './providers/openai.js';

/**
 * Create an analysis engine from config.
 *
 * - `openai` / `anthropic`: require `apiKey`.
 * - `custom`: uses the provided `customHandler`.
 * - `mock`: deterministic and offline.
 */
export function createAnalysisEngine(config: AnalysisProviderConfig): AnalysisEngine {
  switch (config.provider) {
    case 'openai':
      return new OpenAIEngine(config);
    case 'anthropic':
      return new AnthropicEngine(config);
    case 'custom':
      return new CustomAnalysisEngine(config);
    case 'mock':
      return new MockAnalysisEngine(config);
  }
}
