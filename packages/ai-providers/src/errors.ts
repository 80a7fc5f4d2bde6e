import { UpstreamAnalysisError } from '@siteaudit/core';

/**
 * Base error type for failures coming from engine adapters.
 *
 * Every adapter error is an `UpstreamAnalysisError`, so the pipeline treats
 * them like any other analysis failure.
 */
export class AnalysisProviderError extends UpstreamAnalysisError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AnalysisProviderError';
  }
}

/**
 * Thrown when a provider request exceeds the configured timeout.
 */
export class AnalysisTimeoutError extends AnalysisProviderError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Analysis request timed out after ${timeoutMs}ms`);
    this.name = 'AnalysisTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when the provider returned output that isn't JSON, or JSON that
 * doesn't match the requested schema.
 */
export class AnalysisParseError extends AnalysisProviderError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AnalysisParseError';
  }
}

/**
 * The model declined to answer. Never retried.
 */
export class AnalysisRefusalError extends AnalysisProviderError {
  readonly refusal: string;

  constructor(refusal: string) {
    super(`Model refused request: ${refusal}`);
    this.name = 'AnalysisRefusalError';
    this.refusal = refusal;
  }
}
