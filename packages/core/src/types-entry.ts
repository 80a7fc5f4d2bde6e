/**
 * Types-only entrypoint.
 *
 * `@siteaudit/ai-providers` implements the `AnalysisEngine` contract declared
 * here; importing from `@siteaudit/core/types` keeps it free of the runtime
 * pipeline code.
 */
export type * from './types/index.js';
