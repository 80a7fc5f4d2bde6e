import type { PipelinePhase, PipelineState } from './types/pipeline.js';
import type { ToolErrorKind } from './types/tools.js';

/**
 * Base error type for everything raised by the audit core.
 *
 * Callers can use this to tell "audit problems" apart from bugs in their own
 * integration code.
 */
export class SiteAuditError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SiteAuditError';
  }
}

/**
 * The channel to the tool backend could not be established (process failed to
 * start, handshake failed, or the service is unreachable).
 */
export class ConnectionError extends SiteAuditError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Error object carried by a JSON-RPC response envelope.
 */
export interface RemoteError {
  code?: number;
  message: string;
  data?: unknown;
}

/**
 * Malformed response, mismatched correlation id, an explicit error envelope,
 * or a channel that closed while a request was outstanding.
 */
export class ProtocolError extends SiteAuditError {
  readonly remote: RemoteError | undefined;

  constructor(message: string, options?: ErrorOptions & { remote?: RemoteError }) {
    super(message, options);
    this.name = 'ProtocolError';
    this.remote = options?.remote;
  }
}

/**
 * A bridge request did not receive its response within the configured window.
 */
export class TimeoutError extends ProtocolError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A specific tool call failed at the backend. Recorded as a tool result, never
 * fatal to a run.
 */
export class ToolExecutionError extends SiteAuditError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

/**
 * The analysis engine refused, failed, or returned output that does not match
 * the requested schema.
 */
export class UpstreamAnalysisError extends SiteAuditError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpstreamAnalysisError';
  }
}

/**
 * Client input was rejected before an audit started.
 */
export class ValidationError extends SiteAuditError {
  readonly field: string | undefined;

  constructor(message: string, options?: ErrorOptions & { field?: string }) {
    super(message, options);
    this.name = 'ValidationError';
    this.field = options?.field;
  }
}

/**
 * An operation was attempted in a pipeline phase that does not allow it.
 */
export class PipelineStateError extends SiteAuditError {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineStateError';
  }
}

/**
 * The whole run exceeded `overallTimeoutMs`.
 */
export class AuditTimeoutError extends SiteAuditError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Audit timed out after ${timeoutMs}ms`);
    this.name = 'AuditTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The caller aborted the run through its `AbortSignal`.
 */
export class AuditCancelledError extends SiteAuditError {
  constructor(message = 'Audit was cancelled') {
    super(message);
    this.name = 'AuditCancelledError';
  }
}

/**
 * Single failure surfaced for a run that ended in `Failed`.
 *
 * `message` is the originating error's message; `cause` is the originating
 * error itself, and `state` the pipeline state at the moment of failure.
 */
export class AuditFailedError extends SiteAuditError {
  readonly phase: PipelinePhase;
  readonly state: PipelineState;
  override readonly cause: Error;

  constructor(phase: PipelinePhase, state: PipelineState, cause: Error) {
    super(cause.message, { cause });
    this.name = 'AuditFailedError';
    this.phase = phase;
    this.state = state;
    this.cause = cause;
  }
}

/**
 * Map an error raised below the executor to the kind recorded on a tool result.
 */
export function errorKindOf(error: unknown): ToolErrorKind {
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof ProtocolError) return 'protocol';
  if (error instanceof ConnectionError) return 'connection';
  if (error instanceof ToolExecutionError) return 'tool';
  return 'unknown';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new SiteAuditError(errorMessage(error), { cause: error });
}
