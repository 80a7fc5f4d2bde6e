/**
 * JSON Schema object describing a tool's arguments, as published by the backend.
 */
export type JsonSchema = Record<string, unknown>;

/**
 * A tool advertised by the backend. Immutable once fetched.
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonSchema;
}

/**
 * One tool invocation requested by the analysis engine.
 */
export interface ToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Why a tool call produced no output.
 *
 * - `tool`: the backend ran the tool and reported a failure
 * - `protocol` / `timeout` / `connection`: the bridge failed underneath the call
 * - `unavailable`: the name is not in the registered tool set
 */
export type ToolErrorKind = 'tool' | 'protocol' | 'timeout' | 'connection' | 'unavailable' | 'unknown';

export interface ToolSuccess {
  name: string;
  status: 'success';
  output: unknown;
  durationMs: number;
}

export interface ToolFailure {
  name: string;
  status: 'error';
  error: {
    kind: ToolErrorKind;
    message: string;
  };
  durationMs: number;
}

/**
 * Outcome of one tool call. An error result is a recorded outcome, not a fault
 * of the run.
 */
export type ToolResult = ToolSuccess | ToolFailure;
