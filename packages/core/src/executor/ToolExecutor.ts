import { errorKindOf, errorMessage } from '../errors.js';
import { type Logger, silentLogger } from '../logging/logger.js';
import type { ProtocolBridge } from '../types/bridge.js';
import type { ToolCall, ToolDefinition, ToolResult } from '../types/tools.js';

/**
 * Uniform invocation interface for one registered tool.
 */
export type ToolInvoker = (args: Record<string, unknown>) => Promise<unknown>;

export interface ToolExecutorOptions {
  logger?: Logger;

  /** Clock for duration measurement. Defaults to `Date.now`. */
  now?: () => number;
}

/**
 * Single dispatch point for tool calls.
 *
 * `execute()` never throws: every failure becomes an error `ToolResult`, so one
 * misbehaving tool only degrades its own data.
 */
export class ToolExecutor {
  private readonly bridge: ProtocolBridge;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly registry = new Map<string, ToolInvoker>();

  constructor(bridge: ProtocolBridge, options: ToolExecutorOptions = {}) {
    this.bridge = bridge;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Register tools callable through this executor.
   */
  register(definitions: Iterable<ToolDefinition>): void {
    for (const definition of definitions) {
      const name = definition.name;
      this.registry.set(name, (args) => this.bridge.send('tools/call', { name, arguments: args }));
    }
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  registeredTools(): string[] {
    return [...this.registry.keys()];
  }

  async execute(call: ToolCall): Promise<ToolResult> {
    const invoker = this.registry.get(call.name);
    if (!invoker) {
      this.logger.warn('Tool is not registered', { tool: call.name });
      return {
        name: call.name,
        status: 'error',
        error: { kind: 'unavailable', message: `Tool "${call.name}" is not available` },
        durationMs: 0,
      };
    }

    const startedAt = this.now();
    try {
      const output = await invoker(call.arguments);
      const durationMs = this.now() - startedAt;

      const reported = reportedToolError(output);
      if (reported !== null) {
        this.logger.warn('Tool reported an error', { tool: call.name, error: reported });
        return {
          name: call.name,
          status: 'error',
          error: { kind: 'tool', message: reported },
          durationMs,
        };
      }

      this.logger.debug('Tool succeeded', { tool: call.name, durationMs });
      return { name: call.name, status: 'success', output, durationMs };
    } catch (error) {
      const durationMs = this.now() - startedAt;
      const message = errorMessage(error);
      this.logger.warn('Tool call failed', { tool: call.name, error: message });
      return {
        name: call.name,
        status: 'error',
        error: { kind: errorKindOf(error), message },
        durationMs,
      };
    }
  }
}

/**
 * A backend can run a tool and still report failure in-band
 * (`{ isError: true, content: [...] }`). Returns the message, or null.
 */
export function reportedToolError(output: unknown): string | null {
  if (typeof output !== 'object' || output === null || !('isError' in output)) return null;
  if (output.isError !== true) return null;

  const content = 'content' in output && Array.isArray(output.content) ? output.content : [];
  const text = content
    .map((block: unknown) =>
      typeof block === 'object' && block !== null && 'text' in block && typeof block.text === 'string'
        ? block.text
        : '',
    )
    .filter((part) => part.length > 0)
    .join('\n');

  return text || 'Tool reported an error';
}
