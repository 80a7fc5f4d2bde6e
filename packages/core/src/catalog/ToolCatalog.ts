import { z } from 'zod';

import { ProtocolError } from '../errors.js';
import { type Logger, silentLogger } from '../logging/logger.js';
import type { ProtocolBridge } from '../types/bridge.js';
import type { ToolDefinition } from '../types/tools.js';

/**
 * Tools exposed to the analysis engine unless configured otherwise.
 */
export const DEFAULT_ESSENTIAL_TOOLS: readonly string[] = [
  'navigate_page',
  'performance_start_trace',
  'performance_stop_trace',
  'evaluate_script',
  'take_snapshot',
  'list_network_requests',
  'emulate_network',
  'list_console_messages',
  'take_screenshot',
];

const toolEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  inputSchema: z.record(z.string(), z.unknown()).nullish(),
});

const toolListSchema = z.object({
  tools: z.array(toolEntrySchema),
});

/**
 * Session-scoped view of the tools a backend exposes.
 *
 * `tools/list` is issued at most once per bridge generation; a reopen of the
 * bridge invalidates the cache.
 */
export class ToolCatalog {
  private readonly bridge: ProtocolBridge;
  private readonly logger: Logger;

  private cache: { generation: number; tools: readonly ToolDefinition[] } | null = null;
  private inflight: { generation: number; promise: Promise<readonly ToolDefinition[]> } | null = null;

  constructor(bridge: ProtocolBridge, options: { logger?: Logger } = {}) {
    this.bridge = bridge;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * All tools, in backend order. Opens the bridge if needed.
   */
  async listTools(): Promise<readonly ToolDefinition[]> {
    if (!this.bridge.isOpen) await this.bridge.open();

    const generation = this.bridge.generation;
    if (this.cache?.generation === generation) return this.cache.tools;
    if (this.inflight?.generation === generation) return await this.inflight.promise;

    const promise = this.fetchTools(generation);
    this.inflight = { generation, promise };
    try {
      return await promise;
    } finally {
      if (this.inflight?.promise === promise) this.inflight = null;
    }
  }

  /**
   * Catalog entries whose name is in `names`, in catalog order. Names the
   * backend does not expose are dropped.
   */
  async essentialSubset(names: Iterable<string>): Promise<ToolDefinition[]> {
    return filterEssentialTools(await this.listTools(), names);
  }

  private async fetchTools(generation: number): Promise<readonly ToolDefinition[]> {
    const result = await this.bridge.send('tools/list', {});
    const tools = parseToolList(result);

    this.cache = { generation, tools };
    this.logger.debug('Tool catalog loaded', { generation, count: tools.length });
    return tools;
  }
}

export function filterEssentialTools(
  catalog: readonly ToolDefinition[],
  names: Iterable<string>,
): ToolDefinition[] {
  const wanted = new Set(names);
  return catalog.filter((tool) => wanted.has(tool.name));
}

/**
 * Validate a `tools/list` result. Duplicate names keep their first entry.
 */
export function parseToolList(result: unknown): readonly ToolDefinition[] {
  const parsed = toolListSchema.safeParse(result);
  if (!parsed.success) {
    throw new ProtocolError('Malformed tools/list result', { cause: parsed.error });
  }

  const seen = new Set<string>();
  const tools: ToolDefinition[] = [];

  for (const entry of parsed.data.tools) {
    if (seen.has(entry.name)) continue;
    seen.add(entry.name);

    tools.push(
      Object.freeze({
        name: entry.name,
        description: entry.description ?? '',
        inputSchema: Object.freeze(entry.inputSchema ?? { type: 'object', properties: {} }),
      }),
    );
  }

  return Object.freeze(tools);
}
