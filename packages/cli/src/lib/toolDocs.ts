import type { ToolDefinition } from '@siteaudit/core/types';

export const TOOL_DOC_FORMATS = ['table', 'md', 'json'] as const;
export type ToolDocFormat = (typeof TOOL_DOC_FORMATS)[number];

export interface ToolDocOptions {
  /** Names of the essential subset, marked in every format. */
  essential?: readonly string[];
  generatedAt?: Date;
}

/**
 * Render the backend's tool catalog.
 */
export function renderToolCatalog(
  tools: readonly ToolDefinition[],
  format: ToolDocFormat,
  options: ToolDocOptions = {},
): string {
  const essential = new Set(options.essential ?? []);
  switch (format) {
    case 'json':
      return JSON.stringify(
        {
          generatedAt: (options.generatedAt ?? new Date()).toISOString(),
          total: tools.length,
          tools: tools.map((t) => ({ ...t, essential: essential.has(t.name) })),
        },
        null,
        2,
      );
    case 'md':
      return renderMarkdown(tools, essential, options.generatedAt ?? new Date());
    case 'table':
      return renderTable(tools, essential);
  }
}

function firstLine(text: string): string {
  return text.split(/\r?\n/, 1)[0]?.trim() ?? '';
}

function renderTable(tools: readonly ToolDefinition[], essential: ReadonlySet<string>): string {
  if (tools.length === 0) return 'No tools available.';

  const width = Math.max(...tools.map((t) => t.name.length));
  const lines = tools.map((t) => {
    const marker = essential.has(t.name) ? '*' : ' ';
    return `${marker} ${t.name.padEnd(width)}  ${firstLine(t.description)}`;
  });
  lines.push('', `${tools.length} tools (* = essential)`);
  return lines.join('\n');
}

function renderMarkdown(tools: readonly ToolDefinition[], essential: ReadonlySet<string>, generatedAt: Date): string {
  const lines: string[] = [];
  lines.push('# Tool catalog');
  lines.push('');
  lines.push(`Generated on: ${generatedAt.toISOString()}`);
  lines.push(`Total tools: ${tools.length}`);
  lines.push('');

  tools.forEach((tool, idx) => {
    lines.push(`## ${idx + 1}. ${tool.name}${essential.has(tool.name) ? ' (essential)' : ''}`);
    lines.push('');
    lines.push(tool.description || '_No description available._');
    lines.push('');
    lines.push('Function-calling format:');
    lines.push('');
    lines.push('```json');
    lines.push(
      JSON.stringify(
        { type: 'function', function: { name: tool.name, description: tool.description, parameters: tool.inputSchema } },
        null,
        2,
      ),
    );
    lines.push('```');
    lines.push('');
  });

  return lines.join('\n');
}
