export const DEFAULT_MAX_TOOL_OUTPUT_CHARS = 8_000;

/**
 * Serialize one tool output for a prompt.
 *
 * Base64 image payloads are replaced by a size marker and the text is capped at
 * `maxChars`.
 */
export function compactToolOutput(output: unknown, maxChars = DEFAULT_MAX_TOOL_OUTPUT_CHARS): string {
  const text =
    typeof output === 'string' ? stripDataUrls(output) : (JSON.stringify(output, imageReplacer) ?? 'null');
  return truncate(text, maxChars);
}

export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const omitted = text.length - maxChars;
  return `${text.slice(0, maxChars)}… [truncated ${omitted} chars]`;
}

function imageReplacer(this: unknown, key: string, value: unknown): unknown {
  if (typeof value === 'string') {
    return key === 'data' && isImageBlock(this) ? imageMarker(value.length) : stripDataUrls(value);
  }
  return value;
}

function isImageBlock(holder: unknown): boolean {
  return (
    typeof holder === 'object' &&
    holder !== null &&
    'type' in holder &&
    holder.type === 'image'
  );
}

function stripDataUrls(text: string): string {
  return text.replace(/data:image\/[a-z+.-]+;base64,[A-Za-z0-9+/=]+/gi, (match) => imageMarker(match.length));
}

function imageMarker(length: number): string {
  return `[image omitted: ${length} base64 chars]`;
}
