import { ValidationError } from '../errors.js';

/**
 * Validate a client-supplied audit target.
 *
 * Returns the normalized URL (`https://Example.com` becomes
 * `https://example.com/`). The pipeline checks with this but records the
 * caller's trimmed string. Only absolute http(s) URLs with a host are accepted.
 */
export function validateAuditUrl(input: unknown): string {
  if (typeof input !== 'string' || input.trim().length === 0) {
    throw new ValidationError('URL is required', { field: 'url' });
  }

  let parsed: URL;
  try {
    parsed = new URL(input.trim());
  } catch (error) {
    throw new ValidationError(`Invalid URL: ${input}`, { field: 'url', cause: error });
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Unsupported URL scheme "${parsed.protocol}"; use http or https`, {
      field: 'url',
    });
  }
  if (parsed.hostname.length === 0) {
    throw new ValidationError('URL must include a host', { field: 'url' });
  }

  return parsed.toString();
}
