import { z } from 'zod';

import { ProtocolError, type RemoteError } from '../errors.js';

export const JSONRPC_VERSION = '2.0';

const idSchema = z.union([z.number(), z.string()]);

const envelopeSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: idSchema.nullable().optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: z.unknown().optional(),
});

const remoteErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string(),
  data: z.unknown().optional(),
});

export interface RequestEnvelope {
  jsonrpc: typeof JSONRPC_VERSION;
  id: number;
  method: string;
  params: Record<string, unknown>;
}

export interface NotificationEnvelope {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * A decoded line received from the backend.
 */
export type IncomingMessage =
  | { kind: 'response'; id: number | string; result: unknown }
  | { kind: 'error'; id: number | string | null; error: RemoteError }
  | { kind: 'request'; id: number | string; method: string }
  | { kind: 'notification'; method: string };

export function encodeMessage(envelope: RequestEnvelope | NotificationEnvelope): string {
  return `${JSON.stringify(envelope)}\n`;
}

/**
 * Decode one framed message.
 *
 * An `error` key always marks a failed response, whatever `result` holds.
 */
export function decodeMessage(line: string): IncomingMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new ProtocolError(`Malformed response: not valid JSON (${preview(line)})`, {
      cause: error,
    });
  }

  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError(`Malformed response envelope (${preview(line)})`, {
      cause: parsed.error,
    });
  }

  const envelope = parsed.data;
  const hasError = typeof raw === 'object' && raw !== null && Object.hasOwn(raw, 'error');

  if (hasError) {
    return { kind: 'error', id: envelope.id ?? null, error: toRemoteError(envelope.error) };
  }

  if (envelope.method !== undefined) {
    if (envelope.id === undefined || envelope.id === null) {
      return { kind: 'notification', method: envelope.method };
    }
    return { kind: 'request', id: envelope.id, method: envelope.method };
  }

  if (envelope.id === undefined || envelope.id === null) {
    throw new ProtocolError(`Malformed response envelope: missing id (${preview(line)})`);
  }

  return { kind: 'response', id: envelope.id, result: envelope.result ?? {} };
}

export function toRemoteError(value: unknown): RemoteError {
  const parsed = remoteErrorSchema.safeParse(value);
  if (parsed.success) return parsed.data;
  if (typeof value === 'string' && value.length > 0) return { message: value };
  return { message: 'Unspecified backend error', data: value };
}

export function describeRemoteError(error: RemoteError): string {
  return error.code === undefined ? error.message : `${error.message} (code ${error.code})`;
}

function preview(line: string): string {
  const trimmed = line.trim();
  return trimmed.length > 120 ? `${trimmed.slice(0, 120)}…` : trimmed;
}
