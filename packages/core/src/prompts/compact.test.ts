import { describe, expect, it } from 'vitest';

import { compactToolOutput, truncate } from './compact.js';

describe('compactToolOutput', () => {
  it('passes short strings through', () => {
    expect(compactToolOutput('navigated')).toBe('navigated');
  });

  it('serializes objects as JSON', () => {
    expect(compactToolOutput({ content: [{ type: 'text', text: 'ok' }] })).toBe(
      '{"content":[{"type":"text","text":"ok"}]}',
    );
  });

  it('renders undefined as null', () => {
    expect(compactToolOutput(undefined)).toBe('null');
  });

  it('replaces image block payloads with a size marker', () => {
    const output = { content: [{ type: 'image', data: 'AAAABBBB', mimeType: 'image/png' }] };
    expect(compactToolOutput(output)).toBe(
      '{"content":[{"type":"image","data":"[image omitted: 8 base64 chars]","mimeType":"image/png"}]}',
    );
  });

  it('leaves a data field on a non-image block alone', () => {
    expect(compactToolOutput({ type: 'text', data: 'AAAA' })).toBe('{"type":"text","data":"AAAA"}');
  });

  it('strips inline data urls', () => {
    expect(compactToolOutput('see data:image/png;base64,AAAA== end')).toBe(
      'see [image omitted: 28 base64 chars] end',
    );
  });

  it('caps the text', () => {
    expect(compactToolOutput('x'.repeat(12), 10)).toBe('xxxxxxxxxx… [truncated 2 chars]');
  });
});

describe('truncate', () => {
  it('keeps text at the limit', () => {
    expect(truncate('abc', 3)).toBe('abc');
  });

  it('reports how much was cut', () => {
    expect(truncate('abcdef', 3)).toBe('abc… [truncated 3 chars]');
  });
});
