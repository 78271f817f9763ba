import { describe, it, expect } from 'vitest';
import { escapeHtml, unescapeHtml } from './html';

describe('escapeHtml', () => {
  it('escapes markup and quotes', () => {
    expect(escapeHtml('a < b & "c" > d')).toBe('a &lt; b &amp; &quot;c&quot; &gt; d');
  });
});

describe('unescapeHtml', () => {
  it('reverses escapeHtml', () => {
    expect(unescapeHtml('a &lt; b &amp; &quot;c&quot; &gt; d')).toBe('a < b & "c" > d');
  });

  it('decodes an escaped entity only once', () => {
    expect(unescapeHtml('&amp;lt;')).toBe('&lt;');
  });
});
