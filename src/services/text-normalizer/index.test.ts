import { describe, it, expect } from 'vitest';
import { toText, collapseWhitespace } from './index.js';

const PAGE = `<!doctype html>
<html>
  <head><title>Acme</title><style>body { color: red; }</style></head>
  <body>
    <nav><a href="/">Home</a><a href="/shop">Shop</a></nav>
    <p>Hello</p><p>World</p>
    <script>window.track()</script>
    <footer>© 2023 Acme Ltd</footer>
  </body>
</html>`;

describe('collapseWhitespace', () => {
  it('collapses runs and trims', () => {
    expect(collapseWhitespace('  a \n\t b  ')).toBe('a b');
  });
});

describe('toText', () => {
  it('drops head, navigation and scripts but keeps the footer', () => {
    expect(toText(PAGE)).toBe('Hello World © 2023 Acme Ltd');
  });

  it('keeps adjacent blocks apart', () => {
    expect(toText('<div>One</div><div>Two</div>')).toBe('One Two');
  });

  it('decodes entities', () => {
    expect(toText('<p>Smith &amp; Sons &copy; 2020</p>')).toBe('Smith & Sons © 2020');
  });

  it('tolerates unclosed tags', () => {
    expect(toText('<div><p>Unclosed <b>tags')).toBe('Unclosed tags');
  });

  it('returns plain text with whitespace collapsed', () => {
    expect(toText('  Already\nplain   text ')).toBe('Already plain text');
  });

  it('returns an empty string for empty input', () => {
    expect(toText('')).toBe('');
  });

  it('keeps decoding until escaped markup and entities are gone', () => {
    expect(toText('<p>Use &lt;b&gt;bold&lt;/b&gt; tags</p>')).toBe('Use bold tags');
    expect(toText('<p>Write &amp;copy; for the sign</p>')).toBe('Write © for the sign');
    expect(toText('<p>a &amp;nbsp; b</p>')).toBe('a b');
  });

  it('is idempotent', () => {
    const inputs = [
      PAGE,
      '<p>Smith &amp; Sons</p>',
      'plain',
      '<div><p>Unclosed <b>tags',
      '<p>Use &lt;b&gt;bold&lt;/b&gt; tags</p>',
      '<p>Write &amp;copy; for the sign</p>',
      '<p>a &amp;nbsp; b</p>',
      '<p>&amp;lt;i&amp;gt;nested&amp;lt;/i&amp;gt;</p>',
    ];
    for (const input of inputs) {
      const once = toText(input);
      expect(toText(once)).toBe(once);
    }
  });
});
