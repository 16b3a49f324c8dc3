import { describe, expect, it } from 'vitest';
import { TextSanitizer } from './TextSanitizer';

describe('TextSanitizer', () => {
  const sanitizer = new TextSanitizer();

  describe('sanitize', () => {
    it('returns the plain body verbatim when one exists', () => {
      expect(sanitizer.sanitize('Hello <b>world</b>', '<p>ignored</p>')).toBe('Hello <b>world</b>');
    });

    it('falls back to cleaned HTML when the plain body is empty', () => {
      expect(sanitizer.sanitize('', '<p>Hi</p>')).toBe('Hi');
    });

    it('returns an empty string when neither body exists', () => {
      expect(sanitizer.sanitize(undefined, undefined)).toBe('');
    });
  });

  describe('clean (display)', () => {
    it('reduces a styled HTML fragment to its text', () => {
      expect(sanitizer.clean('<p>Hi&nbsp;there</p><style>.a{color:red}</style>')).toBe('Hi there');
    });

    it('drops style and script contents across lines and letter case', () => {
      const html = '<div>Visible</div><script type="text/javascript">var secret = 1;</script><STYLE>\nbody { color: blue; }\n</STYLE>';
      const cleaned = sanitizer.clean(html);

      expect(cleaned).toBe('Visible');
      expect(cleaned).not.toContain('secret');
    });

    it('decodes the named entity table', () => {
      const html = '<p>Tom &amp; Jerry &lt;3 &quot;cheese&quot; &mdash; it&#39;s&hellip;</p>';
      expect(sanitizer.clean(html)).toBe('Tom & Jerry <3 "cheese" — it\'s...');
    });

    it('leaves copyright entities alone outside the index path', () => {
      expect(sanitizer.clean('Acme &copy; 2024 &reg;')).toBe('Acme &copy; 2024 &reg;');
    });

    it('removes CSS declarations and the braces left behind', () => {
      const text = '<div>Hello</div>\n.header { font-size: 12px; color: red; }\nGoodbye';
      expect(sanitizer.clean(text)).toBe('Hello .header Goodbye');
    });

    it('removes CSS comments', () => {
      expect(sanitizer.clean('<p>Keep</p>/* css note */ this')).toBe('Keep this');
    });

    it('is idempotent on its own output', () => {
      const html = '<html><head><style>p{margin:0}</style></head><body><p>Quarterly   report</p>\n<p>is ready</p></body></html>';
      const once = sanitizer.clean(html);

      expect(once).toBe('Quarterly report is ready');
      expect(sanitizer.clean(once)).toBe(once);
    });
  });

  describe('clean (index)', () => {
    it('decodes copyright entities and drops standalone numbers', () => {
      expect(sanitizer.clean('Acme &copy; 2024 &reg;', 'index')).toBe('Acme (c) (R)');
    });

    it('strips a leading number', () => {
      expect(sanitizer.clean('42 items shipped', 'index')).toBe('items shipped');
    });

    it('removes CSS at-rules', () => {
      expect(sanitizer.clean('Promo @media screen { .x }\nends', 'index')).toBe('Promo ends');
    });

    it('keeps only the newest message of a quoted reply chain', () => {
      const body = 'Sounds good, see you there.\n\n> Are we still on for lunch?\n> Let me know';
      const cleaned = sanitizer.clean(body, 'index');

      expect(cleaned).toBe('Sounds good, see you there.');
      expect(cleaned).not.toContain('lunch');
    });

    it('drops everything after an "On ... wrote:" header', () => {
      const body = 'Thanks for the update.\n\nOn Monday, Alice Smith wrote:\n> Original question here\n> second line';
      const cleaned = sanitizer.clean(body, 'index');

      expect(cleaned).toMatch(/^Thanks for the update\./);
      expect(cleaned).not.toContain('Original question');
    });

    it('is idempotent on its own output', () => {
      const once = sanitizer.clean('<p>Quarterly report is ready</p>', 'index');
      expect(sanitizer.clean(once, 'index')).toBe(once);
    });
  });
});
