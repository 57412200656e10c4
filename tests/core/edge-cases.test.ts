/**
 * Integration tests for edge cases that span the full pipeline
 * (preprocessor -> block parser -> tree builder -> postprocessor -> serializer).
 */
import { createConverter } from '../../src/converter';

const converter = createConverter();

function fullPipeline(markdown: string): string {
  return converter.convert({ markdown }).html;
}

describe('Edge cases - full pipeline', () => {
  describe('code blocks with markdown syntax', () => {
    it('should not render markdown inside fenced code blocks', () => {
      expect(fullPipeline('```\n# Not a heading\n**not bold**\n```')).toBe(
        '<pre><code># Not a heading\n**not bold**</code></pre>\n',
      );
    });

    it('should preserve code block indentation', () => {
      expect(fullPipeline('```\n  indented\n    more\n```')).toBe(
        '<pre><code>  indented\n    more</code></pre>\n',
      );
    });

    it('should not scan plugin syntax inside code spans', () => {
      expect(fullPipeline('`~~x~~ ==y==`')).toBe('<p><code>~~x~~ ==y==</code></p>\n');
    });
  });

  describe('indented code blocks', () => {
    it('should handle 4-space indented code blocks', () => {
      expect(fullPipeline('    code')).toBe('<pre><code>code</code></pre>\n');
    });
  });

  describe('line endings and blank lines', () => {
    it('should normalize Windows line endings', () => {
      expect(fullPipeline('a\r\nb')).toBe('<p>a\nb</p>\n');
    });

    it('should collapse excessive blank lines', () => {
      expect(fullPipeline('a\n\n\n\n\nb')).toBe('<p>a</p>\n<p>b</p>\n');
    });
  });

  describe('unterminated blocks', () => {
    it('should close every open block and warn innermost first', () => {
      const result = converter.convert({ markdown: '::: {details} S\n```\ncode' });
      expect(result.html).toBe('<details><summary>S</summary>\n<pre><code>code</code></pre>\n</details>\n');
      expect(result.metadata.warnings).toEqual([
        'Unterminated fence block opened at line 2 was closed at end of input',
        'Unterminated details block opened at line 1 was closed at end of input',
      ]);
    });
  });

  describe('blocks closed by an enclosing block', () => {
    it('should end an indented inner directive at the outer close marker', () => {
      const result = converter.convert({ markdown: '::: {note}\n  ::: {tip}\n  inner\n:::\nafter' });
      expect(result.html).toBe(
        '<div class="admonition note"><p class="admonition-title">Note</p>\n' +
          '<div class="admonition tip"><p class="admonition-title">Tip</p>\n<p>inner</p>\n</div>\n' +
          '</div>\n<p>after</p>\n',
      );
      expect(result.metadata.warnings).toEqual([
        'Unterminated tip block opened at line 2 was closed at line 4',
      ]);
    });

    it('should end an unterminated fence at the directive close marker', () => {
      const result = converter.convert({ markdown: '::: {note}\n```\ncode\n:::\nafter' });
      expect(result.html).toBe(
        '<div class="admonition note"><p class="admonition-title">Note</p>\n' +
          '<pre><code>code</code></pre>\n</div>\n<p>after</p>\n',
      );
      expect(result.metadata.warnings).toEqual([
        'Unterminated fence block opened at line 2 was closed at line 4',
      ]);
    });
  });

  describe('fences inside list items', () => {
    it('should keep an indented fence in a loose list item', () => {
      const markdown = ['- one', '', '    ```js', '    code', '    ```', '- two'].join('\n');
      expect(fullPipeline(markdown)).toBe(
        '<ul><li><p>one</p>\n<pre><code class="language-js">code</code></pre>\n</li>\n' +
          '<li><p>two</p>\n</li>\n</ul>\n',
      );
    });

    it('should keep an indented fence in a tight list item', () => {
      const markdown = ['- one', '  ```js', '  code', '  ```', '- two'].join('\n');
      expect(fullPipeline(markdown)).toBe(
        '<ul><li>one<pre><code class="language-js">code</code></pre>\n</li>\n<li>two</li>\n</ul>\n',
      );
    });

    it('should still lift a fence that follows a plain paragraph', () => {
      expect(fullPipeline('para\n\n  ```\n  x\n  ```')).toBe('<p>para</p>\n<pre><code>x</code></pre>\n');
    });
  });

  describe('performance', () => {
    it('should handle large input within 5 seconds', () => {
      const markdown = Array.from({ length: 2000 }, (_, i) => `Line ${i} **bold** ~~gone~~ H~2~O`).join('\n\n');
      const start = Date.now();
      const html = fullPipeline(markdown);
      expect(Date.now() - start).toBeLessThan(5000);
      expect(html.split('<del>gone</del>')).toHaveLength(2001);
    });
  });

  describe('deeply nested structures', () => {
    it('should handle 10-level nested lists', () => {
      const markdown = Array.from({ length: 10 }, (_, i) => `${'  '.repeat(i)}- item`).join('\n');
      expect(fullPipeline(markdown).split('<ul>')).toHaveLength(11);
    });

    it('should handle 5-level nested blockquotes', () => {
      expect(fullPipeline('> > > > > deep').split('<blockquote>')).toHaveLength(6);
    });

    it('should handle directives nested four levels deep', () => {
      const markdown = [
        '::::::: {note}',
        ':::::: {note}',
        '::::: {note}',
        '::: {note}',
        'core',
        ':::',
        ':::::',
        '::::::',
        ':::::::',
      ].join('\n');
      expect(fullPipeline(markdown).split('<div class="admonition note">')).toHaveLength(5);
    });
  });
});
