import { createDocument, element, raw, text } from '../../src/core/nodes';
import {
  escapeHtml,
  renderDocument,
  renderNodes,
  toPlainText,
  unescapeHtml,
} from '../../src/core/serializer';

// ---------------------------------------------------------------------------
// Escaping
// ---------------------------------------------------------------------------

describe('escapeHtml', () => {
  it('should escape the five special characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
    );
  });

  it('should leave other text alone', () => {
    expect(escapeHtml('plain text 123')).toBe('plain text 123');
  });

  it('should be reversed by unescapeHtml', () => {
    const input = `1 < 2 && "quoted" 'single' > 0`;
    expect(unescapeHtml(escapeHtml(input))).toBe(input);
  });

  it('should unescape only the basic entities', () => {
    expect(unescapeHtml('&lt;b&gt; &copy; &amp;amp;')).toBe('<b> &copy; &amp;');
  });
});

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

describe('renderNodes', () => {
  it('should serialize a text-only document to the escaped input', () => {
    const input = 'if a < b && c > d then "x"';
    expect(renderDocument(createDocument([text(input)]))).toBe(escapeHtml(input));
  });

  it('should escape text but not markup', () => {
    const html = renderNodes([element('p', {}, [text('<b>'), element('b', {}, [text('bold')])])]);
    expect(html).toBe('<p>&lt;b&gt;<b>bold</b></p>\n');
  });

  it('should emit raw nodes verbatim', () => {
    expect(renderNodes([raw('<span>ok</span>'), text('&')])).toBe('<span>ok</span>&amp;');
  });

  it('should escape attribute values', () => {
    expect(renderNodes([element('a', { href: '/x?a=1&b="2"' }, [text('go')])])).toBe(
      '<a href="/x?a=1&amp;b=&quot;2&quot;">go</a>',
    );
  });

  it('should render void elements without a closing tag', () => {
    expect(renderNodes([element('img', { src: 'a.png', alt: '' })])).toBe('<img src="a.png" alt="" />');
    expect(renderNodes([element('hr')])).toBe('<hr />\n');
  });

  it('should end block elements with a newline', () => {
    const nodes = [
      element('ul', {}, [element('li', {}, [text('one')]), element('li', {}, [text('two')])]),
    ];
    expect(renderNodes(nodes)).toBe('<ul><li>one</li>\n<li>two</li>\n</ul>\n');
  });
});

// ---------------------------------------------------------------------------
// Plain text
// ---------------------------------------------------------------------------

describe('toPlainText', () => {
  it('should separate blocks with newlines and drops markup', () => {
    const nodes = [
      element('h1', {}, [text('Title')]),
      element('p', {}, [text('a '), element('strong', {}, [text('b')]), element('br'), text('c')]),
      raw('<span>hidden</span>'),
    ];
    expect(toPlainText(nodes)).toBe('Title\na b\nc');
  });

  it('should collapse runs of blank lines', () => {
    const nodes = [
      element('div', {}, [element('p', {}, [text('x')])]),
      element('p'),
      element('p', {}, [text('y')]),
    ];
    expect(toPlainText(nodes)).toBe('x\n\ny');
  });
});
