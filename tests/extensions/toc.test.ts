import { PipelineBuilder } from '../../src/core/pipeline';
import { renderDocument } from '../../src/core/serializer';
import type { Document } from '../../src/core/types';
import { blocks } from '../../src/extensions/blocks';
import { slugify, toc, uniqueId } from '../../src/extensions/toc';

function run(markdown: string, config?: unknown): Document {
  return new PipelineBuilder().use(toc, config).build().run(markdown);
}

describe('slugify', () => {
  it('should drop accents and punctuation', () => {
    expect(slugify('Héllo, World!')).toBe('hello-world');
  });

  it('should join whitespace and hyphens with the separator', () => {
    expect(slugify(' a  b--c ', '_')).toBe('a_b_c');
  });
});

describe('uniqueId', () => {
  it('should append a counter to taken ids', () => {
    const used = new Set(['a']);
    expect(uniqueId('a', used)).toBe('a_1');
    expect(uniqueId('a', used)).toBe('a_2');
    expect(uniqueId('b', used)).toBe('b');
    expect([...used]).toEqual(['a', 'a_1', 'a_2', 'b']);
  });
});

describe('toc', () => {
  const source = '# Hello World\n## Hello World\n### Use `code` here';

  it('should give headings unique ids and collects entries', () => {
    const document = run(source);
    expect(renderDocument(document)).toBe(
      '<h1 id="hello-world">Hello World</h1>\n' +
        '<h2 id="hello-world_1">Hello World</h2>\n' +
        '<h3 id="use-code-here">Use <code>code</code> here</h3>\n',
    );
    expect(document.metadata.toc).toEqual([
      { level: 1, id: 'hello-world', text: 'Hello World' },
      { level: 2, id: 'hello-world_1', text: 'Hello World' },
      { level: 3, id: 'use-code-here', text: 'Use code here' },
    ]);
  });

  it('should list only the configured levels', () => {
    const document = run(source, { minLevel: 2, maxLevel: 2 });
    expect(document.metadata.toc).toEqual([{ level: 2, id: 'hello-world_1', text: 'Hello World' }]);
    expect(renderDocument(document)).toContain('<h1 id="hello-world">');
  });

  it('should fall back to a generic id', () => {
    expect(renderDocument(run('# !!!'))).toBe('<h1 id="section">!!!</h1>\n');
  });

  it('should add permalinks', () => {
    expect(renderDocument(run('# Title', { permalink: true }))).toBe(
      '<h1 id="title">Title<a class="headerlink" href="#title" title="Permanent link">¶</a></h1>\n',
    );
  });

  it('should use custom permalink text', () => {
    expect(renderDocument(run('# Title', { permalink: '#', permalinkTitle: 'Link' }))).toBe(
      '<h1 id="title">Title<a class="headerlink" href="#title" title="Link">#</a></h1>\n',
    );
  });

  it('should avoid ids used by other elements', () => {
    const document = new PipelineBuilder()
      .use(blocks)
      .use(toc)
      .build()
      .run('::: {html} div#intro\nx\n:::\n# Intro');
    expect(renderDocument(document)).toBe(
      '<div id="intro"><p>x</p>\n</div>\n<h1 id="intro_1">Intro</h1>\n',
    );
  });

  it('should reject an inverted level range', () => {
    expect(() => new PipelineBuilder().use(toc, { minLevel: 4, maxLevel: 2 })).toThrow(
      'Invalid configuration for "toc": minLevel: minLevel must not exceed maxLevel',
    );
  });
});
