import { ConfigurationError } from '../../src/core/errors';
import { element, text } from '../../src/core/nodes';
import { PipelineBuilder } from '../../src/core/pipeline';
import { renderDocument } from '../../src/core/serializer';
import { superFences } from '../../src/extensions/super-fences';
import type { FenceFormatter } from '../../src/extensions/super-fences';

function run(markdown: string, config?: unknown) {
  return new PipelineBuilder().use(superFences, config).build().run(markdown);
}

function html(markdown: string, config?: unknown): string {
  return renderDocument(run(markdown, config));
}

// ---------------------------------------------------------------------------
// Code blocks
// ---------------------------------------------------------------------------

describe('superFences code blocks', () => {
  it('should tag the code with its language', () => {
    expect(html('```ts\nconst a = 1;\n```')).toBe(
      '<pre><code class="language-ts">const a = 1;</code></pre>\n',
    );
  });

  it('should render a fence without a language', () => {
    expect(html('~~~\nplain\n~~~')).toBe('<pre><code>plain</code></pre>\n');
  });

  it('should keep markup in the content as text', () => {
    expect(html('```\n<b>*x*</b>\n```')).toBe('<pre><code>&lt;b&gt;*x*&lt;/b&gt;</code></pre>\n');
  });

  it('should render prose on both sides of a fence', () => {
    expect(html('before\n```\ncode\n```\nafter')).toBe(
      '<p>before</p>\n<pre><code>code</code></pre>\n<p>after</p>\n',
    );
  });

  it('should close an unterminated fence with a warning', () => {
    const document = run('```py\nprint(1)');
    expect(renderDocument(document)).toBe('<pre><code class="language-py">print(1)</code></pre>\n');
    expect(document.metadata.warnings).toEqual([
      'Unterminated py block opened at line 1 was closed at end of input',
    ]);
  });
});

// ---------------------------------------------------------------------------
// Custom fences
// ---------------------------------------------------------------------------

describe('superFences custom fences', () => {
  const source = '```diagram\ngraph TB\n  a-->b\n```';

  it('should render a custom fence as pre by default', () => {
    expect(html(source, { customFences: [{ name: 'diagram' }] })).toBe(
      '<pre class="diagram"><code>graph TB\n  a--&gt;b</code></pre>\n',
    );
  });

  it('should render a custom fence as div', () => {
    expect(html(source, { customFences: [{ name: 'diagram', className: 'mermaid', format: 'div' }] })).toBe(
      '<div class="mermaid">graph TB\n  a--&gt;b</div>\n',
    );
  });

  it('should pass the block to a formatter function', () => {
    const figure: FenceFormatter = (block, className) => [
      element('figure', { class: className, 'data-info': block.info }, [text(block.content)]),
    ];
    expect(
      html('```chart title="Sales"\ndata\n```', { customFences: [{ name: 'chart', format: figure }] }),
    ).toBe('<figure class="chart" data-info="title=&quot;Sales&quot;">data</figure>');
  });

  it('should route every type through a wildcard fence', () => {
    expect(html('```math\nx^2\n```', { customFences: [{ name: '*', format: 'div' }] })).toBe(
      '<div class="math">x^2</div>\n',
    );
  });

  it('should prefer a named fence over the wildcard', () => {
    const config = {
      customFences: [
        { name: '*', format: 'div' },
        { name: 'diagram', className: 'graph' },
      ],
    };
    expect(html('```diagram\nA\n```\n```py\nB\n```', config)).toBe(
      '<pre class="graph"><code>A</code></pre>\n<div class="py">B</div>\n',
    );
  });

  it('should reject duplicate custom fence names', () => {
    const config = { customFences: [{ name: 'diagram' }, { name: 'diagram', format: 'div' }] };
    expect(() => new PipelineBuilder().use(superFences, config)).toThrow(
      'Invalid configuration for "superFences": customFences.1.name: duplicate custom fence "diagram"',
    );
  });

  it('should reject an unknown format', () => {
    expect(() =>
      new PipelineBuilder().use(superFences, { customFences: [{ name: 'x', format: 'svg' }] }),
    ).toThrow(ConfigurationError);
  });
});
