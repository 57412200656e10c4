import { z } from 'zod';

import { ConfigurationError, FrozenRegistryError } from '../../src/core/errors';
import { defineExtension } from '../../src/core/extension';
import { PipelineBuilder } from '../../src/core/pipeline';
import { wrapRule } from '../../src/core/rules';
import { renderDocument } from '../../src/core/serializer';
import { tilde } from '../../src/extensions/tilde';

const paren = defineExtension({
  name: 'paren',
  options: z.object({}).strict(),
  setup({ inline }) {
    inline.register('paren', wrapRule('paren', /\((.*)\)/, 'span'));
  },
});

function html(builder: PipelineBuilder, markdown: string): string {
  return renderDocument(builder.build().run(markdown));
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

describe('PipelineBuilder', () => {
  it('should register the built-in stages', () => {
    const builder = new PipelineBuilder();
    expect(builder.preprocessors.resolveNames()).toEqual(['normalize-newlines', 'expand-tabs']);
    expect(builder.postprocessors.resolveNames()).toEqual(['sanitize']);
  });

  it('should leave out the sanitizer when disabled', () => {
    expect(new PipelineBuilder({ sanitize: false }).postprocessors.size).toBe(0);
  });

  it('should reject invalid core options', () => {
    expect(() => new PipelineBuilder({ maxRecursionDepth: 0 })).toThrow(ConfigurationError);
  });

  it('should reject invalid plugin options', () => {
    expect(() => new PipelineBuilder().use(tilde, { delete: 'yes' })).toThrow(
      'Invalid configuration for "tilde": delete: Expected boolean, received string',
    );
  });

  it('should reject a plugin added twice', () => {
    const builder = new PipelineBuilder().use(tilde);
    expect(() => builder.use(tilde)).toThrow(ConfigurationError);
  });

  it('should freeze every registry on build', () => {
    const builder = new PipelineBuilder().use(tilde);
    builder.build();
    expect(() => builder.inline.register('late', wrapRule('late', /!(.)!/, 'b'))).toThrow(
      FrozenRegistryError,
    );
    expect(() => builder.use(paren)).toThrow(FrozenRegistryError);
  });
});

// ---------------------------------------------------------------------------
// Running
// ---------------------------------------------------------------------------

describe('Pipeline', () => {
  it('should return an empty document for blank input', () => {
    const document = new PipelineBuilder().build().run('  \n\t\n');
    expect(document.children).toEqual([]);
    expect(document.metadata).toEqual({ toc: [], warnings: [], data: {} });
  });

  it('should scan plugin inline rules inside paragraphs', () => {
    expect(html(new PipelineBuilder().use(tilde), 'H~2~O and ~~strike~~')).toBe(
      '<p>H<sub>2</sub>O and <del>strike</del></p>\n',
    );
  });

  it('should keep base syntax working inside plugin spans', () => {
    expect(html(new PipelineBuilder().use(tilde), '~~a **b**~~')).toBe(
      '<p><del>a <strong>b</strong></del></p>\n',
    );
  });

  it('should honour maxRecursionDepth and records a warning', () => {
    const pipeline = new PipelineBuilder({ maxRecursionDepth: 1 }).use(paren).build();
    const document = pipeline.run('((a))');
    expect(renderDocument(document)).toBe('<p><span><span>a</span></span></p>\n');
    expect(document.metadata.warnings).toEqual(['Inline nesting exceeded the maximum depth of 1']);
  });

  it('should sanitize raw HTML by default', () => {
    expect(html(new PipelineBuilder(), '<script>x</script>')).toBe('');
    expect(html(new PipelineBuilder({ sanitize: false }), '<script>x</script>')).toContain(
      '<script>x</script>',
    );
  });

  it('should be reusable for many documents', () => {
    const pipeline = new PipelineBuilder().use(tilde).build();
    const first = pipeline.run('~a~');
    const second = pipeline.run('~b~');
    expect(renderDocument(first)).toBe('<p><sub>a</sub></p>\n');
    expect(renderDocument(second)).toBe('<p><sub>b</sub></p>\n');
  });
});
