import { ConfigurationError } from './core/errors.js';
import { textContent, walkElements } from './core/nodes.js';
import { PipelineBuilder } from './core/pipeline.js';
import type { Pipeline } from './core/pipeline.js';
import { renderDocument, toPlainText } from './core/serializer.js';
import type { Document } from './core/types.js';
import { bundledExtensions } from './extensions/index.js';
import type { ConvertOptions, ConvertResult, ConverterOptions } from './types.js';

/**
 * Count words in a plain text string.
 *
 * Handles both Latin/ASCII words (split on whitespace) and CJK characters
 * (each CJK character counts as one word).
 */
function countWords(text: string): number {
  if (!text.trim()) {
    return 0;
  }

  const cjkRegex = /[\u3000-\u9fff\uf900-\ufaff\u{20000}-\u{2fa1f}]/gu;
  const cjkMatches = text.match(cjkRegex);
  const cjkCount = cjkMatches ? cjkMatches.length : 0;

  const withoutCjk = text.replace(cjkRegex, ' ');
  const latinWords = withoutCjk.split(/\s+/).filter((w) => w.length > 0);

  return latinWords.length + cjkCount;
}

/**
 * Text of the first level 1 or 2 heading, if any.
 */
function extractTitle(document: Document): string | undefined {
  let title: string | undefined;
  walkElements(document.children, (node) => {
    if (title === undefined && (node.tag === 'h1' || node.tag === 'h2')) {
      title = textContent(node.children).trim();
    }
  });
  return title;
}

/**
 * A configured Markdown converter.
 *
 * Plugins are set up once in the constructor; afterwards the converter only
 * reads its registries, so one instance can be reused for every document.
 */
export class Converter {
  readonly pipeline: Pipeline;

  constructor(options: ConverterOptions = {}) {
    const { extensions = bundledExtensions(), extensionConfigs = {}, ...core } = options;

    const known = new Set(extensions.map((extension) => extension.name));
    const unknown = Object.keys(extensionConfigs).filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        'extensionConfigs',
        unknown.map((name) => `${name}: no such extension is enabled`),
      );
    }

    const builder = new PipelineBuilder(core);
    for (const extension of extensions) {
      builder.use(extension, extensionConfigs[extension.name]);
    }
    this.pipeline = builder.build();
  }

  /**
   * Convert markdown to HTML.
   *
   * Runs the full pipeline:
   * 1. Preprocess the text (newlines, tabs, snippets)
   * 2. Parse blocks (fences, directives, prose)
   * 3. Build the token tree, scanning inline syntax
   * 4. Postprocess (plugin passes, sanitizer)
   * 5. Serialize to HTML and plain text
   *
   * @example
   * ```ts
   * const converter = new Converter();
   * converter.convert({ markdown: 'H~2~O' }).html;
   * // => '<p>H<sub>2</sub>O</p>\n'
   * ```
   */
  convert(options: ConvertOptions): ConvertResult {
    const { markdown, title } = options;
    const document = this.pipeline.run(markdown);

    const html = renderDocument(document);
    const plainText = toPlainText(document.children);
    const { toc, warnings, data } = document.metadata;

    return {
      html,
      plainText,
      metadata: {
        title: title ?? extractTitle(document) ?? 'Untitled',
        wordCount: countWords(plainText),
        toc,
        warnings,
        data,
      },
    };
  }
}

/**
 * Create a converter. Invalid plugin options throw here, before any
 * document is converted.
 */
export function createConverter(options?: ConverterOptions): Converter {
  return new Converter(options);
}

/**
 * One-shot conversion with a freshly configured converter.
 */
export function convertToHtml(options: ConvertOptions & ConverterOptions): ConvertResult {
  const { markdown, title, ...converterOptions } = options;
  return new Converter(converterOptions).convert({ markdown, title });
}
