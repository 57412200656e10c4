/**
 * Pipeline assembly.
 *
 * Setup happens in two phases. While a {@link PipelineBuilder} is open,
 * plugins register rules into its registries. {@link PipelineBuilder.build}
 * freezes every registry, resolves their order once, and returns a
 * {@link Pipeline} that only reads them. A pipeline holds no per-document
 * state, so one instance can serve any number of conversions.
 *
 * @module core/pipeline
 */
import type { z } from 'zod';

import { BlockParser } from './block-parser.js';
import { coreOptionsSchema, parseOptions } from './config.js';
import type { CoreOptions, CoreOptionsInput } from './config.js';
import { ConfigurationError } from './errors.js';
import type { Extension, SetupContext } from './extension.js';
import { InlineScanner } from './inline-scanner.js';
import { createLogger } from './logger.js';
import { emptyMetadata } from './nodes.js';
import { Postprocessor } from './postprocessor.js';
import {
  expandTabsPreprocessor,
  normalizeNewlinesPreprocessor,
  preprocessMarkdown,
} from './preprocessor.js';
import { Registry } from './registry.js';
import { sanitizePass } from './sanitizer.js';
import { TreeBuilder } from './tree-builder.js';
import type { BlockRenderer } from './tree-builder.js';
import type {
  BlockSyntax,
  Document,
  InlineRule,
  ParsedDocument,
  PassContext,
  PostprocessorPass,
  Preprocessor,
} from './types.js';

const log = createLogger('pipeline');

/** Priority of the built-in sanitizer pass; plugin passes default to 100. */
export const SANITIZE_PRIORITY = 900;

export class PipelineBuilder {
  readonly inline = new Registry<InlineRule>('inline rules');
  readonly blockSyntaxes = new Registry<BlockSyntax>('block syntaxes');
  readonly blockRenderers = new Registry<BlockRenderer>('block renderers');
  readonly preprocessors = new Registry<Preprocessor>('preprocessors');
  readonly postprocessors = new Registry<PostprocessorPass>('postprocessors');
  readonly options: CoreOptions;
  private readonly extensions = new Set<string>();

  constructor(options: CoreOptionsInput = {}) {
    this.options = parseOptions('core', coreOptionsSchema, options);
    this.preprocessors.register(normalizeNewlinesPreprocessor.name, normalizeNewlinesPreprocessor, {
      priority: 0,
    });
    const expandTabs = expandTabsPreprocessor(this.options.tabLength);
    this.preprocessors.register(expandTabs.name, expandTabs, { priority: 10 });
    if (this.options.sanitize) {
      this.postprocessors.register(sanitizePass.name, sanitizePass, { priority: SANITIZE_PRIORITY });
    }
  }

  /**
   * Validate a plugin's options and run its setup.
   *
   * @throws {@link ConfigurationError} for invalid options or a plugin
   *   that was already added.
   */
  use<S extends z.ZodTypeAny>(extension: Extension<S>, config?: unknown): this {
    const options = parseOptions(extension.name, extension.options, config);
    if (this.extensions.has(extension.name)) {
      throw new ConfigurationError(extension.name, ['extension was added more than once']);
    }
    this.extensions.add(extension.name);

    const context: SetupContext = {
      inline: this.inline,
      blockSyntaxes: this.blockSyntaxes,
      blockRenderers: this.blockRenderers,
      preprocessors: this.preprocessors,
      postprocessors: this.postprocessors,
      logger: createLogger(`ext:${extension.name}`),
    };
    extension.setup(context, options);
    log('set up %s', extension.name);
    return this;
  }

  /**
   * Freeze the registries and assemble the pipeline.
   */
  build(): Pipeline {
    const registries = [
      this.inline,
      this.blockSyntaxes,
      this.blockRenderers,
      this.preprocessors,
      this.postprocessors,
    ];
    for (const registry of registries) {
      registry.freeze();
    }

    const renderers = new Map<string, BlockRenderer>();
    for (const name of this.blockRenderers.resolveNames()) {
      const renderer = this.blockRenderers.get(name);
      if (renderer) renderers.set(name, renderer);
    }

    log('inline order: %o', this.inline.resolveNames());
    return new Pipeline(this.options, {
      preprocessors: this.preprocessors.resolveOrder(),
      inline: this.inline.resolveOrder(),
      blockSyntaxes: this.blockSyntaxes.resolveOrder(),
      renderers,
      postprocessors: this.postprocessors.resolveOrder(),
    });
  }
}

interface ResolvedStages {
  preprocessors: Preprocessor[];
  inline: InlineRule[];
  blockSyntaxes: BlockSyntax[];
  renderers: Map<string, BlockRenderer>;
  postprocessors: PostprocessorPass[];
}

/**
 * Assembled, read-only pipeline: preprocess -> block parse -> build
 * (inline scan) -> postprocess. Serialization is left to the caller.
 */
export class Pipeline {
  readonly scanner: InlineScanner;
  readonly parser: BlockParser;
  readonly builder: TreeBuilder;
  readonly postprocessor: Postprocessor;
  private readonly preprocessors: Preprocessor[];

  constructor(
    readonly options: CoreOptions,
    stages: ResolvedStages,
  ) {
    this.preprocessors = stages.preprocessors;
    this.scanner = new InlineScanner(stages.inline, { maxDepth: options.maxRecursionDepth });
    this.parser = new BlockParser(stages.blockSyntaxes);
    this.builder = new TreeBuilder({
      scanner: this.scanner,
      parser: this.parser,
      renderers: stages.renderers,
      gfm: options.gfm,
      breaks: options.breaks,
    });
    this.postprocessor = new Postprocessor(stages.postprocessors);
  }

  /** Run the preprocessors and the block parser. */
  parse(markdown: string, warnings: string[] = []): ParsedDocument {
    const context: PassContext = { warn: (message) => warnings.push(message) };
    const source = preprocessMarkdown(markdown, this.preprocessors, context);
    if (source.trim().length === 0) {
      return { blocks: [] };
    }
    return this.parser.parse(source.split('\n'), warnings);
  }

  /** Convert Markdown into a postprocessed document. */
  run(markdown: string): Document {
    const metadata = emptyMetadata();
    const parsed = this.parse(markdown, metadata.warnings);
    const document = this.builder.build(parsed, metadata);
    return this.postprocessor.process(document);
  }
}
