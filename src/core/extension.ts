/**
 * Plugin contract.
 *
 * A plugin declares its options schema and a `setup` function that adds
 * rules, syntaxes, renderers and passes to the registries it is given.
 * Setup runs once, before the registries are frozen.
 *
 * @module core/extension
 */
import type { z } from 'zod';

import type { Logger } from './logger.js';
import type { Registry } from './registry.js';
import type { BlockRenderer } from './tree-builder.js';
import type {
  BlockSyntax,
  InlineRule,
  PostprocessorPass,
  Preprocessor,
} from './types.js';

/** Registries a plugin can extend during setup. */
export interface SetupContext {
  inline: Registry<InlineRule>;
  blockSyntaxes: Registry<BlockSyntax>;
  /** Renderers for blocks, keyed by the name of the syntax that opened them. */
  blockRenderers: Registry<BlockRenderer>;
  preprocessors: Registry<Preprocessor>;
  postprocessors: Registry<PostprocessorPass>;
  logger: Logger;
}

export interface Extension<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  options: S;
  setup(context: SetupContext, options: z.output<S>): void;
}

/**
 * Identity helper that keeps the options type tied to the schema.
 */
export function defineExtension<S extends z.ZodTypeAny>(extension: Extension<S>): Extension<S> {
  return extension;
}
