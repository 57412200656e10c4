/**
 * Core module barrel exports.
 *
 * Re-exports the registry, scanner, block parser, tree builder,
 * postprocessor and serializer, together with the plugin contract.
 *
 * @module core
 */

// Registry
export { DEFAULT_PRIORITY, Registry } from './registry.js';
export type { Anchor, RegisterOptions } from './registry.js';

// Inline scanning
export { DEFAULT_MAX_DEPTH, InlineScanner, pushText } from './inline-scanner.js';
export type { ScanState, ScanStep, ScannerOptions } from './inline-scanner.js';
export { patternFinder, patternRule, wrapRule } from './rules.js';
export type { PatternRuleOptions } from './rules.js';
export { InlineBridge, PLUGIN_TOKEN_TYPE } from './marked-bridge.js';

// Block parsing
export { BlockParser, dedent, indentOf } from './block-parser.js';

// Tree building
export { TreeBuilder } from './tree-builder.js';
export type { BlockRenderer, BuildContext, TreeBuilderOptions } from './tree-builder.js';
export {
  addClass,
  classList,
  createDocument,
  element,
  emptyMetadata,
  isElement,
  raw,
  text,
  textContent,
  walkElements,
} from './nodes.js';

// Pre- and postprocessing
export {
  expandTabs,
  expandTabsPreprocessor,
  normalizeNewlines,
  normalizeNewlinesPreprocessor,
  preprocessMarkdown,
} from './preprocessor.js';
export { Postprocessor } from './postprocessor.js';
export { DANGEROUS_TAGS, sanitizeHtml, sanitizePass } from './sanitizer.js';

// Serializer
export { escapeHtml, renderDocument, renderNodes, toPlainText, unescapeHtml } from './serializer.js';

// Pipeline and plugins
export { Pipeline, PipelineBuilder, SANITIZE_PRIORITY } from './pipeline.js';
export { defineExtension } from './extension.js';
export type { Extension, SetupContext } from './extension.js';
export { coreOptionsSchema, parseOptions } from './config.js';
export type { CoreOptions, CoreOptionsInput } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

// Errors
export {
  ConfigurationError,
  CyclicConstraintError,
  DuplicateNameError,
  FrozenRegistryError,
  PipelineError,
  RecursionLimitError,
  UnknownAnchorError,
} from './errors.js';

// Types
export type {
  Block,
  BlockOpen,
  BlockSyntax,
  ContainerBlock,
  Document,
  DocumentMetadata,
  ElementNode,
  InlineContext,
  InlineMatch,
  InlineResult,
  InlineRule,
  ParsedDocument,
  PassContext,
  PostprocessorPass,
  Preprocessor,
  RawBlock,
  RawNode,
  TextBlock,
  TextNode,
  TocEntry,
  TokenNode,
} from './types.js';
