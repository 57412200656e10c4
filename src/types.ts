import type { CoreOptionsInput } from './core/config.js';
import type { Extension } from './core/extension.js';
import type { TocEntry } from './core/types.js';

/**
 * Options for creating a converter.
 */
export interface ConverterOptions extends CoreOptionsInput {
  /** Plugins to enable, in setup order. Defaults to every bundled plugin. */
  extensions?: Extension[];
  /** Plugin options keyed by plugin name. */
  extensionConfigs?: Record<string, unknown>;
}

/**
 * Options for a single conversion.
 */
export interface ConvertOptions {
  /** Source markdown string */
  markdown: string;
  /** Document title; defaults to the first level 1 or 2 heading */
  title?: string;
}

/**
 * Metadata about the converted document.
 */
export interface ConvertMetadata {
  /** Document title (from options or the first heading) */
  title: string;
  /** Approximate word count of the rendered text */
  wordCount: number;
  /** Headings collected by the table-of-contents pass */
  toc: TocEntry[];
  /** Content problems that were degraded rather than reported as errors */
  warnings: string[];
  /** Values contributed by plugins, keyed by plugin name */
  data: Record<string, unknown>;
}

/**
 * Result of the conversion pipeline.
 */
export interface ConvertResult {
  /** Rendered HTML */
  html: string;
  /** Plain text version of the document */
  plainText: string;
  /** Document metadata */
  metadata: ConvertMetadata;
}
