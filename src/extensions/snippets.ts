/**
 * Snippet inclusion.
 *
 * ```markdown
 * --8<-- "license.md"
 *
 * --8<--
 * header.md
 * footer.md
 * --8<--
 * ```
 *
 * Snippet text comes from a host supplied {@link SnippetSource}. Included
 * snippets are expanded in turn, up to `maxDepth` levels. A missing or
 * circular snippet is reported as a warning and its line dropped. Prefix
 * a marker with `;` to keep it literally.
 *
 * @module extensions/snippets
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import type { Logger } from '../core/logger.js';
import type { PassContext } from '../core/types.js';

/** Supplies snippet text by name. */
export interface SnippetSource {
  read(name: string): string | undefined;
}

/** A source backed by a plain object. */
export function snippetsFrom(entries: Readonly<Record<string, string>>): SnippetSource {
  const map = new Map(Object.entries(entries));
  return { read: (name) => map.get(name) };
}

const SINGLE_RE = /^([ \t]*)(;?)--8<--[ \t]+(["'])(.+?)\3[ \t]*$/;
const BLOCK_RE = /^([ \t]*)(;?)--8<--[ \t]*$/;

function isSnippetSource(value: unknown): value is SnippetSource {
  return typeof value === 'object' && value !== null && 'read' in value && typeof value.read === 'function';
}

const options = z
  .object({
    source: z
      .custom<SnippetSource>(isSnippetSource, { message: 'source must have a read(name) function' })
      .default(() => snippetsFrom({})),
    /** How many levels of snippets may include further snippets. */
    maxDepth: z.number().int().min(1).max(64).default(8),
  })
  .strict();

class SnippetExpander {
  constructor(
    private readonly source: SnippetSource,
    private readonly maxDepth: number,
    private readonly context: PassContext,
    private readonly log: Logger,
  ) {}

  expand(lines: readonly string[], stack: readonly string[]): string[] {
    const out: string[] = [];
    let blockIndent: string | null = null;

    for (const line of lines) {
      if (blockIndent !== null) {
        const end = BLOCK_RE.exec(line);
        if (end && !end[2]) {
          blockIndent = null;
          continue;
        }
        const name = line.trim();
        if (name && !name.startsWith(';')) {
          out.push(...this.include(name, blockIndent, stack));
        }
        continue;
      }

      const single = SINGLE_RE.exec(line);
      if (single) {
        const [, indent, escape, , name] = single;
        if (escape) {
          out.push(indent + line.slice(indent.length + 1));
        } else {
          out.push(...this.include(name.trim(), indent, stack));
        }
        continue;
      }

      const block = BLOCK_RE.exec(line);
      if (block) {
        const [, indent, escape] = block;
        if (escape) {
          out.push(indent + line.slice(indent.length + 1));
        } else {
          blockIndent = indent;
        }
        continue;
      }

      out.push(line);
    }
    return out;
  }

  private include(name: string, indent: string, stack: readonly string[]): string[] {
    if (stack.includes(name)) {
      this.context.warn(`Snippet "${name}" includes itself; skipped`);
      return [];
    }
    if (stack.length >= this.maxDepth) {
      this.context.warn(`Snippet "${name}" is nested deeper than ${this.maxDepth} levels; skipped`);
      return [];
    }
    const content = this.source.read(name);
    if (content === undefined) {
      this.context.warn(`Snippet "${name}" could not be found`);
      return [];
    }

    this.log('include %s at depth %d', name, stack.length + 1);
    const lines = content.replace(/\r?\n$/, '').split(/\r?\n/);
    return this.expand(lines, [...stack, name]).map((line) => (line ? indent + line : line));
  }
}

export const snippets = defineExtension({
  name: 'snippets',
  options,
  setup({ preprocessors, logger }, { source, maxDepth }) {
    preprocessors.register(
      'snippets',
      {
        kind: 'preprocessor',
        name: 'snippets',
        run(text, context) {
          if (!text.includes('--8<--')) return text;
          const expander = new SnippetExpander(source, maxDepth, context, logger);
          return expander.expand(text.split('\n'), []).join('\n');
        },
      },
      { priority: 5 },
    );
  },
});
