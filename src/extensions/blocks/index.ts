/**
 * Generic block directives.
 *
 * ```markdown
 * ::: {details} Summary
 * ---
 * open: true
 * ---
 * Hidden content.
 * :::
 * ```
 *
 * A directive opens with at least three colons and `{name}`, optionally
 * followed by an argument, and closes with a line of at least as many
 * colons at the same indent. A `---` delimited header right after the
 * open line holds `key: value` options. Directives nest; use more colons
 * on the outer block to keep the markers apart.
 *
 * @module extensions/blocks
 */
import { z } from 'zod';

import { defineExtension } from '../../core/extension.js';
import type { BlockSyntax } from '../../core/types.js';
import { ADMONITION_TYPES, admonitions } from './admonition.js';
import { details } from './details.js';
import type { Directive } from './directive.js';
import { parseFrontmatter } from './directive.js';
import { html } from './html.js';
import { tab } from './tab.js';

export { ADMONITION_TYPES, admonitionDirective, admonitions } from './admonition.js';
export { details } from './details.js';
export {
  attributeOption,
  booleanOption,
  classOption,
  defineDirective,
  parseFrontmatter,
} from './directive.js';
export type { ArgumentPolicy, Directive, DirectiveBlock } from './directive.js';
export { html, parseSelector } from './html.js';
export type { Selector } from './html.js';
export { TABBED_SET_CLASS, tab } from './tab.js';

/** Name of the directive block syntax and of its renderer. */
export const DIRECTIVE_SYNTAX = 'directive';

const OPEN_RE = /^(:{3,})[ ]*\{[ ]*([\w-]+)[ ]*\}(.*)$/;
const CLOSE_RE = /^(:{3,})[ ]*$/;

function isDirective(value: unknown): value is Directive {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'render' in value &&
    typeof value.render === 'function' &&
    'options' in value &&
    value.options instanceof z.ZodType
  );
}

const options = z
  .object({
    /** Extra directives; a name already taken replaces the bundled one. */
    directives: z
      .array(z.custom<Directive>(isDirective, { message: 'expected a directive' }))
      .default([]),
    /** Admonition variants besides the generic `admonition`. */
    admonitionTypes: z.array(z.string().regex(/^[-\w]+$/)).default([...ADMONITION_TYPES]),
    /** Bundled directives to leave out. */
    exclude: z.array(z.string()).default([]),
  })
  .strict();

/** Directives available without configuration. */
export function bundledDirectives(types: readonly string[] = ADMONITION_TYPES): Directive[] {
  return [details, tab, html, ...admonitions(types)];
}

export const blocks = defineExtension({
  name: 'blocks',
  options,
  setup({ blockSyntaxes, blockRenderers, logger }, config) {
    const directives = new Map<string, Directive>();
    for (const directive of bundledDirectives(config.admonitionTypes)) {
      if (!config.exclude.includes(directive.name)) {
        directives.set(directive.name, directive);
      }
    }
    for (const directive of config.directives) {
      directives.set(directive.name.toLowerCase(), directive);
    }
    logger('directives: %o', [...directives.keys()]);

    const syntax: BlockSyntax = {
      kind: 'block',
      name: DIRECTIVE_SYNTAX,
      content: 'blocks',
      header: true,
      matchOpen(line) {
        const match = OPEN_RE.exec(line);
        if (!match) return null;
        const [, marker, rawName, rest] = match;
        const name = rawName.toLowerCase();
        const directive = directives.get(name);
        if (!directive) return null;

        const argument = rest.trim();
        if (directive.argument === 'required' && !argument) return null;
        if (directive.argument === 'none' && argument) return null;
        if (directive.validate && !directive.validate(argument)) return null;
        return { type: name, info: argument, marker };
      },
      isClose(line, open) {
        const match = CLOSE_RE.exec(line);
        return match !== null && match[1].length >= open.marker.length;
      },
    };

    blockSyntaxes.register(DIRECTIVE_SYNTAX, syntax, { priority: 20 });
    blockRenderers.register(DIRECTIVE_SYNTAX, (block, context, siblings) => {
      const directive = directives.get(block.type);
      if (!directive || block.kind !== 'container') {
        return block.kind === 'container' ? context.blocks(block.children) : [];
      }

      const header = parseFrontmatter(block.header);
      let input: Record<string, string> = {};
      if (header === null) {
        context.warn(`Invalid header in ${block.type} directive; using default options`);
      } else {
        input = header;
      }

      let parsed = directive.options.safeParse(input);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        context.warn(`Invalid options for ${block.type} directive (${issues}); using defaults`);
        parsed = directive.options.safeParse({});
      }
      if (!parsed.success) {
        return context.blocks(block.children);
      }

      return directive.render(
        { name: block.type, argument: block.info, options: parsed.data, block },
        context,
        siblings,
      );
    });
  },
});
