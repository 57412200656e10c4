/**
 * Fenced code blocks that nest anywhere.
 *
 * Fences are recognised by the block parser rather than the base lexer, so
 * they work at any indent and inside directive containers. A fence closes
 * on a line of the same character, at least as long as the opener and at
 * the same indent. Custom fences route named languages (`diagram`,
 * `math`, ...) to their own formatter instead of the code renderer.
 *
 * @module extensions/super-fences
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { element, text } from '../core/nodes.js';
import type { BuildContext } from '../core/tree-builder.js';
import type { BlockSyntax, RawBlock, TokenNode } from '../core/types.js';

/** Name of the fence block syntax and of its renderer. */
export const FENCE_SYNTAX = 'fence';

const OPEN_RE = /^(`{3,}|~{3,})[ \t]*([^\s`{]*)[ \t]*([^`]*)$/;
const CLOSE_RE = /^(`{3,}|~{3,})[ \t]*$/;

export const fenceSyntax: BlockSyntax = {
  kind: 'block',
  name: FENCE_SYNTAX,
  content: 'raw',
  matchOpen(line) {
    const match = OPEN_RE.exec(line);
    if (!match) return null;
    const [, marker, type, info] = match;
    return { type, info: info.trim(), marker };
  },
  isClose(line, open) {
    const match = CLOSE_RE.exec(line);
    if (!match) return false;
    const [, marker] = match;
    return marker[0] === open.marker[0] && marker.length >= open.marker.length;
  },
};

export type FenceFormatter = (block: RawBlock, className: string, context: BuildContext) => TokenNode[];

/** `<pre class="name"><code>…</code></pre>` */
export const preFormat: FenceFormatter = (block, className) => [
  element('pre', { class: className }, [element('code', {}, [text(block.content)])]),
];

/** `<div class="name">…</div>` */
export const divFormat: FenceFormatter = (block, className) => [
  element('div', { class: className }, [text(block.content)]),
];

const FORMATS: Readonly<Record<'pre' | 'div', FenceFormatter>> = { pre: preFormat, div: divFormat };

const customFenceSchema = z
  .object({
    /** Fence type handled, or `*` for every type. */
    name: z.string().min(1),
    className: z.string().default(''),
    format: z
      .union([
        z.enum(['pre', 'div']),
        z.custom<FenceFormatter>((value) => typeof value === 'function', {
          message: 'format must be "pre", "div" or a function',
        }),
      ])
      .default('pre'),
  })
  .strict();

export type CustomFence = z.input<typeof customFenceSchema>;

const options = z
  .object({
    customFences: z.array(customFenceSchema).default([]),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.customFences.forEach((fence, index) => {
      if (seen.has(fence.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['customFences', index, 'name'],
          message: `duplicate custom fence "${fence.name}"`,
        });
      }
      seen.add(fence.name);
    });
  });

/** Default rendering: a code block tagged with its language. */
export function renderCode(block: RawBlock): TokenNode[] {
  const attrs: Record<string, string> = block.type ? { class: `language-${block.type}` } : {};
  return [element('pre', {}, [element('code', attrs, [text(block.content)])])];
}

export const superFences = defineExtension({
  name: 'superFences',
  options,
  setup({ blockSyntaxes, blockRenderers, logger }, { customFences }) {
    const custom = new Map<string, { className: string; format: FenceFormatter }>();
    for (const fence of customFences) {
      const format = typeof fence.format === 'string' ? FORMATS[fence.format] : fence.format;
      custom.set(fence.name, { className: fence.className || fence.name, format });
    }
    logger('custom fences: %o', [...custom.keys()]);

    blockSyntaxes.register(FENCE_SYNTAX, fenceSyntax, { priority: 10 });
    blockRenderers.register(FENCE_SYNTAX, (block, context) => {
      if (block.kind !== 'raw') return context.blocks(block.children);
      const handler = custom.get(block.type) ?? custom.get('*');
      if (!handler) return renderCode(block);
      const className = handler.className === '*' ? block.type : handler.className;
      return handler.format(block, className, context);
    });
  },
});
