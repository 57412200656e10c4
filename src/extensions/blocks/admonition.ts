/**
 * Admonitions: `::: {note} Optional title`.
 *
 * ```html
 * <div class="admonition note"><p class="admonition-title">Note</p>…</div>
 * ```
 *
 * The generic `admonition` directive takes its type from the `type`
 * option and shows a title only when one is given.
 *
 * @module extensions/blocks/admonition
 */
import { z } from 'zod';

import { element } from '../../core/nodes.js';
import type { TokenNode } from '../../core/types.js';
import type { Directive } from './directive.js';
import { classOption, defineDirective } from './directive.js';

/** Named variants registered by default. */
export const ADMONITION_TYPES = [
  'note',
  'attention',
  'caution',
  'danger',
  'error',
  'tip',
  'hint',
  'important',
  'warning',
] as const;

function titleCase(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Build an admonition directive. `name` is both the directive name and
 * the admonition type, except for the generic `admonition`.
 */
export function admonitionDirective(name: string) {
  const generic = name === 'admonition';
  return defineDirective({
    name,
    argument: 'optional',
    options: z
      .object({
        type: z.string().regex(/^[-\w]*$/, 'invalid admonition type').default(''),
        class: classOption,
      })
      .strict(),
    render({ argument, options, block }, context) {
      const type = options.type || (generic ? '' : name);
      const classes = ['admonition'];
      if (type) classes.push(type);
      for (const extra of options.class) {
        if (!classes.includes(extra)) classes.push(extra);
      }

      const title = argument || (generic ? '' : titleCase(name));
      const children: TokenNode[] = [];
      if (title) {
        children.push(element('p', { class: 'admonition-title' }, context.inline(title)));
      }
      children.push(...context.blocks(block.children));
      return [element('div', { class: classes.join(' ') }, children)];
    },
  });
}

/** `admonition` plus one directive per named variant. */
export function admonitions(types: readonly string[] = ADMONITION_TYPES): Directive[] {
  return ['admonition', ...types].map((name) => admonitionDirective(name));
}
