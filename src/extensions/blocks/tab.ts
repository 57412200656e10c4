/**
 * `::: {tab} Title` containers. Consecutive tabs join one tabbed set:
 *
 * ```html
 * <div class="tabbed-set tabbed-alternate" data-tabs="1:2">
 *   <input name="__tabbed_1" type="radio" id="__tabbed_1_1" checked="checked" />
 *   <input name="__tabbed_1" type="radio" id="__tabbed_1_2" />
 *   <div class="tabbed-labels"><label for="__tabbed_1_1">…</label>…</div>
 *   <div class="tabbed-content"><div class="tabbed-block">…</div>…</div>
 * </div>
 * ```
 *
 * @module extensions/blocks/tab
 */
import { z } from 'zod';

import { element, isElement } from '../../core/nodes.js';
import type { ElementNode, TokenNode } from '../../core/types.js';
import { attributeOption, booleanOption, classOption, defineDirective } from './directive.js';

export const TABBED_SET_CLASS = 'tabbed-set tabbed-alternate';

function childWithClass(parent: ElementNode, className: string): ElementNode | undefined {
  for (const child of parent.children) {
    if (isElement(child, 'div') && child.attrs['class'] === className) return child;
  }
  return undefined;
}

/** The tabbed set a new tab should join, if the last sibling is one. */
function openSet(siblings: TokenNode[]): ElementNode | undefined {
  const last = siblings[siblings.length - 1];
  if (!last || !isElement(last, 'div') || last.attrs['class'] !== TABBED_SET_CLASS) return undefined;
  if (!/^\d+:\d+$/.test(last.attrs['data-tabs'] ?? '')) return undefined;
  return last;
}

export const tab = defineDirective({
  name: 'tab',
  argument: 'required',
  options: z
    .object({
      new: booleanOption(false),
      class: classOption,
      id: attributeOption,
    })
    .strict(),
  render({ argument, options, block }, context, siblings) {
    const existing = options.new ? undefined : openSet(siblings);
    const first = existing === undefined;
    const set =
      existing ??
      element('div', { class: TABBED_SET_CLASS, 'data-tabs': `${context.nextCount('tabs')}:0` }, [
        element('div', { class: 'tabbed-labels' }),
        element('div', { class: 'tabbed-content' }),
      ]);

    const [group, count] = set.attrs['data-tabs'].split(':').map(Number);
    const index = count + 1;
    const id = `__tabbed_${group}_${index}`;

    const input = element('input', { name: `__tabbed_${group}`, type: 'radio', id });
    if (first) input.attrs['checked'] = 'checked';
    const inputs = set.children.filter((child) => isElement(child, 'input')).length;
    set.children.splice(inputs, 0, input);

    childWithClass(set, 'tabbed-labels')?.children.push(
      element('label', { for: id }, context.inline(argument)),
    );

    const attrs: Record<string, string> = { class: ['tabbed-block', ...options.class].join(' ') };
    if (options.id) attrs['id'] = options.id;
    childWithClass(set, 'tabbed-content')?.children.push(
      element('div', attrs, context.blocks(block.children)),
    );

    set.attrs['data-tabs'] = `${group}:${index}`;
    return first ? [set] : [];
  },
});
