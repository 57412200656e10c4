/**
 * Task lists.
 *
 * The base lexer already turns `- [x] item` into a list item starting with
 * a checkbox. This pass marks such items and their lists with classes and
 * optionally wraps the checkbox for custom styling.
 *
 * @module extensions/task-list
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { addClass, classList, element, isElement, walkElements } from '../core/nodes.js';
import type { ElementNode, TokenNode } from '../core/types.js';

const options = z
  .object({
    /** Wrap checkboxes in `<label class="task-list-control">`. */
    customCheckbox: z.boolean().default(false),
    /** Leave checkboxes enabled. */
    clickable: z.boolean().default(false),
  })
  .strict();

/**
 * The list holding the checkbox of a task item (the item itself, or its
 * first paragraph in a loose list) and the index of the checkbox in it.
 */
function findCheckbox(item: ElementNode): { holder: TokenNode[]; checkbox: ElementNode } | null {
  const first = item.children[0];
  if (!first || !isElement(first)) return null;

  const candidates: TokenNode[][] = [item.children];
  if (first.tag === 'p') candidates.push(first.children);

  for (const holder of candidates) {
    const head = holder[0];
    if (!head || !isElement(head)) continue;
    if (isElement(head, 'input') && head.attrs['type'] === 'checkbox') {
      return { holder, checkbox: head };
    }
    if (isElement(head, 'label') && classList(head).includes('task-list-control')) {
      const input = head.children[0];
      if (input && isElement(input, 'input')) {
        return { holder, checkbox: input };
      }
    }
  }
  return null;
}

export const taskList = defineExtension({
  name: 'taskList',
  options,
  setup({ postprocessors }, { customCheckbox, clickable }) {
    postprocessors.register(
      'task-list',
      {
        kind: 'postprocessor',
        name: 'task-list',
        run(document) {
          walkElements(document.children, (list) => {
            if (list.tag !== 'ul' && list.tag !== 'ol') return;
            for (const item of list.children) {
              if (!isElement(item, 'li')) continue;
              const found = findCheckbox(item);
              if (!found) continue;

              addClass(item, 'task-list-item');
              addClass(list, 'task-list');
              if (clickable) {
                delete found.checkbox.attrs['disabled'];
              }
              const head = found.holder[0];
              if (customCheckbox && isElement(head, 'input')) {
                found.holder[0] = element('label', { class: 'task-list-control' }, [
                  head,
                  element('span', { class: 'task-list-indicator' }),
                ]);
              }
            }
          });
        },
      },
      { priority: 50 },
    );
  },
});
