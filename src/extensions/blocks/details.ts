/**
 * `::: {details} Summary` renders a collapsible `<details>` element.
 *
 * @module extensions/blocks/details
 */
import { z } from 'zod';

import { element } from '../../core/nodes.js';
import { attributeOption, booleanOption, classOption, defineDirective } from './directive.js';

export const details = defineDirective({
  name: 'details',
  argument: 'required',
  options: z
    .object({
      open: booleanOption(false),
      class: classOption,
      id: attributeOption,
    })
    .strict(),
  render({ argument, options, block }, context) {
    const attrs: Record<string, string> = {};
    if (options.class.length > 0) attrs['class'] = options.class.join(' ');
    if (options.id) attrs['id'] = options.id;
    if (options.open) attrs['open'] = 'open';

    return [
      element('details', attrs, [
        element('summary', {}, context.inline(argument)),
        ...context.blocks(block.children),
      ]),
    ];
  },
});
