/**
 * `==highlighted==` text.
 *
 * @module extensions/mark
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { wrapRule } from '../core/rules.js';

const MARK_RE = /==(?![\s=])((?:\\[\s\S]|[^\\])+?)==/;

export const mark = defineExtension({
  name: 'mark',
  options: z.object({}).strict(),
  setup({ inline }) {
    inline.register('mark', wrapRule('mark', MARK_RE, 'mark'), { priority: 30 });
  },
});
