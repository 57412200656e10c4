/**
 * Caret syntax: `^^inserted^^` and `^superscript^`.
 *
 * @module extensions/caret
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { wrapRule } from '../core/rules.js';

const INSERT_RE = /\^\^(?![\s^])((?:\\[\s\S]|[^\\])+?)\^\^/;
const SUPERSCRIPT_RE = /\^((?:\\[\s\S]|[^\s^\\])+?)\^/;

const options = z
  .object({
    insert: z.boolean().default(true),
    superscript: z.boolean().default(true),
  })
  .strict();

export const caret = defineExtension({
  name: 'caret',
  options,
  setup({ inline }, { insert, superscript }) {
    if (insert) {
      inline.register(
        'caret-insert',
        wrapRule('caret-insert', INSERT_RE, 'ins', { conflicts: ['caret-superscript'] }),
        { priority: 10 },
      );
    }
    if (superscript) {
      inline.register(
        'caret-superscript',
        wrapRule('caret-superscript', SUPERSCRIPT_RE, 'sup', { conflicts: ['caret-insert'] }),
        { priority: 20 },
      );
    }
  },
});
