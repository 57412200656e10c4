/**
 * Tilde syntax: `~~deleted~~` and `~subscript~`.
 *
 * Both spans are built on the same character, so each rule disables the
 * other inside the text it consumes.
 *
 * @module extensions/tilde
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { wrapRule } from '../core/rules.js';

/** `~~text~~`; the content may not start with whitespace. */
export const DELETE_RE = /~~(?![\s~])((?:\\[\s\S]|[^\\])+?)~~/;

/** `~text~`; whitespace must be escaped. */
export const SUBSCRIPT_RE = /~((?:\\[\s\S]|[^\s~\\])+?)~/;

const options = z
  .object({
    delete: z.boolean().default(true),
    subscript: z.boolean().default(true),
  })
  .strict();

export const tilde = defineExtension({
  name: 'tilde',
  options,
  setup({ inline }, { delete: withDelete, subscript }) {
    if (withDelete) {
      inline.register(
        'tilde-delete',
        wrapRule('tilde-delete', DELETE_RE, 'del', { conflicts: ['tilde-subscript'] }),
        { priority: 10 },
      );
    }
    if (subscript) {
      inline.register(
        'tilde-subscript',
        wrapRule('tilde-subscript', SUBSCRIPT_RE, 'sub', { conflicts: ['tilde-delete'] }),
        { priority: 20 },
      );
    }
  },
});
