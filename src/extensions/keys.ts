/**
 * Keyboard shortcuts: `++ctrl+alt+del++`.
 *
 * Each key becomes a `<kbd>` inside a `<span class="keys">`. Known key
 * names are mapped to display labels, single letters and digits are shown
 * upper-cased, and quoted keys (`++ctrl+"My Key"++`) are shown verbatim.
 * A shortcut naming an unknown key is left as text.
 *
 * @module extensions/keys
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { element, text } from '../core/nodes.js';
import { patternRule } from '../core/rules.js';
import type { TokenNode } from '../core/types.js';
import defaultKeyMap from './data/keys.json';

const KEY = String.raw`(?:[\w-]+|"(?:\\.|[^"\\])+")`;
const KEYS_RE = new RegExp(String.raw`\+\+(${KEY}(?:\+${KEY})*)\+\+`);
const SPLIT_RE = new RegExp(KEY, 'g');

const options = z
  .object({
    /** Separator shown between keys. */
    separator: z.string().default('+'),
    /** Extra or replacement key labels, keyed by lower-case name. */
    keyMap: z.record(z.string()).default({}),
  })
  .strict();

export const keys = defineExtension({
  name: 'keys',
  options,
  setup({ inline }, { separator, keyMap }) {
    const labels: Record<string, string> = { ...defaultKeyMap, ...keyMap };

    const keyNode = (key: string): TokenNode | null => {
      if (key.startsWith('"')) {
        const label = key.slice(1, -1).replace(/\\(.)/g, '$1');
        return element('kbd', {}, [text(label)]);
      }
      const name = key.toLowerCase();
      const label = labels[name] ?? (/^[a-z0-9]$/.test(name) ? name.toUpperCase() : undefined);
      if (label === undefined) return null;
      return element('kbd', { class: `key-${name}` }, [text(label)]);
    };

    inline.register(
      'keys',
      patternRule('keys', KEYS_RE, (match) => {
        const children: TokenNode[] = [];
        for (const key of match.groups[1].match(SPLIT_RE) ?? []) {
          const node = keyNode(key);
          if (!node) return null;
          if (children.length > 0) {
            children.push(element('span', {}, [text(separator)]));
          }
          children.push(node);
        }
        return { nodes: [element('span', { class: 'keys' }, children)] };
      }),
      { priority: 5 },
    );
  },
});
