/**
 * Table of contents.
 *
 * Gives every heading an id and collects `{ level, id, text }` entries
 * into `metadata.toc`. Ids already present are kept, and the entries are
 * rebuilt on every run.
 *
 * @module extensions/toc
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { classList, element, isElement, text, textContent, walkElements } from '../core/nodes.js';
import type { ElementNode, TocEntry, TokenNode } from '../core/types.js';

const HEADING_RE = /^h([1-6])$/;

const options = z
  .object({
    /** Shallowest heading level listed. */
    minLevel: z.number().int().min(1).max(6).default(1),
    /** Deepest heading level listed. */
    maxLevel: z.number().int().min(1).max(6).default(6),
    /** Append a link to each heading; a string sets the link text. */
    permalink: z.union([z.boolean(), z.string().min(1)]).default(false),
    permalinkTitle: z.string().default('Permanent link'),
    separator: z.string().max(1).default('-'),
  })
  .strict()
  .refine((value) => value.minLevel <= value.maxLevel, {
    message: 'minLevel must not exceed maxLevel',
    path: ['minLevel'],
  });

/**
 * Turn heading text into an id: accents dropped, lower case, runs of
 * whitespace and hyphens joined by `separator`.
 *
 * @example
 * ```ts
 * slugify('Héllo, World!'); // => 'hello-world'
 * ```
 */
export function slugify(value: string, separator = '-'): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\w\s-]/g, '')
    .trim()
    .toLowerCase()
    .replace(/[-\s]+/g, separator);
}

/** Make `id` unique among `used` by appending `_1`, `_2`, ... */
export function uniqueId(id: string, used: Set<string>): string {
  let candidate = id;
  let counter = 0;
  while (used.has(candidate)) {
    counter += 1;
    candidate = `${id}_${counter}`;
  }
  used.add(candidate);
  return candidate;
}

function isHeaderLink(node: TokenNode): boolean {
  return isElement(node, 'a') && classList(node).includes('headerlink');
}

function headingLevel(node: ElementNode): number | null {
  const match = HEADING_RE.exec(node.tag);
  return match ? Number(match[1]) : null;
}

export const toc = defineExtension({
  name: 'toc',
  options,
  setup({ postprocessors }, config) {
    const linkText = typeof config.permalink === 'string' ? config.permalink : '\u00b6';

    postprocessors.register(
      'toc',
      {
        kind: 'postprocessor',
        name: 'toc',
        run(document) {
          const used = new Set<string>();
          walkElements(document.children, (node) => {
            const id = node.attrs['id'];
            if (id) used.add(id);
          });

          const entries: TocEntry[] = [];
          walkElements(document.children, (node) => {
            const level = headingLevel(node);
            if (level === null) return;

            const label = textContent(node.children.filter((child) => !isHeaderLink(child))).trim();
            let id = node.attrs['id'];
            if (!id) {
              id = uniqueId(slugify(label, config.separator) || 'section', used);
              node.attrs['id'] = id;
            }

            if (config.permalink !== false && !node.children.some(isHeaderLink)) {
              node.children.push(
                element('a', { class: 'headerlink', href: `#${id}`, title: config.permalinkTitle }, [
                  text(linkText),
                ]),
              );
            }

            if (level >= config.minLevel && level <= config.maxLevel) {
              entries.push({ level, id, text: label });
            }
          });

          document.metadata.toc = entries;
        },
      },
      { priority: 40 },
    );
  },
});
