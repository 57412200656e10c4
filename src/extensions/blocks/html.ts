/**
 * `::: {html} tag#id.class[attr=value]` wraps content in an arbitrary
 * element described by a CSS-like selector.
 *
 * The `markdown` option decides how the content is treated: `block`
 * parses it as blocks, `inline` as a single run of inline Markdown, `raw`
 * keeps it as escaped text. `auto` picks by tag.
 *
 * @module extensions/blocks/html
 */
import { z } from 'zod';

import { element, text } from '../../core/nodes.js';
import type { TokenNode } from '../../core/types.js';
import { defineDirective } from './directive.js';

const IDENT = String.raw`(?:--|-?[_a-zA-Z\u00a0-\uffff])[-\w\u00a0-\uffff]*`;
const VALUE = String.raw`"(?:\\.|[^\\"\r\n])*"|'(?:\\.|[^\\'\r\n])*'|[-\w\u00a0-\uffff]+`;

const TAG_RE = new RegExp(`^${IDENT}`);
const ID_RE = new RegExp(`#(${IDENT})`, 'y');
const CLASS_RE = new RegExp(`\\.(${IDENT})`, 'y');
const ATTRS_RE = new RegExp(`\\[((?:[ \\t]*${IDENT}(?:[ \\t]*=[ \\t]*(?:${VALUE}))?)+)[ \\t]*\\]`, 'y');
const ATTR_RE = new RegExp(`(${IDENT})(?:[ \\t]*=[ \\t]*(${VALUE}))?`, 'g');

/** Tags whose content is inline only. */
const SPAN_TAGS = new Set([
  'address', 'dd', 'dt', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'legend', 'li', 'p', 'summary', 'td', 'th',
]);

/** Tags whose content is never parsed. */
const RAW_TAGS = new Set(['canvas', 'code', 'math', 'option', 'pre', 'script', 'style', 'textarea']);

export interface Selector {
  tag: string;
  attrs: Record<string, string>;
}

/**
 * Parse `tag#id.class[name=value]`. Returns `null` when the selector is
 * not valid.
 */
export function parseSelector(selector: string): Selector | null {
  const tagMatch = TAG_RE.exec(selector);
  if (!tagMatch) return null;

  const attrs: Record<string, string> = {};
  const classes: string[] = [];
  let end = tagMatch[0].length;

  while (end < selector.length) {
    ID_RE.lastIndex = end;
    CLASS_RE.lastIndex = end;
    ATTRS_RE.lastIndex = end;

    const id = ID_RE.exec(selector);
    if (id) {
      attrs['id'] = id[1];
      end = ID_RE.lastIndex;
      continue;
    }

    const cls = CLASS_RE.exec(selector);
    if (cls) {
      classes.push(cls[1]);
      end = CLASS_RE.lastIndex;
      continue;
    }

    const group = ATTRS_RE.exec(selector);
    if (!group) return null;
    for (const attr of group[1].matchAll(ATTR_RE)) {
      const name = attr[1].toLowerCase();
      let value = attr[2];
      if (value === undefined) {
        value = name === 'class' ? '' : name;
      } else if (value.startsWith('"') || value.startsWith("'")) {
        value = value.slice(1, -1);
      }
      if (name === 'class') {
        classes.push(...value.split(' ').filter((part) => part.length > 0));
      } else {
        attrs[name] = value;
      }
    }
    end = ATTRS_RE.lastIndex;
  }

  if (classes.length > 0) attrs['class'] = classes.join(' ');
  return { tag: tagMatch[0].toLowerCase(), attrs };
}

type MarkdownMode = 'auto' | 'block' | 'inline' | 'raw';

function resolveMode(mode: MarkdownMode, tag: string): Exclude<MarkdownMode, 'auto'> {
  if (mode !== 'auto') return mode;
  if (SPAN_TAGS.has(tag)) return 'inline';
  if (RAW_TAGS.has(tag)) return 'raw';
  return 'block';
}

export const html = defineDirective({
  name: 'html',
  argument: 'required',
  options: z
    .object({
      markdown: z.enum(['auto', 'block', 'inline', 'raw']).default('auto'),
    })
    .strict(),
  validate: (argument) => parseSelector(argument) !== null,
  render({ argument, options, block }, context) {
    const selector = parseSelector(argument);
    if (!selector) return context.blocks(block.children);

    const mode = resolveMode(options.markdown, selector.tag);
    let children: TokenNode[];
    if (mode === 'inline') {
      children = context.inline(block.lines.join('\n').trim());
    } else if (mode === 'raw') {
      children = [text(block.lines.join('\n'))];
    } else {
      children = context.blocks(block.children);
    }
    return [element(selector.tag, selector.attrs, children)];
  },
});
