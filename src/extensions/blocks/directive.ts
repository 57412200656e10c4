/**
 * Directive contract and option helpers.
 *
 * A directive is one named kind of `::: {name}` container. It declares
 * whether it takes an argument, a zod schema for the options read from
 * its `---` header, and how it renders.
 *
 * @module extensions/blocks/directive
 */
import { z } from 'zod';

import type { BuildContext } from '../../core/tree-builder.js';
import type { ContainerBlock, TokenNode } from '../../core/types.js';

export type ArgumentPolicy = 'none' | 'optional' | 'required';

/** What a directive renders from. */
export interface DirectiveBlock<O> {
  name: string;
  /** Text after `{name}` on the open line, trimmed. */
  argument: string;
  options: O;
  block: ContainerBlock;
}

export interface Directive<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  argument: ArgumentPolicy;
  /** Options schema. Every option needs a default. */
  options: S;
  /** Reject an argument; the open line then stays literal text. */
  validate?(argument: string): boolean;
  render(
    directive: DirectiveBlock<z.output<S>>,
    context: BuildContext,
    siblings: TokenNode[],
  ): TokenNode[];
}

export function defineDirective<S extends z.ZodTypeAny>(directive: Directive<S>): Directive<S> {
  return directive;
}

/** Boolean option; header values arrive as strings. */
export function booleanOption(fallback: boolean) {
  return z
    .preprocess((value) => {
      if (typeof value !== 'string') return value;
      const normalized = value.trim().toLowerCase();
      if (normalized === 'true' || normalized === 'yes' || normalized === 'on') return true;
      if (normalized === 'false' || normalized === 'no' || normalized === 'off') return false;
      return value;
    }, z.boolean())
    .default(fallback);
}

/** Space delimited class names. */
export const classOption = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.split(/\s+/).filter((name) => name.length > 0) : value),
    z.array(z.string().regex(/^[-\w]+$/, 'invalid class name')),
  )
  .default([]);

/** A single attribute value; quotes would break out of it. */
export const attributeOption = z
  .string()
  .trim()
  .regex(/^[^"'<>&\s]*$/, 'invalid attribute value')
  .default('');

const KEY_VALUE_RE = /^ {0,3}([A-Za-z_\u00c0-\uffff][-\w:.\u00b7\u00c0-\uffff]*):\s+(.*)$/;
const CONTINUATION_RE = /^ {4,}(.*)$/;

/**
 * Parse `key: value` header lines. A line indented by four or more spaces
 * continues the previous value. Returns `null` for any other line.
 */
export function parseFrontmatter(lines: readonly string[]): Record<string, string> | null {
  const result: Record<string, string> = {};
  let lastKey = '';
  for (const line of lines) {
    if (line.trim().length === 0) continue;

    const pair = KEY_VALUE_RE.exec(line);
    if (pair) {
      lastKey = pair[1];
      result[lastKey] = pair[2].trim();
      continue;
    }

    const more = CONTINUATION_RE.exec(line);
    if (lastKey && more) {
      result[lastKey] += ` ${more[1].trim()}`;
      continue;
    }
    return null;
  }
  return result;
}
