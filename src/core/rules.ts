/**
 * Helpers for building inline rules from regular expressions.
 *
 * @module core/rules
 */
import { element } from './nodes.js';
import type { InlineContext, InlineMatch, InlineResult, InlineRule } from './types.js';

/**
 * Compile `pattern` into a `find` function that searches from an offset.
 * Missing capture groups are reported as empty strings.
 */
export function patternFinder(pattern: RegExp): InlineRule['find'] {
  const flags = pattern.flags.replace(/[gy]/g, '');
  const re = new RegExp(pattern.source, `${flags}g`);
  return (source: string, from: number): InlineMatch | null => {
    re.lastIndex = from;
    const match = re.exec(source);
    if (!match) return null;
    return {
      start: match.index,
      end: match.index + match[0].length,
      groups: Array.from(match, (group) => group ?? ''),
    };
  };
}

export interface PatternRuleOptions {
  conflicts?: readonly string[];
  createsLinks?: boolean;
}

/**
 * Build an inline rule from a pattern and a handler.
 */
export function patternRule(
  name: string,
  pattern: RegExp,
  handle: (match: InlineMatch, context: InlineContext) => InlineResult | null,
  options: PatternRuleOptions = {},
): InlineRule {
  return {
    kind: 'inline',
    name,
    find: patternFinder(pattern),
    handle,
    conflicts: options.conflicts,
    createsLinks: options.createsLinks,
  };
}

/**
 * Build a rule that wraps capture group 1 in `tag`, scanning the group
 * for further inline syntax.
 */
export function wrapRule(
  name: string,
  pattern: RegExp,
  tag: string,
  options: PatternRuleOptions & { attrs?: Record<string, string> } = {},
): InlineRule {
  return patternRule(
    name,
    pattern,
    (match, context) => ({
      nodes: [element(tag, { ...options.attrs }, context.scanNested(match.groups[1]))],
    }),
    options,
  );
}
