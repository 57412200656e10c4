/**
 * Inline scanner.
 *
 * Walks running text and, at each cursor position, picks the rule whose
 * match starts earliest; ties go to the rule that comes first in registry
 * order, regardless of match length. Text before the winning match becomes
 * a literal node and the match is handed to its rule's handler.
 *
 * Handlers may scan the content of the node they build through
 * {@link InlineContext.scanNested}. Each nested scan is one level deeper;
 * past `maxDepth` the nested content is emitted as literal text and a
 * warning is recorded. Rules listed in a handler's `conflicts` are disabled
 * for everything nested below the span it consumed.
 *
 * @module core/inline-scanner
 */
import { RecursionLimitError } from './errors.js';
import { createLogger } from './logger.js';
import { text } from './nodes.js';
import type { InlineMatch, InlineRule, TokenNode } from './types.js';

const log = createLogger('scanner');

export const DEFAULT_MAX_DEPTH = 100;

/** Per-scan state threaded through nested scans. */
export interface ScanState {
  depth: number;
  /** Rule names disabled by an enclosing span. */
  disabled: ReadonlySet<string>;
  warn(message: string): void;
  /**
   * Strategy for nested content. Defaults to scanning with this scanner;
   * the `marked` bridge swaps in the base lexer.
   */
  nested?: (content: string, state: ScanState) => TokenNode[];
}

export interface ScannerOptions {
  /** @default 100 */
  maxDepth?: number;
}

/** Nodes produced for one match and the position scanning resumes at. */
export interface ScanStep {
  nodes: TokenNode[];
  end: number;
}

export class InlineScanner {
  readonly maxDepth: number;

  /**
   * @param rules - Rules in resolved registry order.
   */
  constructor(
    private readonly rules: readonly InlineRule[],
    options: ScannerOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  get ruleNames(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  /** Names of the rules that emit links. */
  get linkRuleNames(): string[] {
    return this.rules.filter((rule) => rule.createsLinks).map((rule) => rule.name);
  }

  /**
   * Scan `source` into a sequence of nodes.
   *
   * @example
   * ```ts
   * const scanner = new InlineScanner([strike]);
   * scanner.scan('a ~~b~~');
   * // => [text('a '), element('del', {}, [text('b')])]
   * ```
   */
  scan(source: string, warnings: string[] = []): TokenNode[] {
    return this.scanWithState(source, {
      depth: 0,
      disabled: new Set(),
      warn: (message) => warnings.push(message),
    });
  }

  /**
   * Scan with explicit state.
   *
   * @throws {@link RecursionLimitError} when `state.depth` exceeds `maxDepth`.
   */
  scanWithState(source: string, state: ScanState): TokenNode[] {
    if (state.depth > this.maxDepth) {
      throw new RecursionLimitError(this.maxDepth);
    }

    const active = this.rules.filter((rule) => !state.disabled.has(rule.name));
    const pending: (InlineMatch | null | undefined)[] = new Array(active.length);
    const nodes: TokenNode[] = [];
    let cursor = 0;

    while (cursor < source.length) {
      let bestIndex = -1;
      let best: InlineMatch | null = null;
      for (let i = 0; i < active.length; i++) {
        let match = pending[i];
        if (match === undefined || (match !== null && match.start < cursor)) {
          match = active[i].find(source, cursor);
          pending[i] = match;
        }
        if (match && (best === null || match.start < best.start)) {
          best = match;
          bestIndex = i;
        }
      }
      if (best === null) break;

      const step = this.apply(active[bestIndex], best, state);
      if (step === null) {
        // Declined: look for this rule's next match further along.
        pending[bestIndex] = active[bestIndex].find(source, best.start + 1);
        continue;
      }

      pushText(nodes, source.slice(cursor, best.start));
      nodes.push(...step.nodes);
      cursor = step.end;
    }

    pushText(nodes, source.slice(cursor));
    return nodes;
  }

  /**
   * Try every enabled rule against the very start of `source`.
   *
   * Used where an outer lexer drives the cursor and only asks whether a
   * rule applies at its current position.
   */
  matchAt(source: string, state: ScanState): ScanStep | null {
    for (const rule of this.rules) {
      if (state.disabled.has(rule.name)) continue;
      const match = rule.find(source, 0);
      if (!match || match.start !== 0) continue;
      const step = this.apply(rule, match, state);
      if (step) return step;
    }
    return null;
  }

  /**
   * Earliest offset at which any enabled rule matches, or -1.
   */
  firstMatchOffset(source: string, disabled: ReadonlySet<string> = new Set()): number {
    let first = -1;
    for (const rule of this.rules) {
      if (disabled.has(rule.name)) continue;
      const match = rule.find(source, 0);
      if (match && (first === -1 || match.start < first)) {
        first = match.start;
      }
    }
    return first;
  }

  private apply(rule: InlineRule, match: InlineMatch, state: ScanState): ScanStep | null {
    const disabled = new Set(state.disabled);
    for (const name of rule.conflicts ?? []) {
      disabled.add(name);
    }
    const childState: ScanState = {
      depth: state.depth + 1,
      disabled,
      warn: state.warn,
      nested: state.nested,
    };

    const result = rule.handle(match, {
      depth: state.depth,
      warn: state.warn,
      scanNested: (content) => this.scanNested(content, childState),
    });
    if (result === null) return null;

    let end = result.end ?? match.end;
    if (end < match.end) {
      log('rule %s tried to resume before its match end; clamping', rule.name);
      end = match.end;
    }
    if (end <= match.start) {
      log('rule %s consumed nothing at %d; skipping', rule.name, match.start);
      return null;
    }
    return { nodes: result.nodes, end };
  }

  private scanNested(content: string, state: ScanState): TokenNode[] {
    try {
      if (state.nested) {
        if (state.depth > this.maxDepth) {
          throw new RecursionLimitError(this.maxDepth);
        }
        return state.nested(content, state);
      }
      return this.scanWithState(content, state);
    } catch (err) {
      if (err instanceof RecursionLimitError) {
        log('%s', err.message);
        state.warn(err.message);
        return [text(content)];
      }
      throw err;
    }
  }
}

/** Append literal text, merging it into a preceding text node. */
export function pushText(nodes: TokenNode[], value: string): void {
  if (value.length === 0) return;
  const last = nodes[nodes.length - 1];
  if (last && last.type === 'text') {
    last.value += value;
  } else {
    nodes.push(text(value));
  }
}
