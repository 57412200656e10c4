/**
 * Bridge between the plugin inline rules and the `marked` lexer.
 *
 * `marked` drives the outer inline loop (emphasis, links, code spans ...).
 * The plugin rules are installed as one inline extension: its `start`
 * reports the earliest offset any enabled rule matches so `marked` stops
 * its text run there, and its tokenizer runs {@link InlineScanner.matchAt}
 * at the lexer's cursor. Content a plugin handler nests is lexed again by
 * `marked`, so base syntax keeps working inside plugin spans, while the
 * scan state (depth, disabled rules) travels on a stack. Rules that emit
 * links are disabled while `marked` lexes the text of a link.
 *
 * @module core/marked-bridge
 */
import type { Lexer, Token, Tokens, TokenizerExtension, TokenizerThis } from 'marked';

import type { InlineScanner, ScanState } from './inline-scanner.js';
import type { TokenNode } from './types.js';

export const PLUGIN_TOKEN_TYPE = 'pluginInline';

export class InlineBridge {
  private readonly states: ScanState[] = [];
  private readonly nodesByToken = new WeakMap<object, TokenNode[]>();
  private warn: (message: string) => void = () => undefined;

  /**
   * @param scanner - Scanner holding the plugin rules.
   * @param convert - Converts nested `marked` tokens to nodes.
   */
  constructor(
    private readonly scanner: InlineScanner,
    private readonly convert: (tokens: Token[]) => TokenNode[],
  ) {}

  /** Route warnings raised while lexing to `sink` for the duration of `fn`. */
  withWarnings<T>(sink: (message: string) => void, fn: () => T): T {
    const previous = this.warn;
    this.warn = sink;
    try {
      return fn();
    } finally {
      this.warn = previous;
    }
  }

  /** Nodes produced for a token emitted by {@link extension}. */
  nodesFor(token: Token): TokenNode[] | undefined {
    return this.nodesByToken.get(token);
  }

  /** The `marked` extension, or `null` when there are no rules to bridge. */
  extension(): TokenizerExtension | null {
    if (this.scanner.ruleNames.length === 0) return null;

    const bridge = this;
    return {
      name: PLUGIN_TOKEN_TYPE,
      level: 'inline',
      start(this: TokenizerThis, src: string): number | void {
        const offset = bridge.scanner.firstMatchOffset(src, bridge.disabledFor(this.lexer));
        return offset >= 0 ? offset : undefined;
      },
      tokenizer(this: TokenizerThis, src: string): Tokens.Generic | undefined {
        const lexer = this.lexer;
        const state: ScanState = {
          ...bridge.current(),
          disabled: bridge.disabledFor(lexer),
          nested: (content, child) => {
            bridge.states.push(child);
            try {
              return bridge.convert(lexer.inlineTokens(content));
            } finally {
              bridge.states.pop();
            }
          },
        };
        const step = bridge.scanner.matchAt(src, state);
        if (!step) return undefined;

        const token: Tokens.Generic = { type: PLUGIN_TOKEN_TYPE, raw: src.slice(0, step.end) };
        bridge.nodesByToken.set(token, step.nodes);
        return token;
      },
    };
  }

  private disabledFor(lexer: Lexer): ReadonlySet<string> {
    const { disabled } = this.current();
    if (!lexer.state.inLink) return disabled;
    return new Set([...disabled, ...this.scanner.linkRuleNames]);
  }

  private current(): ScanState {
    const top = this.states[this.states.length - 1];
    if (top) return top;
    return { depth: 0, disabled: new Set(), warn: (message) => this.warn(message) };
  }
}
