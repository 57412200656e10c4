/**
 * Tree builder.
 *
 * Turns the block parser's output into a {@link Document}. Text blocks are
 * lexed by `marked` (with the plugin inline rules bridged in) and its
 * tokens are converted into element, text and raw nodes. Blocks opened by
 * a plugin syntax are handed to the renderer registered for that syntax.
 *
 * @module core/tree-builder
 */
import { Lexer, Marked } from 'marked';
import type { Token, Tokens } from 'marked';

import type { BlockParser } from './block-parser.js';
import type { InlineScanner } from './inline-scanner.js';
import { pushText } from './inline-scanner.js';
import { createLogger } from './logger.js';
import { InlineBridge, PLUGIN_TOKEN_TYPE } from './marked-bridge.js';
import { createDocument, element, raw, text } from './nodes.js';
import { unescapeHtml } from './serializer.js';
import type {
  Block,
  ContainerBlock,
  Document,
  DocumentMetadata,
  ParsedDocument,
  RawBlock,
  TokenNode,
} from './types.js';

const log = createLogger('tree');

/** A line that opens a list item. */
const LIST_ITEM_RE = /^ {0,3}(?:[-+*]|\d{1,9}[.)])(?: |$)/;

const PLACEHOLDER_SPLIT_RE = /\u0002(\d+)\u0003/;
const PLACEHOLDER_ONLY_RE = /^\s*\u0002(\d+)\u0003\s*$/;

function placeholder(index: number): string {
  return `\u0002${index}\u0003`;
}

/** What a block renderer can use while building its nodes. */
export interface BuildContext {
  readonly metadata: DocumentMetadata;
  /** Build already parsed blocks. */
  blocks(blocks: readonly Block[]): TokenNode[];
  /** Block-parse and build source lines. */
  parse(lines: readonly string[]): TokenNode[];
  /** Lex inline Markdown (plugin inline rules included). */
  inline(source: string): TokenNode[];
  /** Next value of a per-document counter, starting at 1. */
  nextCount(scope: string): number;
  warn(message: string): void;
}

/**
 * Renders a block opened by a plugin syntax. `siblings` holds the nodes
 * already built at the same level; a renderer may extend the last of them
 * instead of returning new nodes.
 */
export type BlockRenderer = (
  block: ContainerBlock | RawBlock,
  context: BuildContext,
  siblings: TokenNode[],
) => TokenNode[];

export interface TreeBuilderOptions {
  scanner: InlineScanner;
  parser: BlockParser;
  /** Renderers keyed by block syntax name. */
  renderers: ReadonlyMap<string, BlockRenderer>;
  /** @default true */
  gfm?: boolean;
  /** @default false */
  breaks?: boolean;
}

export class TreeBuilder {
  private readonly marked: Marked;
  private readonly bridge: InlineBridge;
  private readonly parser: BlockParser;
  private readonly renderers: ReadonlyMap<string, BlockRenderer>;

  constructor(options: TreeBuilderOptions) {
    this.parser = options.parser;
    this.renderers = options.renderers;
    this.bridge = new InlineBridge(options.scanner, (tokens) => this.convertInline(tokens));
    this.marked = new Marked({ gfm: options.gfm ?? true, breaks: options.breaks ?? false });
    const extension = this.bridge.extension();
    if (extension) {
      this.marked.use({ extensions: [extension] });
    }
  }

  /**
   * Build a fresh document from parsed blocks.
   */
  build(parsed: ParsedDocument, metadata?: DocumentMetadata): Document {
    const document = createDocument();
    if (metadata) {
      document.metadata = metadata;
    }
    const counters = new Map<string, number>();
    const warn = (message: string): void => {
      log(message);
      document.metadata.warnings.push(message);
    };

    const context: BuildContext = {
      metadata: document.metadata,
      blocks: (blocks) => this.buildBlocks(blocks, context),
      parse: (lines) => {
        const nested = this.parser.parse(lines, document.metadata.warnings);
        return this.buildBlocks(nested.blocks, context);
      },
      inline: (source) => this.convertInline(Lexer.lexInline(source, this.marked.defaults)),
      nextCount: (scope) => {
        const next = (counters.get(scope) ?? 0) + 1;
        counters.set(scope, next);
        return next;
      },
      warn,
    };

    document.children = this.bridge.withWarnings(warn, () => context.blocks(parsed.blocks));
    return document;
  }

  private buildBlocks(blocks: readonly Block[], context: BuildContext): TokenNode[] {
    const nodes: TokenNode[] = [];
    for (let i = 0; i < blocks.length; i++) {
      const block = blocks[i];
      if (block.kind === 'text') {
        // Indented plugin blocks after list text belong to a list item:
        // lex the run as one source with a placeholder line per group of
        // blocks, then put the rendered blocks where the placeholders land.
        const lines = [...block.lines];
        const groups: Block[][] = [];
        let next = i + 1;
        while (lines.some((line) => LIST_ITEM_RE.test(line)) && isIndented(blocks[next])) {
          const group: Block[] = [];
          const indent = indentOfBlock(blocks[next]);
          while (isIndented(blocks[next])) {
            group.push(blocks[next]);
            next++;
          }
          lines.push(`${' '.repeat(indent)}${placeholder(groups.length)}`);
          groups.push(group);
          const after = blocks[next];
          if (after && after.kind === 'text') {
            lines.push(...after.lines);
            next++;
          }
        }
        i = next - 1;

        const built = this.convertBlocks(this.marked.lexer(lines.join('\n')));
        if (groups.length === 0) {
          nodes.push(...built);
        } else {
          log('placing %d indented block group(s) inside list text', groups.length);
          nodes.push(...restoreBlocks(built, groups.map((group) => this.buildBlocks(group, context))));
        }
        continue;
      }

      const renderer = this.renderers.get(block.syntax);
      if (renderer) {
        nodes.push(...renderer(block, context, nodes));
      } else if (block.kind === 'raw') {
        nodes.push(element('pre', {}, [element('code', {}, [text(block.content)])]));
      } else {
        nodes.push(...this.buildBlocks(block.children, context));
      }
    }
    return nodes;
  }

  // -------------------------------------------------------------------------
  // marked token conversion
  // -------------------------------------------------------------------------

  /**
   * Convert block-level `marked` tokens. Inside loose list items, bare
   * text is wrapped in paragraphs.
   */
  convertBlocks(tokens: readonly Token[], loose = false): TokenNode[] {
    const nodes: TokenNode[] = [];
    for (const token of tokens) {
      switch (token.type) {
        case 'space':
        case 'def':
          break;

        case 'heading': {
          const t = token as Tokens.Heading;
          nodes.push(element(`h${t.depth}`, {}, this.convertInline(t.tokens)));
          break;
        }

        case 'paragraph': {
          const t = token as Tokens.Paragraph;
          nodes.push(element('p', {}, this.convertInline(t.tokens)));
          break;
        }

        case 'code': {
          const t = token as Tokens.Code;
          const lang = (t.lang ?? '').split(/\s+/)[0];
          const attrs: Record<string, string> = lang ? { class: `language-${lang}` } : {};
          nodes.push(element('pre', {}, [element('code', attrs, [text(t.text)])]));
          break;
        }

        case 'blockquote': {
          const t = token as Tokens.Blockquote;
          nodes.push(element('blockquote', {}, this.convertBlocks(t.tokens)));
          break;
        }

        case 'hr':
          nodes.push(element('hr'));
          break;

        case 'list':
          nodes.push(this.convertList(token as Tokens.List));
          break;

        case 'table':
          nodes.push(this.convertTable(token as Tokens.Table));
          break;

        case 'html':
          nodes.push(raw((token as Tokens.HTML).text));
          break;

        case 'text': {
          // Block-level text appears inside list items.
          const t = token as Tokens.Text;
          const inline: TokenNode[] = [];
          if (t.tokens && t.tokens.length > 0) {
            inline.push(...this.convertInline(t.tokens));
          } else {
            pushText(inline, unescapeHtml(t.text));
          }
          if (loose) {
            nodes.push(element('p', {}, inline));
          } else {
            nodes.push(...inline);
          }
          break;
        }

        default:
          nodes.push(...this.convertInline([token]));
          break;
      }
    }
    return nodes;
  }

  private convertList(token: Tokens.List): TokenNode {
    const tag = token.ordered ? 'ol' : 'ul';
    const attrs: Record<string, string> = {};
    if (token.ordered && typeof token.start === 'number' && token.start !== 1) {
      attrs['start'] = String(token.start);
    }

    const items = token.items.map((item) => {
      const children = this.convertBlocks(item.tokens, item.loose);
      if (item.task) {
        const checkbox = element('input', item.checked
          ? { type: 'checkbox', disabled: '', checked: '' }
          : { type: 'checkbox', disabled: '' });
        const first = children[0];
        if (first && first.type === 'element' && first.tag === 'p') {
          first.children.unshift(checkbox, text(' '));
        } else {
          children.unshift(checkbox, text(' '));
        }
      }
      return element('li', {}, children);
    });
    return element(tag, attrs, items);
  }

  private convertTable(token: Tokens.Table): TokenNode {
    const cell = (c: Tokens.TableCell, tag: 'th' | 'td'): TokenNode =>
      element(tag, c.align ? { align: c.align } : {}, this.convertInline(c.tokens));

    const head = element('thead', {}, [
      element('tr', {}, token.header.map((c) => cell(c, 'th'))),
    ]);
    const children: TokenNode[] = [head];
    if (token.rows.length > 0) {
      children.push(
        element('tbody', {}, token.rows.map((row) => element('tr', {}, row.map((c) => cell(c, 'td'))))),
      );
    }
    return element('table', {}, children);
  }

  /**
   * Convert inline `marked` tokens, including tokens emitted by the
   * plugin bridge.
   */
  convertInline(tokens: readonly Token[]): TokenNode[] {
    const nodes: TokenNode[] = [];
    for (const token of tokens) {
      switch (token.type) {
        case PLUGIN_TOKEN_TYPE: {
          const produced = this.bridge.nodesFor(token) ?? [];
          for (const node of produced) {
            if (node.type === 'text') {
              pushText(nodes, node.value);
            } else {
              nodes.push(node);
            }
          }
          break;
        }

        case 'text':
        case 'escape': {
          const t = token as Tokens.Text;
          if (t.tokens && t.tokens.length > 0) {
            nodes.push(...this.convertInline(t.tokens));
          } else {
            pushText(nodes, unescapeHtml(t.text));
          }
          break;
        }

        case 'strong':
          nodes.push(element('strong', {}, this.convertInline((token as Tokens.Strong).tokens)));
          break;

        case 'em':
          nodes.push(element('em', {}, this.convertInline((token as Tokens.Em).tokens)));
          break;

        case 'del':
          nodes.push(element('del', {}, this.convertInline((token as Tokens.Del).tokens)));
          break;

        case 'codespan':
          nodes.push(element('code', {}, [text(unescapeHtml((token as Tokens.Codespan).text))]));
          break;

        case 'br':
          nodes.push(element('br'));
          break;

        case 'link': {
          const t = token as Tokens.Link;
          const attrs: Record<string, string> = { href: t.href };
          if (t.title) attrs['title'] = t.title;
          nodes.push(element('a', attrs, this.convertInline(t.tokens)));
          break;
        }

        case 'image': {
          const t = token as Tokens.Image;
          const attrs: Record<string, string> = { src: t.href, alt: t.text };
          if (t.title) attrs['title'] = t.title;
          nodes.push(element('img', attrs));
          break;
        }

        case 'html':
          nodes.push(raw((token as Tokens.Tag).text));
          break;

        default: {
          // Unknown token: keep its source text.
          pushText(nodes, token.raw);
          break;
        }
      }
    }
    return nodes;
  }
}

// ---------------------------------------------------------------------------
// Indented blocks inside list text
// ---------------------------------------------------------------------------

function isIndented(block: Block | undefined): block is ContainerBlock | RawBlock {
  return block !== undefined && block.kind !== 'text' && block.indent > 0;
}

function indentOfBlock(block: Block | undefined): number {
  return isIndented(block) ? block.indent : 0;
}

/** Text and rendered block groups, in order. */
type Piece = string | TokenNode[];

function splitPlaceholders(value: string, rendered: readonly TokenNode[][]): Piece[] {
  const parts = value.split(PLACEHOLDER_SPLIT_RE);
  const pieces: Piece[] = [];
  parts.forEach((part, index) => {
    if (index % 2 === 1) {
      pieces.push(rendered[Number(part)] ?? []);
      return;
    }
    // The line break around a placeholder goes with it.
    let piece = part;
    if (index > 0) piece = piece.replace(/^\s+/, '');
    if (index < parts.length - 1) piece = piece.replace(/\s+$/, '');
    if (piece) pieces.push(piece);
  });
  return pieces;
}

/**
 * Replace placeholder text with the rendered block groups. A paragraph
 * holding a placeholder is split around it; so is a run of text in a
 * tight list item.
 */
function restoreBlocks(nodes: readonly TokenNode[], rendered: readonly TokenNode[][]): TokenNode[] {
  const out: TokenNode[] = [];
  for (const node of nodes) {
    if (node.type === 'raw') {
      out.push(node);
      continue;
    }

    if (node.type === 'text') {
      for (const piece of splitPlaceholders(node.value, rendered)) {
        if (typeof piece === 'string') {
          pushText(out, piece);
        } else {
          out.push(...piece);
        }
      }
      continue;
    }

    const code = node.tag === 'pre' ? node.children[0] : undefined;
    const codeText = code && code.type === 'element' ? code.children[0] : undefined;
    const only = codeText && codeText.type === 'text' ? PLACEHOLDER_ONLY_RE.exec(codeText.value) : null;
    if (only) {
      out.push(...(rendered[Number(only[1])] ?? []));
      continue;
    }

    if (node.tag === 'p') {
      const attrs = node.attrs;
      let run: TokenNode[] = [];
      const flush = (): void => {
        if (run.some((child) => child.type !== 'text' || child.value.trim() !== '')) {
          out.push(element('p', attrs, run));
        }
        run = [];
      };
      for (const child of node.children) {
        if (child.type !== 'text') {
          run.push(child);
          continue;
        }
        for (const piece of splitPlaceholders(child.value, rendered)) {
          if (typeof piece === 'string') {
            pushText(run, piece);
          } else {
            flush();
            out.push(...piece);
          }
        }
      }
      flush();
      continue;
    }

    node.children = restoreBlocks(node.children, rendered);
    out.push(node);
  }
  return out;
}
