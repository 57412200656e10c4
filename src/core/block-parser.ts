/**
 * Line-oriented block parser.
 *
 * Keeps an explicit stack of open blocks. At each line the innermost open
 * block is checked for its close marker first (only at the indent it was
 * opened with; a close marker at any other indent is content). Raw blocks
 * take every other line verbatim. Container blocks and the document root
 * look for an open marker from any registered syntax and push a new
 * frame when one matches. Everything else is prose collected into text
 * blocks.
 *
 * A line that closes an enclosing block first closes the blocks opened
 * inside it. Blocks closed that way, or still open at end of input, are
 * closed implicitly and a warning is recorded; parsing never fails.
 *
 * @module core/block-parser
 */
import { createLogger } from './logger.js';
import type {
  Block,
  BlockOpen,
  BlockSyntax,
  ContainerBlock,
  ParsedDocument,
  RawBlock,
} from './types.js';

const log = createLogger('blocks');

type HeaderState = 'none' | 'pending' | 'open' | 'done';

interface Frame {
  syntax: BlockSyntax | null;
  open: BlockOpen;
  children: Block[];
  /** Pending prose lines, flushed into a text block. */
  text: string[];
  /** Body lines, dedented by `open.indent`. */
  lines: string[];
  header: string[];
  headerState: HeaderState;
  line: number;
}

/** Count leading spaces. */
export function indentOf(line: string): number {
  const match = /^ */.exec(line);
  return match ? match[0].length : 0;
}

/** Remove up to `indent` leading spaces. */
export function dedent(line: string, indent: number): string {
  return line.slice(Math.min(indent, indentOf(line)));
}

export class BlockParser {
  /**
   * @param syntaxes - Block syntaxes in resolved registry order.
   */
  constructor(private readonly syntaxes: readonly BlockSyntax[]) {}

  /**
   * Parse lines into a tree of blocks.
   *
   * @example
   * ```ts
   * const parser = new BlockParser([fenceSyntax]);
   * parser.parse(['```diagram', 'graph TB', '```']).blocks[0];
   * // => { kind: 'raw', type: 'diagram', content: 'graph TB', ... }
   * ```
   */
  parse(lines: readonly string[], warnings: string[] = []): ParsedDocument {
    const root = newFrame(null, { type: 'document', info: '', marker: '', indent: 0 }, 0);
    const stack: Frame[] = [root];

    lines.forEach((line, index) => {
      const top = stack[stack.length - 1];
      const ancestors = stack.slice(1, -1);

      if (top.syntax) {
        if (closes(top, line)) {
          record(ancestors, line);
          stack.pop();
          this.close(top, stack[stack.length - 1], true);
          return;
        }

        const level = this.enclosingClose(stack, lines, index);
        if (level > 0) {
          while (stack.length - 1 > level) {
            const inner = stack.pop();
            if (!inner) break;
            this.closeUnterminated(inner, stack[stack.length - 1], `line ${index + 1}`, warnings);
          }
          const frame = stack[level];
          record(stack.slice(1, level), line);
          stack.pop();
          this.close(frame, stack[stack.length - 1], true);
          return;
        }

        const body = dedent(line, top.open.indent);
        if (top.headerState === 'pending') {
          top.headerState = body.trim() === '---' ? 'open' : 'done';
          if (top.headerState === 'open') {
            record(ancestors, line);
            return;
          }
        } else if (top.headerState === 'open') {
          record(ancestors, line);
          if (body.trim() === '---') {
            top.headerState = 'done';
          } else {
            top.header.push(body);
          }
          return;
        }

        if (top.syntax.content === 'raw') {
          record(stack.slice(1), line);
          return;
        }
      }

      const indent = indentOf(line);
      const stripped = line.slice(indent);
      for (const syntax of this.syntaxes) {
        const open = syntax.matchOpen(stripped);
        if (!open) continue;
        record(stack.slice(1), line);
        flushText(top);
        const frame = newFrame(syntax, { ...open, indent }, index + 1);
        log('line %d: open %s block "%s"', index + 1, syntax.name, open.type);
        stack.push(frame);
        return;
      }

      record(stack.slice(1), line);
      top.text.push(dedent(line, top.open.indent));
    });

    while (stack.length > 1) {
      const frame = stack.pop();
      if (!frame) break;
      this.closeUnterminated(frame, stack[stack.length - 1], 'end of input', warnings);
    }

    flushText(root);
    return { blocks: root.children };
  }

  /**
   * Stack index of the innermost enclosing block that `lines[index]`
   * closes, or -1. A raw block gives way only when its own close never
   * comes, so a fence may still carry an enclosing block's marker.
   */
  private enclosingClose(stack: readonly Frame[], lines: readonly string[], index: number): number {
    const line = lines[index];
    for (let level = stack.length - 2; level > 0; level--) {
      if (!closes(stack[level], line)) continue;
      const top = stack[stack.length - 1];
      if (top.syntax?.content === 'raw' && lines.slice(index + 1).some((later) => closes(top, later))) {
        return -1;
      }
      return level;
    }
    return -1;
  }

  private closeUnterminated(frame: Frame, parent: Frame, where: string, warnings: string[]): void {
    const label = frame.open.type || frame.syntax?.name || 'block';
    const message = `Unterminated ${label} block opened at line ${frame.line} was closed at ${where}`;
    log(message);
    warnings.push(message);
    this.close(frame, parent, false);
  }

  private close(frame: Frame, parent: Frame, closed: boolean): void {
    const { syntax, open } = frame;
    if (!syntax) return;

    if (frame.headerState === 'open') {
      // The header never ended: its lines were prose after all.
      const restored = ['---', ...frame.header];
      frame.lines.unshift(...restored);
      frame.text.unshift(...restored);
      frame.header = [];
    }

    flushText(parent);
    let block: ContainerBlock | RawBlock;
    if (syntax.content === 'raw') {
      block = {
        kind: 'raw',
        syntax: syntax.name,
        type: open.type,
        info: open.info,
        marker: open.marker,
        indent: open.indent,
        closed,
        content: frame.lines.join('\n'),
      };
    } else {
      flushText(frame);
      block = {
        kind: 'container',
        syntax: syntax.name,
        type: open.type,
        info: open.info,
        marker: open.marker,
        indent: open.indent,
        closed,
        header: frame.header,
        lines: frame.lines,
        children: frame.children,
      };
    }
    parent.children.push(block);
  }
}

/** Whether `line` is the close marker of `frame`, at the indent it opened with. */
function closes(frame: Frame, line: string): boolean {
  if (!frame.syntax) return false;
  const indent = indentOf(line);
  return indent === frame.open.indent && frame.syntax.isClose(line.slice(indent), frame.open);
}

function newFrame(syntax: BlockSyntax | null, open: BlockOpen, line: number): Frame {
  return {
    syntax,
    open,
    children: [],
    text: [],
    lines: [],
    header: [],
    headerState: syntax?.header ? 'pending' : 'none',
    line,
  };
}

/** Append `line` to the body of each frame, dedented for that frame. */
function record(frames: Frame[], line: string): void {
  for (const frame of frames) {
    frame.lines.push(dedent(line, frame.open.indent));
  }
}

function flushText(frame: Frame): void {
  if (frame.text.length === 0) return;
  frame.children.push({ kind: 'text', lines: frame.text });
  frame.text = [];
}
