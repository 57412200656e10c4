/**
 * Constructors and traversal helpers for the token tree.
 *
 * @module core/nodes
 */
import type {
  Document,
  DocumentMetadata,
  ElementNode,
  RawNode,
  TextNode,
  TokenNode,
} from './types.js';

export function text(value: string): TextNode {
  return { type: 'text', value };
}

export function raw(value: string): RawNode {
  return { type: 'raw', value };
}

export function element(
  tag: string,
  attrs: Record<string, string> = {},
  children: TokenNode[] = [],
): ElementNode {
  return { type: 'element', tag, attrs, children };
}

export function isElement(node: TokenNode, tag?: string): node is ElementNode {
  return node.type === 'element' && (tag === undefined || node.tag === tag);
}

export function emptyMetadata(): DocumentMetadata {
  return { toc: [], warnings: [], data: {} };
}

export function createDocument(children: TokenNode[] = []): Document {
  return { type: 'document', children, metadata: emptyMetadata() };
}

/**
 * Visit every element depth-first, parents before children.
 *
 * The visitor receives the element together with its parent's child list
 * and index so it can replace or remove the element in place. Returning a
 * number moves the cursor to that index of the parent list instead of
 * descending into the element.
 */
export function walkElements(
  nodes: TokenNode[],
  visitor: (node: ElementNode, siblings: TokenNode[], index: number) => number | void,
): void {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (node.type !== 'element') continue;
    const next = visitor(node, nodes, i);
    if (typeof next === 'number') {
      i = next - 1;
      continue;
    }
    walkElements(node.children, visitor);
  }
}

/** Concatenate the literal text below the given nodes. */
export function textContent(nodes: TokenNode[]): string {
  let result = '';
  for (const node of nodes) {
    if (node.type === 'text') {
      result += node.value;
    } else if (node.type === 'element') {
      result += textContent(node.children);
    }
  }
  return result;
}

/** Split a `class` attribute into its names. */
export function classList(node: ElementNode): string[] {
  return (node.attrs['class'] ?? '').split(/\s+/).filter((name) => name.length > 0);
}

/** Add class names that the element does not carry yet. */
export function addClass(node: ElementNode, ...names: string[]): void {
  const classes = classList(node);
  for (const name of names) {
    if (!classes.includes(name)) {
      classes.push(name);
    }
  }
  node.attrs['class'] = classes.join(' ');
}
