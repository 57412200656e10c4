/**
 * HTML serializer for the token tree.
 *
 * Pure functions only. Text nodes and attribute values are escaped;
 * element structure and raw nodes are emitted as they are.
 *
 * @module core/serializer
 */
import type { Document, ElementNode, TokenNode } from './types.js';

// ---------------------------------------------------------------------------
// HTML entity escaping
// ---------------------------------------------------------------------------

const ENTITY_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape HTML special characters so that arbitrary text can be safely
 * embedded inside an HTML document.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

const DECODE_MAP: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  '#39': "'",
};

/** Reverse {@link escapeHtml} (basic entities only). */
export function unescapeHtml(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|#39);/g, (match, name: string) => DECODE_MAP[name] ?? match);
}

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

/** Elements rendered without a closing tag. */
const VOID_TAGS = new Set(['br', 'hr', 'img', 'input', 'wbr', 'col', 'source']);

/** Elements followed by a newline to keep the output readable. */
const BLOCK_TAGS = new Set([
  'p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'pre', 'blockquote', 'ul', 'ol',
  'li', 'table', 'thead', 'tbody', 'tr', 'hr', 'div', 'details', 'summary',
]);

function renderAttrs(attrs: Record<string, string>): string {
  let result = '';
  for (const [name, value] of Object.entries(attrs)) {
    result += ` ${name}="${escapeHtml(value)}"`;
  }
  return result;
}

function renderElement(node: ElementNode): string {
  const open = `<${node.tag}${renderAttrs(node.attrs)}`;
  const suffix = BLOCK_TAGS.has(node.tag) ? '\n' : '';
  if (VOID_TAGS.has(node.tag)) {
    return `${open} />${suffix}`;
  }
  return `${open}>${renderNodes(node.children)}</${node.tag}>${suffix}`;
}

/**
 * Serialize a list of nodes to HTML.
 */
export function renderNodes(nodes: readonly TokenNode[]): string {
  let html = '';
  for (const node of nodes) {
    switch (node.type) {
      case 'text':
        html += escapeHtml(node.value);
        break;
      case 'raw':
        html += node.value;
        break;
      case 'element':
        html += renderElement(node);
        break;
    }
  }
  return html;
}

/**
 * Serialize a whole document to HTML.
 *
 * @example
 * ```ts
 * renderDocument(createDocument([element('p', {}, [text('a < b')])]));
 * // => '<p>a &lt; b</p>\n'
 * ```
 */
export function renderDocument(document: Document): string {
  return renderNodes(document.children);
}

/**
 * Plain-text rendering: text content with block elements separated by
 * newlines and runs of blank lines collapsed.
 */
export function toPlainText(nodes: readonly TokenNode[]): string {
  const collect = (list: readonly TokenNode[]): string => {
    let result = '';
    for (const node of list) {
      if (node.type === 'text') {
        result += node.value;
      } else if (node.type === 'element') {
        if (node.tag === 'br') {
          result += '\n';
          continue;
        }
        result += collect(node.children);
        if (BLOCK_TAGS.has(node.tag)) {
          result += '\n';
        }
      }
    }
    return result;
  };
  return collect(nodes).replace(/\n{3,}/g, '\n\n').trim();
}
