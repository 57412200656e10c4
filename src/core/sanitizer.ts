/**
 * Sanitizer for the token tree and for raw HTML fragments.
 *
 * Element nodes are filtered structurally; raw nodes (HTML copied from the
 * source) go through a regex-based filter. Both remove the same things:
 * dangerous elements with their content, inline event handlers, and
 * `javascript:`, `vbscript:` and `data:` URIs in URL attributes.
 *
 * @module core/sanitizer
 */
import type { Document, PostprocessorPass, TokenNode } from './types.js';

/** Tags whose content and structure are always stripped. */
export const DANGEROUS_TAGS = [
  'script',
  'iframe',
  'embed',
  'object',
  'style',
  'form',
  'applet',
  'base',
  'meta',
  'svg',
  'math',
  'template',
] as const;

const DANGEROUS_TAG_SET: ReadonlySet<string> = new Set(DANGEROUS_TAGS);

/** Attributes that carry URLs. */
const URL_ATTRIBUTES = new Set(['href', 'src', 'action', 'formaction']);

const DANGEROUS_SCHEME_RE = /^\s*(?:javascript|vbscript|data)\s*:/i;

// ---------------------------------------------------------------------------
// Raw HTML
// ---------------------------------------------------------------------------

/**
 * For each dangerous tag, a pair of pre-compiled RegExp objects:
 *   [0] matches paired tags with content  (e.g. `<script ...>...</script>`)
 *   [1] matches self-closing / orphaned opening tags  (e.g. `<script ... />`)
 */
const DANGEROUS_TAG_PATTERNS: ReadonlyArray<readonly [RegExp, RegExp]> = DANGEROUS_TAGS.map(
  (tag) =>
    [
      new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, 'gi'),
      new RegExp(`<\\/?${tag}\\b[^>]*/?>`, 'gi'),
    ] as const,
);

/** Matches inline event-handler attributes (onclick, onerror, ...). */
const EVENT_HANDLER_RE = /\s+on\w+\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>]+)/gi;

/** URL attribute with a quoted value; group 2 is the quote. */
const URL_ATTR_RE = /(href|src|action|formaction)\s*=\s*(["'])(.*?)\2/gi;

/** URL attribute with an unquoted dangerous value. */
const UNQUOTED_DANGEROUS_URI_RE =
  /(href|src|action|formaction)\s*=\s*(?:javascript|vbscript|data)\s*:[^\s>]*/gi;

/** Decode numeric entities and drop control characters. */
function decodeAttributeValue(value: string): string {
  return value
    .replace(/&#x([0-9a-fA-F]+);/gi, (_m, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_m, dec: string) => String.fromCharCode(parseInt(dec, 10)))
    .replace(/[\x00-\x1f]+/g, '');
}

/**
 * Remove dangerous constructs from an HTML fragment.
 *
 * @example
 * ```ts
 * sanitizeHtml('<p onclick="alert(1)">hi</p>');
 * // => '<p>hi</p>'
 * ```
 */
export function sanitizeHtml(html: string): string {
  if (!html.includes('<')) return html;

  // A removal can join the pieces of a new match, so repeat until stable.
  let previous: string;
  let result = html;
  do {
    previous = result;
    result = sanitizeOnce(previous);
  } while (result !== previous);
  return result;
}

function sanitizeOnce(html: string): string {
  let result = html.replace(/\x00/g, '');

  for (const [pairedRe, singleRe] of DANGEROUS_TAG_PATTERNS) {
    result = result.replace(pairedRe, '').replace(singleRe, '');
  }

  result = result.replace(EVENT_HANDLER_RE, '');

  // Safe values are written back as they were.
  result = result.replace(URL_ATTR_RE, (match: string, attr: string, quote: string, value: string) =>
    DANGEROUS_SCHEME_RE.test(decodeAttributeValue(value)) ? `${attr}=${quote}${quote}` : match,
  );

  return result.replace(UNQUOTED_DANGEROUS_URI_RE, '$1=""');
}

// ---------------------------------------------------------------------------
// Token tree
// ---------------------------------------------------------------------------

function sanitizeNodes(nodes: TokenNode[]): void {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (node.type === 'raw') {
      node.value = sanitizeHtml(node.value);
      continue;
    }
    if (node.type !== 'element') continue;

    if (DANGEROUS_TAG_SET.has(node.tag.toLowerCase())) {
      nodes.splice(i, 1);
      i--;
      continue;
    }

    for (const name of Object.keys(node.attrs)) {
      const lower = name.toLowerCase();
      if (lower.startsWith('on')) {
        delete node.attrs[name];
      } else if (
        URL_ATTRIBUTES.has(lower) &&
        DANGEROUS_SCHEME_RE.test(decodeAttributeValue(node.attrs[name]))
      ) {
        node.attrs[name] = '';
      }
    }
    sanitizeNodes(node.children);
  }
}

/**
 * Built-in postprocessor pass running the sanitizer over the document.
 */
export const sanitizePass: PostprocessorPass = {
  kind: 'postprocessor',
  name: 'sanitize',
  run(document: Document): void {
    sanitizeNodes(document.children);
  },
};
