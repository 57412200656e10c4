/**
 * Text preprocessors run before block parsing.
 *
 * @module core/preprocessor
 */
import type { PassContext, Preprocessor } from './types.js';

/**
 * Normalise line endings to `\n`, drop a leading byte-order mark and strip
 * null bytes.
 */
export function normalizeNewlines(markdown: string): string {
  return markdown
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .replace(/\x00/g, '');
}

/**
 * Replace tabs with spaces up to the next tab stop.
 *
 * @param tabLength - Width of a tab stop.
 */
export function expandTabs(markdown: string, tabLength = 4): string {
  if (!markdown.includes('\t')) return markdown;
  return markdown
    .split('\n')
    .map((line) => {
      let result = '';
      for (const ch of line) {
        if (ch === '\t') {
          result += ' '.repeat(tabLength - (result.length % tabLength));
        } else {
          result += ch;
        }
      }
      return result;
    })
    .join('\n');
}

export const normalizeNewlinesPreprocessor: Preprocessor = {
  kind: 'preprocessor',
  name: 'normalize-newlines',
  run: (markdown) => normalizeNewlines(markdown),
};

export function expandTabsPreprocessor(tabLength: number): Preprocessor {
  return {
    kind: 'preprocessor',
    name: 'expand-tabs',
    run: (markdown) => expandTabs(markdown, tabLength),
  };
}

/**
 * Apply preprocessors in order.
 *
 * @param preprocessors - Preprocessors in resolved registry order.
 */
export function preprocessMarkdown(
  markdown: string,
  preprocessors: readonly Preprocessor[],
  context: PassContext,
): string {
  let result = typeof markdown === 'string' ? markdown : '';
  for (const preprocessor of preprocessors) {
    result = preprocessor.run(result, context);
  }
  return result;
}
