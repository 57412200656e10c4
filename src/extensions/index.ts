/**
 * Bundled plugins.
 *
 * @module extensions
 */
import type { Extension } from '../core/extension.js';
import { blocks } from './blocks/index.js';
import { caret } from './caret.js';
import { keys } from './keys.js';
import { magicLink } from './magic-link.js';
import { mark } from './mark.js';
import { pathConverter } from './path-converter.js';
import { smartSymbols } from './smart-symbols.js';
import { snippets } from './snippets.js';
import { superFences } from './super-fences.js';
import { taskList } from './task-list.js';
import { tilde } from './tilde.js';
import { toc } from './toc.js';

export * from './blocks/index.js';
export { caret } from './caret.js';
export { keys } from './keys.js';
export { PROVIDERS, magicLink } from './magic-link.js';
export type { Provider, ProviderUrls } from './magic-link.js';
export { mark } from './mark.js';
export { isRelativePath, pathConverter, resolvePath } from './path-converter.js';
export { ordinalSuffix, smartSymbols } from './smart-symbols.js';
export { snippets, snippetsFrom } from './snippets.js';
export type { SnippetSource } from './snippets.js';
export {
  FENCE_SYNTAX,
  divFormat,
  fenceSyntax,
  preFormat,
  renderCode,
  superFences,
} from './super-fences.js';
export type { CustomFence, FenceFormatter } from './super-fences.js';
export { taskList } from './task-list.js';
export { DELETE_RE, SUBSCRIPT_RE, tilde } from './tilde.js';
export { slugify, toc, uniqueId } from './toc.js';

/**
 * Every bundled plugin, in setup order. `pathConverter` is left out: it
 * needs a base path to be useful.
 */
export function bundledExtensions(): Extension[] {
  return [
    snippets,
    superFences,
    blocks,
    tilde,
    caret,
    mark,
    keys,
    smartSymbols,
    magicLink,
    taskList,
    toc,
  ];
}
