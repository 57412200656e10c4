/**
 * Rewrites relative link and image paths against a base path.
 *
 * URLs with a scheme, fragments, protocol-relative URLs and paths that are
 * already absolute are left alone, so running the pass twice changes
 * nothing.
 *
 * @module extensions/path-converter
 */
import path from 'node:path';

import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { walkElements } from '../core/nodes.js';

const SCHEME_RE = /^[a-z][a-z0-9+.-]*:/i;

const options = z
  .object({
    /** Absolute path relative URLs are resolved against. */
    basePath: z.string().startsWith('/', 'basePath must be absolute').default('/'),
    /** Attributes to rewrite. */
    attributes: z.array(z.string().min(1)).default(['href', 'src']),
  })
  .strict();

/** Whether `url` is a relative path the converter should rewrite. */
export function isRelativePath(url: string): boolean {
  const trimmed = url.trim();
  if (trimmed.length === 0) return false;
  if (SCHEME_RE.test(trimmed)) return false;
  return !trimmed.startsWith('#') && !trimmed.startsWith('/') && !trimmed.startsWith('?');
}

/**
 * Resolve a relative URL against `basePath`, keeping its query string and
 * fragment.
 *
 * @example
 * ```ts
 * resolvePath('/docs/', '../img/a.png#top'); // => '/img/a.png#top'
 * ```
 */
export function resolvePath(basePath: string, url: string): string {
  const split = /^([^?#]*)(.*)$/.exec(url.trim());
  const pathname = split ? split[1] : url;
  const suffix = split ? split[2] : '';
  let resolved = path.posix.resolve(basePath, pathname);
  if (pathname.endsWith('/') && !resolved.endsWith('/')) {
    resolved += '/';
  }
  return resolved + suffix;
}

export const pathConverter = defineExtension({
  name: 'pathConverter',
  options,
  setup({ postprocessors }, { basePath, attributes }) {
    postprocessors.register(
      'path-converter',
      {
        kind: 'postprocessor',
        name: 'path-converter',
        run(document) {
          walkElements(document.children, (node) => {
            for (const attribute of attributes) {
              const value = node.attrs[attribute];
              if (value !== undefined && isRelativePath(value)) {
                node.attrs[attribute] = resolvePath(basePath, value);
              }
            }
          });
        },
      },
      { priority: 60 },
    );
  },
});
