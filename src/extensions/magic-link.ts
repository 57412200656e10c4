/**
 * Automatic links.
 *
 * Bare URLs (`https://`, `ftp://`, `www.`) and e-mail addresses become
 * links. With a repository provider configured, shorthand references do
 * too: `@user`, `#123` and `owner/repo#123` for issues, and
 * `owner/repo@<sha>` for commits. Provider URLs come from a read-only
 * table the host can replace.
 *
 * @module extensions/magic-link
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { element, text } from '../core/nodes.js';
import { patternRule } from '../core/rules.js';

export type Provider = 'github' | 'gitlab' | 'bitbucket';

/** URL layout of a repository host. */
export interface ProviderUrls {
  base: string;
  issue: string;
  commit: string;
}

/**
 * Default provider table. `{user}`, `{repo}`, `{issue}` and `{sha}` are
 * replaced when a link is built.
 */
export const PROVIDERS: Readonly<Record<Provider, ProviderUrls>> = {
  github: {
    base: 'https://github.com',
    issue: '/{user}/{repo}/issues/{issue}',
    commit: '/{user}/{repo}/commit/{sha}',
  },
  gitlab: {
    base: 'https://gitlab.com',
    issue: '/{user}/{repo}/-/issues/{issue}',
    commit: '/{user}/{repo}/-/commit/{sha}',
  },
  bitbucket: {
    base: 'https://bitbucket.org',
    issue: '/{user}/{repo}/issues/{issue}',
    commit: '/{user}/{repo}/commits/{sha}',
  },
};

const URL_RE =
  /\b((?:(?:https?|ftp):\/\/|www\.)[-\w.~:/?#@!$&*+,;=%]*[-\w~/#@$&*+=%])/i;
const EMAIL_RE = /(?<![\w.+-])([\w.+-]+@[\w-]+(?:\.[\w-]+)*\.[a-z]{2,})(?![\w-])/i;
const MENTION_RE = /(?<![\w/@.])@([a-z0-9](?:[-a-z0-9]*[a-z0-9])?)(?![\w@])/i;
const ISSUE_RE = /(?<![\w/#])(?:([a-z0-9][-\w.]*)\/([-\w.]+))?#(\d+)(?!\w)/i;
const COMMIT_RE = /(?<![\w/@])([a-z0-9][-\w.]*)\/([-\w.]+)@([0-9a-f]{7,40})(?!\w)/i;

// Links never nest: these rules stay off inside link text.
const LINK_RULE = { createsLinks: true } as const;

const providerUrlsSchema = z
  .object({ base: z.string().url(), issue: z.string(), commit: z.string() })
  .strict();

const options = z
  .object({
    /** Drop the scheme from the text of URL links. */
    hideProtocol: z.boolean().default(false),
    /** Link repository shorthand references. */
    repoUrlShorthand: z.boolean().default(false),
    provider: z.enum(['github', 'gitlab', 'bitbucket']).default('github'),
    /** Default owner for `#123` references. */
    user: z.string().default(''),
    /** Default repository for `#123` references. */
    repo: z.string().default(''),
    /** Replacement provider table, e.g. for a self-hosted instance. */
    providers: z.record(z.enum(['github', 'gitlab', 'bitbucket']), providerUrlsSchema).default({}),
  })
  .strict();

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export const magicLink = defineExtension({
  name: 'magicLink',
  options,
  setup({ inline }, config) {
    inline.register(
      'magic-url',
      patternRule('magic-url', URL_RE, (match) => {
        const url = match.groups[1];
        const href = /^www\./i.test(url) ? `http://${url}` : url;
        const label = config.hideProtocol ? url.replace(/^(?:https?|ftp):\/\//i, '') : url;
        return {
          nodes: [element('a', { href, class: 'magiclink magiclink-url' }, [text(label)])],
        };
      }, LINK_RULE),
      { priority: 40 },
    );

    inline.register(
      'magic-email',
      patternRule('magic-email', EMAIL_RE, (match) => ({
        nodes: [
          element('a', { href: `mailto:${match.groups[1]}`, class: 'magiclink magiclink-email' }, [
            text(match.groups[1]),
          ]),
        ],
      }), LINK_RULE),
      { priority: 41 },
    );

    if (!config.repoUrlShorthand) return;

    const urls = config.providers[config.provider] ?? PROVIDERS[config.provider];
    const providerClass = `magiclink-${config.provider}`;

    inline.register(
      'magic-commit',
      patternRule('magic-commit', COMMIT_RE, (match) => {
        const [, user, repo, sha] = match.groups;
        const href = urls.base + fill(urls.commit, { user, repo, sha });
        return {
          nodes: [
            element('a', { href, class: `magiclink magiclink-commit ${providerClass}` }, [
              text(`${user}/${repo}@${sha.slice(0, 7)}`),
            ]),
          ],
        };
      }, LINK_RULE),
      { priority: 42 },
    );

    inline.register(
      'magic-issue',
      patternRule('magic-issue', ISSUE_RE, (match) => {
        const [, explicitUser, explicitRepo, issue] = match.groups;
        const user = explicitUser || config.user;
        const repo = explicitRepo || config.repo;
        if (!user || !repo) return null;
        const label = explicitUser ? `${user}/${repo}#${issue}` : `#${issue}`;
        const href = urls.base + fill(urls.issue, { user, repo, issue });
        return {
          nodes: [
            element('a', { href, class: `magiclink magiclink-issue ${providerClass}` }, [text(label)]),
          ],
        };
      }, LINK_RULE),
      { priority: 43 },
    );

    inline.register(
      'magic-mention',
      patternRule('magic-mention', MENTION_RE, (match) => {
        const user = match.groups[1];
        return {
          nodes: [
            element('a', { href: `${urls.base}/${user}`, class: `magiclink magiclink-mention ${providerClass}` }, [
              text(`@${user}`),
            ]),
          ],
        };
      }, LINK_RULE),
      { priority: 44 },
    );
  },
});
