import MarkdownIt from 'markdown-it';
import { LinkPolicyOptions, LinkResolver } from '../types';

/**
 * Turn a bare wiki page reference into a site-relative HTML link.
 *
 * - `http...` targets and targets already ending in `.html` are kept
 * - `dir/` becomes `dir/index.html` in auto index mode, otherwise stays
 * - anything else gets `.html` appended
 */
export function resolveWikiLink(target: string, { autoIndex }: LinkPolicyOptions): string {
  if (target.startsWith('http') || target.endsWith('.html')) {
    return target;
  }
  if (target.endsWith('/')) {
    return autoIndex ? `${target}index.html` : target;
  }
  return `${target}.html`;
}

export function createLinkResolver(options: LinkPolicyOptions): LinkResolver {
  return target => resolveWikiLink(target, options);
}

type InlineRule = Parameters<MarkdownIt['inline']['ruler']['at']>[1];

export interface WikiLinkPluginOptions {
  resolve: LinkResolver;
}

// markdown-it's own `link` rule, taken from a parser with nothing else enabled
function builtinLinkRule(): InlineRule {
  const md = new MarkdownIt('zero');
  md.inline.ruler.enableOnly(['link']);
  const [rule] = md.inline.ruler.getRules('');
  if (!rule) {
    throw new Error('markdown-it has no inline link rule');
  }
  return rule;
}

/**
 * Rewrites the target of inline `[text](target)` links. Reference links,
 * autolinks and images keep theirs.
 */
export function wikiLinkPlugin(md: MarkdownIt, options: WikiLinkPluginOptions): void {
  const link = builtinLinkRule();

  md.inline.ruler.at('link', (state, silent) => {
    const start = state.tokens.length;
    if (!link(state, silent)) return false;
    if (silent) return true;

    // Inline links end at ")", reference links at "]"
    if (state.src.charCodeAt(state.pos - 1) !== 0x29) return true;

    const opener = state.tokens.slice(start).find(token => token.type === 'link_open');
    const href = opener?.attrGet('href');
    if (opener && typeof href === 'string') {
      opener.attrSet('href', options.resolve(href));
    }
    return true;
  });
}
