import MarkdownIt from 'markdown-it';
import anchor from 'markdown-it-anchor';
import { ExtensionOptions } from '../types';

type CoreRule = Parameters<MarkdownIt['core']['ruler']['push']>[1];
type CoreState = Parameters<CoreRule>[0];
type Token = CoreState['tokens'][number];

export interface TocOptions {
  marker: string;
  title: string;
  tocClass: string;
  permalink: string | false;
}

interface TocEntry {
  level: number;
  id: string;
  title: string;
  children: TocEntry[];
}

export const DEFAULT_TOC_MARKER = '[TOC]';
export const DEFAULT_PERMALINK_SYMBOL = '¶';

export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/[^\w\s-]/g, '')
    .trim()
    .toLowerCase()
    .replace(/[-\s]+/g, '-');
}

export function readTocOptions(options: ExtensionOptions): TocOptions {
  const text = (key: string, fallback: string): string => {
    const value = options[key];
    return typeof value === 'string' ? value : fallback;
  };

  let permalink: string | false = false;
  if (options.permalink === true) permalink = DEFAULT_PERMALINK_SYMBOL;
  else if (typeof options.permalink === 'string' && options.permalink) permalink = options.permalink;

  return {
    marker: text('marker', DEFAULT_TOC_MARKER),
    title: text('title', ''),
    tocClass: text('toc_class', 'toc'),
    permalink
  };
}

function inlineText(token: Token | undefined): string {
  if (!token || !token.children) return '';
  return token.children
    .filter(child => child.type === 'text' || child.type === 'code_inline')
    .map(child => child.content)
    .join('');
}

function collectHeadings(tokens: Token[]): TocEntry[] {
  const roots: TocEntry[] = [];
  const stack: TocEntry[] = [];

  tokens.forEach((token, index) => {
    if (token.type !== 'heading_open') return;
    const id = token.attrGet('id');
    if (id === null) return;

    const entry: TocEntry = {
      level: Number(token.tag.slice(1)),
      id,
      title: inlineText(tokens[index + 1]),
      children: []
    };
    while (stack.length > 0 && stack[stack.length - 1].level >= entry.level) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];
    (parent ? parent.children : roots).push(entry);
    stack.push(entry);
  });

  return roots;
}

function renderEntries(md: MarkdownIt, entries: TocEntry[]): string {
  if (entries.length === 0) return '<ul></ul>';
  const items = entries.map(entry => {
    const link = `<a href="#${md.utils.escapeHtml(entry.id)}">${md.utils.escapeHtml(entry.title)}</a>`;
    const nested = entry.children.length > 0 ? `\n${renderEntries(md, entry.children)}\n` : '';
    return `<li>${link}${nested}</li>`;
  });
  return `<ul>\n${items.join('\n')}\n</ul>`;
}

function renderToc(md: MarkdownIt, entries: TocEntry[], options: TocOptions): string {
  const title = options.title
    ? `<span class="toctitle">${md.utils.escapeHtml(options.title)}</span>`
    : '';
  return `<div class="${md.utils.escapeHtml(options.tocClass)}">${title}${renderEntries(md, entries)}</div>\n`;
}

function isMarkerParagraph(tokens: Token[], index: number, marker: string): boolean {
  return tokens[index].type === 'paragraph_open'
    && tokens[index + 1]?.type === 'inline'
    && tokens[index + 1].content.trim() === marker
    && tokens[index + 2]?.type === 'paragraph_close';
}

/**
 * Heading ids through markdown-it-anchor, plus a table of contents in place
 * of every paragraph that holds only the marker.
 */
export function tocPlugin(md: MarkdownIt, options: TocOptions): void {
  const permalink = options.permalink
    ? {
      permalink: anchor.permalink.linkInsideHeader({
        symbol: options.permalink,
        placement: 'after',
        class: 'headerlink',
        ariaHidden: false,
        space: false,
        renderAttrs: () => ({ title: 'Permanent link' })
      })
    }
    : {};
  md.use(anchor, { slugify, tabIndex: false, ...permalink });

  md.core.ruler.push('toc', state => {
    let html: string | null = null;
    for (let index = 0; index < state.tokens.length; index++) {
      if (!isMarkerParagraph(state.tokens, index, options.marker)) continue;
      html ??= renderToc(md, collectHeadings(state.tokens), options);
      const block = new state.Token('html_block', '', 0);
      block.content = html;
      state.tokens.splice(index, 3, block);
    }
  });
}
