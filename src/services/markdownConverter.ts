import MarkdownIt from 'markdown-it';
import hljs from 'highlight.js';
import markdownItFootnote from 'markdown-it-footnote';
import { ExtensionConfig, ExtensionOptions, LinkResolver } from '../types';
import { UnknownExtensionError } from '../errors';
import { Logger } from './logger';
import { readTocOptions, tocPlugin } from './tocPlugin';
import { wikiLinkPlugin } from './wikiLinks';

export const BASELINE_EXTENSIONS = ['fenced_code', 'tables', 'codehilite'];

const EXTENSION_PREFIX = 'markdown.extensions.';

type ExtensionInstaller = (md: MarkdownIt, options: ExtensionOptions, install: (id: string) => void) => void;

function escapeHtml(input: string): string {
  return input
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function highlightCode(code: string, lang: string, guessLang: boolean, langPrefix: string): string {
  const langClass = lang ? ` ${escapeHtml(langPrefix + lang)}` : '';
  if (lang && hljs.getLanguage(lang)) {
    const highlighted = hljs.highlight(code, { language: lang, ignoreIllegals: true }).value;
    return `<pre><code class="hljs${langClass}">${highlighted}</code></pre>`;
  }
  if (!lang && guessLang) {
    return `<pre><code class="hljs">${hljs.highlightAuto(code).value}</code></pre>`;
  }
  return `<pre><code class="hljs${langClass}">${escapeHtml(code)}</code></pre>`;
}

const installFencedCode: ExtensionInstaller = (md, options) => {
  if (typeof options.lang_prefix === 'string') {
    md.set({ langPrefix: options.lang_prefix });
  }
};

const installCodeHilite: ExtensionInstaller = (md, options) => {
  const cssClass = typeof options.css_class === 'string' ? options.css_class : 'codehilite';
  const guessLang = options.guess_lang !== false;

  md.set({
    highlight: (code: string, lang: string) => highlightCode(code, lang, guessLang, md.options.langPrefix ?? 'language-'),
  });

  const defaultFence = md.renderer.rules.fence;
  md.renderer.rules.fence = (tokens, idx, opts, env, self) => {
    const inner = defaultFence
      ? defaultFence(tokens, idx, opts, env, self)
      : `<pre><code>${escapeHtml(tokens[idx].content)}</code></pre>\n`;
    return `<div class="${escapeHtml(cssClass)}">${inner}</div>\n`;
  };
};

const EXTENSIONS = new Map<string, ExtensionInstaller>([
  ['fenced_code', installFencedCode],
  ['tables', md => { md.enable('table'); }],
  ['codehilite', installCodeHilite],
  ['toc', (md, options) => { md.use(tocPlugin, readTocOptions(options)); }],
  ['footnotes', md => { md.use(markdownItFootnote); }],
  ['nl2br', md => { md.set({ breaks: true }); }],
  ['smarty', md => { md.set({ typographer: true }); }],
  ['extra', (_md, _options, install) => {
    install('fenced_code');
    install('tables');
    install('footnotes');
  }],
]);

export function normalizeExtensionId(id: string): string {
  return id.startsWith(EXTENSION_PREFIX) ? id.slice(EXTENSION_PREFIX.length) : id;
}

export function isKnownExtension(id: string): boolean {
  return EXTENSIONS.has(normalizeExtensionId(id));
}

/**
 * Baseline extensions first, then the configured ones in order. Options
 * given for a baseline id apply to it.
 */
export function mergeExtensions(config: ExtensionConfig): ExtensionConfig {
  const merged: ExtensionConfig = new Map();
  for (const id of BASELINE_EXTENSIONS) {
    merged.set(id, {});
  }
  for (const [rawId, options] of config) {
    const id = normalizeExtensionId(rawId);
    merged.set(id, { ...(merged.get(id) ?? {}), ...options });
  }
  return merged;
}

export class MarkdownConverter {
  private md: MarkdownIt;
  private logger: Logger;

  constructor(
    extensions: ExtensionConfig,
    resolveLink: LinkResolver,
    verbose: boolean = false,
    stream?: NodeJS.WritableStream
  ) {
    this.logger = new Logger('MarkdownConverter', verbose, stream);
    this.md = new MarkdownIt({
      html: true,
      linkify: false,
      typographer: false,
    });

    const merged = mergeExtensions(extensions);
    const installed = new Set<string>();
    const install = (id: string): void => {
      if (installed.has(id)) return;
      const installer = EXTENSIONS.get(id);
      if (!installer) {
        throw new UnknownExtensionError(id);
      }
      installed.add(id);
      installer(this.md, merged.get(id) ?? {}, install);
    };

    for (const id of merged.keys()) {
      install(id);
    }
    this.logger.log(`Extensions: ${[...installed].join(', ')}`);

    this.md.use(wikiLinkPlugin, { resolve: resolveLink });
  }

  public convert(body: string): string {
    return this.md.render(body);
  }
}
