import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { createCli } from '../src/cli';
import { MemoryStream, makeTempDir, removeTempDir } from './helpers';

describe('vimwiki-markdown-html', () => {
  let dir: string;
  let site: string;
  let templates: string;
  let stdout: MemoryStream;
  let stderr: MemoryStream;

  async function run(args: string[], env: Record<string, string | undefined> = {}): Promise<number> {
    return await createCli().run(args, { stdout, stderr, env });
  }

  function positional(inputFile: string, ...rest: string[]): string[] {
    return ['--no-auto-index', '0', 'markdown', 'md', site, inputFile, join(site, 'style.css'), ...rest];
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    site = join(dir, 'site');
    templates = join(dir, 'templates');
    await mkdir(site);
    await mkdir(templates);
    await writeFile(join(templates, 'default.tpl'), '<title>%title%</title><link href="%root_path%style.css">%content%', 'utf8');
    stdout = new MemoryStream();
    stderr = new MemoryStream();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('converts a page with positional template arguments', async () => {
    const inputFile = join(dir, 'page.md');
    await writeFile(inputFile, '---\ntitle: Hello\n---\n# Hi\n[Page](sub/page)', 'utf8');

    const code = await run(positional(inputFile, templates, 'default', '.tpl', '-'));

    expect(code).toBe(0);
    expect(stderr.text()).toBe('');
    expect(stdout.text()).toBe('');
    await expect(readFile(join(site, 'page.html'), 'utf8')).resolves.toBe(
      '<title>Hello</title><link href="style.css"><h1>Hi</h1>\n<p><a href="sub/page.html">Page</a></p>\n'
    );
  });

  it('reads template settings from the environment', async () => {
    const inputFile = join(dir, 'page.md');
    await writeFile(inputFile, '---\ntitle: Env\n---\nbody', 'utf8');

    const code = await run(positional(inputFile), {
      VIMWIKI_TEMPLATE_PATH: templates,
      VIMWIKI_TEMPLATE_DEFAULT: 'default',
      VIMWIKI_TEMPLATE_EXT: '.tpl',
      VIMWIKI_ROOT_PATH: '/assets/'
    });

    expect(code).toBe(0);
    await expect(readFile(join(site, 'page.html'), 'utf8')).resolves.toBe(
      '<title>Env</title><link href="/assets/style.css"><p>body</p>\n'
    );
  });

  it('exits cleanly without output for nohtml pages', async () => {
    const inputFile = join(dir, 'draft.md');
    await writeFile(inputFile, '---\nnohtml: true\n---\ndraft', 'utf8');

    const code = await run(positional(inputFile));

    expect(code).toBe(0);
    expect(existsSync(join(site, 'draft.html'))).toBe(false);
  });

  it('rejects unsupported syntaxes', async () => {
    const code = await run(['0', 'default', 'wiki', site, join(dir, 'page.wiki'), join(site, 'style.css')]);

    expect(code).toBe(1);
    expect(stderr.text()).toBe('Unsupported syntax: default\n');
  });

  it('rejects unknown markdown extensions', async () => {
    const inputFile = join(dir, 'page.md');
    await writeFile(inputFile, 'text', 'utf8');

    const code = await run(positional(inputFile), { VIMWIKI_MARKDOWN_EXTENSIONS: 'tables,wikilinks' });

    expect(code).toBe(1);
    expect(stderr.text()).toBe('Unknown markdown extension: wikilinks\n');
  });

  it('reports filesystem errors', async () => {
    const code = await run(positional(join(dir, 'missing.md')));

    expect(code).toBe(1);
    expect(stderr.text()).toMatch(/^Error: ENOENT: no such file or directory/);
  });

  it('loads extensions from the environment', async () => {
    const inputFile = join(dir, 'page.md');
    await writeFile(inputFile, 'a\nb', 'utf8');

    const code = await run(positional(inputFile, templates, 'default', '.tpl', '-'), {
      VIMWIKI_MARKDOWN_EXTENSIONS: '{"nl2br": {}}'
    });

    expect(code).toBe(0);
    await expect(readFile(join(site, 'page.html'), 'utf8')).resolves.toBe(
      '<title>page</title><link href="style.css"><p>a<br>\nb</p>\n'
    );
  });

  it('logs progress in verbose mode', async () => {
    const inputFile = join(dir, 'page.md');
    await writeFile(inputFile, 'text', 'utf8');

    const code = await run(['--verbose', ...positional(inputFile, templates, 'default', '.tpl', '-')]);

    expect(code).toBe(0);
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toContain('[Convert] Auto index disabled\n');
    expect(stderr.text()).toContain('[MarkdownConverter] Extensions: fenced_code, tables, codehilite\n');
    expect(stderr.text()).toContain('[FrontMatter] Keys: (none)\n');
    expect(stderr.text()).toContain(`[TemplateRenderer] Wrote ${join(site, 'page.html')}\n`);
    expect(stderr.text()).toContain(`[Convert] Wrote HTML → ${join(site, 'page.html')}\n`);

  });
});
