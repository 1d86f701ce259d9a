import { Command, Option } from 'clipanion';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';
import { Env, resolveSettings } from '../config';
import { ConversionError } from '../errors';
import { EditorProbe, StaticEditorProbe, VimEditorProbe } from '../services/editorProbe';
import { Logger } from '../services/logger';
import { convertPage } from '../services/pipeline';

export class ConvertCommand extends Command {
  static paths = [Command.Default];

  static usage = Command.Usage({
    description: 'Convert a vimwiki markdown page to HTML',
    details: `
      Called by vimwiki's \`customwiki2html\` hook with positional arguments. Front matter
      (\`title\`, \`date\`, \`template\`, \`nohtml\`) fills the template placeholders
      \`%title%\`, \`%date%\` and \`%root_path%\`; the rendered page replaces \`%content%\`.

      Optional arguments fall back to VIMWIKI_TEMPLATE_PATH, VIMWIKI_TEMPLATE_DEFAULT,
      VIMWIKI_TEMPLATE_EXT and VIMWIKI_ROOT_PATH. Extra markdown extensions come from
      VIMWIKI_MARKDOWN_EXTENSIONS as JSON or a comma-separated list.
    `,
    examples: [
      ['Convert a page', '$0 0 markdown md ~/wiki_html ~/wiki/index.md ~/wiki_html/style.css'],
      ['Use a template directory', '$0 0 markdown md out wiki/page.md out/style.css templates default .tpl -'],
      ['Skip probing the editor', '$0 --no-auto-index 0 markdown md out wiki/page.md out/style.css'],
    ],
  });

  autoIndex = Option.Boolean('--auto-index', {
    description: 'Resolve links ending in "/" to index.html (probes vim when omitted)',
  });

  verbose = Option.Boolean('--verbose', false, {
    description: 'Enable verbose output',
  });

  force = Option.String();
  syntax = Option.String();
  extension = Option.String();
  outputDir = Option.String();
  inputFile = Option.String();
  cssFile = Option.String();
  templatePath = Option.String({ required: false });
  templateDefault = Option.String({ required: false });
  templateExt = Option.String({ required: false });
  rootPath = Option.String({ required: false });

  private loadEnv(cwd: string): Env {
    const env: Env = { ...this.context.env };
    const fromFile: Record<string, string> = {};
    dotenvConfig({ path: resolve(cwd, '.env'), processEnv: fromFile });
    for (const [key, value] of Object.entries(fromFile)) {
      if (env[key] === undefined) env[key] = value;
    }
    return env;
  }

  async execute(): Promise<number> {
    try {
      const cwd = process.cwd();
      const env = this.loadEnv(cwd);
      const settings = resolveSettings({
        force: this.force,
        syntax: this.syntax,
        extension: this.extension,
        outputDir: this.outputDir,
        inputFile: this.inputFile,
        cssFile: this.cssFile,
        templatePath: this.templatePath,
        templateDefault: this.templateDefault,
        templateExt: this.templateExt,
        rootPath: this.rootPath,
      }, env, cwd);
      if (this.verbose) settings.verbose = true;

      const logger = new Logger('Convert', settings.verbose, this.context.stderr);
      const probe: EditorProbe = this.autoIndex === undefined
        ? new VimEditorProbe(['vim', 'nvim'], undefined, settings.verbose, this.context.stderr)
        : new StaticEditorProbe(this.autoIndex);
      const autoIndex = await probe.detectAutoIndex();
      logger.log(`Auto index ${autoIndex ? 'enabled' : 'disabled'}`);

      const result = await convertPage(settings, { autoIndex, logStream: this.context.stderr });
      if (result.status === 'written') {
        logger.log(`Wrote HTML → ${result.outputFile}`);
      }
      return 0;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.context.stderr.write(err instanceof ConversionError ? `${message}\n` : `Error: ${message}\n`);
      return 1;
    }
  }
}
