import { readFile } from 'fs/promises';
import { ConversionResult, Placeholder, PlaceholderSet, RunSettings } from '../types';
import { FrontMatterExtractor, formatIsoDate } from './frontMatter';
import { Logger } from './logger';
import { MarkdownConverter } from './markdownConverter';
import { outputFileFor, pageName, substitute, TemplateRenderer } from './templateRenderer';
import { createLinkResolver } from './wikiLinks';

export interface PipelineOptions {
  autoIndex: boolean;
  now?: Date;
  /** Where verbose logs go; stderr when omitted */
  logStream?: NodeJS.WritableStream;
}

export async function convertPage(settings: RunSettings, options: PipelineOptions): Promise<ConversionResult> {
  const { verbose } = settings;
  const stream = options.logStream;
  const logger = new Logger('Pipeline', verbose, stream);
  const converter = new MarkdownConverter(
    settings.extensions,
    createLinkResolver({ autoIndex: options.autoIndex }),
    verbose,
    stream
  );

  const source = await readFile(settings.inputFile, 'utf8');
  const frontMatter = new FrontMatterExtractor(verbose, stream).extract(source);
  if (frontMatter.suppress) {
    logger.log(`nohtml set in ${settings.inputFile}, skipping`);
    return { status: 'suppressed', inputFile: settings.inputFile };
  }

  const renderer = new TemplateRenderer(settings.templatePath, settings.templateExt, verbose, stream);
  const template = await renderer.selectTemplate(settings.templateDefault, frontMatter.template);

  const placeholders: PlaceholderSet = {
    [Placeholder.TITLE]: frontMatter.title ?? pageName(settings.inputFile),
    [Placeholder.DATE]: frontMatter.date ?? formatIsoDate(options.now ?? new Date()),
    [Placeholder.ROOT_PATH]: settings.rootPath
  };

  const content = converter.convert(frontMatter.body);
  const outputFile = outputFileFor(settings.outputDir, settings.inputFile);
  await renderer.write(outputFile, substitute(template, placeholders, content));

  return { status: 'written', outputFile };
}
