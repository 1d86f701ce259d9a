import { readFile, stat, writeFile } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { Placeholder, PlaceholderSet } from '../types';
import { Logger } from './logger';

export const DEFAULT_TEMPLATE = `<!DOCTYPE html>
<html>
    <head>
        <meta charset="UTF-8" />
        <meta name="date" content="%date%" scheme="YYYY-MM-DD">
        <meta name="viewport" content="width=device-width" />
        <title>%title%</title>
        <link rel="stylesheet" href="%root_path%style.css" type="text/css"
         media="screen" title="no title" charset="utf-8">
        <link rel="stylesheet" href="%root_path%pygmentize.css" type="text/css"
         media="screen" title="no title" charset="utf-8">
    </head>
    <body>

%content%

    </body>
</html>
`;

export function pageName(inputFile: string): string {
  return basename(inputFile, extname(inputFile));
}

export function outputFileFor(outputDir: string, inputFile: string): string {
  return join(outputDir, `${pageName(inputFile)}.html`);
}

export function templateFileFor(templatePath: string, name: string, templateExt: string): string {
  return resolve(templatePath, name) + templateExt;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Replace every occurrence of each placeholder, then the content slot.
 * Values are inserted literally and are not scanned for other tokens.
 */
export function substitute(template: string, placeholders: PlaceholderSet, content: string): string {
  let result = template;
  for (const token of [Placeholder.TITLE, Placeholder.DATE, Placeholder.ROOT_PATH] as const) {
    const value = placeholders[token];
    result = result.replaceAll(token, () => value);
  }
  return result.replaceAll(Placeholder.CONTENT, () => content);
}

export class TemplateRenderer {
  private templatePath: string;
  private templateExt: string;
  private logger: Logger;

  constructor(templatePath: string, templateExt: string, verbose: boolean = false, stream?: NodeJS.WritableStream) {
    this.templatePath = templatePath;
    this.templateExt = templateExt;
    this.logger = new Logger('TemplateRenderer', verbose, stream);
  }

  /**
   * Load `<template path>/<name><ext>` if it is a file, otherwise return
   * `fallback`.
   */
  public async loadTemplate(name: string, fallback: string): Promise<string> {
    const file = templateFileFor(this.templatePath, name, this.templateExt);
    if (!(await isFile(file))) {
      this.logger.log(`Template ${file} not found, keeping current template`);
      return fallback;
    }
    this.logger.log(`Using template ${file}`);
    return await readFile(file, 'utf8');
  }

  /**
   * Built-in template, replaced by the default template file, replaced in
   * turn by the page's own override.
   */
  public async selectTemplate(defaultName: string, override?: string): Promise<string> {
    let template = await this.loadTemplate(defaultName, DEFAULT_TEMPLATE);
    if (override !== undefined) {
      template = await this.loadTemplate(override, template);
    }
    return template;
  }

  public async write(outputFile: string, html: string): Promise<void> {
    await writeFile(outputFile, html, 'utf8');
    this.logger.log(`Wrote ${outputFile}`);
  }
}
