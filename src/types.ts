export enum Placeholder {
  TITLE = '%title%',
  DATE = '%date%',
  ROOT_PATH = '%root_path%',
  CONTENT = '%content%'
}

export type ExtensionOptions = Record<string, unknown>;

// Ordered: extensions load in insertion order
export type ExtensionConfig = Map<string, ExtensionOptions>;

export interface InvocationParameters {
  force: string;
  syntax: string;
  extension: string;
  outputDir: string;
  inputFile: string;
  cssFile: string;
  templatePath?: string;
  templateDefault?: string;
  templateExt?: string;
  rootPath?: string;
}

export interface RunSettings {
  force: string;
  syntax: string;
  extension: string;
  outputDir: string;
  inputFile: string;
  cssFile: string;
  templatePath: string;
  templateDefault: string;
  templateExt: string;
  rootPath: string;
  extensions: ExtensionConfig;
  verbose: boolean;
}

export interface FrontMatter {
  suppress: boolean;
  title?: string;
  date?: string;
  template?: string;
  body: string;
}

export type PlaceholderSet = Record<Placeholder.TITLE | Placeholder.DATE | Placeholder.ROOT_PATH, string>;

export interface LinkPolicyOptions {
  autoIndex: boolean;
}

export type LinkResolver = (target: string) => string;

export type ConversionResult =
  | { status: 'written'; outputFile: string }
  | { status: 'suppressed'; inputFile: string };
