import { ExtensionConfig, ExtensionOptions, InvocationParameters, RunSettings } from './types';
import { UnsupportedSyntaxError } from './errors';

export type Env = Record<string, string | undefined>;

export const SUPPORTED_SYNTAX = 'markdown';

// Stylesheets sit next to the output when the root path is "-"
export const ROOT_PATH_SENTINEL = '-';

export function getTemplatePath(env: Env): string {
  return env.VIMWIKI_TEMPLATE_PATH ?? '';
}

export function getTemplateDefault(env: Env): string {
  return env.VIMWIKI_TEMPLATE_DEFAULT ?? '';
}

export function getTemplateExt(env: Env): string {
  return env.VIMWIKI_TEMPLATE_EXT ?? '';
}

export function getRootPath(env: Env, cwd: string): string {
  return env.VIMWIKI_ROOT_PATH ?? cwd;
}

export function isVerbose(env: Env): boolean {
  const raw = String(env.VIMWIKI_MARKDOWN_VERBOSE || '').trim().toLowerCase();
  return raw === '1' || raw === 'true';
}

export function normalizeRootPath(rootPath: string): string {
  return rootPath === ROOT_PATH_SENTINEL ? '' : rootPath;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromIds(ids: string[]): ExtensionConfig {
  const config: ExtensionConfig = new Map();
  for (const raw of ids) {
    const id = raw.trim();
    if (id && !config.has(id)) config.set(id, {});
  }
  return config;
}

/**
 * Legacy form of VIMWIKI_MARKDOWN_EXTENSIONS: "tables,toc".
 */
export function parseLegacyExtensionList(raw: string): ExtensionConfig {
  return fromIds(raw.split(','));
}

/**
 * Parse VIMWIKI_MARKDOWN_EXTENSIONS. A JSON object maps extension id to its
 * options, a JSON array lists bare ids; anything else is read as the legacy
 * comma-separated list.
 */
export function parseExtensionConfig(raw: string = '{}'): ExtensionConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return parseLegacyExtensionList(raw);
  }

  if (Array.isArray(parsed)) {
    return fromIds(parsed.filter((item): item is string => typeof item === 'string'));
  }

  if (isPlainObject(parsed)) {
    const config: ExtensionConfig = new Map();
    for (const [id, options] of Object.entries(parsed)) {
      const normalized: ExtensionOptions = isPlainObject(options) ? options : {};
      config.set(id, normalized);
    }
    return config;
  }

  return parseLegacyExtensionList(raw);
}

// Primary entry: positional arguments first, environment second
export function resolveSettings(params: InvocationParameters, env: Env, cwd: string): RunSettings {
  if (params.syntax !== SUPPORTED_SYNTAX) {
    throw new UnsupportedSyntaxError(params.syntax);
  }

  return {
    force: params.force,
    syntax: params.syntax,
    extension: params.extension,
    outputDir: params.outputDir,
    inputFile: params.inputFile,
    cssFile: params.cssFile,
    templatePath: params.templatePath ?? getTemplatePath(env),
    templateDefault: params.templateDefault ?? getTemplateDefault(env),
    templateExt: params.templateExt ?? getTemplateExt(env),
    rootPath: normalizeRootPath(params.rootPath ?? getRootPath(env, cwd)),
    extensions: parseExtensionConfig(env.VIMWIKI_MARKDOWN_EXTENSIONS),
    verbose: isVerbose(env)
  };
}
