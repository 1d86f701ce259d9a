import matter from 'gray-matter';
import { FrontMatter } from '../types';
import { Logger } from './logger';

export function formatIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * YAML gives booleans, numbers and dates; placeholders need strings.
 * Unquoted YAML dates are parsed as UTC midnight.
 */
export function normalizeValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString().slice(0, 10);
  }
  return undefined;
}

const CLOSING_DELIMITER = /\r?\n-{3,}[ \t]*(\r?\n|$)/;

/**
 * A leading `---` only opens a metadata block when a closing delimiter line
 * follows; otherwise it is a horizontal rule.
 */
export function hasMetadataBlock(text: string): boolean {
  return text.startsWith('---') && CLOSING_DELIMITER.test(text.slice(3));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class FrontMatterExtractor {
  private logger: Logger;

  constructor(verbose: boolean = false, stream?: NodeJS.WritableStream) {
    this.logger = new Logger('FrontMatter', verbose, stream);
  }

  private split(text: string): { data: Record<string, unknown>; content: string } {
    if (!hasMetadataBlock(text)) {
      return { data: {}, content: text };
    }
    const parsed = matter(text);
    const data: unknown = parsed.data;
    if (!isPlainObject(data)) {
      this.logger.log('Metadata block is not a mapping, ignoring it');
      return { data: {}, content: parsed.content };
    }
    return { data, content: parsed.content };
  }

  public extract(source: string): FrontMatter {
    const { data, content } = this.split(source.trim());

    const read = (key: string): string | undefined => {
      if (!(key in data)) return undefined;
      const value = normalizeValue(data[key]);
      if (value === undefined) this.logger.log(`Ignoring non-scalar value for "${key}"`);
      return value;
    };

    const result: FrontMatter = {
      suppress: read('nohtml') === 'true',
      title: read('title'),
      date: read('date'),
      template: read('template'),
      body: content + '\n'
    };

    this.logger.log(`Keys: ${Object.keys(data).join(', ') || '(none)'}`);
    return result;
  }
}
