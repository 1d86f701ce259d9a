import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Writable } from 'stream';
import { RunSettings } from '../src/types';

export async function makeTempDir(): Promise<string> {
  return await mkdtemp(join(tmpdir(), 'vimwiki-html-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export class MemoryStream extends Writable {
  private chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(String(chunk));
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }
}

export function makeSettings(overrides: Partial<RunSettings> = {}): RunSettings {
  return {
    force: '0',
    syntax: 'markdown',
    extension: 'md',
    outputDir: '.',
    inputFile: 'page.md',
    cssFile: 'style.css',
    templatePath: '',
    templateDefault: '',
    templateExt: '',
    rootPath: '',
    extensions: new Map(),
    verbose: false,
    ...overrides
  };
}
