import { spawn } from 'child_process';
import { Logger } from './logger';

export interface CaptureResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (command: string, args: string[]) => Promise<CaptureResult>;

/**
 * Tells whether links to directories should resolve to `index.html`.
 */
export interface EditorProbe {
  detectAutoIndex(): Promise<boolean>;
}

export function runCapture(command: string, args: string[]): Promise<CaptureResult> {
  return new Promise((resolvePromise, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], env: process.env });
    const outChunks: Buffer[] = [];
    const errChunks: Buffer[] = [];
    child.stdout.on('data', chunk => outChunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))));
    child.stderr.on('data', chunk => errChunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))));
    child.on('error', reject);
    child.on('close', code => {
      resolvePromise({ code: code ?? 1, stdout: Buffer.concat(outChunks).toString('utf8'), stderr: Buffer.concat(errChunks).toString('utf8') });
    });
  });
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export const DIR_LINK_QUERY = ['-c', 'echo g:vimwiki_dir_link', '-c', ':q', '--headless'];

export class VimEditorProbe implements EditorProbe {
  private candidates: string[];
  private runner: ProcessRunner;
  private logger: Logger;

  constructor(
    candidates: string[] = ['vim', 'nvim'],
    runner: ProcessRunner = runCapture,
    verbose: boolean = false,
    stream?: NodeJS.WritableStream
  ) {
    this.candidates = candidates;
    this.runner = runner;
    this.logger = new Logger('EditorProbe', verbose, stream);
  }

  public async detectAutoIndex(): Promise<boolean> {
    for (const binary of this.candidates) {
      let result: CaptureResult;
      try {
        result = await this.runner(binary, DIR_LINK_QUERY);
      } catch (error) {
        if (isMissingBinary(error)) {
          this.logger.log(`${binary} not found on PATH`);
          continue;
        }
        throw error;
      }

      // Headless vim echoes to stderr
      const value = result.stderr.trim();
      this.logger.log(`${binary} reports g:vimwiki_dir_link=${JSON.stringify(value)}`);
      return value === 'index';
    }

    this.logger.log('No editor binary available, auto index disabled');
    return false;
  }
}

export class StaticEditorProbe implements EditorProbe {
  private autoIndex: boolean;

  constructor(autoIndex: boolean) {
    this.autoIndex = autoIndex;
  }

  public async detectAutoIndex(): Promise<boolean> {
    return this.autoIndex;
  }
}
