export class Logger {
  private scope: string;
  private verbose: boolean;
  private stream: NodeJS.WritableStream;

  constructor(scope: string, verbose: boolean = false, stream: NodeJS.WritableStream = process.stderr) {
    this.scope = scope;
    this.verbose = verbose;
    this.stream = stream;
  }

  public log(message: string): void {
    if (this.verbose) {
      this.stream.write(`[${this.scope}] ${message}\n`);
    }
  }
}
