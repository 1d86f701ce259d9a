export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedSyntaxError extends ConversionError {
  readonly syntax: string;

  constructor(syntax: string) {
    super(`Unsupported syntax: ${syntax}`);
    this.syntax = syntax;
  }
}

export class UnknownExtensionError extends ConversionError {
  readonly extensionId: string;

  constructor(extensionId: string) {
    super(`Unknown markdown extension: ${extensionId}`);
    this.extensionId = extensionId;
  }
}
