export class OutputError extends Error {
  /** Failures hit while cleaning up after this one. */
  readonly suppressed: unknown[] = [];

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidFieldError extends OutputError {
  readonly field: string;

  constructor(field: string) {
    super(`invalid field specified: ${field}`);
    this.field = field;
  }
}

export type ConfigOption = "fields" | "storeFields" | "options";

export class ConfigValidationError extends OutputError {
  readonly option: ConfigOption;

  constructor(option: ConfigOption, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.option = option;
  }
}

export class FormatError extends OutputError {}

export class EncodingError extends OutputError {}

export class SinkError extends OutputError {}

export class ClosedSinkError extends SinkError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`file sink is closed: ${filePath}`);
    this.filePath = filePath;
  }
}

export class ArchiveError extends OutputError {}

/** Appends the cause's message to the wrapper's, the way the CLI reports nested failures. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.cause === undefined) return error.message;
  return `${error.message}: ${describeError(error.cause)}`;
}
