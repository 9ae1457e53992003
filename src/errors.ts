/**
 * Error kinds raised by the converter. Each carries the process exit code the
 * entry point uses when the error reaches the top level.
 */
export class ConverterError extends Error {
  public readonly exitCode: number;

  public constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Bad CLI arguments or an inverted/malformed date range. */
export class ValidationError extends ConverterError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
  }
}

/** No Fitbit data where the user pointed us. */
export class NotFoundError extends ConverterError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, 3, options);
  }
}

/**
 * A single malformed record. Recovered per record by the readers, so it never
 * reaches the entry point in practice.
 */
export class ParseError extends ConverterError {
  public readonly file: string;
  public readonly index: number;

  public constructor(file: string, index: number, message: string) {
    super(`${file} [${index}]: ${message}`, 1);
    this.file = file;
    this.index = index;
  }
}

/** The export directory or one of its files could not be written. */
export class IOError extends ConverterError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, 4, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown): number {
  return err instanceof ConverterError ? err.exitCode : 1;
}
