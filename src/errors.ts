/**
 * Error types raised by the comparison pipeline.
 *
 * The CLI maps UsageError (and its subclasses) to exit code 1 and every
 * other error to exit code 2. Nothing between the loader and the CLI
 * catches these.
 */

export class DbcDiffError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DbcDiffError";
  }
}

export class UsageError extends DbcDiffError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class ConfigError extends UsageError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A database file is missing, unreadable or malformed.
 */
export class LoadError extends DbcDiffError {
  readonly path: string;
  readonly line?: number;

  constructor(path: string, message: string, options?: { line?: number; cause?: unknown }) {
    const location = options?.line !== undefined ? `${path}:${options.line}` : path;
    super(`${location}: ${message}`, { cause: options?.cause });
    this.name = "LoadError";
    this.path = path;
    this.line = options?.line;
  }
}

export class WriteError extends DbcDiffError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = "WriteError";
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
