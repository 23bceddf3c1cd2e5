/**
 * Error types raised while compiling documentation.
 *
 * Every error carries a structured `context` so the CLI and debug log can
 * report it without parsing the message.
 */

export class DocbinError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'DocbinError';
    this.context = context;
  }
}

/**
 * A sub-record (method, argument, flag, inlet, outlet) lacks a field the
 * document builder requires.
 */
export class MissingFieldError extends DocbinError {
  readonly sourceFile: string;
  readonly record: string;
  readonly field: string;

  constructor(sourceFile: string, record: string, field: string) {
    super(`${sourceFile}: ${record} is missing required field "${field}"`, {
      sourceFile,
      record,
      field,
    });
    this.name = 'MissingFieldError';
    this.sourceFile = sourceFile;
    this.record = record;
    this.field = field;
  }
}

export class EncodingError extends DocbinError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'EncodingError';
  }
}

export class DecodingError extends DocbinError {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at byte ${offset})`, { offset });
    this.name = 'DecodingError';
    this.offset = offset;
  }
}

export class TreeFrozenError extends DocbinError {
  constructor(tag: string) {
    super(`Cannot modify <${tag}>: tree is frozen`, { tag });
    this.name = 'TreeFrozenError';
  }
}

export class ConfigError extends DocbinError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'ConfigError';
  }
}

export class DocsDirectoryError extends DocbinError {
  constructor(docsDir: string, cause: string) {
    super(`Cannot read documentation directory ${docsDir}: ${cause}`, { docsDir });
    this.name = 'DocsDirectoryError';
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
