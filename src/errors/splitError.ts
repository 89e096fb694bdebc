export type SplitErrorCode =
  | 'INVALID_OPTIONS'
  | 'INDEX_EXISTS'
  | 'INPUT_UNREADABLE'
  | 'VERIFY_FAILED';

/**
 * Fatal error raised while splitting. Collisions on split file names are
 * recovered by the path allocator and never surface as a SplitError.
 */
export class SplitError extends Error {
  readonly code: SplitErrorCode;
  readonly path?: string;
  readonly hint?: string;

  constructor(code: SplitErrorCode, message: string, options: { path?: string; hint?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SplitError';
    this.code = code;
    this.path = options.path;
    this.hint = options.hint;
  }

  format(): string {
    const lines = [`error: ${this.message}`];
    if (this.path) {
      lines.push(`  --> ${this.path}`);
    }
    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }
    return lines.join('\n');
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}
