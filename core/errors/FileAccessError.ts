import { RpyfmtError, ErrorSeverity } from './RpyfmtError';

export type FileOperation = 'read' | 'write';

/**
 * A script could not be read or written back. Only that document is lost;
 * the rest of the run continues.
 */
export class FileAccessError extends RpyfmtError {
  public readonly kind = 'FileError' as const;

  constructor(
    public readonly filePath: string,
    public readonly operation: FileOperation,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not ${operation} ${filePath}: ${reason}`, {
      code: 'FILE_ACCESS',
      severity: ErrorSeverity.Fatal,
      details: { operation },
      sourceLocation: { filePath, line: 1, column: 1 },
      cause
    });
  }
}
