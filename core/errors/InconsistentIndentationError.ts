import { RpyfmtError, ErrorSeverity, type SourceLocation } from './RpyfmtError';

/**
 * The body of an embedded block cannot be dedented unambiguously, for example
 * when tabs and spaces are mixed so that depths cannot be compared.
 */
export class InconsistentIndentationError extends RpyfmtError {
  public readonly kind = 'InconsistentIndentation' as const;

  constructor(message: string, location: SourceLocation, source?: string) {
    super(message, {
      code: 'INCONSISTENT_INDENTATION',
      severity: ErrorSeverity.Fatal,
      sourceLocation: location,
      source
    });
  }

  locate(filePath: string, source: string): InconsistentIndentationError {
    const location = this.sourceLocation ?? { line: 1, column: 1 };
    return new InconsistentIndentationError(this.message, { ...location, filePath }, source);
  }
}
