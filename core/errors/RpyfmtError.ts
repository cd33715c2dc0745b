/**
 * Defines the severity levels for rpyfmt errors.
 */
export enum ErrorSeverity {
  /** Scoped to one region; the document is still formatted */
  Recoverable = 'recoverable',
  /** The document cannot be processed */
  Fatal = 'fatal',
}

/**
 * 1-based position in a document.
 */
export interface SourceLocation {
  filePath?: string;
  line: number;
  column: number;
}

export interface BaseErrorDetails {
  [key: string]: unknown;
}

export interface RpyfmtErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  sourceLocation?: SourceLocation;
  cause?: unknown;
  /** Document text, used to render a source excerpt */
  source?: string;
}

/**
 * Base class for all rpyfmt errors.
 * Carries an error code, a severity, details and a source location.
 */
export class RpyfmtError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Optional source location where the error occurred */
  public readonly sourceLocation?: SourceLocation;
  private readonly source?: string;

  constructor(message: string, options: RpyfmtErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.sourceLocation = options.sourceLocation;
    this.source = options.source;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Source excerpt with a caret under the offending column, or undefined when
   * the document text is not known.
   */
  public getSourceContext(contextLines = 2): string | undefined {
    if (!this.source || !this.sourceLocation) {
      return undefined;
    }

    const lines = this.source.split(/\r\n|\n|\r/);
    const lineNum = this.sourceLocation.line - 1;
    if (lineNum < 0 || lineNum >= lines.length) {
      return undefined;
    }

    const pointer = ' '.repeat(Math.max(0, this.sourceLocation.column - 1)) + '^';
    const contextStart = Math.max(0, lineNum - contextLines);
    const contextEnd = Math.min(lines.length - 1, lineNum + contextLines);

    let result = '';
    for (let i = contextStart; i <= contextEnd; i++) {
      const lineNumber = String(i + 1).padStart(4, ' ');
      const marker = i === lineNum ? '>' : ' ';
      result += `${marker} ${lineNumber} | ${lines[i]}\n`;
      if (i === lineNum) {
        result += `       | ${pointer}\n`;
      }
    }
    return result;
  }
}

export function formatLocation(location: SourceLocation): string {
  const position = `${location.line}:${location.column}`;
  return location.filePath ? `${location.filePath}:${position}` : position;
}
