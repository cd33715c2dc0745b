import { RpyfmtError, ErrorSeverity } from './RpyfmtError';

/**
 * Raised by a formatting engine when the code it was given does not parse.
 * Line and column are 1-based and relative to the code the engine saw.
 */
export class EngineSyntaxError extends RpyfmtError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number,
    cause?: unknown
  ) {
    super(message, {
      code: 'ENGINE_SYNTAX_ERROR',
      severity: ErrorSeverity.Recoverable,
      details: { line, column },
      cause
    });
  }
}
