import { RpyfmtError, ErrorSeverity, type SourceLocation } from './RpyfmtError';

/**
 * A line looks like an embedded-region introducer but breaks the header
 * grammar. Region boundaries cannot be trusted, so the document is aborted.
 */
export class MalformedIntroducerError extends RpyfmtError {
  public readonly kind = 'MalformedIntroducer' as const;

  constructor(message: string, location: SourceLocation, source?: string) {
    super(message, {
      code: 'MALFORMED_INTRODUCER',
      severity: ErrorSeverity.Fatal,
      sourceLocation: location,
      source
    });
  }

  /** Same error, attributed to a file */
  locate(filePath: string, source: string): MalformedIntroducerError {
    const location = this.sourceLocation ?? { line: 1, column: 1 };
    return new MalformedIntroducerError(this.message, { ...location, filePath }, source);
  }
}
