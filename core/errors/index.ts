/**
 * Central export point for rpyfmt error types.
 */
export { RpyfmtError, ErrorSeverity, formatLocation } from './RpyfmtError';
export type { SourceLocation, BaseErrorDetails, RpyfmtErrorOptions } from './RpyfmtError';
export { MalformedIntroducerError } from './MalformedIntroducerError';
export { InconsistentIndentationError } from './InconsistentIndentationError';
export { EngineSyntaxError } from './EngineSyntaxError';
export { EngineFailureError } from './EngineFailureError';
export type { EngineFailureReason } from './EngineFailureError';
export { FileAccessError } from './FileAccessError';
export type { FileOperation } from './FileAccessError';

import type { MalformedIntroducerError } from './MalformedIntroducerError';
import type { InconsistentIndentationError } from './InconsistentIndentationError';
import type { FileAccessError } from './FileAccessError';

/** Errors in the shape of a document; its regions cannot be located */
export type DocumentStructureError = MalformedIntroducerError | InconsistentIndentationError;

/** Errors that abort a whole document */
export type DocumentAbortError = DocumentStructureError | FileAccessError;
