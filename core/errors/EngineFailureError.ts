import { RpyfmtError, ErrorSeverity } from './RpyfmtError';

export type EngineFailureReason = 'timeout' | 'exit' | 'spawn' | 'output';

/**
 * Any formatting engine failure other than a syntax error in the region.
 */
export class EngineFailureError extends RpyfmtError {
  constructor(
    message: string,
    public readonly reason: EngineFailureReason,
    details?: { exitCode?: number | null; stderr?: string },
    cause?: unknown
  ) {
    super(message, {
      code: 'ENGINE_FAILURE',
      severity: ErrorSeverity.Recoverable,
      details: { reason, ...details },
      cause
    });
  }
}
