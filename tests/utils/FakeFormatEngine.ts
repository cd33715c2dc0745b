import { EngineFailureError, EngineSyntaxError } from '@core/errors';
import type { EngineFormatOptions } from '@core/types/format';
import type { IFormatEngine } from '@services/engine/IFormatEngine';

export interface FakeEngineCall {
  source: string;
  options: EngineFormatOptions;
}

export type FakeTransform = (source: string, options: EngineFormatOptions) => string;

/** A line containing this never parses */
export const SYNTAX_ERROR_MARKER = '!!';
/** Source containing this never finishes until aborted */
export const HANG_MARKER = 'HANG';
/** Source containing this makes the engine fail outright */
export const CRASH_MARKER = 'CRASH';

/**
 * Spaces a lone `=` as ` = ` and strips trailing whitespace, the way a real
 * formatter would for simple assignments. Applying it twice changes nothing.
 */
export function normalizeAssignments(source: string): string {
  const lines = source
    .split('\n')
    .map(line => line.replace(/\s*(?<![=!<>+\-*/%&|^:])=(?!=)\s*/g, ' = ').trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

/**
 * Deterministic in-process stand-in for the subprocess formatter.
 */
export class FakeFormatEngine implements IFormatEngine {
  readonly name = 'fake';
  readonly calls: FakeEngineCall[] = [];
  private active = 0;
  /** Highest number of calls in flight at once */
  peak = 0;

  constructor(
    private readonly transform: FakeTransform = normalizeAssignments,
    private readonly delayMs = 0
  ) {}

  async format(source: string, options: EngineFormatOptions, signal?: AbortSignal): Promise<string> {
    this.calls.push({ source, options });
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      if (source.includes(HANG_MARKER)) {
        return await this.hang(signal);
      }
      if (this.delayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.delayMs));
      }
      if (source.includes(CRASH_MARKER)) {
        throw new EngineFailureError('fake exited with code 1: crashed', 'exit', { exitCode: 1 });
      }

      const lines = source.split('\n');
      const bad = lines.findIndex(line => line.includes(SYNTAX_ERROR_MARKER));
      if (bad !== -1) {
        const column = lines[bad].indexOf(SYNTAX_ERROR_MARKER) + 1;
        throw new EngineSyntaxError(`Cannot parse: ${lines[bad].trim()}`, bad + 1, column);
      }

      return this.transform(source, options);
    } finally {
      this.active--;
    }
  }

  private hang(signal?: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
      signal?.addEventListener('abort', () => {
        reject(new EngineFailureError('fake was cancelled', 'timeout'));
      });
    });
  }
}
