import type { EmbeddedRegion } from '@core/types/document';
import type { DispatchOptions, FormatResult, RegionFailure } from '@core/types/format';
import { EngineFailureError, EngineSyntaxError } from '@core/errors';
import { formatDuration } from '@core/config/utils';
import { dispatchLogger } from '@core/utils/logger';
import type { IFormatEngine } from '@services/engine/IFormatEngine';
import { TaskPool } from './TaskPool';

/**
 * Maps a 1-based position in a region's normalized code back to the
 * document.
 */
export function toDocumentPosition(
  region: EmbeddedRegion,
  line: number,
  column: number
): { line: number; column: number } {
  const index = Math.min(Math.max(line, 1), region.lines.length) - 1;
  const regionLine = region.lines[index];

  if (region.kind === 'inline-statement') {
    return { line: regionLine.line + 1, column: column + region.startColumn };
  }

  const normalizedWidth = regionLine.normalizedIndent.length;
  const mapped = column <= normalizedWidth
    ? column
    : column - normalizedWidth + regionLine.originalIndent.length;
  return { line: regionLine.line + 1, column: mapped };
}

/**
 * Normalizes engine output: `\n` line breaks, no trailing blank lines, one
 * final newline, or the reason the output cannot be spliced.
 */
export function cleanEngineOutput(region: EmbeddedRegion, output: string): { text: string } | { problem: string } {
  const unified = output.replace(/\r\n?/g, '\n');
  const trimmed = unified.replace(/\s+$/, '');

  if (trimmed.length === 0) {
    return region.code.trim().length === 0
      ? { text: '' }
      : { problem: 'engine returned empty output for non-empty code' };
  }

  if (region.kind === 'inline-statement' && trimmed.includes('\n')) {
    return { problem: 'formatted "$" statement spans more than one line' };
  }

  return { text: trimmed + '\n' };
}

/**
 * Formats each region in isolation. Results are written to a pre-sized array
 * in region order; a failure only ever fills its own slot.
 */
export class FormatDispatcher {
  constructor(
    private readonly engine: IFormatEngine,
    private readonly pool: TaskPool
  ) {}

  async dispatch(regions: readonly EmbeddedRegion[], options: DispatchOptions): Promise<FormatResult[]> {
    const results: FormatResult[] = new Array<FormatResult>(regions.length);

    await Promise.all(
      regions.map((region, index) =>
        this.pool.run(async () => {
          results[index] = await this.dispatchOne(region, options);
        })
      )
    );

    return results;
  }

  async dispatchOne(region: EmbeddedRegion, options: DispatchOptions): Promise<FormatResult> {
    const lineLength = region.kind === 'inline-statement' ? options.inlineLineLength : options.lineLength;

    try {
      const output = await this.runWithTimeout(region, { lineLength }, options.timeout);
      const cleaned = cleanEngineOutput(region, output);
      if ('problem' in cleaned) {
        return this.failed(region, { kind: 'EngineError', message: cleaned.problem });
      }
      return { status: 'formatted', text: cleaned.text };
    } catch (error) {
      if (error instanceof EngineSyntaxError) {
        const position = toDocumentPosition(region, error.line, error.column);
        return this.failed(region, {
          kind: 'SyntaxError',
          message: error.message,
          line: position.line,
          column: position.column
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      return this.failed(region, { kind: 'EngineError', message });
    }
  }

  private async runWithTimeout(
    region: EmbeddedRegion,
    engineOptions: { lineLength: number },
    timeout: number
  ): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new EngineFailureError(
          `${this.engine.name} timed out after ${formatDuration(timeout)}`,
          'timeout'
        ));
      }, timeout);
    });

    try {
      return await Promise.race([
        this.engine.format(region.code, engineOptions, controller.signal),
        expired
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private failed(region: EmbeddedRegion, error: RegionFailure): FormatResult {
    dispatchLogger.info(`Region ${region.id} was not formatted: ${error.message}`, {
      line: region.startLine + 1,
      kind: error.kind
    });
    return { status: 'failed', error };
  }
}
