import type { EmbeddedRegion, SegmentedDocument } from '@core/types/document';
import type { FormatResult } from '@core/types/format';
import { spliceLogger } from '@core/utils/logger';
import { INITIAL_STATE, PYTHON_DIALECT, lexLine, type LexState } from '@services/document/HostLexer';

/**
 * Re-applies a region's base indentation and line endings to normalized
 * code. Blank lines stay empty, except whitespace inside a multi-line
 * string. For a `$` statement this is the single line.
 */
export function reindent(region: EmbeddedRegion, code: string): string {
  const body = code.endsWith('\n') ? code.slice(0, -1) : code;

  if (region.kind === 'inline-statement') {
    return body;
  }
  if (body.length === 0) {
    return '';
  }

  let state: LexState = INITIAL_STATE;
  const rendered = body
    .split('\n')
    .map(line => {
      const inString = state.context.mode === 'string';
      state = lexLine(line, state, PYTHON_DIALECT).end;
      if (line.trim().length === 0) {
        return inString && line.length > 0 ? region.baseIndent + line : '';
      }
      return region.baseIndent + line;
    })
    .join(region.lineEnding);

  return region.endsWithNewline ? rendered + region.lineEnding : rendered;
}

/**
 * The region's original text, rebuilt from its per-line records.
 */
export function restoreRegion(region: EmbeddedRegion): string {
  return region.lines
    .map(line => line.originalIndent + line.body + line.ending)
    .join('');
}

/**
 * Text emitted for one region: the formatted code re-indented, or the
 * original bytes when formatting failed or produced no result.
 */
export function renderRegion(text: string, region: EmbeddedRegion, result: FormatResult | undefined): string {
  if (result && result.status === 'formatted') {
    return reindent(region, result.text);
  }
  return text.slice(region.span.start, region.span.end);
}

/**
 * Rebuilds the document from its segments. Host text is copied unchanged;
 * the introducer lines are host text, so only region bodies can change.
 */
export class Splicer {
  splice(segmented: SegmentedDocument, results: readonly FormatResult[]): string {
    const { document, segments } = segmented;
    const parts: string[] = [];

    for (const segment of segments) {
      if (segment.kind === 'host') {
        parts.push(document.text.slice(segment.span.start, segment.span.end));
        continue;
      }
      parts.push(renderRegion(document.text, segment.region, results[segment.region.id]));
    }

    const output = parts.join('');
    spliceLogger.debug('Spliced document', {
      segments: segments.length,
      inputLength: document.text.length,
      outputLength: output.length
    });
    return output;
  }
}
