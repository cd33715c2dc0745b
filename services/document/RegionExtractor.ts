import type {
  BlockHeader,
  BlockVariant,
  EmbeddedRegion,
  LineEnding,
  LineEndingStyle,
  RegionLine,
  ScannedLine
} from '@core/types/document';
import type { IndentationOptions } from '@core/types/format';
import { InconsistentIndentationError, MalformedIntroducerError } from '@core/errors';
import { extractorLogger } from '@core/utils/logger';
import { INITIAL_STATE, PYTHON_DIALECT, isOpen, lexLine, type LexState } from './HostLexer';
import { isBlank } from './LineScanner';

export type ExtractedRegion = Omit<EmbeddedRegion, 'id'>;

export interface BlockExtraction {
  region: ExtractedRegion;
  /** Index of the first line after the region */
  nextLine: number;
}

/**
 * Display width of leading whitespace, tabs advancing to the next multiple
 * of `tabWidth`.
 */
export function indentWidth(indent: string, tabWidth: number): number {
  let width = 0;
  for (const char of indent) {
    if (char === '\t') {
      width += tabWidth - (width % tabWidth);
    } else if (char === ' ') {
      width += 1;
    }
  }
  return width;
}

interface BodyLine {
  line: ScannedLine;
  blank: boolean;
  /** The line begins inside an open string */
  inString: boolean;
  /** The line begins a new logical line */
  startsStatement: boolean;
  /** Nothing but a comment; Python ignores its indentation */
  commentOnly: boolean;
}

/**
 * Determines the extent of embedded regions and normalizes their code.
 */
export class RegionExtractor {
  constructor(private readonly indentation: IndentationOptions) {}

  /**
   * The remainder of a `$` line, from the code start to the last
   * non-whitespace character. Never extends past the physical line.
   */
  extractInline(line: ScannedLine, codeColumn: number, codeEndColumn: number): ExtractedRegion {
    const code = line.content.slice(codeColumn, codeEndColumn);
    return {
      span: { start: line.start + codeColumn, end: line.start + codeEndColumn },
      kind: 'inline-statement',
      introducerLine: line.index,
      startLine: line.index,
      lineCount: 1,
      introducerIndent: line.indent,
      baseIndent: line.indent,
      startColumn: codeColumn,
      code: code + '\n',
      lines: [{
        line: line.index,
        originalIndent: '',
        normalizedIndent: '',
        body: code,
        ending: ''
      }],
      lineEnding: line.ending || '\n',
      endsWithNewline: false
    };
  }

  /**
   * Every following line that is blank or indented deeper than the
   * introducer, up to the first line at or above its indentation. Trailing
   * blank lines are left to the host text after the block.
   */
  extractBlock(
    lines: readonly ScannedLine[],
    introducer: ScannedLine,
    variant: BlockVariant,
    header: BlockHeader,
    colonColumn: number,
    lineEndings: LineEndingStyle
  ): BlockExtraction {
    const { tabWidth } = this.indentation;
    const introducerWidth = indentWidth(introducer.indent, tabWidth);

    const body: BodyLine[] = [];
    let state: LexState = INITIAL_STATE;
    let index = introducer.index + 1;

    for (; index < lines.length; index++) {
      const line = lines[index];
      const blank = isBlank(line);
      const inString = state.context.mode === 'string';

      if (!blank && indentWidth(line.indent, tabWidth) <= introducerWidth) {
        if (isOpen(state)) {
          throw new InconsistentIndentationError(
            'Python block dedents while a string, bracket or line continuation is still open',
            { line: line.index + 1, column: 1 }
          );
        }
        break;
      }

      const lexed = lexLine(line.content, state, PYTHON_DIALECT);
      const commentOnly = lexed.startsStatement && lexed.tokens.length > 0 && lexed.tokens[0].type === 'comment';
      body.push({ line, blank, inString, startsStatement: lexed.startsStatement, commentOnly });
      state = lexed.end;
    }

    // Trailing blank lines belong to the host text that follows
    while (body.length > 0 && body[body.length - 1].blank) {
      body.pop();
    }

    if (body.length === 0) {
      throw new MalformedIntroducerError(
        'Expected an indented block after python block header',
        { line: introducer.index + 1, column: colonColumn + 2 }
      );
    }

    const regionLines = this.dedent(body);
    const first = body[0].line;
    const last = body[body.length - 1].line;
    const margin = this.marginOf(body);

    // Blank lines are emptied; whitespace-only lines inside a string keep
    // what lies past the margin
    const code = regionLines
      .map(regionLine => regionLine.normalizedIndent + (regionLine.body.trim().length === 0 ? '' : regionLine.body))
      .join('\n') + '\n';

    extractorLogger.debug('Extracted python block', {
      line: introducer.index + 1,
      variant,
      lineCount: body.length
    });

    return {
      region: {
        span: { start: first.start, end: last.end + last.ending.length },
        kind: variant,
        introducerLine: introducer.index,
        startLine: first.index,
        lineCount: body.length,
        introducerIndent: introducer.indent,
        baseIndent: margin,
        startColumn: 0,
        code,
        lines: regionLines,
        lineEnding: regionEnding(body.map(entry => entry.line), lineEndings),
        endsWithNewline: last.ending !== '',
        header
      },
      // Resume after the trimmed body so trailing blanks are scanned as host text
      nextLine: last.index + 1
    };
  }

  /**
   * Leading whitespace of the least-indented line that starts a statement.
   * Comment-only lines count only when the block has nothing else.
   */
  private marginOf(body: BodyLine[]): string {
    const { tabWidth } = this.indentation;
    let margin: string | undefined;
    let marginWidth = Infinity;
    for (const entry of body) {
      if (entry.blank || !entry.startsStatement || entry.commentOnly) continue;
      const width = indentWidth(entry.line.indent, tabWidth);
      if (width < marginWidth) {
        marginWidth = width;
        margin = entry.line.indent;
      }
    }
    // The first body line always starts a statement
    return margin ?? body.find(entry => !entry.blank)?.line.indent ?? body[0].line.indent;
  }

  private dedent(body: BodyLine[]): RegionLine[] {
    const margin = this.marginOf(body);
    const { policy, tabWidth } = this.indentation;
    const marginWidth = indentWidth(margin, tabWidth);

    return body.map(({ line, blank, inString, startsStatement, commentOnly }) => {
      const record: RegionLine = {
        line: line.index,
        originalIndent: line.indent,
        normalizedIndent: '',
        body: line.content.slice(line.indent.length),
        ending: line.ending
      };
      if (blank && !inString) {
        return record;
      }

      if (policy === 'reject') {
        if (line.indent.startsWith(margin)) {
          record.normalizedIndent = line.indent.slice(margin.length);
          return record;
        }
        if (blank || commentOnly) {
          return record;
        }
        if (!inString && !startsStatement && indentWidth(line.indent, tabWidth) < marginWidth) {
          // Bracket continuation left of the margin; its indentation carries no meaning
          return record;
        }
        throw this.inconsistent(line, margin);
      }

      const width = indentWidth(line.indent, tabWidth);
      if (width >= marginWidth) {
        record.normalizedIndent = ' '.repeat(width - marginWidth);
        return record;
      }
      if (blank || commentOnly) {
        return record;
      }
      if (inString) {
        throw this.inconsistent(line, margin);
      }
      return record;
    });
  }

  private inconsistent(line: ScannedLine, margin: string): InconsistentIndentationError {
    return new InconsistentIndentationError(
      `Indentation ${describeIndent(line.indent)} does not extend the block margin ${describeIndent(margin)}`,
      { line: line.index + 1, column: 1 }
    );
  }
}

function describeIndent(indent: string): string {
  const tabs = [...indent].filter(char => char === '\t').length;
  const spaces = [...indent].filter(char => char === ' ').length;
  if (tabs === 0) return `(${spaces} spaces)`;
  if (spaces === 0) return `(${tabs} tabs)`;
  return `(${tabs} tabs, ${spaces} spaces)`;
}

/**
 * The region's own terminator when its lines agree, otherwise the
 * document's dominant one.
 */
function regionEnding(lines: ScannedLine[], lineEndings: LineEndingStyle): LineEnding {
  const seen = new Set<LineEnding>();
  for (const line of lines) {
    if (line.ending) seen.add(line.ending);
  }
  if (seen.size === 1) {
    const [only] = seen;
    return only;
  }
  return lineEndings.dominant;
}
