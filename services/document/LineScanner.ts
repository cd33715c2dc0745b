import type { Document, LineEnding, LineEndingStyle, ScannedLine } from '@core/types/document';

const LINE_BREAK = /\r\n|\n|\r/g;

function leadingWhitespace(content: string): string {
  const match = /^[ \t\f]*/.exec(content);
  return match ? match[0] : '';
}

/**
 * Split text into physical lines, keeping each terminator and the offsets of
 * every line. A trailing terminator does not produce an empty last line.
 */
export function scanLines(text: string): ScannedLine[] {
  const lines: ScannedLine[] = [];
  let start = 0;
  LINE_BREAK.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = LINE_BREAK.exec(text)) !== null) {
    const content = text.slice(start, match.index);
    lines.push({
      index: lines.length,
      start,
      end: match.index,
      content,
      ending: toLineEnding(match[0]),
      indent: leadingWhitespace(content)
    });
    start = match.index + match[0].length;
  }

  if (start < text.length) {
    const content = text.slice(start);
    lines.push({
      index: lines.length,
      start,
      end: text.length,
      content,
      ending: '',
      indent: leadingWhitespace(content)
    });
  }

  return lines;
}

function toLineEnding(terminator: string): LineEnding {
  switch (terminator) {
    case '\r\n':
      return '\r\n';
    case '\r':
      return '\r';
    default:
      return '\n';
  }
}

/**
 * Dominant terminator of the text; ties go to `\n`, then `\r\n`.
 */
export function detectLineEndings(lines: readonly ScannedLine[]): LineEndingStyle {
  const counts = new Map<LineEnding, number>([
    ['\n', 0],
    ['\r\n', 0],
    ['\r', 0]
  ]);
  for (const line of lines) {
    if (line.ending) {
      counts.set(line.ending, (counts.get(line.ending) ?? 0) + 1);
    }
  }

  let dominant: LineEnding = '\n';
  let best = 0;
  let kinds = 0;
  for (const [ending, count] of counts) {
    if (count > 0) kinds++;
    if (count > best) {
      best = count;
      dominant = ending;
    }
  }

  return { dominant, mixed: kinds > 1 };
}

export function createDocument(text: string): Document {
  const lines = scanLines(text);
  return {
    text,
    lines,
    lineEndings: detectLineEndings(lines),
    byteLength: Buffer.byteLength(text, 'utf8')
  };
}

export function isBlank(line: ScannedLine): boolean {
  return line.content.trim().length === 0;
}
