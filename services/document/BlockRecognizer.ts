import type { BlockHeader, BlockVariant, ScannedLine } from '@core/types/document';
import { MalformedIntroducerError } from '@core/errors';
import type { LexedLine, Token } from './HostLexer';

export type Recognition =
  | { kind: 'not-introducer' }
  | {
      kind: 'inline';
      /** Column of the `$` marker */
      markerColumn: number;
      /** Column where the Python code starts */
      codeColumn: number;
      /** Column just past the code, trailing whitespace excluded */
      codeEndColumn: number;
    }
  | {
      kind: 'block';
      variant: BlockVariant;
      header: BlockHeader;
      colonColumn: number;
    };

const NOT_INTRODUCER: Recognition = { kind: 'not-introducer' };

/**
 * Classifies one line as a `$` statement, a `python:` block header, or
 * anything else. Lines that continue an open string, bracket or backslash
 * join are never introducers.
 */
export class BlockRecognizer {
  recognize(line: ScannedLine, lexed: LexedLine): Recognition {
    if (!lexed.startsStatement) {
      return NOT_INTRODUCER;
    }

    const tokens = lexed.tokens;
    const first = tokens[0];
    if (!first || first.type === 'comment') {
      return NOT_INTRODUCER;
    }

    if (first.type === 'punct' && first.text === '$') {
      return this.recognizeInline(line, first);
    }

    if (first.type !== 'word') {
      return NOT_INTRODUCER;
    }

    if (first.text === 'python') {
      return this.recognizeHeader(line, tokens, 1, { init: false });
    }

    if (first.text === 'init') {
      return this.recognizeInit(line, tokens);
    }

    return NOT_INTRODUCER;
  }

  private recognizeInline(line: ScannedLine, marker: Token): Recognition {
    const content = line.content;
    let codeColumn = marker.column + 1;
    while (codeColumn < content.length && (content[codeColumn] === ' ' || content[codeColumn] === '\t')) {
      codeColumn++;
    }
    const codeEndColumn = content.trimEnd().length;

    if (codeColumn >= codeEndColumn) {
      throw new MalformedIntroducerError(
        'Expected Python code after "$"',
        { line: line.index + 1, column: marker.column + 1 }
      );
    }

    return { kind: 'inline', markerColumn: marker.column, codeColumn, codeEndColumn };
  }

  /**
   * `init [N] python ...:` is a block header; `init:` and `init N:` open a
   * host block whose children are scanned on their own.
   */
  private recognizeInit(line: ScannedLine, tokens: Token[]): Recognition {
    let index = 1;
    let priority: number | undefined;

    const sign = tokens[index];
    if (sign && sign.type === 'punct' && (sign.text === '-' || sign.text === '+')) {
      const digits = tokens[index + 1];
      if (!digits || digits.type !== 'number' || digits.column !== sign.column + 1) {
        return NOT_INTRODUCER;
      }
      priority = Number(sign.text + digits.text);
      index += 2;
    } else if (sign && sign.type === 'number') {
      priority = Number(sign.text);
      index += 1;
    }

    const keyword = tokens[index];
    if (!keyword || keyword.type !== 'word' || keyword.text !== 'python') {
      return NOT_INTRODUCER;
    }

    return this.recognizeHeader(line, tokens, index + 1, { init: true, priority });
  }

  /**
   * Parses `[early] [hide] [in dotted.name] :` starting at `index`.
   */
  private recognizeHeader(
    line: ScannedLine,
    tokens: Token[],
    index: number,
    prefix: { init: boolean; priority?: number }
  ): Recognition {
    const header: BlockHeader = {
      init: prefix.init,
      early: false,
      hide: false
    };
    if (prefix.priority !== undefined) {
      header.priority = prefix.priority;
    }

    const fail = (token: Token | undefined, message: string): never => {
      const column = token ? token.column + 1 : line.content.trimEnd().length + 1;
      throw new MalformedIntroducerError(message, { line: line.index + 1, column });
    };

    // `python "..."` is dialogue spoken by a character named python
    const next = tokens[index];
    if (next && next.type === 'string' && !prefix.init) {
      return NOT_INTRODUCER;
    }

    let token = tokens[index];
    if (token && token.type === 'word' && token.text === 'early') {
      header.early = true;
      token = tokens[++index];
    }
    if (token && token.type === 'word' && token.text === 'hide') {
      header.hide = true;
      token = tokens[++index];
    }
    if (token && token.type === 'word' && token.text === 'in') {
      const parts: string[] = [];
      token = tokens[++index];
      while (token && token.type === 'word') {
        parts.push(token.text);
        token = tokens[++index];
        if (token && token.type === 'punct' && token.text === '.') {
          token = tokens[++index];
          if (!token || token.type !== 'word') {
            fail(token, 'Expected a name after "." in python block header');
          }
          continue;
        }
        break;
      }
      if (parts.length === 0) {
        fail(token, 'Expected a store name after "in" in python block header');
      }
      header.store = parts.join('.');
    }

    if (!token || token.type !== 'punct' || token.text !== ':') {
      return fail(
        token,
        token
          ? `Unexpected "${token.text}" in python block header`
          : 'Expected ":" at the end of python block header'
      );
    }
    const colonColumn = token.column;

    const trailing = tokens[index + 1];
    if (trailing && trailing.type !== 'comment') {
      fail(trailing, `Unexpected "${trailing.text}" after ":" in python block header`);
    }

    const variant: BlockVariant = header.early ? 'early-block' : header.init ? 'init-block' : 'block';
    return { kind: 'block', variant, header, colonColumn };
  }
}
