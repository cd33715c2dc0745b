/**
 * Minimal line lexer for Ren'Py script and the Python it embeds.
 *
 * It only knows enough to tell code from strings and comments and to follow
 * logical lines across physical ones (open strings, open brackets, trailing
 * backslashes). Its state is carried from one line to the next.
 */

export type Quote = '"' | "'" | '`';

export type LexicalContext =
  | { mode: 'code' }
  | { mode: 'string'; quote: Quote; triple: boolean }
  | { mode: 'comment' };

export interface LexState {
  context: LexicalContext;
  /** Open bracket depth */
  depth: number;
  /** The previous physical line ended with a backslash */
  continued: boolean;
}

export type TokenType = 'word' | 'number' | 'string' | 'punct' | 'comment';

export interface Token {
  type: TokenType;
  text: string;
  /** 0-based column of the first character */
  column: number;
}

export interface LexerDialect {
  quotes: readonly Quote[];
  /** Whether a single-quoted string may run past the end of a line */
  multilineStrings: boolean;
}

export const RENPY_DIALECT: LexerDialect = {
  quotes: ['"', "'", '`'],
  multilineStrings: true
};

export const PYTHON_DIALECT: LexerDialect = {
  quotes: ['"', "'"],
  multilineStrings: false
};

export const INITIAL_STATE: LexState = {
  context: { mode: 'code' },
  depth: 0,
  continued: false
};

export interface LexedLine {
  tokens: Token[];
  /** State at the end of the line; comments never carry over */
  end: LexState;
  /** The line starts a new logical line (not inside a string, bracket or continuation) */
  startsStatement: boolean;
}

const WORD_START = /[A-Za-z_]/;
const WORD_CHAR = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const OPEN = '([{';
const CLOSE = ')]}';

function isQuote(dialect: LexerDialect, char: string): char is Quote {
  return (dialect.quotes as readonly string[]).includes(char);
}

/**
 * Lex one physical line starting from `start`.
 */
export function lexLine(content: string, start: LexState, dialect: LexerDialect): LexedLine {
  const startsStatement =
    start.context.mode === 'code' && start.depth === 0 && !start.continued;

  const tokens: Token[] = [];
  let context: LexicalContext = start.context.mode === 'comment' ? { mode: 'code' } : start.context;
  let depth = start.depth;
  let stringStart = 0;
  let i = 0;

  while (i < content.length) {
    const char = content[i];

    if (context.mode === 'string') {
      if (char === '\\') {
        i += 2;
        continue;
      }
      const closer = context.triple ? context.quote.repeat(3) : context.quote;
      if (content.startsWith(closer, i)) {
        i += closer.length;
        tokens.push({ type: 'string', text: content.slice(stringStart, i), column: stringStart });
        context = { mode: 'code' };
        continue;
      }
      i++;
      continue;
    }

    if (char === ' ' || char === '\t' || char === '\f') {
      i++;
      continue;
    }

    if (char === '#') {
      tokens.push({ type: 'comment', text: content.slice(i), column: i });
      context = { mode: 'comment' };
      i = content.length;
      break;
    }

    if (isQuote(dialect, char)) {
      const triple = content.startsWith(char.repeat(3), i);
      context = { mode: 'string', quote: char, triple };
      stringStart = i;
      i += triple ? 3 : 1;
      continue;
    }

    if (WORD_START.test(char)) {
      let j = i + 1;
      while (j < content.length && WORD_CHAR.test(content[j])) j++;
      tokens.push({ type: 'word', text: content.slice(i, j), column: i });
      i = j;
      continue;
    }

    if (DIGIT.test(char)) {
      let j = i + 1;
      while (j < content.length && DIGIT.test(content[j])) j++;
      tokens.push({ type: 'number', text: content.slice(i, j), column: i });
      i = j;
      continue;
    }

    if (OPEN.includes(char)) {
      depth++;
    } else if (CLOSE.includes(char)) {
      depth = Math.max(0, depth - 1);
    }
    tokens.push({ type: 'punct', text: char, column: i });
    i++;
  }

  let continued = false;
  if (context.mode === 'string') {
    // An unterminated string keeps its text up to the end of the line
    tokens.push({ type: 'string', text: content.slice(stringStart), column: stringStart });
    if (!context.triple && !dialect.multilineStrings && !content.endsWith('\\')) {
      context = { mode: 'code' };
    }
  } else if (context.mode === 'code') {
    continued = content.endsWith('\\');
  }

  const end: LexState = {
    context: context.mode === 'comment' ? { mode: 'code' } : context,
    depth,
    continued
  };

  return { tokens, end, startsStatement };
}

/**
 * True when the state sits inside an unfinished logical line.
 */
export function isOpen(state: LexState): boolean {
  return state.context.mode !== 'code' || state.depth > 0 || state.continued;
}
