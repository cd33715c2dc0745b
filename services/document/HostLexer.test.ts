import { describe, it, expect } from 'vitest';
import { INITIAL_STATE, PYTHON_DIALECT, RENPY_DIALECT, isOpen, lexLine } from './HostLexer';

describe('lexLine', () => {
  it('splits code into words, numbers and punctuation with columns', () => {
    const { tokens } = lexLine('init -5 python:', INITIAL_STATE, RENPY_DIALECT);

    expect(tokens).toEqual([
      { type: 'word', text: 'init', column: 0 },
      { type: 'punct', text: '-', column: 5 },
      { type: 'number', text: '5', column: 6 },
      { type: 'word', text: 'python', column: 8 },
      { type: 'punct', text: ':', column: 14 }
    ]);
  });

  it('keeps a string with an escaped quote as one token', () => {
    const { tokens, end } = lexLine('e "say \\"$ x\\" now"', INITIAL_STATE, RENPY_DIALECT);

    expect(tokens.map(token => token.type)).toEqual(['word', 'string']);
    expect(tokens[1].text).toBe('"say \\"$ x\\" now"');
    expect(isOpen(end)).toBe(false);
  });

  it('stops at a comment, which does not carry to the next line', () => {
    const { tokens, end } = lexLine('x  # python: "', INITIAL_STATE, RENPY_DIALECT);

    expect(tokens[1]).toEqual({ type: 'comment', text: '# python: "', column: 3 });
    expect(end).toEqual(INITIAL_STATE);
  });

  it('carries an unterminated host string into the next line', () => {
    const first = lexLine('e "first line', INITIAL_STATE, RENPY_DIALECT);
    expect(first.end.context).toEqual({ mode: 'string', quote: '"', triple: false });

    const second = lexLine('$ still text"', first.end, RENPY_DIALECT);
    expect(second.startsStatement).toBe(false);
    expect(second.tokens[0]).toEqual({ type: 'string', text: '$ still text"', column: 0 });
    expect(second.end).toEqual(INITIAL_STATE);
  });

  it('closes an unterminated single-quoted Python string at the end of the line', () => {
    const { end } = lexLine("x = 'oops", INITIAL_STATE, PYTHON_DIALECT);
    expect(end.context).toEqual({ mode: 'code' });
  });

  it('keeps a triple-quoted Python string open across lines', () => {
    const { end } = lexLine('doc = """start', INITIAL_STATE, PYTHON_DIALECT);
    expect(end.context).toEqual({ mode: 'string', quote: '"', triple: true });
    expect(isOpen(end)).toBe(true);
  });

  it('tracks bracket depth and backslash continuations', () => {
    const open = lexLine('items = [1,', INITIAL_STATE, PYTHON_DIALECT);
    expect(open.end.depth).toBe(1);

    const closed = lexLine('    2]', open.end, PYTHON_DIALECT);
    expect(closed.startsStatement).toBe(false);
    expect(closed.end.depth).toBe(0);

    const joined = lexLine('total = a + \\', INITIAL_STATE, PYTHON_DIALECT);
    expect(joined.end.continued).toBe(true);
    expect(isOpen(joined.end)).toBe(true);
  });

  it('treats backticks as quotes only in script text', () => {
    expect(lexLine('`x', INITIAL_STATE, RENPY_DIALECT).end.context.mode).toBe('string');
    expect(lexLine('`x', INITIAL_STATE, PYTHON_DIALECT).end.context.mode).toBe('code');
  });
});
