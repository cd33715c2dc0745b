import { describe, it, expect } from 'vitest';
import type { Diagnostic } from '@core/types/format';
import { formatDiagnostic, formatDiagnostics } from './diagnosticFormatter';

const syntax: Diagnostic = { file: 'game/b.rpy', line: 3, column: 7, kind: 'SyntaxError', message: 'Cannot parse: y !! 2' };
const engine: Diagnostic = { file: 'game/a.rpy', line: 9, column: 1, kind: 'EngineError', message: 'black timed out after 10s' };
const early: Diagnostic = { file: 'game/b.rpy', line: 1, column: 2, kind: 'MalformedIntroducer', message: 'Expected ":"' };

describe('formatDiagnostic', () => {
  it('renders file, position, kind and message', () => {
    expect(formatDiagnostic(syntax)).toBe('game/b.rpy:3:7: SyntaxError: Cannot parse: y !! 2');
  });
});

describe('formatDiagnostics', () => {
  it('orders by file and position', () => {
    expect(formatDiagnostics([syntax, engine, early])).toBe([
      'game/a.rpy:9:1: EngineError: black timed out after 10s',
      'game/b.rpy:1:2: MalformedIntroducer: Expected ":"',
      'game/b.rpy:3:7: SyntaxError: Cannot parse: y !! 2'
    ].join('\n'));
  });

  it('renders nothing for no diagnostics', () => {
    expect(formatDiagnostics([])).toBe('');
  });
});
