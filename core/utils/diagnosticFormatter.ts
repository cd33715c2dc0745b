import chalk from 'chalk';
import type { Diagnostic, DiagnosticKind } from '@core/types/format';

export interface DiagnosticFormatOptions {
  useColors?: boolean;
}

const KIND_COLORS: Record<DiagnosticKind, (text: string) => string> = {
  MalformedIntroducer: chalk.red,
  InconsistentIndentation: chalk.red,
  SyntaxError: chalk.yellow,
  EngineError: chalk.magenta,
  FileError: chalk.red
};

/**
 * Renders a diagnostic as `file:line:column: kind: message`.
 */
export function formatDiagnostic(diagnostic: Diagnostic, options: DiagnosticFormatOptions = {}): string {
  const location = `${diagnostic.file}:${diagnostic.line}:${diagnostic.column}`;
  if (!options.useColors) {
    return `${location}: ${diagnostic.kind}: ${diagnostic.message}`;
  }
  const kind = KIND_COLORS[diagnostic.kind](diagnostic.kind);
  return `${chalk.bold(location)}: ${kind}: ${diagnostic.message}`;
}

/**
 * Sorts by file, then position, and renders one diagnostic per line.
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[], options: DiagnosticFormatOptions = {}): string {
  return [...diagnostics]
    .sort((a, b) =>
      a.file.localeCompare(b.file) || a.line - b.line || a.column - b.column
    )
    .map(diagnostic => formatDiagnostic(diagnostic, options))
    .join('\n');
}
