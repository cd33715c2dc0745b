import * as path from 'path';
import chalk from 'chalk';
import { formatFiles, formatText, type FormatOptions, type RunReport } from '@api/index';
import type { Diagnostic } from '@core/types/format';
import { formatDiagnostics } from '@core/utils/diagnosticFormatter';
import { cliLogger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { collectFiles } from '@services/fs/collectFiles';

export interface CLIStreams {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  /** Colour diagnostics and status lines */
  colors: boolean;
}

export interface ProcessingEnvironment {
  fileSystem: IFileSystemService;
  streams: CLIStreams;
  cwd: string;
  verbose: boolean;
}

const STDIN_NAME = '<stdin>';

export class FileProcessor {
  constructor(private readonly env: ProcessingEnvironment) {}

  /**
   * Filter mode: one document from stdin to stdout. A document that cannot
   * be processed is echoed unchanged so a pipe never loses text.
   */
  async processStdin(options: FormatOptions): Promise<RunReport> {
    const text = await this.env.streams.readStdin();
    const outcome = await formatText(text, options, STDIN_NAME);
    const check = options.mode === 'check';

    if (!check) {
      this.env.streams.stdout(outcome.status === 'done' ? outcome.output : text);
    }

    const changed = outcome.status === 'done' && outcome.changed;
    if (check && changed) {
      this.status(`would reformat ${STDIN_NAME}`, chalk.yellow);
    }
    this.reportDiagnostics(outcome.diagnostics);

    return {
      files: [{ file: STDIN_NAME, outcome, written: false }],
      diagnostics: outcome.diagnostics,
      changed: changed ? [STDIN_NAME] : [],
      aborted: outcome.status === 'aborted' ? [STDIN_NAME] : []
    };
  }

  async processFiles(inputs: readonly string[], options: FormatOptions, exclude: string[]): Promise<RunReport> {
    const missing: string[] = [];
    for (const input of inputs) {
      if (!(await this.env.fileSystem.exists(path.resolve(this.env.cwd, input)))) {
        missing.push(input);
      }
    }
    if (missing.length > 0) {
      throw new Error(`No such file or directory: ${missing.join(', ')}`);
    }

    const files = await collectFiles(inputs, this.env.fileSystem, { cwd: this.env.cwd, exclude });
    cliLogger.debug(`Collected ${files.length} file(s)`, { inputs });
    if (files.length === 0) {
      this.status('No .rpy files found', chalk.yellow);
    }

    const report = await formatFiles(files, { ...options, fileSystem: this.env.fileSystem });

    for (const { file, outcome, written } of report.files) {
      const shown = this.display(file);
      if (outcome.status === 'aborted') {
        this.status(`could not format ${shown}`, chalk.red);
        const excerpt = this.env.verbose ? outcome.error.getSourceContext() : undefined;
        if (excerpt) {
          this.status(excerpt.trimEnd(), chalk.gray);
        }
        continue;
      }
      if (options.mode === 'stdout') {
        this.env.streams.stdout(outcome.output);
      } else if (written) {
        this.status(`reformatted ${shown}`, chalk.green);
      } else if (options.mode === 'check' && outcome.changed) {
        this.status(`would reformat ${shown}`, chalk.yellow);
      } else if (this.env.verbose) {
        this.status(`unchanged ${shown}`, chalk.gray);
      }
    }

    this.reportDiagnostics(report.diagnostics);
    this.summarize(report, options);
    return report;
  }

  private reportDiagnostics(diagnostics: readonly Diagnostic[]): void {
    if (diagnostics.length === 0) return;
    const shown = diagnostics.map(diagnostic => ({ ...diagnostic, file: this.display(diagnostic.file) }));
    this.env.streams.stderr(formatDiagnostics(shown, { useColors: this.env.streams.colors }) + '\n');
  }

  private summarize(report: RunReport, options: FormatOptions): void {
    if (options.mode === 'stdout' || report.files.length === 0) return;
    const verb = options.mode === 'check' ? 'would be reformatted' : 'reformatted';
    const parts = [
      `${report.changed.length} file(s) ${verb}`,
      `${report.files.length - report.changed.length - report.aborted.length} unchanged`
    ];
    if (report.aborted.length > 0) {
      parts.push(`${report.aborted.length} failed`);
    }
    this.status(parts.join(', '), chalk.bold);
  }

  private display(file: string): string {
    if (file === STDIN_NAME) return file;
    const relative = path.relative(this.env.cwd, file);
    return relative && !relative.startsWith('..') ? relative : file;
  }

  private status(message: string, color: (text: string) => string): void {
    this.env.streams.stderr((this.env.streams.colors ? color(message) : message) + '\n');
  }
}
