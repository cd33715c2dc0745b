/**
 * rpyfmt API Entry Point
 *
 * Formats the Python embedded in Ren'Py scripts: `$` statements and
 * `python:` blocks are handed to an external formatter and spliced back,
 * everything else is left byte-for-byte as it was.
 */
/// <reference types="node" />
import type { EngineConfig } from '@core/config/types';
import { DEFAULT_CONFIG } from '@core/config/loader';
import { parseDuration } from '@core/config/utils';
import type { Diagnostic, DocumentOutcome, IndentationOptions } from '@core/types/format';
import { FileAccessError } from '@core/errors';
import { logger } from '@core/utils/logger';
import { runWithConcurrency } from '@core/utils/parallel';
import { TaskPool } from '@services/dispatch/TaskPool';
import { createEngine } from '@services/engine/SubprocessFormatEngine';
import type { IFormatEngine } from '@services/engine/IFormatEngine';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { DocumentFormatter, type PipelineOptions } from '@services/pipeline/DocumentFormatter';

export * from '@core/errors';
export type * from '@core/types/document';
export type * from '@core/types/format';
export type { IFormatEngine };
export type { IFileSystemService };
export { TaskPool };
export { createEngine };

export type OutputMode = 'stdout' | 'write' | 'check';

/**
 * Options for formatting documents
 */
export interface FormatOptions {
  /** Line length for `python:` blocks */
  lineLength?: number;
  /** Line length for `$` statements */
  inlineLineLength?: number;
  /** Per-region engine timeout, e.g. "10s" or milliseconds */
  timeout?: string | number;
  /** Maximum concurrent engine invocations */
  concurrency?: number;
  indentation?: Partial<IndentationOptions>;
  /** An engine instance, or the configuration of a subprocess engine */
  engine?: IFormatEngine | EngineConfig;
  /** Shared pool; one is created per call when absent */
  pool?: TaskPool;
  fileSystem?: IFileSystemService;
  mode?: OutputMode;
}

export interface FileReport {
  file: string;
  outcome: DocumentOutcome;
  /** The file was rewritten on disk */
  written: boolean;
}

export interface RunReport {
  files: FileReport[];
  diagnostics: Diagnostic[];
  /** Files that were (or, in check mode, would be) changed */
  changed: string[];
  aborted: string[];
}

function isEngine(engine: IFormatEngine | EngineConfig | undefined): engine is IFormatEngine {
  return typeof engine === 'object' && 'format' in engine && typeof engine.format === 'function';
}

function resolvePipeline(options: FormatOptions): { formatter: DocumentFormatter; pool: TaskPool } {
  const engine = isEngine(options.engine) ? options.engine : createEngine(options.engine);
  const pool = options.pool ?? new TaskPool(options.concurrency ?? DEFAULT_CONFIG.concurrency);
  const pipelineOptions: PipelineOptions = {
    lineLength: options.lineLength ?? DEFAULT_CONFIG.lineLength,
    inlineLineLength: options.inlineLineLength ?? DEFAULT_CONFIG.inlineLineLength,
    timeout: options.timeout !== undefined ? parseDuration(options.timeout) : DEFAULT_CONFIG.timeout,
    indentation: {
      policy: options.indentation?.policy ?? DEFAULT_CONFIG.indentation.policy,
      tabWidth: options.indentation?.tabWidth ?? DEFAULT_CONFIG.indentation.tabWidth
    }
  };
  return { formatter: new DocumentFormatter(engine, pool, pipelineOptions), pool };
}

/**
 * Format one document held in memory
 */
export async function formatText(text: string, options: FormatOptions = {}, file = '<stdin>'): Promise<DocumentOutcome> {
  const { formatter } = resolvePipeline(options);
  return formatter.format(text, file);
}

/**
 * Format one file; in `write` mode a changed file is rewritten in place
 */
export async function formatFile(filePath: string, options: FormatOptions = {}): Promise<FileReport> {
  const [report] = (await formatFiles([filePath], options)).files;
  return report;
}

function fileFailure(error: FileAccessError): DocumentOutcome {
  logger.warn(error.message);
  return {
    status: 'aborted',
    file: error.filePath,
    error,
    diagnostics: [{ file: error.filePath, line: 1, column: 1, kind: error.kind, message: error.message }]
  };
}

/**
 * Format many files. Documents run concurrently and share one engine pool;
 * an aborted document, or one that cannot be read or written, never
 * affects the others.
 */
export async function formatFiles(filePaths: readonly string[], options: FormatOptions = {}): Promise<RunReport> {
  const fileSystem = options.fileSystem ?? new NodeFileSystem();
  const mode = options.mode ?? 'stdout';
  const { formatter, pool } = resolvePipeline(options);

  const files = await runWithConcurrency(filePaths, pool.limit, async (file): Promise<FileReport> => {
    let text: string;
    try {
      text = await fileSystem.readFile(file);
    } catch (error) {
      return { file, outcome: fileFailure(new FileAccessError(file, 'read', error)), written: false };
    }

    const outcome = await formatter.format(text, file);
    if (mode !== 'write' || outcome.status !== 'done' || !outcome.changed) {
      return { file, outcome, written: false };
    }

    try {
      await fileSystem.writeFile(file, outcome.output);
    } catch (error) {
      return { file, outcome: fileFailure(new FileAccessError(file, 'write', error)), written: false };
    }
    return { file, outcome, written: true };
  });

  return {
    files,
    diagnostics: files.flatMap(report => report.outcome.diagnostics),
    changed: files
      .filter(report => report.outcome.status === 'done' && report.outcome.changed)
      .map(report => report.file),
    aborted: files
      .filter(report => report.outcome.status === 'aborted')
      .map(report => report.file)
  };
}

export interface ExitPolicy {
  strict?: boolean;
  check?: boolean;
}

/**
 * Whether a run should end with a non-zero exit status: any aborted document,
 * any change in check mode, or any region failure in strict mode.
 */
export function shouldFail(report: Pick<RunReport, 'aborted' | 'changed' | 'diagnostics'>, policy: ExitPolicy = {}): boolean {
  if (report.aborted.length > 0) return true;
  if (policy.check && report.changed.length > 0) return true;
  if (policy.strict && report.diagnostics.length > 0) return true;
  return false;
}
