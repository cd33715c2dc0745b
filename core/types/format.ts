import type { DocumentAbortError } from '@core/errors';
import type { EmbeddedRegion } from './document';

export type RegionFailure =
  | { kind: 'SyntaxError'; message: string; line: number; column: number }
  | { kind: 'EngineError'; message: string };

export type FormatResult =
  | { status: 'formatted'; text: string }
  | { status: 'failed'; error: RegionFailure };

export type DiagnosticKind =
  | 'MalformedIntroducer'
  | 'InconsistentIndentation'
  | 'SyntaxError'
  | 'EngineError'
  | 'FileError';

/**
 * A reportable problem, in 1-based document coordinates.
 */
export interface Diagnostic {
  file: string;
  line: number;
  column: number;
  kind: DiagnosticKind;
  message: string;
}

export type IndentationPolicy = 'reject' | 'expand-tabs';

export interface IndentationOptions {
  policy: IndentationPolicy;
  tabWidth: number;
}

/**
 * Options handed through to the formatting engine untouched.
 */
export interface EngineFormatOptions {
  lineLength: number;
  /** Extra engine flags from configuration, passed verbatim */
  extraArgs?: string[];
}

export interface DispatchOptions {
  lineLength: number;
  inlineLineLength: number;
  timeout: number;
}

export type PipelineState =
  | 'scanning'
  | 'extracting'
  | 'extracted'
  | 'dispatching'
  | 'dispatched'
  | 'splicing'
  | 'done'
  | 'aborted';

export interface RegionReport {
  region: EmbeddedRegion;
  result: FormatResult;
  changed: boolean;
}

export type DocumentOutcome =
  | {
      status: 'done';
      file: string;
      output: string;
      changed: boolean;
      regions: RegionReport[];
      diagnostics: Diagnostic[];
    }
  | {
      status: 'aborted';
      file: string;
      error: DocumentAbortError;
      diagnostics: Diagnostic[];
    };
