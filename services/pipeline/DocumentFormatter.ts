import type { EmbeddedRegion, SegmentedDocument } from '@core/types/document';
import type {
  Diagnostic,
  DispatchOptions,
  DocumentOutcome,
  FormatResult,
  IndentationOptions,
  PipelineState,
  RegionReport
} from '@core/types/format';
import {
  InconsistentIndentationError,
  MalformedIntroducerError,
  type DocumentStructureError
} from '@core/errors';
import { pipelineLogger } from '@core/utils/logger';
import { createDocument } from '@services/document/LineScanner';
import { DocumentBuilder, assertPartition } from '@services/document/DocumentBuilder';
import { FormatDispatcher } from '@services/dispatch/FormatDispatcher';
import type { TaskPool } from '@services/dispatch/TaskPool';
import type { IFormatEngine } from '@services/engine/IFormatEngine';
import { Splicer, renderRegion } from '@services/splice/Splicer';

export interface PipelineOptions extends DispatchOptions {
  indentation: IndentationOptions;
}

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  scanning: ['extracting', 'aborted'],
  extracting: ['extracted', 'aborted'],
  extracted: ['dispatching'],
  dispatching: ['dispatched'],
  dispatched: ['splicing'],
  splicing: ['done'],
  done: [],
  aborted: []
};

/**
 * Tracks the stage of one document and refuses out-of-order transitions.
 */
export class PipelineTracker {
  private current: PipelineState = 'scanning';
  readonly history: PipelineState[] = ['scanning'];

  constructor(private readonly file: string) {}

  get state(): PipelineState {
    return this.current;
  }

  advance(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.current} -> ${next} for ${this.file}`);
    }
    pipelineLogger.debug(`${this.file}: ${this.current} -> ${next}`);
    this.current = next;
    this.history.push(next);
  }
}

function isStructureError(error: unknown): error is DocumentStructureError {
  return error instanceof MalformedIntroducerError || error instanceof InconsistentIndentationError;
}

/**
 * Scan, extract, dispatch and splice one document.
 */
export class DocumentFormatter {
  private readonly dispatcher: FormatDispatcher;
  private readonly splicer = new Splicer();

  constructor(
    engine: IFormatEngine,
    pool: TaskPool,
    private readonly options: PipelineOptions
  ) {
    this.dispatcher = new FormatDispatcher(engine, pool);
  }

  async format(text: string, file = '<stdin>'): Promise<DocumentOutcome> {
    const tracker = new PipelineTracker(file);
    let segmented: SegmentedDocument;

    try {
      const document = createDocument(text);
      tracker.advance('extracting');
      segmented = new DocumentBuilder(this.options.indentation).build(document);
      assertPartition(segmented);
      tracker.advance('extracted');
    } catch (error) {
      if (!isStructureError(error)) {
        throw error;
      }
      tracker.advance('aborted');
      const located = error.locate(file, text);
      pipelineLogger.warn(`${file}: ${located.message}`);
      return {
        status: 'aborted',
        file,
        error: located,
        diagnostics: [structureDiagnostic(file, located)]
      };
    }

    tracker.advance('dispatching');
    const results = await this.dispatcher.dispatch(segmented.regions, this.options);
    tracker.advance('dispatched');

    tracker.advance('splicing');
    const output = this.splicer.splice(segmented, results);
    tracker.advance('done');

    const regions = segmented.regions.map((region, index) => report(text, region, results[index]));
    const diagnostics = regions.flatMap(entry => regionDiagnostics(file, entry.region, entry.result));

    return {
      status: 'done',
      file,
      output,
      changed: output !== text,
      regions,
      diagnostics
    };
  }
}

function report(text: string, region: EmbeddedRegion, result: FormatResult): RegionReport {
  const original = text.slice(region.span.start, region.span.end);
  return { region, result, changed: renderRegion(text, region, result) !== original };
}

function structureDiagnostic(file: string, error: DocumentStructureError): Diagnostic {
  return {
    file,
    line: error.sourceLocation?.line ?? 1,
    column: error.sourceLocation?.column ?? 1,
    kind: error.kind,
    message: error.message
  };
}

function regionDiagnostics(file: string, region: EmbeddedRegion, result: FormatResult): Diagnostic[] {
  if (result.status === 'formatted') {
    return [];
  }
  const { error } = result;
  if (error.kind === 'SyntaxError') {
    return [{ file, line: error.line, column: error.column, kind: error.kind, message: error.message }];
  }
  const column = region.kind === 'inline-statement'
    ? region.startColumn + 1
    : region.baseIndent.length + 1;
  return [{ file, line: region.startLine + 1, column, kind: error.kind, message: error.message }];
}
