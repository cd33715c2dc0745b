import type { Document, EmbeddedRegion, Segment, SegmentedDocument } from '@core/types/document';
import type { IndentationOptions } from '@core/types/format';
import { scannerLogger } from '@core/utils/logger';
import { BlockRecognizer } from './BlockRecognizer';
import { INITIAL_STATE, RENPY_DIALECT, lexLine, type LexState } from './HostLexer';
import { RegionExtractor, type ExtractedRegion } from './RegionExtractor';

/**
 * Partitions a document into host text and embedded Python regions in a
 * single pass over its lines.
 */
export class DocumentBuilder {
  private readonly recognizer = new BlockRecognizer();
  private readonly extractor: RegionExtractor;

  constructor(indentation: IndentationOptions) {
    this.extractor = new RegionExtractor(indentation);
  }

  build(document: Document): SegmentedDocument {
    const { lines, text } = document;
    const segments: Segment[] = [];
    const regions: EmbeddedRegion[] = [];
    let cursor = 0;
    let state: LexState = INITIAL_STATE;

    const addRegion = (extracted: ExtractedRegion) => {
      if (extracted.span.start > cursor) {
        segments.push({ kind: 'host', span: { start: cursor, end: extracted.span.start } });
      }
      const region: EmbeddedRegion = { id: regions.length, ...extracted };
      regions.push(region);
      segments.push({ kind: 'embedded', span: region.span, region });
      cursor = region.span.end;
    };

    let index = 0;
    while (index < lines.length) {
      const line = lines[index];
      const lexed = lexLine(line.content, state, RENPY_DIALECT);
      const recognition = this.recognizer.recognize(line, lexed);

      switch (recognition.kind) {
        case 'not-introducer':
          state = lexed.end;
          index++;
          break;

        case 'inline':
          addRegion(this.extractor.extractInline(line, recognition.codeColumn, recognition.codeEndColumn));
          state = INITIAL_STATE;
          index++;
          break;

        case 'block': {
          const extraction = this.extractor.extractBlock(
            lines,
            line,
            recognition.variant,
            recognition.header,
            recognition.colonColumn,
            document.lineEndings
          );
          addRegion(extraction.region);
          state = INITIAL_STATE;
          index = extraction.nextLine;
          break;
        }
      }
    }

    if (cursor < text.length) {
      segments.push({ kind: 'host', span: { start: cursor, end: text.length } });
    }

    scannerLogger.debug('Partitioned document', {
      lines: lines.length,
      segments: segments.length,
      regions: regions.length
    });

    return { document, segments, regions };
  }
}

/**
 * Throws when the segments do not tile the document text exactly.
 */
export function assertPartition(segmented: SegmentedDocument): void {
  const { document, segments } = segmented;
  let expected = 0;
  for (const segment of segments) {
    if (segment.span.start !== expected || segment.span.end < segment.span.start) {
      throw new Error(
        `Segment partition broken at offset ${expected}: segment spans ${segment.span.start}-${segment.span.end}`
      );
    }
    expected = segment.span.end;
  }
  if (expected !== document.text.length) {
    throw new Error(`Segments cover ${expected} of ${document.text.length} characters`);
  }
}
