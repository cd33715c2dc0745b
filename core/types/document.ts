/**
 * Document model shared by every stage of the formatting pipeline.
 *
 * A document is read once, partitioned into host and embedded segments, and
 * never mutated; splicing builds a new string from the segments.
 */

export type LineEnding = '\n' | '\r\n' | '\r';

export interface LineEndingStyle {
  /** The terminator used by most lines (`\n` when the text has none) */
  dominant: LineEnding;
  /** True when more than one kind of terminator occurs */
  mixed: boolean;
}

/**
 * One physical line. Offsets are string indices into the document text;
 * `end` points just past the content, before the terminator.
 */
export interface ScannedLine {
  index: number;
  start: number;
  end: number;
  content: string;
  /** Empty for a final line without terminator */
  ending: LineEnding | '';
  /** Leading whitespace of `content` */
  indent: string;
}

export interface Span {
  start: number;
  end: number;
}

export interface Document {
  readonly text: string;
  readonly lines: readonly ScannedLine[];
  readonly lineEndings: LineEndingStyle;
  /** UTF-8 byte length of the text */
  readonly byteLength: number;
}

export type RegionKind = 'inline-statement' | 'block' | 'init-block' | 'early-block';

export type BlockVariant = Exclude<RegionKind, 'inline-statement'>;

/**
 * Parsed `[init [N]] python [early] [hide] [in name]:` header.
 */
export interface BlockHeader {
  init: boolean;
  priority?: number;
  early: boolean;
  hide: boolean;
  store?: string;
}

/**
 * Per-line bookkeeping that lets a region be restored exactly and lets engine
 * coordinates be mapped back onto the document.
 */
export interface RegionLine {
  /** Document line index */
  line: number;
  /** Leading whitespace as it appears in the document */
  originalIndent: string;
  /** Leading whitespace left in the normalized code */
  normalizedIndent: string;
  /** Content after the leading whitespace, as in the document */
  body: string;
  ending: LineEnding | '';
}

export interface EmbeddedRegion {
  /** Position of the region in document order; keys its format result */
  id: number;
  span: Span;
  kind: RegionKind;
  /** Document line index of the `$` or `python:` line */
  introducerLine: number;
  /** Document line index of the first code line */
  startLine: number;
  lineCount: number;
  /** Whitespace of the introducer line */
  introducerIndent: string;
  /** Whitespace placed before every non-blank formatted line on splice */
  baseIndent: string;
  /** Column (0-based, in characters) where the code starts on its first line */
  startColumn: number;
  /** Dedented code handed to the engine, `\n` separated, one trailing `\n` */
  code: string;
  lines: RegionLine[];
  /** Terminator used when re-emitting formatted lines */
  lineEnding: LineEnding;
  /** Whether the last line of the span carried a terminator */
  endsWithNewline: boolean;
  header?: BlockHeader;
}

export type Segment =
  | { kind: 'host'; span: Span }
  | { kind: 'embedded'; span: Span; region: EmbeddedRegion };

export interface SegmentedDocument {
  document: Document;
  segments: Segment[];
  regions: EmbeddedRegion[];
}
