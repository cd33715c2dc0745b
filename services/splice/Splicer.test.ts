import { describe, it, expect } from 'vitest';
import type { SegmentedDocument } from '@core/types/document';
import type { FormatResult } from '@core/types/format';
import { DocumentBuilder } from '@services/document/DocumentBuilder';
import { createDocument } from '@services/document/LineScanner';
import { Splicer, reindent, restoreRegion } from './Splicer';

function segment(text: string): SegmentedDocument {
  return new DocumentBuilder({ policy: 'expand-tabs', tabWidth: 8 }).build(createDocument(text));
}

const formatted = (text: string): FormatResult => ({ status: 'formatted', text });
const failed: FormatResult = { status: 'failed', error: { kind: 'EngineError', message: 'no' } };

describe('restoreRegion', () => {
  it('rebuilds the original text of every region', () => {
    const text = 'label a:\n\tpython:\n\t    x=1\n\n\t    if x:\r\n\t\ty=2\n\t$ z=3\n';
    const segmented = segment(text);

    for (const region of segmented.regions) {
      expect(restoreRegion(region)).toBe(text.slice(region.span.start, region.span.end));
    }
    expect(segmented.regions).toHaveLength(2);
  });
});

describe('reindent', () => {
  it('prefixes non-blank lines with the base indentation only', () => {
    const [region] = segment('    python:\n        x=1\n').regions;

    expect(reindent(region, 'if x:\n\n    y = 1\n')).toBe('        if x:\n\n            y = 1\n');
  });

  it('uses the region line ending', () => {
    const [region] = segment('python:\r\n    x=1\r\n    y=2\r\n').regions;

    expect(reindent(region, 'x = 1\ny = 2\n')).toBe('    x = 1\r\n    y = 2\r\n');
  });

  it('adds no final newline when the region had none', () => {
    const [region] = segment('python:\n    x=1').regions;

    expect(reindent(region, 'x = 1\n')).toBe('    x = 1');
  });

  it('keeps whitespace-only lines inside a multi-line string', () => {
    const [region] = segment('python:\n    s = """\n      \n    """\n').regions;

    expect(reindent(region, 's = """\n  \n"""\n')).toBe('    s = """\n      \n    """\n');
  });

  it('returns a statement without its newline', () => {
    const [region] = segment('$ x=1\n').regions;

    expect(reindent(region, 'x = 1\n')).toBe('x = 1');
  });
});

describe('Splicer', () => {
  const splicer = new Splicer();

  it('reproduces a document without regions exactly', () => {
    const text = 'label start:\r\n    e "Hi."\n\n';
    expect(splicer.splice(segment(text), [])).toBe(text);
  });

  it('substitutes formatted regions and keeps failed ones', () => {
    const text = 'init python:\n    a=1\n\nlabel s:\n    $ b=2  # note\n    return\n';
    const segmented = segment(text);

    const output = splicer.splice(segmented, [formatted('a = 1\n'), failed]);

    expect(output).toBe('init python:\n    a = 1\n\nlabel s:\n    $ b=2  # note\n    return\n');
  });

  it('keeps the inline trailing comment attached to the statement', () => {
    const text = '$ b=2  # note\n';
    const output = splicer.splice(segment(text), [formatted('b = 2  # note\n')]);

    expect(output).toBe('$ b = 2  # note\n');
  });
});
