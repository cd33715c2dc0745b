import { describe, it, expect } from 'vitest';
import type { SegmentedDocument } from '@core/types/document';
import { MalformedIntroducerError } from '@core/errors';
import { DocumentBuilder, assertPartition } from './DocumentBuilder';
import { createDocument } from './LineScanner';

const builder = new DocumentBuilder({ policy: 'reject', tabWidth: 8 });

function build(text: string): SegmentedDocument {
  return builder.build(createDocument(text));
}

function pieces(segmented: SegmentedDocument): string[] {
  return segmented.segments.map(segment =>
    `${segment.kind}:${segmented.document.text.slice(segment.span.start, segment.span.end)}`
  );
}

describe('DocumentBuilder', () => {
  it('returns one host segment for a document without regions', () => {
    const segmented = build('label start:\n    e "Hello."\n    return\n');

    expect(segmented.regions).toEqual([]);
    expect(pieces(segmented)).toEqual(['host:label start:\n    e "Hello."\n    return\n']);
  });

  it('returns no segments for an empty document', () => {
    expect(build('').segments).toEqual([]);
  });

  it('partitions host text, inline statements and blocks in order', () => {
    const segmented = build('label a:\n    $ x=1\ninit python:\n    y =2\n\nlabel b:\n');

    expect(pieces(segmented)).toEqual([
      'host:label a:\n    $ ',
      'embedded:x=1',
      'host:\ninit python:\n',
      'embedded:    y =2\n',
      'host:\nlabel b:\n'
    ]);
    expect(segmented.regions.map(region => [region.id, region.kind])).toEqual([
      [0, 'inline-statement'],
      [1, 'init-block']
    ]);
    expect(() => assertPartition(segmented)).not.toThrow();
  });

  it('keeps an inline region to its own line', () => {
    const segmented = build('$ a=1\n    b=2\n');

    expect(segmented.regions).toHaveLength(1);
    expect(segmented.regions[0].code).toBe('a=1\n');
  });

  it('scans the children of host init blocks', () => {
    const segmented = build('init:\n    $ config.x=1\n    python:\n        z=3\n');

    expect(segmented.regions.map(region => region.code)).toEqual(['config.x=1\n', 'z=3\n']);
  });

  it('does not find introducers inside strings or comments', () => {
    const segmented = build([
      'e "Type $ x=1 or python: to start."',
      '# $ not code',
      'e """',
      '$ still dialogue',
      'python:',
      '"""',
      ''
    ].join('\n'));

    expect(segmented.regions).toEqual([]);
  });

  it('resumes scanning after a block', () => {
    const segmented = build('python:\n    a=1\n$ b=2\n');

    expect(segmented.regions.map(region => region.code)).toEqual(['a=1\n', 'b=2\n']);
    expect(segmented.regions[1].startLine).toBe(2);
  });

  it('propagates malformed introducers', () => {
    expect(() => build('label a:\n    python hide\n')).toThrow(MalformedIntroducerError);
  });

  it('keeps the partition on CRLF documents', () => {
    const segmented = build('python:\r\n    x=1\r\n\r\n$ y=2\r\n');

    expect(pieces(segmented)).toEqual([
      'host:python:\r\n',
      'embedded:    x=1\r\n',
      'host:\r\n$ ',
      'embedded:y=2',
      'host:\r\n'
    ]);
  });
});

describe('assertPartition', () => {
  it('rejects segments that leave a gap', () => {
    const document = createDocument('abcdef');
    expect(() => assertPartition({
      document,
      regions: [],
      segments: [
        { kind: 'host', span: { start: 0, end: 2 } },
        { kind: 'host', span: { start: 3, end: 6 } }
      ]
    })).toThrow('Segment partition broken at offset 2: segment spans 3-6');
  });

  it('rejects segments that stop short of the end', () => {
    const document = createDocument('abc');
    expect(() => assertPartition({
      document,
      regions: [],
      segments: [{ kind: 'host', span: { start: 0, end: 2 } }]
    })).toThrow('Segments cover 2 of 3 characters');
  });
});
