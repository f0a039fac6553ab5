import { describe, it, expect } from 'vitest';
import type { ParsedDocumentInput } from '../validation/parsedDocumentSchemas.js';
import { InputDefectError } from '../types/errors.js';
import { chunk } from './ContractChunkingService.js';
import { renderChunkDebugMarkdown } from './chunkDebugReport.js';

const now = () => new Date('2026-01-15T00:00:00.000Z');

function paragraph(block_id: string, text: string, page_start = 1) {
  return { block_id, kind: 'paragraph', text, page_start };
}

const licenceDocument: ParsedDocumentInput = {
  doc_id: 'doc-1',
  blocks: [
    { block_id: 'h1', kind: 'heading', text: '2. LICENCE', page_start: 1 },
    paragraph('p1', '2.1 The Licensee may use the Programs.'),
    paragraph('p2', '(a) for internal business purposes;'),
    paragraph('p3', '2.2 The Licensee shall not sublicense.', 2),
  ],
};

describe('ContractChunkingService', () => {
  describe('chunk ids and determinism', () => {
    it('produces identical chunk sets for identical input', () => {
      expect(chunk(licenceDocument, { now })).toEqual(chunk(licenceDocument, { now }));
    });

    it('formats chunk ids as docId:version:hash', () => {
      const result = chunk(licenceDocument, { now });
      for (const c of result.chunks) {
        expect(c.chunkId).toMatch(/^doc-1:v1:[0-9a-f]{16}$/);
      }
      expect(result.chunkedAt).toBe('2026-01-15T00:00:00.000Z');
      expect(result.chunking).toEqual({ version: 'v1', ruleset: '2026-01', maxChars: 2000, maxListItems: 12 });
    });

    it('changes chunk ids when the ruleset changes', () => {
      const v1 = chunk(licenceDocument, { now });
      const v2 = chunk(licenceDocument, { now, ruleset: '2026-02' });
      expect(v2.chunks[0].chunkId).not.toBe(v1.chunks[0].chunkId);
    });
  });

  describe('boundaries', () => {
    it('keeps headings singleton and splits on a new numeric clause', () => {
      const { chunks } = chunk(licenceDocument, { now });

      expect(chunks.map((c) => c.kind)).toEqual(['heading', 'clause', 'clause']);
      expect(chunks[1].text).toBe('2.1 The Licensee may use the Programs.\n\n(a) for internal business purposes;');
      expect(chunks[1].sourceBlockIds).toEqual(['p1', 'p2']);
      expect(chunks[1].clauseRef).toBe('2.1');
      expect(chunks[1].sectionPath).toEqual(['2. LICENCE']);
      expect(chunks[2]).toMatchObject({ clauseRef: '2.2', pageStart: 2, pageEnd: 2, chunkIndex: 2 });
    });

    it('carries the clause reference into a size-driven continuation', () => {
      const first = `5.1 ${'alpha '.repeat(24).trim()}`;
      const second = 'beta '.repeat(20).trim();
      const { chunks } = chunk(
        { doc_id: 'doc-2', blocks: [paragraph('a', first), paragraph('b', second)] },
        { now, maxChars: 200 }
      );

      expect(chunks).toHaveLength(2);
      expect(chunks[1].text).toBe(second);
      expect(chunks[1].clauseRef).toBe('5.1');
    });

    it('splits an oversized block at sentence boundaries', () => {
      const s1 = `${'lorem '.repeat(25).trim()}.`;
      const s2 = `${'ipsum '.repeat(25).trim()}.`;
      const { chunks } = chunk({ doc_id: 'doc-3', blocks: [paragraph('big', `${s1} ${s2}`)] }, { now, maxChars: 200 });

      expect(chunks.map((c) => c.text)).toEqual([s1, s2]);
      expect(chunks.every((c) => c.sourceBlockIds.length === 1 && c.sourceBlockIds[0] === 'big')).toBe(true);
      expect(chunks[0].chunkId).not.toBe(chunks[1].chunkId);
      expect(chunks.every((c) => c.charLen <= 200)).toBe(true);
    });

    it('closes a chunk at a page break once it is nearly full', () => {
      const long = 'alpha '.repeat(27).trim();
      const { chunks } = chunk(
        { doc_id: 'doc-4', blocks: [paragraph('a', long, 1), paragraph('b', 'closing words here ok', 2)] },
        { now, maxChars: 200 }
      );

      expect(chunks).toHaveLength(2);
      expect(chunks[0]).toMatchObject({ pageStart: 1, pageEnd: 1 });
      expect(chunks[1]).toMatchObject({ pageStart: 2, pageEnd: 2 });
    });

    it('merges across a page break when the chunk has room', () => {
      const short = 'alpha '.repeat(10).trim();
      const { chunks } = chunk(
        { doc_id: 'doc-5', blocks: [paragraph('a', short, 1), paragraph('b', 'closing words here ok', 2)] },
        { now, maxChars: 200 }
      );

      expect(chunks).toHaveLength(1);
      expect(chunks[0]).toMatchObject({ pageStart: 1, pageEnd: 2, sourceBlockIds: ['a', 'b'] });
    });

    it('enforces the list-item ceiling', () => {
      const items = ['Item one', 'Item two', 'Item three'].map((text, i) => ({
        block_id: `li${i}`,
        kind: 'list_item',
        text,
        page_start: 1,
      }));
      const { chunks } = chunk({ doc_id: 'doc-6', blocks: items }, { now, maxListItems: 2 });

      expect(chunks.map((c) => c.sourceBlockIds)).toEqual([['li0', 'li1'], ['li2']]);
    });
  });

  describe('tables', () => {
    it('emits tables whole and inherits the preceding heading', () => {
      const { chunks } = chunk(
        {
          doc_id: 'doc-7',
          blocks: [
            { block_id: 'h1', kind: 'heading', text: 'Schedule A Licensed Programs', page_start: 3 },
            {
              block_id: 't1',
              kind: 'table',
              text: null,
              page_start: 3,
              table: {
                rows: [
                  ['Product', 'Metric', 'Quantity'],
                  ['WebLogic Server', 'Processor', 6],
                ],
              },
            },
          ],
        },
        { now }
      );

      expect(chunks).toHaveLength(2);
      expect(chunks[1]).toMatchObject({
        kind: 'table',
        text: 'Product | Metric | Quantity\nWebLogic Server | Processor | 6',
        heading: 'Schedule A Licensed Programs',
        sectionPath: ['Schedule A Licensed Programs'],
        table: {
          rows: [
            ['Product', 'Metric', 'Quantity'],
            ['WebLogic Server', 'Processor', '6'],
          ],
        },
      });
    });
  });

  describe('noise and page ranges', () => {
    const noisy: ParsedDocumentInput = {
      doc_id: 'doc-8',
      blocks: [
        paragraph('a', 'Body text here.', 1),
        { block_id: 'f1', kind: 'footer', text: 'Acme Ltd Confidential', page_start: 1 },
        paragraph('n1', 'Page 2 of 5', 2),
        paragraph('b', 'More body text.', 2),
      ],
    };

    it('records excluded noise blocks', () => {
      const result = chunk(noisy, { now });

      expect(result.chunks).toHaveLength(1);
      expect(result.chunks[0].text).toBe('Body text here.\n\nMore body text.');
      expect(result.excludedBlocks).toEqual([
        { blockId: 'f1', reason: 'footer', pageStart: 1, pageEnd: 1 },
        { blockId: 'n1', reason: 'page_number', pageStart: 2, pageEnd: 2 },
      ]);
    });

    it('keeps noise in chunks when retainNoise is set', () => {
      const result = chunk(noisy, { now, retainNoise: true });

      expect(result.excludedBlocks).toEqual([]);
      expect(result.chunks[0].sourceBlockIds).toEqual(['a', 'f1', 'n1', 'b']);
    });

    it('restricts chunking to the requested page range', () => {
      const result = chunk(
        {
          doc_id: 'doc-9',
          blocks: [paragraph('a', 'First page text.', 1), paragraph('b', 'Second page text.', 2), paragraph('c', 'Third page text.', 3)],
        },
        { now, pageRange: { start: 2, end: 2 } }
      );

      expect(result.chunks.map((c) => c.text)).toEqual(['Second page text.']);
      expect(result.chunking.pageRange).toEqual({ start: 2, end: 2 });
    });
  });

  describe('input defects', () => {
    it('rejects an empty block list', () => {
      expect(() => chunk({ doc_id: 'doc-x', blocks: [] })).toThrow(InputDefectError);
    });

    it('rejects duplicate block ids', () => {
      expect(() =>
        chunk({ doc_id: 'doc-x', blocks: [paragraph('a', 'One.'), paragraph('a', 'Two.')] })
      ).toThrow(InputDefectError);
    });

    it('rejects inverted page ranges', () => {
      expect(() =>
        chunk({ doc_id: 'doc-x', blocks: [{ block_id: 'a', kind: 'paragraph', text: 'x', page_start: 3, page_end: 2 }] })
      ).toThrow(InputDefectError);
    });

    it('validates camelCase documents too', () => {
      const block = { blockId: 'a', kind: 'paragraph', text: 'The Licensee may use the Programs.', pageStart: 1, pageEnd: 1 };

      expect(chunk({ docId: 'doc-c', blocks: [block] }, { now }).chunks.map((c) => c.text)).toEqual([
        'The Licensee may use the Programs.',
      ]);
      expect(() => chunk({ docId: 'doc-c', blocks: [{ ...block, kind: 'banner' }] })).toThrow(/blocks\.0\.kind/);
      expect(() => chunk({ docId: 'doc-c', blocks: [{ blockId: 'a', kind: 'paragraph', pageStart: 1, pageEnd: 1 }] })).toThrow(
        InputDefectError
      );
    });

    it('rejects a document with only noise', () => {
      expect(() =>
        chunk({ doc_id: 'doc-x', blocks: [{ block_id: 'f', kind: 'footer', text: 'Footer', page_start: 1 }] })
      ).toThrow('Document has no chunkable content');
    });
  });

  it('renders a chunk debug report', () => {
    const markdown = renderChunkDebugMarkdown(chunk(licenceDocument, { now }));

    expect(markdown.startsWith('# Chunk Debug\n\nDocument: doc-1\n')).toBe(true);
    expect(markdown).toContain('## 2. clause (p.1-1)');
    expect(markdown).toContain('source_blocks: p1, p2');
    expect(markdown).toContain("clause_ref: `2.1`");
  });
});
