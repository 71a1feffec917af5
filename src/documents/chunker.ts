import { ParseError } from '../common/errors';
import type { Chunk, StructuralHints, StructuralTag } from './document.types';

export type ChunkingOptions = {
  maxChunkChars: number;
  overlapChars: number;
};

type Span = {
  start: number;
  end: number;
  overlap: number;
  tag: StructuralTag;
};

type Block = {
  start: number;
  end: number;
  tag: StructuralTag;
};

type SplitLevel = 'line' | 'sentence' | 'word' | 'window';

const LEVELS: SplitLevel[] = ['line', 'sentence', 'word', 'window'];

const MD_HEADING = /^#{1,6}\s+\S/;
const SENTENCE_END = /[.!?。！？]+["')\]]*\s+/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Structure-aware splitter with exact character offsets.
 *
 * Blocks (headings, paragraphs, table runs) are packed greedily up to the budget;
 * a block that does not fit on its own is split by lines, then sentences, then
 * words, and only then by a sliding window with overlap.
 *
 * Whitespace around a chunk's content does not count against the budget and is
 * never a chunk of its own, so the ranges tile the document:
 * `chunks.map((c) => c.text.slice(c.overlap)).join('') === text`.
 */
export class Chunker {
  constructor(private readonly opts: ChunkingOptions) {
    if (opts.overlapChars >= opts.maxChunkChars) {
      throw new Error('overlapChars must be smaller than maxChunkChars');
    }
  }

  chunk(documentId: string, text: string, hints: StructuralHints): Chunk[] {
    if (!text.trim()) {
      throw new ParseError('Document has no extractable text', documentId);
    }

    const spans = this.pack(text, this.blocks(text, hints));

    return spans.map((s, i) => ({
      id: `${documentId}:${i}`,
      documentId,
      sequenceIndex: i,
      text: text.slice(s.start, s.end),
      startOffset: s.start,
      endOffset: s.end,
      overlap: s.overlap,
      structuralTag: s.tag,
      embedding: null,
    }));
  }

  private blocks(text: string, hints: StructuralHints): Block[] {
    const headingLines = new Set(hints.headingLines ?? []);
    const blocks: Block[] = [];
    let open: Block | null = null;
    let afterBlank = false;
    let lineStart = 0;
    let lineNo = 0;

    while (lineStart < text.length) {
      const nl = text.indexOf('\n', lineStart);
      const lineEnd = nl === -1 ? text.length : nl + 1;
      const line = text.slice(lineStart, lineEnd).trim();

      if (!line) {
        // blank lines trail whatever came before them
        if (open) open.end = lineEnd;
        afterBlank = true;
      } else {
        const tag = this.classify(line, lineNo, headingLines, hints);
        if (open && !afterBlank && open.tag === tag && tag !== 'heading') {
          open.end = lineEnd;
        } else {
          // leading blank lines of the document belong to the first block
          open = { start: open ? lineStart : 0, end: lineEnd, tag };
          blocks.push(open);
        }
        afterBlank = false;
      }

      lineStart = lineEnd;
      lineNo++;
    }

    return blocks;
  }

  private classify(
    line: string,
    lineNo: number,
    headingLines: ReadonlySet<number>,
    hints: StructuralHints,
  ): StructuralTag {
    if (headingLines.has(lineNo)) return 'heading';
    if (hints.sourceType !== 'pdf' && MD_HEADING.test(line)) return 'heading';
    if (line.startsWith('|')) return 'table';
    return 'body';
  }

  private pack(text: string, blocks: Block[]): Span[] {
    const max = this.opts.maxChunkChars;
    const spans: Span[] = [];
    let current: Span | null = null;

    for (const block of blocks) {
      if (
        current &&
        block.tag !== 'heading' &&
        contentLength(text, current.start, block.end) <= max
      ) {
        current.end = block.end;
        if (current.tag === 'table' && block.tag !== 'table') current.tag = 'body';
        continue;
      }

      if (contentLength(text, block.start, block.end) > max) {
        // a heading still waiting for its content leads the first piece
        const head: Span | null = current?.tag === 'heading' ? current : null;
        if (current && !head) spans.push(current);
        current = null;

        for (const piece of this.splitSpan(text, block.start, block.end, 0, head)) {
          spans.push({ ...piece, tag: head && piece.start === head.start ? 'heading' : block.tag });
        }
        continue;
      }

      if (current) spans.push(current);
      current = { start: block.start, end: block.end, overlap: 0, tag: block.tag };
    }
    if (current) spans.push(current);

    return spans;
  }

  private splitSpan(
    text: string,
    start: number,
    end: number,
    levelIndex: number,
    lead: Span | null = null,
  ): Span[] {
    const max = this.opts.maxChunkChars;
    if (!lead && contentLength(text, start, end) <= max) {
      return [{ start, end, overlap: 0, tag: 'body' }];
    }

    const level = LEVELS[levelIndex];
    if (level === 'window') {
      return lead ? [lead, ...this.window(text, start, end)] : this.window(text, start, end);
    }

    const pieces = piecesOf(text, start, end, level);
    if (pieces.length <= 1 && contentLength(text, start, end) > max) {
      return this.splitSpan(text, start, end, levelIndex + 1, lead);
    }

    const out: Span[] = [];
    let cur: Span | null = lead ? { ...lead, overlap: 0 } : null;

    for (const [ps, pe] of pieces) {
      if (cur !== null && contentLength(text, cur.start, pe) <= max) {
        cur.end = pe;
        continue;
      }
      if (cur !== null) out.push(cur);
      cur = null;

      if (contentLength(text, ps, pe) > max) {
        out.push(...this.splitSpan(text, ps, pe, levelIndex + 1));
      } else {
        cur = { start: ps, end: pe, overlap: 0, tag: 'body' };
      }
    }
    if (cur !== null) out.push(cur);

    return out;
  }

  private window(text: string, start: number, end: number): Span[] {
    const { maxChunkChars: max, overlapChars } = this.opts;
    const out: Span[] = [];
    let s = start;
    let overlap = 0;

    for (;;) {
      const rest = text.slice(s, end);
      const contentStart = s + rest.length - rest.trimStart().length;
      let e = Math.min(contentStart + max, end);
      if (!text.slice(e, end).trim()) e = end;
      out.push({ start: s, end: e, overlap, tag: 'body' });
      if (e >= end) break;
      s = e - overlapChars;
      overlap = overlapChars;
    }

    return out;
  }
}

/** Length that counts against the budget: surrounding whitespace is free. */
function contentLength(text: string, start: number, end: number) {
  return text.slice(start, end).trim().length;
}

function piecesOf(
  text: string,
  start: number,
  end: number,
  level: Exclude<SplitLevel, 'window'>,
): Array<[number, number]> {
  const slice = text.slice(start, end);
  const cuts: number[] = [];

  if (level === 'line') {
    let i = slice.indexOf('\n');
    while (i !== -1 && i < slice.length - 1) {
      cuts.push(i + 1);
      i = slice.indexOf('\n', i + 1);
    }
  } else {
    const re = new RegExp(level === 'sentence' ? SENTENCE_END : WHITESPACE_RUN);
    for (const m of slice.matchAll(re)) {
      const cut = (m.index ?? 0) + m[0].length;
      if (cut < slice.length) cuts.push(cut);
    }
  }

  const pieces: Array<[number, number]> = [];
  let prev = 0;
  for (const c of cuts) {
    if (c > prev) pieces.push([start + prev, start + c]);
    prev = c;
  }
  pieces.push([start + prev, end]);

  // whitespace-only pieces join their neighbour so no chunk is blank
  const merged: Array<[number, number]> = [];
  let carry: number | null = null;
  for (const [a, b] of pieces) {
    if (!text.slice(a, b).trim()) {
      const last = merged[merged.length - 1];
      if (last) last[1] = b;
      else if (carry === null) carry = a;
      continue;
    }
    merged.push([carry ?? a, b]);
    carry = null;
  }
  if (carry !== null) merged.push([carry, end]);
  return merged;
}

/** Rebuilds the source text from chunks, skipping each chunk's declared overlap. */
export function reconstruct(chunks: ReadonlyArray<Pick<Chunk, 'text' | 'overlap'>>): string {
  return chunks.map((c) => c.text.slice(c.overlap)).join('');
}
