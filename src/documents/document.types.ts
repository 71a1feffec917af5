export type SourceType = 'text' | 'markdown' | 'pdf' | 'docx';

export type ParseStatus = 'pending' | 'parsed' | 'failed';

export type StructuralTag = 'heading' | 'body' | 'table';

export type DocumentRecord = {
  id: string;
  title: string;
  sourceType: SourceType;
  contentType: string;
  version: number;
  status: ParseStatus;
  chunkCount: number;
  error?: string;
  uploadedAt: string;
  parsedAt?: string;
};

export type Chunk = {
  id: string; // `${documentId}:${sequenceIndex}`
  documentId: string;
  sequenceIndex: number;
  text: string;
  startOffset: number;
  endOffset: number;
  /** Characters shared with the previous chunk (sliding-window fallback only). */
  overlap: number;
  structuralTag: StructuralTag;
  embedding: number[] | null;
};

export type StructuralHints = {
  sourceType: SourceType;
  /** Line indices an extractor already knows to be headings. */
  headingLines?: readonly number[];
};

export type ParsedDocument = {
  text: string;
  hints: StructuralHints;
};

export const CONTENT_TYPES: Record<string, SourceType> = {
  'text/plain': 'text',
  'text/markdown': 'markdown',
  'text/x-markdown': 'markdown',
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
};

export function sourceTypeFor(contentType: string): SourceType | null {
  const base = contentType.split(';')[0].trim().toLowerCase();
  return CONTENT_TYPES[base] ?? null;
}
