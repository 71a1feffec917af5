import type { SourceType, StructuralTag } from '../documents/document.types';

export const SEARCH_BACKEND = Symbol('SEARCH_BACKEND');

export type IndexRecord = {
  id: string; // `${documentId}@${version}#${sequenceIndex}`
  documentId: string;
  version: number;
  chunkId: string;
  sequenceIndex: number;
  text: string;
  title: string;
  sourceType: SourceType;
  structuralTag: StructuralTag;
  vector: number[];
};

export type SearchFilters = {
  documentIds?: readonly string[];
  sourceTypes?: readonly SourceType[];
  structuralTags?: readonly StructuralTag[];
};

export type BackendHit = {
  record: IndexRecord;
  score: number;
};

export type QueryResult = {
  lexical: BackendHit[];
  vector: BackendHit[];
};

/**
 * Storage substrate for the index writer and retriever.
 *
 * Records are written under a (document, version) pair and stay invisible until
 * `activate` points the document at that version. Reads only ever see the active
 * version of each document.
 */
export interface SearchBackend {
  upsert(records: readonly IndexRecord[]): Promise<void>;
  activeVersion(documentId: string): Promise<number | null>;
  activate(documentId: string, version: number): Promise<void>;
  /** Removes every version of the document except `keepVersion`; without it the document is gone. */
  delete(documentId: string, opts?: { keepVersion?: number }): Promise<void>;
  query(
    lexicalTerms: readonly string[],
    vector: readonly number[],
    filters: SearchFilters,
    k: number,
  ): Promise<QueryResult>;
  visibleRecords(documentId: string): Promise<IndexRecord[]>;
}

export function recordId(documentId: string, version: number, sequenceIndex: number) {
  return `${documentId}@${version}#${sequenceIndex}`;
}

export function matchesFilters(record: IndexRecord, filters: SearchFilters) {
  if (filters.documentIds?.length && !filters.documentIds.includes(record.documentId)) {
    return false;
  }
  if (filters.sourceTypes?.length && !filters.sourceTypes.includes(record.sourceType)) {
    return false;
  }
  if (filters.structuralTags?.length && !filters.structuralTags.includes(record.structuralTag)) {
    return false;
  }
  return true;
}

/** Stable order for equal scores: lower document id, then lower sequence index. */
export function compareHits(
  a: { score: number; documentId: string; sequenceIndex: number },
  b: { score: number; documentId: string; sequenceIndex: number },
) {
  if (b.score !== a.score) return b.score - a.score;
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  return a.sequenceIndex - b.sequenceIndex;
}
