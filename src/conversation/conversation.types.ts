export type ConversationState = 'empty' | 'active' | 'expired';

export type Citation = Readonly<{
  marker: string; // "S1", "S2", ...
  chunkId: string;
  documentId: string;
  title: string;
}>;

export type Turn = Readonly<{
  id: string; // also the answer id feedback refers to
  question: string;
  resolvedQuestion: string;
  retrievedChunkIds: readonly string[];
  answerText: string;
  citations: readonly Citation[];
  createdAt: string;
}>;

export type Conversation = Readonly<{
  id: string;
  turns: readonly Turn[];
  createdAt: string;
  lastActivityAt: string;
  /** First turn of the live session; earlier turns are kept for audit only. */
  historyStartIndex: number;
}>;

export function createTurn(fields: {
  id: string;
  question: string;
  resolvedQuestion: string;
  retrievedChunkIds: readonly string[];
  answerText: string;
  citations: readonly Citation[];
  createdAt: string;
}): Turn {
  return Object.freeze({
    ...fields,
    retrievedChunkIds: Object.freeze([...fields.retrievedChunkIds]),
    citations: Object.freeze(fields.citations.map((c) => Object.freeze({ ...c }))),
  });
}

export function emptyConversation(id: string, now: Date): Conversation {
  const ts = now.toISOString();
  return Object.freeze({
    id,
    turns: Object.freeze([]),
    createdAt: ts,
    lastActivityAt: ts,
    historyStartIndex: 0,
  });
}
